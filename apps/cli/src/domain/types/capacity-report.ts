import type { FitResult, ScalingRegime } from '@usl/domain';

export type PredictionBasis = 'concurrency' | 'throughput' | 'latency';

export interface PredictionQueries {
  readonly concurrencyLevels: readonly number[];
  readonly throughputs: readonly number[];
  readonly latencies: readonly number[];
}

export type Prediction =
  | {
      readonly basis: PredictionBasis;
      readonly value: number;
      readonly reachable: true;
      readonly concurrency: number;
      readonly throughput: number;
      readonly latency: number;
    }
  | {
      readonly basis: PredictionBasis;
      readonly value: number;
      readonly reachable: false;
    };

export interface CapacityReport {
  readonly source: string;
  readonly fit: FitResult;
  readonly peak: {
    readonly concurrency: number;
    readonly throughput: number;
  };
  readonly regime: ScalingRegime;
  readonly predictions: readonly Prediction[];
}
