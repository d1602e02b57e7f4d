import type { Model } from '../aggregates/model.aggregate';
import type { Measurement } from '../value-objects/measurement.vo';

export type FitMethod = 'refined' | 'linearized';

export interface FitOptions {
  method?: FitMethod;
  maxIterations?: number;
  tolerance?: number;
}

export interface FitResult {
  readonly model: Model;
  readonly method: FitMethod;
  readonly iterations: number;
  readonly converged: boolean;
  readonly measurementCount: number;
  readonly distinctConcurrencies: number;
  readonly rootMeanSquaredError: number;
}

export interface ModelFittingService {
  fit(measurements: Iterable<Measurement>): Model;
  fitWithDiagnostics(measurements: Iterable<Measurement>): FitResult;
}
