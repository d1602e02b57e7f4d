import type { Model } from '../aggregates/model.aggregate';
import { Measurement } from '../value-objects/measurement.vo';
import { DefaultModelFittingService } from './default-model-fitting.service';
import type { FitOptions, FitResult } from './model-fitting.service';

/**
 * Accumulates measurements and fits them in one go.
 *
 * @example
 * ```typescript
 * const model = new ModelBuilder()
 *   .addConcurrencyAndThroughput(1, 980)
 *   .addConcurrencyAndThroughput(8, 6400)
 *   .addConcurrencyAndThroughput(32, 11800)
 *   .build();
 * ```
 */
export class ModelBuilder {
  private readonly measurements: Measurement[] = [];

  constructor(private readonly options: FitOptions = {}) { }

  get size(): number {
    return this.measurements.length;
  }

  add(measurement: Measurement): this {
    this.measurements.push(measurement);
    return this;
  }

  addAll(measurements: Iterable<Measurement>): this {
    for (const measurement of measurements) {
      this.measurements.push(measurement);
    }
    return this;
  }

  addConcurrencyAndThroughput(concurrency: number, throughput: number): this {
    return this.add(Measurement.ofConcurrencyAndThroughput(concurrency, throughput));
  }

  addConcurrencyAndLatency(concurrency: number, latency: number): this {
    return this.add(Measurement.ofConcurrencyAndLatency(concurrency, latency));
  }

  addThroughputAndLatency(throughput: number, latency: number): this {
    return this.add(Measurement.ofThroughputAndLatency(throughput, latency));
  }

  build(): Model {
    return this.buildWithDiagnostics().model;
  }

  buildWithDiagnostics(): FitResult {
    return new DefaultModelFittingService(this.options).fitWithDiagnostics(this.measurements);
  }
}
