import { InvalidMeasurementError } from '../errors/usl.errors';

export interface MeasurementProps {
  readonly concurrency: number;
  readonly throughput: number;
}

// Little's Law: concurrency = throughput * latency
export class Measurement {
  private constructor(private readonly _concurrency: number, private readonly _throughput: number) { }

  get concurrency(): number {
    return this._concurrency;
  }

  get throughput(): number {
    return this._throughput;
  }

  get latency(): number {
    return this._concurrency / this._throughput;
  }

  static ofConcurrencyAndThroughput(concurrency: number, throughput: number): Measurement {
    assertPositive('concurrency', concurrency);
    assertPositive('throughput', throughput);
    return new Measurement(concurrency, throughput);
  }

  static ofConcurrencyAndLatency(concurrency: number, latency: number): Measurement {
    assertPositive('concurrency', concurrency);
    assertPositive('latency', latency);
    const throughput = concurrency / latency;
    assertPositive('throughput', throughput);
    return new Measurement(concurrency, throughput);
  }

  static ofThroughputAndLatency(throughput: number, latency: number): Measurement {
    assertPositive('throughput', throughput);
    assertPositive('latency', latency);
    const concurrency = throughput * latency;
    assertPositive('concurrency', concurrency);
    return new Measurement(concurrency, throughput);
  }

  static fromProps(props: MeasurementProps): Measurement {
    return Measurement.ofConcurrencyAndThroughput(props.concurrency, props.throughput);
  }

  toProps(): MeasurementProps {
    return { concurrency: this._concurrency, throughput: this._throughput };
  }

  equals(other: Measurement): boolean {
    return this._concurrency === other._concurrency && this._throughput === other._throughput;
  }

  toString(): string {
    return `N=${this._concurrency} X=${this._throughput} L=${this.latency}`;
  }
}

function assertPositive(field: 'concurrency' | 'throughput' | 'latency', value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidMeasurementError(field, value);
  }
}
