export type UslErrorCode =
  | 'INVALID_MEASUREMENT'
  | 'INVALID_MODEL'
  | 'INSUFFICIENT_DATA'
  | 'DEGENERATE_FIT'
  | 'UNREACHABLE_THROUGHPUT'
  | 'UNREACHABLE_LATENCY';

export abstract class UslError extends Error {
  abstract readonly code: UslErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidMeasurementError extends UslError {
  readonly code = 'INVALID_MEASUREMENT';

  constructor(
    public readonly field: 'concurrency' | 'throughput' | 'latency',
    public readonly value: number,
  ) {
    super(`Measurement ${field} must be a positive finite number, got ${value}`);
  }
}

export class InvalidModelError extends UslError {
  readonly code = 'INVALID_MODEL';

  constructor(message: string) {
    super(message);
  }
}

export class InsufficientDataError extends UslError {
  readonly code = 'INSUFFICIENT_DATA';

  constructor() {
    super('At least one measurement is required to fit a model');
  }
}

export class DegenerateFitError extends UslError {
  readonly code = 'DEGENERATE_FIT';

  constructor(reason: string) {
    super(`Regression system is singular: ${reason}`);
  }
}

export class UnreachableThroughputError extends UslError {
  readonly code = 'UNREACHABLE_THROUGHPUT';

  constructor(
    public readonly throughput: number,
    public readonly maxThroughput: number,
  ) {
    super(`Throughput ${throughput} is not reachable (model throughput cannot exceed ${maxThroughput})`);
  }
}

export class UnreachableLatencyError extends UslError {
  readonly code = 'UNREACHABLE_LATENCY';

  constructor(public readonly latency: number) {
    super(`Latency ${latency} is not reachable at any positive concurrency`);
  }
}
