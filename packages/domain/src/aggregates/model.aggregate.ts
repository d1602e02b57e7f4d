import { InvalidModelError, UnreachableLatencyError, UnreachableThroughputError } from '../errors/usl.errors';
import { smallestPositiveRoot } from '../math/quadratic';

export interface ModelProps {
  readonly sigma: number;
  readonly kappa: number;
  readonly lambda: number;
}

export type ScalingRegime = 'limitless' | 'coherency' | 'contention' | 'balanced';

/**
 * Universal Scalability Law model:
 *
 *   X(N) = λN / (1 + σ(N − 1) + κN(N − 1))
 *
 * σ is the contention coefficient, κ the coherency coefficient and λ the
 * throughput of a single unit of concurrency. Every query is derived from the
 * law above; the inverse queries are exact roots of quadratics.
 */
export class Model {
  private constructor(
    private readonly _sigma: number,
    private readonly _kappa: number,
    private readonly _lambda: number
  ) { }

  static create(sigma: number, kappa: number, lambda: number): Model {
    if (!Number.isFinite(sigma) || !Number.isFinite(kappa) || !Number.isFinite(lambda)) {
      throw new InvalidModelError(`Model coefficients must be finite (sigma=${sigma}, kappa=${kappa}, lambda=${lambda})`);
    }
    if (lambda <= 0) {
      throw new InvalidModelError(`Model lambda must be positive, got ${lambda}`);
    }
    return new Model(sigma, kappa, lambda);
  }

  static fromProps(props: ModelProps): Model {
    return Model.create(props.sigma, props.kappa, props.lambda);
  }

  get sigma(): number {
    return this._sigma;
  }

  get kappa(): number {
    return this._kappa;
  }

  get lambda(): number {
    return this._lambda;
  }

  throughputAtConcurrency(concurrency: number): number {
    const n = concurrency;
    return (this._lambda * n) / (1 + this._sigma * (n - 1) + this._kappa * n * (n - 1));
  }

  latencyAtConcurrency(concurrency: number): number {
    return concurrency / this.throughputAtConcurrency(concurrency);
  }

  // κX·N² + (σX − κX − λ)·N + (X − σX) = 0
  concurrencyAtThroughput(throughput: number): number {
    const x = throughput;
    const root = smallestPositiveRoot(
      this._kappa * x,
      this._sigma * x - this._kappa * x - this._lambda,
      x - this._sigma * x
    );
    if (root === null) {
      throw new UnreachableThroughputError(throughput, this.throughputCeiling());
    }
    return root;
  }

  latencyAtThroughput(throughput: number): number {
    return this.concurrencyAtThroughput(throughput) / throughput;
  }

  // κ·N² + (σ − κ)·N + (1 − σ − λL) = 0
  concurrencyAtLatency(latency: number): number {
    const root = smallestPositiveRoot(
      this._kappa,
      this._sigma - this._kappa,
      1 - this._sigma - this._lambda * latency
    );
    if (root === null) {
      throw new UnreachableLatencyError(latency);
    }
    return root;
  }

  throughputAtLatency(latency: number): number {
    return this.concurrencyAtLatency(latency) / latency;
  }

  maxConcurrency(): number {
    if (this.isLimitless()) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.sqrt((1 - this._sigma) / this._kappa);
  }

  maxThroughput(): number {
    if (this.isLimitless()) {
      return Number.POSITIVE_INFINITY;
    }
    return this.throughputAtConcurrency(this.maxConcurrency());
  }

  // least upper bound of X(N); without coherency delay X approaches λ/σ but never peaks
  throughputCeiling(): number {
    if (!this.isLimitless()) {
      return this.maxThroughput();
    }
    return this._sigma > 0 ? this._lambda / this._sigma : Number.POSITIVE_INFINITY;
  }

  isLimitless(): boolean {
    return this._kappa === 0;
  }

  isCoherencyConstrained(): boolean {
    return this._kappa > this._sigma;
  }

  isContentionConstrained(): boolean {
    return this._sigma > this._kappa;
  }

  regime(): ScalingRegime {
    if (this.isLimitless()) {
      return 'limitless';
    }
    if (this.isCoherencyConstrained()) {
      return 'coherency';
    }
    if (this.isContentionConstrained()) {
      return 'contention';
    }
    return 'balanced';
  }

  toProps(): ModelProps {
    return { sigma: this._sigma, kappa: this._kappa, lambda: this._lambda };
  }

  equals(other: Model): boolean {
    return this._sigma === other._sigma && this._kappa === other._kappa && this._lambda === other._lambda;
  }

  toString(): string {
    return `Model(sigma=${this._sigma}, kappa=${this._kappa}, lambda=${this._lambda})`;
  }
}
