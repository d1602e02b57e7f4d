import { Model } from '../aggregates/model.aggregate';
import { DegenerateFitError, InsufficientDataError } from '../errors/usl.errors';
import type { LoggerPort } from '../infrastructure/logger.port';
import { createChildLogger } from '../infrastructure/pino-logger';
import { type Vector3, solveLinearSystem } from '../math/linear-system';
import { fitQuadratic } from '../math/polynomial-regression';
import type { Measurement, MeasurementProps } from '../value-objects/measurement.vo';
import type { FitMethod, FitOptions, FitResult, ModelFittingService } from './model-fitting.service';

export const DEFAULT_MAX_ITERATIONS = 100;
export const DEFAULT_TOLERANCE = 1e-10;

const MIN_STEP_SCALE = 1e-10;

// [sigma, kappa, lambda]
type Coefficients = Vector3;

function predictThroughput([sigma, kappa, lambda]: Coefficients, n: number): number {
  return (lambda * n) / (1 + sigma * (n - 1) + kappa * n * (n - 1));
}

function sumOfSquaredErrors(coefficients: Coefficients, points: readonly MeasurementProps[]): number {
  return points.reduce((acc, { concurrency, throughput }) => {
    const residual = throughput - predictThroughput(coefficients, concurrency);
    return acc + residual * residual;
  }, 0);
}

/**
 * N/X(N) = (1 − σ)/λ + ((σ − κ)/λ)·N + (κ/λ)·N², so a quadratic regression of
 * N/X on N yields a, b, c and from them λ = 1/(a + b + c), σ = λ(b + c), κ = λc.
 */
function fitLinearized(points: readonly MeasurementProps[]): Coefficients {
  const quadratic = fitQuadratic(points.map(({ concurrency, throughput }) => ({ x: concurrency, y: concurrency / throughput })));
  if (!quadratic) {
    throw new DegenerateFitError('normal equations have no unique solution');
  }

  const [a, b, c] = quadratic;
  const lambda = 1 / (a + b + c);
  const coefficients: Coefficients = [lambda * (b + c), lambda * c, lambda];
  if (!coefficients.every(Number.isFinite) || lambda <= 0) {
    throw new DegenerateFitError(`regression produced unusable coefficients (a=${a}, b=${b}, c=${c})`);
  }
  return coefficients;
}

function gaussNewtonStep(coefficients: Coefficients, points: readonly MeasurementProps[]): Coefficients | null {
  const [sigma, kappa, lambda] = coefficients;
  const normal = [
    [0, 0, 0],
    [0, 0, 0],
    [0, 0, 0],
  ];
  const gradient = [0, 0, 0];

  for (const { concurrency: n, throughput } of points) {
    const denominator = 1 + sigma * (n - 1) + kappa * n * (n - 1);
    const residual = throughput - (lambda * n) / denominator;
    const squared = denominator * denominator;
    const jacobian = [(-lambda * n * (n - 1)) / squared, (-lambda * n * n * (n - 1)) / squared, n / denominator];

    for (let i = 0; i < 3; i += 1) {
      gradient[i] += jacobian[i] * residual;
      for (let j = 0; j < 3; j += 1) {
        normal[i][j] += jacobian[i] * jacobian[j];
      }
    }
  }

  return solveLinearSystem(
    [
      [normal[0][0], normal[0][1], normal[0][2]],
      [normal[1][0], normal[1][1], normal[1][2]],
      [normal[2][0], normal[2][1], normal[2][2]],
    ],
    [gradient[0], gradient[1], gradient[2]]
  );
}

interface Refinement {
  coefficients: Coefficients;
  iterations: number;
  converged: boolean;
}

export class DefaultModelFittingService implements ModelFittingService {
  private readonly method: FitMethod;
  private readonly maxIterations: number;
  private readonly tolerance: number;
  private readonly log: LoggerPort;

  constructor(options: FitOptions = {}, logger?: LoggerPort) {
    this.method = options.method ?? 'refined';
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    this.log = logger ?? createChildLogger('model-fitting');

    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new Error('maxIterations must be a positive integer');
    }
    if (!(this.tolerance > 0)) {
      throw new Error('tolerance must be positive');
    }
  }

  fit(measurements: Iterable<Measurement>): Model {
    return this.fitWithDiagnostics(measurements).model;
  }

  fitWithDiagnostics(measurements: Iterable<Measurement>): FitResult {
    const points = Array.from(measurements, (measurement) => measurement.toProps());
    if (points.length === 0) {
      throw new InsufficientDataError();
    }

    const distinctConcurrencies = new Set(points.map((point) => point.concurrency)).size;
    if (distinctConcurrencies === 1) {
      throw new DegenerateFitError(`every measurement is at concurrency ${points[0].concurrency}`);
    }
    if (distinctConcurrencies < 3) {
      this.log.warn('Fewer than three distinct concurrency values; coefficients may be unstable', {
        distinctConcurrencies,
      });
    }

    const seed = fitLinearized(points);
    this.log.debug('Linearized regression complete', { sigma: seed[0], kappa: seed[1], lambda: seed[2] });

    let method: FitMethod = 'linearized';
    let coefficients = seed;
    let iterations = 0;
    let converged = true;

    if (this.method === 'refined') {
      const refinement = this.refine(seed, points);
      if (refinement) {
        method = 'refined';
        ({ coefficients, iterations, converged } = refinement);
      }
    }

    const [sigma, kappa, lambda] = coefficients;
    const model = Model.create(sigma, kappa, lambda);
    const rootMeanSquaredError = Math.sqrt(sumOfSquaredErrors(coefficients, points) / points.length);

    this.log.debug('Model fitted', {
      method,
      sigma,
      kappa,
      lambda,
      iterations,
      converged,
      measurementCount: points.length,
    });

    return {
      model,
      method,
      iterations,
      converged,
      measurementCount: points.length,
      distinctConcurrencies,
      rootMeanSquaredError,
    };
  }

  // Damped Gauss-Newton on throughput residuals; halves a step until it lowers the error.
  private refine(seed: Coefficients, points: readonly MeasurementProps[]): Refinement | null {
    let current = seed;
    let currentError = sumOfSquaredErrors(current, points);

    for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
      const step = gaussNewtonStep(current, points);
      if (!step) {
        if (iteration === 1) {
          this.log.warn('Refinement step is singular; keeping linearized coefficients');
          return null;
        }
        return { coefficients: current, iterations: iteration - 1, converged: false };
      }

      let scale = 1;
      let accepted: Coefficients | null = null;
      let acceptedError = currentError;
      while (scale >= MIN_STEP_SCALE) {
        const candidate: Coefficients = [
          current[0] + scale * step[0],
          current[1] + scale * step[1],
          current[2] + scale * step[2],
        ];
        const candidateError = sumOfSquaredErrors(candidate, points);
        if (candidate[2] > 0 && candidateError <= currentError) {
          accepted = candidate;
          acceptedError = candidateError;
          break;
        }
        scale /= 2;
      }

      if (!accepted) {
        return { coefficients: current, iterations: iteration - 1, converged: true };
      }

      const previous = current;
      current = accepted;
      currentError = acceptedError;

      const relativeChange = Math.max(
        ...current.map((value, index) => Math.abs(value - previous[index]) / (Math.abs(value) + Number.EPSILON))
      );
      if (relativeChange < this.tolerance) {
        return { coefficients: current, iterations: iteration, converged: true };
      }
    }

    this.log.warn('Refinement did not converge within the iteration limit', { maxIterations: this.maxIterations });
    return { coefficients: current, iterations: this.maxIterations, converged: false };
  }
}

export function buildModel(measurements: Iterable<Measurement>, options: FitOptions = {}): Model {
  return new DefaultModelFittingService(options).fit(measurements);
}
