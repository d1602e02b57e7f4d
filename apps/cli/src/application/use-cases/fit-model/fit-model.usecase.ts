import {
  createChildLogger,
  type LoggerPort,
  type Model,
  type ModelFittingService,
  UnreachableLatencyError,
  UnreachableThroughputError,
} from '@usl/domain';
import type { MeasurementSourcePort } from '@usl/cli/domain/ports/measurement-source.port';
import type { CapacityReport, Prediction, PredictionQueries } from '@usl/cli/domain/types/capacity-report';

function predictAtConcurrency(model: Model, concurrency: number): Prediction {
  return {
    basis: 'concurrency',
    value: concurrency,
    reachable: true,
    concurrency,
    throughput: model.throughputAtConcurrency(concurrency),
    latency: model.latencyAtConcurrency(concurrency),
  };
}

function predictAtThroughput(model: Model, throughput: number): Prediction {
  try {
    const concurrency = model.concurrencyAtThroughput(throughput);
    return { basis: 'throughput', value: throughput, reachable: true, concurrency, throughput, latency: concurrency / throughput };
  } catch (error) {
    if (error instanceof UnreachableThroughputError) {
      return { basis: 'throughput', value: throughput, reachable: false };
    }
    throw error;
  }
}

function predictAtLatency(model: Model, latency: number): Prediction {
  try {
    const concurrency = model.concurrencyAtLatency(latency);
    return { basis: 'latency', value: latency, reachable: true, concurrency, throughput: concurrency / latency, latency };
  } catch (error) {
    if (error instanceof UnreachableLatencyError) {
      return { basis: 'latency', value: latency, reachable: false };
    }
    throw error;
  }
}

export function predict(model: Model, queries: PredictionQueries): Prediction[] {
  return [
    ...queries.concurrencyLevels.map((n) => predictAtConcurrency(model, n)),
    ...queries.throughputs.map((x) => predictAtThroughput(model, x)),
    ...queries.latencies.map((l) => predictAtLatency(model, l)),
  ];
}

export class FitModelUseCase {
  private readonly log: LoggerPort;

  constructor(
    private readonly source: MeasurementSourcePort,
    private readonly fitting: ModelFittingService,
    logger?: LoggerPort
  ) {
    this.log = logger ?? createChildLogger('fit-model');
  }

  async execute(queries: PredictionQueries): Promise<CapacityReport> {
    const measurements = await this.source.load();
    this.log.info('Measurements loaded', { source: this.source.describe(), count: measurements.length });

    const fit = this.fitting.fitWithDiagnostics(measurements);
    const { model } = fit;
    this.log.info('Model fitted', {
      method: fit.method,
      sigma: model.sigma,
      kappa: model.kappa,
      lambda: model.lambda,
      regime: model.regime(),
    });

    const predictions = predict(model, queries);
    const unreachable = predictions.filter((prediction) => !prediction.reachable).length;
    if (unreachable > 0) {
      this.log.warn(`${unreachable} quer${unreachable === 1 ? 'y is' : 'ies are'} outside the model's reachable range`);
    }

    return {
      source: this.source.describe(),
      fit,
      peak: {
        concurrency: model.maxConcurrency(),
        throughput: model.maxThroughput(),
      },
      regime: model.regime(),
      predictions,
    };
  }
}
