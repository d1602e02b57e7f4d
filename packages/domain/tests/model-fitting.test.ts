import {
  buildModel,
  DefaultModelFittingService,
  DegenerateFitError,
  type FitMethod,
  InsufficientDataError,
  type LoggerPort,
  type LogLevel,
  Measurement,
  Model,
  ModelBuilder,
} from '../src';

function expectRelativelyClose(actual: number, expected: number, tolerance: number): void {
  expect(Math.abs(actual - expected) / Math.abs(expected)).toBeLessThan(tolerance);
}

interface RecordedLog {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

function createRecordingLogger(): { logger: LoggerPort; records: RecordedLog[] } {
  const records: RecordedLog[] = [];
  const logger: LoggerPort = {
    trace: (message, context) => records.push({ level: 'trace', message, context }),
    debug: (message, context) => records.push({ level: 'debug', message, context }),
    info: (message, context) => records.push({ level: 'info', message, context }),
    warn: (message, context) => records.push({ level: 'warn', message, context }),
    error: (message, _error, context) => records.push({ level: 'error', message, context }),
    fatal: (message, _error, context) => records.push({ level: 'fatal', message, context }),
    child: () => logger,
    setLevel: () => undefined,
    getLevel: () => 'trace',
  };
  return { logger, records };
}

const truth = Model.create(0.03, 0.0008, 1000);
const concurrencies = Array.from({ length: 32 }, (_, index) => index + 1);

const exactMeasurements = concurrencies.map((n) =>
  Measurement.ofConcurrencyAndThroughput(n, truth.throughputAtConcurrency(n))
);

// repeating ±2% perturbation
const NOISE = [0.02, -0.015, 0.01, -0.02, 0.005, 0, -0.01, 0.015];
const noisyMeasurements = concurrencies.map((n) =>
  Measurement.ofConcurrencyAndThroughput(n, truth.throughputAtConcurrency(n) * (1 + NOISE[(n - 1) % NOISE.length]))
);

describe('DefaultModelFittingService', () => {
  describe('on measurements drawn from a known model', () => {
    it.each<FitMethod>(['linearized', 'refined'])('recovers the coefficients with the %s method', (method) => {
      const { logger } = createRecordingLogger();
      const model = new DefaultModelFittingService({ method }, logger).fit(exactMeasurements);

      expectRelativelyClose(model.sigma, 0.03, 1e-8);
      expectRelativelyClose(model.kappa, 0.0008, 1e-8);
      expectRelativelyClose(model.lambda, 1000, 1e-8);
    });

    it('accepts measurements given as latencies', () => {
      const { logger } = createRecordingLogger();
      const viaLatency = concurrencies.map((n) => Measurement.ofConcurrencyAndLatency(n, truth.latencyAtConcurrency(n)));

      const model = new DefaultModelFittingService({}, logger).fit(viaLatency);

      expectRelativelyClose(model.sigma, 0.03, 1e-6);
      expectRelativelyClose(model.kappa, 0.0008, 1e-6);
      expectRelativelyClose(model.lambda, 1000, 1e-6);
    });

    it('does not depend on measurement order', () => {
      const { logger } = createRecordingLogger();
      const service = new DefaultModelFittingService({ method: 'linearized' }, logger);

      const forward = service.fit(noisyMeasurements);
      const reversed = service.fit([...noisyMeasurements].reverse());

      expectRelativelyClose(reversed.sigma, forward.sigma, 1e-6);
      expectRelativelyClose(reversed.kappa, forward.kappa, 1e-6);
      expectRelativelyClose(reversed.lambda, forward.lambda, 1e-6);
    });
  });

  describe('on noisy measurements', () => {
    it('gets close to the generating model with the linearized regression', () => {
      const { logger } = createRecordingLogger();
      const result = new DefaultModelFittingService({ method: 'linearized' }, logger).fitWithDiagnostics(noisyMeasurements);

      expect(result.method).toBe('linearized');
      expect(result.iterations).toBe(0);
      expectRelativelyClose(result.model.sigma, 0.030359608131399637, 1e-6);
      expectRelativelyClose(result.model.kappa, 0.0007911792849272552, 1e-6);
      expectRelativelyClose(result.model.lambda, 1001.9081731603923, 1e-6);
    });

    it('refines the coefficients against throughput residuals', () => {
      const { logger } = createRecordingLogger();
      const service = new DefaultModelFittingService({}, logger);

      const refined = service.fitWithDiagnostics(noisyMeasurements);

      expect(refined.method).toBe('refined');
      expect(refined.converged).toBe(true);
      expect(refined.iterations).toBeGreaterThan(0);
      expectRelativelyClose(refined.model.sigma, 0.030031101330538896, 1e-5);
      expectRelativelyClose(refined.model.kappa, 0.0007988551327721362, 1e-5);
      expectRelativelyClose(refined.model.lambda, 1000.6217157818148, 1e-6);
    });

    it('lowers the throughput error compared with the linearized regression', () => {
      const { logger } = createRecordingLogger();

      const linearized = new DefaultModelFittingService({ method: 'linearized' }, logger).fitWithDiagnostics(noisyMeasurements);
      const refined = new DefaultModelFittingService({ method: 'refined' }, logger).fitWithDiagnostics(noisyMeasurements);

      expect(refined.rootMeanSquaredError).toBeLessThan(linearized.rootMeanSquaredError);
      expectRelativelyClose(linearized.rootMeanSquaredError, 122.29629953630266, 1e-6);
      expectRelativelyClose(refined.rootMeanSquaredError, 122.24425397430838, 1e-6);
    });

    it('classifies the fitted model like the generating one', () => {
      const { logger } = createRecordingLogger();
      const model = new DefaultModelFittingService({}, logger).fit(noisyMeasurements);

      expect(model.isContentionConstrained()).toBe(true);
      expect(model.isCoherencyConstrained()).toBe(false);
      expect(model.isLimitless()).toBe(false);
      expect(Math.floor(model.maxConcurrency())).toBe(34);
    });
  });

  describe('diagnostics', () => {
    it('counts measurements and distinct concurrency values', () => {
      const { logger } = createRecordingLogger();
      const doubled = [...exactMeasurements, ...exactMeasurements];

      const result = new DefaultModelFittingService({ method: 'linearized' }, logger).fitWithDiagnostics(doubled);

      expect(result.measurementCount).toBe(64);
      expect(result.distinctConcurrencies).toBe(32);
      expect(result.converged).toBe(true);
      expect(result.rootMeanSquaredError).toBeLessThan(1e-6);
    });

    it('logs the fitted coefficients at debug level', () => {
      const { logger, records } = createRecordingLogger();

      new DefaultModelFittingService({ method: 'linearized' }, logger).fit(exactMeasurements);

      const fitted = records.find((record) => record.message === 'Model fitted');
      expect(fitted?.level).toBe('debug');
      expect(fitted?.context).toMatchObject({ method: 'linearized', measurementCount: 32 });
    });
  });

  describe('failures', () => {
    it('rejects an empty collection', () => {
      const { logger } = createRecordingLogger();

      expect(() => new DefaultModelFittingService({}, logger).fit([])).toThrow(InsufficientDataError);
    });

    it('rejects measurements that all share one concurrency', () => {
      const { logger } = createRecordingLogger();
      const flat = [100, 110, 95].map((x) => Measurement.ofConcurrencyAndThroughput(3, x));

      expect(() => new DefaultModelFittingService({}, logger).fit(flat)).toThrow(DegenerateFitError);
    });

    it('warns when fewer than three concurrency values are present', () => {
      const { logger, records } = createRecordingLogger();
      const sparse = [
        Measurement.ofConcurrencyAndThroughput(1, 1000),
        Measurement.ofConcurrencyAndThroughput(1, 1010),
        Measurement.ofConcurrencyAndThroughput(4, 3500),
      ];

      try {
        new DefaultModelFittingService({}, logger).fit(sparse);
      } catch (error) {
        expect(error).toBeInstanceOf(DegenerateFitError);
      }

      expect(records).toContainEqual({
        level: 'warn',
        message: 'Fewer than three distinct concurrency values; coefficients may be unstable',
        context: { distinctConcurrencies: 2 },
      });
    });

    it('rejects invalid refinement settings', () => {
      const { logger } = createRecordingLogger();

      expect(() => new DefaultModelFittingService({ maxIterations: 0 }, logger)).toThrow('maxIterations must be a positive integer');
      expect(() => new DefaultModelFittingService({ tolerance: 0 }, logger)).toThrow('tolerance must be positive');
    });
  });
});

describe('buildModel', () => {
  it('fits a collection with the default method', () => {
    const model = buildModel(exactMeasurements);

    expectRelativelyClose(model.sigma, 0.03, 1e-8);
    expectRelativelyClose(model.kappa, 0.0008, 1e-8);
    expectRelativelyClose(model.lambda, 1000, 1e-8);
  });

  it('rejects an empty collection', () => {
    expect(() => buildModel([])).toThrow(InsufficientDataError);
  });
});

describe('ModelBuilder', () => {
  it('accumulates measurements from every constructor form', () => {
    const builder = new ModelBuilder({ method: 'linearized' });

    for (const n of concurrencies.slice(0, 10)) {
      builder.addConcurrencyAndThroughput(n, truth.throughputAtConcurrency(n));
    }
    for (const n of concurrencies.slice(10, 20)) {
      builder.addConcurrencyAndLatency(n, truth.latencyAtConcurrency(n));
    }
    for (const n of concurrencies.slice(20)) {
      builder.addThroughputAndLatency(truth.throughputAtConcurrency(n), truth.latencyAtConcurrency(n));
    }

    expect(builder.size).toBe(32);
    const model = builder.build();
    expectRelativelyClose(model.sigma, 0.03, 1e-6);
    expectRelativelyClose(model.kappa, 0.0008, 1e-6);
    expectRelativelyClose(model.lambda, 1000, 1e-6);
  });

  it('matches a fit of the same collection', () => {
    const fromBuilder = new ModelBuilder().addAll(noisyMeasurements).build();
    const fromCollection = buildModel(noisyMeasurements);

    expect(fromBuilder.equals(fromCollection)).toBe(true);
  });

  it('reports diagnostics of the fit', () => {
    const result = new ModelBuilder({ method: 'linearized' }).addAll(exactMeasurements).buildWithDiagnostics();

    expect(result.method).toBe('linearized');
    expect(result.measurementCount).toBe(32);
  });

  it('fails to build without measurements', () => {
    expect(() => new ModelBuilder().build()).toThrow(InsufficientDataError);
  });
});
