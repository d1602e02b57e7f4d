// Aggregates
export type { ModelProps, ScalingRegime } from './aggregates/model.aggregate';
export { Model } from './aggregates/model.aggregate';

// Errors
export type { UslErrorCode } from './errors/usl.errors';
export {
  DegenerateFitError,
  InsufficientDataError,
  InvalidMeasurementError,
  InvalidModelError,
  UnreachableLatencyError,
  UnreachableThroughputError,
  UslError,
} from './errors/usl.errors';

// Infrastructure
export type { LogContext, LoggerPort, LogLevel } from './infrastructure/logger.port';
export { isLogLevel, LOG_LEVELS } from './infrastructure/logger.port';
export { createChildLogger, createPinoLogger, PinoLogger } from './infrastructure/pino-logger';

// Math
export type { Matrix3, Vector3 } from './math/linear-system';
export { solveLinearSystem } from './math/linear-system';
export type { Point } from './math/polynomial-regression';
export { fitQuadratic } from './math/polynomial-regression';
export { smallestPositiveRoot } from './math/quadratic';

// Value Objects
export type { MeasurementProps } from './value-objects/measurement.vo';
export { Measurement } from './value-objects/measurement.vo';

// Services
export type { FitMethod, FitOptions, FitResult, ModelFittingService } from './services/model-fitting.service';
export {
  buildModel,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOLERANCE,
  DefaultModelFittingService,
} from './services/default-model-fitting.service';
export { ModelBuilder } from './services/model-builder';
