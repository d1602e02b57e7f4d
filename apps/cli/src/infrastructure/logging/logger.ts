import type { TelemetryConfig } from '@usl/config';
import { createPinoLogger } from '@usl/domain';

export const ROOT_LOGGER_NAME = 'usl';

export function initializeLogging(telemetry: TelemetryConfig): void {
  createPinoLogger({
    name: ROOT_LOGGER_NAME,
    logLevel: telemetry.logLevel,
    traceErrors: telemetry.traceErrors,
    prettyPrint: telemetry.prettyPrint,
  });
}
