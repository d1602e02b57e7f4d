import { ConfigError, type ConfigSchema, loadConfig } from '@usl/config';
import { createChildLogger, DefaultModelFittingService, type LoggerPort, UslError } from '@usl/domain';
import { type CliArgs, CliUsageError, parseCliArgs, USAGE } from '@usl/cli/application/cli-args';
import { FitModelUseCase } from '@usl/cli/application/use-cases/fit-model/fit-model.usecase';
import type { PredictionQueries } from '@usl/cli/domain/types/capacity-report';
import {
  FileMeasurementSource,
  MeasurementFileError,
} from '@usl/cli/infrastructure/adapters/measurement-file/measurement-file.adapter';
import { initializeLogging } from '@usl/cli/infrastructure/logging/logger';
import { formatReport } from '@usl/cli/infrastructure/report/report-formatter';

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function applyOverrides(config: ConfigSchema, args: CliArgs): ConfigSchema {
  return {
    ...config,
    fit: { ...config.fit, method: args.method ?? config.fit.method },
    input: {
      columns: args.columns ?? config.input.columns,
      delimiter: args.delimiter ?? config.input.delimiter,
      hasHeader: args.hasHeader ?? config.input.hasHeader,
    },
    report: { ...config.report, precision: args.precision ?? config.report.precision },
  };
}

function queriesFor(config: ConfigSchema, args: CliArgs): PredictionQueries {
  return {
    concurrencyLevels: args.concurrencyLevels.length > 0 ? args.concurrencyLevels : config.report.concurrencyLevels,
    throughputs: args.throughputs.length > 0 ? args.throughputs : config.report.throughputs,
    latencies: args.latencies.length > 0 ? args.latencies : config.report.latencies,
  };
}

/**
 * Runs one invocation of the command line tool and resolves to its exit code.
 * Expected failures (bad arguments, configuration, input or an unusable fit)
 * are written to `stderr`; anything else is rethrown.
 */
export async function runCli(argv: readonly string[], output: CliOutput): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      output.stderr(`error: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help || args.file === undefined) {
    output.stdout(USAGE);
    return EXIT_OK;
  }

  let config: ConfigSchema;
  try {
    config = applyOverrides(loadConfig({ configPath: args.configPath }).config, args);
  } catch (error) {
    if (error instanceof ConfigError) {
      output.stderr(`error: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  initializeLogging(config.telemetry);
  const log = createChildLogger('cli');

  try {
    const useCase = new FitModelUseCase(
      new FileMeasurementSource(args.file, config.input),
      new DefaultModelFittingService(config.fit)
    );
    const report = await useCase.execute(queriesFor(config, args));
    output.stdout(formatReport(report, config.report.precision));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UslError || error instanceof MeasurementFileError) {
      log.debug('Run failed', { name: error.name });
      output.stderr(`error: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

// Sets the exit code instead of exiting so the pretty transport can flush the fatal line.
export function reportUnhandledError(error: unknown, log: LoggerPort = createChildLogger('main')): void {
  log.fatal('Unhandled error', error instanceof Error ? error : new Error(String(error)));
  process.exitCode = EXIT_FAILURE;
}
