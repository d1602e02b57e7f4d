import pino, { type Logger, type LoggerOptions } from 'pino';
import { isLogLevel, type LogContext, type LoggerPort, type LogLevel } from './logger.port';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  prettyPrint?: boolean;
  traceErrors?: boolean;
}

export class PinoLogger implements LoggerPort {
  private logger: Logger;
  private name: string;
  private traceErrors: boolean;

  constructor(config: LoggerConfig, existingLogger?: Logger) {
    this.name = config.name;
    this.traceErrors = config.traceErrors ?? false;

    if (existingLogger) {
      this.logger = existingLogger;
      return;
    }

    const options: LoggerOptions = {
      name: config.name,
      level: config.level,
    };

    if (config.prettyPrint) {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      };
      this.logger = pino(options);
      return;
    }

    this.logger = pino(options, pino.destination(2));
  }

  trace(message: string, context?: LogContext): void {
    this.logger.trace(context, message);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(this.withError(error, context), message);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(this.withError(error, context), message);
  }

  child(bindings: LogContext): LoggerPort {
    const childLogger = this.logger.child(bindings);
    return new PinoLogger({ name: this.name, level: this.getLevel(), traceErrors: this.traceErrors }, childLogger);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  getLevel(): LogLevel {
    const level = this.logger.level;
    return isLogLevel(level) ? level : 'info';
  }

  private withError(error: Error | undefined, context?: LogContext): LogContext | undefined {
    if (!error) {
      return context;
    }
    return {
      ...context,
      err: this.traceErrors ? { message: error.message, stack: error.stack } : { message: error.message },
    };
  }
}

let globalRootLogger: LoggerPort | null = null;

export function createPinoLogger(config: { name: string; logLevel?: LogLevel; traceErrors?: boolean; prettyPrint?: boolean }): void {
  const nodeEnv = process.env.NODE_ENV;

  globalRootLogger = new PinoLogger({
    name: config.name,
    level: config.logLevel ?? 'warn',
    traceErrors: config.traceErrors,
    prettyPrint: config.prettyPrint ?? (nodeEnv !== 'production' && nodeEnv !== 'test'),
  });
}

function initializeRootLogger(): void {
  const envLevel = process.env.LOG_LEVEL;
  createPinoLogger({
    name: 'usl',
    logLevel: envLevel !== undefined && isLogLevel(envLevel) ? envLevel : undefined,
  });
}

// Children take the root's level when created; ask for them after createPinoLogger.
export function createChildLogger(name: string): LoggerPort {
  if (!globalRootLogger) {
    initializeRootLogger();
  }
  if (!globalRootLogger) {
    throw new Error('Logger not initialized');
  }
  return globalRootLogger.child({ name });
}
