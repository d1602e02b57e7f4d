import * as fs from 'node:fs';
import * as path from 'node:path';
import type { z } from 'zod';
import { type ConfigSchema, configSchema } from './config';
import { type EnvSchema, envSchema } from './env';

const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config/config.json');
const DEFAULT_ENV_PATH = path.resolve(process.cwd(), 'config/.env');

export interface LoadOptions {
  configPath?: string;
  envPath?: string;
  skipEnv?: boolean;
  // a missing file at the default path falls back to schema defaults
  requireConfigFile?: boolean;
}

export interface LoadedConfig {
  config: ConfigSchema;
  env: EnvSchema;
}

interface LoadEnvOptions {
  envPath?: string;
  skipEnv?: boolean;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.map(String).join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
}

function parseWith<T extends z.ZodType>(schema: T, value: unknown, failure: string, source: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(failure, source, describeIssues(result.error));
  }
  return result.data;
}

export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const requireConfigFile = options.requireConfigFile ?? options.configPath !== undefined;

  const fileConfig =
    requireConfigFile || fs.existsSync(configPath) ? loadConfigFile(configPath) : configSchema.parse({});
  const env = loadEnv({ envPath: options.envPath, skipEnv: options.skipEnv });

  return {
    config: applyEnvOverrides(fileConfig, env),
    env,
  };
}

export function loadConfigFile(configPath: string = DEFAULT_CONFIG_PATH): ConfigSchema {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file is not valid JSON: ${configPath} (${reason})`, configPath);
  }

  return parseWith(configSchema, raw, 'Configuration file validation failed', configPath);
}

/** Reads the env file (unless skipped), then lets the process environment override it. */
export function loadEnv(options: LoadEnvOptions = {}): EnvSchema {
  const envPath = options.envPath ?? DEFAULT_ENV_PATH;
  const fromFile = options.skipEnv || !fs.existsSync(envPath) ? {} : parseEnvContent(fs.readFileSync(envPath, 'utf-8'));

  const fromProcess: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = process.env[key];
    if (typeof value === 'string') {
      fromProcess[key] = value;
    }
  }

  return parseWith(envSchema, { ...fromFile, ...fromProcess }, '.env validation failed', envPath);
}

export function parseEnvContent(content: string): Record<string, string> {
  const entries: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    const separator = trimmed.indexOf('=');
    if (!trimmed || trimmed.startsWith('#') || separator === -1) {
      continue;
    }

    const key = trimmed.slice(0, separator).trim();
    const value = trimmed.slice(separator + 1).trim();
    const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
    entries[key] = quoted ? value.slice(1, -1) : value;
  }

  return entries;
}

function applyEnvOverrides(config: ConfigSchema, env: EnvSchema): ConfigSchema {
  return {
    ...config,
    telemetry: { ...config.telemetry, logLevel: env.LOG_LEVEL ?? config.telemetry.logLevel },
    fit: { ...config.fit, method: env.USL_FIT_METHOD ?? config.fit.method },
  };
}

export function validateConfig(config: unknown): config is ConfigSchema {
  return configSchema.safeParse(config).success;
}

export function validateEnv(env: unknown): env is EnvSchema {
  return envSchema.safeParse(env).success;
}
