export * from './config';
export * from './env';
export {
  ConfigError,
  type LoadedConfig,
  type LoadOptions,
  loadConfig,
  loadConfigFile,
  loadEnv,
  parseEnvContent,
  validateConfig,
  validateEnv,
} from './loader';
