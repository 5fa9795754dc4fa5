export {
  DEFAULT_REGISTRY_NAME,
  isLogLevel,
  LOG_LEVELS,
  type LoggingConfig,
  loggingConfigFromEnv,
  type LogLevel,
  type RegistryConfig,
  type ResolvedRegistryConfig,
  resolveRegistryConfig,
} from './types.js';
