export {
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_TOKEN_MAX_AGE_SECONDS,
  type PrismConfig,
  type PrismEndpoints,
  type ResolvedPrismConfig,
  type EnvironmentSettings,
  buildEndpoints,
  validateConfig,
  PrismConfigBuilder,
  configFromEnv,
} from './config.js';
