/**
 * Gateway - Configuration Module
 */

export {
  ConfigFileSchema,
  ServerConfigSchema,
  ModelsConfigSchema,
  AuthConfigSchema,
  RateLimitConfigSchema,
  RedisConfigSchema,
  HealthConfigSchema,
  LoggingConfigSchema,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type { ConfigFileInput, ConfigFileOutput } from './schema.js';

export { ConfigLoader, loadConfig, DEFAULT_CONFIG_PATH } from './loader.js';

export type { ConfigLoaderOptions } from './loader.js';
