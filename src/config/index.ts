/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragline config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  StoreConfigSchema,
  EmbeddingConfigSchema,
  IndexesConfigSchema,
  SearchConfigSchema,
  IngestConfigSchema,
  RoutingConfigSchema,
  RouteRuleSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  StoreConfig,
  EmbeddingConfig,
  IndexesConfig,
  RoutingConfig,
  RouteRuleConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, getConfigValue, listConfig, deepMerge } from './loader.js';
export type { LoadConfigOptions } from './loader.js';

// Paths
export { RAGLINE_DIR, DB_PATH, CONFIG_PATH, getRaglineDir, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasSecret, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
