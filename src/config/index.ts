/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `docr config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ChunkingConfigSchema,
  EmbeddingConfigSchema,
  IngestionConfigSchema,
  CrawlConfigSchema,
  SearchConfigSchema,
  ServerConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, getConfigValue, setConfigValue, listConfig } from './loader.js';

// Paths
export { DOCR_DIR, CONFIG_PATH, getDocrDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getStorageSettings,
  getInferenceSettings,
  missingInferenceSettings,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, StorageSettings, InferenceSettings } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_STORAGE,
  COMMANDS_REQUIRING_INFERENCE,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
