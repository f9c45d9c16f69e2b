/**
 * Configuration module for tram
 *
 * This module provides layered configuration management with:
 * - JSON, YAML and TOML config file support
 * - Environment variable configuration (TRAM_*)
 * - CLI argument override
 * - Configuration validation using Zod
 * - Hot reload capability with file watching
 * - Configuration precedence: CLI args > env vars > config file > defaults
 */

export {
  ConfigStoreSchema,
  ConfigFileSchema,
  LogLevelSchema,
  OutputFormatSchema,
  LOG_LEVELS,
  OUTPUT_FORMATS,
  CONFIG_FILE_CANDIDATES,
  ENV_VARS,
} from "./schema.js";
export type {
  ConfigStore,
  ConfigFields,
  ConfigFile,
  ConfigFileFormat,
  CliOverrides,
  LogLevel,
  OutputFormat,
} from "./schema.js";
export {
  loadConfig,
  loadDefaults,
  loadConfigFromFile,
  loadFromCommonPaths,
  loadConfigFromEnv,
  findConfigFile,
  applyEnvOverrides,
  applyCliOverrides,
  mergeConfigs,
  resolveOverrides,
  validateConfig,
  normalizePaths,
  detectFormat,
  parseLogLevel,
  parseOutputFormat,
  toConfigFile,
} from "./loader.js";
export type { LoadConfigOptions, LoadedConfig, OverrideOptions } from "./loader.js";
export { ConfigWatcher, createConfigWatcher } from "./watcher.js";
export type { ChangeHandler, ConfigWatcherOptions } from "./watcher.js";
export { ChokidarWatchSource } from "./watch-source.js";
export type {
  WatchEvent,
  WatchEventKind,
  WatchListener,
  WatchSource,
  WatchSubscription,
} from "./watch-source.js";
