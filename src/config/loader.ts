import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { parse as parseToml } from "smol-toml";
import { ZodError } from "zod";
import {
  ConfigStoreSchema,
  ConfigFileSchema,
  LogLevelSchema,
  OutputFormatSchema,
  LOG_LEVELS,
  OUTPUT_FORMATS,
  CONFIG_FILE_CANDIDATES,
  CONFIG_FILE_EXTENSIONS,
  ENV_VARS,
  type CliOverrides,
  type ConfigFields,
  type ConfigFileFormat,
  type ConfigStore,
  type LogLevel,
  type OutputFormat,
} from "./schema.js";
import {
  ConfigNotFoundError,
  ConfigParseError,
  InvalidValueError,
  UnsupportedFormatError,
  getErrorMessage,
  isErrnoException,
  toTramError,
} from "../errors/index.js";
import { isFile } from "../utils/fs.js";

/**
 * Built-in configuration (handled by Zod schema defaults)
 */
export function loadDefaults(): ConfigStore {
  return Object.freeze(ConfigStoreSchema.parse({}));
}

/**
 * Case-insensitive log level parsing; undefined when the value is not a level
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const result = LogLevelSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : undefined;
}

/**
 * Case-insensitive output format parsing; undefined when the value is not a format
 */
export function parseOutputFormat(value: string): OutputFormat | undefined {
  const result = OutputFormatSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : undefined;
}

function parseBoolean(value: string): boolean | undefined {
  switch (value.toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      return undefined;
  }
}

/**
 * Pick the config file format from the file extension
 */
export function detectFormat(configPath: string): ConfigFileFormat {
  const ext = path.extname(configPath).toLowerCase();
  const format = CONFIG_FILE_EXTENSIONS[ext];
  if (!format) {
    throw new UnsupportedFormatError(configPath, ext);
  }
  return format;
}

function formatZodIssues(error: ZodError): string {
  return error.errors
    .map((err) => (err.path.length > 0 ? `${err.path.join(".")}: ${err.message}` : err.message))
    .join("; ");
}

function parseContent(content: string, format: ConfigFileFormat, configPath: string): unknown {
  if (content.trim() === "") {
    return {};
  }

  try {
    switch (format) {
      case "json":
        return JSON.parse(content);
      case "yaml":
        return yaml.load(content);
      case "toml":
        return parseToml(content);
    }
  } catch (error) {
    throw new ConfigParseError(
      configPath,
      format,
      getErrorMessage(error),
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Turn parsed file content into a ConfigStore, keeping defaults for absent keys
 */
function fromFileContent(
  parsed: unknown,
  format: ConfigFileFormat,
  configPath: string
): ConfigStore {
  const raw = parsed ?? {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigParseError(configPath, format, "expected a mapping at the top level");
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigParseError(configPath, format, formatZodIssues(result.error), result.error);
  }

  const file = result.data;
  const config: ConfigFields = { ...loadDefaults() };

  if (file.log_level !== undefined) {
    const logLevel = parseLogLevel(file.log_level);
    if (!logLevel) {
      throw new InvalidValueError("log_level", file.log_level, LOG_LEVELS, configPath);
    }
    config.logLevel = logLevel;
  }

  if (file.output_format !== undefined) {
    const outputFormat = parseOutputFormat(file.output_format);
    if (!outputFormat) {
      throw new InvalidValueError("output_format", file.output_format, OUTPUT_FORMATS, configPath);
    }
    config.outputFormat = outputFormat;
  }

  if (file.color !== undefined) {
    config.color = file.color;
  }

  // null clears the root, matching what toConfigFile writes
  if (file.workspace_root !== undefined) {
    config.workspaceRoot = file.workspace_root;
  }

  return Object.freeze(config);
}

/**
 * Load configuration from a file (JSON, YAML or TOML)
 */
export async function loadConfigFromFile(configPath: string): Promise<ConfigStore> {
  const format = detectFormat(configPath);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigNotFoundError(configPath);
    }
    throw toTramError(error, "read config file", configPath);
  }

  return fromFileContent(parseContent(content, format, configPath), format, configPath);
}

/**
 * First conventional config file present in `cwd`, or null
 */
export async function findConfigFile(cwd: string = process.cwd()): Promise<string | null> {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (await isFile(candidatePath)) {
      return candidatePath;
    }
  }
  return null;
}

/**
 * Load the first conventional config file found in `cwd`.
 * With no file present this is the defaults with environment overrides applied.
 */
export async function loadFromCommonPaths(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<ConfigStore> {
  const found = await findConfigFile(cwd);
  if (found) {
    return loadConfigFromFile(found);
  }
  return applyEnvOverrides(loadDefaults(), env);
}

/**
 * Load configuration from environment variables.
 * Values that do not parse are dropped, so the previous value stays in effect.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CliOverrides {
  const config: CliOverrides = {};

  const logLevel = env[ENV_VARS.logLevel];
  if (logLevel !== undefined) {
    config.logLevel = parseLogLevel(logLevel);
  }

  const outputFormat = env[ENV_VARS.outputFormat];
  if (outputFormat !== undefined) {
    config.outputFormat = parseOutputFormat(outputFormat);
  }

  const color = env[ENV_VARS.color];
  if (color !== undefined) {
    config.color = parseBoolean(color);
  }

  const workspaceRoot = env[ENV_VARS.workspaceRoot];
  if (workspaceRoot) {
    config.workspaceRoot = workspaceRoot;
  }

  return config;
}

/**
 * Merge override layers onto a store. Later layers win; undefined fields are skipped.
 */
export function mergeConfigs(base: ConfigStore, ...layers: CliOverrides[]): ConfigStore {
  const result: ConfigFields = { ...base };

  for (const layer of layers) {
    if (layer.logLevel !== undefined) {
      result.logLevel = layer.logLevel;
    }
    if (layer.outputFormat !== undefined) {
      result.outputFormat = layer.outputFormat;
    }
    if (layer.color !== undefined) {
      result.color = layer.color;
    }
    if (layer.workspaceRoot !== undefined) {
      result.workspaceRoot = layer.workspaceRoot;
    }
  }

  return Object.freeze(result);
}

export function applyEnvOverrides(
  store: ConfigStore,
  env: NodeJS.ProcessEnv = process.env
): ConfigStore {
  return mergeConfigs(store, loadConfigFromEnv(env));
}

export function applyCliOverrides(store: ConfigStore, overrides: CliOverrides): ConfigStore {
  return mergeConfigs(store, overrides);
}

/**
 * Validate a merged configuration using the Zod schema
 */
export function validateConfig(config: unknown): ConfigStore {
  const result = ConfigStoreSchema.safeParse(config);
  if (result.success) {
    return Object.freeze(result.data);
  }

  const [issue] = result.error.errors;
  const field = issue ? issue.path.join(".") : "config";
  if (issue?.code === "invalid_enum_value") {
    throw new InvalidValueError(field, issue.received, issue.options.map(String));
  }
  throw new InvalidValueError(field, issue ? issue.message : formatZodIssues(result.error));
}

/**
 * Expand home directory in paths
 */
function expandHome(filepath: string, env: NodeJS.ProcessEnv): string {
  if (filepath.startsWith("~/") || filepath === "~") {
    const homeDir = env["HOME"] || env["USERPROFILE"] || "";
    return path.join(homeDir, filepath.slice(1));
  }
  return filepath;
}

/**
 * Resolve the workspace root against the working directory
 */
export function normalizePaths(
  store: ConfigStore,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): ConfigStore {
  if (store.workspaceRoot === null) {
    return store;
  }
  return Object.freeze({
    ...store,
    workspaceRoot: path.resolve(cwd, expandHome(store.workspaceRoot, env)),
  });
}

export interface OverrideOptions {
  cliOverrides?: CliOverrides;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Everything above the file layer: env vars, then CLI flags, then path
 * normalization and validation. Also used to re-resolve hot-reloaded files.
 */
export function resolveOverrides(base: ConfigStore, options: OverrideOptions = {}): ConfigStore {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const withEnv = applyEnvOverrides(base, env);
  const withCli = applyCliOverrides(withEnv, options.cliOverrides ?? {});

  return validateConfig(normalizePaths(withCli, cwd, env));
}

/**
 * Main configuration loader with full precedence chain
 * Precedence: CLI args > env vars > config file > defaults
 */
export interface LoadConfigOptions extends OverrideOptions {
  configPath?: string;
}

export interface LoadedConfig {
  store: ConfigStore;
  /** File the configuration was read from, if any */
  sourcePath: string | null;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();

  // 1. Explicit file, else the first conventional file, else defaults
  let sourcePath: string | null;
  if (options.configPath) {
    sourcePath = path.resolve(cwd, options.configPath);
  } else {
    sourcePath = await findConfigFile(cwd);
  }
  const base = sourcePath ? await loadConfigFromFile(sourcePath) : loadDefaults();

  // 2. Environment variables, CLI arguments
  const store = resolveOverrides(base, { ...options, cwd });

  return { store, sourcePath };
}

/**
 * Configuration in config file form (snake_case keys)
 */
export function toConfigFile(store: ConfigStore): Record<string, string | boolean | null> {
  return {
    log_level: store.logLevel,
    output_format: store.outputFormat,
    color: store.color,
    workspace_root: store.workspaceRoot,
  };
}
