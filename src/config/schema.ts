import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const OUTPUT_FORMATS = ["json", "yaml", "table"] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Resolved configuration. Defaults live here, so `ConfigStoreSchema.parse({})`
 * is the built-in configuration.
 */
export const ConfigStoreSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  outputFormat: OutputFormatSchema.default("table"),
  color: z.boolean().default(true),
  workspaceRoot: z.string().nullable().default(null),
});

export type ConfigFields = z.output<typeof ConfigStoreSchema>;
export type ConfigStore = Readonly<ConfigFields>;

/**
 * Shape of a config file (JSON, YAML or TOML). Enum values stay strings here
 * and are checked case-insensitively by the loader; unknown keys are dropped.
 */
export const ConfigFileSchema = z.object({
  log_level: z.string().optional(),
  output_format: z.string().optional(),
  color: z.boolean().optional(),
  workspace_root: z.string().nullable().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Values the user actually passed on the command line
 */
export type CliOverrides = Partial<ConfigFields>;

/**
 * Conventional config files, probed in this order (first match wins)
 */
export const CONFIG_FILE_CANDIDATES = [
  "tram.json",
  "tram.yaml",
  "tram.yml",
  "tram.toml",
  ".tram.json",
  ".tram.yaml",
  ".tram.yml",
  ".tram.toml",
] as const;

export type ConfigFileFormat = "json" | "yaml" | "toml";

export const CONFIG_FILE_EXTENSIONS: Record<string, ConfigFileFormat> = {
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
};

/**
 * Environment variables read for each configuration field
 */
export const ENV_VARS = {
  logLevel: "TRAM_LOG_LEVEL",
  outputFormat: "TRAM_OUTPUT_FORMAT",
  color: "TRAM_COLOR",
  workspaceRoot: "TRAM_WORKSPACE_ROOT",
} as const satisfies Record<keyof ConfigFields, string>;
