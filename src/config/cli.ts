import { LOG_LEVELS, OUTPUT_FORMATS, ENV_VARS, type CliOverrides } from "./schema.js";
import { parseLogLevel, parseOutputFormat } from "./loader.js";
import { InvalidArgumentError } from "../errors/index.js";

export const VERSION = "0.1.0";

export const COMMANDS = ["config", "watch", "workspace"] as const;
export type CommandName = (typeof COMMANDS)[number];

/**
 * Parse CLI arguments into configuration object
 */
export interface ParsedArgs {
  command: CommandName;
  configPath?: string;
  /** Only the fields the user actually passed */
  cliConfig: CliOverrides;
  detailed: boolean;
  showHelp: boolean;
  showVersion: boolean;
}

/**
 * Help message
 */
export function helpText(): string {
  return `
tram - CLI starter kit with layered configuration

USAGE:
  tram [OPTIONS] [COMMAND]

COMMANDS:
  config                     Show the resolved configuration (default)
  watch                      Watch config files and reload them on change
  workspace [--detailed]     Show workspace root and project type

OPTIONS:
  --config PATH              Path to config file (JSON, YAML or TOML)
  --log-level LEVEL          Log level: ${LOG_LEVELS.join("|")} (default: info)
  --format FORMAT            Output format: ${OUTPUT_FORMATS.join("|")} (default: table)
  --no-color                 Disable colored output
  --detailed, -d             Show ignore patterns (workspace)
  --help, -h                 Show this help message
  --version, -v              Show version information

ENVIRONMENT VARIABLES:
  ${Object.values(ENV_VARS).join("\n  ")}

CONFIGURATION FILES:
  Without --config, the first of tram.json, tram.yaml, tram.yml, tram.toml
  (or the same names with a leading dot) in the current directory is used.

CONFIGURATION PRECEDENCE:
  CLI arguments > Environment variables > Config file > Defaults

EXAMPLES:
  # Show configuration as JSON
  tram --format json config

  # Config file with CLI overrides
  tram --config tram.yaml --log-level debug config

  # Reload configuration whenever tram.toml changes
  tram --config tram.toml watch
`;
}

export function versionText(): string {
  return `tram v${VERSION}`;
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value === "") {
    throw new InvalidArgumentError(flag, "requires a value");
  }
  return value;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "config",
    cliConfig: {},
    detailed: false,
    showHelp: false,
    showVersion: false,
  };
  let commandSeen = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (!arg) {
      i++;
      continue;
    }

    switch (arg) {
      case "--help":
      case "-h":
        result.showHelp = true;
        i++;
        continue;

      case "--version":
      case "-v":
        result.showVersion = true;
        i++;
        continue;

      case "--config":
        result.configPath = requireValue(args, i, arg);
        i += 2;
        continue;

      case "--log-level": {
        const value = requireValue(args, i, arg);
        const logLevel = parseLogLevel(value);
        if (!logLevel) {
          throw new InvalidArgumentError(arg, `must be one of ${LOG_LEVELS.join(", ")}`);
        }
        result.cliConfig.logLevel = logLevel;
        i += 2;
        continue;
      }

      case "--format": {
        const value = requireValue(args, i, arg);
        const outputFormat = parseOutputFormat(value);
        if (!outputFormat) {
          throw new InvalidArgumentError(arg, `must be one of ${OUTPUT_FORMATS.join(", ")}`);
        }
        result.cliConfig.outputFormat = outputFormat;
        i += 2;
        continue;
      }

      case "--no-color":
        result.cliConfig.color = false;
        i++;
        continue;

      case "--detailed":
      case "-d":
        result.detailed = true;
        i++;
        continue;
    }

    if (arg.startsWith("-")) {
      throw new InvalidArgumentError(arg, "unknown flag");
    }

    if (commandSeen) {
      throw new InvalidArgumentError(arg, "unexpected argument");
    }
    if (!isCommand(arg)) {
      throw new InvalidArgumentError(
        arg,
        `unknown command, expected one of ${COMMANDS.join(", ")}`
      );
    }
    result.command = arg;
    commandSeen = true;
    i++;
  }

  if (result.detailed && result.command !== "workspace") {
    throw new InvalidArgumentError("--detailed", "only valid with the workspace command");
  }

  return result;
}
