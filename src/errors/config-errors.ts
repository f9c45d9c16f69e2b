/**
 * Specific error classes for configuration loading, hot reload and the CLI.
 * Each error type sets its code, message and suggestion.
 */

import { TramError, ErrorCode } from "./base.js";

/**
 * Error thrown when a config file path does not exist.
 */
export class ConfigNotFoundError extends TramError {
  constructor(path: string) {
    super(`Configuration file not found: ${path}`, ErrorCode.CONFIG_NOT_FOUND, {
      details: { path },
      suggestion: "Check the --config path, or run with --help to see configuration options.",
    });
  }
}

/**
 * Error thrown when a config file extension is not json, yaml, yml or toml.
 */
export class UnsupportedFormatError extends TramError {
  constructor(path: string, extension: string) {
    super(
      `Unsupported config file format: ${extension || "(no extension)"}`,
      ErrorCode.UNSUPPORTED_FORMAT,
      {
        details: { path, extension },
        suggestion: "Use a .json, .yaml, .yml or .toml file.",
      }
    );
  }
}

/**
 * Error thrown when config file content cannot be read into the expected shape.
 */
export class ConfigParseError extends TramError {
  public readonly parserMessage: string;

  constructor(path: string, format: string, parserMessage: string, cause?: Error) {
    super(
      `Failed to parse ${format.toUpperCase()} config file ${path}: ${parserMessage}`,
      ErrorCode.PARSE_ERROR,
      {
        details: { path, format },
        suggestion: "Fix the syntax of the config file.",
        cause,
      }
    );
    this.parserMessage = parserMessage;
  }
}

/**
 * Error thrown when a field holds a value outside its domain.
 */
export class InvalidValueError extends TramError {
  constructor(field: string, value: unknown, allowed?: readonly string[], source?: string) {
    super(
      allowed
        ? `Invalid ${field}: ${String(value)}. Must be one of ${allowed.join(", ")}`
        : `Invalid ${field}: ${String(value)}`,
      ErrorCode.INVALID_VALUE,
      {
        details: { field, value, allowed: allowed ? [...allowed] : undefined, source },
      }
    );
  }
}

/**
 * Error thrown when the file watch subscription cannot be established.
 */
export class WatchSetupError extends TramError {
  constructor(reason: string, cause?: Error) {
    super(`Failed to start config watcher: ${reason}`, ErrorCode.WATCH_SETUP_FAILED, {
      details: { reason },
      suggestion: "Check that the config files are readable.",
      cause,
    });
  }
}

/**
 * Error reported to change handlers when a reload triggered by a file event fails.
 * The watcher keeps serving the previous configuration.
 */
export class ConfigReloadError extends TramError {
  public readonly path: string;
  public readonly failure: TramError;

  constructor(path: string, failure: TramError) {
    super(`Configuration reload failed for ${path}: ${failure.message}`, ErrorCode.RELOAD_FAILED, {
      details: { path, reason: failure.code },
      suggestion: "Continuing with previous configuration.",
      cause: failure,
    });
    this.path = path;
    this.failure = failure;
  }
}

/**
 * Error thrown when no workspace root is found above a directory.
 */
export class WorkspaceNotFoundError extends TramError {
  constructor(startDir: string) {
    super("Workspace not found", ErrorCode.WORKSPACE_NOT_FOUND, {
      details: { startDir },
      suggestion: "Make sure you're running this command from within a project.",
    });
  }
}

/**
 * Error thrown when a command-line argument is invalid.
 */
export class InvalidArgumentError extends TramError {
  constructor(argumentName: string, reason: string) {
    super(`Invalid argument: ${argumentName} - ${reason}`, ErrorCode.INVALID_ARGUMENT, {
      details: { argumentName, reason },
      suggestion: "Run tram --help for usage.",
    });
  }
}

/**
 * Error thrown when a generic operation fails.
 */
export class OperationFailedError extends TramError {
  constructor(operation: string, reason: string, cause?: Error, internalDetails?: string) {
    super(`Operation failed: ${operation} - ${reason}`, ErrorCode.OPERATION_FAILED, {
      details: { operation, reason },
      internalMessage: internalDetails,
      cause,
    });
  }
}
