/**
 * Base error class for all tram errors.
 * Carries a stable error code, a user-facing message with an optional
 * suggestion, and extra detail for structured logging.
 */

export enum ErrorCode {
  // Configuration loading
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
  PARSE_ERROR = "PARSE_ERROR",
  INVALID_VALUE = "INVALID_VALUE",

  // Hot reload
  WATCH_SETUP_FAILED = "WATCH_SETUP_FAILED",
  RELOAD_FAILED = "RELOAD_FAILED",

  // Everything else
  WORKSPACE_NOT_FOUND = "WORKSPACE_NOT_FOUND",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  OPERATION_FAILED = "OPERATION_FAILED",
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  internalMessage?: string;
  stack?: string;
}

export interface TramErrorOptions {
  details?: Record<string, unknown>;
  suggestion?: string;
  internalMessage?: string;
  exitCode?: number;
  cause?: Error;
}

/**
 * Base class for all tram errors.
 * Extends Error with additional metadata for reporting at the entry point.
 */
export class TramError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly suggestion?: string;
  public readonly internalMessage?: string;
  public readonly exitCode: number;

  constructor(message: string, code: ErrorCode, options?: TramErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options?.details;
    this.suggestion = options?.suggestion;
    this.internalMessage = options?.internalMessage;
    this.exitCode = options?.exitCode ?? this.mapErrorCodeToExitCode(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options?.cause) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }

  /**
   * Map error codes to process exit codes
   */
  private mapErrorCodeToExitCode(code: ErrorCode): number {
    switch (code) {
      case ErrorCode.INVALID_ARGUMENT:
        return 2;
      default:
        return 1;
    }
  }

  /**
   * Message printed to the terminal when the error reaches the entry point
   */
  public toUserMessage(): string {
    let text = `Error: ${this.message}`;
    if (this.suggestion) {
      text += `\n  help: ${this.suggestion}`;
    }
    return text;
  }

  /**
   * Full error details for structured logging
   */
  public toLogDetails(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      internalMessage: this.internalMessage,
      stack: this.stack,
    };
  }

  /**
   * Check if this is a user error (bad input or files) vs an internal failure
   */
  public isUserError(): boolean {
    return [
      ErrorCode.CONFIG_NOT_FOUND,
      ErrorCode.UNSUPPORTED_FORMAT,
      ErrorCode.PARSE_ERROR,
      ErrorCode.INVALID_VALUE,
      ErrorCode.RELOAD_FAILED,
      ErrorCode.WORKSPACE_NOT_FOUND,
      ErrorCode.INVALID_ARGUMENT,
    ].includes(this.code);
  }
}
