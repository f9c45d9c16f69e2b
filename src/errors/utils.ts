/**
 * Utility functions for error handling.
 * Provides helpers for error conversion, logging, and user-facing output.
 */

import { TramError } from "./base.js";
import { ConfigNotFoundError, OperationFailedError } from "./config-errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Narrow an unknown thrown value to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Convert a generic error to an appropriate TramError.
 * Node.js fs errors and other exceptions are wrapped.
 */
export function toTramError(error: unknown, operation: string, path?: string): TramError {
  if (error instanceof TramError) {
    return error;
  }

  if (isErrnoException(error)) {
    if (error.code === "ENOENT") {
      return new ConfigNotFoundError(path ?? error.path ?? "unknown");
    }
    return new OperationFailedError(operation, error.code ?? "Unknown error", error, error.message);
  }

  if (error instanceof Error) {
    return new OperationFailedError(operation, error.message, error, error.stack);
  }

  return new OperationFailedError(
    operation,
    String(error),
    undefined,
    `Non-error object thrown: ${JSON.stringify(error)}`
  );
}

/**
 * Log an error with full details.
 * User errors go out at warn level, internal failures at error level.
 */
export function logError(
  logger: Logger,
  error: TramError,
  context?: Record<string, unknown>
): void {
  const logDetails = error.toLogDetails();

  const enrichedContext = {
    ...context,
    errorCode: logDetails.code,
    errorName: error.name,
    isUserError: error.isUserError(),
    ...logDetails,
  };

  if (error.isUserError()) {
    logger.warn(enrichedContext, `User error: ${logDetails.message}`);
  } else {
    logger.error(enrichedContext, `System error: ${logDetails.message}`);
  }
}

/**
 * Get a human-readable error summary for logging.
 */
export function getErrorSummary(error: unknown): string {
  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  return String(error);
}

/**
 * Safely get error message from unknown error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
