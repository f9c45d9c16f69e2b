/**
 * Error handling module for tram.
 *
 * Usage:
 * ```typescript
 * import { ConfigNotFoundError, toTramError } from './errors';
 *
 * throw new ConfigNotFoundError('tram.json');
 *
 * try {
 *   await someOperation();
 * } catch (error) {
 *   throw toTramError(error, 'load config');
 * }
 * ```
 */

export { TramError, ErrorCode } from "./base.js";
export type { ErrorDetails, TramErrorOptions } from "./base.js";

export {
  ConfigNotFoundError,
  UnsupportedFormatError,
  ConfigParseError,
  InvalidValueError,
  WatchSetupError,
  ConfigReloadError,
  WorkspaceNotFoundError,
  InvalidArgumentError,
  OperationFailedError,
} from "./config-errors.js";

export {
  isErrnoException,
  toTramError,
  logError,
  getErrorSummary,
  getErrorMessage,
} from "./utils.js";
