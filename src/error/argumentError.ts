import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised before any request is sent, when a call is shaped wrong: an unknown or
 * ambiguous field name, a pagination argument the endpoint does not take, or invalid
 * client configuration.
 */
export class ArgumentError extends Error {
  /** ArgumentError error-name */
  static name = 'ArgumentError';
}

/**
 * Type guard for {@link ArgumentError}.
 */
export function isArgumentError(error: unknown): error is ArgumentError {
  return isErrorType(ArgumentError, error);
}

/**
 * Extract an {@link ArgumentError} from an unknown error value, following nested causes.
 */
export function getArgumentError(error: unknown): null | ArgumentError {
  return unwrapErrorType(ArgumentError, error);
}
