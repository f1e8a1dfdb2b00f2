import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised by convenience lookups that expect exactly one matching record
 * and found none, or several.
 */
export class FindFailedError extends Error {
  /** FindFailedError error-name */
  static name = 'FindFailedError';
}

/**
 * Type guard for {@link FindFailedError}.
 */
export function isFindFailedError(error: unknown): error is FindFailedError {
  return isErrorType(FindFailedError, error);
}

/**
 * Extract a {@link FindFailedError} from an unknown error value, following nested causes.
 */
export function getFindFailedError(error: unknown): null | FindFailedError {
  return unwrapErrorType(FindFailedError, error);
}
