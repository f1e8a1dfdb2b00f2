import { ArgumentError } from './argumentError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a name resolves to no field of a kind or endpoint.
 */
export class UnknownFieldError extends ArgumentError {
  /** UnknownFieldError error-name */
  static name = 'UnknownFieldError';
  /** The name that failed to resolve */
  #field: string;
  /** The kind or endpoint the name was looked up in */
  #owner: string;

  /** Creates a new UnknownFieldError for the name looked up in the given owner */
  constructor(field: string, owner: string, message = `"${field}" is not a field of ${owner}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#field = field;
    this.#owner = owner;
  }

  /** The name that failed to resolve */
  get field(): string {
    return this.#field;
  }

  /** The kind or endpoint the name was looked up in */
  get owner(): string {
    return this.#owner;
  }
}

/**
 * Type guard for {@link UnknownFieldError}.
 */
export function isUnknownFieldError(error: unknown): error is UnknownFieldError {
  return isErrorType(UnknownFieldError, error);
}

/**
 * Extract an {@link UnknownFieldError} from an unknown error value, following nested causes.
 */
export function getUnknownFieldError(error: unknown): null | UnknownFieldError {
  return unwrapErrorType(UnknownFieldError, error);
}
