import type { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Minimal view of one entry of the remote `errors` collection. */
export interface ApiErrorDetail {
  /** Human-readable reason, when the server supplied one */
  readonly text: string | undefined;
}

/**
 * Builds the message shown for a failed call: the HTTP failure first, then the
 * reasons the server gave.
 */
function describe(httpError: HTTPError, errors: readonly ApiErrorDetail[]): string {
  const lines = [httpError.message];
  const reasons = errors.map((error) => error.text ?? 'unknown reason');

  if (reasons.length === 1) {
    lines.push(`Reason: ${reasons[0]}`);
  } else if (reasons.length > 1) {
    lines.push('Reasons:', ...reasons.map((reason) => `* ${reason}`));
  }

  return lines.join('\n');
}

/**
 * Error representing a failed call to the remote API. Carries the parsed `errors`
 * collection of the response body alongside the HTTP failure that produced it.
 *
 * @typeParam Detail - The structured error record type the body was parsed into.
 */
export class ApiError<Detail extends ApiErrorDetail = ApiErrorDetail> extends Error {
  /** ApiError error-name */
  static name = 'ApiError';
  /** Parsed error records from the response body */
  #errors: readonly Detail[];
  /** The transport failure */
  #httpError: HTTPError;

  /** Creates a new ApiError from the parsed error records and the HTTP failure */
  constructor(errors: readonly Detail[], httpError: HTTPError, opts?: ErrorOptions) {
    super(describe(httpError, errors), { cause: httpError, ...opts });
    this.#errors = errors;
    this.#httpError = httpError;
  }

  /** Parsed error records from the response body */
  get errors(): readonly Detail[] {
    return this.#errors;
  }

  /** The transport failure */
  get httpError(): HTTPError {
    return this.#httpError;
  }

  /** The raw response */
  get response(): Response {
    return this.#httpError.response;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
