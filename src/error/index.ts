/**
 * Error entrypoint: exports the library's typed errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error representing a failed remote call, with the parsed error records. */
/** Extract an {@link ApiError} from an unknown error value, following nested causes. */
/** Type guard for {@link ApiError}. */
export { ApiError, type ApiErrorDetail, getApiError, isApiError } from './apiError.js';
/** Error raised for a call shaped wrong before anything is sent. */
export { ArgumentError, getArgumentError, isArgumentError } from './argumentError.js';
/** Error raised when a lookup expecting exactly one record found none or several. */
export { FindFailedError, getFindFailedError, isFindFailedError } from './findFailedError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised while declaring a kind or endpoint. */
export { isSchemaError, SchemaError } from './schemaError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when a name resolves to no field. */
export { getUnknownFieldError, isUnknownFieldError, UnknownFieldError } from './unknownFieldError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
