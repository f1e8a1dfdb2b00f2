import { isErrorType } from './isErrorType.js';

/**
 * Error raised while a kind or endpoint is being declared. These are programming
 * mistakes in the library itself and surface when the module defining the kind loads.
 */
export class SchemaError extends Error {
  /** SchemaError error-name */
  static name = 'SchemaError';
}

/**
 * Type guard for {@link SchemaError}.
 */
export function isSchemaError(error: unknown): error is SchemaError {
  return isErrorType(SchemaError, error);
}
