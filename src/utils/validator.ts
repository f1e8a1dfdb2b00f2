import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Result of a standard-schema validation, before it is known to be sync or async. */
type ValidationResult<T extends StandardSchemaV1> = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

/** Turns a settled validation result into the tuple shape. */
function settle<T extends StandardSchemaV1>(
  result: ValidationResult<T> | undefined,
): SafeWrap<Error, StandardSchemaV1.InferOutput<T>> {
  if (!result) {
    return [new ValidationError('error validating data empty resulting validation', []), null];
  }

  if (typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}

/**
 * Validates `input` against a standard schema, returning `[error, value]`.
 *
 * Used for the client's options and for error and page bodies, all zod schemas that
 * validate synchronously. A schema that answers with a promise is reported as a
 * `ValidationError` rather than awaited; a throwing schema is wrapped likewise.
 */
export function validatorSync<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<Error, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap<ValidationResult<T> | Promise<ValidationResult<T>>>(() =>
    schema['~standard'].validate(input),
  );

  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error validating data, schema validates asynchronously', []), null];
  }

  return settle<T>(result);
}
