import { describe, expect, it } from 'vitest';
import { FindFailedError } from './findFailedError.js';
import { isErrorType } from './isErrorType.js';
import { SchemaError } from './schemaError.js';

describe('isErrorType', () => {
  it('returns false for non-errors', () => {
    expect(isErrorType(SchemaError, { foo: 'bar' })).toEqual(false);
  });

  it('returns true for a shallow match', () => {
    expect(isErrorType(SchemaError, new SchemaError('dup'))).toEqual(true);
  });

  it('returns true several layers deep', () => {
    const err = new FindFailedError('none');
    const wrapped = new Error('err2', { cause: new Error('err1', { cause: err }) });

    expect(isErrorType(FindFailedError, wrapped)).toEqual(true);
  });

  it('returns false for unrelated errors', () => {
    const wrapped = new Error('err2', { cause: new SchemaError('dup') });

    expect(isErrorType(FindFailedError, wrapped)).toEqual(false);
  });
});
