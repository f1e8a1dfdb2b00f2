import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new RangeError('out of range');

    expect(toError(err)).toBe(err);
  });

  it('wraps non-error values and keeps them as cause', () => {
    const err = toError('boom');

    expect(err.message).toBe('non-error value thrown: boom');
    expect(err.cause).toBe('boom');
  });
});

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new TypeError('boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(TypeError);
    expect(err?.message).toBe('boom');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('normalizes rejected non-errors', async () => {
    const [err] = await safeWrapAsync(() => Promise.reject(404));

    expect(err?.message).toBe('non-error value thrown: 404');
  });
});
