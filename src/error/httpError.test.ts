import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('defaults the message to the status code', () => {
    const err = new HTTPError(new Response(null, { status: 400 }));

    expect(err.message).toEqual('HTTP Error: 400');
    expect(err.status).toEqual(400);
    expect(isHttpError(err)).toEqual(true);
  });

  it('includes the status text when present', () => {
    const err = new HTTPError(new Response(null, { status: 404, statusText: 'Not Found' }));

    expect(err.message).toEqual('HTTP Error: 404 Not Found');
  });

  it('is found through causes', () => {
    const err = new HTTPError(new Response(null, { status: 401 }));
    const wrapped = new Error('error in call', { cause: err });

    expect(getHttpError(wrapped)?.response.status).toBe(401);
  });
});
