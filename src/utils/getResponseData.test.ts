import { describe, expect, it } from 'vitest';
import { getResponseData, parseBody } from './getResponseData.js';

describe('getResponseData', () => {
  it('parses JSON bodies', async () => {
    const response = new Response('{"data":"foo"}', { headers: { 'Content-Type': 'application/json' } });

    const [err, value] = await getResponseData(response);
    expect(err).toBeNull();
    expect(value).toStrictEqual({ data: 'foo' });
  });

  it('parses JSON bodies without a JSON content type', async () => {
    const response = new Response('{"errors":[{"code":"INVALID"}]}', {
      status: 400,
      headers: { 'Content-Type': 'text/plain' },
    });

    const [, value] = await getResponseData(response);
    expect(value).toStrictEqual({ errors: [{ code: 'INVALID' }] });
  });

  it('returns plain text as is', async () => {
    const [, value] = await getResponseData(new Response('Unauthorized', { status: 401 }));

    expect(value).toBe('Unauthorized');
  });

  it('returns null for 204', async () => {
    const [err, value] = await getResponseData(new Response(null, { status: 204 }));

    expect(err).toBeNull();
    expect(value).toBeNull();
  });

  it('returns null for empty bodies', async () => {
    const [err, value] = await getResponseData(new Response('', { status: 200 }));

    expect(err).toBeNull();
    expect(value).toBeNull();
  });

  it('returns an error when the body was already read', async () => {
    const response = new Response('{"a":1}');
    await response.text();

    const [err, value] = await getResponseData(response);
    expect(value).toBeNull();
    expect(err?.message).toBe('error reading response body in getResponseData');
  });
});

describe('parseBody', () => {
  it('parses bare values returned by create endpoints', () => {
    expect(parseBody('1042')).toBe(1042);
    expect(parseBody('"Unmatched"')).toBe('Unmatched');
    expect(parseBody('null')).toBeNull();
  });

  it('returns text that is not JSON unchanged', () => {
    expect(parseBody('<html>Bad Gateway</html>')).toBe('<html>Bad Gateway</html>');
    expect(parseBody('   ')).toBe('   ');
  });
});
