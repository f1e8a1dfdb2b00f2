import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * A body as the API sent it: parsed JSON, or the text itself when it is not JSON
 * (gateway pages, a bare `Unauthorized`).
 */
export function parseBody(text: string): unknown {
  const [errParsed, parsed] = safeWrap<unknown>(() => JSON.parse(text));
  return errParsed ? text : parsed;
}

/**
 * Safely extracts and parses a response body into a tuple-style result.
 *
 * Behavior:
 * - 204 and 205 responses, and empty bodies, resolve to `[null, null]`.
 * - Otherwise the body is read as text and parsed as JSON. The API does not
 *   always label error bodies as JSON, so the content type is not consulted;
 *   text that is not JSON is returned as the string it is.
 * - A body that cannot be read resolves to `[Error, null]` with the original error as `cause`.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, unknown> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  // Use .text as reader, since double reads with text -> json would cause TypeError
  // due to the body being consumed already
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  return [null, parseBody(text)];
}
