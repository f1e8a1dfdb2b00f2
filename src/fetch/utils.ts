import type { HeaderOptions, QueryParams } from './types.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/** Matches URLs that carry their own scheme and host. */
const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Joins a base URL and an endpoint, and appends query parameters.
 *
 * - Absolute endpoints, such as continuation links returned by the server, are used as they are.
 * - A leading slash on a relative endpoint is stripped to avoid `//` in the URL.
 * - `baseUrl` is expected to end with a slash.
 */
export function joinUrl(baseUrl: string, endpoint: string, query?: QueryParams): string {
  const url = ABSOLUTE_URL.test(endpoint) ? endpoint : `${baseUrl}${endpoint.replace(/^\//, '')}`;
  const entries = Object.entries(query ?? {});
  if (entries.length === 0) {
    return url;
  }

  const search = new URLSearchParams(entries).toString();
  return url.includes('?') ? `${url}&${search}` : `${url}?${search}`;
}
