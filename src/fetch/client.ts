import { createRequestScope } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { FetchClientOptions, FetchOptions, FetchProviderDefinition, HttpMethod } from './types.js';
import { joinUrl, mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes relative request paths with a configured base URL,
 * - merges default and per-request headers,
 * - applies the client-wide timeout and abort signal,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Responses are returned whatever their status; callers inspect `ok` themselves,
 * since failed responses carry the error details in their body.
 */
export class FetchClient implements FetchProviderDefinition {
  /** Base URL prepended to relative request paths. */
  #baseUrl: string;
  /** Default options (headers, timeout, signal). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (merged with existing headers).
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `people/123`) or an absolute URL.
   * @param opts - Request options merged with the client's defaults.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, Response> {
    return this.#request('get', endpoint, opts);
  }

  /**
   * Executes a POST request against the given endpoint.
   */
  public post(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('post', endpoint, opts);
  }

  /**
   * Executes a PUT request against the given endpoint.
   */
  public put(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('put', endpoint, opts);
  }

  /**
   * Executes a PATCH request against the given endpoint.
   */
  public patch(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('patch', endpoint, opts);
  }

  /**
   * Executes a DELETE request against the given endpoint.
   */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, Response> {
    return this.#request('delete', endpoint, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network failures, timeouts and aborts are wrapped in an `Error` whose cause is the
   * original failure (a {@link TimeoutError} for timeouts).
   */
  async #request(method: HttpMethod, endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const verb = method.toUpperCase();
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);
    const scope = createRequestScope([opts.signal, this.#opts.signal], this.#opts.timeout);
    const hasBody = method !== 'get' && method !== 'delete' && opts.body !== undefined;

    const [err, res] = await safeWrapAsync(() =>
      fetch(joinUrl(this.#baseUrl, endpoint, opts.query), {
        method: verb,
        headers,
        ...(hasBody && { body: opts.body }),
        ...(scope.signal && { signal: scope.signal }),
      }),
    );
    scope.release();

    if (err) {
      return [new Error(`error wrapping ${verb} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }
}
