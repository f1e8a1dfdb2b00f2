import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header containers accepted by the transport. A `null`/`undefined` value removes the header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** Query parameters, already encoded as strings. */
export type QueryParams = Record<string, string>;

/** Options to pass in for each request */
export interface FetchOptions {
  /** Headers merged with the client's defaults. */
  headers?: HeaderOptions;
  /** Query parameters appended to the URL. */
  query?: QueryParams;
  /** Serialized request body. Ignored for GET and DELETE. */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a {@link FetchProviderDefinition}. */
export interface FetchClientOptions {
  /** Default headers for every request. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` or `0` to disable.
   * @default false
   */
  timeout?: number | false;
  /** Signal aborting every request made through the client, e.g. on dispose. */
  signal?: AbortSignal;
}

/** HTTP methods the transport performs. */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/**
 * Transport contract. Non-2xx responses are not errors at this level; only a failure
 * to get a response at all is.
 */
export interface FetchProviderDefinition {
  /** Perform a GET request */
  get(endpoint: string, opts?: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response>;
  /** Perform a POST request */
  post(endpoint: string, opts?: FetchOptions): SafeWrapAsync<Error, Response>;
  /** Perform a PUT request */
  put(endpoint: string, opts?: FetchOptions): SafeWrapAsync<Error, Response>;
  /** Perform a PATCH request */
  patch(endpoint: string, opts?: FetchOptions): SafeWrapAsync<Error, Response>;
  /** Perform a DELETE request */
  delete(endpoint: string, opts?: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response>;
  /** Update default options */
  config(opts: FetchClientOptions): void;
}

/** Constructor of a transport, so tests and callers can swap in their own. */
export type FetchProvider = new (baseUrl: string, opts?: FetchClientOptions) => FetchProviderDefinition;
