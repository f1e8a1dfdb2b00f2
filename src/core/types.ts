import type { HeaderOptions, HttpMethod, QueryParams } from '../fetch/types.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

export type { HttpMethod } from '../fetch/types.js';

/** One request as an endpoint hands it to the session. */
export interface SessionRequest {
  /** Query parameters, already encoded as strings. */
  query?: QueryParams;
  /** JSON-encoded body. Sessions drop it for GET and DELETE. */
  body?: string;
  /** Extra headers for this request. */
  headers?: HeaderOptions;
}

/**
 * What endpoints need from whoever performs their requests.
 *
 * `path` is relative to the session's base URL, or an absolute URL for continuation
 * links. A non-2xx response is returned as data; only a failure to get a response is an error.
 */
export interface HttpSession {
  /** Records fetched by a paginated call that gives no `limit`. `0` means all of them. */
  readonly defaultLimit: number;
  /** Logs requests and pagination progress through `console.debug`. */
  readonly debug?: boolean;
  get(path: string, opts?: SessionRequest): SafeWrapAsync<Error, Response>;
  post(path: string, opts?: SessionRequest): SafeWrapAsync<Error, Response>;
  put(path: string, opts?: SessionRequest): SafeWrapAsync<Error, Response>;
  patch(path: string, opts?: SessionRequest): SafeWrapAsync<Error, Response>;
  delete(path: string, opts?: SessionRequest): SafeWrapAsync<Error, Response>;
}

/** Paging controls of a paginated call. */
export interface PageArgs {
  /** Maximum number of records, `0` for all. Defaults to the session's `defaultLimit`. */
  limit?: number;
  /** Records to skip before the first one returned. */
  skip?: number;
}

/** Arguments of {@link Endpoint.call}. */
export interface CallArgs extends PageArgs {
  /** Values for the path placeholders, in order. */
  path?: ReadonlyArray<number | string>;
  /** Fields keyed by any name the endpoint answers to. */
  fields?: Readonly<Record<string, unknown>>;
  /** Raw body sent instead of the normalized fields. */
  data?: unknown;
  /** Never accepted; page size is derived from `limit`. */
  top?: number;
}
