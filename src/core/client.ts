import { z } from 'zod';
import { ArgumentError } from '../error/argumentError.js';
import { FindFailedError } from '../error/findFailedError.js';
import { FetchClient } from '../fetch/client.js';
import type { FetchProvider, FetchProviderDefinition, HeaderOptions } from '../fetch/types.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { ApiKeyProfile } from '../objects/index.js';
import { ActivistCodes } from '../services/activistCodes.js';
import { Locations } from '../services/locations.js';
import { People } from '../services/people.js';
import { validatorSync } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import {
  type CredentialOptions,
  type Credentials,
  type ModeName,
  modeName,
  resolveCredentials,
  resolveEndpoint,
} from './credentials.js';
import { defineEndpoint } from './endpoint.js';
import { fromKind, paginated } from './results.js';
import type { HttpSession, SessionRequest } from './types.js';

/** Records fetched by a paginated call that gives no `limit`, unless configured otherwise. */
export const DEFAULT_LIMIT = 50;

const clientOptionsSchema = z.object({
  appName: z.string().optional(),
  apiKey: z.string().optional(),
  mode: z.union([z.string().min(1), z.number().int()]).optional(),
  fromEnv: z.boolean().optional(),
  endpoint: z.string().min(1).default('us'),
  defaultLimit: z.number().int().nonnegative().default(DEFAULT_LIMIT),
  debug: z.boolean().default(false),
  timeout: z.union([z.number().nonnegative(), z.literal(false)]).default(60_000),
});

/** Options of {@link CampaignClient.create}. */
export interface CampaignClientProps extends CredentialOptions {
  /** `us`, `intl` or a full base URL. @default 'us' */
  endpoint?: string;
  /** @default 50 */
  defaultLimit?: number;
  /** Logs requests and pagination progress through `console.debug`. */
  debug?: boolean;
  /** Request timeout in milliseconds, `false` or `0` to disable. @default 60000 */
  timeout?: number | false;
  /** Headers sent with every request, on top of the JSON and auth headers. */
  headers?: HeaderOptions;
  /** Transport to use instead of {@link FetchClient}. */
  fetchProvider?: FetchProvider;
  /** Environment read for credentials. @default process.env */
  env?: Readonly<Record<string, string | undefined>>;
}

/** Options {@link CampaignClient.config} updates at runtime. */
export interface CampaignClientConfig {
  headers?: HeaderOptions;
  timeout?: number | false;
  debug?: boolean;
  defaultLimit?: number;
}

interface ClientSetup {
  credentials: Credentials;
  endpoint: string;
  defaultLimit: number;
  debug: boolean;
  timeout: number | false;
  headers?: HeaderOptions;
  fetchProvider: FetchProvider;
}

const apiKeyProfiles = defineEndpoint({
  name: 'CampaignClient.apiKeyProfile',
  path: '/apiKeyProfiles',
  method: 'get',
  result: paginated(fromKind(ApiKeyProfile)),
});

function checkLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ArgumentError(`defaultLimit must be a non-negative integer, got ${limit}`);
  }

  return limit;
}

/**
 * Client of the campaign management API.
 *
 * Owns the authenticated HTTP session every service sends its requests through.
 * Build one with {@link CampaignClient.create}; all request methods return
 * error-first tuples via {@link SafeWrapAsync}.
 */
export class CampaignClient implements HttpSession {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchProviderDefinition;
  /** Global abort-controller for disposing */
  #abortController: AbortController;
  #credentials: Credentials;
  #endpoint: string;
  #defaultLimit: number;
  #debug: boolean;

  /** People in the database: lookups, updates, notes and canvass responses. */
  readonly people: People;
  /** Activist codes of the database. */
  readonly activistCodes: ActivistCodes;
  /** Locations used by events. */
  readonly locations: Locations;

  /**
   * Validates the options, resolves credentials (from the environment when none are given)
   * and connects the client to its endpoint.
   *
   * Returns an {@link ArgumentError} when the options are invalid or inconsistent.
   */
  static create(props: CampaignClientProps = {}): SafeWrap<Error, CampaignClient> {
    const [errValidate, opts] = validatorSync(props, clientOptionsSchema);
    if (errValidate) {
      return [new ArgumentError('error validating CampaignClient options', { cause: errValidate }), null];
    }

    const [errSetup, setup] = safeWrap(
      (): ClientSetup => ({
        credentials: resolveCredentials(opts, props.env ?? process.env),
        endpoint: resolveEndpoint(opts.endpoint),
        defaultLimit: opts.defaultLimit,
        debug: opts.debug,
        timeout: opts.timeout,
        headers: props.headers,
        fetchProvider: props.fetchProvider ?? FetchClient,
      }),
    );
    if (errSetup) {
      return [new Error('error creating CampaignClient', { cause: errSetup }), null];
    }

    return [null, new CampaignClient(setup)];
  }

  private constructor({ credentials, endpoint, defaultLimit, debug, timeout, headers, fetchProvider }: ClientSetup) {
    this.#credentials = credentials;
    this.#endpoint = endpoint;
    this.#defaultLimit = defaultLimit;
    this.#debug = debug;
    this.#abortController = new AbortController();

    const authorization = `Basic ${btoa(`${credentials.appName}:${credentials.apiKey}`)}`;
    this.#fetchClient = new fetchProvider(endpoint, {
      headers: mergeHeaderOptions(
        {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: authorization,
        },
        headers,
      ),
      timeout,
      signal: this.#abortController.signal,
    });

    this.activistCodes = new ActivistCodes(this);
    this.people = new People(this, this.activistCodes);
    this.locations = new Locations(this);
  }

  get appName(): string {
    return this.#credentials.appName;
  }

  /** Base URL requests are sent to. */
  get endpoint(): string {
    return this.#endpoint;
  }

  /** Database mode the API key acts in. */
  get mode(): ModeName {
    return modeName(this.#credentials.mode);
  }

  get debug(): boolean {
    return this.#debug;
  }

  /** Records fetched by a paginated call that gives no `limit`. `0` means all of them. */
  get defaultLimit(): number {
    return this.#defaultLimit;
  }

  /** @throws ArgumentError for a negative or fractional limit. */
  set defaultLimit(limit: number) {
    this.#defaultLimit = checkLimit(limit);
  }

  /**
   * Updates headers, timeout, debug logging and the default limit at runtime.
   *
   * @throws ArgumentError for a negative or fractional `defaultLimit`.
   */
  config(opts: CampaignClientConfig) {
    const { headers, timeout, debug, defaultLimit } = opts;
    if (defaultLimit !== undefined) {
      this.defaultLimit = defaultLimit;
    }

    if (debug !== undefined) {
      this.#debug = debug;
    }

    if (headers === undefined && timeout === undefined) {
      return;
    }

    this.#fetchClient.config({
      ...(headers === undefined ? {} : { headers }),
      ...(timeout === undefined ? {} : { timeout }),
    });
  }

  /**
   * Aborts every request in flight. Requests made afterwards fail immediately.
   */
  dispose() {
    this.#abortController.abort(new Error('client was disposed'));
  }

  /** Performs a GET request. A non-2xx response is returned, not treated as an error. */
  get(path: string, opts: SessionRequest = {}): SafeWrapAsync<Error, Response> {
    return this.#fetchClient.get(path, { query: opts.query, headers: opts.headers });
  }

  /** Performs a POST request. */
  post(path: string, opts: SessionRequest = {}): SafeWrapAsync<Error, Response> {
    return this.#fetchClient.post(path, opts);
  }

  /** Performs a PUT request. */
  put(path: string, opts: SessionRequest = {}): SafeWrapAsync<Error, Response> {
    return this.#fetchClient.put(path, opts);
  }

  /** Performs a PATCH request. */
  patch(path: string, opts: SessionRequest = {}): SafeWrapAsync<Error, Response> {
    return this.#fetchClient.patch(path, opts);
  }

  /** Performs a DELETE request. */
  delete(path: string, opts: SessionRequest = {}): SafeWrapAsync<Error, Response> {
    return this.#fetchClient.delete(path, { query: opts.query, headers: opts.headers });
  }

  /**
   * `GET /apiKeyProfiles`: the profile of the key the client authenticates with.
   *
   * Fails with a {@link FindFailedError} when the API returns no profile.
   */
  async apiKeyProfile(): SafeWrapAsync<Error, ApiKeyProfile> {
    const [err, profiles] = await apiKeyProfiles.call(this, { limit: 1 });
    if (err) {
      return [new Error('error fetching API key profile in CampaignClient.apiKeyProfile', { cause: err }), null];
    }

    if (profiles.length === 0) {
      return [new FindFailedError('No API key profile returned'), null];
    }

    return [null, profiles[0]];
  }

  toString(): string {
    return `CampaignClient(appName=${this.appName}, endpoint=${this.endpoint}, mode=${this.mode})`;
  }
}
