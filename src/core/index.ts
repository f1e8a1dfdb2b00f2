/**
 * Core entrypoint: exports the client, endpoint dispatch and result shaping.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/** Options accepted by {@link CampaignClient.create} and {@link CampaignClient.config}. */
export type { CampaignClientConfig, CampaignClientProps } from './client.js';

/**
 * Client of the campaign management API: owns the authenticated session
 * and exposes the services.
 */
export { CampaignClient, DEFAULT_LIMIT } from './client.js';

/** Credential, endpoint and mode resolution used by {@link CampaignClient.create}. */
export {
  API_KEY_ENV,
  APP_NAME_ENV,
  type CredentialOptions,
  type Credentials,
  ENDPOINTS,
  type EndpointAlias,
  MODES,
  type ModeName,
  type ModeNumber,
  modeName,
  resolveCredentials,
  resolveEndpoint,
  resolveMode,
} from './credentials.js';

/** Error records carried by failed responses. */
export { ApiErrorRecord } from './apiErrorRecord.js';

/** Declarative endpoints: path binding, field normalization, pagination and fault checks. */
export { DEFAULT_MAX_PAGE_SIZE, defineEndpoint, Endpoint, type EndpointOptions } from './endpoint.js';

/** How a response payload becomes the value a call returns. */
export {
  array,
  type ElementFactory,
  fromKind,
  identity,
  keyedArray,
  noResult,
  paginated,
  type ResultKind,
  type ResultMode,
  resultKey,
  type ShapeContext,
  single,
  singleOrNull,
} from './results.js';

/** The session contract endpoints send their requests through. */
export type { CallArgs, HttpMethod, HttpSession, PageArgs, SessionRequest } from './types.js';
