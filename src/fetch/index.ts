/**
 * Fetch entrypoint: exports the fetch transport and supporting types.
 * @module
 */
export { FetchClient } from './client.js';
export type {
  FetchClientOptions,
  FetchOptions,
  FetchProvider,
  FetchProviderDefinition,
  HeaderOptions,
  HttpMethod,
  QueryParams,
} from './types.js';
export { joinUrl, mergeHeaderOptions } from './utils.js';
