/**
 * Root entrypoint: re-exports the client, endpoints, schema, resources, services and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export * from './objects/index.js';
export * from './schema/index.js';
export * from './services/index.js';

/** Thin `fetch` transport used by the client; swap it through `fetchProvider`. */
export { FetchClient } from './fetch/index.js';
export type { FetchClientOptions, FetchProvider, FetchProviderDefinition, HeaderOptions } from './fetch/index.js';

/** Error-first tuple helpers every request method returns through. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';
