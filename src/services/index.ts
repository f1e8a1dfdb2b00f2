/**
 * Services of the API, each a group of endpoints sharing the client's session.
 * @module
 */
export { ActivistCodes } from './activistCodes.js';
export { Locations } from './locations.js';
export { People } from './people.js';
export { Service } from './service.js';
export type { FieldArgs } from './service.js';
