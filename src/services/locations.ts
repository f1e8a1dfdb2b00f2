import { defineEndpoint } from '../core/endpoint.js';
import { fromKind, noResult, paginated, single } from '../core/results.js';
import type { PageArgs } from '../core/types.js';
import { Location } from '../objects/index.js';
import { sharedFields } from '../objects/registry.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type FieldArgs, Service } from './service.js';

// Location bodies carry both `id` and `locationId`.
const suppressKeys = ['id'];

const endpoints = {
  create: defineEndpoint({
    name: 'Locations.create',
    path: 'locations',
    method: 'post',
    kind: Location,
    result: single(fromKind(Location)),
    suppressKeys,
  }),
  delete: defineEndpoint({
    name: 'Locations.delete',
    path: 'locations/{locationId}',
    method: 'delete',
    result: noResult(),
  }),
  findOrCreate: defineEndpoint({
    name: 'Locations.findOrCreate',
    path: 'locations/findOrCreate',
    method: 'post',
    kind: Location,
    result: single(fromKind(Location)),
    suppressKeys,
  }),
  get: defineEndpoint({
    name: 'Locations.get',
    path: 'locations/{locationId}',
    method: 'get',
    result: single(fromKind(Location)),
    suppressKeys,
  }),
  list: defineEndpoint({
    name: 'Locations.list',
    path: 'locations',
    method: 'get',
    query: ['name'],
    result: paginated(fromKind(Location)),
    suppressKeys,
    registry: sharedFields,
  }),
};

/** Event locations. */
export class Locations extends Service {
  create(fields: FieldArgs): SafeWrapAsync<Error, Location> {
    return endpoints.create.call(this.session, { fields });
  }

  delete(locationId: number): SafeWrapAsync<Error, undefined> {
    return endpoints.delete.call(this.session, { path: [locationId] });
  }

  findOrCreate(fields: FieldArgs): SafeWrapAsync<Error, Location> {
    return endpoints.findOrCreate.call(this.session, { fields });
  }

  get(locationId: number): SafeWrapAsync<Error, Location> {
    return endpoints.get.call(this.session, { path: [locationId] });
  }

  list(fields: FieldArgs = {}, page: PageArgs = {}): SafeWrapAsync<Error, Location[]> {
    return endpoints.list.call(this.session, { fields, ...page });
  }
}
