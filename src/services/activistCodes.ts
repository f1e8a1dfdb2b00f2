import { defineEndpoint } from '../core/endpoint.js';
import { fromKind, paginated, single } from '../core/results.js';
import type { PageArgs } from '../core/types.js';
import { FindFailedError } from '../error/findFailedError.js';
import { ActivistCode } from '../objects/index.js';
import { sharedFields } from '../objects/registry.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type FieldArgs, Service } from './service.js';

const endpoints = {
  get: defineEndpoint({
    name: 'ActivistCodes.get',
    path: 'activistCodes/{activistCodeId}',
    method: 'get',
    result: single(fromKind(ActivistCode)),
  }),
  list: defineEndpoint({
    name: 'ActivistCodes.list',
    path: 'activistCodes',
    method: 'get',
    query: ['name', 'statuses', 'type'],
    result: paginated(fromKind(ActivistCode)),
    registry: sharedFields,
  }),
};

/** Activist codes of the database the client is connected to. */
export class ActivistCodes extends Service {
  /** `GET /activistCodes/{activistCodeId}` */
  get(activistCodeId: number): SafeWrapAsync<Error, ActivistCode> {
    return endpoints.get.call(this.session, { path: [activistCodeId] });
  }

  /** `GET /activistCodes`, filtered by `name`, `statuses` or `type`. */
  list(fields: FieldArgs = {}, page: PageArgs = {}): SafeWrapAsync<Error, ActivistCode[]> {
    return endpoints.list.call(this.session, { fields, ...page });
  }

  /**
   * The one activist code named exactly `name`.
   *
   * Fails with a {@link FindFailedError} when there is none or more than one.
   */
  async find(name: string): SafeWrapAsync<Error, ActivistCode> {
    const [errList, codes] = await this.list({ name }, { limit: 0 });
    if (errList) {
      return [new Error('error listing activist codes in ActivistCodes.find', { cause: errList }), null];
    }

    const named = codes.filter((code) => code.name === name);
    if (named.length > 1) {
      return [new FindFailedError(`Multiple activist codes named "${name}"`), null];
    }

    if (named.length === 0) {
      return [new FindFailedError(`No activist codes named "${name}"`), null];
    }

    return [null, named[0]];
  }

  /**
   * The activist code of each name, keyed by name, from a single listing of all codes.
   *
   * Fails with a {@link FindFailedError} when a name matches no code or several.
   */
  async findEach(names: Iterable<string>): SafeWrapAsync<Error, Map<string, ActivistCode>> {
    const wanted = new Set(names);
    const [errList, codes] = await this.list({}, { limit: 0 });
    if (errList) {
      return [new Error('error listing activist codes in ActivistCodes.findEach', { cause: errList }), null];
    }

    const found = new Map<string, ActivistCode>();
    for (const code of codes) {
      const name = code.name;
      if (name === undefined || !wanted.has(name)) {
        continue;
      }

      if (found.has(name)) {
        return [new FindFailedError(`Multiple activist codes named "${name}"`), null];
      }

      found.set(name, code);
    }

    const missing = [...wanted].filter((name) => !found.has(name));
    if (missing.length > 0) {
      return [new FindFailedError(`The following activist codes could not be found: ${missing.join(', ')}`), null];
    }

    return [null, found];
  }
}
