import { defineEndpoint } from '../core/endpoint.js';
import { fromKind, noResult, paginated, single, singleOrNull } from '../core/results.js';
import type { HttpSession, PageArgs } from '../core/types.js';
import { FindFailedError } from '../error/findFailedError.js';
import {
  ActivistCodeData,
  ActivistCodeResponse,
  CanvassContext,
  CanvassResponse,
  Note,
  Person,
  personMatch,
} from '../objects/index.js';
import { sharedFields } from '../objects/registry.js';
import { FieldDescriptor, formatValue } from '../schema/field.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { ActivistCodes } from './activistCodes.js';
import { type FieldArgs, Service } from './service.js';

const endpoints = {
  activistCodes: defineEndpoint({
    name: 'People.activistCodes',
    path: 'people/{vanId}/activistCodes',
    method: 'get',
    result: paginated(fromKind(ActivistCodeData)),
  }),
  addCanvassResponses: defineEndpoint({
    name: 'People.addCanvassResponses',
    path: 'people/{vanId}/canvassResponses',
    method: 'post',
    kind: CanvassResponse,
    result: noResult(),
  }),
  addNotes: defineEndpoint({
    name: 'People.addNotes',
    path: 'people/{vanId}/notes',
    method: 'post',
    kind: Note,
    result: noResult(),
  }),
  find: defineEndpoint({
    name: 'People.find',
    path: 'people/find',
    method: 'post',
    kind: Person,
    result: singleOrNull(personMatch),
  }),
  findByPhone: defineEndpoint({
    name: 'People.findByPhone',
    path: 'people/findByPhone',
    method: 'post',
    fields: { phoneNumber: FieldDescriptor.of('phone', 'number') },
    result: singleOrNull(fromKind(Person)),
  }),
  findOrCreate: defineEndpoint({
    name: 'People.findOrCreate',
    path: 'people/findOrCreate',
    method: 'post',
    kind: Person,
    result: single(personMatch),
  }),
  get: defineEndpoint({
    name: 'People.get',
    path: 'people/{vanId}',
    method: 'get',
    query: ['$expand'],
    result: single(fromKind(Person)),
    registry: sharedFields,
  }),
  update: defineEndpoint({
    name: 'People.update',
    path: 'people/{vanId}',
    method: 'post',
    kind: Person,
    result: single(personMatch),
  }),
};

/** Actions on activist codes as canvass responses take them. */
type CodeAction = 'Apply' | 'Remove';

/** A van id, as a number or as the string the caller holds it in. */
export type VanId = number | string;

/** People in the database, and the records attached to them. */
export class People extends Service {
  readonly #activistCodes: ActivistCodes;

  constructor(session: HttpSession, activistCodes: ActivistCodes) {
    super(session);
    this.#activistCodes = activistCodes;
  }

  /** `GET /people/{vanId}/activistCodes` */
  activistCodes(vanId: VanId, page: PageArgs = {}): SafeWrapAsync<Error, ActivistCodeData[]> {
    return endpoints.activistCodes.call(this.session, { path: [vanId], ...page });
  }

  /** `POST /people/{vanId}/canvassResponses`, with the fields of a {@link CanvassResponse}. */
  addCanvassResponses(vanId: VanId, fields: FieldArgs): SafeWrapAsync<Error, undefined> {
    return endpoints.addCanvassResponses.call(this.session, { path: [vanId], fields });
  }

  /** `POST /people/{vanId}/notes`, with the fields of a {@link Note}. */
  addNotes(vanId: VanId, fields: FieldArgs): SafeWrapAsync<Error, undefined> {
    return endpoints.addNotes.call(this.session, { path: [vanId], fields });
  }

  /** `POST /people/find`. Resolves to `null` when nobody matches. */
  find(fields: FieldArgs): SafeWrapAsync<Error, Person | null> {
    return endpoints.find.call(this.session, { fields });
  }

  /** `POST /people/findByPhone`. Resolves to `null` when no person has the number. */
  findByPhone(fields: FieldArgs): SafeWrapAsync<Error, Person | null> {
    return endpoints.findByPhone.call(this.session, { fields });
  }

  /** `POST /people/findOrCreate` */
  findOrCreate(fields: FieldArgs): SafeWrapAsync<Error, Person | null> {
    return endpoints.findOrCreate.call(this.session, { fields });
  }

  /** `GET /people/{vanId}`, with `expand` naming the collections to include. */
  get(vanId: VanId, fields: FieldArgs = {}): SafeWrapAsync<Error, Person> {
    return endpoints.get.call(this.session, { path: [vanId], fields });
  }

  /** `POST /people/{vanId}` */
  update(vanId: VanId, fields: FieldArgs): SafeWrapAsync<Error, Person | null> {
    return endpoints.update.call(this.session, { path: [vanId], fields });
  }

  /**
   * Finds the person matching `fields` and fetches their full record.
   * Resolves to `null` when nobody matches.
   */
  async lookup(fields: FieldArgs, expand?: string | readonly string[]): SafeWrapAsync<Error, Person | null> {
    const [errVanId, vanId] = await this.#vanId(fields);
    if (errVanId) {
      return [new Error('error finding person in People.lookup', { cause: errVanId }), null];
    }

    if (vanId === undefined) {
      return [null, null];
    }

    return this.get(vanId, { expand });
  }

  /**
   * Applies an activist code, given by id or exact name, to the person matching `fields`,
   * without recording contact history.
   */
  applyActivistCode(activistCode: number | string, fields: FieldArgs): SafeWrapAsync<Error, undefined> {
    return this.#updateActivistCode(activistCode, 'Apply', fields);
  }

  /** Removes an activist code from the person matching `fields`. See {@link People.applyActivistCode}. */
  removeActivistCode(activistCode: number | string, fields: FieldArgs): SafeWrapAsync<Error, undefined> {
    return this.#updateActivistCode(activistCode, 'Remove', fields);
  }

  /** Adds notes, given as the fields of a {@link Note}, to the person matching `fields`. */
  async applyNotes(notes: FieldArgs, fields: FieldArgs): SafeWrapAsync<Error, undefined> {
    const [errVanId, vanId] = await this.#requireVanId(fields);
    if (errVanId) {
      return [errVanId, null];
    }

    return this.addNotes(vanId, notes);
  }

  /**
   * Updates the person matching `lookup` with `update`, if there is one.
   * Resolves to their van id, or `null` when nobody matches and nothing was sent.
   */
  async updateIfExists(lookup: FieldArgs, update: FieldArgs): SafeWrapAsync<Error, VanId | null> {
    const [errVanId, vanId] = await this.#vanId(lookup);
    if (errVanId) {
      return [new Error('error finding person in People.updateIfExists', { cause: errVanId }), null];
    }

    if (vanId === undefined) {
      return [null, null];
    }

    const [errUpdate] = await this.update(vanId, update);
    if (errUpdate) {
      return [new Error('error updating person in People.updateIfExists', { cause: errUpdate }), null];
    }

    return [null, vanId];
  }

  async #updateActivistCode(
    activistCode: number | string,
    action: CodeAction,
    fields: FieldArgs,
  ): SafeWrapAsync<Error, undefined> {
    const [errCode, codeId] = await this.#activistCodeId(activistCode);
    if (errCode) {
      return [errCode, null];
    }

    const [errVanId, vanId] = await this.#requireVanId(fields);
    if (errVanId) {
      return [errVanId, null];
    }

    return this.addCanvassResponses(vanId, {
      context: new CanvassContext({ omit_history: true }),
      response: new ActivistCodeResponse(codeId, { action }),
    });
  }

  async #activistCodeId(activistCode: number | string): SafeWrapAsync<Error, number> {
    if (typeof activistCode === 'number') {
      return [null, activistCode];
    }

    const [errFind, code] = await this.#activistCodes.find(activistCode);
    if (errFind) {
      return [errFind, null];
    }

    if (code.id === undefined) {
      return [new FindFailedError(`Activist code "${activistCode}" has no id`), null];
    }

    return [null, code.id];
  }

  /** The van id given in `fields`, else the id of the person they match. */
  async #vanId(fields: FieldArgs): SafeWrapAsync<Error, VanId | undefined> {
    const [errGiven, given] = safeWrap(() => sharedFields.get('vanId').find('vanId', { ...fields }));
    if (errGiven) {
      return [errGiven, null];
    }

    if ((typeof given === 'number' && given !== 0) || (typeof given === 'string' && given !== '')) {
      return [null, given];
    }

    const [errFind, person] = await this.find(fields);
    if (errFind) {
      return [errFind, null];
    }

    return [null, person?.id];
  }

  /** The van id `fields` give or match, failing with a {@link FindFailedError} when nobody matches. */
  async #requireVanId(fields: FieldArgs): SafeWrapAsync<Error, VanId> {
    const [errVanId, vanId] = await this.#vanId(fields);
    if (errVanId) {
      return [errVanId, null];
    }

    if (vanId === undefined) {
      return [new FindFailedError(`Could not find ${describePerson(fields)}`), null];
    }

    return [null, vanId];
  }
}

function describePerson(fields: FieldArgs): string {
  const [errPerson, person] = safeWrap(() => new Person(fields));
  return errPerson ? formatValue(fields) : String(person);
}
