import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError } from '../error/apiError.js';
import { ArgumentError } from '../error/argumentError.js';
import { SchemaError } from '../error/schemaError.js';
import { FieldDescriptor } from '../schema/field.js';
import { SchemaRegistry } from '../schema/registry.js';
import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { FakeSession } from '../testing/fakeSession.js';
import { ApiErrorRecord } from './apiErrorRecord.js';
import { defineEndpoint } from './endpoint.js';
import { array, fromKind, keyedArray, noResult, paginated, resultKey, single, singleOrNull } from './results.js';

const registry = new SchemaRegistry().share({
  id: FieldDescriptor.of(),
  name: FieldDescriptor.of(),
  firstName: FieldDescriptor.of('first'),
  lastName: FieldDescriptor.of('last'),
  expand: new FieldDescriptor({ factory: (value) => (Array.isArray(value) ? value.join(',') : value) }),
  note: FieldDescriptor.of(),
  tags: new FieldDescriptor({ singular: 'tag' }),
});

class Contact extends StructuredObject {
  static readonly schema = buildKindSchema(
    { kind: 'Contact', idField: 'id', prefix: 'van', shared: ['firstName', 'lastName'] },
    registry,
  );
}

class Place extends StructuredObject {
  static readonly schema = buildKindSchema({ kind: 'Place', idField: 'id', nameField: 'name', prefix: 'place' }, registry);
}

const getContact = defineEndpoint({
  name: 'Contacts.get',
  path: 'people/{vanId}',
  method: 'get',
  query: ['$expand'],
  result: single(fromKind(Contact)),
  registry,
});

const findContact = defineEndpoint({
  name: 'Contacts.find',
  path: 'people/find',
  method: 'post',
  kind: Contact,
  result: singleOrNull(fromKind(Contact)),
  registry,
});

const addNote = defineEndpoint({
  name: 'Contacts.addNote',
  path: 'people/{vanId}/notes',
  method: 'post',
  body: ['note'],
  fields: { vanId: FieldDescriptor.of('van') },
  pathToBody: ['vanId'],
  result: noResult(),
  registry,
});

const listContacts = defineEndpoint({
  name: 'Contacts.list',
  path: 'people',
  method: 'get',
  query: ['firstName'],
  result: paginated(fromKind(Contact)),
  maxPageSize: 3,
  registry,
});

const records = [0, 1, 2, 3, 4].map((vanId) => ({ vanId }));

function ids(contacts: readonly Contact[] | null): Array<number | undefined> | undefined {
  return contacts?.map((contact) => contact.id);
}

describe('defineEndpoint', () => {
  it('rejects pathToBody names missing from the path', () => {
    expect(() =>
      defineEndpoint({ name: 'Bad.one', path: 'people', method: 'post', pathToBody: ['vanId'], result: noResult() }),
    ).toThrow('Bad.one: pathToBody names vanId missing from path people');
  });

  it('rejects a field named in both query and body', () => {
    expect(() =>
      defineEndpoint({ name: 'Bad.one', path: 'notes', method: 'post', query: ['$note'], body: ['note'], result: noResult(), registry }),
    ).toThrow(SchemaError);
  });

  it('rejects fields the body kind already declares', () => {
    expect(() =>
      defineEndpoint({ name: 'Bad.one', path: 'people', method: 'post', kind: Contact, body: ['firstName'], result: noResult(), registry }),
    ).toThrow('Bad.one: firstName already declared by Contact');
  });

  it('rejects a field declared both inline and in body', () => {
    expect(() =>
      defineEndpoint({
        name: 'Bad.one',
        path: 'notes',
        method: 'post',
        body: ['note'],
        fields: { note: FieldDescriptor.of() },
        result: noResult(),
        registry,
      }),
    ).toThrow('Bad.one: note declared both inline and in body');
  });

  it('only takes a page size for paginated results', () => {
    expect(() =>
      defineEndpoint({ name: 'Bad.one', path: 'people', method: 'get', maxPageSize: 10, result: single(fromKind(Contact)) }),
    ).toThrow('Bad.one: maxPageSize given for a result that is not paginated');
  });

  it('rejects names missing from the registry', () => {
    expect(() =>
      defineEndpoint({ name: 'Bad.one', path: 'people', method: 'get', query: ['nickname'], result: noResult(), registry }),
    ).toThrow('nickname is not a shared field');
  });

  it('answers to the kind, inline and registry names', () => {
    expect(addNote.table.fieldNames()).toEqual(['vanId', 'note']);
    expect(findContact.table.resolve('first')).toBe('firstName');
    expect(listContacts.maxPageSize).toBe(3);
    expect(getContact.maxPageSize).toBe(200);
  });
});

describe('Endpoint.call', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('binds the path and encodes query fields', async () => {
    const session = new FakeSession().reply({ body: { vanId: 3, firstName: 'Ada' } });

    const [err, contact] = await getContact.call(session, { path: [3], fields: { expand: ['phones', 'emails'] } });

    expect(err).toBeNull();
    expect(contact?.equals(new Contact(3, { first: 'Ada' }))).toBe(true);
    expect(session.last).toEqual({ method: 'get', route: 'people/3', query: { $expand: 'phones,emails' }, body: undefined });
  });

  it('sends normalized fields as the body', async () => {
    const session = new FakeSession().reply({ body: { vanId: 7 } });

    const [err, contact] = await findContact.call(session, { fields: { first: 'Ada', last_name: 'Lovelace' } });

    expect(err).toBeNull();
    expect(contact?.id).toBe(7);
    expect(session.last?.body).toEqual({ firstName: 'Ada', lastName: 'Lovelace' });
  });

  it('resolves a 404 without errors to null when the result allows it', async () => {
    const session = new FakeSession().reply({ status: 404, body: {} });

    const [err, contact] = await findContact.call(session, { fields: { first: 'Nobody' } });

    expect(err).toBeNull();
    expect(contact).toBeNull();
  });

  it('returns the error records of a failed response', async () => {
    const session = new FakeSession().reply({
      status: 400,
      body: { errors: [{ code: 'INVALID_PARAMETER', text: 'firstName is required', properties: ['firstName'] }] },
    });

    const [err, contact] = await findContact.call(session, { fields: { last: 'Lovelace' } });

    expect(contact).toBeNull();
    expect(err).toBeInstanceOf(ApiError);
    expect(err?.message).toBe('HTTP Error: 400\nReason: firstName is required');
    if (err instanceof ApiError) {
      expect(err.response.status).toBe(400);
      expect(err.errors).toHaveLength(1);
      const [record] = err.errors;
      const expected = new ApiErrorRecord({ code: 'INVALID_PARAMETER', text: 'firstName is required', property: 'firstName' });
      expect(record).toBeInstanceOf(ApiErrorRecord);
      expect(record instanceof ApiErrorRecord && record.equals(expected)).toBe(true);
    }
  });

  it('treats a 404 with errors as a failure', async () => {
    const session = new FakeSession().reply({ status: 404, body: { errors: [{ code: 'NOT_FOUND', text: 'No such person' }] } });

    const [err] = await findContact.call(session, { fields: { first: 'Ada' } });

    expect(err).toBeInstanceOf(ApiError);
  });

  it('wraps transport failures', async () => {
    const cause = new Error('socket hang up');
    const session = new FakeSession().reply({ error: cause });

    const [err] = await findContact.call(session, { fields: { first: 'Ada' } });

    expect(err?.message).toBe('error requesting Contacts.find');
    expect(err?.cause).toBe(cause);
  });

  it('rejects unknown names before sending anything', async () => {
    const session = new FakeSession();

    const [err] = await findContact.call(session, { fields: { nickname: 'Ada' } });

    expect(err).toBeInstanceOf(ArgumentError);
    expect(err?.message).toBe('Name or alias "nickname" not recognized by Contacts.find.');
    expect(session.requests).toHaveLength(0);
  });

  it('copies path values into the body unless supplied', async () => {
    const session = new FakeSession().reply({ status: 204 }, { status: 204 });

    const [err, result] = await addNote.call(session, { path: [5], fields: { note: 'hi' } });
    await addNote.call(session, { path: [5], fields: { van: 9 } });

    expect(err).toBeNull();
    expect(result).toBeUndefined();
    expect(session.requests.map((request) => request.body)).toEqual([{ note: 'hi', vanId: 5 }, { vanId: 9 }]);
    expect(session.requests[0].route).toBe('people/5/notes');
  });

  it('sends raw data in place of the fields', async () => {
    const session = new FakeSession().reply({ status: 204 });

    await addNote.call(session, { path: [5], data: [{ text: 'raw' }] });

    expect(session.last?.body).toEqual([{ text: 'raw' }]);
  });

  it('rejects the wrong number of path values', async () => {
    const [err] = await addNote.call(new FakeSession());

    expect(err).toBeInstanceOf(ArgumentError);
    expect(err?.message).toBe('Contacts.addNote takes 1 path argument(s) (vanId), got 0');
  });

  it('rejects paging arguments for endpoints that are not paginated', async () => {
    const [err] = await addNote.call(new FakeSession(), { path: [5], skip: 2 });

    expect(err?.message).toBe(
      'skip=2 given for Contacts.addNote, which is not paginated. Paging arguments only apply to paginated endpoints.',
    );
  });

  it('drops suppressed keys before building the result', async () => {
    const body = { placeId: 1, id: 99, name: 'Hall' };
    const suppressed = defineEndpoint({
      name: 'Places.get',
      path: 'places/{placeId}',
      method: 'get',
      result: single(fromKind(Place)),
      suppressKeys: ['id'],
    });
    const raw = defineEndpoint({ name: 'Places.raw', path: 'places/{placeId}', method: 'get', result: single(fromKind(Place)) });
    const session = new FakeSession().reply({ body }, { body });

    const [err, place] = await suppressed.call(session, { path: [1] });
    const [errRaw] = await raw.call(session, { path: [1] });

    expect(err).toBeNull();
    expect(place?.toJSON()).toEqual({ placeId: 1, name: 'Hall' });
    expect(errRaw?.message).toBe('error shaping Places.raw result');
  });

  it('shapes keyed and list results', async () => {
    const create = defineEndpoint({ name: 'Contacts.create', path: 'people', method: 'post', kind: Contact, result: resultKey('vanId') });
    const all = defineEndpoint({ name: 'Contacts.all', path: 'people/all', method: 'get', result: array(fromKind(Contact)) });
    const tagged = defineEndpoint({
      name: 'Contacts.tagged',
      path: 'people/tagged',
      method: 'get',
      result: keyedArray('people', fromKind(Contact)),
    });
    const session = new FakeSession().reply({ body: { vanId: 12 } }, { body: [{ vanId: 1 }, 2] }, { body: { people: [{ vanId: 3 }] } });

    expect(await create.call(session, { fields: { first: 'Ada' } })).toEqual([null, 12]);
    expect(ids((await all.call(session))[1])).toEqual([1, 2]);
    expect(ids((await tagged.call(session))[1])).toEqual([3]);
  });

  describe('pagination', () => {
    it('stops at the limit and asks only for what remains', async () => {
      const session = new FakeSession().paginate(records);

      const [err, contacts] = await listContacts.call(session, { limit: 4 });

      expect(err).toBeNull();
      expect(ids(contacts)).toEqual([0, 1, 2, 3]);
      expect(session.requests.map((request) => request.query)).toEqual([
        { $top: '3', $skip: '0' },
        { $top: '1', $skip: '3' },
      ]);
    });

    it('starts after the skipped records', async () => {
      const session = new FakeSession().paginate(records);

      const [, contacts] = await listContacts.call(session, { skip: 2, limit: 2 });

      expect(ids(contacts)).toEqual([2, 3]);
      expect(session.requests).toHaveLength(1);
    });

    it('fetches every page with a limit of zero', async () => {
      const session = new FakeSession().paginate(records);

      const [, contacts] = await listContacts.call(session, { limit: 0 });

      expect(ids(contacts)).toEqual([0, 1, 2, 3, 4]);
      expect(session.requests).toHaveLength(2);
    });

    it('falls back to the session default limit', async () => {
      const session = new FakeSession({ defaultLimit: 2 }).paginate(records);

      const [, contacts] = await listContacts.call(session);

      expect(ids(contacts)).toEqual([0, 1]);
      expect(session.last?.query).toEqual({ $top: '2', $skip: '0' });
    });

    it('sends query fields with the page parameters', async () => {
      const session = new FakeSession().paginate(records);

      await listContacts.call(session, { fields: { first: 'Ada' }, limit: 1 });

      expect(session.last?.query).toEqual({ firstName: 'Ada', $top: '1', $skip: '0' });
    });

    it('rejects top', async () => {
      const [err] = await listContacts.call(new FakeSession(), { top: 3 });

      expect(err?.message).toBe('$top is not supported, use limit instead.');
    });

    it('rejects a negative limit', async () => {
      const [err] = await listContacts.call(new FakeSession(), { limit: -1 });

      expect(err).toBeInstanceOf(ArgumentError);
    });

    it('drops everything when a later page fails', async () => {
      const session = new FakeSession().paginate(records, { failOnPage: 2 });

      const [err, contacts] = await listContacts.call(session, { limit: 0 });

      expect(contacts).toBeNull();
      expect(err).toBeInstanceOf(ApiError);
      expect(err?.message).toBe('HTTP Error: 500\nReason: Page failed');
    });

    it('logs requests and page follows in debug mode', async () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const session = new FakeSession({ debug: true }).paginate(records);

      await listContacts.call(session, { limit: 0 });

      expect(debugSpy).toHaveBeenCalledWith('Contacts.list: GET people', { $top: '3', $skip: '0' });
      expect(debugSpy).toHaveBeenCalledWith('Contacts.list: 3 items so far, following https://api.test/people?$top=2&$skip=3');
    });
  });
});
