import { describe, expect, it } from 'vitest';
import { FindFailedError } from '../error/findFailedError.js';
import { Address } from '../objects/index.js';
import { FakeSession } from '../testing/fakeSession.js';
import { ActivistCodes } from './activistCodes.js';
import { People } from './people.js';

function setup(): { session: FakeSession; people: People } {
  const session = new FakeSession();
  return { session, people: new People(session, new ActivistCodes(session)) };
}

describe('People', () => {
  it('finds a person by any field names', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, status: 'Stored' } });

    const [err, person] = await people.find({ first: 'Ada', last: 'Lovelace' });

    expect(err).toBeNull();
    expect(person?.id).toBe(3);
    expect(session.last).toEqual({
      method: 'post',
      route: 'people/find',
      query: {},
      body: { firstName: 'Ada', lastName: 'Lovelace' },
    });
  });

  it('resolves an unmatched or missing person to null', async () => {
    const { session, people } = setup();
    session.reply({ body: { status: 'Unmatched' } }, { status: 404 });

    expect(await people.find({ first: 'Nobody' })).toEqual([null, null]);
    expect(await people.find({ first: 'Nobody' })).toEqual([null, null]);
  });

  it('expands collections when getting a person', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, emails: [{ email: 'ada@example.com', isPreferred: true }] } });

    const [err, person] = await people.get(3, { expand: ['emails', 'phones'] });

    expect(err).toBeNull();
    expect(person?.preferredEmail?.email).toBe('ada@example.com');
    expect(session.last?.route).toBe('people/3');
    expect(session.last?.query).toEqual({ $expand: 'emails,phones' });
  });

  it('looks a person up and fetches the full record', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, status: 'Stored' } }, { body: { vanId: 3, firstName: 'Ada' } });

    const [err, person] = await people.lookup({ email: 'ada@example.com' }, 'phones');

    expect(err).toBeNull();
    expect(person?.firstName).toBe('Ada');
    expect(session.requests.map((request) => request.route)).toEqual(['people/find', 'people/3']);
    expect(session.requests[0].body).toEqual({ emails: [{ email: 'ada@example.com' }] });
    expect(session.last?.query).toEqual({ $expand: 'phones' });
  });

  it('stops a lookup when nobody matches', async () => {
    const { session, people } = setup();
    session.reply({ status: 404 });

    expect(await people.lookup({ first: 'Nobody' })).toEqual([null, null]);
    expect(session.requests).toHaveLength(1);
  });

  it('applies an activist code given by name', async () => {
    const { session, people } = setup();
    session.reply(
      {
        body: {
          items: [
            { activistCodeId: 11, name: 'Volunteer' },
            { activistCodeId: 12, name: 'Volunteer Lead' },
          ],
          nextPageLink: null,
          count: 2,
        },
      },
      { body: { vanId: 3, status: 'Stored' } },
      { status: 204 },
    );

    const [err, result] = await people.applyActivistCode('Volunteer', { first: 'Ada', last: 'Lovelace' });

    expect(err).toBeNull();
    expect(result).toBeUndefined();
    expect(session.requests[0].query).toEqual({ name: 'Volunteer', $top: '200', $skip: '0' });
    expect(session.last).toEqual({
      method: 'post',
      route: 'people/3/canvassResponses',
      query: {},
      body: {
        canvassContext: { omitActivistCodeContactHistory: true },
        responses: [{ activistCodeId: 11, action: 'Apply', type: 'ActivistCode' }],
      },
    });
  });

  it('removes an activist code from a person given by van id', async () => {
    const { session, people } = setup();
    session.reply({ status: 204 });

    const [err] = await people.removeActivistCode(11, { vanId: 3 });

    expect(err).toBeNull();
    expect(session.requests).toHaveLength(1);
    expect(session.last?.body).toEqual({
      canvassContext: { omitActivistCodeContactHistory: true },
      responses: [{ activistCodeId: 11, action: 'Remove', type: 'ActivistCode' }],
    });
  });

  it('fails when the person cannot be found', async () => {
    const { session, people } = setup();
    session.reply({ status: 404 });

    const [err] = await people.applyActivistCode(11, { first: 'Ada' });

    expect(err).toBeInstanceOf(FindFailedError);
    expect(err?.message).toBe('Could not find Person(firstName=Ada)');
  });

  it('fails when the activist code cannot be found', async () => {
    const { session, people } = setup();
    session.reply({ body: { items: [], nextPageLink: null, count: 0 } });

    const [err] = await people.applyActivistCode('Volunteer', { vanId: 3 });

    expect(err).toBeInstanceOf(FindFailedError);
    expect(err?.message).toBe('No activist codes named "Volunteer"');
  });

  it('lists the activist codes applied to a person', async () => {
    const { session, people } = setup();
    session.paginate([
      { activistCodeId: 1, activistCodeName: 'Volunteer' },
      { activistCodeId: 2, activistCodeName: 'Donor' },
    ]);

    const [err, codes] = await people.activistCodes(3);

    expect(err).toBeNull();
    expect(codes?.map((code) => code.name)).toEqual(['Volunteer', 'Donor']);
    expect(session.last?.route).toBe('people/3/activistCodes');
  });

  it('adds notes', async () => {
    const { session, people } = setup();
    session.reply({ status: 204 });

    await people.addNotes(3, { text: 'Met at the fair', view_restricted: true });

    expect(session.last?.route).toBe('people/3/notes');
    expect(session.last?.body).toEqual({ text: 'Met at the fair', isViewRestricted: true });
  });

  it('shapes a full person record', async () => {
    const { session, people } = setup();
    const districts = [{ name: 'Congressional', districtFieldValues: [{ id: '5', name: '5' }] }];
    session.reply({
      body: {
        vanId: 3,
        firstName: 'Ada',
        salutation: 'Ada',
        envelopeName: 'Ada Lovelace',
        customFieldValues: [{ customFieldId: 7, customFieldGroupId: 2, assignedValue: 'Yes' }],
        identifiers: [{ type: 'crm', externalId: 'A-1' }],
        districts,
        recordedAddresses: [{ addressLine1: '1 Main St', city: 'Springfield' }],
        suppressions: [],
        selfReportedRaces: [],
        pronouns: null,
        website: 'https://example.com',
      },
    });

    const [err, person] = await people.get(3);

    expect(err).toBeNull();
    expect(person?.salutation).toBe('Ada');
    expect(person?.envelopeName).toBe('Ada Lovelace');
    expect(person?.customFieldValues.map((value) => [value.customFieldId, value.assignedValue])).toEqual([[7, 'Yes']]);
    expect(person?.identifiers[0]?.externalId).toBe('A-1');
    expect(person?.get('districts')).toEqual(districts);
    expect(person?.has('pronouns')).toBe(false);
    const recorded = person?.get('recordedAddresses');
    expect(Array.isArray(recorded) && recorded[0] instanceof Address && recorded[0].city).toBe('Springfield');
  });

  it('finds a person by phone number', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, firstName: 'Ada' } }, { status: 404 });

    const [err, person] = await people.findByPhone({ phone: '555-0100' });

    expect(err).toBeNull();
    expect(person?.id).toBe(3);
    expect(session.last).toEqual({
      method: 'post',
      route: 'people/findByPhone',
      query: {},
      body: { phoneNumber: '555-0100' },
    });
    expect(await people.findByPhone({ number: '555-0199' })).toEqual([null, null]);
  });

  it('updates a person only if they exist', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, status: 'Stored' } }, { body: { vanId: 3 } }, { status: 404 });

    expect(await people.updateIfExists({ email: 'ada@example.com' }, { nickname: 'Ada' })).toEqual([null, 3]);
    expect(session.requests.map((request) => `${request.method} ${request.route}`)).toEqual([
      'post people/find',
      'post people/3',
    ]);
    expect(session.last?.body).toEqual({ nickname: 'Ada' });

    expect(await people.updateIfExists({ first: 'Nobody' }, { nickname: 'N' })).toEqual([null, null]);
    expect(session.requests).toHaveLength(3);
  });

  it('applies notes to the person matching the lookup fields', async () => {
    const { session, people } = setup();
    session.reply({ body: { vanId: 3, status: 'Stored' } }, { status: 204 });

    const [err] = await people.applyNotes({ text: 'Called back' }, { first: 'Ada', last: 'Lovelace' });

    expect(err).toBeNull();
    expect(session.last?.route).toBe('people/3/notes');
    expect(session.last?.body).toEqual({ text: 'Called back' });
  });

  it('uses a van id given as a string without looking the person up', async () => {
    const { session, people } = setup();
    session.reply({ status: 204 });

    const [err] = await people.removeActivistCode(11, { van_id: '3' });

    expect(err).toBeNull();
    expect(session.requests).toHaveLength(1);
    expect(session.last?.route).toBe('people/3/canvassResponses');
  });
});
