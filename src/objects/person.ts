import type { ElementFactory } from '../core/results.js';
import { FieldDescriptor, isMapping } from '../schema/field.js';
import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { Address, Email, Phone } from './contact.js';
import { sharedFields } from './registry.js';

/** Match status the API reports when a find request matched nobody. */
export const UNMATCHED = 'Unmatched';

/** A value assigned to one of the database's custom fields. */
export class CustomFieldValue extends StructuredObject {
  static readonly schema = buildKindSchema(
    { kind: 'CustomFieldValue', shared: ['assignedValue', 'customFieldGroupId', 'customFieldId'] },
    sharedFields,
  );

  get customFieldId(): number | undefined {
    return this.readNumber('customFieldId');
  }

  get customFieldGroupId(): number | undefined {
    return this.readNumber('customFieldGroupId');
  }

  get assignedValue(): string | undefined {
    return this.readString('assignedValue');
  }
}

/** The id a person is known by in another system. */
export class Identifier extends StructuredObject {
  static readonly schema = buildKindSchema({ kind: 'Identifier', shared: ['externalId', 'type'] }, sharedFields);

  get externalId(): string | undefined {
    return this.readString('externalId');
  }

  get type(): string | undefined {
    return this.readString('type');
  }
}

sharedFields.share({
  customFieldValues: new FieldDescriptor({
    aliases: ['custom_values'],
    kind: CustomFieldValue,
    singular: 'custom_value',
  }),
  identifiers: new FieldDescriptor({ kind: Identifier, singular: 'identifier' }),
  recordedAddresses: new FieldDescriptor({ kind: Address, singular: 'recorded_address' }),
});

/** A person in the voter file or the campaign's own database. */
export class Person extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'Person',
      idField: 'id',
      prefix: 'van',
      shared: [
        'additionalEnvelopeName',
        'additionalSalutation',
        'addresses',
        'biographyImageUrl',
        'caseworkCases',
        'caseworkIssues',
        'caseworkStories',
        'collectedLocationId',
        'contactMethodPreferenceCode',
        'contactMode',
        'customFieldValues',
        'customProperties',
        'cycle',
        'dateOfBirth',
        'disclosureFieldValues',
        'districts',
        'electionRecords',
        'electionType',
        'emails',
        'envelopeName',
        'finderNumber',
        'firstName',
        'formalEnvelopeName',
        'formalSalutation',
        'identifiers',
        'jobTitle',
        'lastName',
        'middleName',
        'nickname',
        'occupation',
        'organizationContactCommonName',
        'organizationContactOfficialName',
        'organizationRoles',
        'party',
        'phones',
        'pronouns',
        'primaryContact',
        'recordedAddresses',
        'salutation',
        'scores',
        'selfReportedEthnicities',
        'selfReportedEthnicity',
        'selfReportedGenders',
        'selfReportedLanguagePreference',
        'selfReportedRace',
        'selfReportedRaces',
        'selfReportedSexualOrientations',
        'sex',
        'suppressions',
        'surveyQuestionResponses',
        'suffix',
        'title',
        'website',
      ],
      fields: { employer: FieldDescriptor.of() },
    },
    sharedFields,
  );

  get firstName(): string | undefined {
    return this.readString('firstName');
  }

  get lastName(): string | undefined {
    return this.readString('lastName');
  }

  get salutation(): string | undefined {
    return this.readString('salutation');
  }

  get envelopeName(): string | undefined {
    return this.readString('envelopeName');
  }

  get customFieldValues(): readonly CustomFieldValue[] {
    return this.readKindList('customFieldValues', CustomFieldValue) ?? [];
  }

  get identifiers(): readonly Identifier[] {
    return this.readKindList('identifiers', Identifier) ?? [];
  }

  get addresses(): readonly Address[] {
    return this.readKindList('addresses', Address) ?? [];
  }

  get emails(): readonly Email[] {
    return this.readKindList('emails', Email) ?? [];
  }

  get phones(): readonly Phone[] {
    return this.readKindList('phones', Phone) ?? [];
  }

  /** The preferred email address, else the first one. */
  get preferredEmail(): Email | undefined {
    return this.emails.find((email) => email.isPreferred) ?? this.emails[0];
  }

  /** The preferred phone, else the first one. */
  get preferredPhone(): Phone | undefined {
    return this.phones.find((phone) => phone.isPreferred) ?? this.phones[0];
  }
}

/**
 * Reads the body of a find or update request: `null` when the API reports the person as
 * unmatched, the person otherwise. The match status itself is not kept.
 */
export const personMatch: ElementFactory<Person | null> = (value) => {
  if (!isMapping(value)) {
    throw new TypeError('Expected a person record in the response body');
  }

  const { status, ...fields } = value;
  return status === UNMATCHED ? null : new Person(fields);
};
