import { FieldDescriptor } from '../schema/field.js';
import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { sharedFields } from './registry.js';

/** A postal address of a person or location. */
export class Address extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'Address',
      idField: 'id',
      prefix: 'address',
      prefixed: ['line1', 'line2', 'line3'],
      shared: [
        'city',
        'countryCode',
        'displayMode',
        'geoLocation',
        'isPreferred',
        'preview',
        'stateOrProvince',
        'type',
        'zipOrPostalCode',
      ],
    },
    sharedFields,
  );

  get line1(): string | undefined {
    return this.readString('addressLine1');
  }

  get city(): string | undefined {
    return this.readString('city');
  }

  get stateOrProvince(): string | undefined {
    return this.readString('stateOrProvince');
  }

  get zipOrPostalCode(): string | undefined {
    return this.readString('zipOrPostalCode');
  }

  get isPreferred(): boolean | undefined {
    return this.readBoolean('isPreferred');
  }
}

/** An email address. A positional string is the address itself. */
export class Email extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'Email',
      nameField: 'email',
      shared: ['dateCreated', 'isPreferred', 'isSubscribed', 'subscriptionStatus', 'type'],
    },
    sharedFields,
  );

  get email(): string | undefined {
    return this.readString('email');
  }

  get isPreferred(): boolean | undefined {
    return this.readBoolean('isPreferred');
  }
}

/** A phone number. A positional string is the number itself. */
export class Phone extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'Phone',
      idField: 'id',
      nameField: 'number',
      prefix: 'phone',
      prefixed: ['number', 'optInStatus', 'type'],
      shared: ['countryCode', 'dateCreated', 'dialingPrefix', 'ext', 'isCellStatus', 'isPreferred', 'smsOptInStatus'],
    },
    sharedFields,
  );

  get number(): string | undefined {
    return this.readString('phoneNumber');
  }

  get isPreferred(): boolean | undefined {
    return this.readBoolean('isPreferred');
  }
}

sharedFields.share({
  address: new FieldDescriptor({ kind: Address }),
  addresses: new FieldDescriptor({ kind: Address, singular: 'address' }),
  emails: new FieldDescriptor({ kind: Email, singular: 'email' }),
  phones: new FieldDescriptor({ kind: Phone, singular: 'phone' }),
});
