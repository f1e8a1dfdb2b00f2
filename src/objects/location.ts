import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { Address } from './contact.js';
import { sharedFields } from './registry.js';

/** A place events happen at. */
export class Location extends StructuredObject {
  static readonly schema = buildKindSchema(
    { kind: 'Location', idField: 'id', nameField: 'name', prefix: 'location', shared: ['address', 'displayName'] },
    sharedFields,
  );

  get address(): Address | undefined {
    return this.readKind('address', Address);
  }

  get displayName(): string | undefined {
    return this.readString('displayName');
  }
}
