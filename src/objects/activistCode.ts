import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { sharedFields } from './registry.js';

/** A tag applied to people, such as "Volunteer" or "Yard sign". */
export class ActivistCode extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'ActivistCode',
      idField: 'id',
      nameField: 'name',
      prefix: 'activistCode',
      shared: ['description', 'isMultiAssign', 'mediumName', 'scriptQuestion', 'shortName', 'status', 'type'],
    },
    sharedFields,
  );

  get status(): string | undefined {
    return this.readString('status');
  }

  get type(): string | undefined {
    return this.readString('type');
  }
}

/** An activist code as applied to one person. */
export class ActivistCodeData extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'ActivistCodeData',
      idField: 'id',
      nameField: 'name',
      prefix: 'activistCode',
      prefixed: ['name', 'typeAndName'],
      shared: ['canvassedBy', 'dateCanvassed', 'dateCreated'],
    },
    sharedFields,
  );

  get dateCanvassed(): string | undefined {
    return this.readString('dateCanvassed');
  }
}
