import { StructuredObject, buildKindSchema } from '../schema/structured.js';
import { sharedFields } from './registry.js';

/** A free-text note attached to a person. */
export class Note extends StructuredObject {
  static readonly schema = buildKindSchema(
    {
      kind: 'Note',
      idField: 'id',
      prefix: 'note',
      shared: ['category', 'contactHistory', 'createdDate', 'isViewRestricted', 'text'],
    },
    sharedFields,
  );

  get text(): string | undefined {
    return this.readString('text');
  }
}
