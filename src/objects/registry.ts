import { z } from 'zod';
import { SchemaError } from '../error/schemaError.js';
import { FieldDescriptor } from '../schema/field.js';
import { SchemaRegistry } from '../schema/registry.js';
import { validatorSync } from '../utils/validator.js';
import fieldTable from './fields.json' with { type: 'json' };

/** An entry of `fields.json`: the aliases of a scalar field, or the shape of a list field. */
const fieldEntrySchema = z.union([
  z.array(z.string()),
  z.object({
    aliases: z.array(z.string()),
    singular: z.string().optional(),
    repeated: z.boolean().optional(),
  }),
]);

const fieldTableSchema = z.record(z.string(), fieldEntrySchema);

/** Joins a list of expansion names into the comma-separated form the API takes. */
function joinExpand(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value) && value.every((name) => typeof name === 'string')) {
    return value.join(',');
  }

  throw new TypeError(`Expected string or list of strings for expand, got ${JSON.stringify(value)}`);
}

/**
 * Fields shared by every kind and endpoint of the API.
 *
 * Plain fields come from `fields.json`; fields holding other kinds are registered by the
 * module declaring that kind, and the registry is frozen once all of them are loaded.
 */
export const sharedFields = new SchemaRegistry();

const [errTable, plainFields] = validatorSync(fieldTable, fieldTableSchema);
if (errTable) {
  throw new SchemaError('error reading the shared field table', { cause: errTable });
}

for (const [name, entry] of Object.entries(plainFields)) {
  sharedFields.register(name, new FieldDescriptor(Array.isArray(entry) ? { aliases: entry } : entry));
}

sharedFields.register('expand', new FieldDescriptor({ aliases: ['$expand'], factory: joinExpand }));
