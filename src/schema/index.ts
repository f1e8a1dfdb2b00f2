/**
 * Field aliasing: descriptors, alias tables, the shared registry and structured kinds.
 * @module
 */
export { AliasTable } from './aliasTable.js';
export { FieldDescriptor, STRUCTURED, formatValue, isMapping, isStructured, typeName } from './field.js';
export type { Branded, FieldOptions } from './field.js';
export { EMPTY_REGISTRY, SchemaRegistry } from './registry.js';
export { KindSchema, StructuredObject, buildKindSchema, deepEqual } from './structured.js';
export type { Constructor, FieldInput, KindClass, KindDeclaration, KindKey } from './structured.js';
