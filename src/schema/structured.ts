import { ArgumentError } from '../error/argumentError.js';
import { SchemaError } from '../error/schemaError.js';
import { UnknownFieldError } from '../error/unknownFieldError.js';
import { prefixName, toSnake } from '../utils/caseConversion.js';
import { AliasTable } from './aliasTable.js';
import { type FieldDescriptor, STRUCTURED, formatValue, isMapping, typeName } from './field.js';
import { EMPTY_REGISTRY, type SchemaRegistry } from './registry.js';

/** Positional constructor argument: a number sets the id field, a string the name field. */
export type KindKey = number | string;

/** Caller-supplied fields, keyed by any name the kind answers to. */
export type FieldInput = Readonly<Record<string, unknown>>;

/** Any class, abstract or not, producing `T`. */
export type Constructor<T> = abstract new (...args: never[]) => T;

/** A concrete structured kind: constructible, with its schema attached. */
export interface KindClass<T extends StructuredObject = StructuredObject> {
  readonly schema: KindSchema;
  new (keyOrFields?: KindKey | FieldInput | null, fields?: FieldInput): T;
}

/** What a kind declares about its fields. */
export interface KindDeclaration {
  /** Kind name, used in messages and `toString()`. */
  kind: string;
  /** Schema of the parent kind, whose fields are inherited. */
  base?: KindSchema;
  /** Field a positional number fills. */
  idField?: string;
  /** Field a positional string fills. */
  nameField?: string;
  /** Prefix applied to the `prefixed` fields and the id field. */
  prefix?: string;
  /** Fields stored under `prefix + UpperFirst(name)`. */
  prefixed?: Iterable<string>;
  /** Fields taken from the registry as they are. */
  shared?: Iterable<string>;
  /** Fields declared on the kind itself. */
  fields?: Readonly<Record<string, FieldDescriptor>>;
}

/** The assembled field layout of one kind. */
export class KindSchema {
  constructor(
    readonly kind: string,
    readonly table: AliasTable,
    readonly idField?: string,
    readonly nameField?: string,
  ) {}
}

/**
 * Assembles a kind's fields, in ascending precedence: inherited fields, prefixed fields,
 * registry fields, inline fields.
 *
 * With a prefix the id field is prefixed too; otherwise it comes from the registry unless
 * declared inline. The name field comes from the registry unless declared inline or prefixed.
 *
 * @throws SchemaError on a conflicting or unknown declaration.
 */
export function buildKindSchema(declaration: KindDeclaration, registry: SchemaRegistry = EMPTY_REGISTRY): KindSchema {
  const { kind, base, prefix } = declaration;
  const fields = new Map<string, FieldDescriptor>(base?.table.entries() ?? []);
  const inline = new Map(Object.entries(declaration.fields ?? {}));
  const prefixed = new Set(declaration.prefixed ?? []);
  const shared = new Set(declaration.shared ?? []);
  let idField = declaration.idField ?? base?.idField;
  let nameField = declaration.nameField ?? base?.nameField;

  if (declaration.idField !== undefined) {
    if (prefix !== undefined) {
      prefixed.add(declaration.idField);
    } else if (!inline.has(declaration.idField)) {
      shared.add(declaration.idField);
    }
  }

  if (declaration.nameField !== undefined && !inline.has(declaration.nameField) && !prefixed.has(declaration.nameField)) {
    shared.add(declaration.nameField);
  }

  if (prefixed.size > 0 && prefix === undefined) {
    throw new SchemaError(`${kind} declares prefixed fields without a prefix`);
  }

  for (const name of prefixed) {
    const full = prefixName(prefix ?? '', name);
    if (shared.has(full)) {
      throw new SchemaError(`${full} of ${kind} is both a prefixed and a shared field`);
    }

    const source = inline.get(name) ?? registry.get(name);
    inline.delete(name);
    fields.set(full, source.withAliases([name, toSnake(name), toSnake(full)]));

    if (name === declaration.idField) {
      idField = full;
    }

    if (name === declaration.nameField) {
      nameField = full;
    }
  }

  for (const name of shared) {
    fields.set(name, registry.get(name));
  }

  for (const [name, field] of inline) {
    if (fields.has(name)) {
      throw new SchemaError(`Field ${name} of ${kind} supplied both inline and through shared or inherited fields`);
    }

    fields.set(name, field);
  }

  return new KindSchema(kind, new AliasTable(kind, fields), idField, nameField);
}

/**
 * Deep equality over stored values: primitives by identity, lists element-wise,
 * mappings key-wise, structured objects through {@link StructuredObject.equals}.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }

  if (a instanceof StructuredObject) {
    return a.equals(b);
  }

  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((element, i) => deepEqual(element, b[i]));
  }

  if (isMapping(a) && isMapping(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * A record of a remote kind, stored under canonical field names.
 *
 * Subclasses attach their layout as `static readonly schema = buildKindSchema(...)` and
 * expose typed getters built on the `read*` helpers. Fields can be supplied under any
 * name the kind answers to; they are always stored and serialized under the canonical one.
 *
 * @example
 * class Person extends StructuredObject {
 *   static readonly schema = buildKindSchema({ kind: 'Person', idField: 'id', prefix: 'van', shared: ['firstName'] }, registry);
 * }
 *
 * new Person(3, { first: 'Ada' }).toString(); // 'Person(vanId=3, firstName=Ada)'
 */
export abstract class StructuredObject implements Iterable<[string, unknown]> {
  /** Schema of the kind; replaced by every subclass. */
  static readonly schema: KindSchema = new KindSchema('StructuredObject', new AliasTable('StructuredObject', []));

  readonly [STRUCTURED] = true as const;
  readonly #schema: KindSchema;
  readonly #values = new Map<string, unknown>();

  /**
   * @param keyOrFields - Id (number), name (string) or a mapping of fields.
   * @param fields - Further fields, when the first argument is a key.
   * @throws UnknownFieldError listing every unrecognized name.
   * @throws ArgumentError when two names for one field carry different values.
   * @throws TypeError for a key the kind cannot take or a badly shaped value.
   */
  constructor(keyOrFields?: KindKey | FieldInput | null, fields?: FieldInput) {
    this.#schema = new.target.schema;

    const entries: Array<[string, unknown]> = [];
    if (typeof keyOrFields === 'number' || typeof keyOrFields === 'string') {
      entries.push([this.#positional(keyOrFields), keyOrFields]);
    } else if (isMapping(keyOrFields)) {
      entries.push(...Object.entries(keyOrFields));
    } else if (keyOrFields !== null && keyOrFields !== undefined) {
      throw new TypeError(`Cannot build ${this.#schema.kind} from ${typeName(keyOrFields)}: ${formatValue(keyOrFields)}`);
    }

    if (fields) {
      entries.push(...Object.entries(fields));
    }

    this.#assign(entries);
  }

  /** Builds an instance of the calling kind from a mapping. */
  static fromMapping<T extends StructuredObject>(this: KindClass<T>, mapping: FieldInput): T {
    return new this(mapping);
  }

  /** Name of the kind. */
  get kind(): string {
    return this.#schema.kind;
  }

  /** Value of the id field, when the kind has one. */
  get id(): number | undefined {
    const field = this.#schema.idField;
    return field === undefined ? undefined : this.readNumber(field);
  }

  /** Value of the name field, when the kind has one. */
  get name(): string | undefined {
    const field = this.#schema.nameField;
    return field === undefined ? undefined : this.readString(field);
  }

  /** Number of fields holding a value. */
  get size(): number {
    return this.#values.size;
  }

  /**
   * Reads a field by any of its names.
   *
   * @returns The stored value, or `undefined` when the field is declared but absent.
   * @throws UnknownFieldError for a name the kind does not answer to.
   * @throws ArgumentError when read through a singular alias.
   */
  get(alias: string): unknown {
    const canonical = this.#schema.table.resolve(alias);
    if (this.#schema.table.descriptor(canonical).singular === alias) {
      throw new ArgumentError(
        `Singular aliases may only be used to set values, not get them (tried getting ${canonical} with ${alias})`,
      );
    }

    return this.#values.get(canonical);
  }

  /** Writes a field by any of its names; `null` or `undefined` removes it. */
  set(alias: string, value: unknown): this {
    const canonical = this.#schema.table.resolve(alias);
    if (value === null || value === undefined) {
      this.#values.delete(canonical);
      return this;
    }

    this.#values.set(canonical, this.#schema.table.descriptor(canonical).resolveValue(alias, value));
    return this;
  }

  /**
   * Removes a field by any of its names.
   *
   * @returns Whether a value was removed.
   * @throws UnknownFieldError
   */
  delete(alias: string): boolean {
    return this.#values.delete(this.#schema.table.resolve(alias));
  }

  /** Whether a value is present under the field `alias` names. Unknown names give `false`. */
  has(alias: string): boolean {
    const canonical = this.#schema.table.tryResolve(alias);
    return canonical !== undefined && this.#values.has(canonical);
  }

  keys(): IterableIterator<string> {
    return this.#values.keys();
  }

  values(): IterableIterator<unknown> {
    return this.#values.values();
  }

  entries(): IterableIterator<[string, unknown]> {
    return this.#values.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.entries();
  }

  /** Same concrete kind and deeply equal fields. */
  equals(other: unknown): boolean {
    if (!(other instanceof StructuredObject) || Object.getPrototypeOf(other) !== Object.getPrototypeOf(this)) {
      return false;
    }

    if (other.size !== this.size) {
      return false;
    }

    for (const [key, value] of this.#values) {
      if (!other.#values.has(key) || !deepEqual(value, other.#values.get(key))) {
        return false;
      }
    }

    return true;
  }

  /** Canonical plain object, as sent over the wire. */
  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.#values);
  }

  toString(): string {
    const fields = [...this.#values].map(([key, value]) => `${key}=${formatValue(value)}`);
    return `${this.#schema.kind}(${fields.join(', ')})`;
  }

  protected readString(alias: string): string | undefined {
    return this.#read(alias, 'string', (value): value is string => typeof value === 'string');
  }

  protected readNumber(alias: string): number | undefined {
    return this.#read(alias, 'number', (value): value is number => typeof value === 'number');
  }

  protected readBoolean(alias: string): boolean | undefined {
    return this.#read(alias, 'boolean', (value): value is boolean => typeof value === 'boolean');
  }

  protected readKind<T extends StructuredObject>(alias: string, kind: Constructor<T>): T | undefined {
    return this.#read(alias, kind.name, (value): value is T => value instanceof kind);
  }

  protected readKindList<T extends StructuredObject>(alias: string, kind: Constructor<T>): readonly T[] | undefined {
    return this.#read(
      alias,
      `${kind.name}[]`,
      (value): value is T[] => Array.isArray(value) && value.every((element) => element instanceof kind),
    );
  }

  #read<T>(alias: string, expected: string, guard: (value: unknown) => value is T): T | undefined {
    const value = this.get(alias);
    if (value === undefined) {
      return undefined;
    }

    if (!guard(value)) {
      throw new TypeError(`Expected ${expected} for ${this.#schema.kind}.${alias}, got ${typeName(value)}: ${formatValue(value)}`);
    }

    return value;
  }

  #positional(key: KindKey): string {
    const field = typeof key === 'number' ? this.#schema.idField : this.#schema.nameField;
    if (field === undefined) {
      throw new TypeError(`${this.#schema.kind} cannot be built from ${typeName(key)} ${key}`);
    }

    return field;
  }

  #assign(entries: ReadonlyArray<readonly [string, unknown]>): void {
    const table = this.#schema.table;
    const given = new Map<string, string>();
    const unrecognized: string[] = [];

    for (const [alias, raw] of entries) {
      if (raw === null || raw === undefined) {
        continue;
      }

      const canonical = table.tryResolve(alias);
      if (canonical === undefined) {
        unrecognized.push(alias);
        continue;
      }

      const value = table.descriptor(canonical).resolveValue(alias, raw);
      const previousAlias = given.get(canonical);
      if (previousAlias !== undefined && !deepEqual(this.#values.get(canonical), value)) {
        throw new ArgumentError(
          `Multiple aliases with different values given for ${canonical}: ` +
            `${previousAlias}=${formatValue(this.#values.get(canonical))}, ${alias}=${formatValue(value)}`,
        );
      }

      given.set(canonical, alias);
      this.#values.set(canonical, value);
    }

    if (unrecognized.length > 0) {
      const subject = unrecognized.length === 1 ? 'field is' : 'fields are';
      throw new UnknownFieldError(
        unrecognized.join(', '),
        this.#schema.kind,
        `The following ${subject} unrecognized for ${this.#schema.kind}: ${unrecognized.join(', ')}`,
      );
    }
  }
}
