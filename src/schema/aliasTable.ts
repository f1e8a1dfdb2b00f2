import { ArgumentError } from '../error/argumentError.js';
import { UnknownFieldError } from '../error/unknownFieldError.js';
import { toSnake } from '../utils/caseConversion.js';
import { type FieldDescriptor, formatValue } from './field.js';

/** One resolved name. */
interface Entry {
  readonly name: string;
  readonly field: FieldDescriptor;
}

/**
 * Maps every name a set of fields answers to onto the field's canonical name.
 *
 * For each field the canonical name, its aliases, its singular alias and the snake_case
 * form of the canonical name all resolve to it. When two fields claim the same name the
 * later one wins, so builders add fields in ascending precedence.
 */
export class AliasTable {
  /** Kind or endpoint the table belongs to, used in messages. */
  readonly owner: string;
  /** Canonical name -> descriptor, in insertion order. */
  readonly #fields: ReadonlyMap<string, FieldDescriptor>;
  /** Any name -> canonical entry. */
  readonly #names: ReadonlyMap<string, Entry>;

  constructor(owner: string, fields: Iterable<readonly [string, FieldDescriptor]>) {
    const byName = new Map<string, FieldDescriptor>(fields);
    const names = new Map<string, Entry>();

    for (const [name, field] of byName) {
      const entry = { name, field };
      names.set(name, entry);
      for (const alias of field.aliases) {
        names.set(alias, entry);
      }

      if (field.singular !== undefined) {
        names.set(field.singular, entry);
      }

      names.set(toSnake(name), entry);
    }

    this.owner = owner;
    this.#fields = byName;
    this.#names = names;
  }

  /** Number of canonical fields. */
  get size(): number {
    return this.#fields.size;
  }

  /** Canonical names, in insertion order. */
  fieldNames(): string[] {
    return [...this.#fields.keys()];
  }

  /** Canonical name / descriptor pairs, in insertion order. */
  entries(): IterableIterator<[string, FieldDescriptor]> {
    return this.#fields.entries();
  }

  /** Whether `canonical` is one of the table's canonical names. */
  hasField(canonical: string): boolean {
    return this.#fields.has(canonical);
  }

  /** Whether `alias` resolves to any field. */
  has(alias: string): boolean {
    return this.#names.has(alias);
  }

  /** The canonical name for `alias`, or `undefined`. */
  tryResolve(alias: string): string | undefined {
    return this.#names.get(alias)?.name;
  }

  /**
   * The canonical name for `alias`.
   *
   * @throws UnknownFieldError
   */
  resolve(alias: string): string {
    return this.#lookup(alias).name;
  }

  /**
   * The descriptor of the field `alias` resolves to.
   *
   * @throws UnknownFieldError
   */
  descriptor(alias: string): FieldDescriptor {
    return this.#lookup(alias).field;
  }

  /**
   * Normalizes caller-supplied fields into a mapping keyed by canonical names, with every
   * value resolved through its descriptor.
   *
   * `undefined` values count as not supplied; `null` is kept.
   *
   * @throws UnknownFieldError for a name no field answers to.
   * @throws ArgumentError when two names for the same field are supplied.
   */
  process(fields: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [alias, value] of Object.entries(fields)) {
      if (value === undefined) {
        continue;
      }

      const { name, field } = this.#lookup(alias);
      if (Object.hasOwn(result, name)) {
        throw new ArgumentError(`Multiple aliases for "${name}" given in ${formatValue(fields)}`);
      }

      result[name] = field.resolveValue(alias, value);
    }

    return result;
  }

  #lookup(alias: string): Entry {
    const entry = this.#names.get(alias);
    if (!entry) {
      throw new UnknownFieldError(alias, this.owner);
    }

    return entry;
  }
}
