import { ArgumentError } from '../error/argumentError.js';
import { SchemaError } from '../error/schemaError.js';
import { toSnake } from '../utils/caseConversion.js';
import type { KindClass } from './structured.js';

/** Brand carried by every structured object, so field code can recognize one without importing its class. */
export const STRUCTURED: unique symbol = Symbol('votebridge.structured');

/** Anything carrying the {@link STRUCTURED} brand. */
export interface Branded {
  readonly [STRUCTURED]: true;
}

/** Whether `value` is a structured object. */
export function isStructured(value: unknown): value is Branded {
  return typeof value === 'object' && value !== null && STRUCTURED in value;
}

/** Whether `value` is a plain key/value mapping (not an array, not a structured object). */
export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(STRUCTURED in value);
}

/** Short name of a value's type, for error messages. */
export function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  return Array.isArray(value) ? 'array' : typeof value;
}

/** Renders a value for messages and `toString()`: strings bare, lists bracketed, mappings as JSON. */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return `[${value.map(formatValue).join(', ')}]`;
  }

  if (isMapping(value)) {
    return JSON.stringify(value);
  }

  return String(value);
}

/** Options for a {@link FieldDescriptor}. */
export interface FieldOptions {
  /** Alternate names callers may use for the field. */
  aliases?: Iterable<string>;
  /** The field holds a list. */
  repeated?: boolean;
  /** Alias that accepts one element and stores it as a one-element list. Implies `repeated`. */
  singular?: string;
  /** Structured kind the value (or each element) is built into. */
  kind?: KindClass;
  /** Conversion applied to the value (or each element). Exclusive with `kind`. */
  factory?: (value: unknown) => unknown;
}

/**
 * Describes one field of a remote object: the names it answers to, whether it is a list,
 * and how raw values are turned into stored values.
 *
 * Descriptors are immutable; {@link FieldDescriptor.withAliases} returns a copy.
 */
export class FieldDescriptor {
  /** Alternate names callers may use for the field. */
  readonly aliases: ReadonlySet<string>;
  /** The field holds a list. */
  readonly repeated: boolean;
  /** Write-only alias taking a single element. */
  readonly singular: string | undefined;
  /** Structured kind values are built into. */
  readonly kind: KindClass | undefined;
  /** Conversion applied to values. */
  readonly factory: ((value: unknown) => unknown) | undefined;

  constructor({ aliases = [], repeated = false, singular, kind, factory }: FieldOptions = {}) {
    if (kind && factory) {
      throw new SchemaError(`A field may declare a kind or a factory, not both (kind ${kind.schema.kind})`);
    }

    this.aliases = new Set(aliases);
    this.repeated = repeated || singular !== undefined;
    this.singular = singular;
    this.kind = kind;
    this.factory = factory;
  }

  /** Shorthand for a plain field known under the given aliases. */
  static of(...aliases: string[]): FieldDescriptor {
    return new FieldDescriptor({ aliases });
  }

  /** A copy of this descriptor answering to the additional aliases as well. */
  withAliases(extra: Iterable<string>): FieldDescriptor {
    return new FieldDescriptor({
      aliases: [...this.aliases, ...extra],
      repeated: this.repeated,
      singular: this.singular,
      kind: this.kind,
      factory: this.factory,
    });
  }

  /** Structural equality. */
  equals(other: FieldDescriptor): boolean {
    return (
      this.repeated === other.repeated &&
      this.singular === other.singular &&
      this.kind === other.kind &&
      this.factory === other.factory &&
      this.aliases.size === other.aliases.size &&
      [...this.aliases].every((alias) => other.aliases.has(alias))
    );
  }

  /** Every name the field answers to when stored under `canonical`, canonical name first. */
  names(canonical: string): string[] {
    const names = new Set([canonical, toSnake(canonical), ...this.aliases]);
    if (this.singular !== undefined) {
      names.add(this.singular);
    }

    return [...names];
  }

  /**
   * Turns a raw value supplied under `aliasUsed` into the value to store.
   *
   * `null` and `undefined` come back unchanged. A value given through the singular alias
   * is wrapped in a one-element list; any other value of a repeated field must be an array.
   *
   * @throws TypeError when a repeated field gets something other than an array.
   */
  resolveValue(aliasUsed: string, raw: unknown): unknown {
    if (raw === null || raw === undefined) {
      return raw;
    }

    if (!this.repeated) {
      return this.#create(raw);
    }

    if (aliasUsed === this.singular) {
      return [this.#create(raw)];
    }

    if (!Array.isArray(raw)) {
      throw new TypeError(`Expected array for "${aliasUsed}", got ${typeName(raw)}: ${formatValue(raw)}`);
    }

    return raw.map((element) => this.#create(element));
  }

  /**
   * Finds this field's value in `container` under any of its names.
   *
   * @param canonical - The name the field is stored under.
   * @param container - Caller-supplied fields, keyed by any name.
   * @param pop - Remove the matched key from `container`.
   * @returns The resolved value, or `undefined` when no name is present.
   * @throws ArgumentError when more than one name is present.
   */
  find(canonical: string, container: Record<string, unknown>, pop = false): unknown {
    let found: { alias: string; value: unknown } | undefined;

    for (const alias of this.names(canonical)) {
      const value = container[alias];
      if (value === null || value === undefined) {
        continue;
      }

      if (found) {
        throw new ArgumentError(`Found multiple aliases for ${canonical} in ${formatValue(container)}`);
      }

      found = { alias, value };
    }

    if (!found) {
      return undefined;
    }

    if (pop) {
      delete container[found.alias];
    }

    return this.resolveValue(found.alias, found.value);
  }

  /** Builds one element. Structured objects are never rebuilt. */
  #create(value: unknown): unknown {
    if (isStructured(value)) {
      return value;
    }

    if (this.factory) {
      return this.factory(value);
    }

    if (!this.kind) {
      return value;
    }

    if (isMapping(value) || typeof value === 'number' || typeof value === 'string') {
      return new this.kind(value);
    }

    throw new TypeError(`Cannot build ${this.kind.schema.kind} from ${typeName(value)}: ${formatValue(value)}`);
  }
}
