import { SchemaError } from '../error/schemaError.js';
import type { FieldDescriptor } from './field.js';

/**
 * Table of reusable field descriptors shared between kind and endpoint declarations.
 *
 * Names are registered once. After {@link SchemaRegistry.freeze} the registry is read-only.
 */
export class SchemaRegistry {
  readonly #fields = new Map<string, FieldDescriptor>();
  #frozen = false;

  /** Whether the registry rejects further registrations. */
  get frozen(): boolean {
    return this.#frozen;
  }

  /** Registered names, in registration order. */
  names(): string[] {
    return [...this.#fields.keys()];
  }

  /** Whether `name` is registered. */
  has(name: string): boolean {
    return this.#fields.has(name);
  }

  /**
   * Registers one field.
   *
   * @throws SchemaError when `name` is taken or the registry is frozen.
   */
  register(name: string, field: FieldDescriptor): this {
    if (this.#frozen) {
      throw new SchemaError(`Cannot register ${name}: the registry is frozen`);
    }

    if (this.#fields.has(name)) {
      throw new SchemaError(`${name} is already a shared field`);
    }

    this.#fields.set(name, field);
    return this;
  }

  /** Registers several fields at once. */
  share(fields: Readonly<Record<string, FieldDescriptor>>): this {
    for (const [name, field] of Object.entries(fields)) {
      this.register(name, field);
    }

    return this;
  }

  /**
   * The descriptor registered under `name`.
   *
   * @throws SchemaError when nothing is registered under it.
   */
  get(name: string): FieldDescriptor {
    const field = this.#fields.get(name);
    if (!field) {
      throw new SchemaError(`${name} is not a shared field`);
    }

    return field;
  }

  /** Rejects all further registrations. */
  freeze(): this {
    this.#frozen = true;
    return this;
  }
}

/** Registry with nothing in it, for declarations that only use inline fields. */
export const EMPTY_REGISTRY = new SchemaRegistry().freeze();
