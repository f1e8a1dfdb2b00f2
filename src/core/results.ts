import { isMapping, typeName } from '../schema/field.js';
import type { KindClass, StructuredObject } from '../schema/structured.js';

/** How a response body is turned into a call's result. */
export type ResultKind = 'none' | 'single' | 'array' | 'paginated';

/** What result shaping knows about the call. */
export interface ShapeContext {
  /** Wire keys dropped from mapping payloads before they reach a factory. */
  readonly suppressKeys: readonly string[];
}

/** Builds one result value from one payload. May throw on a malformed payload. */
export type ElementFactory<T> = (value: unknown, ctx: ShapeContext) => T;

/**
 * Result mode of an endpoint.
 *
 * `shape` receives the response body, or for paginated endpoints the accumulated items.
 * `whenMissing`, when present, is the result of a 404 that carries no errors.
 */
export interface ResultMode<T> {
  readonly kind: ResultKind;
  shape(payload: unknown, ctx: ShapeContext): T;
  whenMissing?(): T;
}

/** Returns the payload as it is. */
export const identity: ElementFactory<unknown> = (value) => value;

/** Factory building `kind` from a mapping (minus the suppressed keys) or a key. */
export function fromKind<T extends StructuredObject>(kind: KindClass<T>): ElementFactory<T> {
  return (value, { suppressKeys }) => {
    if (isMapping(value)) {
      const fields = { ...value };
      for (const key of suppressKeys) {
        delete fields[key];
      }

      return new kind(fields);
    }

    if (typeof value === 'number' || typeof value === 'string') {
      return new kind(value);
    }

    throw new TypeError(`Cannot build ${kind.schema.kind} from response payload of type ${typeName(value)}`);
  };
}

function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new TypeError(`Expected ${what} to be an array, got ${typeName(value)}`);
  }

  return value;
}

function expectKey(value: unknown, key: string): unknown {
  if (!isMapping(value) || !Object.hasOwn(value, key)) {
    throw new TypeError(`Expected response body with "${key}", got ${typeName(value)}`);
  }

  return value[key];
}

/** The body is ignored and the call resolves to `undefined`. */
export function noResult(): ResultMode<undefined> {
  return { kind: 'none', shape: () => undefined };
}

/** The value under `key` of the body, optionally built by `factory`. */
export function resultKey(key: string): ResultMode<unknown>;
export function resultKey<T>(key: string, factory: ElementFactory<T>): ResultMode<T>;
export function resultKey(key: string, factory: ElementFactory<unknown> = identity): ResultMode<unknown> {
  return { kind: 'single', shape: (payload, ctx) => factory(expectKey(payload, key), ctx) };
}

/** The whole body built by `factory`. */
export function single<T>(factory: ElementFactory<T>): ResultMode<T> {
  return { kind: 'single', shape: factory };
}

/** Like {@link single}, but a 404 without errors resolves to `null`. */
export function singleOrNull<T>(factory: ElementFactory<T | null>): ResultMode<T | null> {
  return { kind: 'single', shape: factory, whenMissing: () => null };
}

/** The body is a list; every element built by `factory`. */
export function array<T>(factory: ElementFactory<T>): ResultMode<T[]> {
  return {
    kind: 'array',
    shape: (payload, ctx) => expectArray(payload, 'response body').map((item) => factory(item, ctx)),
  };
}

/** The list under `key` of the body; every element built by `factory`. */
export function keyedArray<T>(key: string, factory: ElementFactory<T>): ResultMode<T[]> {
  return {
    kind: 'array',
    shape: (payload, ctx) => expectArray(expectKey(payload, key), `"${key}"`).map((item) => factory(item, ctx)),
  };
}

/** Items of every page, followed through `nextPageLink`; every item built by `factory`. */
export function paginated<T>(factory: ElementFactory<T>): ResultMode<T[]> {
  return {
    kind: 'paginated',
    shape: (items, ctx) => expectArray(items, 'page items').map((item) => factory(item, ctx)),
  };
}
