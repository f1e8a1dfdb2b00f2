import { describe, expect, it } from 'vitest';
import { ArgumentError } from '../error/argumentError.js';
import { SchemaError } from '../error/schemaError.js';
import { FieldDescriptor, formatValue, isMapping, isStructured } from './field.js';
import { StructuredObject, buildKindSchema } from './structured.js';

class Thing extends StructuredObject {
  static readonly schema = buildKindSchema({ kind: 'Thing', idField: 'id', fields: { id: FieldDescriptor.of() } });
}

describe('FieldDescriptor', () => {
  it('answers to its canonical name, snake form, aliases and singular alias', () => {
    const field = new FieldDescriptor({ aliases: ['tag_list'], singular: 'tag' });

    expect(field.names('tagList')).toEqual(['tagList', 'tag_list', 'tag']);
  });

  it('treats a singular alias as making the field repeated', () => {
    expect(new FieldDescriptor({ singular: 'tag' }).repeated).toBe(true);
  });

  it('returns absent values unchanged', () => {
    const field = new FieldDescriptor({ repeated: true, factory: Number });

    expect(field.resolveValue('tags', null)).toBeNull();
    expect(field.resolveValue('tags', undefined)).toBeUndefined();
  });

  it('wraps a value given through the singular alias', () => {
    const field = new FieldDescriptor({ singular: 'tag' });

    expect(field.resolveValue('tag', 'x')).toEqual(['x']);
    expect(field.resolveValue('tags', ['x', 'y'])).toEqual(['x', 'y']);
  });

  it('rejects a non-array for a repeated field', () => {
    const field = new FieldDescriptor({ repeated: true });

    expect(() => field.resolveValue('tags', 5)).toThrow(TypeError);
    expect(() => field.resolveValue('tags', 5)).toThrow('Expected array for "tags", got number: 5');
  });

  it('runs the factory over every element', () => {
    const field = new FieldDescriptor({ repeated: true, factory: Number });

    expect(field.resolveValue('counts', ['1', '2'])).toEqual([1, 2]);
  });

  it('builds kinds from mappings and keys', () => {
    const field = new FieldDescriptor({ kind: Thing });

    const fromMapping = field.resolveValue('thing', { id: 4 });
    const fromKey = field.resolveValue('thing', 4);

    expect(fromMapping instanceof Thing && fromMapping.equals(new Thing(4))).toBe(true);
    expect(fromKey instanceof Thing && fromKey.id === 4).toBe(true);
  });

  it('keeps an already built object as it is', () => {
    const thing = new Thing(4);

    expect(new FieldDescriptor({ kind: Thing }).resolveValue('thing', thing)).toBe(thing);
  });

  it('rejects values a kind cannot be built from', () => {
    expect(() => new FieldDescriptor({ kind: Thing }).resolveValue('thing', true)).toThrow(
      'Cannot build Thing from boolean: true',
    );
  });

  it('refuses both a kind and a factory', () => {
    expect(() => new FieldDescriptor({ kind: Thing, factory: String })).toThrow(SchemaError);
  });

  it('copies itself with extra aliases', () => {
    const field = FieldDescriptor.of('first');
    const copy = field.withAliases(['given']);

    expect([...copy.aliases]).toEqual(['first', 'given']);
    expect([...field.aliases]).toEqual(['first']);
    expect(copy.equals(field)).toBe(false);
    expect(copy.equals(FieldDescriptor.of('given', 'first'))).toBe(true);
  });

  describe('find', () => {
    it('finds a value under any name', () => {
      const field = FieldDescriptor.of('first');

      expect(field.find('firstName', { first_name: 'Ada' })).toBe('Ada');
      expect(field.find('firstName', { last: 'Lovelace' })).toBeUndefined();
    });

    it('ignores null entries', () => {
      expect(FieldDescriptor.of('first').find('firstName', { firstName: null, first: 'Ada' })).toBe('Ada');
    });

    it('removes the matched key when popping', () => {
      const container: Record<string, unknown> = { first: 'Ada', last: 'Lovelace' };

      expect(FieldDescriptor.of('first').find('firstName', container, true)).toBe('Ada');
      expect(container).toEqual({ last: 'Lovelace' });
    });

    it('rejects several names for one field', () => {
      const field = FieldDescriptor.of('first');

      expect(() => field.find('firstName', { first: 'Ada', first_name: 'Bob' })).toThrow(ArgumentError);
      expect(() => field.find('firstName', { first: 'Ada', first_name: 'Bob' })).toThrow(
        'Found multiple aliases for firstName in {"first":"Ada","first_name":"Bob"}',
      );
    });

    it('resolves the found value', () => {
      expect(new FieldDescriptor({ singular: 'tag' }).find('tags', { tag: 'x' })).toEqual(['x']);
    });
  });
});

describe('formatValue', () => {
  it('renders strings bare, lists bracketed and mappings as JSON', () => {
    expect(formatValue('Ada')).toBe('Ada');
    expect(formatValue([1, 'a'])).toBe('[1, a]');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
    expect(formatValue(new Thing(2))).toBe('Thing(id=2)');
  });
});

describe('isMapping', () => {
  it('accepts plain objects only', () => {
    expect(isMapping({})).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping(new Thing(1))).toBe(false);
    expect(isStructured(new Thing(1))).toBe(true);
  });
});
