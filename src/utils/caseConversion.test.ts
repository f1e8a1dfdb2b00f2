import { describe, expect, it } from 'vitest';
import { prefixName, toSnake } from './caseConversion.js';

describe('toSnake', () => {
  it('snake cases camel and upper cased names', () => {
    expect(toSnake('firstName')).toBe('first_name');
    expect(toSnake('zipOrPostalCode')).toBe('zip_or_postal_code');
    expect(toSnake('PhoneNumber')).toBe('phone_number');
  });

  it('keeps runs of capitals together', () => {
    expect(toSnake('vanID')).toBe('van_id');
  });

  it('leaves lowercase and empty names alone', () => {
    expect(toSnake('city')).toBe('city');
    expect(toSnake('')).toBe('');
  });
});

describe('prefixName', () => {
  it('capitalizes the name after the prefix', () => {
    expect(prefixName('van', 'id')).toBe('vanId');
    expect(prefixName('activistCode', 'typeAndName')).toBe('activistCodeTypeAndName');
  });

  it('returns the prefix for an empty name', () => {
    expect(prefixName('phone', '')).toBe('phone');
  });
});
