import { describe, expect, it } from 'vitest';
import { createDefaultFieldTypeRegistry, REQUIRED_MESSAGE } from './index.js';

const registry = createDefaultFieldTypeRegistry();

describe('number field', () => {
  const guests = registry.configure('guests', { type: 'number', min: 0, max: 4, integer: true });

  it('should accept numbers and numeric text', () => {
    expect(guests.validate(2)).toEqual({ valid: true, value: 2 });
    expect(guests.validate(' 3 ')).toEqual({ valid: true, value: 3 });
  });

  it('should reject non-numeric input', () => {
    expect(guests.validate('two')).toEqual({ valid: false, reason: 'Must be a number' });
    expect(guests.validate('0x10')).toEqual({ valid: false, reason: 'Must be a number' });
    expect(guests.validate(true)).toEqual({ valid: false, reason: 'Must be a number' });
    expect(guests.validate(Number.POSITIVE_INFINITY)).toEqual({
      valid: false,
      reason: 'Must be a number',
    });
  });

  it('should enforce integer and bounds', () => {
    expect(guests.validate(1.5)).toEqual({ valid: false, reason: 'Must be a whole number' });
    expect(guests.validate(-1)).toEqual({ valid: false, reason: 'Must be at least 0' });
    expect(guests.validate('5')).toEqual({ valid: false, reason: 'Must be at most 4' });
  });

  it('should handle missing input', () => {
    expect(guests.validate('')).toEqual({ valid: false, reason: REQUIRED_MESSAGE });
    const donation = registry.configure('donation', { type: 'number', optional: true });
    expect(donation.validate(null)).toEqual({ valid: true, value: null });
    expect(donation.validate('12.50')).toEqual({ valid: true, value: 12.5 });
  });

  it('should reject inverted bounds', () => {
    expect(() => registry.configure('x', { type: 'number', min: 5, max: 1 })).toThrow(
      'min (5) exceeds max (1)'
    );
  });

  it('should describe constraints', () => {
    expect(guests.describe({}).constraints).toEqual({ integer: true, min: 0, max: 4 });
  });
});
