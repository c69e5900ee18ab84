import { describe, expect, it } from 'vitest';
import { createDefaultFieldTypeRegistry, REQUIRED_MESSAGE } from './index.js';

const registry = createDefaultFieldTypeRegistry();

describe('text field', () => {
  const name = registry.configure('registration.first_name', { type: 'text', label: 'First Name' });

  it('should trim input', () => {
    expect(name.validate('  Ada  ')).toEqual({ valid: true, value: 'Ada' });
  });

  it('should treat blank input as missing', () => {
    expect(name.validate('   ')).toEqual({ valid: false, reason: REQUIRED_MESSAGE });
    expect(name.validate(undefined)).toEqual({ valid: false, reason: REQUIRED_MESSAGE });
  });

  it('should normalize missing optional input to null', () => {
    const nickname = registry.configure('nickname', { type: 'text', optional: true });
    expect(nickname.validate('')).toEqual({ valid: true, value: null });
    expect(nickname.optional).toBe(true);
  });

  it('should reject non-strings', () => {
    expect(name.validate(42)).toEqual({ valid: false, reason: 'Expected text' });
  });

  it('should enforce the default length bound of 300', () => {
    expect(name.validate('x'.repeat(300)).valid).toBe(true);
    expect(name.validate('x'.repeat(301))).toEqual({
      valid: false,
      reason: 'Must be at most 300 characters',
    });
  });

  it('should enforce custom length bounds', () => {
    const code = registry.configure('code', { type: 'text', min_length: 4, max_length: 6 });
    expect(code.validate('abc')).toEqual({ valid: false, reason: 'Must be at least 4 characters' });
    expect(code.validate('abcd')).toEqual({ valid: true, value: 'abcd' });
  });

  it('should check email syntax', () => {
    const email = registry.configure('registration.email', { type: 'text', format: 'email' });
    expect(email.validate('ada@example.org')).toEqual({ valid: true, value: 'ada@example.org' });
    expect(email.validate('not-an-email')).toEqual({ valid: false, reason: 'Invalid email' });
    expect(email.validate('a b@example.org')).toEqual({ valid: false, reason: 'Invalid email' });
  });

  it('should check patterns', () => {
    const postcode = registry.configure('postcode', { type: 'text', pattern: '^[0-9]{5}$' });
    expect(postcode.validate('12345')).toEqual({ valid: true, value: '12345' });
    expect(postcode.validate('1234a')).toEqual({ valid: false, reason: 'Invalid format' });
  });

  it('should reject bad configuration', () => {
    expect(() => registry.configure('x', { type: 'text', format: 'phone' })).toThrow(
      "format: Unsupported format 'phone'"
    );
    expect(() => registry.configure('x', { type: 'text', pattern: '(' })).toThrow(
      "pattern: Invalid pattern '('"
    );
    expect(() => registry.configure('x', { type: 'text', min_length: 5, max_length: 2 })).toThrow(
      'min_length (5) exceeds max_length (2)'
    );
    expect(() => registry.configure('x', { type: 'text', optional: 'yes' })).toThrow(
      'optional: Expected a boolean, got string'
    );
  });

  it('should describe constraints', () => {
    const email = registry.configure('registration.email', {
      type: 'text',
      format: 'email',
      label: 'Email for {{ registration.first_name }}',
    });
    expect(email.describe({ registration: { first_name: 'Ada' } })).toEqual({
      path: 'registration.email',
      type: 'text',
      label: 'Email for Ada',
      optional: false,
      constraints: { min_length: 1, max_length: 300, format: 'email' },
    });
  });
});
