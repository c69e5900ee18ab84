import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { DefinitionError } from '../definition/errors.js';
import { createDefaultFieldTypeRegistry, REQUIRED_MESSAGE } from './index.js';

const registry = createDefaultFieldTypeRegistry();

const level = registry.configure('level', {
  type: 'select',
  label: 'Registration Level',
  min: 1,
  max: 1,
  options: [
    { label: 'Basic', value: 'basic', default: true },
    { label: 'Sponsor', value: 'sponsor' },
  ],
});

const extras = registry.configure('extras', {
  type: 'select',
  min: 0,
  max: 2,
  options: [{ value: 'shirt' }, { value: 'dinner' }, { value: 'parking' }],
});

describe('select field', () => {
  describe('configure', () => {
    it('should default to min 0, max 1', () => {
      const checkbox = registry.configure('use_preferred_name', {
        type: 'select',
        component: 'checkbox',
        options: [{ label: 'I prefer to go by a different name', value: true }],
      });
      expect(checkbox.optional).toBe(true);
      expect(checkbox.validate(undefined)).toEqual({ valid: true, value: null });
      expect(checkbox.validate(true)).toEqual({ valid: true, value: true });
    });

    it('should reject duplicate option values', () => {
      expect(() =>
        registry.configure('x', { type: 'select', options: [{ value: 1 }, { value: 1 }] })
      ).toThrow(DefinitionError);
    });

    it('should reject inconsistent bounds', () => {
      expect(() =>
        registry.configure('x', { type: 'select', min: 2, max: 1, options: [{ value: 1 }] })
      ).toThrow('min (2) exceeds max (1)');
      expect(() =>
        registry.configure('x', { type: 'select', min: 2, max: 3, options: [{ value: 1 }] })
      ).toThrow('min (2) exceeds the number of options (1)');
      expect(() =>
        registry.configure('x', { type: 'select', max: 0, options: [{ value: 1 }] })
      ).toThrow('max must be at least 1');
    });

    it('should require options', () => {
      expect(() => registry.configure('x', { type: 'select', options: [] })).toThrow(
        'options: Expected a non-empty list of options'
      );
    });

    it('should locate bad options', () => {
      try {
        registry.configure('x', { type: 'select', options: [{ value: 1 }, { label: 'no value' }] });
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(DefinitionError);
        if (error instanceof DefinitionError) {
          expect(error.location).toBe('options[1]');
        }
      }
    });

    it('should reject the optional setting', () => {
      expect(() =>
        registry.configure('x', { type: 'select', optional: true, options: [{ value: 1 }] })
      ).toThrow('optional: Unknown setting for a select field');
    });
  });

  describe('single choice', () => {
    it('should yield the selected value as a scalar', () => {
      expect(level.validate('sponsor')).toEqual({ valid: true, value: 'sponsor' });
      expect(level.validate(['basic'])).toEqual({ valid: true, value: 'basic' });
    });

    it('should reject zero or two options when min=1,max=1', () => {
      expect(level.validate([])).toEqual({ valid: false, reason: REQUIRED_MESSAGE });
      expect(level.validate(undefined)).toEqual({ valid: false, reason: REQUIRED_MESSAGE });
      expect(level.validate(['basic', 'sponsor'])).toEqual({
        valid: false,
        reason: 'Choose at most 1',
      });
    });

    it('should reject unknown values', () => {
      expect(level.validate('gold')).toEqual({ valid: false, reason: 'Invalid selection' });
      expect(level.validate({ value: 'basic' })).toEqual({
        valid: false,
        reason: 'Invalid selection',
      });
    });

    it('should reject any selection count other than one', () => {
      fc.assert(
        fc.property(
          fc.subarray(['basic', 'sponsor'], { minLength: 0, maxLength: 2 }),
          (selection) => {
            expect(level.validate(selection).valid).toBe(selection.length === 1);
          }
        )
      );
    });
  });

  describe('multiple choice', () => {
    it('should keep declaration order', () => {
      expect(extras.validate(['parking', 'shirt'])).toEqual({
        valid: true,
        value: ['shirt', 'parking'],
      });
    });

    it('should accept no selection when min is 0', () => {
      expect(extras.validate(undefined)).toEqual({ valid: true, value: [] });
    });

    it('should reject repeated values', () => {
      expect(extras.validate(['shirt', 'shirt'])).toEqual({
        valid: false,
        reason: 'Duplicate selection',
      });
    });

    it('should enforce the upper bound', () => {
      expect(extras.validate(['shirt', 'dinner', 'parking'])).toEqual({
        valid: false,
        reason: 'Choose at most 2',
      });
    });

    it('should enforce a lower bound above one', () => {
      const pair = registry.configure('pair', {
        type: 'select',
        min: 2,
        max: 3,
        options: [{ value: 'a' }, { value: 'b' }, { value: 'c' }],
      });
      expect(pair.validate(['a'])).toEqual({ valid: false, reason: 'Choose at least 2' });
    });
  });

  describe('describe', () => {
    it('should describe options, bounds and defaults', () => {
      expect(level.describe({})).toEqual({
        path: 'level',
        type: 'select',
        label: 'Registration Level',
        optional: false,
        component: 'dropdown',
        default: 'basic',
        constraints: {
          min: 1,
          max: 1,
          options: [
            { value: 'basic', label: 'Basic' },
            { value: 'sponsor', label: 'Sponsor' },
          ],
        },
      });
    });

    it('should render templated option labels', () => {
      const field = registry.configure('plan', {
        type: 'select',
        options: [{ value: 'a', label: 'Keep {{ current }}' }],
      });
      const descriptor = field.describe({ current: 'Basic' });
      expect(descriptor.constraints['options']).toEqual([{ value: 'a', label: 'Keep Basic' }]);
      expect(field.templates()).toHaveLength(2);
    });

    it('should label options by value when no label is given', () => {
      expect(extras.describe({}).constraints['options']).toEqual([
        { value: 'shirt', label: 'shirt' },
        { value: 'dinner', label: 'dinner' },
        { value: 'parking', label: 'parking' },
      ]);
    });
  });
});
