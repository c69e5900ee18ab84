/**
 * Calendar date field.
 *
 * @packageDocumentation
 */

import { DefinitionError } from '../definition/errors.js';
import { describeCommon, missing, readBoolean, readString } from './settings.js';
import type { FieldDeclaration, FieldSettings, FieldType } from './types.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Checks that text is a `YYYY-MM-DD` date that exists on the calendar.
 */
export function isCalendarDate(text: string): boolean {
  const match = DATE_PATTERN.exec(text);
  if (match === null) {
    return false;
  }
  const [, year = '', month = '', day = ''] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

export interface DateSettings extends FieldSettings {
  readonly min: string | undefined;
  readonly max: string | undefined;
}

function readBound(declaration: FieldDeclaration, key: string): string | undefined {
  const bound = readString(declaration, key);
  if (bound !== undefined && !isCalendarDate(bound)) {
    throw new DefinitionError(`Expected a YYYY-MM-DD date, got '${bound}'`, key);
  }
  return bound;
}

/**
 * `type = "date"`: a `YYYY-MM-DD` calendar date. Bounds are inclusive.
 */
export const dateField: FieldType<DateSettings> = {
  name: 'date',
  settingKeys: ['optional', 'min', 'max'],

  configure(declaration) {
    const min = readBound(declaration, 'min');
    const max = readBound(declaration, 'max');
    if (min !== undefined && max !== undefined && min > max) {
      throw new DefinitionError(`min (${min}) is after max (${max})`, 'min');
    }
    return { optional: readBoolean(declaration, 'optional', false), min, max };
  },

  validate(raw, field) {
    const { settings } = field;
    if (raw === undefined || raw === null) {
      return missing(settings);
    }
    if (typeof raw !== 'string') {
      return { valid: false, reason: 'Must be a date (YYYY-MM-DD)' };
    }
    const value = raw.trim();
    if (value.length === 0) {
      return missing(settings);
    }
    if (!isCalendarDate(value)) {
      return { valid: false, reason: 'Must be a date (YYYY-MM-DD)' };
    }
    // Fixed-width ISO dates order lexicographically.
    if (settings.min !== undefined && value < settings.min) {
      return { valid: false, reason: `Must be on or after ${settings.min}` };
    }
    if (settings.max !== undefined && value > settings.max) {
      return { valid: false, reason: `Must be on or before ${settings.max}` };
    }
    return { valid: true, value };
  },

  describe(field, context) {
    const { settings } = field;
    return {
      ...describeCommon(field, context),
      constraints: {
        ...(settings.min !== undefined ? { min: settings.min } : {}),
        ...(settings.max !== undefined ? { max: settings.max } : {}),
      },
    };
  },
};
