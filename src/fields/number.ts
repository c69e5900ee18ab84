import { DefinitionError } from '../definition/errors.js';
import { describeCommon, missing, readBoolean, readNumber } from './settings.js';
import type { FieldSettings, FieldType } from './types.js';

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface NumberSettings extends FieldSettings {
  readonly min: number | undefined;
  readonly max: number | undefined;
  readonly integer: boolean;
}

/**
 * `type = "number"`: a finite number, also accepted as numeric text.
 */
export const numberField: FieldType<NumberSettings> = {
  name: 'number',
  settingKeys: ['optional', 'min', 'max', 'integer'],

  configure(declaration) {
    const min = readNumber(declaration, 'min');
    const max = readNumber(declaration, 'max');
    if (min !== undefined && max !== undefined && min > max) {
      throw new DefinitionError(`min (${String(min)}) exceeds max (${String(max)})`, 'min');
    }
    return {
      optional: readBoolean(declaration, 'optional', false),
      min,
      max,
      integer: readBoolean(declaration, 'integer', false),
    };
  },

  validate(raw, field) {
    const { settings } = field;
    let value: number;
    if (raw === undefined || raw === null) {
      return missing(settings);
    }
    if (typeof raw === 'number') {
      value = raw;
    } else if (typeof raw === 'string') {
      const text = raw.trim();
      if (text.length === 0) {
        return missing(settings);
      }
      if (!NUMERIC_TEXT.test(text)) {
        return { valid: false, reason: 'Must be a number' };
      }
      value = Number(text);
    } else {
      return { valid: false, reason: 'Must be a number' };
    }

    if (!Number.isFinite(value)) {
      return { valid: false, reason: 'Must be a number' };
    }
    if (settings.integer && !Number.isInteger(value)) {
      return { valid: false, reason: 'Must be a whole number' };
    }
    if (settings.min !== undefined && value < settings.min) {
      return { valid: false, reason: `Must be at least ${String(settings.min)}` };
    }
    if (settings.max !== undefined && value > settings.max) {
      return { valid: false, reason: `Must be at most ${String(settings.max)}` };
    }
    return { valid: true, value };
  },

  describe(field, context) {
    const { settings } = field;
    return {
      ...describeCommon(field, context),
      constraints: {
        integer: settings.integer,
        ...(settings.min !== undefined ? { min: settings.min } : {}),
        ...(settings.max !== undefined ? { max: settings.max } : {}),
      },
    };
  },
};
