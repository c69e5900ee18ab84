/**
 * Free text field.
 *
 * @packageDocumentation
 */

import { DefinitionError } from '../definition/errors.js';
import { describeCommon, missing, readBoolean, readCount, readString } from './settings.js';
import type { FieldSettings, FieldType } from './types.js';

/** Default lower length bound. */
export const DEFAULT_MIN_LENGTH = 1;

/** Default upper length bound. */
export const DEFAULT_MAX_LENGTH = 300;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Supported `format` values.
 */
export type TextFormat = 'email';

export interface TextSettings extends FieldSettings {
  readonly format: TextFormat | undefined;
  readonly minLength: number;
  readonly maxLength: number;
  /** Author-supplied regex source, kept for the descriptor. */
  readonly pattern: string | undefined;
  readonly regex: RegExp | undefined;
}

/**
 * `type = "text"`: a trimmed string. Blank input counts as missing.
 */
export const textField: FieldType<TextSettings> = {
  name: 'text',
  settingKeys: ['optional', 'format', 'min_length', 'max_length', 'pattern'],

  configure(declaration) {
    const format = readString(declaration, 'format');
    if (format !== undefined && format !== 'email') {
      throw new DefinitionError(`Unsupported format '${format}'`, 'format');
    }
    const minLength = readCount(declaration, 'min_length', DEFAULT_MIN_LENGTH);
    const maxLength = readCount(declaration, 'max_length', DEFAULT_MAX_LENGTH);
    if (minLength > maxLength) {
      throw new DefinitionError(
        `min_length (${String(minLength)}) exceeds max_length (${String(maxLength)})`,
        'min_length'
      );
    }
    const pattern = readString(declaration, 'pattern');
    let regex: RegExp | undefined;
    if (pattern !== undefined) {
      try {
        regex = new RegExp(pattern, 'u');
      } catch (error) {
        throw new DefinitionError(`Invalid pattern '${pattern}'`, 'pattern', error);
      }
    }
    return {
      optional: readBoolean(declaration, 'optional', false),
      format,
      minLength,
      maxLength,
      pattern,
      regex,
    };
  },

  validate(raw, field) {
    const { settings } = field;
    if (raw === undefined || raw === null) {
      return missing(settings);
    }
    if (typeof raw !== 'string') {
      return { valid: false, reason: 'Expected text' };
    }
    const value = raw.trim();
    if (value.length === 0) {
      return missing(settings);
    }
    if (value.length < settings.minLength) {
      return { valid: false, reason: `Must be at least ${String(settings.minLength)} characters` };
    }
    if (value.length > settings.maxLength) {
      return { valid: false, reason: `Must be at most ${String(settings.maxLength)} characters` };
    }
    if (settings.format === 'email' && !EMAIL_PATTERN.test(value)) {
      return { valid: false, reason: 'Invalid email' };
    }
    if (settings.regex !== undefined && !settings.regex.test(value)) {
      return { valid: false, reason: 'Invalid format' };
    }
    return { valid: true, value };
  },

  describe(field, context) {
    const { settings } = field;
    return {
      ...describeCommon(field, context),
      constraints: {
        min_length: settings.minLength,
        max_length: settings.maxLength,
        ...(settings.format !== undefined ? { format: settings.format } : {}),
        ...(settings.pattern !== undefined ? { pattern: settings.pattern } : {}),
      },
    };
  },
};
