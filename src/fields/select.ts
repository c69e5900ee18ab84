/**
 * Select field: choose between `min` and `max` of the declared options.
 *
 * @packageDocumentation
 */

import {
  ContextValueError,
  ExpressionSyntaxError,
  compileTemplate,
  isValueObject,
  renderTemplate,
  toValue,
  valuesEqual,
  type CompiledTemplate,
  type Value,
} from '../expression/index.js';
import { DefinitionError } from '../definition/errors.js';
import { describeCommon, readCount } from './settings.js';
import { REQUIRED_MESSAGE, type FieldDeclaration, type FieldSettings, type FieldType } from './types.js';

export interface SelectOption {
  readonly value: Value;
  readonly label: CompiledTemplate;
  readonly default: boolean;
}

export interface SelectSettings extends FieldSettings {
  readonly min: number;
  readonly max: number;
  readonly options: readonly SelectOption[];
}

/** Presentation hint used when none is declared. */
export const DEFAULT_SELECT_COMPONENT = 'dropdown';

function readOptions(declaration: FieldDeclaration): SelectOption[] {
  const raw = declaration['options'];
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new DefinitionError('Expected a non-empty list of options', 'options');
  }
  const options: SelectOption[] = [];
  raw.forEach((entry: unknown, index) => {
    const location = `options[${String(index)}]`;
    let option: Value;
    try {
      option = toValue(entry, location);
    } catch (error) {
      if (error instanceof ContextValueError) {
        throw new DefinitionError(error.message, location, error);
      }
      throw error;
    }
    if (!isValueObject(option) || !Object.hasOwn(option, 'value')) {
      throw new DefinitionError('Option must be a table with a value', location);
    }
    const value = option['value'] ?? null;
    if (options.some((existing) => valuesEqual(existing.value, value))) {
      throw new DefinitionError('Duplicate option value', `${location}.value`);
    }
    const label = option['label'];
    if (label !== undefined && typeof label !== 'string') {
      throw new DefinitionError('Expected a string', `${location}.label`);
    }
    const isDefault = option['default'] ?? false;
    if (typeof isDefault !== 'boolean') {
      throw new DefinitionError('Expected a boolean', `${location}.default`);
    }
    let template: CompiledTemplate;
    try {
      template = compileTemplate(label ?? displayValue(value));
    } catch (error) {
      if (error instanceof ExpressionSyntaxError) {
        throw new DefinitionError(error.message, `${location}.label`, error);
      }
      throw error;
    }
    options.push({ value, label: template, default: isDefault });
  });
  return options;
}

function displayValue(value: Value): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * `type = "select"`. With `max = 1` the answer is the selected value (or
 * null); otherwise it is the list of selected values in declaration order.
 */
export const selectField: FieldType<SelectSettings> = {
  name: 'select',
  settingKeys: ['min', 'max', 'options'],

  configure(declaration) {
    const min = readCount(declaration, 'min', 0);
    const max = readCount(declaration, 'max', 1);
    if (max < 1) {
      throw new DefinitionError('max must be at least 1', 'max');
    }
    if (min > max) {
      throw new DefinitionError(`min (${String(min)}) exceeds max (${String(max)})`, 'min');
    }
    const options = readOptions(declaration);
    if (min > options.length) {
      throw new DefinitionError(
        `min (${String(min)}) exceeds the number of options (${String(options.length)})`,
        'min'
      );
    }
    return { optional: min === 0, min, max, options };
  },

  validate(raw, field) {
    const { settings } = field;
    let candidates: unknown[];
    if (raw === undefined || raw === null) {
      candidates = [];
    } else if (Array.isArray(raw)) {
      candidates = raw;
    } else {
      candidates = [raw];
    }

    const chosen = new Set<SelectOption>();
    for (const candidate of candidates) {
      let value: Value;
      try {
        value = toValue(candidate);
      } catch (error) {
        if (error instanceof ContextValueError) {
          return { valid: false, reason: 'Invalid selection' };
        }
        throw error;
      }
      const option = settings.options.find((entry) => valuesEqual(entry.value, value));
      if (option === undefined) {
        return { valid: false, reason: 'Invalid selection' };
      }
      if (chosen.has(option)) {
        return { valid: false, reason: 'Duplicate selection' };
      }
      chosen.add(option);
    }

    if (chosen.size < settings.min) {
      return {
        valid: false,
        reason: chosen.size === 0 ? REQUIRED_MESSAGE : `Choose at least ${String(settings.min)}`,
      };
    }
    if (chosen.size > settings.max) {
      return { valid: false, reason: `Choose at most ${String(settings.max)}` };
    }

    const values = settings.options.filter((option) => chosen.has(option)).map((o) => o.value);
    if (settings.max === 1) {
      return { valid: true, value: values[0] ?? null };
    }
    return { valid: true, value: values };
  },

  describe(field, context) {
    const { settings } = field;
    const defaults = settings.options.filter((option) => option.default).map((o) => o.value);
    const common = describeCommon(field, context);
    let defaultValue: Value | undefined = common.default;
    if (defaultValue === undefined && defaults.length > 0) {
      defaultValue = settings.max === 1 ? (defaults[0] ?? null) : defaults;
    }
    return {
      ...common,
      component: common.component ?? DEFAULT_SELECT_COMPONENT,
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
      constraints: {
        min: settings.min,
        max: settings.max,
        options: settings.options.map((option) => ({
          value: option.value,
          label: renderTemplate(option.label, context),
        })),
      },
    };
  },

  templates(settings) {
    return settings.options.map((option) => option.label);
  },
};

