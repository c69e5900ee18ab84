/**
 * Shared display utilities for CLI commands.
 *
 * Formats questions, fields and results for a terminal.
 */

import { isList, isValueObject, type Value } from '../../expression/index.js';
import type { FieldDescriptor, FieldError } from '../../fields/index.js';
import type { QuestionDescriptor } from '../../interview/index.js';

export interface DisplayOptions {
  colors: boolean;
}

/**
 * A select option as described to the presentation layer.
 */
export interface DisplayOption {
  readonly value: Value;
  readonly label: string;
}

function style(text: string, code: string, options: DisplayOptions): string {
  return options.colors ? `\x1b[${code}m${text}\x1b[0m` : text;
}

export function bold(text: string, options: DisplayOptions): string {
  return style(text, '1', options);
}

export function dim(text: string, options: DisplayOptions): string {
  return style(text, '2', options);
}

export function red(text: string, options: DisplayOptions): string {
  return style(text, '31', options);
}

/**
 * Renders a value the way a user would type it.
 */
export function displayValue(value: Value): string {
  if (typeof value === 'string') {
    return value;
  }
  if (isList(value)) {
    return value.map((item) => displayValue(item)).join(', ');
  }
  return JSON.stringify(value);
}

/**
 * Reads the options of a select field's descriptor.
 */
export function selectOptions(field: FieldDescriptor): DisplayOption[] {
  const options = field.constraints['options'];
  if (!isList(options)) {
    return [];
  }
  return options.flatMap((option) => {
    if (!isValueObject(option)) {
      return [];
    }
    const label = option['label'];
    return typeof label === 'string' ? [{ value: option['value'] ?? null, label }] : [];
  });
}

/**
 * Formats a question's heading: title, underline and description.
 */
export function formatQuestion(question: QuestionDescriptor, options: DisplayOptions): string[] {
  const lines = ['', bold(question.title, options), dim('-'.repeat(question.title.length), options)];
  const description = question.description.trim();
  if (description.length > 0) {
    lines.push(...description.split('\n'));
  }
  return lines;
}

/**
 * Formats the errors a question came back with.
 */
export function formatProblems(
  errors: readonly FieldError[],
  unmet: readonly string[],
  options: DisplayOptions
): string[] {
  const lines = errors.map((error) => red(`  ! ${error.path}: ${error.reason}`, options));
  if (unmet.length > 0) {
    lines.push(red(`  ! Still needed: ${unmet.join(', ')}`, options));
  }
  return lines;
}

/**
 * Formats the prompt for one field, listing select options first.
 */
export function formatFieldPrompt(
  field: FieldDescriptor,
  options: DisplayOptions
): { lines: string[]; prompt: string } {
  const lines: string[] = [];
  const hints: string[] = [];
  if (field.type === 'select') {
    for (const option of selectOptions(field)) {
      lines.push(`  - ${option.label} ${dim(`[${displayValue(option.value)}]`, options)}`);
    }
    const max = field.constraints['max'];
    if (typeof max === 'number' && max > 1) {
      hints.push('comma-separated');
    }
  } else if (field.type === 'date') {
    hints.push('YYYY-MM-DD');
  }
  if (field.default !== undefined) {
    hints.push(`default: ${displayValue(field.default)}`);
  } else if (field.optional) {
    hints.push('optional');
  }
  const hint = hints.length > 0 ? ` ${dim(`(${hints.join('; ')})`, options)}` : '';
  const name = field.label.length > 0 ? field.label : field.path;
  return { lines, prompt: `${name}${hint}: ` };
}
