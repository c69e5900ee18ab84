/**
 * Helpers shared by the built-in field types for reading declarations and
 * building results.
 *
 * @packageDocumentation
 */

import { renderTemplate, type Context } from '../expression/index.js';
import { DefinitionError } from '../definition/errors.js';
import {
  REQUIRED_MESSAGE,
  type Field,
  type FieldDeclaration,
  type FieldDescriptor,
  type FieldResult,
  type FieldSettings,
} from './types.js';

/**
 * Reads an optional boolean setting.
 *
 * @throws DefinitionError if present and not a boolean.
 */
export function readBoolean(declaration: FieldDeclaration, key: string, fallback: boolean): boolean {
  const value = declaration[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new DefinitionError(`Expected a boolean, got ${typeof value}`, key);
  }
  return value;
}

/**
 * Reads an optional non-negative integer setting.
 *
 * @throws DefinitionError if present and not a non-negative integer.
 */
export function readCount(declaration: FieldDeclaration, key: string, fallback: number): number {
  const value = declaration[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DefinitionError('Expected a non-negative integer', key);
  }
  return value;
}

/**
 * Reads an optional finite number setting.
 *
 * @throws DefinitionError if present and not a finite number.
 */
export function readNumber(declaration: FieldDeclaration, key: string): number | undefined {
  const value = declaration[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DefinitionError('Expected a number', key);
  }
  return value;
}

/**
 * Reads an optional string setting.
 *
 * @throws DefinitionError if present and not a string.
 */
export function readString(declaration: FieldDeclaration, key: string): string | undefined {
  const value = declaration[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DefinitionError(`Expected a string, got ${typeof value}`, key);
  }
  return value;
}

/**
 * Result for an answer that is absent or blank.
 */
export function missing(settings: FieldSettings): FieldResult {
  return settings.optional ? { valid: true, value: null } : { valid: false, reason: REQUIRED_MESSAGE };
}

/**
 * Builds the descriptor properties every field shares.
 */
export function describeCommon(
  field: Field,
  context: Context
): Omit<FieldDescriptor, 'constraints'> {
  return {
    path: field.path,
    type: field.type,
    label: renderTemplate(field.label, context),
    optional: field.settings.optional,
    ...(field.component !== undefined ? { component: field.component } : {}),
    ...(field.defaultValue !== undefined ? { default: field.defaultValue } : {}),
  };
}
