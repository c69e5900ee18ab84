/**
 * Value semantics shared by the evaluator, filters and templates.
 *
 * @packageDocumentation
 */

import { isList, isValueObject } from './context.js';
import type { EvalValue } from './types.js';

/**
 * Truthiness rule of the expression language.
 *
 * Empty string, empty list, empty object, null, zero, false and undefined are
 * falsy; everything else is truthy.
 */
export function isTruthy(value: EvalValue): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === 'string') {
    return value.length > 0;
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (isList(value)) {
    return value.length > 0;
  }
  return Object.keys(value).length > 0;
}

/**
 * Structural equality. Undefined equals only undefined.
 */
export function valuesEqual(left: EvalValue, right: EvalValue): boolean {
  if (left === right) {
    return true;
  }
  if (isList(left) && isList(right)) {
    if (left.length !== right.length) {
      return false;
    }
    return left.every((item, index) => valuesEqual(item, right[index]));
  }
  if (isValueObject(left) && isValueObject(right)) {
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every(
      (key) => Object.hasOwn(right, key) && valuesEqual(left[key], right[key])
    );
  }
  return false;
}

/**
 * Names the type of a value for error messages.
 */
export function describeType(value: EvalValue): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null) {
    return 'null';
  }
  if (isList(value)) {
    return 'list';
  }
  if (isValueObject(value)) {
    return 'object';
  }
  return typeof value;
}

/**
 * Converts a value to display text.
 *
 * Strings are returned as-is, null and undefined become the empty string,
 * lists are joined with `", "` and objects are rendered as JSON.
 */
export function stringifyValue(value: EvalValue): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isList(value)) {
    return value.map((item) => stringifyValue(item)).join(', ');
  }
  return JSON.stringify(value);
}
