/**
 * Answer context helpers.
 *
 * The context is a tree of plain objects addressed by dotted paths
 * (`registration.first_name`). All updates are copy-on-write: a context handed
 * to a function is never mutated, which keeps replay pure and reproducible.
 *
 * @packageDocumentation
 */

import { EvaluationError, type EvalValue, type Value, type ValueObject } from './types.js';

/**
 * The answer context. The root is always an object.
 */
export type Context = ValueObject;

/** Pattern for a single path segment. */
const SEGMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Segments that would reach the object prototype chain. */
const PROHIBITED_SEGMENTS: readonly string[] = ['__proto__', 'constructor', 'prototype'];

/**
 * Error raised for a malformed dotted path.
 */
export class PathError extends Error {
  /** The offending path. */
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'PathError';
    this.path = path;
  }
}

/**
 * Checks whether a segment may appear in a path.
 *
 * @param segment - The segment to check.
 * @returns True if the segment is an identifier and not prohibited.
 */
export function isValidSegment(segment: string): boolean {
  return SEGMENT_PATTERN.test(segment) && !PROHIBITED_SEGMENTS.includes(segment);
}

/**
 * Splits a dotted path into segments.
 *
 * @param path - Dotted path such as `registration.email`.
 * @returns The path segments.
 * @throws PathError if the path is empty or a segment is invalid.
 */
export function parsePath(path: string): readonly string[] {
  if (path.length === 0) {
    throw new PathError('Path cannot be empty', path);
  }
  const segments = path.split('.');
  for (const segment of segments) {
    if (!isValidSegment(segment)) {
      throw new PathError(`Invalid segment '${segment}' in path '${path}'`, path);
    }
  }
  return segments;
}

/**
 * Checks whether a value is a list.
 */
export function isList(value: EvalValue): value is readonly Value[] {
  return Array.isArray(value);
}

/**
 * Checks whether a value is a plain (non-list) object.
 */
export function isValueObject(value: EvalValue): value is ValueObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the value at a path.
 *
 * @param context - The context to read from.
 * @param path - Path segments.
 * @returns The value, or undefined if any segment is missing or not an object.
 */
export function getPath(context: Context, path: readonly string[]): EvalValue {
  let current: EvalValue = context;
  for (const segment of path) {
    if (!isValueObject(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Returns a new context with `value` written at `path`.
 *
 * Missing intermediate objects are created.
 *
 * @param context - The source context (not modified).
 * @param path - Path segments (at least one).
 * @param value - The value to write.
 * @returns The updated context.
 * @throws EvaluationError if an intermediate value exists and is not an object.
 */
export function setPath(context: Context, path: readonly string[], value: Value): Context {
  return writePath(context, path, 0, value);
}

/**
 * Returns a new context with the value at `path` removed.
 *
 * @param context - The source context (not modified).
 * @param path - Path segments.
 * @returns The updated context, or the same context if nothing was removed.
 */
export function unsetPath(context: Context, path: readonly string[]): Context {
  const [head, ...rest] = path;
  if (head === undefined || !Object.hasOwn(context, head)) {
    return context;
  }
  if (rest.length === 0) {
    const copy: Record<string, Value> = {};
    for (const [key, item] of Object.entries(context)) {
      if (key !== head) {
        defineEntry(copy, key, item);
      }
    }
    return copy;
  }
  const child = context[head];
  if (!isValueObject(child)) {
    return context;
  }
  const updated = unsetPath(child, rest);
  return updated === child ? context : assign(context, head, updated);
}

function writePath(
  target: ValueObject,
  path: readonly string[],
  index: number,
  value: Value
): ValueObject {
  const segment = path[index];
  if (segment === undefined) {
    throw new EvaluationError('Cannot write to an empty path');
  }
  if (index === path.length - 1) {
    return assign(target, segment, value);
  }
  const existing = Object.hasOwn(target, segment) ? target[segment] : undefined;
  if (existing !== undefined && existing !== null && !isValueObject(existing)) {
    throw new EvaluationError(
      `Cannot write '${path.join('.')}': '${path.slice(0, index + 1).join('.')}' is not an object`
    );
  }
  const child = isValueObject(existing) ? existing : {};
  return assign(target, segment, writePath(child, path, index + 1, value));
}

function assign(target: ValueObject, key: string, value: Value): ValueObject {
  const copy: Record<string, Value> = { ...target };
  defineEntry(copy, key, value);
  return copy;
}

// defineProperty keeps keys such as `__proto__` as plain data properties.
function defineEntry(target: Record<string, Value>, key: string, value: Value): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Error raised when caller-supplied data is not a JSON value.
 */
export class ContextValueError extends Error {
  /** Location of the offending value, e.g. `context.registration`. */
  public readonly location: string;

  constructor(message: string, location: string) {
    super(message);
    this.name = 'ContextValueError';
    this.location = location;
  }
}

/**
 * Converts untrusted data into a context value.
 *
 * Accepts strings, finite numbers, booleans, null, arrays and plain objects;
 * the result is a fresh copy.
 *
 * @param input - Data to convert.
 * @param location - Location used in error messages.
 * @returns The converted value.
 * @throws ContextValueError for anything else.
 */
export function toValue(input: unknown, location = 'value'): Value {
  if (input === null || typeof input === 'string' || typeof input === 'boolean') {
    return input;
  }
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new ContextValueError(`Non-finite number at '${location}'`, location);
    }
    return input;
  }
  if (Array.isArray(input)) {
    return input.map((item: unknown, index) => toValue(item, `${location}[${String(index)}]`));
  }
  if (typeof input === 'object') {
    const proto: unknown = Object.getPrototypeOf(input);
    if (proto !== Object.prototype && proto !== null) {
      throw new ContextValueError(`Unsupported object at '${location}'`, location);
    }
    const result: Record<string, Value> = {};
    for (const [key, item] of Object.entries(input)) {
      defineEntry(result, key, toValue(item, `${location}.${key}`));
    }
    return result;
  }
  throw new ContextValueError(`Unsupported ${typeof input} at '${location}'`, location);
}

/**
 * Converts untrusted data into a context (an object at the root).
 *
 * @param input - Data to convert; undefined yields an empty context.
 * @returns The converted context.
 * @throws ContextValueError if the data is not a plain object of JSON values.
 */
export function toContext(input: unknown): Context {
  if (input === undefined) {
    return {};
  }
  const value = toValue(input, 'context');
  if (!isValueObject(value)) {
    throw new ContextValueError('Context must be an object', 'context');
  }
  return value;
}
