import { describe, expect, it } from 'vitest';
import {
  ContextValueError,
  EvaluationError,
  PathError,
  getPath,
  isValueObject,
  parsePath,
  setPath,
  toContext,
  toValue,
  unsetPath,
} from './index.js';

describe('parsePath', () => {
  it('should split dotted paths', () => {
    expect(parsePath('registration.first_name')).toEqual(['registration', 'first_name']);
  });

  it('should reject malformed paths', () => {
    expect(() => parsePath('')).toThrow(PathError);
    expect(() => parsePath('a..b')).toThrow("Invalid segment '' in path 'a..b'");
    expect(() => parsePath('1abc')).toThrow(PathError);
    expect(() => parsePath('a.__proto__')).toThrow("Invalid segment '__proto__'");
  });
});

describe('setPath', () => {
  it('should create intermediate objects without mutating the input', () => {
    const context = { other: 1 };
    const updated = setPath(context, ['registration', 'email'], 'ada@example.org');
    expect(updated).toEqual({ other: 1, registration: { email: 'ada@example.org' } });
    expect(context).toEqual({ other: 1 });
  });

  it('should replace null intermediates', () => {
    expect(setPath({ a: null }, ['a', 'b'], 1)).toEqual({ a: { b: 1 } });
  });

  it('should preserve key order when overwriting', () => {
    const updated = setPath({ a: 1, b: 2 }, ['a'], 3);
    expect(Object.keys(updated)).toEqual(['a', 'b']);
  });

  it('should reject writes through scalars', () => {
    expect(() => setPath({ a: 'text' }, ['a', 'b'], 1)).toThrow(EvaluationError);
    expect(() => setPath({ a: [1] }, ['a', 'b', 'c'], 1)).toThrow(
      "Cannot write 'a.b.c': 'a' is not an object"
    );
  });
});

describe('unsetPath', () => {
  it('should remove nested values', () => {
    const context = { a: { b: 1, c: 2 } };
    expect(unsetPath(context, ['a', 'b'])).toEqual({ a: { c: 2 } });
    expect(context).toEqual({ a: { b: 1, c: 2 } });
  });

  it('should return the same context when nothing is removed', () => {
    const context = { a: { b: 1 } };
    expect(unsetPath(context, ['a', 'x'])).toBe(context);
    expect(unsetPath(context, ['z'])).toBe(context);
  });
});

describe('getPath', () => {
  it('should ignore inherited properties', () => {
    expect(getPath({}, ['toString'])).toBeUndefined();
  });
});

describe('toValue', () => {
  it('should copy JSON data', () => {
    const input = { a: [1, 'x', null, true], b: { c: 2 } };
    const value = toValue(input);
    expect(value).toEqual(input);
    expect(value).not.toBe(input);
  });

  it('should keep __proto__ keys as data', () => {
    const value = toValue(JSON.parse('{"__proto__": {"polluted": true}}'));
    expect(isValueObject(value)).toBe(true);
    if (isValueObject(value)) {
      expect(Object.hasOwn(value, '__proto__')).toBe(true);
      expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    }
  });

  it('should reject non-JSON values', () => {
    expect(() => toValue(Number.NaN)).toThrow(ContextValueError);
    expect(() => toValue({ when: new Date(0) })).toThrow("Unsupported object at 'value.when'");
    expect(() => toValue([() => 1])).toThrow("Unsupported function at 'value[0]'");
  });
});

describe('toContext', () => {
  it('should default to an empty context', () => {
    expect(toContext(undefined)).toEqual({});
  });

  it('should require an object at the root', () => {
    expect(() => toContext(['a'])).toThrow('Context must be an object');
    expect(() => toContext('a')).toThrow(ContextValueError);
  });
});
