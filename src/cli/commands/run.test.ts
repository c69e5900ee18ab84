import { describe, expect, it } from 'vitest';
import { resolve } from 'node:path';
import type { FieldDescriptor } from '../../fields/index.js';
import { CliUsageError } from '../errors.js';
import { parseFieldInput, parseRunArgs } from './run.js';

const level: FieldDescriptor = {
  path: 'level',
  type: 'select',
  label: 'Registration Level',
  optional: false,
  component: 'dropdown',
  default: 'basic',
  constraints: {
    min: 1,
    max: 2,
    options: [
      { value: 'basic', label: 'Basic' },
      { value: 'sponsor', label: 'Sponsor' },
    ],
  },
};

const email: FieldDescriptor = {
  path: 'registration.email',
  type: 'text',
  label: 'Email',
  optional: false,
  constraints: { format: 'email' },
};

describe('parseFieldInput', () => {
  it('should match select entries by value or label', () => {
    expect(parseFieldInput(level, 'sponsor')).toEqual(['sponsor']);
    expect(parseFieldInput(level, 'Basic, sponsor')).toEqual(['basic', 'sponsor']);
  });

  it('should pass unmatched select entries through for validation', () => {
    expect(parseFieldInput(level, 'gold')).toEqual(['gold']);
  });

  it('should take the default for blank input', () => {
    expect(parseFieldInput(level, '   ')).toBe('basic');
    expect(parseFieldInput(email, '')).toBeUndefined();
  });

  it('should keep other input as trimmed text', () => {
    expect(parseFieldInput(email, ' ada@example.com ')).toBe('ada@example.com');
  });
});

describe('parseRunArgs', () => {
  it('should read the id and options', () => {
    expect(
      parseRunArgs([
        'new-registration',
        '--definitions',
        'interviews',
        '--config',
        'engine.toml',
        '--context',
        '{"a": 1}',
        '--debug',
      ])
    ).toEqual({
      interview: 'new-registration',
      definitions: [resolve('interviews')],
      configFile: resolve('engine.toml'),
      context: { a: 1 },
      debug: true,
    });
  });

  it('should reject malformed arguments', () => {
    expect(() => parseRunArgs(['a', 'b'])).toThrow(new CliUsageError('run', 'Unexpected argument: b'));
    expect(() => parseRunArgs(['a', '--config'])).toThrow('--config requires a value');
    expect(() => parseRunArgs(['a', '--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseRunArgs(['a', '--context', '{'])).toThrow(CliUsageError);
  });
});
