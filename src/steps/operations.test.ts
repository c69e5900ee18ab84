import { describe, expect, it } from 'vitest';
import { DefinitionError } from '../definition/errors.js';
import { isList } from '../expression/index.js';
import {
  DEFAULT_STEP_OPERATIONS,
  StepOperationRegistry,
  applySteps,
  type StepOperation,
} from './index.js';

const registry = new StepOperationRegistry();

describe('StepOperationRegistry', () => {
  it('should register set, ensure and exit', () => {
    expect(registry.names()).toEqual(['set', 'ensure', 'exit']);
  });

  it('should default steps to the end position', () => {
    expect(registry.compile({ set: 'a', value: '1' }, 0).position).toEqual({ kind: 'end' });
    expect(registry.compile({ set: 'a', value: '1', at: 'start' }, 0).position).toEqual({
      kind: 'start',
    });
    expect(registry.compile({ set: 'a', value: '1', after: 'email' }, 0).position).toEqual({
      kind: 'after',
      question: 'email',
    });
  });

  it('should report reads and writes', () => {
    const step = registry.compile(
      { set: 'display_name', value: 'registration.preferred_name if use_preferred_name else registration.first_name' },
      0
    );
    expect(step.action.writes).toEqual(['display_name']);
    expect(step.action.reads).toEqual([
      'registration.preferred_name',
      'use_preferred_name',
      'registration.first_name',
    ]);
    expect(registry.compile({ ensure: ['a', 'a and b'] }, 1).action.reads).toEqual(['a', 'b']);
  });

  it('should write non-string values as constants', () => {
    const step = registry.compile({ set: 'flags', value: [true, { n: 1 }] }, 0);
    expect(applySteps([step], {}).context).toEqual({ flags: [true, { n: 1 }] });
  });

  describe('declaration errors', () => {
    it.each([
      [{ value: '1' }, 'Step has no known operation (expected one of set, ensure, exit)'],
      [{ set: 'a', ensure: ['b'] }, 'Step names more than one operation (set, ensure)'],
      [{ set: 'a', value: '1', label: 'x' }, 'label: Unknown key for a set step'],
      [{ set: 'a' }, 'value: Missing value'],
      [{ set: 'a..b', value: '1' }, "set: Invalid segment '' in path 'a..b'"],
      [{ set: 'a', value: '1 +' }, "value: Unexpected end of expression at position 3 in '1 +'"],
      [{ ensure: [] }, 'ensure: Expected at least one requirement'],
      [{ ensure: ['a', 3] }, 'ensure[1]: Expected an expression string, got number'],
      [{ set: 'a', value: '1', when: ['a', 'b |'] }, 'when[1]:'],
      [{ set: 'a', value: '1', at: 'middle' }, "at: Expected 'start' or 'end', got 'middle'"],
      [{ set: 'a', value: '1', at: 'start', after: 'q' }, "after: A step cannot have both 'at' and 'after'"],
      [{ exit: 'Bye {{ name' }, 'exit: Unterminated placeholder'],
      [{ set: 'a', value: "d | date('%Y')" }, 'display-only'],
    ])('should reject %j', (declaration, message) => {
      expect(() => registry.compile(declaration, 0)).toThrow(DefinitionError);
      expect(() => registry.compile(declaration, 0)).toThrow(message);
    });
  });

  describe('custom operations', () => {
    const appendOperation: StepOperation = {
      name: 'append',
      settingKeys: ['item'],
      compile(declaration) {
        const target = String(declaration['append']);
        const item = String(declaration['item']);
        return {
          reads: [target],
          writes: [target],
          apply(context) {
            const existing = context[target];
            const list = isList(existing) ? existing : [];
            return { kind: 'continue', context: { ...context, [target]: [...list, item] } };
          },
        };
      },
    };

    it('should dispatch on the document key', () => {
      const custom = new StepOperationRegistry([...DEFAULT_STEP_OPERATIONS, appendOperation]);
      const step = custom.compile({ append: 'tags', item: 'new' }, 0);
      expect(applySteps([step], { tags: ['old'] }).context).toEqual({ tags: ['old', 'new'] });
    });

    it('should reject duplicate and reserved names', () => {
      expect(() => new StepOperationRegistry([appendOperation, appendOperation])).toThrow(
        "Duplicate step operation 'append'"
      );
      expect(() => new StepOperationRegistry([{ ...appendOperation, name: 'when' }])).toThrow(
        "'when' is reserved and cannot name a step operation"
      );
    });
  });
});
