/**
 * Built-in step operations and the registry that dispatches on them.
 *
 * @packageDocumentation
 */

import {
  ContextValueError,
  PathError,
  collectReferences,
  defaultFilterRegistry,
  evaluateExpression,
  isTruthy,
  parsePath,
  renderTemplate,
  setPath,
  templateReferences,
  toValue,
  unsetPath,
  type CompiledExpression,
  type FilterRegistry,
  type Value,
} from '../expression/index.js';
import { DefinitionError } from '../definition/errors.js';
import {
  compileExpressionSetting,
  compileGuardSetting,
  compileTemplateSetting,
} from '../definition/expressions.js';
import type { Step, StepDeclaration, StepOperation, StepPosition } from './types.js';

/** Keys every step accepts besides its operation key. */
const COMMON_KEYS: readonly string[] = ['when', 'at', 'after'];

/**
 * `set: <path>` with `value: <expression>`.
 *
 * A non-string `value` is written as a constant. An undefined result removes
 * the path.
 */
export const setOperation: StepOperation = {
  name: 'set',
  settingKeys: ['value'],

  compile(declaration, filters) {
    const target = declaration['set'];
    if (typeof target !== 'string') {
      throw new DefinitionError('Expected a target path', 'set');
    }
    let segments: readonly string[];
    try {
      segments = parsePath(target);
    } catch (error) {
      if (error instanceof PathError) {
        throw new DefinitionError(error.message, 'set', error);
      }
      throw error;
    }

    const raw = declaration['value'];
    if (raw === undefined) {
      throw new DefinitionError('Missing value', 'value');
    }

    if (typeof raw !== 'string') {
      let constant: Value;
      try {
        constant = toValue(raw, 'value');
      } catch (error) {
        if (error instanceof ContextValueError) {
          throw new DefinitionError(error.message, 'value', error);
        }
        throw error;
      }
      return {
        reads: [],
        writes: [target],
        apply: (context) => ({ kind: 'continue', context: setPath(context, segments, constant) }),
      };
    }

    const expression = compileExpressionSetting(raw, 'value', filters);
    return {
      reads: collectReferences(expression.ast),
      writes: [target],
      apply(context, registry) {
        const result = evaluateExpression(expression, context, registry);
        return {
          kind: 'continue',
          context:
            result === undefined ? unsetPath(context, segments) : setPath(context, segments, result),
        };
      },
    };
  },
};

/**
 * `ensure: [<expression>, ...]`: halts with every falsy requirement.
 */
export const ensureOperation: StepOperation = {
  name: 'ensure',
  settingKeys: [],

  compile(declaration, filters) {
    const raw = declaration['ensure'];
    const entries: unknown[] = Array.isArray(raw) ? raw : [raw];
    if (entries.length === 0) {
      throw new DefinitionError('Expected at least one requirement', 'ensure');
    }
    const requirements: CompiledExpression[] = entries.map((entry, index) =>
      compileExpressionSetting(entry, Array.isArray(raw) ? `ensure[${String(index)}]` : 'ensure', filters)
    );
    return {
      reads: [...new Set(requirements.flatMap((requirement) => collectReferences(requirement.ast)))],
      writes: [],
      apply(context, registry) {
        const failed = requirements.filter(
          (requirement) => !isTruthy(evaluateExpression(requirement, context, registry))
        );
        if (failed.length === 0) {
          return { kind: 'continue', context };
        }
        return {
          kind: 'unmet',
          unmet: failed.map((requirement) => requirement.source),
          paths: [...new Set(failed.flatMap((requirement) => collectReferences(requirement.ast)))],
        };
      },
    };
  },
};

/**
 * `exit: <title template>` with an optional `description` template.
 */
export const exitOperation: StepOperation = {
  name: 'exit',
  settingKeys: ['description'],

  compile(declaration, filters) {
    const title = compileTemplateSetting(declaration['exit'], 'exit', filters);
    const rawDescription = declaration['description'];
    const description =
      rawDescription === undefined
        ? undefined
        : compileTemplateSetting(rawDescription, 'description', filters);
    return {
      reads: [
        ...new Set([
          ...templateReferences(title),
          ...(description === undefined ? [] : templateReferences(description)),
        ]),
      ],
      writes: [],
      apply: (context, registry) => ({
        kind: 'exit',
        title: renderTemplate(title, context, registry),
        description: description === undefined ? null : renderTemplate(description, context, registry),
      }),
    };
  },
};

/**
 * The built-in operations, in dispatch order.
 */
export const DEFAULT_STEP_OPERATIONS: readonly StepOperation[] = [
  setOperation,
  ensureOperation,
  exitOperation,
];

function readPosition(declaration: StepDeclaration): StepPosition {
  const at = declaration['at'];
  const after = declaration['after'];
  if (at !== undefined && after !== undefined) {
    throw new DefinitionError("A step cannot have both 'at' and 'after'", 'after');
  }
  if (after !== undefined) {
    if (typeof after !== 'string' || after.length === 0) {
      throw new DefinitionError('Expected a question id', 'after');
    }
    return { kind: 'after', question: after };
  }
  if (at === undefined || at === 'end') {
    return { kind: 'end' };
  }
  if (at === 'start') {
    return { kind: 'start' };
  }
  throw new DefinitionError(`Expected 'start' or 'end', got '${String(at)}'`, 'at');
}

/**
 * Immutable lookup of step operations by document key.
 */
export class StepOperationRegistry {
  private readonly operations: ReadonlyMap<string, StepOperation>;

  /**
   * Creates a registry.
   *
   * @param operations - Operations to register; defaults to set, ensure and exit.
   * @throws Error if two operations share a name, or a name is a common step key.
   */
  constructor(operations: readonly StepOperation[] = DEFAULT_STEP_OPERATIONS) {
    const map = new Map<string, StepOperation>();
    for (const operation of operations) {
      if (COMMON_KEYS.includes(operation.name)) {
        throw new Error(`'${operation.name}' is reserved and cannot name a step operation`);
      }
      if (map.has(operation.name)) {
        throw new Error(`Duplicate step operation '${operation.name}'`);
      }
      map.set(operation.name, operation);
    }
    this.operations = map;
  }

  /**
   * Lists operation names in registration order.
   */
  names(): string[] {
    return [...this.operations.keys()];
  }

  /**
   * Compiles one step declaration.
   *
   * @param declaration - The declaration; exactly one key must name an operation.
   * @param index - Index of the step in its list.
   * @param filters - Filters available to the step's expressions.
   * @returns The compiled step.
   * @throws DefinitionError located relative to the step.
   */
  compile(
    declaration: StepDeclaration,
    index: number,
    filters: FilterRegistry = defaultFilterRegistry
  ): Step {
    const keys = Object.keys(declaration);
    const named = keys.filter((key) => this.operations.has(key));
    if (named.length > 1) {
      throw new DefinitionError(`Step names more than one operation (${named.join(', ')})`);
    }
    const [name] = named;
    const operation = name === undefined ? undefined : this.operations.get(name);
    if (name === undefined || operation === undefined) {
      throw new DefinitionError(
        `Step has no known operation (expected one of ${this.names().join(', ')})`
      );
    }
    for (const key of keys) {
      if (key !== name && !COMMON_KEYS.includes(key) && !operation.settingKeys.includes(key)) {
        throw new DefinitionError(`Unknown key for a ${name} step`, key);
      }
    }
    return {
      index,
      operation: name,
      when: compileGuardSetting(declaration['when'], 'when', filters),
      position: readPosition(declaration),
      action: operation.compile(declaration, filters),
    };
  }
}
