/**
 * Tree-walking evaluator for expression ASTs.
 *
 * @packageDocumentation
 */

import { getPath, isList, type Context } from './context.js';
import { defaultFilterRegistry, type FilterRegistry } from './filters.js';
import {
  EvaluationError,
  type BinaryNode,
  type CompiledExpression,
  type EvalValue,
  type ExpressionNode,
  type TestName,
  type Value,
} from './types.js';
import { describeType, isTruthy, valuesEqual } from './values.js';

function requireNumber(operator: string, value: EvalValue): number {
  if (typeof value !== 'number') {
    throw new EvaluationError(`Operator '${operator}' expects numbers, got ${describeType(value)}`);
  }
  return value;
}

function finite(operator: string, result: number): number {
  if (!Number.isFinite(result)) {
    throw new EvaluationError(`Operator '${operator}' produced a non-finite number`);
  }
  return result;
}

function compareOrdered(operator: string, left: EvalValue, right: EvalValue): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return ordered(operator, left - right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(operator, left < right ? -1 : left > right ? 1 : 0);
  }
  throw new EvaluationError(
    `Cannot compare ${describeType(left)} and ${describeType(right)} with '${operator}'`
  );
}

function ordered(operator: string, difference: number): boolean {
  switch (operator) {
    case '<':
      return difference < 0;
    case '<=':
      return difference <= 0;
    case '>':
      return difference > 0;
    default:
      return difference >= 0;
  }
}

function passesTest(test: TestName, subject: EvalValue): boolean {
  switch (test) {
    case 'defined':
      return subject !== undefined;
    case 'undefined':
      return subject === undefined;
    case 'none':
      return subject === null;
  }
}

function add(left: EvalValue, right: EvalValue): EvalValue {
  if (typeof left === 'number' && typeof right === 'number') {
    return finite('+', left + right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  if (isList(left) && isList(right)) {
    return [...left, ...right];
  }
  throw new EvaluationError(`Cannot add ${describeType(left)} and ${describeType(right)}`);
}

function evaluateBinary(node: BinaryNode, context: Context, filters: FilterRegistry): EvalValue {
  const left = evaluate(node.left, context, filters);

  // `and` / `or` short-circuit and yield an operand.
  if (node.operator === 'and') {
    return isTruthy(left) ? evaluate(node.right, context, filters) : left;
  }
  if (node.operator === 'or') {
    return isTruthy(left) ? left : evaluate(node.right, context, filters);
  }

  const right = evaluate(node.right, context, filters);
  switch (node.operator) {
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compareOrdered(node.operator, left, right);
    case '+':
      return add(left, right);
    case '-':
      return finite('-', requireNumber('-', left) - requireNumber('-', right));
    case '*':
      return finite('*', requireNumber('*', left) * requireNumber('*', right));
    case '/': {
      const dividend = requireNumber('/', left);
      const divisor = requireNumber('/', right);
      if (divisor === 0) {
        throw new EvaluationError('Division by zero');
      }
      return finite('/', dividend / divisor);
    }
  }
}

/**
 * Evaluates an AST against a context.
 *
 * @param node - The expression AST.
 * @param context - The answer context (never modified).
 * @param filters - Filters available to filter nodes.
 * @returns The value; undefined when the expression reads a missing path.
 * @throws EvaluationError on a type mismatch, division by zero or a
 *   membership test against a non-list.
 */
export function evaluate(
  node: ExpressionNode,
  context: Context,
  filters: FilterRegistry = defaultFilterRegistry
): EvalValue {
  switch (node.kind) {
    case 'literal':
      return node.value;

    case 'variable':
      return getPath(context, node.path);

    case 'list':
      return node.items.map((item): Value => evaluate(item, context, filters) ?? null);

    case 'unary': {
      const operand = evaluate(node.operand, context, filters);
      if (node.operator === 'not') {
        return !isTruthy(operand);
      }
      return -requireNumber('-', operand);
    }

    case 'binary':
      return evaluateBinary(node, context, filters);

    case 'membership': {
      const element = evaluate(node.element, context, filters);
      const collection = evaluate(node.collection, context, filters);
      if (!isList(collection)) {
        throw new EvaluationError(
          `Operator '${node.negated ? 'not in' : 'in'}' expects a list, got ${describeType(collection)}`
        );
      }
      const found = collection.some((item) => valuesEqual(item, element));
      return node.negated ? !found : found;
    }

    case 'test': {
      const result = passesTest(node.test, evaluate(node.subject, context, filters));
      return node.negated ? !result : result;
    }

    case 'conditional':
      if (isTruthy(evaluate(node.condition, context, filters))) {
        return evaluate(node.consequent, context, filters);
      }
      return node.alternate === undefined ? undefined : evaluate(node.alternate, context, filters);

    case 'filter': {
      const filter = filters.get(node.name);
      if (filter === undefined) {
        throw new EvaluationError(`Unknown filter '${node.name}'`);
      }
      const subject = evaluate(node.subject, context, filters);
      const args = node.args.map((arg) => evaluate(arg, context, filters));
      return filter.apply(subject, args);
    }
  }
}

/**
 * Evaluates a compiled expression, attaching its source to any error.
 *
 * @param expression - The compiled expression.
 * @param context - The answer context.
 * @param filters - Filters available to filter nodes.
 * @returns The value.
 * @throws EvaluationError naming the expression source.
 */
export function evaluateExpression(
  expression: CompiledExpression,
  context: Context,
  filters: FilterRegistry = defaultFilterRegistry
): EvalValue {
  try {
    return evaluate(expression.ast, context, filters);
  } catch (error) {
    if (error instanceof EvaluationError) {
      throw error.withSource(expression.source);
    }
    throw error;
  }
}

/**
 * Evaluates a guard: a conjunction of expressions, short-circuiting at the
 * first falsy one. An empty guard holds.
 */
export function evaluateGuard(
  guard: readonly CompiledExpression[],
  context: Context,
  filters: FilterRegistry = defaultFilterRegistry
): boolean {
  return guard.every((expression) => isTruthy(evaluateExpression(expression, context, filters)));
}

/**
 * Runs `evaluation`, attaching `location` to any EvaluationError it raises.
 *
 * @param location - Location within the definition, e.g. `questions[email].when`.
 * @param evaluation - The evaluation to run.
 * @returns The evaluation's result.
 */
export function evaluateAt<T>(location: string, evaluation: () => T): T {
  try {
    return evaluation();
  } catch (error) {
    if (error instanceof EvaluationError) {
      throw error.withLocation(location);
    }
    throw error;
  }
}
