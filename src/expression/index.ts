/**
 * Expression language: a small, pure, always-terminating language for guards,
 * computed values and templated text.
 *
 * @packageDocumentation
 */

export type {
  BinaryOperator,
  CompiledExpression,
  EvalValue,
  ExpressionMode,
  ExpressionNode,
  TestName,
  UnaryOperator,
  Value,
  ValueObject,
} from './types.js';
export { EvaluationError, ExpressionSyntaxError, MAX_EXPRESSION_DEPTH } from './types.js';

export type { Context } from './context.js';
export {
  ContextValueError,
  PathError,
  getPath,
  isList,
  isValidSegment,
  isValueObject,
  parsePath,
  setPath,
  toContext,
  toValue,
  unsetPath,
} from './context.js';

export type { Token, TokenKind } from './lexer.js';
export { tokenize } from './lexer.js';

export type { FilterDefinition } from './filters.js';
export { DEFAULT_FILTERS, FilterRegistry, defaultFilterRegistry, formatDate } from './filters.js';

export type { ParseOptions } from './parser.js';
export { parseExpression } from './parser.js';

export { evaluate, evaluateAt, evaluateExpression, evaluateGuard } from './evaluator.js';

export { collectReferences } from './references.js';

export type { CompiledTemplate, TemplatePart } from './template.js';
export { compileTemplate, renderTemplate, templateReferences } from './template.js';

export { describeType, isTruthy, stringifyValue, valuesEqual } from './values.js';
