/**
 * Types for the interview expression language.
 *
 * Expressions are parsed once into an immutable tagged-union AST and evaluated
 * against an answer context. The language has no loops, assignments or calls
 * outside the fixed filter registry, so evaluation always terminates.
 *
 * @packageDocumentation
 */

/**
 * A value stored in the answer context.
 */
export type Value =
  | string
  | number
  | boolean
  | null
  | readonly Value[]
  | { readonly [key: string]: Value };

/**
 * A plain object of context values.
 */
export interface ValueObject {
  readonly [key: string]: Value;
}

/**
 * The result of evaluating an expression.
 *
 * `undefined` models a path that is not present in the context. It is falsy
 * and can be tested with `is defined`.
 */
export type EvalValue = Value | undefined;

/**
 * Binary operators, including the short-circuiting boolean operators.
 */
export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'and'
  | 'or';

/**
 * Unary operators.
 */
export type UnaryOperator = 'not' | '-';

/**
 * Names accepted after `is` / `is not`.
 */
export type TestName = 'defined' | 'undefined' | 'none';

export interface LiteralNode {
  readonly kind: 'literal';
  readonly value: Value;
}

export interface VariableNode {
  readonly kind: 'variable';
  readonly path: readonly string[];
}

export interface ListNode {
  readonly kind: 'list';
  readonly items: readonly ExpressionNode[];
}

export interface UnaryNode {
  readonly kind: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: ExpressionNode;
}

export interface BinaryNode {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface MembershipNode {
  readonly kind: 'membership';
  readonly negated: boolean;
  readonly element: ExpressionNode;
  readonly collection: ExpressionNode;
}

export interface TestNode {
  readonly kind: 'test';
  readonly negated: boolean;
  readonly test: TestName;
  readonly subject: ExpressionNode;
}

export interface ConditionalNode {
  readonly kind: 'conditional';
  readonly condition: ExpressionNode;
  readonly consequent: ExpressionNode;
  /** Absent when the expression has no `else` branch. */
  readonly alternate?: ExpressionNode;
}

export interface FilterNode {
  readonly kind: 'filter';
  readonly name: string;
  readonly subject: ExpressionNode;
  readonly args: readonly ExpressionNode[];
}

/**
 * Expression AST. Built once per definition and never mutated.
 */
export type ExpressionNode =
  | LiteralNode
  | VariableNode
  | ListNode
  | UnaryNode
  | BinaryNode
  | MembershipNode
  | TestNode
  | ConditionalNode
  | FilterNode;

/**
 * Where an expression is used.
 *
 * - `logic`: guards, step values and requirements. Display-only filters are rejected.
 * - `display`: template placeholders. All filters are allowed.
 */
export type ExpressionMode = 'logic' | 'display';

/**
 * A parsed expression together with its source text.
 */
export interface CompiledExpression {
  readonly source: string;
  readonly ast: ExpressionNode;
}

/**
 * Maximum nesting depth accepted by the parser.
 */
export const MAX_EXPRESSION_DEPTH = 64;

/**
 * Error raised when expression or template text cannot be parsed.
 */
export class ExpressionSyntaxError extends Error {
  /** The text that failed to parse. */
  public readonly source: string;
  /** Zero-based character offset of the failure. */
  public readonly position: number;

  /**
   * Creates a new ExpressionSyntaxError.
   *
   * @param message - Description of the problem.
   * @param source - The text that failed to parse.
   * @param position - Character offset of the failure.
   */
  constructor(message: string, source: string, position: number) {
    super(`${message} at position ${String(position)} in '${source}'`);
    this.name = 'ExpressionSyntaxError';
    this.source = source;
    this.position = position;
  }
}

/**
 * Error raised when a well-formed expression cannot be evaluated.
 *
 * @remarks
 * Type mismatches, division by zero and membership tests against a non-list
 * are authoring bugs in the definition, never user-input errors.
 */
export class EvaluationError extends Error {
  /** Source of the expression being evaluated, when known. */
  public readonly source: string | undefined;
  /** Location within the definition, e.g. `steps[2].value`. */
  public readonly location: string | undefined;
  /** The bare reason, without source or location. */
  public readonly reason: string;

  /**
   * Creates a new EvaluationError.
   *
   * @param reason - Description of the failure.
   * @param source - Source of the failing expression.
   * @param location - Location within the definition.
   */
  constructor(reason: string, source?: string, location?: string) {
    let message = reason;
    if (source !== undefined) {
      message += ` in '${source}'`;
    }
    if (location !== undefined) {
      message += ` (${location})`;
    }
    super(message);
    this.name = 'EvaluationError';
    this.reason = reason;
    this.source = source;
    this.location = location;
  }

  /**
   * Returns a copy of this error that also names the expression source.
   */
  withSource(source: string): EvaluationError {
    return new EvaluationError(this.reason, this.source ?? source, this.location);
  }

  /**
   * Returns a copy of this error that also names a definition location.
   */
  withLocation(location: string): EvaluationError {
    return new EvaluationError(this.reason, this.source, this.location ?? location);
  }
}
