/**
 * Type definitions for the step interpreter.
 *
 * @packageDocumentation
 */

import type { CompiledExpression, Context, FilterRegistry } from '../expression/index.js';

/**
 * A step declaration as written in a definition document.
 */
export type StepDeclaration = Readonly<Record<string, unknown>>;

/**
 * When a step runs relative to the questions.
 *
 * - `start`: before any question.
 * - `after`: right after the named question's answer is merged.
 * - `end`: once no question remains.
 */
export type StepPosition =
  | { readonly kind: 'start' }
  | { readonly kind: 'end' }
  | { readonly kind: 'after'; readonly question: string };

/**
 * What one compiled operation did to the context.
 */
export type StepOutcome =
  | { readonly kind: 'continue'; readonly context: Context }
  | { readonly kind: 'unmet'; readonly unmet: readonly string[]; readonly paths: readonly string[] }
  | { readonly kind: 'exit'; readonly title: string; readonly description: string | null };

/**
 * A compiled operation, ready to run against a context.
 */
export interface StepAction {
  /**
   * Runs the operation. Must not modify `context`.
   *
   * @throws EvaluationError on an authoring bug.
   */
  apply(context: Context, filters: FilterRegistry): StepOutcome;
  /** Dotted paths the operation reads. */
  readonly reads: readonly string[];
  /** Dotted paths the operation writes. */
  readonly writes: readonly string[];
}

/**
 * A step operation, dispatched by its document key.
 */
export interface StepOperation {
  /** Document key, e.g. `set`. */
  readonly name: string;
  /** Keys accepted besides the operation key, `when`, `at` and `after`. */
  readonly settingKeys: readonly string[];

  /**
   * Compiles a declaration.
   *
   * @throws DefinitionError located at the offending key.
   */
  compile(declaration: StepDeclaration, filters: FilterRegistry): StepAction;
}

/**
 * A compiled step.
 */
export interface Step {
  /** Zero-based index in the definition's step list. */
  readonly index: number;
  /** Operation name. */
  readonly operation: string;
  /** Guard expressions, combined with AND. Empty means always. */
  readonly when: readonly CompiledExpression[];
  readonly position: StepPosition;
  readonly action: StepAction;
}

/**
 * An `ensure` step whose requirements are not met.
 */
export interface UnmetRequirement {
  /** Index of the halting step. */
  readonly step: number;
  /** Source text of every falsy requirement; the path for plain references. */
  readonly unmet: readonly string[];
  /** Dotted paths read by the falsy requirements. */
  readonly paths: readonly string[];
}

/**
 * An `exit` step that ended the interview.
 */
export interface InterviewExit {
  readonly step: number;
  readonly title: string;
  readonly description: string | null;
}

/**
 * Result of {@link applySteps}.
 */
export type StepsResult =
  | { readonly status: 'done'; readonly context: Context }
  | { readonly status: 'unmet'; readonly context: Context; readonly requirement: UnmetRequirement }
  | { readonly status: 'exit'; readonly context: Context; readonly exit: InterviewExit };
