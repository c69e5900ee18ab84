/**
 * Interview definition and resolution types.
 *
 * A definition is compiled once, shared read-only across requests, and never
 * mutated. Progress is carried entirely by the answer history.
 *
 * @packageDocumentation
 */

import type {
  CompiledExpression,
  CompiledTemplate,
  Context,
  FilterRegistry,
  ValueObject,
} from '../expression/index.js';
import type { ConfiguredField, FieldDescriptor, FieldError } from '../fields/index.js';
import type { InterviewExit, Step } from '../steps/index.js';

/**
 * A compiled question.
 */
export interface Question {
  readonly id: string;
  readonly title: CompiledTemplate;
  readonly description: CompiledTemplate;
  /** Guard expressions, combined with AND. Empty means always asked. */
  readonly when: readonly CompiledExpression[];
  /** Fields in declaration order. */
  readonly fields: readonly ConfiguredField[];
}

/**
 * A compiled interview definition.
 */
export interface InterviewDefinition {
  readonly id: string;
  readonly title: string | undefined;
  /** Paths the caller may seed through the initial context. */
  readonly inputs: readonly string[];
  readonly questions: readonly Question[];
  /** Every step, in definition order. */
  readonly steps: readonly Step[];
  /** Steps positioned `at = "start"`. */
  readonly startSteps: readonly Step[];
  /** Steps positioned `after` a question, keyed by question id. */
  readonly stepsAfter: ReadonlyMap<string, readonly Step[]>;
  /** Steps positioned `at = "end"`. */
  readonly endSteps: readonly Step[];
  /** Filters the definition's expressions were compiled against. */
  readonly filters: FilterRegistry;
}

/**
 * Raw submitted values for one question, keyed by field path.
 */
export interface Answer {
  readonly question: string;
  readonly values: ValueObject;
}

/**
 * The authoritative record of progress: at most one entry per question id.
 */
export type AnswerHistory = readonly Answer[];

/**
 * Input to {@link resolveInterview}.
 */
export interface ResolveInput {
  /** Answers given so far. */
  readonly history: AnswerHistory;
  /** Initial context supplied when the interview started. */
  readonly context: Context;
  /** A new answer to apply before resolving. */
  readonly submission?: Answer;
}

/**
 * A question ready for the presentation layer.
 */
export interface QuestionDescriptor {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly fields: readonly FieldDescriptor[];
  /** Field-scoped validation failures. */
  readonly errors: readonly FieldError[];
  /** Requirements an `ensure` step found unmet. */
  readonly unmet: readonly string[];
  /** The values previously submitted for this question, if any. */
  readonly answer: ValueObject | null;
}

/**
 * Result of {@link resolveInterview}. Always carries the (possibly updated)
 * history and the context built so far.
 */
export type ResolveResult =
  | {
      readonly status: 'awaiting';
      readonly history: AnswerHistory;
      readonly context: Context;
      readonly question: QuestionDescriptor;
    }
  | { readonly status: 'completed'; readonly history: AnswerHistory; readonly context: Context }
  | {
      readonly status: 'exited';
      readonly history: AnswerHistory;
      readonly context: Context;
      readonly exit: InterviewExit;
    };
