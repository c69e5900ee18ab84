/**
 * Request and response shapes for the interview service.
 *
 * @packageDocumentation
 */

import type { Context } from '../expression/index.js';
import type { QuestionDescriptor } from '../interview/index.js';

/**
 * An interview offered by the catalog.
 */
export interface InterviewSummary {
  readonly id: string;
  readonly title: string | null;
  /** Paths a caller may seed through the starting context. */
  readonly inputs: readonly string[];
}

/**
 * An answer as received from a caller. Values are checked before use.
 */
export interface SubmissionInput {
  readonly question: string;
  readonly values?: unknown;
}

/**
 * Options for {@link InterviewService.start}.
 */
export interface StartOptions {
  /** Starting context; must be a plain JSON object. */
  readonly context?: unknown;
}

/**
 * What a caller receives after each round trip. `state` is the signed token
 * to send back with the next request.
 */
export type EngineResponse =
  | { readonly status: 'question'; readonly state: string; readonly question: QuestionDescriptor }
  | { readonly status: 'complete'; readonly state: string; readonly result: Context }
  | {
      readonly status: 'exit';
      readonly state: string;
      readonly title: string;
      readonly description: string | null;
    };
