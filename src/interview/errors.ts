/**
 * Errors raised while resolving an interview.
 *
 * @packageDocumentation
 */

import type { UnmetRequirement } from '../steps/index.js';

/**
 * Error raised when a submission targets a question that is unknown, skipped
 * or not yet reached.
 */
export class SubmissionError extends Error {
  /** The question id the submission named. */
  public readonly question: string;

  /**
   * Creates a new SubmissionError.
   *
   * @param message - Description of the problem.
   * @param question - The question id the submission named.
   */
  constructor(message: string, question: string) {
    super(message);
    this.name = 'SubmissionError';
    this.question = question;
  }
}

/**
 * Error raised when an `ensure` step fails and no applicable question
 * provides any of the unmet paths, or when a start step's `ensure` fails.
 *
 * @remarks
 * This indicates an authoring bug, or for a start step a caller that left
 * out a required input.
 */
export class UnmetRequirementError extends Error {
  /** The interview being resolved. */
  public readonly interview: string;
  /** The failing requirement. */
  public readonly requirement: UnmetRequirement;
  /** True when the step runs before any question. */
  public readonly atStart: boolean;

  /**
   * Creates a new UnmetRequirementError.
   *
   * @param interview - The interview id.
   * @param requirement - The failing requirement.
   * @param position - `start` when the step runs before any question.
   */
  constructor(interview: string, requirement: UnmetRequirement, position?: 'start') {
    const unmet = requirement.unmet.join(', ');
    super(
      position === 'start'
        ? `Interview '${interview}' step ${String(requirement.step)} requires ${unmet} from the starting context`
        : `Interview '${interview}' step ${String(requirement.step)} requires ${unmet}, which no question provides`
    );
    this.name = 'UnmetRequirementError';
    this.interview = interview;
    this.requirement = requirement;
    this.atStart = position === 'start';
  }
}
