/**
 * Errors raised by the interview service.
 *
 * @packageDocumentation
 */

/**
 * Error raised when an interview id is not in the catalog.
 */
export class InterviewNotFoundError extends Error {
  /** The id that was requested. */
  public readonly interview: string;

  /**
   * Creates a new InterviewNotFoundError.
   *
   * @param interview - The id that was requested.
   */
  constructor(interview: string) {
    super(`Unknown interview '${interview}'`);
    this.name = 'InterviewNotFoundError';
    this.interview = interview;
  }
}
