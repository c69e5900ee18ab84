/**
 * Reasons a state token can be rejected.
 */
export type IntegrityFailure =
  | 'malformed'
  | 'unsupported_version'
  | 'bad_signature'
  | 'bad_payload'
  | 'expired';

/**
 * Error raised when a state token fails verification.
 *
 * Nothing inside a rejected token is trusted; the interview must be
 * restarted.
 */
export class IntegrityError extends Error {
  /** Why the token was rejected. */
  public readonly reason: IntegrityFailure;

  /**
   * Creates a new IntegrityError.
   *
   * @param reason - Why the token was rejected.
   * @param message - Human-readable description.
   */
  constructor(reason: IntegrityFailure, message: string) {
    super(message);
    this.name = 'IntegrityError';
    this.reason = reason;
  }
}
