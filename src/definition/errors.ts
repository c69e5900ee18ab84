/**
 * Error raised when an interview definition cannot be loaded.
 *
 * Covers malformed documents, duplicate ids, unknown field types or step
 * operations, bad field configuration, expression syntax errors and steps that
 * reference undeclared paths. Always fatal at load time.
 */
export class DefinitionError extends Error {
  /** The bare description, without location. */
  public readonly detail: string;
  /**
   * Where the problem is, e.g.
   * `interviews[new-registration].questions[email].fields[registration.email]`.
   */
  public readonly location: string | undefined;

  /**
   * Creates a new DefinitionError.
   *
   * @param detail - Description of the problem.
   * @param location - Location within the document.
   * @param cause - The underlying error, if any.
   */
  constructor(detail: string, location?: string, cause?: unknown) {
    super(location === undefined ? detail : `${location}: ${detail}`, { cause });
    this.name = 'DefinitionError';
    this.detail = detail;
    this.location = location;
  }

  /**
   * Returns a copy located inside `prefix`.
   *
   * @param prefix - Enclosing location, e.g. `interviews[upgrade-registration]`.
   */
  within(prefix: string): DefinitionError {
    const location =
      this.location === undefined
        ? prefix
        : this.location.startsWith('[')
          ? `${prefix}${this.location}`
          : `${prefix}.${this.location}`;
    return new DefinitionError(this.detail, location, this.cause);
  }

  /**
   * Returns a copy located inside the file `source`, e.g.
   * `interviews.yaml: interviews[a].id`.
   */
  inFile(source: string): DefinitionError {
    return new DefinitionError(
      this.detail,
      this.location === undefined ? source : `${source}: ${this.location}`,
      this.cause
    );
  }
}
