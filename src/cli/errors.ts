/**
 * Error reporting for the interview CLI.
 *
 * Pairs each failure with a suggestion for resolving it.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { DefinitionError } from '../definition/index.js';
import { EvaluationError } from '../expression/index.js';
import { SubmissionError, UnmetRequirementError } from '../interview/index.js';
import { InterviewNotFoundError } from '../service/index.js';
import type { OutputWriter } from './types.js';

/**
 * Error raised for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  /** The command being parsed. */
  public readonly command: string;

  constructor(command: string, message: string) {
    super(message);
    this.name = 'CliUsageError';
    this.command = command;
  }
}

/**
 * Suggests how to resolve an error, if there is anything to suggest.
 */
export function suggestionFor(error: unknown): string | undefined {
  if (error instanceof CliUsageError) {
    return `Run "interview help ${error.command}" for usage information.`;
  }
  if (error instanceof ConfigValidationError || error instanceof EnvCoercionError) {
    return 'Check interview-engine.toml and the INTERVIEW_ENGINE_* environment variables.';
  }
  if (error instanceof ConfigParseError) {
    return 'Fix the configuration file or pass another with --config.';
  }
  if (error instanceof DefinitionError) {
    return 'Run "interview check <paths...>" to validate the definitions.';
  }
  if (error instanceof InterviewNotFoundError) {
    return 'Run "interview check <paths...>" to list the interviews that load.';
  }
  if (error instanceof UnmetRequirementError && error.atStart) {
    return 'Pass the interview inputs with --context.';
  }
  if (error instanceof EvaluationError || error instanceof UnmetRequirementError) {
    return 'This is a problem in the interview definition; report it to its author.';
  }
  if (error instanceof SubmissionError) {
    return 'Start the interview again.';
  }
  return undefined;
}

/**
 * Writes an error and its suggestion.
 */
export function reportError(error: unknown, err: OutputWriter): void {
  err.writeLine(`Error: ${error instanceof Error ? error.message : String(error)}`);
  const suggestion = suggestionFor(error);
  if (suggestion !== undefined) {
    err.writeLine(`Hint: ${suggestion}`);
  }
}
