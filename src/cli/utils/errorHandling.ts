/**
 * Shared error handling utilities for CLI commands.
 */

import { reportError } from '../errors.js';
import type { CliCommandResult, OutputWriter } from '../types.js';

/**
 * Runs a command handler, reporting any error on `err`.
 *
 * @returns The command's exit code, or 1 if it threw.
 */
export async function executeCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  err: OutputWriter
): Promise<number> {
  try {
    const result = await fn();
    if (result.message !== undefined) {
      err.writeLine(result.message);
    }
    return result.exitCode;
  } catch (error) {
    reportError(error, err);
    return 1;
  }
}
