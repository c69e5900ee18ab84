/**
 * Check command: loads and lints definition files.
 */

import {
  DefinitionError,
  loadDefinitionFiles,
  type LoadedDefinitions,
} from '../../definition/index.js';
import { CliUsageError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Parsed `check` arguments.
 */
export interface CheckArgs {
  readonly paths: readonly string[];
  readonly strict: boolean;
}

/**
 * Parses `check <paths...> [--strict]`.
 *
 * @throws CliUsageError on an unknown flag or when no path is given.
 */
export function parseCheckArgs(args: readonly string[]): CheckArgs {
  const paths: string[] = [];
  let strict = false;
  for (const arg of args) {
    if (arg === '--strict') {
      strict = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError('check', `Unknown option: ${arg}`);
    } else {
      paths.push(arg);
    }
  }
  if (paths.length === 0) {
    throw new CliUsageError('check', 'Expected at least one definition file or directory');
  }
  return { paths, strict };
}

function plural(count: number, noun: string): string {
  return `${String(count)} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Handles the check command.
 *
 * Prints one line per interview and per lint warning. A definition error is
 * reported with its location and exits with 1.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const { out } = context.io;
  const { paths, strict } = parseCheckArgs(context.args);

  let loaded: LoadedDefinitions;
  try {
    loaded = await loadDefinitionFiles(paths, { strictPaths: strict });
  } catch (error) {
    if (error instanceof DefinitionError) {
      return { exitCode: 1, message: `Error: ${error.message}` };
    }
    throw error;
  }

  for (const warning of loaded.warnings) {
    out.writeLine(`warning: ${warning.location}: ${warning.message}`);
  }
  for (const definition of loaded.interviews) {
    const title = definition.title === undefined ? '' : ` "${definition.title}"`;
    out.writeLine(
      `  ${definition.id}${title} (${plural(definition.questions.length, 'question')}, ${plural(definition.steps.length, 'step')})`
    );
  }
  out.writeLine(
    `Checked ${plural(loaded.files.length, 'file')}: ${plural(loaded.interviews.length, 'interview')}, ${plural(loaded.warnings.length, 'warning')}`
  );
  return { exitCode: 0 };
}
