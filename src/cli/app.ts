/**
 * Command dispatch for the interview CLI.
 */

import { getEnvVarDocumentation, type EnvRecord } from '../config/index.js';
import { handleCheckCommand } from './commands/check.js';
import { handleRunCommand } from './commands/run.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliContext, CliIo } from './types.js';
import { executeCommand } from './utils/errorHandling.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Displays usage information.
 */
export function helpText(): string {
  return `
interview-engine CLI v${getVersionFromPackageJson()}

USAGE:
  interview <command> [options]

COMMANDS:
  check       Load and lint definition files
  run         Walk an interview in the terminal
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  interview check interviews/
  interview check registration.yaml --strict
  interview run new-registration --definitions interviews/
`;
}

/**
 * Lists the configuration environment variables, one per line.
 */
export function environmentHelp(): string {
  return Object.entries(getEnvVarDocumentation())
    .map(([name, description]) => `  ${name}\n      ${description}`)
    .join('\n');
}

const COMMAND_HELP: ReadonlyMap<string, string> = new Map([
  [
    'check',
    `
USAGE: interview check <paths...> [--strict]

Loads every .toml, .yaml and .yml file under the given files and
directories, then lists the interviews found and any lint warnings.
Exits with 1 on the first definition error.

OPTIONS:
  --strict    Treat references to undeclared paths as errors

EXAMPLES:
  interview check interviews/
  interview check registration.yaml feedback.toml --strict
`,
  ],
  [
    'run',
    `
USAGE: interview run <interview-id> [options]

Walks an interview interactively. Select fields take option values or
labels, comma-separated when several may be chosen. Blank input takes the
field's default. Type :q at any prompt to stop.

OPTIONS:
  --config <file>        Configuration file (default: interview-engine.toml if present)
  --definitions <path>   Definition file or directory; repeatable
  --context <json>       Starting context, e.g. '{"attendee": {"name": "Sam"}}'
  --debug                Log debug events to stderr

ENVIRONMENT:
${environmentHelp()}

EXAMPLES:
  interview run new-registration --definitions interviews/
  interview run session-feedback --context '{"attendee": {"name": "Sam"}}'
`,
  ],
]);

/**
 * Runs the CLI with the given arguments.
 *
 * @returns The exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
  env: EnvRecord,
  display: DisplayOptions = { colors: false }
): Promise<number> {
  const command = argv[0] ?? '';
  const args = argv.slice(1);
  const context: CliContext = { args, io, env };
  const wantsHelp = args.includes('--help') || args.includes('-h');

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = args[0];
      if (topic === undefined) {
        io.out.writeLine(helpText());
        return 0;
      }
      const help = COMMAND_HELP.get(topic);
      if (help === undefined) {
        io.err.writeLine(`Unknown command: ${topic}`);
        io.err.writeLine('\nRun "interview help" to see all available commands.');
        return 1;
      }
      io.out.writeLine(help);
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return executeCommand(() => handleVersionCommand(io.out), io.err);

    case 'check':
    case 'run':
      if (wantsHelp) {
        io.out.writeLine(COMMAND_HELP.get(command) ?? '');
        return 0;
      }
      return executeCommand(
        () => (command === 'check' ? handleCheckCommand(context) : handleRunCommand(context, display)),
        io.err
      );

    default:
      io.err.writeLine(`Error: Unknown command: ${command}`);
      io.err.writeLine('\nRun "interview help" for usage information.');
      return 1;
  }
}
