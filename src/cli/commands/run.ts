/**
 * Run command: walks an interview interactively through the service.
 *
 * Tokens stay inside the process, so a throwaway secret is used when none is
 * configured.
 */

import { randomBytes } from 'node:crypto';
import path from 'node:path';
import type { Value, ValueObject } from '../../expression/index.js';
import type { FieldDescriptor } from '../../fields/index.js';
import { bootstrapService, type EngineResponse } from '../../service/index.js';
import { Logger, createSilentLogger } from '../../utils/logger.js';
import { CliUsageError } from '../errors.js';
import type { CliCommandResult, CliContext, InputReader, OutputWriter } from '../types.js';
import {
  bold,
  displayValue,
  formatFieldPrompt,
  formatProblems,
  formatQuestion,
  selectOptions,
  type DisplayOptions,
} from '../utils/displayUtils.js';

/** Input that abandons the interview. */
export const QUIT_COMMAND = ':q';

/**
 * Parsed `run` arguments.
 */
export interface RunArgs {
  readonly interview: string;
  readonly configFile?: string;
  readonly definitions: readonly string[];
  readonly context?: unknown;
  readonly debug: boolean;
}

function parseContext(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliUsageError('run', `--context is not valid JSON: ${reason}`);
  }
}

/**
 * Parses `run <interview-id> [--config <file>] [--definitions <path>]...
 * [--context <json>] [--debug]`.
 *
 * @throws CliUsageError on unknown options, missing values or a missing id.
 */
export function parseRunArgs(args: readonly string[]): RunArgs {
  let interview: string | undefined;
  let configFile: string | undefined;
  const definitions: string[] = [];
  let context: unknown;
  let debug = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--debug') {
      debug = true;
      continue;
    }
    if (arg === '--config' || arg === '--definitions' || arg === '--context') {
      const next = args[i + 1];
      if (next === undefined) {
        throw new CliUsageError('run', `${arg} requires a value`);
      }
      i++;
      if (arg === '--config') {
        configFile = path.resolve(next);
      } else if (arg === '--definitions') {
        definitions.push(path.resolve(next));
      } else {
        context = parseContext(next);
      }
      continue;
    }
    if (arg.startsWith('-')) {
      throw new CliUsageError('run', `Unknown option: ${arg}`);
    }
    if (interview !== undefined) {
      throw new CliUsageError('run', `Unexpected argument: ${arg}`);
    }
    interview = arg;
  }

  if (interview === undefined) {
    throw new CliUsageError('run', 'Expected an interview id');
  }
  return {
    interview,
    definitions,
    debug,
    ...(configFile !== undefined ? { configFile } : {}),
    ...(context !== undefined ? { context } : {}),
  };
}

/**
 * Turns a typed line into a raw answer for a field.
 *
 * Blank input takes the field's default, or leaves the field unanswered.
 * Select input is split on commas; each entry matches an option by value or
 * label.
 */
export function parseFieldInput(field: FieldDescriptor, line: string): Value | undefined {
  const text = line.trim();
  if (text.length === 0) {
    return field.default;
  }
  if (field.type !== 'select') {
    return text;
  }
  const options = selectOptions(field);
  return text
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const option = options.find(
        (candidate) => displayValue(candidate.value) === entry || candidate.label === entry
      );
      return option === undefined ? entry : option.value;
    });
}

type Prompted = { readonly quit: true } | { readonly quit: false; readonly values: ValueObject };

async function promptQuestion(
  response: Extract<EngineResponse, { status: 'question' }>,
  reader: InputReader,
  out: OutputWriter,
  display: DisplayOptions
): Promise<Prompted> {
  const { question } = response;
  for (const line of formatQuestion(question, display)) {
    out.writeLine(line);
  }
  for (const line of formatProblems(question.errors, question.unmet, display)) {
    out.writeLine(line);
  }

  const values: Record<string, Value> = {};
  for (const field of question.fields) {
    const { lines, prompt } = formatFieldPrompt(field, display);
    for (const line of lines) {
      out.writeLine(line);
    }
    const input = await reader.readLine(prompt);
    if (input.trim() === QUIT_COMMAND) {
      return { quit: true };
    }
    const value = parseFieldInput(field, input);
    if (value !== undefined) {
      values[field.path] = value;
    }
  }
  return { quit: false, values };
}

/**
 * Handles the run command.
 */
export async function handleRunCommand(
  context: CliContext,
  display: DisplayOptions = { colors: false }
): Promise<CliCommandResult> {
  const args = parseRunArgs(context.args);
  const { out } = context.io;

  const logger = args.debug
    ? new Logger({ component: 'interview', debugMode: true })
    : createSilentLogger('interview');
  const { service } = await bootstrapService({
    ...(args.configFile !== undefined ? { configFile: args.configFile } : {}),
    ...(args.definitions.length > 0 ? { definitions: args.definitions } : {}),
    env: context.env,
    fallbackSecret: randomBytes(32).toString('base64url'),
    logger,
  });

  const reader = await context.io.createReader();
  try {
    out.writeLine(`Type ${QUIT_COMMAND} at any prompt to stop.`);
    let response = service.start(args.interview, { context: args.context });
    while (response.status === 'question') {
      const prompted = await promptQuestion(response, reader, out, display);
      if (prompted.quit) {
        out.writeLine('Interview stopped.');
        return { exitCode: 0 };
      }
      response = service.update(response.state, {
        question: response.question.id,
        values: prompted.values,
      });
    }

    out.writeLine('');
    if (response.status === 'exit') {
      out.writeLine(bold(response.title, display));
      if (response.description !== null && response.description.length > 0) {
        out.writeLine(response.description);
      }
      return { exitCode: 0 };
    }
    out.writeLine(bold('Interview complete.', display));
    out.writeLine(JSON.stringify(response.result, null, 2));
    return { exitCode: 0 };
  } finally {
    reader.close();
  }
}
