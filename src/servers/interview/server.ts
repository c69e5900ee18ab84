/**
 * Interview MCP server: exposes the interview service as tools.
 *
 * Every call is independent. Progress travels in the `state` token each
 * result returns, so the server keeps nothing between calls.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { ContextValueError, EvaluationError } from '../../expression/index.js';
import { DefinitionError } from '../../definition/index.js';
import { SubmissionError, UnmetRequirementError } from '../../interview/index.js';
import {
  InterviewNotFoundError,
  bootstrapService,
  type BootstrapOptions,
  type SubmissionInput,
} from '../../service/index.js';
import { IntegrityError } from '../../session/index.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';
import {
  SERVER_NAME,
  ToolArgumentError,
  UnknownToolError,
  type InterviewServerConfig,
  type ToolErrorBody,
  type ToolErrorKind,
} from './types.js';

type ToolArguments = Readonly<Record<string, unknown>>;

function readString(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ToolArgumentError(key, `'${key}' must be a non-empty string`);
  }
  return value;
}

function requireString(args: ToolArguments, key: string): string {
  const value = readString(args, key);
  if (value === undefined) {
    throw new ToolArgumentError(key, `'${key}' is required`);
  }
  return value;
}

/**
 * Maps an error to the `kind` reported to clients.
 */
export function classifyError(error: unknown): ToolErrorKind {
  if (error instanceof IntegrityError) {
    return 'integrity';
  }
  if (
    error instanceof SubmissionError ||
    error instanceof ContextValueError ||
    error instanceof ToolArgumentError
  ) {
    return 'submission';
  }
  if (error instanceof DefinitionError) {
    return 'definition';
  }
  if (error instanceof EvaluationError) {
    return 'evaluation';
  }
  if (error instanceof UnmetRequirementError) {
    return 'unmet';
  }
  if (error instanceof InterviewNotFoundError || error instanceof UnknownToolError) {
    return 'not_found';
  }
  return 'internal';
}

function success(body: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(body, null, 2) }] };
}

function failure(body: ToolErrorBody): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(body) }], isError: true };
}

/**
 * Creates the interview MCP server.
 *
 * Tools:
 * - `list_interviews`: ids, titles and accepted inputs.
 * - `start_interview {interview, context?}`: the first response and its state.
 * - `update_interview {state, question?, values?}`: applies an answer and
 *   returns the next response with a fresh state.
 *
 * Failures come back as `isError` results carrying `{error, kind}`.
 */
export function createInterviewServer(config: InterviewServerConfig): Server {
  const { service, version = '0.1.0' } = config;
  const logger = config.logger ?? createSilentLogger('server');

  const server = new Server(
    { name: SERVER_NAME, version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => {
    return Promise.resolve({
      tools: [
        {
          name: 'list_interviews',
          description: 'Lists the interviews that can be started.',
          inputSchema: { type: 'object', properties: {} },
        },
        {
          name: 'start_interview',
          description:
            'Starts an interview. Returns the first question (or the result) and a ' +
            '`state` token to pass to update_interview.',
          inputSchema: {
            type: 'object',
            properties: {
              interview: { type: 'string', description: 'Interview id from list_interviews' },
              context: {
                type: 'object',
                description: "Optional starting context, e.g. values for the interview's inputs",
              },
            },
            required: ['interview'],
          },
        },
        {
          name: 'update_interview',
          description:
            'Continues an interview from its `state` token. With `question` and `values`, ' +
            'answers that question first; without them, re-presents the current step.',
          inputSchema: {
            type: 'object',
            properties: {
              state: { type: 'string', description: 'The state token from the previous result' },
              question: { type: 'string', description: 'Id of the question being answered' },
              values: {
                type: 'object',
                description: 'Answers keyed by field path, e.g. {"registration.email": "..."}',
              },
            },
            required: ['state'],
          },
        },
      ],
    });
  });

  server.setRequestHandler(CallToolRequestSchema, (request): Promise<CallToolResult> => {
    const { name } = request.params;
    const args: ToolArguments = request.params.arguments ?? {};
    logger.debug('tool_call', { name });

    try {
      switch (name) {
        case 'list_interviews':
          return Promise.resolve(success({ interviews: service.listInterviews() }));
        case 'start_interview': {
          const interview = requireString(args, 'interview');
          return Promise.resolve(
            success(service.start(interview, { context: args['context'] }))
          );
        }
        case 'update_interview': {
          const state = requireString(args, 'state');
          const question = readString(args, 'question');
          if (question === undefined && args['values'] !== undefined) {
            throw new ToolArgumentError('values', "'values' requires 'question'");
          }
          const submission: SubmissionInput | undefined =
            question === undefined ? undefined : { question, values: args['values'] };
          return Promise.resolve(success(service.update(state, submission)));
        }
        default:
          throw new UnknownToolError(name);
      }
    } catch (error) {
      const kind = classifyError(error);
      const message = error instanceof Error ? error.message : String(error);
      if (kind === 'internal') {
        logger.error('tool_failed', { name, error: message });
        return Promise.resolve(failure({ error: 'Internal error', kind }));
      }
      logger.debug('tool_rejected', { name, kind, error: message });
      return Promise.resolve(failure({ error: message, kind }));
    }
  });

  return server;
}

/**
 * Options for {@link startInterviewServer}.
 */
export interface StartServerOptions extends BootstrapOptions {
  readonly version?: string;
}

/**
 * Loads configuration and definitions, then serves over stdio.
 *
 * `SIGHUP` reloads the definitions; a failed reload keeps the current set.
 */
export async function startInterviewServer(options: StartServerOptions = {}): Promise<void> {
  const { service, catalog, logger } = await bootstrapService(options);
  const serverLogger: Logger = logger.child('server');
  const server = createInterviewServer({
    service,
    logger: serverLogger,
    ...(options.version !== undefined ? { version: options.version } : {}),
  });

  process.on('SIGHUP', () => {
    serverLogger.info('reload_requested');
    catalog.reload().catch((error: unknown) => {
      serverLogger.warn('reload_skipped', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLogger.info('server_started', { interviews: catalog.list().length });
}
