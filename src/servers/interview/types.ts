/**
 * Types for the interview MCP server.
 *
 * @packageDocumentation
 */

import type { InterviewService } from '../../service/index.js';
import type { Logger } from '../../utils/logger.js';

/** Name the server announces to clients. */
export const SERVER_NAME = 'interview-engine';

/**
 * Error categories returned in a failed tool result's `kind`.
 *
 * - `integrity`: the state token failed verification; restart the interview.
 * - `submission`: the request or answer was malformed or out of order.
 * - `definition`: a definition failed to load.
 * - `evaluation`: a definition expression failed at run time.
 * - `unmet`: a requirement no question can satisfy.
 * - `not_found`: unknown interview or tool.
 * - `internal`: anything else.
 */
export type ToolErrorKind =
  | 'integrity'
  | 'submission'
  | 'definition'
  | 'evaluation'
  | 'unmet'
  | 'not_found'
  | 'internal';

/**
 * Body of a failed tool result.
 */
export interface ToolErrorBody {
  readonly error: string;
  readonly kind: ToolErrorKind;
}

/**
 * Configuration for {@link createInterviewServer}.
 */
export interface InterviewServerConfig {
  readonly service: InterviewService;
  readonly logger?: Logger;
  /** Version announced to clients. */
  readonly version?: string;
}

/**
 * Error raised when tool arguments have the wrong shape.
 */
export class ToolArgumentError extends Error {
  /** The offending argument. */
  public readonly argument: string;

  /**
   * Creates a new ToolArgumentError.
   *
   * @param argument - The offending argument.
   * @param message - Description of the problem.
   */
  constructor(argument: string, message: string) {
    super(message);
    this.name = 'ToolArgumentError';
    this.argument = argument;
  }
}

/**
 * Error raised for a tool name the server does not provide.
 */
export class UnknownToolError extends Error {
  /** The requested tool name. */
  public readonly tool: string;

  constructor(tool: string) {
    super(`Unknown tool: ${tool}`);
    this.name = 'UnknownToolError';
    this.tool = tool;
  }
}
