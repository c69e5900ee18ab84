/**
 * Interview MCP server package.
 *
 * Serves the interview service over the Model Context Protocol. The server is
 * stateless: each tool result carries the `state` token for the next call.
 *
 * @packageDocumentation
 */

export {
  classifyError,
  createInterviewServer,
  startInterviewServer,
  type StartServerOptions,
} from './server.js';
export {
  SERVER_NAME,
  ToolArgumentError,
  UnknownToolError,
  type InterviewServerConfig,
  type ToolErrorBody,
  type ToolErrorKind,
} from './types.js';
