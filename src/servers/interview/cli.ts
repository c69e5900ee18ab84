#!/usr/bin/env node
/**
 * CLI entry point for the interview MCP server.
 *
 * Usage:
 *   interview-server [--config <file>] [--definitions <path>]... [--debug]
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { Logger } from '../../utils/logger.js';
import { startInterviewServer, type StartServerOptions } from './server.js';

const HELP_TEXT = `
interview-server - MCP server for declarative interviews

Usage:
  interview-server [options]

Options:
  --config, -c <file>        Configuration file (default: interview-engine.toml if present)
  --definitions, -D <path>   Definition file or directory; repeatable, replaces definitions.paths
  --debug, -d                Enable debug logging
  --help, -h                 Show this help message

The session secret comes from session.secret or INTERVIEW_ENGINE_SESSION_SECRET.
Send SIGHUP to reload definitions.

Tools provided:
  - list_interviews: Lists the interviews that can be started
  - start_interview: Starts an interview and returns its first question
  - update_interview: Answers a question and returns the next step
`;

function parseArgs(): StartServerOptions {
  const args = process.argv.slice(2);
  let configFile: string | undefined;
  const definitions: string[] = [];
  let debug = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === '--config' || arg === '-c') && next !== undefined) {
      configFile = path.resolve(next);
      i++;
    } else if ((arg === '--definitions' || arg === '-D') && next !== undefined) {
      definitions.push(path.resolve(next));
      i++;
    } else if (arg === '--debug' || arg === '-d') {
      debug = true;
    } else if (arg === '--help' || arg === '-h') {
      process.stdout.write(HELP_TEXT);
      process.exit(0);
    }
  }

  return {
    ...(configFile !== undefined ? { configFile } : {}),
    ...(definitions.length > 0 ? { definitions } : {}),
    ...(debug ? { env: { ...process.env, INTERVIEW_ENGINE_DEBUG: 'true' } } : {}),
  };
}

const options = parseArgs();
const logger = new Logger({ component: 'interview-server' });

startInterviewServer(options).catch((err: unknown) => {
  const errorMessage = err instanceof Error ? err.message : String(err);
  logger.error('startup_failed', { error: errorMessage });
  process.exit(1);
});
