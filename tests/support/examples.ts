/**
 * Compiles the bundled example definitions for tests.
 */

import { fileURLToPath } from 'node:url';
import { compileDefinitions, formatForPath, parseDefinitionDocument } from '../../src/definition/index.js';
import type { InterviewDefinition } from '../../src/interview/index.js';
import { safeReadTextFileSync } from '../../src/utils/safe-fs.js';

/** Directory holding the example definition files. */
export const EXAMPLES_DIR = fileURLToPath(new URL('../../examples', import.meta.url));

const FILES = ['registration.yaml', 'feedback.toml'];

/**
 * Compiles every example interview.
 */
export function exampleInterviews(): InterviewDefinition[] {
  return FILES.flatMap((name) => {
    const file = `${EXAMPLES_DIR}/${name}`;
    const format = formatForPath(file);
    if (format === undefined) {
      throw new Error(`Unsupported example ${name}`);
    }
    const document = parseDefinitionDocument(safeReadTextFileSync(file), format, file);
    return [...compileDefinitions(document, { source: file }).interviews];
  });
}

/**
 * Compiles one example interview by id.
 */
export function exampleInterview(id: string): InterviewDefinition {
  const definition = exampleInterviews().find((candidate) => candidate.id === id);
  if (definition === undefined) {
    throw new Error(`No example interview '${id}'`);
  }
  return definition;
}

/**
 * Compiles a single interview from plain data.
 */
export function compileInterview(interview: Record<string, unknown>): InterviewDefinition {
  const [definition] = compileDefinitions({ interviews: [interview] }).interviews;
  if (definition === undefined) {
    throw new Error('Expected one interview');
  }
  return definition;
}
