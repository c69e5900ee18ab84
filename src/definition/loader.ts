/**
 * Reads definition files and directories from disk.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { InterviewDefinition } from '../interview/index.js';
import {
  safeExistsSync,
  safeReadTextFile,
  safeReaddirEntries,
  safeStat,
} from '../utils/safe-fs.js';
import { compileDefinitions, type CompileOptions } from './compiler.js';
import { formatForPath, parseDefinitionDocument } from './document.js';
import { DefinitionError } from './errors.js';
import type { LintIssue } from './lint.js';

/**
 * Options for {@link loadDefinitionFiles}.
 */
export type LoadDefinitionOptions = Omit<CompileOptions, 'source'>;

/**
 * Every interview found under the given paths.
 */
export interface LoadedDefinitions {
  readonly interviews: readonly InterviewDefinition[];
  readonly warnings: readonly LintIssue[];
  /** Files read, in load order. */
  readonly files: readonly string[];
}

async function collectFiles(target: string): Promise<string[]> {
  if (!safeExistsSync(target)) {
    throw new DefinitionError('Definition path does not exist', target);
  }
  const stats = await safeStat(target);
  if (!stats.isDirectory()) {
    if (formatForPath(target) === undefined) {
      throw new DefinitionError(
        'Unsupported definition file (expected .toml, .yaml or .yml)',
        target
      );
    }
    return [target];
  }

  const entries = await safeReaddirEntries(target);
  const names = entries.map((entry) => entry.name).sort();
  const files: string[] = [];
  for (const name of names) {
    const entry = entries.find((candidate) => candidate.name === name);
    const child = path.join(target, name);
    if (entry?.isDirectory() === true) {
      files.push(...(await collectFiles(child)));
    } else if (formatForPath(name) !== undefined) {
      files.push(child);
    }
  }
  return files;
}

/**
 * Loads and compiles every `.toml`, `.yaml` and `.yml` file under `paths`.
 *
 * Directories are searched recursively in name order. Interview ids must be
 * unique across all files.
 *
 * @param paths - Files and directories.
 * @param options - Compile options shared by every file.
 * @throws DefinitionError located at the failing file.
 */
export async function loadDefinitionFiles(
  paths: readonly string[],
  options: LoadDefinitionOptions = {}
): Promise<LoadedDefinitions> {
  const files: string[] = [];
  for (const target of paths) {
    for (const file of await collectFiles(target)) {
      if (!files.includes(file)) {
        files.push(file);
      }
    }
  }

  const interviews: InterviewDefinition[] = [];
  const warnings: LintIssue[] = [];
  const origins = new Map<string, string>();
  for (const file of files) {
    const format = formatForPath(file);
    if (format === undefined) {
      continue;
    }
    const document = parseDefinitionDocument(await safeReadTextFile(file), format, file);
    const compiled = compileDefinitions(document, { ...options, source: file });
    for (const definition of compiled.interviews) {
      const origin = origins.get(definition.id);
      if (origin !== undefined) {
        throw new DefinitionError(
          `Duplicate interview id '${definition.id}' (first defined in ${origin})`,
          `${file}: interviews[${definition.id}]`
        );
      }
      origins.set(definition.id, file);
      interviews.push(definition);
    }
    warnings.push(
      ...compiled.warnings.map((issue) => ({ ...issue, location: `${file}: ${issue.location}` }))
    );
  }

  return { interviews, warnings, files };
}
