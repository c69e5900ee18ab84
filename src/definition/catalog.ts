/**
 * The set of compiled interview definitions a process serves.
 *
 * @packageDocumentation
 */

import type { InterviewDefinition } from '../interview/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { LintIssue } from './lint.js';
import { loadDefinitionFiles, type LoadDefinitionOptions, type LoadedDefinitions } from './loader.js';

/**
 * An immutable snapshot of loaded definitions.
 */
export interface CatalogSnapshot {
  readonly definitions: ReadonlyMap<string, InterviewDefinition>;
  readonly warnings: readonly LintIssue[];
  readonly files: readonly string[];
}

/**
 * Options for {@link DefinitionCatalog}.
 */
export interface DefinitionCatalogOptions extends LoadDefinitionOptions {
  /** Files and directories {@link DefinitionCatalog.reload} reads. */
  readonly paths?: readonly string[];
  readonly logger?: Logger;
}

function snapshotOf(
  interviews: readonly InterviewDefinition[],
  warnings: readonly LintIssue[] = [],
  files: readonly string[] = []
): CatalogSnapshot {
  const definitions = new Map<string, InterviewDefinition>();
  for (const definition of interviews) {
    if (definitions.has(definition.id)) {
      throw new Error(`Duplicate interview id '${definition.id}'`);
    }
    definitions.set(definition.id, definition);
  }
  return { definitions, warnings, files };
}

/**
 * Holds the compiled definitions behind a single reference.
 *
 * A new set is built completely before it replaces the old one, so a reader
 * sees either the previous set or the new one. A failed reload leaves the
 * previous set in place.
 */
export class DefinitionCatalog {
  private snapshot: CatalogSnapshot = { definitions: new Map(), warnings: [], files: [] };
  private readonly paths: readonly string[];
  private readonly loadOptions: LoadDefinitionOptions;
  private readonly logger: Logger;

  constructor(options: DefinitionCatalogOptions = {}) {
    const { paths = [], logger, ...loadOptions } = options;
    this.paths = paths;
    this.loadOptions = loadOptions;
    this.logger = logger ?? createSilentLogger('catalog');
  }

  /**
   * Looks up a definition by id.
   */
  get(id: string): InterviewDefinition | undefined {
    return this.snapshot.definitions.get(id);
  }

  /**
   * Lists definitions in load order.
   */
  list(): InterviewDefinition[] {
    return [...this.snapshot.definitions.values()];
  }

  /**
   * The current snapshot.
   */
  current(): CatalogSnapshot {
    return this.snapshot;
  }

  /**
   * Swaps in an already compiled set.
   *
   * @throws Error if two definitions share an id; the current set is kept.
   */
  replace(definitions: readonly InterviewDefinition[]): CatalogSnapshot {
    this.snapshot = snapshotOf(definitions);
    this.logger.info('definitions_replaced', { count: this.snapshot.definitions.size });
    return this.snapshot;
  }

  /**
   * Reads the configured paths again and swaps in the result.
   *
   * @throws DefinitionError if any file fails to load; the current set is kept.
   */
  async reload(): Promise<CatalogSnapshot> {
    let loaded: LoadedDefinitions;
    try {
      loaded = await loadDefinitionFiles(this.paths, this.loadOptions);
    } catch (error) {
      this.logger.error('definitions_reload_failed', {
        error: error instanceof Error ? error.message : String(error),
        kept: this.snapshot.definitions.size,
      });
      throw error;
    }

    this.snapshot = snapshotOf(loaded.interviews, loaded.warnings, loaded.files);
    for (const warning of loaded.warnings) {
      this.logger.warn('definition_lint_warning', {
        location: warning.location,
        path: warning.path,
        message: warning.message,
      });
    }
    this.logger.info('definitions_loaded', {
      count: this.snapshot.definitions.size,
      files: loaded.files.length,
      warnings: loaded.warnings.length,
    });
    return this.snapshot;
  }
}
