/**
 * Compiles definition documents into immutable interview definitions.
 *
 * @packageDocumentation
 */

import { PathError, defaultFilterRegistry, parsePath, type FilterRegistry } from '../expression/index.js';
import { createDefaultFieldTypeRegistry, type ConfiguredField, type FieldTypeRegistry } from '../fields/index.js';
import type { InterviewDefinition, Question } from '../interview/index.js';
import { StepOperationRegistry, type Step } from '../steps/index.js';
import { isRecord, validateDocument } from './document.js';
import { DefinitionError } from './errors.js';
import { compileGuardSetting, compileTemplateSetting } from './expressions.js';
import { lintDefinition, type LintIssue } from './lint.js';

/**
 * Registries and policies a document is compiled against.
 */
export interface CompileOptions {
  readonly fields?: FieldTypeRegistry;
  readonly steps?: StepOperationRegistry;
  readonly filters?: FilterRegistry;
  /** Treat undeclared references in guards and templates as fatal. */
  readonly strictPaths?: boolean;
  /** File name prefixed to error locations. */
  readonly source?: string;
}

/**
 * Result of compiling one document.
 */
export interface CompiledDocument {
  readonly interviews: readonly InterviewDefinition[];
  /** Non-fatal lint findings. */
  readonly warnings: readonly LintIssue[];
}

interface Registries {
  readonly fields: FieldTypeRegistry;
  readonly steps: StepOperationRegistry;
  readonly filters: FilterRegistry;
}

/**
 * Runs `compile`, nesting any DefinitionError under `prefix`.
 */
function within<T>(prefix: string, compile: () => T): T {
  try {
    return compile();
  } catch (error) {
    if (error instanceof DefinitionError) {
      throw error.within(prefix);
    }
    throw error;
  }
}

function overlaps(left: string, right: string): boolean {
  return left === right || left.startsWith(`${right}.`) || right.startsWith(`${left}.`);
}

function compileFields(
  raw: unknown,
  registries: Registries,
  provided: Map<string, string>,
  questionId: string
): ConfiguredField[] {
  if (!isRecord(raw)) {
    throw new DefinitionError('Expected a table of fields', 'fields');
  }
  return Object.entries(raw).map(([path, declaration]) =>
    within(`fields[${path}]`, () => {
      for (const [other, owner] of provided) {
        if (overlaps(path, other)) {
          throw new DefinitionError(
            owner === questionId
              ? `Field path overlaps '${other}'`
              : `Field path overlaps '${other}' from question '${owner}'`
          );
        }
      }
      if (!isRecord(declaration)) {
        throw new DefinitionError('Expected a table of field settings');
      }
      const field = registries.fields.configure(path, declaration);
      provided.set(path, questionId);
      return field;
    })
  );
}

function compileQuestion(
  raw: Record<string, unknown>,
  registries: Registries,
  provided: Map<string, string>
): Question {
  const { id } = raw;
  if (typeof id !== 'string') {
    throw new DefinitionError('Expected a question id', 'id');
  }
  const { filters } = registries;
  return {
    id,
    title: compileTemplateSetting(raw['title'] ?? '', 'title', filters),
    description: compileTemplateSetting(raw['description'] ?? '', 'description', filters),
    when: compileGuardSetting(raw['when'], 'when', filters),
    fields: compileFields(raw['fields'], registries, provided, id),
  };
}

function readInputs(raw: unknown): string[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new DefinitionError('Expected a list of paths', 'inputs');
  }
  return raw.map((entry: unknown, index) => {
    const location = `inputs[${String(index)}]`;
    if (typeof entry !== 'string') {
      throw new DefinitionError('Expected a path', location);
    }
    try {
      parsePath(entry);
    } catch (error) {
      if (error instanceof PathError) {
        throw new DefinitionError(error.message, location, error);
      }
      throw error;
    }
    return entry;
  });
}

function compileInterview(raw: Record<string, unknown>, registries: Registries): InterviewDefinition {
  const { id, title } = raw;
  if (typeof id !== 'string') {
    throw new DefinitionError('Expected an interview id', 'id');
  }

  const questions: Question[] = [];
  const provided = new Map<string, string>();
  const rawQuestions = Array.isArray(raw['questions']) ? raw['questions'] : [];
  for (const entry of rawQuestions) {
    const questionId = isRecord(entry) && typeof entry['id'] === 'string' ? entry['id'] : '?';
    const question = within(`questions[${questionId}]`, () => {
      if (!isRecord(entry)) {
        throw new DefinitionError('Expected a question table');
      }
      if (questions.some((existing) => existing.id === questionId)) {
        throw new DefinitionError(`Duplicate question id '${questionId}'`, 'id');
      }
      return compileQuestion(entry, registries, provided);
    });
    questions.push(question);
  }

  const questionIds = new Set(questions.map((question) => question.id));
  const rawSteps = Array.isArray(raw['steps']) ? raw['steps'] : [];
  const steps: Step[] = rawSteps.map((entry: unknown, index) =>
    within(`steps[${String(index)}]`, () => {
      if (!isRecord(entry)) {
        throw new DefinitionError('Expected a step table');
      }
      const step = registries.steps.compile(entry, index, registries.filters);
      if (step.position.kind === 'after' && !questionIds.has(step.position.question)) {
        throw new DefinitionError(`Unknown question '${step.position.question}'`, 'after');
      }
      return step;
    })
  );

  const stepsAfter = new Map<string, Step[]>();
  for (const step of steps) {
    if (step.position.kind === 'after') {
      const list = stepsAfter.get(step.position.question) ?? [];
      list.push(step);
      stepsAfter.set(step.position.question, list);
    }
  }

  return {
    id,
    title: typeof title === 'string' ? title : undefined,
    inputs: readInputs(raw['inputs']),
    questions,
    steps,
    startSteps: steps.filter((step) => step.position.kind === 'start'),
    stepsAfter,
    endSteps: steps.filter((step) => step.position.kind === 'end'),
    filters: registries.filters,
  };
}

/**
 * Validates a parsed document against the schema and compiles every
 * interview in it.
 *
 * Expressions, templates, fields and steps are all compiled up front, and
 * every definition is linted: undeclared references inside steps are always
 * fatal, those in question guards and templates only under `strictPaths`.
 *
 * @param document - Plain data from {@link parseDefinitionDocument}.
 * @param options - Registries and policies.
 * @returns The compiled interviews and any lint warnings.
 * @throws DefinitionError located within the document, e.g.
 *   `interviews[new-registration].questions[email].fields[registration.email].format`.
 */
export function compileDefinitions(
  document: unknown,
  options: CompileOptions = {}
): CompiledDocument {
  const registries: Registries = {
    fields: options.fields ?? createDefaultFieldTypeRegistry(),
    steps: options.steps ?? new StepOperationRegistry(),
    filters: options.filters ?? defaultFilterRegistry,
  };
  const { source } = options;

  const locate = <T>(compile: () => T): T => {
    try {
      return compile();
    } catch (error) {
      if (source !== undefined && error instanceof DefinitionError) {
        throw error.inFile(source);
      }
      throw error;
    }
  };

  return locate(() => {
    const valid = validateDocument(document);
    const rawInterviews = Array.isArray(valid['interviews']) ? valid['interviews'] : [];

    const interviews: InterviewDefinition[] = [];
    const warnings: LintIssue[] = [];
    for (const entry of rawInterviews) {
      const interviewId = isRecord(entry) && typeof entry['id'] === 'string' ? entry['id'] : '?';
      within(`interviews[${interviewId}]`, () => {
        if (!isRecord(entry)) {
          throw new DefinitionError('Expected an interview table');
        }
        if (interviews.some((existing) => existing.id === interviewId)) {
          throw new DefinitionError(`Duplicate interview id '${interviewId}'`, 'id');
        }
        const definition = compileInterview(entry, registries);
        for (const issue of lintDefinition(definition, { strictPaths: options.strictPaths ?? false })) {
          if (issue.severity === 'error') {
            throw new DefinitionError(issue.message, issue.location);
          }
          warnings.push({ ...issue, location: `interviews[${interviewId}].${issue.location}` });
        }
        interviews.push(definition);
      });
    }
    return { interviews, warnings };
  });
}
