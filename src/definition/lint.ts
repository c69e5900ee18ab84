/**
 * Reference checks for compiled definitions.
 *
 * @packageDocumentation
 */

import { collectReferences, templateReferences } from '../expression/index.js';
import type { InterviewDefinition } from '../interview/index.js';

/**
 * Severity of a lint finding. Errors stop the definition from loading.
 */
export type LintSeverity = 'error' | 'warning';

/**
 * A reference to a path nothing declares.
 */
export interface LintIssue {
  readonly severity: LintSeverity;
  /** Location relative to the interview, e.g. `steps[2]` or `questions[email].when`. */
  readonly location: string;
  /** The undeclared path. */
  readonly path: string;
  readonly message: string;
}

/**
 * Options for {@link lintDefinition}.
 */
export interface LintOptions {
  /** Report undeclared references in question guards and templates as errors. */
  readonly strictPaths?: boolean;
}

/**
 * Lists the paths a definition declares: field paths, `set` targets and inputs.
 */
export function declaredPaths(definition: InterviewDefinition): Set<string> {
  const declared = new Set<string>(definition.inputs);
  for (const question of definition.questions) {
    question.fields.forEach((field) => declared.add(field.path));
  }
  for (const step of definition.steps) {
    step.action.writes.forEach((path) => declared.add(path));
  }
  return declared;
}

// A reference is covered by a declaration on either side of a dotted prefix:
// `registration` reads the object `registration.email` builds, and
// `registration.options.0` reads into a declared list.
function isDeclared(path: string, declared: ReadonlySet<string>): boolean {
  for (const entry of declared) {
    if (entry === path || entry.startsWith(`${path}.`) || path.startsWith(`${entry}.`)) {
      return true;
    }
  }
  return false;
}

/**
 * Reports every reference to an undeclared path.
 *
 * References inside steps are always errors; references in question guards,
 * titles, descriptions and field templates are warnings unless `strictPaths`
 * is set.
 *
 * @param definition - A compiled definition.
 * @param options - Lint options.
 * @returns Findings in definition order.
 */
export function lintDefinition(
  definition: InterviewDefinition,
  options: LintOptions = {}
): LintIssue[] {
  const declared = declaredPaths(definition);
  const questionSeverity: LintSeverity = options.strictPaths === true ? 'error' : 'warning';
  const issues: LintIssue[] = [];

  const check = (paths: readonly string[], location: string, severity: LintSeverity): void => {
    for (const path of paths) {
      if (!isDeclared(path, declared)) {
        issues.push({
          severity,
          location,
          path,
          message: `Reference to undeclared path '${path}'`,
        });
      }
    }
  };

  for (const question of definition.questions) {
    const base = `questions[${question.id}]`;
    check(
      question.when.flatMap((guard) => collectReferences(guard.ast)),
      `${base}.when`,
      questionSeverity
    );
    check(templateReferences(question.title), `${base}.title`, questionSeverity);
    check(templateReferences(question.description), `${base}.description`, questionSeverity);
    for (const field of question.fields) {
      check(
        field.templates().flatMap((template) => templateReferences(template)),
        `${base}.fields[${field.path}]`,
        questionSeverity
      );
    }
  }

  for (const step of definition.steps) {
    check(
      [
        ...step.when.flatMap((guard) => collectReferences(guard.ast)),
        ...step.action.reads,
      ],
      `steps[${String(step.index)}]`,
      'error'
    );
  }

  return issues;
}
