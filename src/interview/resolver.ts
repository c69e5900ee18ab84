/**
 * Question resolver: the interview state machine.
 *
 * Every request replays the full answer history from the initial context,
 * so the service keeps no session. States: awaiting an answer to a question,
 * completed, or exited by an `exit` step.
 *
 * @packageDocumentation
 */

import {
  evaluateAt,
  evaluateGuard,
  renderTemplate,
  setPath,
  type Context,
  type Value,
  type ValueObject,
} from '../expression/index.js';
import type { FieldError } from '../fields/index.js';
import { applySteps, type InterviewExit, type StepsResult } from '../steps/index.js';
import { SubmissionError, UnmetRequirementError } from './errors.js';
import type {
  Answer,
  AnswerHistory,
  InterviewDefinition,
  Question,
  QuestionDescriptor,
  ResolveInput,
  ResolveResult,
} from './types.js';

/**
 * What the replay saw on its way through the questions.
 */
interface Trail {
  /** Applicable questions whose answers were merged. */
  readonly passed: Set<string>;
  /** Applicable questions reached, with the context they were reached in. */
  readonly reached: Map<string, Context>;
  /** Questions whose guard was falsy. */
  readonly skipped: Set<string>;
}

type Walk =
  | {
      readonly kind: 'awaiting';
      readonly question: Question;
      readonly context: Context;
      readonly errors: readonly FieldError[];
      readonly unmet: readonly string[];
      readonly trail: Trail;
    }
  | { readonly kind: 'completed'; readonly context: Context; readonly trail: Trail }
  | {
      readonly kind: 'exited';
      readonly context: Context;
      readonly exit: InterviewExit;
      readonly trail: Trail;
    };

type Validation =
  | { readonly valid: true; readonly values: ReadonlyMap<string, Value> }
  | { readonly valid: false; readonly errors: readonly FieldError[] };

function validateAnswer(question: Question, values: ValueObject): Validation {
  const normalized = new Map<string, Value>();
  const errors: FieldError[] = [];
  for (const field of question.fields) {
    const raw = Object.hasOwn(values, field.path) ? values[field.path] : undefined;
    const result = field.validate(raw);
    if (result.valid) {
      normalized.set(field.path, result.value);
    } else {
      errors.push({ path: field.path, reason: result.reason });
    }
  }
  return errors.length > 0 ? { valid: false, errors } : { valid: true, values: normalized };
}

function mergeAnswer(
  question: Question,
  context: Context,
  values: ReadonlyMap<string, Value>
): Context {
  let merged = context;
  for (const field of question.fields) {
    const value = values.get(field.path) ?? null;
    merged = evaluateAt(`questions[${question.id}].fields[${field.path}]`, () =>
      setPath(merged, field.segments, value)
    );
  }
  return merged;
}

function providesAny(fieldPath: string, paths: readonly string[]): boolean {
  return paths.some(
    (path) =>
      path === fieldPath || path.startsWith(`${fieldPath}.`) || fieldPath.startsWith(`${path}.`)
  );
}

/**
 * Interprets a halted step list: an unmet `ensure` re-presents the question
 * that can fix it, an `exit` ends the walk. Only reached for steps that run
 * after the first question.
 */
function settle(
  definition: InterviewDefinition,
  result: Exclude<StepsResult, { status: 'done' }>,
  trail: Trail
): Walk {
  if (result.status === 'exit') {
    return { kind: 'exited', context: result.context, exit: result.exit, trail };
  }

  const { requirement, context } = result;
  const step = definition.steps[requirement.step];
  let target: Question | undefined;
  if (step !== undefined && step.position.kind === 'after') {
    const { question: id } = step.position;
    target = definition.questions.find((question) => question.id === id);
  } else {
    target = definition.questions.find((question) => {
      if (!question.fields.some((field) => providesAny(field.path, requirement.paths))) {
        return false;
      }
      if (trail.reached.has(question.id)) {
        return true;
      }
      if (trail.skipped.has(question.id)) {
        return false;
      }
      return evaluateAt(`questions[${question.id}].when`, () =>
        evaluateGuard(question.when, context, definition.filters)
      );
    });
  }
  if (target === undefined) {
    throw new UnmetRequirementError(definition.id, requirement);
  }
  return {
    kind: 'awaiting',
    question: target,
    context: trail.reached.get(target.id) ?? context,
    errors: [],
    unmet: requirement.unmet,
    trail,
  };
}

function walk(
  definition: InterviewDefinition,
  initial: Context,
  answers: ReadonlyMap<string, ValueObject>
): Walk {
  const trail: Trail = { passed: new Set(), reached: new Map(), skipped: new Set() };
  const { filters } = definition;

  const start = applySteps(definition.startSteps, initial, filters);
  if (start.status === 'unmet') {
    // No answer is merged before start steps run, so only inputs can satisfy them.
    throw new UnmetRequirementError(definition.id, start.requirement, 'start');
  }
  if (start.status !== 'done') {
    return settle(definition, start, trail);
  }
  let context = start.context;

  for (const question of definition.questions) {
    const current = context;
    const applicable = evaluateAt(`questions[${question.id}].when`, () =>
      evaluateGuard(question.when, current, filters)
    );
    if (!applicable) {
      trail.skipped.add(question.id);
      continue;
    }
    trail.reached.set(question.id, context);

    const values = answers.get(question.id);
    if (values === undefined) {
      return { kind: 'awaiting', question, context, errors: [], unmet: [], trail };
    }
    const validation = validateAnswer(question, values);
    if (!validation.valid) {
      return { kind: 'awaiting', question, context, errors: validation.errors, unmet: [], trail };
    }
    context = mergeAnswer(question, context, validation.values);
    trail.passed.add(question.id);

    const after = applySteps(definition.stepsAfter.get(question.id) ?? [], context, filters);
    if (after.status !== 'done') {
      return settle(definition, after, trail);
    }
    context = after.context;
  }

  const end = applySteps(definition.endSteps, context, filters);
  if (end.status !== 'done') {
    return settle(definition, end, trail);
  }
  return { kind: 'completed', context: end.context, trail };
}

function describeQuestion(
  definition: InterviewDefinition,
  question: Question,
  context: Context,
  errors: readonly FieldError[],
  unmet: readonly string[],
  answer: ValueObject | null
): QuestionDescriptor {
  const base = `questions[${question.id}]`;
  return {
    id: question.id,
    title: evaluateAt(`${base}.title`, () =>
      renderTemplate(question.title, context, definition.filters)
    ),
    description: evaluateAt(`${base}.description`, () =>
      renderTemplate(question.description, context, definition.filters)
    ),
    fields: question.fields.map((field) =>
      evaluateAt(`${base}.fields[${field.path}]`, () => field.describe(context))
    ),
    errors,
    unmet,
    answer,
  };
}

function toHistory(answers: ReadonlyMap<string, ValueObject>): AnswerHistory {
  return [...answers].map(([question, values]): Answer => ({ question, values }));
}

function finish(
  definition: InterviewDefinition,
  answers: ReadonlyMap<string, ValueObject>,
  result: Walk
): ResolveResult {
  const history = toHistory(answers);
  switch (result.kind) {
    case 'awaiting':
      return {
        status: 'awaiting',
        history,
        context: result.context,
        question: describeQuestion(
          definition,
          result.question,
          result.context,
          result.errors,
          result.unmet,
          answers.get(result.question.id) ?? null
        ),
      };
    case 'completed':
      return { status: 'completed', history, context: result.context };
    case 'exited':
      return { status: 'exited', history, context: result.context, exit: result.exit };
  }
}

/**
 * Indexes a history by question id. A later entry for the same question
 * replaces the earlier one in place.
 */
function indexHistory(history: AnswerHistory): Map<string, ValueObject> {
  const answers = new Map<string, ValueObject>();
  for (const entry of history) {
    answers.set(entry.question, entry.values);
  }
  return answers;
}

/**
 * Keeps only the values addressed to the question's fields.
 */
function pickValues(question: Question, values: ValueObject): ValueObject {
  const picked: Record<string, Value> = {};
  for (const field of question.fields) {
    const value = values[field.path];
    if (Object.hasOwn(values, field.path) && value !== undefined) {
      picked[field.path] = value;
    }
  }
  return picked;
}

/**
 * Resolves the next state of an interview.
 *
 * Pure: the same definition and input always produce the same result, and
 * nothing is retained between calls.
 *
 * @param definition - The compiled interview.
 * @param input - History, initial context and an optional new answer.
 * @returns The next question, or the completed or exited interview.
 * @throws SubmissionError if the submission names an unknown question, or one
 *   that is skipped or not yet reached.
 * @throws UnmetRequirementError if a start step's `ensure` fails, or another
 *   `ensure` fails and no question can fix it.
 * @throws EvaluationError on an authoring bug in the definition.
 *
 * @example
 * ```typescript
 * const first = resolveInterview(definition, { history: [], context: {} });
 * // first.status === 'awaiting', first.question.id === 'name'
 * const next = resolveInterview(definition, {
 *   history: first.history,
 *   context: {},
 *   submission: { question: 'name', values: { 'registration.first_name': 'Ada' } },
 * });
 * ```
 */
export function resolveInterview(
  definition: InterviewDefinition,
  input: ResolveInput
): ResolveResult {
  const answers = indexHistory(input.history);
  const { submission } = input;
  if (submission === undefined) {
    return finish(definition, answers, walk(definition, input.context, answers));
  }

  const question = definition.questions.find((entry) => entry.id === submission.question);
  if (question === undefined) {
    throw new SubmissionError(
      `Interview '${definition.id}' has no question '${submission.question}'`,
      submission.question
    );
  }

  const current = walk(definition, input.context, answers);
  const awaitingThis = current.kind === 'awaiting' && current.question.id === question.id;
  if (!awaitingThis && !current.trail.passed.has(question.id)) {
    throw new SubmissionError(`Question '${question.id}' is not available`, question.id);
  }

  const values = pickValues(question, submission.values);
  const validation = validateAnswer(question, values);
  if (!validation.valid) {
    const context = current.trail.reached.get(question.id) ?? current.context;
    return {
      status: 'awaiting',
      history: toHistory(answers),
      context,
      question: describeQuestion(definition, question, context, validation.errors, [], values),
    };
  }

  const updated = new Map(answers);
  updated.set(question.id, values);
  return finish(definition, updated, walk(definition, input.context, updated));
}
