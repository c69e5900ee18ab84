/**
 * The interview service: resolver, catalog and state tokens behind two
 * round-trip operations.
 *
 * The service holds no per-interview state. Everything needed to continue an
 * interview travels in the signed token returned with each response.
 *
 * @packageDocumentation
 */

import {
  ContextValueError,
  getPath,
  isValueObject,
  parsePath,
  setPath,
  toContext,
  toValue,
  type Context,
  type Value,
} from '../expression/index.js';
import type { DefinitionCatalog } from '../definition/index.js';
import {
  SubmissionError,
  resolveInterview,
  type Answer,
  type InterviewDefinition,
  type ResolveResult,
} from '../interview/index.js';
import { IntegrityError, type SessionCodec, type SessionPayload } from '../session/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { InterviewNotFoundError } from './errors.js';
import type {
  EngineResponse,
  InterviewSummary,
  StartOptions,
  SubmissionInput,
} from './types.js';

/**
 * Collaborators of {@link InterviewService}.
 */
export interface InterviewServiceOptions {
  readonly catalog: DefinitionCatalog;
  readonly codec: SessionCodec;
  readonly logger?: Logger;
}

function readSubmission(input: SubmissionInput): Answer {
  let values: Value;
  try {
    values = toValue(input.values ?? {}, 'values');
  } catch (error) {
    if (error instanceof ContextValueError) {
      throw new SubmissionError(error.message, input.question);
    }
    throw error;
  }
  if (!isValueObject(values)) {
    throw new SubmissionError('Submission values must be an object', input.question);
  }
  return { question: input.question, values };
}

/**
 * Keeps only the parts of a starting context the definition declares as inputs.
 */
function seedContext(definition: InterviewDefinition, context: Context): Context {
  let seeded: Context = {};
  for (const input of definition.inputs) {
    const segments = parsePath(input);
    const value = getPath(context, segments);
    if (value !== undefined) {
      seeded = setPath(seeded, segments, value);
    }
  }
  return seeded;
}

/**
 * Starts and continues interviews.
 *
 * @example
 * ```typescript
 * const service = new InterviewService({ catalog, codec, logger });
 * const first = service.start('new-registration');
 * const next = service.update(first.state, {
 *   question: 'name',
 *   values: { 'registration.first_name': 'Ada', 'registration.last_name': 'Lovelace' },
 * });
 * ```
 */
export class InterviewService {
  private readonly catalog: DefinitionCatalog;
  private readonly codec: SessionCodec;
  private readonly logger: Logger;

  constructor(options: InterviewServiceOptions) {
    this.catalog = options.catalog;
    this.codec = options.codec;
    this.logger = options.logger ?? createSilentLogger('InterviewService');
  }

  /**
   * Lists the interviews in the catalog.
   */
  listInterviews(): InterviewSummary[] {
    return this.catalog.list().map((definition) => ({
      id: definition.id,
      title: definition.title ?? null,
      inputs: definition.inputs,
    }));
  }

  /**
   * Starts an interview.
   *
   * @param interviewId - Catalog id.
   * @param options - Starting context. Only paths the definition lists in
   *   `inputs` are kept.
   * @throws InterviewNotFoundError if the id is unknown.
   * @throws ContextValueError if the context is not a plain JSON object.
   * @throws EvaluationError on an authoring bug in the definition.
   */
  start(interviewId: string, options: StartOptions = {}): EngineResponse {
    const definition = this.definition(interviewId);
    const context = seedContext(definition, toContext(options.context));
    const result = resolveInterview(definition, { history: [], context });
    this.logger.info('interview_started', { interview: definition.id });
    return this.respond(definition, context, result);
  }

  /**
   * Continues an interview from its state token, applying a submission if
   * one is given.
   *
   * @param token - The `state` from the previous response.
   * @param submission - The answer to a question, if any.
   * @throws IntegrityError if the token fails verification.
   * @throws InterviewNotFoundError if the token names an interview no longer loaded.
   * @throws SubmissionError if the submission is malformed or targets an
   *   unavailable question.
   */
  update(token: string, submission?: SubmissionInput): EngineResponse {
    let payload: SessionPayload;
    try {
      payload = this.codec.decode(token);
    } catch (error) {
      if (error instanceof IntegrityError) {
        this.logger.warn('token_rejected', { reason: error.reason });
      }
      throw error;
    }

    const definition = this.definition(payload.interview);
    const answer = submission === undefined ? undefined : readSubmission(submission);
    const result = resolveInterview(definition, {
      history: payload.history,
      context: payload.context,
      ...(answer !== undefined ? { submission: answer } : {}),
    });

    if (answer !== undefined && result.status === 'awaiting' && result.question.errors.length > 0) {
      this.logger.debug('answer_rejected', {
        interview: definition.id,
        question: answer.question,
        errors: result.question.errors.length,
      });
    }
    return this.respond(definition, payload.context, result);
  }

  private definition(id: string): InterviewDefinition {
    const definition = this.catalog.get(id);
    if (definition === undefined) {
      throw new InterviewNotFoundError(id);
    }
    return definition;
  }

  private respond(
    definition: InterviewDefinition,
    context: Context,
    result: ResolveResult
  ): EngineResponse {
    const state = this.codec.encode({
      interview: definition.id,
      context,
      history: result.history,
    });

    switch (result.status) {
      case 'awaiting':
        return { status: 'question', state, question: result.question };
      case 'completed':
        this.logger.info('interview_completed', {
          interview: definition.id,
          answers: result.history.length,
        });
        return { status: 'complete', state, result: result.context };
      case 'exited':
        this.logger.info('interview_exited', { interview: definition.id, step: result.exit.step });
        return {
          status: 'exit',
          state,
          title: result.exit.title,
          description: result.exit.description,
        };
    }
  }
}
