/**
 * Question resolver: decides, from an answer history alone, which question an
 * interview presents next or whether it has completed.
 *
 * @packageDocumentation
 */

export type {
  Answer,
  AnswerHistory,
  InterviewDefinition,
  Question,
  QuestionDescriptor,
  ResolveInput,
  ResolveResult,
} from './types.js';
export { SubmissionError, UnmetRequirementError } from './errors.js';
export { resolveInterview } from './resolver.js';
