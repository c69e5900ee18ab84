/**
 * Step interpreter: ordered, guarded set / ensure / exit operations over the
 * answer context.
 *
 * @packageDocumentation
 */

export type {
  InterviewExit,
  Step,
  StepAction,
  StepDeclaration,
  StepOperation,
  StepOutcome,
  StepPosition,
  StepsResult,
  UnmetRequirement,
} from './types.js';
export {
  DEFAULT_STEP_OPERATIONS,
  StepOperationRegistry,
  ensureOperation,
  exitOperation,
  setOperation,
} from './operations.js';
export { applySteps } from './interpreter.js';
