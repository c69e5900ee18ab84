import {
  defaultFilterRegistry,
  evaluateAt,
  evaluateGuard,
  type Context,
  type FilterRegistry,
} from '../expression/index.js';
import type { Step, StepOutcome, StepsResult } from './types.js';

/**
 * Applies steps strictly in order.
 *
 * A step whose guard is falsy is skipped. Interpretation halts at the first
 * `ensure` with unmet requirements or at an `exit`; later steps do not run.
 * The input context is never modified.
 *
 * @param steps - Compiled steps, in definition order.
 * @param context - The starting context.
 * @param filters - Filters available to step expressions.
 * @returns The final context, or the halting requirement or exit.
 * @throws EvaluationError located at the failing step, e.g. `steps[2].when`.
 */
export function applySteps(
  steps: readonly Step[],
  context: Context,
  filters: FilterRegistry = defaultFilterRegistry
): StepsResult {
  let current = context;
  for (const step of steps) {
    const base = `steps[${String(step.index)}]`;
    if (!evaluateAt(`${base}.when`, () => evaluateGuard(step.when, current, filters))) {
      continue;
    }
    const outcome: StepOutcome = evaluateAt(`${base}.${step.operation}`, () =>
      step.action.apply(current, filters)
    );
    switch (outcome.kind) {
      case 'continue':
        current = outcome.context;
        break;
      case 'unmet':
        return {
          status: 'unmet',
          context: current,
          requirement: { step: step.index, unmet: outcome.unmet, paths: outcome.paths },
        };
      case 'exit':
        return {
          status: 'exit',
          context: current,
          exit: { step: step.index, title: outcome.title, description: outcome.description },
        };
    }
  }
  return { status: 'done', context: current };
}
