/**
 * Compiles expression and template settings, converting syntax errors into
 * located {@link DefinitionError}s.
 *
 * @packageDocumentation
 */

import {
  ExpressionSyntaxError,
  compileTemplate,
  defaultFilterRegistry,
  parseExpression,
  type CompiledExpression,
  type CompiledTemplate,
  type FilterRegistry,
} from '../expression/index.js';
import { DefinitionError } from './errors.js';

function located<T>(location: string, compile: () => T): T {
  try {
    return compile();
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) {
      throw new DefinitionError(error.message, location, error);
    }
    throw error;
  }
}

/**
 * Compiles a logic expression setting.
 *
 * @param value - The raw setting; must be a string.
 * @param location - Location of the setting, e.g. `value`.
 * @throws DefinitionError if the value is not a string or does not parse.
 */
export function compileExpressionSetting(
  value: unknown,
  location: string,
  filters: FilterRegistry = defaultFilterRegistry
): CompiledExpression {
  if (typeof value !== 'string') {
    throw new DefinitionError(`Expected an expression string, got ${typeof value}`, location);
  }
  return located(location, () => parseExpression(value, { mode: 'logic', filters }));
}

/**
 * Compiles a template setting.
 *
 * @throws DefinitionError if the value is not a string or does not parse.
 */
export function compileTemplateSetting(
  value: unknown,
  location: string,
  filters: FilterRegistry = defaultFilterRegistry
): CompiledTemplate {
  if (typeof value !== 'string') {
    throw new DefinitionError(`Expected a string, got ${typeof value}`, location);
  }
  return located(location, () => compileTemplate(value, filters));
}

/**
 * Compiles a `when` guard: absent, a single expression, or a list of
 * expressions combined with AND.
 *
 * @throws DefinitionError naming the failing entry, e.g. `when[1]`.
 */
export function compileGuardSetting(
  value: unknown,
  location: string,
  filters: FilterRegistry = defaultFilterRegistry
): readonly CompiledExpression[] {
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown, index) =>
      compileExpressionSetting(entry, `${location}[${String(index)}]`, filters)
    );
  }
  return [compileExpressionSetting(value, location, filters)];
}
