/**
 * Templated text: literal parts interleaved with `{{ expression }}`
 * placeholders, compiled once and rendered against the answer context.
 *
 * @packageDocumentation
 */

import type { Context } from './context.js';
import { evaluateExpression } from './evaluator.js';
import { defaultFilterRegistry, type FilterRegistry } from './filters.js';
import { parseExpression } from './parser.js';
import { collectReferences } from './references.js';
import { ExpressionSyntaxError, type CompiledExpression } from './types.js';
import { stringifyValue } from './values.js';

/**
 * One piece of a compiled template.
 */
export type TemplatePart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'expression'; readonly expression: CompiledExpression };

/**
 * A compiled template.
 */
export interface CompiledTemplate {
  readonly source: string;
  readonly parts: readonly TemplatePart[];
}

const OPEN = '{{';
const CLOSE = '}}';

/**
 * Compiles template text. Placeholders are parsed in display mode, so
 * display-only filters such as `date` are allowed.
 *
 * @param source - Template text, e.g. `Welcome, {{ registration.first_name }}!`.
 * @param filters - Filters available to placeholders.
 * @returns The compiled template.
 * @throws ExpressionSyntaxError on an unterminated or empty placeholder, or
 *   when a placeholder does not parse.
 */
export function compileTemplate(
  source: string,
  filters: FilterRegistry = defaultFilterRegistry
): CompiledTemplate {
  const parts: TemplatePart[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(OPEN, cursor);
    if (open === -1) {
      parts.push({ kind: 'text', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      parts.push({ kind: 'text', text: source.slice(cursor, open) });
    }
    const close = source.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) {
      throw new ExpressionSyntaxError('Unterminated placeholder', source, open);
    }
    const body = source.slice(open + OPEN.length, close).trim();
    if (body.length === 0) {
      throw new ExpressionSyntaxError('Empty placeholder', source, open);
    }
    parts.push({ kind: 'expression', expression: parseExpression(body, { mode: 'display', filters }) });
    cursor = close + CLOSE.length;
  }

  return { source, parts };
}

/**
 * Renders a compiled template.
 *
 * @throws EvaluationError naming the failing placeholder.
 */
export function renderTemplate(
  template: CompiledTemplate,
  context: Context,
  filters: FilterRegistry = defaultFilterRegistry
): string {
  let output = '';
  for (const part of template.parts) {
    output +=
      part.kind === 'text'
        ? part.text
        : stringifyValue(evaluateExpression(part.expression, context, filters));
  }
  return output;
}

/**
 * Lists the variable paths read by a template's placeholders.
 */
export function templateReferences(template: CompiledTemplate): string[] {
  const seen = new Set<string>();
  for (const part of template.parts) {
    if (part.kind === 'expression') {
      collectReferences(part.expression.ast).forEach((path) => seen.add(path));
    }
  }
  return [...seen];
}
