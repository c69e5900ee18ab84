/**
 * Static reference analysis over expression ASTs, used by definition linting.
 *
 * @packageDocumentation
 */

import type { ExpressionNode } from './types.js';

/**
 * Collects every variable path an expression reads, as dotted strings in
 * order of first appearance.
 *
 * @param node - The expression AST.
 * @returns Unique dotted paths.
 */
export function collectReferences(node: ExpressionNode): string[] {
  const seen = new Set<string>();
  visit(node, seen);
  return [...seen];
}

function visit(node: ExpressionNode, seen: Set<string>): void {
  switch (node.kind) {
    case 'literal':
      return;
    case 'variable':
      seen.add(node.path.join('.'));
      return;
    case 'list':
      node.items.forEach((item) => visit(item, seen));
      return;
    case 'unary':
      visit(node.operand, seen);
      return;
    case 'binary':
      visit(node.left, seen);
      visit(node.right, seen);
      return;
    case 'membership':
      visit(node.element, seen);
      visit(node.collection, seen);
      return;
    case 'test':
      visit(node.subject, seen);
      return;
    case 'conditional':
      visit(node.consequent, seen);
      visit(node.condition, seen);
      if (node.alternate !== undefined) {
        visit(node.alternate, seen);
      }
      return;
    case 'filter':
      visit(node.subject, seen);
      node.args.forEach((arg) => visit(arg, seen));
      return;
  }
}
