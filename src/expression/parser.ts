/**
 * Recursive-descent parser for the interview expression language.
 *
 * Precedence, lowest first: conditional (`a if c else b`), `or`, `and`,
 * `not`, comparison / membership / `is` tests, `+ -`, `* /`, unary minus,
 * filter pipeline (`x | f(args)`), primaries.
 *
 * @packageDocumentation
 */

import { isValidSegment } from './context.js';
import { defaultFilterRegistry, type FilterRegistry } from './filters.js';
import { tokenize, type Token } from './lexer.js';
import {
  ExpressionSyntaxError,
  MAX_EXPRESSION_DEPTH,
  type BinaryOperator,
  type CompiledExpression,
  type ExpressionMode,
  type ExpressionNode,
  type TestName,
  type Value,
} from './types.js';

/**
 * Options for {@link parseExpression}.
 */
export interface ParseOptions {
  /** Where the expression is used. Defaults to `logic`. */
  readonly mode?: ExpressionMode;
  /** Filters available to the pipeline syntax. */
  readonly filters?: FilterRegistry;
}

const KEYWORD_LITERALS: ReadonlyMap<string, Value> = new Map<string, Value>([
  ['true', true],
  ['True', true],
  ['false', false],
  ['False', false],
  ['null', null],
  ['none', null],
  ['None', null],
]);

const RESERVED_WORDS: readonly string[] = ['and', 'or', 'not', 'in', 'is', 'if', 'else'];

const TEST_NAMES: readonly TestName[] = ['defined', 'undefined', 'none'];

const COMPARISON_OPERATORS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];

function isTestName(name: string): name is TestName {
  return TEST_NAMES.some((test) => test === name);
}

function isComparison(text: string): text is BinaryOperator {
  return COMPARISON_OPERATORS.includes(text);
}

class Parser {
  private pos = 0;
  private recursion = 0;
  private readonly depths = new WeakMap<ExpressionNode, number>();

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
    private readonly mode: ExpressionMode,
    private readonly filters: FilterRegistry
  ) {}

  parse(): ExpressionNode {
    if (this.peek().kind === 'eof') {
      throw new ExpressionSyntaxError('Empty expression', this.source, 0);
    }
    const node = this.parseConditional();
    const next = this.peek();
    if (next.kind !== 'eof') {
      throw this.error(`Unexpected '${next.text}'`, next);
    }
    return node;
  }

  private parseConditional(): ExpressionNode {
    return this.nested(() => {
      const consequent = this.parseOr();
      if (!this.matchName('if')) {
        return consequent;
      }
      const condition = this.parseOr();
      if (this.matchName('else')) {
        const alternate = this.parseConditional();
        return this.make({ kind: 'conditional', condition, consequent, alternate }, [
          condition,
          consequent,
          alternate,
        ]);
      }
      return this.make({ kind: 'conditional', condition, consequent }, [condition, consequent]);
    });
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchName('or')) {
      const right = this.parseAnd();
      left = this.make({ kind: 'binary', operator: 'or', left, right }, [left, right]);
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchName('and')) {
      const right = this.parseNot();
      left = this.make({ kind: 'binary', operator: 'and', left, right }, [left, right]);
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.matchName('not')) {
      return this.nested(() => {
        const operand = this.parseNot();
        return this.make({ kind: 'unary', operator: 'not', operand }, [operand]);
      });
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    let left = this.parseAdditive();
    for (;;) {
      const token = this.peek();
      if (token.kind === 'operator' && isComparison(token.text)) {
        this.advance();
        const right = this.parseAdditive();
        left = this.make({ kind: 'binary', operator: token.text, left, right }, [left, right]);
      } else if (this.matchName('in')) {
        const collection = this.parseAdditive();
        left = this.make({ kind: 'membership', negated: false, element: left, collection }, [
          left,
          collection,
        ]);
      } else if (this.isName(token, 'not') && this.isName(this.peek(1), 'in')) {
        this.advance();
        this.advance();
        const collection = this.parseAdditive();
        left = this.make({ kind: 'membership', negated: true, element: left, collection }, [
          left,
          collection,
        ]);
      } else if (this.matchName('is')) {
        const negated = this.matchName('not');
        const nameToken = this.advance();
        if (nameToken.kind !== 'name' || !isTestName(nameToken.text)) {
          throw this.error(
            `Expected one of ${TEST_NAMES.join(', ')} after 'is', got '${nameToken.text}'`,
            nameToken
          );
        }
        left = this.make({ kind: 'test', negated, test: nameToken.text, subject: left }, [left]);
      } else {
        return left;
      }
    }
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();
    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || (token.text !== '+' && token.text !== '-')) {
        return left;
      }
      this.advance();
      const right = this.parseMultiplicative();
      left = this.make({ kind: 'binary', operator: token.text, left, right }, [left, right]);
    }
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || (token.text !== '*' && token.text !== '/')) {
        return left;
      }
      this.advance();
      const right = this.parseUnary();
      left = this.make({ kind: 'binary', operator: token.text, left, right }, [left, right]);
    }
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.kind === 'operator' && token.text === '-') {
      this.advance();
      return this.nested(() => {
        const operand = this.parseUnary();
        if (operand.kind === 'literal' && typeof operand.value === 'number') {
          return this.make({ kind: 'literal', value: -operand.value }, []);
        }
        return this.make({ kind: 'unary', operator: '-', operand }, [operand]);
      });
    }
    return this.parseFiltered();
  }

  private parseFiltered(): ExpressionNode {
    let subject = this.parsePrimary();
    while (this.peek().kind === 'operator' && this.peek().text === '|') {
      this.advance();
      const nameToken = this.advance();
      if (nameToken.kind !== 'name') {
        throw this.error(`Expected a filter name after '|', got '${nameToken.text}'`, nameToken);
      }
      const filter = this.filters.get(nameToken.text);
      if (filter === undefined) {
        throw this.error(`Unknown filter '${nameToken.text}'`, nameToken);
      }
      if (filter.displayOnly && this.mode === 'logic') {
        throw this.error(
          `Filter '${filter.name}' is display-only and cannot be used in a condition or value`,
          nameToken
        );
      }
      const args = this.matchPunctuation('(') ? this.parseArguments(')') : [];
      if (args.length < filter.minArgs || args.length > filter.maxArgs) {
        throw this.error(
          `Filter '${filter.name}' takes ${String(filter.minArgs)} to ${String(filter.maxArgs)} arguments, got ${String(args.length)}`,
          nameToken
        );
      }
      subject = this.make({ kind: 'filter', name: filter.name, subject, args }, [
        subject,
        ...args,
      ]);
    }
    return subject;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.advance();

    switch (token.kind) {
      case 'number':
      case 'string':
        if (token.value === undefined) {
          throw this.error('Malformed literal', token);
        }
        return this.make({ kind: 'literal', value: token.value }, []);

      case 'name': {
        const literal = KEYWORD_LITERALS.get(token.text);
        if (literal !== undefined) {
          return this.make({ kind: 'literal', value: literal }, []);
        }
        if (RESERVED_WORDS.includes(token.text)) {
          throw this.error(`Unexpected keyword '${token.text}'`, token);
        }
        return this.parseVariable(token);
      }

      case 'punctuation':
        if (token.text === '(') {
          const inner = this.parseConditional();
          this.expectPunctuation(')');
          return inner;
        }
        if (token.text === '[') {
          const items = this.parseArguments(']');
          return this.make({ kind: 'list', items }, items);
        }
        throw this.error(`Unexpected '${token.text}'`, token);

      case 'operator':
        throw this.error(`Unexpected '${token.text}'`, token);

      case 'eof':
        throw this.error('Unexpected end of expression', token);
    }
  }

  private parseVariable(first: Token): ExpressionNode {
    const path: string[] = [];
    let segment = first;
    for (;;) {
      if (!isValidSegment(segment.text)) {
        throw this.error(`Invalid path segment '${segment.text}'`, segment);
      }
      path.push(segment.text);
      if (!this.matchPunctuation('.')) {
        return this.make({ kind: 'variable', path }, []);
      }
      segment = this.advance();
      if (segment.kind !== 'name') {
        throw this.error(`Expected a name after '.', got '${segment.text}'`, segment);
      }
    }
  }

  private parseArguments(close: string): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    if (this.matchPunctuation(close)) {
      return items;
    }
    for (;;) {
      items.push(this.parseConditional());
      if (this.matchPunctuation(close)) {
        return items;
      }
      this.expectPunctuation(',');
      if (this.matchPunctuation(close)) {
        return items;
      }
    }
  }

  private make(node: ExpressionNode, children: readonly ExpressionNode[]): ExpressionNode {
    let depth = 1;
    for (const child of children) {
      depth = Math.max(depth, (this.depths.get(child) ?? 1) + 1);
    }
    if (depth > MAX_EXPRESSION_DEPTH) {
      throw new ExpressionSyntaxError(
        `Expression nesting exceeds ${String(MAX_EXPRESSION_DEPTH)} levels`,
        this.source,
        this.peek().position
      );
    }
    this.depths.set(node, depth);
    return node;
  }

  private nested<T>(parse: () => T): T {
    this.recursion++;
    if (this.recursion > MAX_EXPRESSION_DEPTH) {
      throw new ExpressionSyntaxError(
        `Expression nesting exceeds ${String(MAX_EXPRESSION_DEPTH)} levels`,
        this.source,
        this.peek().position
      );
    }
    try {
      return parse();
    } finally {
      this.recursion--;
    }
  }

  private peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    if (token === undefined) {
      throw new ExpressionSyntaxError('Unexpected end of expression', this.source, this.source.length);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private isName(token: Token, name: string): boolean {
    return token.kind === 'name' && token.text === name;
  }

  private matchName(name: string): boolean {
    if (this.isName(this.peek(), name)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchPunctuation(text: string): boolean {
    const token = this.peek();
    if (token.kind === 'punctuation' && token.text === text) {
      this.advance();
      return true;
    }
    return false;
  }

  private expectPunctuation(text: string): void {
    const token = this.peek();
    if (!this.matchPunctuation(text)) {
      throw this.error(
        token.kind === 'eof' ? `Expected '${text}'` : `Expected '${text}', got '${token.text}'`,
        token
      );
    }
  }

  private error(message: string, token: Token): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, this.source, token.position);
  }
}

/**
 * Parses expression text into an AST.
 *
 * @param source - Expression text, e.g. `level == "sponsor"`.
 * @param options - Parse mode and filter registry.
 * @returns The compiled expression.
 * @throws ExpressionSyntaxError if the text is not a valid expression.
 *
 * @example
 * ```typescript
 * const guard = parseExpression("'sponsor' not in registration.options");
 * evaluate(guard.ast, { registration: { options: ['basic'] } }); // true
 * ```
 */
export function parseExpression(source: string, options: ParseOptions = {}): CompiledExpression {
  const parser = new Parser(
    source,
    tokenize(source),
    options.mode ?? 'logic',
    options.filters ?? defaultFilterRegistry
  );
  return { source, ast: parser.parse() };
}
