/**
 * Tokenizer for the interview expression language.
 *
 * @packageDocumentation
 */

import { ExpressionSyntaxError } from './types.js';

/**
 * Token categories produced by {@link tokenize}.
 */
export type TokenKind = 'number' | 'string' | 'name' | 'operator' | 'punctuation' | 'eof';

/**
 * A single token with its source offset.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly position: number;
  /** Decoded value for `number` and `string` tokens. */
  readonly value?: string | number;
}

const TWO_CHAR_OPERATORS: readonly string[] = ['==', '!=', '<=', '>='];
const ONE_CHAR_OPERATORS: readonly string[] = ['<', '>', '+', '-', '*', '/', '|'];
const PUNCTUATION: readonly string[] = ['(', ')', '[', ']', ',', '.'];

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isNameStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isNamePart(ch: string): boolean {
  return isNameStart(ch) || isDigit(ch);
}

/**
 * Converts expression text into tokens, ending with an `eof` token.
 *
 * @param source - Expression text.
 * @returns The tokens.
 * @throws ExpressionSyntaxError on an unexpected character or unterminated string.
 */
export function tokenize(source: string): readonly Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos++;
      continue;
    }

    if (isDigit(ch)) {
      const start = pos;
      while (pos < source.length && isDigit(source.charAt(pos))) {
        pos++;
      }
      if (source.charAt(pos) === '.' && isDigit(source.charAt(pos + 1))) {
        pos++;
        while (pos < source.length && isDigit(source.charAt(pos))) {
          pos++;
        }
      }
      const text = source.slice(start, pos);
      tokens.push({ kind: 'number', text, position: start, value: Number(text) });
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = pos;
      pos++;
      let value = '';
      let closed = false;
      while (pos < source.length) {
        const current = source.charAt(pos);
        if (current === '\\') {
          const escaped = ESCAPES.get(source.charAt(pos + 1));
          if (escaped === undefined) {
            throw new ExpressionSyntaxError('Invalid escape sequence', source, pos);
          }
          value += escaped;
          pos += 2;
          continue;
        }
        if (current === ch) {
          closed = true;
          pos++;
          break;
        }
        value += current;
        pos++;
      }
      if (!closed) {
        throw new ExpressionSyntaxError('Unterminated string literal', source, start);
      }
      tokens.push({ kind: 'string', text: source.slice(start, pos), position: start, value });
      continue;
    }

    if (isNameStart(ch)) {
      const start = pos;
      while (pos < source.length && isNamePart(source.charAt(pos))) {
        pos++;
      }
      tokens.push({ kind: 'name', text: source.slice(start, pos), position: start });
      continue;
    }

    const two = source.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.includes(two)) {
      tokens.push({ kind: 'operator', text: two, position: pos });
      pos += 2;
      continue;
    }

    if (ONE_CHAR_OPERATORS.includes(ch)) {
      tokens.push({ kind: 'operator', text: ch, position: pos });
      pos++;
      continue;
    }

    if (PUNCTUATION.includes(ch)) {
      tokens.push({ kind: 'punctuation', text: ch, position: pos });
      pos++;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, source, pos);
  }

  tokens.push({ kind: 'eof', text: '', position: source.length });
  return tokens;
}
