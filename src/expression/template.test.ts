import { describe, expect, it } from 'vitest';
import {
  EvaluationError,
  ExpressionSyntaxError,
  collectReferences,
  compileTemplate,
  parseExpression,
  renderTemplate,
  templateReferences,
} from './index.js';

describe('compileTemplate', () => {
  it('should split text and placeholders', () => {
    const template = compileTemplate('Hello, {{ name }}!');
    expect(template.parts).toHaveLength(3);
    expect(template.parts[0]).toEqual({ kind: 'text', text: 'Hello, ' });
    expect(template.parts[2]).toEqual({ kind: 'text', text: '!' });
  });

  it('should produce no parts for empty text', () => {
    expect(compileTemplate('').parts).toEqual([]);
  });

  it('should reject an unterminated placeholder', () => {
    expect(() => compileTemplate('Hi {{ name')).toThrow(ExpressionSyntaxError);
    expect(() => compileTemplate('Hi {{ name')).toThrow(
      "Unterminated placeholder at position 3 in 'Hi {{ name'"
    );
  });

  it('should reject an empty placeholder', () => {
    expect(() => compileTemplate('{{ }}')).toThrow('Empty placeholder');
  });

  it('should allow display-only filters', () => {
    const template = compileTemplate("{{ starts | date('%d/%m/%Y') }}");
    expect(renderTemplate(template, { starts: '2024-03-05' })).toBe('05/03/2024');
  });
});

describe('renderTemplate', () => {
  it('should substitute values', () => {
    const template = compileTemplate('Welcome, {{ registration.first_name }}!');
    expect(renderTemplate(template, { registration: { first_name: 'Ada' } })).toBe(
      'Welcome, Ada!'
    );
  });

  it('should stringify each value kind', () => {
    const template = compileTemplate('{{ s }}|{{ n }}|{{ b }}|{{ z }}|{{ u }}|{{ l }}|{{ o }}');
    const context = { s: 'x', n: 2.5, b: false, z: null, l: ['a', 'b'], o: { k: 1 } };
    expect(renderTemplate(template, context)).toBe('x|2.5|false|||a, b|{"k":1}');
  });

  it('should name the failing placeholder', () => {
    const template = compileTemplate('Total: {{ total / count }}');
    try {
      renderTemplate(template, { total: 1, count: 0 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(EvaluationError);
      if (error instanceof EvaluationError) {
        expect(error.source).toBe('total / count');
      }
    }
  });
});

describe('references', () => {
  it('should collect paths from an expression in order', () => {
    const expression = parseExpression("a.b if c else d | default(a.b) + ['x']");
    expect(collectReferences(expression.ast)).toEqual(['a.b', 'c', 'd']);
  });

  it('should collect paths from every placeholder', () => {
    const template = compileTemplate('{{ a.b }} and {{ c | default(d) }} and {{ a.b }}');
    expect(templateReferences(template)).toEqual(['a.b', 'c', 'd']);
  });

  it('should return nothing for literals', () => {
    expect(collectReferences(parseExpression("[1, 'two', null]").ast)).toEqual([]);
  });
});
