/**
 * Lexer Tests
 * Token types, numeric literals, separators and locations
 */

import { describe, expect, it } from 'vitest';
import {
  CapabilityError,
  LexicalError,
  lex,
  tokenize,
  TOKEN_TYPES,
} from '../../src/index.js';

function types(source: string, allowComplex = false): string[] {
  return tokenize(source, { allowComplex }).map((t) => t.type);
}

function values(source: string, allowComplex = false): string[] {
  return tokenize(source, { allowComplex }).map((t) => t.value);
}

describe('Lexer', () => {
  describe('tokens', () => {
    it('tokenizes an assignment', () => {
      expect(types('x = 2.5')).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.ASSIGN,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.EOF,
      ]);
      expect(values('x = 2.5')).toEqual(['x', '=', '2.5', '']);
    });

    it('tokenizes every operator and delimiter', () => {
      expect(types('+-*/^%(),')).toEqual([
        TOKEN_TYPES.PLUS,
        TOKEN_TYPES.MINUS,
        TOKEN_TYPES.STAR,
        TOKEN_TYPES.SLASH,
        TOKEN_TYPES.CARET,
        TOKEN_TYPES.PERCENT,
        TOKEN_TYPES.LPAREN,
        TOKEN_TYPES.RPAREN,
        TOKEN_TYPES.COMMA,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('reads ** as a caret', () => {
      const tokens = tokenize('2**3');
      expect(tokens.map((t) => t.type)).toEqual([
        TOKEN_TYPES.INT,
        TOKEN_TYPES.CARET,
        TOKEN_TYPES.INT,
        TOKEN_TYPES.EOF,
      ]);
      expect(tokens[1]?.value).toBe('^');
    });

    it('reads identifiers with digits and underscores', () => {
      expect(values('_a1 b_2')).toEqual(['_a1', 'b_2', '']);
    });

    it('skips spaces and tabs', () => {
      expect(values(' \t1 \t+ 2 ')).toEqual(['1', '+', '2', '']);
    });

    it('ends with EOF for empty input', () => {
      expect(types('')).toEqual([TOKEN_TYPES.EOF]);
    });
  });

  describe('numeric literals', () => {
    it('classifies integers as INT', () => {
      expect(types('42')).toEqual([TOKEN_TYPES.INT, TOKEN_TYPES.EOF]);
    });

    it.each(['4.2', '4.', '.5', '1e3', '1E-3', '2.5e+2'])(
      'classifies %s as NUMBER',
      (literal) => {
        const [token] = tokenize(literal);
        expect(token?.type).toBe(TOKEN_TYPES.NUMBER);
        expect(token?.value).toBe(literal);
      }
    );

    it('leaves a bare e after digits to the identifier reader', () => {
      expect(values('2e')).toEqual(['2', 'e', '']);
      expect(types('2e')).toEqual([
        TOKEN_TYPES.INT,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('reads imaginary literals when complex numbers are allowed', () => {
      const [token] = tokenize('1.5e2j', { allowComplex: true });
      expect(token?.type).toBe(TOKEN_TYPES.NUMBER);
      expect(token?.value).toBe('1.5e2j');
    });

    it('rejects imaginary literals by default', () => {
      expect(() => tokenize('1 + 2j')).toThrow(CapabilityError);
      try {
        tokenize('1 + 2j');
      } catch (err) {
        expect(err).toBeInstanceOf(CapabilityError);
        if (err instanceof CapabilityError) {
          expect(err.errorId).toBe('EXPR-C002');
          expect(err.message).toBe('Complex number 2j not supported at 1:5');
          expect(err.context).toEqual({ literal: '2j' });
        }
      }
    });
  });

  describe('separators', () => {
    it('reads ; and newline as NEWLINE', () => {
      expect(types('1;2\n3')).toEqual([
        TOKEN_TYPES.INT,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.INT,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.INT,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('merges a run of separators into one token', () => {
      const tokens = tokenize('1;;\n;2');
      expect(tokens.map((t) => t.value)).toEqual(['1', ';;\n;', '2', '']);
    });
  });

  describe('locations', () => {
    it('tracks line and column across newlines', () => {
      const tokens = tokenize('a\n  bc');
      const b = tokens[2];
      expect(b?.value).toBe('bc');
      expect(b?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
      expect(b?.span.end).toEqual({ line: 2, column: 5, offset: 6 });
    });
  });

  describe('illegal characters', () => {
    it('throws LexicalError with character and snippet', () => {
      try {
        tokenize('1 + x > 3 and more text');
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(LexicalError);
        if (err instanceof LexicalError) {
          expect(err.errorId).toBe('EXPR-L001');
          expect(err.location).toEqual({ line: 1, column: 7, offset: 6 });
          expect(err.context).toEqual({ char: '>', snippet: '> 3 and mo' });
          expect(err.message).toBe(
            'Illegal character \'>\' in "> 3 and mo" at 1:7'
          );
        }
      }
    });

    it('reports a carriage return as illegal', () => {
      try {
        tokenize('1\r\n2');
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(LexicalError);
        if (err instanceof LexicalError) {
          expect(err.location).toEqual({ line: 1, column: 2, offset: 1 });
          expect(err.context).toEqual({ char: '\r', snippet: '\r\n2' });
        }
      }
    });

    it('reports a lone dot as illegal', () => {
      expect(() => tokenize('1 + .')).toThrow(LexicalError);
    });
  });

  describe('lex', () => {
    it('is lazy and stops at the first bad token only when reached', () => {
      const iterator = lex('1 + $')[Symbol.iterator]();
      expect(iterator.next().value).toMatchObject({ type: 'INT', value: '1' });
      expect(iterator.next().value).toMatchObject({ type: 'PLUS' });
      expect(() => iterator.next()).toThrow(LexicalError);
    });

    it('restarts from the beginning on each iteration', () => {
      const tokens = lex('a b');
      const first = [...tokens].map((t) => t.value);
      const second = [...tokens].map((t) => t.value);
      expect(first).toEqual(['a', 'b', '']);
      expect(second).toEqual(first);
    });
  });
});
