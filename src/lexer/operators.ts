/**
 * Operator Lookup Tables
 */

import { TOKEN_TYPES, type TokenType } from '../token-types.js';

/** Two-character operator lookup table; `**` is an alias for `^` */
export const TWO_CHAR_OPERATORS: Readonly<
  Record<string, { type: TokenType; value: string }>
> = {
  '**': { type: TOKEN_TYPES.CARET, value: '^' },
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '=': TOKEN_TYPES.ASSIGN,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  ',': TOKEN_TYPES.COMMA,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '^': TOKEN_TYPES.CARET,
  '%': TOKEN_TYPES.PERCENT,
};

/** Number of characters of context shown with an illegal character */
export const ERROR_SNIPPET_LENGTH = 10;
