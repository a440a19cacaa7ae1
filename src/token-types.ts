import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT', // 42
  NUMBER: 'NUMBER', // 4.2, 1e3, 2j

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Statement separator (one or more of ; and newline)
  NEWLINE: 'NEWLINE',

  // Assignment
  ASSIGN: 'ASSIGN', // =

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  CARET: 'CARET', // ^ or **
  PERCENT: 'PERCENT', // % (root)

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  COMMA: 'COMMA', // ,

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source text of the token (`^` for `**`) */
  readonly value: string;
  readonly span: SourceSpan;
}

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.NEWLINE:
      return 'end of line';
    default:
      return `'${token.value}'`;
  }
}
