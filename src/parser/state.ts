/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { createError } from '../error-classes.js';
import {
  describeToken,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
}

export function createParserState(tokens: readonly Token[]): ParserState {
  if (tokens.length === 0) {
    throw new Error('No tokens available');
  }
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token =
    state.tokens[state.pos + offset] ?? state.tokens[state.tokens.length - 1];
  if (!token) throw new Error('No tokens available');
  return token;
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or throw EXPR-P002.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const context: Record<string, unknown> = {
    expected,
    token: describeToken(token),
  };
  if (hint) context['hint'] = `. ${hint}`;
  throw createError('EXPR-P002', context, token.span.start);
}

/**
 * Throw EXPR-P001 for the current token.
 * @internal
 */
export function unexpected(state: ParserState): never {
  const token = current(state);
  throw createError(
    'EXPR-P001',
    { token: describeToken(token) },
    token.span.start
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

function generateHint(expectedType: TokenType, actual: Token): string | null {
  if (expectedType !== TOKEN_TYPES.RPAREN) return null;
  if (actual.type === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (actual.type === TOKEN_TYPES.NEWLINE) {
    return 'Hint: Parentheses cannot span statements';
  }
  return null;
}
