/**
 * Token Readers
 * Functions to read specific token types from source
 */

import { createError } from '../error-classes.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  isDigit,
  isIdentifierChar,
  isSeparator,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

function readDigits(state: LexerState): string {
  let value = '';
  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }
  return value;
}

/** True when an exponent (e5, E-3, e+2) starts at the current position */
function atExponent(state: LexerState): boolean {
  const ch = peek(state);
  if (ch !== 'e' && ch !== 'E') return false;
  const next = peek(state, 1);
  if (isDigit(next)) return true;
  return (next === '+' || next === '-') && isDigit(peek(state, 2));
}

/**
 * Read a numeric literal: 42, 4.2, 4., .5, 1e-3, 2j, 1.5e2j
 *
 * Literals without a fractional part or exponent are INT tokens. The
 * imaginary suffix j is rejected unless complex numbers are enabled.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = readDigits(state);
  let isInteger = true;

  if (peek(state) === '.') {
    value += advance(state); // consume .
    value += readDigits(state);
    isInteger = false;
  }

  if (atExponent(state)) {
    value += advance(state); // consume e
    if (peek(state) === '+' || peek(state) === '-') {
      value += advance(state);
    }
    value += readDigits(state);
    isInteger = false;
  }

  if (peek(state) === 'j') {
    value += advance(state); // consume j
    if (!state.allowComplex) {
      throw createError('EXPR-C002', { literal: value }, start);
    }
    isInteger = false;
  }

  return makeToken(
    isInteger ? TOKEN_TYPES.INT : TOKEN_TYPES.NUMBER,
    value,
    start,
    currentLocation(state)
  );
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.IDENTIFIER, value, start, currentLocation(state));
}

/** Read a run of ; and newline characters as one separator */
export function readSeparator(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isSeparator(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.NEWLINE, value, start, currentLocation(state));
}
