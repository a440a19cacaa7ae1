/**
 * Tokenizer
 * Main tokenization logic
 */

import { createError } from '../error-classes.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isSeparator,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  ERROR_SNIPPET_LENGTH,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readIdentifier, readNumber, readSeparator } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerOptions,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Statement separator
  if (isSeparator(ch)) {
    return readSeparator(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoChar = TWO_CHAR_OPERATORS[peekString(state, 2)];
  if (twoChar) {
    return advanceAndMakeToken(state, 2, twoChar.type, twoChar.value, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw createError(
    'EXPR-L001',
    { char: ch, snippet: peekString(state, ERROR_SNIPPET_LENGTH) },
    start
  );
}

/**
 * Lazy token sequence ending with EOF.
 *
 * Each iteration starts over from the beginning of the source, so the
 * result can be consumed any number of times.
 */
export function lex(source: string, options: LexerOptions = {}): Iterable<Token> {
  return {
    *[Symbol.iterator](): Generator<Token, void, undefined> {
      const state = createLexerState(source, options);
      let token: Token;
      do {
        token = nextToken(state);
        yield token;
      } while (token.type !== TOKEN_TYPES.EOF);
    },
  };
}

export function tokenize(source: string, options: LexerOptions = {}): Token[] {
  return [...lex(source, options)];
}
