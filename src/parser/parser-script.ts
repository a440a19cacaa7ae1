/**
 * Parser Extension: Program Parsing
 * Lines, separators and assignment
 */

import { createError } from '../error-classes.js';
import type { Operand } from '../runtime/core/expression.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, check, current, isAtEnd, peek, unexpected } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): Operand | undefined;
    parseLine(): Operand;
    parseAssignment(): Operand;
    skipSeparators(): void;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.skipSeparators = function (this: Parser): void {
  while (check(this.state, TOKEN_TYPES.NEWLINE)) {
    advance(this.state);
  }
};

Parser.prototype.parseProgram = function (this: Parser): Operand | undefined {
  const { onStatement } = this.session.observability;
  let result: Operand | undefined;
  let index = 0;

  this.skipSeparators();

  while (!isAtEnd(this.state)) {
    const startTime = Date.now();
    result = this.parseLine();

    // A line ends at a separator or at the end of input
    if (!check(this.state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.EOF)) {
      unexpected(this.state);
    }

    onStatement?.({ index, value: result, durationMs: Date.now() - startTime });
    index++;

    this.skipSeparators();
  }

  return result;
};

// ============================================================
// LINES
// ============================================================

Parser.prototype.parseLine = function (this: Parser): Operand {
  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.ASSIGN
  ) {
    return this.parseAssignment();
  }
  return this.parseExpression();
};

/**
 * Parse name = expr.
 * The binding is staged in `pending`; later lines of the same program see it.
 */
Parser.prototype.parseAssignment = function (this: Parser): Operand {
  const nameToken = current(this.state);
  advance(this.state); // consume name
  advance(this.state); // consume =

  const value = this.parseExpression();

  if (!this.session.allowAssignment) {
    throw createError(
      'EXPR-C001',
      { name: nameToken.value },
      nameToken.span.start
    );
  }

  this.pending.set(nameToken.value, value);
  return value;
};
