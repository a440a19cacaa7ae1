/**
 * Parser Extension: Expression Parsing
 * Precedence chain and grouping
 *
 * Precedence, low to high:
 *   + -  <  * /  <  unary -  <  ^ %  <  unary %
 */

import type { BinaryOperator } from '../runtime/core/arithmetic.js';
import {
  reduceBinaryOp,
  reduceUnaryOp,
  type Operand,
} from '../runtime/core/expression.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import { Parser } from './parser.js';
import { advance, check, expect } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): Operand;
    parseAdditive(): Operand;
    parseMultiplicative(): Operand;
    parseUnary(): Operand;
    parsePower(): Operand;
    parseOperand(): Operand;
    parseRootPrefix(): Operand;
    parseGrouped(): Operand;
  }
}

const BINARY_TOKEN_OPS: Partial<Record<TokenType, BinaryOperator>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.CARET]: '^',
  [TOKEN_TYPES.PERCENT]: '%',
};

/** Operator of the current token; callers have already checked its type */
function binaryOperator(parser: Parser): BinaryOperator {
  const token = advance(parser.state);
  const op = BINARY_TOKEN_OPS[token.type];
  if (op === undefined) {
    throw new Error(`Token ${token.type} is not a binary operator`);
  }
  return op;
}

// ============================================================
// BINARY CHAINS
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): Operand {
  return this.parseAdditive();
};

Parser.prototype.parseAdditive = function (this: Parser): Operand {
  let left = this.parseMultiplicative();

  while (check(this.state, TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS)) {
    const op = binaryOperator(this);
    const right = this.parseMultiplicative();
    left = reduceBinaryOp(op, left, right);
  }

  return left;
};

Parser.prototype.parseMultiplicative = function (this: Parser): Operand {
  let left = this.parseUnary();

  while (check(this.state, TOKEN_TYPES.STAR, TOKEN_TYPES.SLASH)) {
    const op = binaryOperator(this);
    const right = this.parseUnary();
    left = reduceBinaryOp(op, left, right);
  }

  return left;
};

// ============================================================
// UNARY MINUS
// ============================================================

/** -x binds looser than ^, so -2^2 is -(2^2) */
Parser.prototype.parseUnary = function (this: Parser): Operand {
  if (check(this.state, TOKEN_TYPES.MINUS)) {
    advance(this.state); // consume -
    return reduceUnaryOp('-', this.parseUnary());
  }
  return this.parsePower();
};

// ============================================================
// POWER AND ROOT
// ============================================================

/** ^ and binary % share one left-associative level */
Parser.prototype.parsePower = function (this: Parser): Operand {
  let left = this.parseRootPrefix();

  while (check(this.state, TOKEN_TYPES.CARET, TOKEN_TYPES.PERCENT)) {
    const op = binaryOperator(this);
    const right = this.parseOperand();
    left = reduceBinaryOp(op, left, right);
  }

  return left;
};

/**
 * Right operand of ^ or %, and operand of unary %.
 * May start with a unary minus: 2^-1 is 2^(-1).
 */
Parser.prototype.parseOperand = function (this: Parser): Operand {
  if (check(this.state, TOKEN_TYPES.MINUS)) {
    return this.parseUnary();
  }
  return this.parseRootPrefix();
};

/** %x is the square root of x */
Parser.prototype.parseRootPrefix = function (this: Parser): Operand {
  if (check(this.state, TOKEN_TYPES.PERCENT)) {
    advance(this.state); // consume %
    return reduceUnaryOp('%', this.parseOperand());
  }
  return this.parsePrimary();
};

// ============================================================
// GROUPING
// ============================================================

Parser.prototype.parseGrouped = function (this: Parser): Operand {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const inner = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return inner;
};
