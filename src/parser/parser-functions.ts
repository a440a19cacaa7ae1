/**
 * Parser Extension: Primary Expressions
 * Numeric literals, identifiers and function calls
 */

import { createError } from '../error-classes.js';
import { Complex } from '../runtime/core/complex.js';
import {
  isExpression,
  reduceBinaryCall,
  reduceUnaryCall,
  variable,
  type Operand,
} from '../runtime/core/expression.js';
import { toDomain } from '../runtime/core/values.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';
import { Parser } from './parser.js';
import {
  advance,
  check,
  current,
  expect,
  peek,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): Operand;
    parseNumber(): Operand;
    parseIdentifier(): Operand;
    parseCall(): Operand;
    parseArguments(): Operand[];
    resolveName(token: Token): Operand;
  }
}

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): Operand {
  if (check(this.state, TOKEN_TYPES.INT, TOKEN_TYPES.NUMBER)) {
    return this.parseNumber();
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    if (peek(this.state, 1).type === TOKEN_TYPES.LPAREN) {
      return this.parseCall();
    }
    return this.parseIdentifier();
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseGrouped();
  }

  return unexpected(this.state);
};

// ============================================================
// LITERALS
// ============================================================

/** 2j reads as the pure imaginary 0+2j */
Parser.prototype.parseNumber = function (this: Parser): Operand {
  const token = advance(this.state);
  const text = token.value;

  if (text.endsWith('j')) {
    return new Complex(0, Number(text.slice(0, -1)));
  }
  return toDomain(Number(text), this.session.domain);
};

// ============================================================
// NAMES
// ============================================================

Parser.prototype.parseIdentifier = function (this: Parser): Operand {
  return this.resolveName(advance(this.state));
};

/**
 * Lookup order: this program's assignments, session variables, constants.
 * Unresolved names become free variables when the session allows them.
 */
Parser.prototype.resolveName = function (this: Parser, token: Token): Operand {
  const name = token.value;

  const staged = this.pending.get(name);
  if (staged !== undefined) return staged;

  const bound = this.session.variables.get(name);
  if (bound !== undefined) return bound;

  const constant = this.session.constants.get(name);
  if (constant !== undefined) return constant;

  if (this.session.allowFreeVariables) {
    return variable(name);
  }

  throw createError('EXPR-N001', { name }, token.span.start);
};

// ============================================================
// FUNCTION CALLS
// ============================================================

Parser.prototype.parseArguments = function (this: Parser): Operand[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");

  const args: Operand[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state); // consume ,
      args.push(this.parseExpression());
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return args;
};

/**
 * name(x) calls a univariate function, name(x, y) a bivariate one.
 * Concrete arguments apply the function; otherwise a call node is built.
 */
Parser.prototype.parseCall = function (this: Parser): Operand {
  const nameToken = current(this.state);
  const name = nameToken.value;
  advance(this.state); // consume name

  const args = this.parseArguments();
  let result: Operand;

  const [first, second] = args;
  if (args.length === 1 && first !== undefined) {
    const fn = this.session.unaryFunctions.get(name);
    if (!fn) {
      throw createError(
        'EXPR-N002',
        { arity: 'univariate', name },
        nameToken.span.start
      );
    }
    result = reduceUnaryCall(name, fn, first);
  } else if (args.length === 2 && first !== undefined && second !== undefined) {
    const fn = this.session.binaryFunctions.get(name);
    if (!fn) {
      throw createError(
        'EXPR-N002',
        { arity: 'bivariate', name },
        nameToken.span.start
      );
    }
    result = reduceBinaryCall(name, fn, first, second);
  } else {
    throw createError(
      'EXPR-P003',
      { name, count: args.length },
      nameToken.span.start
    );
  }

  this.session.observability.onFunctionCall?.({
    name,
    args,
    folded: !isExpression(result),
  });

  return result;
};
