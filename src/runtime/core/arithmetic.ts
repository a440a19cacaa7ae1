/**
 * Operator Semantics
 *
 * Real operands use IEEE-754 double arithmetic; if either operand is
 * complex, both are lifted and complex arithmetic applies. Division by
 * zero and roots of negative reals yield inf/NaN, never an exception.
 */

import { Complex } from './complex.js';
import type { NumericValue } from './values.js';

export type BinaryOperator = '+' | '-' | '*' | '/' | '^' | '%';
export type UnaryOperator = '-' | '%';

function applyReal(op: BinaryOperator, left: number, right: number): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '^':
      return left ** right;
    case '%':
      // left is the root degree: 3 % 8 is the cube root of 8
      return right ** (1 / left);
  }
}

function applyComplex(
  op: BinaryOperator,
  left: Complex,
  right: Complex
): Complex {
  switch (op) {
    case '+':
      return left.add(right);
    case '-':
      return left.sub(right);
    case '*':
      return left.mul(right);
    case '/':
      return left.div(right);
    case '^':
      return left.pow(right);
    case '%':
      return right.pow(Complex.ONE.div(left));
  }
}

export function applyBinary(
  op: BinaryOperator,
  left: NumericValue,
  right: NumericValue
): NumericValue {
  if (typeof left === 'number' && typeof right === 'number') {
    return applyReal(op, left, right);
  }
  return applyComplex(op, Complex.from(left), Complex.from(right));
}

export function applyUnary(op: UnaryOperator, operand: NumericValue): NumericValue {
  switch (op) {
    case '-':
      return typeof operand === 'number' ? -operand : operand.neg();
    case '%':
      return typeof operand === 'number'
        ? operand ** 0.5
        : operand.pow(new Complex(0.5, 0));
  }
}
