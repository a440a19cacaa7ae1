/**
 * Expression Nodes
 *
 * Closed set of node variants for partially evaluated computations.
 * Every operand slot holds a concrete value or another node, and nodes
 * are frozen on construction.
 */

import {
  applyBinary,
  applyUnary,
  type BinaryOperator,
  type UnaryOperator,
} from './arithmetic.js';
import { isNumericValue, type NumericValue } from './values.js';
import type { BinaryFunction, UnaryFunction } from './types.js';

// ============================================================
// NODE TYPES
// ============================================================

/** Unbound variable */
export interface VariableNode {
  readonly type: 'Variable';
  readonly name: string;
}

/** Unary minus or square root */
export interface UnaryOpNode {
  readonly type: 'UnaryOp';
  readonly op: UnaryOperator;
  readonly operand: Operand;
}

export interface BinaryOpNode {
  readonly type: 'BinaryOp';
  readonly op: BinaryOperator;
  readonly left: Operand;
  readonly right: Operand;
}

export interface UnaryFunctionNode {
  readonly type: 'UnaryFunction';
  /** Display name */
  readonly name: string;
  readonly fn: UnaryFunction;
  readonly operand: Operand;
}

export interface BinaryFunctionNode {
  readonly type: 'BinaryFunction';
  /** Display name */
  readonly name: string;
  readonly fn: BinaryFunction;
  readonly left: Operand;
  readonly right: Operand;
}

export type Expression =
  | VariableNode
  | UnaryOpNode
  | BinaryOpNode
  | UnaryFunctionNode
  | BinaryFunctionNode;

export type ExpressionType = Expression['type'];

/** Operand slot content */
export type Operand = NumericValue | Expression;

export function isExpression(value: unknown): value is Expression {
  return (
    typeof value === 'object' &&
    value !== null &&
    !isNumericValue(value) &&
    'type' in value
  );
}

// ============================================================
// CONSTRUCTORS
// ============================================================

export function variable(name: string): VariableNode {
  const node: VariableNode = { type: 'Variable', name };
  return Object.freeze(node);
}

export function unaryOp(op: UnaryOperator, operand: Operand): UnaryOpNode {
  const node: UnaryOpNode = { type: 'UnaryOp', op, operand };
  return Object.freeze(node);
}

export function binaryOp(
  op: BinaryOperator,
  left: Operand,
  right: Operand
): BinaryOpNode {
  const node: BinaryOpNode = { type: 'BinaryOp', op, left, right };
  return Object.freeze(node);
}

export function unaryFunction(
  name: string,
  fn: UnaryFunction,
  operand: Operand
): UnaryFunctionNode {
  const node: UnaryFunctionNode = { type: 'UnaryFunction', name, fn, operand };
  return Object.freeze(node);
}

export function binaryFunction(
  name: string,
  fn: BinaryFunction,
  left: Operand,
  right: Operand
): BinaryFunctionNode {
  const node: BinaryFunctionNode = {
    type: 'BinaryFunction',
    name,
    fn,
    left,
    right,
  };
  return Object.freeze(node);
}

// ============================================================
// FOLD OR BUILD
// ============================================================
// Shared by parser reductions and evaluate(): apply when every operand
// is concrete, otherwise build a node over the operands.

export function reduceUnaryOp(op: UnaryOperator, operand: Operand): Operand {
  return isExpression(operand)
    ? unaryOp(op, operand)
    : applyUnary(op, operand);
}

export function reduceBinaryOp(
  op: BinaryOperator,
  left: Operand,
  right: Operand
): Operand {
  return isExpression(left) || isExpression(right)
    ? binaryOp(op, left, right)
    : applyBinary(op, left, right);
}

export function reduceUnaryCall(
  name: string,
  fn: UnaryFunction,
  operand: Operand
): Operand {
  return isExpression(operand)
    ? unaryFunction(name, fn, operand)
    : fn(operand);
}

export function reduceBinaryCall(
  name: string,
  fn: BinaryFunction,
  left: Operand,
  right: Operand
): Operand {
  return isExpression(left) || isExpression(right)
    ? binaryFunction(name, fn, left, right)
    : fn(left, right);
}
