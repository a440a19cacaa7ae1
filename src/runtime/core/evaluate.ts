/**
 * Partial Evaluation
 *
 * evaluate() substitutes bindings bottom-up. A node whose operands all
 * become concrete is applied; any other node is rebuilt over its reduced
 * operands. Input nodes are never modified.
 */

import {
  isExpression,
  reduceBinaryCall,
  reduceBinaryOp,
  reduceUnaryCall,
  reduceUnaryOp,
  type Expression,
  type Operand,
} from './expression.js';
import type { NumericValue } from './values.js';

/** Variable bindings as a plain record or a map */
export type Bindings =
  | Readonly<Record<string, NumericValue>>
  | ReadonlyMap<string, NumericValue>;

function isBindingMap(
  bindings: Bindings
): bindings is ReadonlyMap<string, NumericValue> {
  return bindings instanceof Map;
}

function lookup(bindings: Bindings, name: string): NumericValue | undefined {
  if (isBindingMap(bindings)) {
    return bindings.get(name);
  }
  return Object.hasOwn(bindings, name) ? bindings[name] : undefined;
}

function evaluateNode(node: Expression, bindings: Bindings): Operand {
  switch (node.type) {
    case 'Variable':
      return lookup(bindings, node.name) ?? node;
    case 'UnaryOp':
      return reduceUnaryOp(node.op, evaluate(node.operand, bindings));
    case 'BinaryOp':
      return reduceBinaryOp(
        node.op,
        evaluate(node.left, bindings),
        evaluate(node.right, bindings)
      );
    case 'UnaryFunction':
      return reduceUnaryCall(
        node.name,
        node.fn,
        evaluate(node.operand, bindings)
      );
    case 'BinaryFunction':
      return reduceBinaryCall(
        node.name,
        node.fn,
        evaluate(node.left, bindings),
        evaluate(node.right, bindings)
      );
  }
}

/**
 * Evaluate a value or expression tree against variable bindings.
 *
 * Returns a concrete value when every free variable is bound, otherwise a
 * new tree over the remaining unknowns. Concrete input is returned as is.
 *
 * @example
 * ```typescript
 * const tree = parse(session, 'x * y + 1');
 * evaluate(tree, { x: 2 });         // tree for 2*y+1
 * evaluate(tree, { x: 2, y: 3 });   // 7
 * ```
 */
export function evaluate(value: NumericValue, bindings?: Bindings): NumericValue;
export function evaluate(value: Operand, bindings?: Bindings): Operand;
export function evaluate(value: Operand, bindings: Bindings = {}): Operand {
  return isExpression(value) ? evaluateNode(value, bindings) : value;
}

/**
 * Names of all variables in a tree that have no bound value.
 * Concrete values have none.
 */
export function freeVariables(value: Operand): ReadonlySet<string> {
  const names = new Set<string>();
  collectFreeVariables(value, names);
  return names;
}

function collectFreeVariables(value: Operand, names: Set<string>): void {
  if (!isExpression(value)) return;
  switch (value.type) {
    case 'Variable':
      names.add(value.name);
      return;
    case 'UnaryOp':
    case 'UnaryFunction':
      collectFreeVariables(value.operand, names);
      return;
    case 'BinaryOp':
    case 'BinaryFunction':
      collectFreeVariables(value.left, names);
      collectFreeVariables(value.right, names);
      return;
  }
}

/** True when the value contains no free variables */
export function isFullyDefined(value: Operand): value is NumericValue {
  return !isExpression(value);
}
