/**
 * Expression Formatting
 *
 * Readable form uses the fewest brackets that keep the tree unambiguous;
 * canonical form brackets every operator node and is the round-trip
 * representation.
 */

import type { BinaryOperator, UnaryOperator } from './arithmetic.js';
import { isExpression, type Expression, type Operand } from './expression.js';
import { Complex, formatReal } from './complex.js';
import { formatNumeric, isNegative, type NumericValue } from './values.js';

// ============================================================
// PRIORITIES
// ============================================================

/**
 * Binary operator priorities. `-` ranks above `+` and `/` above `*` so
 * that a-(b+c) and a/(b*c) keep their brackets.
 */
export const BINARY_PRIORITIES: Readonly<Record<BinaryOperator, number>> = {
  '+': 0,
  '-': 1,
  '*': 3,
  '/': 4,
  '^': 5,
  '%': 6,
};

export const UNARY_PRIORITIES: Readonly<Record<UnaryOperator, number>> = {
  '-': 3,
  '%': 7,
};

/**
 * `^` and binary `%` parse as one left-associative level, so operands are
 * bracketed against the level rather than the operator's own priority.
 */
const ROOT_LEVEL = new Set<BinaryOperator>(['^', '%']);
const ROOT_LEVEL_LOW = Math.min(BINARY_PRIORITIES['^'], BINARY_PRIORITIES['%']);
const ROOT_LEVEL_HIGH = Math.max(BINARY_PRIORITIES['^'], BINARY_PRIORITIES['%']);

function operandPriorities(op: BinaryOperator): [left: number, right: number] {
  if (ROOT_LEVEL.has(op)) return [ROOT_LEVEL_LOW, ROOT_LEVEL_HIGH + 1];
  const priority = BINARY_PRIORITIES[op];
  return [priority, priority + 1];
}

export interface FormatOptions {
  /** Priority of the enclosing operator (default: 0) */
  parentPriority?: number | undefined;
  /** Minimal brackets when true, fully bracketed when false (default: true) */
  readable?: boolean | undefined;
}

function bracket(text: string, priority: number, parent: number, readable: boolean): string {
  return !readable || parent > priority ? `(${text})` : text;
}

function foldedReal(value: number): string {
  if (Number.isNaN(value)) return '0/0';
  return value > 0 ? '1/0' : '-1/0';
}

/**
 * Text the parser folds back into a non-finite value. A complex value with
 * a NaN part collapses to complex NaN.
 */
function foldedNonFinite(value: NumericValue): string {
  if (typeof value === 'number') return `(${foldedReal(value)})`;
  if (Number.isNaN(value.re) || Number.isNaN(value.im)) return '(0/0)';
  const re = Number.isFinite(value.re) ? formatReal(value.re) : foldedReal(value.re);
  const im = Number.isFinite(value.im) ? `${formatReal(Math.abs(value.im))}j` : '1j/0';
  return `(${re}${value.im < 0 ? '-' : '+'}${im})`;
}

function isFiniteValue(value: NumericValue): boolean {
  return value instanceof Complex
    ? Number.isFinite(value.re) && Number.isFinite(value.im)
    : Number.isFinite(value);
}

function formatLeaf(value: Operand, parent: number, readable: boolean): string {
  if (isExpression(value)) return formatNode(value, parent, readable);
  if (!isFiniteValue(value)) return foldedNonFinite(value);
  const text = formatNumeric(value);
  // Negative literals read back as unary minus
  return isNegative(value)
    ? bracket(text, UNARY_PRIORITIES['-'], parent, readable)
    : text;
}

function formatNode(node: Expression, parent: number, readable: boolean): string {
  switch (node.type) {
    case 'Variable':
      return node.name;
    case 'UnaryOp': {
      const priority = UNARY_PRIORITIES[node.op];
      const operand = formatLeaf(node.operand, priority, readable);
      return bracket(`${node.op}${operand}`, priority, parent, readable);
    }
    case 'BinaryOp': {
      const priority = BINARY_PRIORITIES[node.op];
      // All binary operators associate left: a right operand from the same
      // level needs brackets
      const [leftParent, rightParent] = operandPriorities(node.op);
      const left = formatLeaf(node.left, leftParent, readable);
      const right = formatLeaf(node.right, rightParent, readable);
      return bracket(`${left}${node.op}${right}`, priority, parent, readable);
    }
    case 'UnaryFunction':
      return `${node.name}(${formatLeaf(node.operand, 0, readable)})`;
    case 'BinaryFunction': {
      const left = formatLeaf(node.left, 0, readable);
      const right = formatLeaf(node.right, 0, readable);
      return `${node.name}(${left},${right})`;
    }
  }
}

/**
 * Render a value or expression tree as text.
 *
 * @example
 * ```typescript
 * formatExpression(parse(session, 'a - (b + c)'));                     // 'a-(b+c)'
 * formatExpression(parse(session, 'a - (b + c)'), { readable: false }); // '(a-(b+c))'
 * ```
 */
export function formatExpression(value: Operand, options: FormatOptions = {}): string {
  return formatLeaf(value, options.parentPriority ?? 0, options.readable ?? true);
}

/** Minimal-bracket form */
export function toReadable(value: Operand): string {
  return formatExpression(value);
}

/** Fully bracketed form */
export function toCanonical(value: Operand): string {
  return formatExpression(value, { readable: false });
}
