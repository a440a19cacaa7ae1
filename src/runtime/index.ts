/**
 * Runtime
 * Values, expression trees, evaluation, formatting and sessions
 */

// ============================================================
// VALUES
// ============================================================
export { Complex, formatReal } from './core/complex.js';
export {
  formatNumeric,
  isNumericValue,
  toDomain,
  toReal,
  type NumericDomain,
  type NumericValue,
} from './core/values.js';
export {
  applyBinary,
  applyUnary,
  type BinaryOperator,
  type UnaryOperator,
} from './core/arithmetic.js';

// ============================================================
// EXPRESSION TREES
// ============================================================
export {
  binaryFunction,
  binaryOp,
  isExpression,
  unaryFunction,
  unaryOp,
  variable,
  type BinaryFunctionNode,
  type BinaryOpNode,
  type Expression,
  type ExpressionType,
  type Operand,
  type UnaryFunctionNode,
  type UnaryOpNode,
  type VariableNode,
} from './core/expression.js';
export {
  evaluate,
  freeVariables,
  isFullyDefined,
  type Bindings,
} from './core/evaluate.js';
export {
  BINARY_PRIORITIES,
  formatExpression,
  toCanonical,
  toReadable,
  UNARY_PRIORITIES,
  type FormatOptions,
} from './core/format.js';

// ============================================================
// SESSIONS
// ============================================================
export { createSession } from './core/context.js';
export type {
  AssignEvent,
  BinaryFunction,
  ErrorEvent,
  FunctionCallEvent,
  ObservabilityCallbacks,
  Session,
  SessionOptions,
  StatementEvent,
  UnaryFunction,
} from './core/types.js';

// ============================================================
// BUILT-INS
// ============================================================
export {
  BUILTIN_CONSTANTS,
  COMPLEX_BINARY_FUNCTIONS,
  COMPLEX_UNARY_FUNCTIONS,
  complexBinary,
  complexUnary,
  defaultBinaryFunctions,
  defaultUnaryFunctions,
  REAL_BINARY_FUNCTIONS,
  REAL_UNARY_FUNCTIONS,
  realBinary,
  realUnary,
} from './ext/builtins.js';
