/**
 * Runtime Types
 *
 * Public types for session configuration and observability.
 * These types are the primary interface for host applications.
 */

import type { ExprError } from '../../error-classes.js';
import type { Expression, Operand } from './expression.js';
import type { NumericDomain, NumericValue } from './values.js';

/** Univariate function callable from expressions: name(x) */
export type UnaryFunction = (x: NumericValue) => NumericValue;

/** Bivariate function callable from expressions: name(x, y) */
export type BinaryFunction = (x: NumericValue, y: NumericValue) => NumericValue;

/** Observability callbacks for monitoring parsing */
export interface ObservabilityCallbacks {
  /** Called after each non-empty statement reduces */
  onStatement?: (event: StatementEvent) => void;
  /** Called when an assignment is committed to the session */
  onAssign?: (event: AssignEvent) => void;
  /** Called when a function call reduces */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called when parsing fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted after a statement reduces */
export interface StatementEvent {
  /** Statement index among non-empty statements (0-based) */
  index: number;
  /** Value produced by the statement */
  value: Operand;
  /** Reduction time in milliseconds */
  durationMs: number;
}

/** Event emitted when a variable binding is committed */
export interface AssignEvent {
  name: string;
  value: Operand;
}

/** Event emitted when a function call reduces */
export interface FunctionCallEvent {
  name: string;
  args: Operand[];
  /** True when the call was applied, false when a node was built */
  folded: boolean;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: ExprError;
}

/** Options for {@link createSession} */
export interface SessionOptions {
  /** Numeric domain (default: 'real') */
  domain?: NumericDomain | undefined;
  /** Allow `name = expr` statements (default: true) */
  allowAssignment?: boolean | undefined;
  /** Turn unknown names into symbolic variables (default: true) */
  allowFreeVariables?: boolean | undefined;
  /** Initial variable bindings */
  variables?: Record<string, NumericValue | Expression> | undefined;
  /** Constant table (default: pi and e) */
  constants?: Record<string, NumericValue> | undefined;
  /** Univariate function table (default depends on domain) */
  unaryFunctions?: Record<string, UnaryFunction> | undefined;
  /** Bivariate function table (default depends on domain) */
  binaryFunctions?: Record<string, BinaryFunction> | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
}

/**
 * Session state: fixed configuration, read-only lookup tables and the
 * mutable variable table.
 */
export interface Session {
  readonly domain: NumericDomain;
  readonly allowAssignment: boolean;
  readonly allowFreeVariables: boolean;
  /** Assigned variables; mutated only by a successful parse */
  readonly variables: Map<string, Operand>;
  readonly constants: ReadonlyMap<string, NumericValue>;
  readonly unaryFunctions: ReadonlyMap<string, UnaryFunction>;
  readonly binaryFunctions: ReadonlyMap<string, BinaryFunction>;
  readonly observability: ObservabilityCallbacks;
}
