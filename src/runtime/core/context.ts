/**
 * Session Factory
 *
 * Creates and configures the session that parsing runs against.
 * Public API for host applications.
 */

import {
  BUILTIN_CONSTANTS,
  defaultBinaryFunctions,
  defaultUnaryFunctions,
} from '../ext/builtins.js';
import { isExpression, type Operand } from './expression.js';
import type { Session, SessionOptions } from './types.js';
import { toDomain, type NumericDomain, type NumericValue } from './values.js';

function liftOperand(value: Operand, domain: NumericDomain): Operand {
  return isExpression(value) ? value : toDomain(value, domain);
}

/**
 * Create a session for parsing.
 *
 * In complex mode initial variables and constants are lifted to complex
 * values. Function tables given in options replace the domain defaults.
 *
 * @example
 * ```typescript
 * const session = createSession({ domain: 'complex', allowFreeVariables: false });
 * parse(session, 'sqrt(-4)'); // 2j
 * ```
 */
export function createSession(options: SessionOptions = {}): Session {
  const domain = options.domain ?? 'real';

  const variables = new Map<string, Operand>();
  for (const [name, value] of Object.entries(options.variables ?? {})) {
    variables.set(name, liftOperand(value, domain));
  }

  const constants = new Map<string, NumericValue>();
  for (const [name, value] of Object.entries(
    options.constants ?? BUILTIN_CONSTANTS
  )) {
    constants.set(name, toDomain(value, domain));
  }

  return {
    domain,
    allowAssignment: options.allowAssignment ?? true,
    allowFreeVariables: options.allowFreeVariables ?? true,
    variables,
    constants,
    unaryFunctions: new Map(
      Object.entries(options.unaryFunctions ?? defaultUnaryFunctions(domain))
    ),
    binaryFunctions: new Map(
      Object.entries(options.binaryFunctions ?? defaultBinaryFunctions(domain))
    ),
    observability: options.observability ?? {},
  };
}
