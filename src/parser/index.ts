/**
 * Parser
 * Main entry point and re-exports
 */

import { ExprError } from '../error-classes.js';
import { tokenize } from '../lexer/index.js';
import type { Operand } from '../runtime/core/expression.js';
import type { Session } from '../runtime/core/types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse and reduce a program against a session.
 *
 * Lines are separated by `;` or newlines. Returns the value of the last
 * non-empty line: a concrete value when every name resolved, otherwise an
 * expression tree over the free variables. Returns undefined for a program
 * with no statements.
 *
 * Assignments are committed to `session.variables` only when the whole
 * program succeeds; on error the session is left unchanged.
 *
 * @throws {LexicalError} Illegal character
 * @throws {ParseError} Malformed program
 * @throws {NameResolutionError} Unknown name or function
 * @throws {CapabilityError} Assignment or complex literal not enabled
 *
 * @example
 * ```typescript
 * const session = createSession();
 * parse(session, 'x = 3');  // 3
 * parse(session, 'x + y');  // tree for 3+y
 * ```
 */
export function parse(session: Session, source: string): Operand | undefined {
  const { onAssign, onError } = session.observability;

  try {
    const tokens = tokenize(source, {
      allowComplex: session.domain === 'complex',
    });
    const parser = new Parser(tokens, session);
    const result = parser.parse();

    for (const [name, value] of parser.pending) {
      session.variables.set(name, value);
    }
    for (const [name, value] of parser.pending) {
      onAssign?.({ name, value });
    }

    return result;
  } catch (error) {
    if (error instanceof ExprError) {
      onError?.({ error });
    }
    throw error;
  }
}

export { Parser } from './parser.js';
export {
  createParserState,
  type ParserState,
} from './state.js';
