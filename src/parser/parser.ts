/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { Operand } from '../runtime/core/expression.js';
import type { Session } from '../runtime/core/types.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that reduces tokens directly to values or expression trees.
 *
 * There is no intermediate AST: every grammar rule folds concrete
 * operands as soon as they are known.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, lines, assignment
 * - parser-expr.ts: Precedence chain, operators, grouping
 * - parser-functions.ts: Literals, identifiers, function calls
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize('x = 2; x * y'), session);
 * const result = parser.parse(); // tree for 2*y
 * parser.pending;                // Map { 'x' => 2 }
 * ```
 */
export class Parser {
  /** Token stream and position */
  state: ParserState;
  /** Session providing variables, constants and functions */
  readonly session: Session;
  /** Assignments made by this program, not yet committed to the session */
  readonly pending = new Map<string, Operand>();

  constructor(tokens: readonly Token[], session: Session) {
    this.state = createParserState(tokens);
    this.session = session;
  }

  /**
   * Parse the whole token stream.
   * Returns the value of the last non-empty line.
   */
  parse(): Operand | undefined {
    return this.parseProgram();
  }
}
