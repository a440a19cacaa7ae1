/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

import type { SessionOptions } from './runtime/core/types.js';

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'name' | 'capability';

/**
 * Example demonstrating an error condition.
 * Shown by `exprfold --explain`.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Input that triggers the error */
  readonly code: string;
  /** Session settings the input needs, over a session without free variables */
  readonly session?: Pick<SessionOptions, 'domain' | 'allowAssignment'> | undefined;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: EXPR-{category letter}{3-digit} (e.g., EXPR-N001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only lookup of error definitions by ID.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (EXPR-L0xx)
  {
    errorId: 'EXPR-L001',
    category: 'lexer',
    description: 'Illegal character',
    messageTemplate: "Illegal character '{char}' in \"{snippet}\"",
    cause: 'Character is not part of the expression syntax.',
    resolution:
      'Remove the character. Operators are + - * ** / ^ % and =, statements are separated by ; or newlines.',
    examples: [
      { description: 'Comparison operator', code: 'x > 3' },
      { description: 'Comment marker', code: '1 + 2 # three' },
    ],
  },

  // Parse Errors (EXPR-P0xx)
  {
    errorId: 'EXPR-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Syntax error at {token}',
    cause: 'Token cannot appear at this position in an expression.',
    resolution: 'Check for a missing operand or a doubled operator.',
    examples: [
      { description: 'Dangling operator', code: '1 +' },
      { description: 'Two operands without operator', code: '2 3' },
    ],
  },
  {
    errorId: 'EXPR-P002',
    category: 'parse',
    description: 'Missing token',
    messageTemplate: 'Expected {expected}, got {token}{hint}',
    cause: 'A closing parenthesis or separator is missing.',
    resolution: 'Balance parentheses and separate statements with ;.',
    examples: [{ description: 'Unclosed parenthesis', code: '(1 + 2' }],
  },
  {
    errorId: 'EXPR-P003',
    category: 'parse',
    description: 'Wrong number of function arguments',
    messageTemplate: 'Function {name} takes one or two arguments, got {count}',
    cause: 'Functions are either univariate or bivariate.',
    resolution: 'Call the function with one or two arguments.',
    examples: [{ description: 'Three arguments', code: 'pow(1, 2, 3)' }],
  },

  // Name Resolution Errors (EXPR-N0xx)
  {
    errorId: 'EXPR-N001',
    category: 'name',
    description: 'Unknown variable or constant',
    messageTemplate: 'Unknown variable or constant {name}',
    cause:
      'Name is neither an assigned variable nor a constant, and free variables are disabled.',
    resolution:
      'Assign the variable first, or enable free variables to get a symbolic result.',
    examples: [{ description: 'Unbound name', code: 'x + 1' }],
  },
  {
    errorId: 'EXPR-N002',
    category: 'name',
    description: 'Unknown function',
    messageTemplate: 'Unknown {arity} function {name}',
    cause: 'No function of this name and arity is registered in the session.',
    resolution:
      'Check the spelling, or register the function in unaryFunctions/binaryFunctions.',
    examples: [
      { description: 'Misspelled function', code: 'cso(0)' },
      { description: 'Unary function called with two arguments', code: 'sin(1, 2)' },
    ],
  },

  // Capability Errors (EXPR-C0xx)
  {
    errorId: 'EXPR-C001',
    category: 'capability',
    description: 'Assignment disabled',
    messageTemplate: 'Assignment to {name} not supported',
    cause: 'Session was created with allowAssignment: false.',
    resolution: 'Enable assignment, or use the expression without binding it.',
    examples: [
      {
        description: 'Assignment in read-only session',
        code: 'x = 3',
        session: { allowAssignment: false },
      },
    ],
  },
  {
    errorId: 'EXPR-C002',
    category: 'capability',
    description: 'Complex numbers disabled',
    messageTemplate: 'Complex number {literal} not supported',
    cause: 'Imaginary literal used in a real-valued session.',
    resolution: "Create the session with domain: 'complex'.",
    examples: [{ description: 'Imaginary literal', code: '2j' }],
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders with values from context.
 *
 * Missing values render as empty strings.
 *
 * @example
 * renderMessage('Unknown function {name}', { name: 'foo' })
 * // 'Unknown function foo'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = context[key];
    return value === undefined ? '' : String(value);
  });
}
