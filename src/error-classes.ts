/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { formatLocation, type SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ExprErrorData {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  if (!errorId) {
    throw new TypeError('errorId is required');
  }
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all expression errors.
 * Provides structured data for host applications to format as needed.
 */
export class ExprError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = lookupDefinition(errorId);
    const locationStr = location ? ` at ${formatLocation(location)}` : '';
    super(`${message}${locationStr}`);
    this.name = 'ExprError';
    this.errorId = errorId;
    this.category = definition.category;
    this.location = location;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): ExprErrorData {
    return {
      errorId: this.errorId,
      category: this.category,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ExprErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Illegal character in the input */
export class LexicalError extends ExprError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super(errorId, message, location, context);
    this.name = 'LexicalError';
    this.location = location;
  }
}

/** Malformed token sequence */
export class ParseError extends ExprError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'parse');
    super(errorId, message, location, context);
    this.name = 'ParseError';
  }
}

/** Unknown variable, constant or function */
export class NameResolutionError extends ExprError {
  /** The name that failed to resolve */
  readonly identifier: string;

  constructor(
    errorId: string,
    message: string,
    identifier: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'name');
    super(errorId, message, location, { name: identifier, ...context });
    this.name = 'NameResolutionError';
    this.identifier = identifier;
  }
}

/** Feature disabled by session configuration */
export class CapabilityError extends ExprError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'capability');
    super(errorId, message, location, context);
    this.name = 'CapabilityError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * Renders the definition's message template with `context` and returns the
 * error class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('EXPR-N002', { arity: 'univariate', name: 'foo' }, location)
 * // NameResolutionError: "Unknown univariate function foo at 1:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): ExprError {
  const definition = lookupDefinition(errorId);
  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      if (!location) {
        throw new TypeError(`Lexer error ${errorId} requires a location`);
      }
      return new LexicalError(errorId, message, location, context);
    case 'parse':
      return new ParseError(errorId, message, location, context);
    case 'name':
      return new NameResolutionError(
        errorId,
        message,
        String(context['name'] ?? ''),
        location,
        context
      );
    case 'capability':
      return new CapabilityError(errorId, message, location, context);
  }
}
