/**
 * exprfold
 * Exports lexer, parser, runtime and error taxonomy
 */

export { lex, tokenize, type LexerOptions } from './lexer/index.js';
export { parse } from './parser/index.js';
export * from './runtime/index.js';
export {
  describeToken,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  CapabilityError,
  createError,
  ExprError,
  type ExprErrorData,
  LexicalError,
  NameResolutionError,
  ParseError,
} from './error-classes.js';
