/**
 * Lexer
 * Public entry points
 */

export { lex, nextToken, tokenize } from './tokenizer.js';
export {
  createLexerState,
  type LexerOptions,
  type LexerState,
} from './state.js';
