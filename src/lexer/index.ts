/**
 * Lexer
 * Converts template text into a lazy token stream
 */

export { createTokenSource, nextToken, tokenize } from './tokenizer.js';
export { describeToken } from './helpers.js';
export {
  createLexerState,
  DEFAULT_LEFT_DELIM,
  DEFAULT_RIGHT_DELIM,
  type LexerMode,
  type LexerOptions,
  type LexerState,
} from './state.js';
