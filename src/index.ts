/**
 * Template Parser Module
 * Exports lexer, parser, literal decoding, renderer, checker and node types
 */

export {
  createTokenSource,
  DEFAULT_LEFT_DELIM,
  DEFAULT_RIGHT_DELIM,
  describeToken,
  tokenize,
  type LexerOptions,
} from './lexer/index.js';
export {
  isEmptyTree,
  MAX_LOOKAHEAD,
  parse,
  Parser,
  parseTokens,
} from './parser/index.js';
export {
  parseNumber,
  unquote,
  unquoteChar,
  type NumberLiteral,
  type NumberParseResult,
} from './literals.js';
export { nodeToString } from './render.js';
export {
  createDefaultConfig,
  loadConfig,
  parseConfig,
  validateTemplates,
  VALIDATION_RULES,
  type CheckConfig,
  type Diagnostic,
  type RuleState,
  type Severity,
  type ValidationRule,
} from './check/index.js';
export * from './types.js';
