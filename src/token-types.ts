import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Text mode
  TEXT: 'TEXT',
  LEFT_DELIM: 'LEFT_DELIM', // {{
  RIGHT_DELIM: 'RIGHT_DELIM', // }}

  // Literals
  BOOL: 'BOOL',
  NUMBER: 'NUMBER',
  CHAR_CONSTANT: 'CHAR_CONSTANT', // 'a'
  STRING: 'STRING', // "abc"
  RAW_STRING: 'RAW_STRING', // `abc`
  NIL: 'NIL',

  // Names
  IDENTIFIER: 'IDENTIFIER',
  VARIABLE: 'VARIABLE', // $x or $
  FIELD: 'FIELD', // .Name
  DOT: 'DOT', // .

  // Operators
  COLON_EQUALS: 'COLON_EQUALS', // :=
  COMMA: 'COMMA', // ,
  PIPE: 'PIPE', // |
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )

  // Keywords
  IF: 'IF',
  ELSE: 'ELSE',
  END: 'END',
  RANGE: 'RANGE',
  WITH: 'WITH',
  BLOCK: 'BLOCK',
  DEFINE: 'DEFINE',
  TEMPLATE: 'TEMPLATE',

  // Special
  SPACE: 'SPACE',
  ERROR: 'ERROR', // value is the error message
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

/**
 * Lazy, ordered producer of tokens.
 * Returns null once the stream is exhausted (after EOF or ERROR).
 */
export interface TokenSource {
  next(): Token | null;
}
