/**
 * Lexer Helper Functions
 * Character classification, trim markers and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { currentLocation, type LexerState } from './state.js';

/** Length of a trim marker: "- " after a left delimiter, " -" before a right one */
export const TRIM_MARKER_LENGTH = 2;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Space characters: space, tab, carriage return, newline */
export function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function isAlphaNumeric(ch: string): boolean {
  return ch === '_' || /^[\p{L}\p{Nd}]$/u.test(ch);
}

/** Left trim marker ("- ") at the given absolute position */
export function hasLeftTrimMarker(state: LexerState, pos: number): boolean {
  return (
    state.source.charAt(pos) === '-' && isSpace(state.source.charAt(pos + 1))
  );
}

/** Right trim marker (" -") at the given absolute position */
function hasRightTrimMarker(state: LexerState, pos: number): boolean {
  return (
    isSpace(state.source.charAt(pos)) && state.source.charAt(pos + 1) === '-'
  );
}

/**
 * Check for the right delimiter at the current position.
 * `trim` is set when a right trim marker precedes it.
 */
export function atRightDelim(state: LexerState): {
  delim: boolean;
  trim: boolean;
} {
  if (
    hasRightTrimMarker(state, state.pos) &&
    state.source.startsWith(state.rightDelim, state.pos + TRIM_MARKER_LENGTH)
  ) {
    return { delim: true, trim: true };
  }
  return {
    delim: state.source.startsWith(state.rightDelim, state.pos),
    trim: false,
  };
}

/** Whether the current character may end a word, field or variable */
export function atTerminator(state: LexerState): boolean {
  const ch = state.source.charAt(state.pos);
  if (ch === '' || isSpace(ch)) return true;
  if ('.,|:()'.includes(ch)) return true;
  return state.source.startsWith(state.rightDelim, state.pos);
}

/** Start of trailing whitespace in source[start, end) */
export function trimmedEnd(source: string, start: number, end: number): number {
  let i = end;
  while (i > start && isSpace(source.charAt(i - 1))) i--;
  return i;
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Emit an ERROR token and exhaust the lexer */
export function errorToken(
  state: LexerState,
  message: string,
  start: SourceLocation
): Token {
  state.done = true;
  return makeToken(TOKEN_TYPES.ERROR, message, start, currentLocation(state));
}

const KEYWORD_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.IF,
  TOKEN_TYPES.ELSE,
  TOKEN_TYPES.END,
  TOKEN_TYPES.RANGE,
  TOKEN_TYPES.WITH,
  TOKEN_TYPES.BLOCK,
  TOKEN_TYPES.DEFINE,
  TOKEN_TYPES.TEMPLATE,
  TOKEN_TYPES.NIL,
]);

/**
 * Describe a token for error messages.
 *
 * @example
 * describeToken(eof)                // EOF
 * describeToken(ifKeyword)          // <if>
 * describeToken(text('hello'))      // "hello"
 * describeToken(text('0123456789ab')) // "0123456789"...
 */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'EOF';
  if (token.type === TOKEN_TYPES.ERROR) return token.value;
  if (KEYWORD_TYPES.has(token.type)) return `<${token.value}>`;
  if (token.value.length > 10) {
    return `${JSON.stringify(token.value.slice(0, 10))}...`;
  }
  return JSON.stringify(token.value);
}
