/**
 * Lexer State
 * Tracks position and mode in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export const DEFAULT_LEFT_DELIM = '{{';
export const DEFAULT_RIGHT_DELIM = '}}';

/** Text outside actions, or tokens inside {{ }} */
export type LexerMode = 'text' | 'action';

export interface LexerOptions {
  readonly leftDelim?: string | undefined;
  readonly rightDelim?: string | undefined;
}

export interface LexerState {
  readonly source: string;
  readonly leftDelim: string;
  readonly rightDelim: string;
  /** Index into `source` (UTF-16 code units) */
  pos: number;
  /** UTF-8 byte offset of `pos` */
  offset: number;
  line: number;
  column: number;
  mode: LexerMode;
  /** Open parentheses in the current action */
  parenDepth: number;
  /** Set once EOF or an ERROR token has been emitted */
  done: boolean;
}

export function createLexerState(
  source: string,
  options: LexerOptions = {}
): LexerState {
  return {
    source,
    leftDelim: options.leftDelim || DEFAULT_LEFT_DELIM,
    rightDelim: options.rightDelim || DEFAULT_RIGHT_DELIM,
    pos: 0,
    offset: 0,
    line: 1,
    column: 1,
    mode: 'text',
    parenDepth: 0,
    done: false,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.offset };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function startsWithAt(
  state: LexerState,
  text: string,
  offset = 0
): boolean {
  return state.source.startsWith(text, state.pos + offset);
}

/** UTF-8 length of one UTF-16 code unit; each half of a surrogate pair counts 2 */
function utf8Length(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdfff) return 2;
  return 3;
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  if (ch !== '') {
    state.offset += utf8Length(ch.charCodeAt(0));
  }
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance until pos reaches target */
export function advanceTo(state: LexerState, target: number): void {
  while (state.pos < target && !isAtEnd(state)) {
    advance(state);
  }
}

export function advanceBy(state: LexerState, count: number): void {
  advanceTo(state, state.pos + count);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
