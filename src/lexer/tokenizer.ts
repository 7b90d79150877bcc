/**
 * Tokenizer
 * Main tokenization logic: text mode and action mode
 */

import type { Token, TokenSource } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  atRightDelim,
  errorToken,
  hasLeftTrimMarker,
  isAlphaNumeric,
  isDigit,
  isSpace,
  makeToken,
  TRIM_MARKER_LENGTH,
  trimmedEnd,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import {
  readCharConstant,
  readField,
  readIdentifier,
  readNumber,
  readRawString,
  readSpace,
  readString,
  readVariable,
} from './readers.js';
import {
  advance,
  advanceBy,
  advanceTo,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerOptions,
  type LexerState,
  peek,
  startsWithAt,
} from './state.js';

const COMMENT_OPEN = '/*';
const COMMENT_CLOSE = '*/';

function skipSpaces(state: LexerState): void {
  while (!isAtEnd(state) && isSpace(peek(state))) {
    advance(state);
  }
}

/** Consume a comment through its closing delimiter. Returns an ERROR token on failure. */
function skipComment(state: LexerState): Token | null {
  const start = currentLocation(state);
  advanceBy(state, COMMENT_OPEN.length);

  const close = state.source.indexOf(COMMENT_CLOSE, state.pos);
  if (close === -1) {
    advanceTo(state, state.source.length);
    return errorToken(state, 'unclosed comment', start);
  }
  advanceTo(state, close + COMMENT_CLOSE.length);

  const { delim, trim } = atRightDelim(state);
  if (!delim) {
    return errorToken(state, 'comment ends before closing delimiter', start);
  }
  if (trim) advanceBy(state, TRIM_MARKER_LENGTH);
  advanceBy(state, state.rightDelim.length);
  if (trim) skipSpaces(state);
  return null;
}

/** At a left delimiter: emit LEFT_DELIM, or swallow a comment. */
function lexLeftDelim(state: LexerState): Token | null {
  const start = currentLocation(state);
  advanceBy(state, state.leftDelim.length);
  const delimEnd = currentLocation(state);

  if (hasLeftTrimMarker(state, state.pos)) {
    advanceBy(state, TRIM_MARKER_LENGTH);
  }
  if (startsWithAt(state, COMMENT_OPEN)) {
    return skipComment(state);
  }

  state.mode = 'action';
  state.parenDepth = 0;
  return makeToken(TOKEN_TYPES.LEFT_DELIM, state.leftDelim, start, delimEnd);
}

function lexRightDelim(state: LexerState, trim: boolean): Token {
  if (trim) advanceBy(state, TRIM_MARKER_LENGTH);
  const start = currentLocation(state);
  advanceBy(state, state.rightDelim.length);
  const token = makeToken(
    TOKEN_TYPES.RIGHT_DELIM,
    state.rightDelim,
    start,
    currentLocation(state)
  );
  if (trim) skipSpaces(state);
  state.mode = 'text';
  return token;
}

function lexText(state: LexerState): Token {
  for (;;) {
    const from = state.pos;
    const start = currentLocation(state);
    const delimAt = state.source.indexOf(state.leftDelim, from);
    const end = delimAt === -1 ? state.source.length : delimAt;

    // A left trim marker drops the whitespace before the delimiter
    const textEnd =
      delimAt !== -1 &&
      hasLeftTrimMarker(state, delimAt + state.leftDelim.length)
        ? trimmedEnd(state.source, from, end)
        : end;

    if (textEnd > from) {
      advanceTo(state, textEnd);
      const token = makeToken(
        TOKEN_TYPES.TEXT,
        state.source.slice(from, textEnd),
        start,
        currentLocation(state)
      );
      advanceTo(state, end);
      return token;
    }

    advanceTo(state, end);
    if (delimAt === -1) {
      state.done = true;
      const loc = currentLocation(state);
      return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
    }

    const token = lexLeftDelim(state);
    if (token) return token;
    // Comment consumed; continue with the following text
  }
}

function lexAction(state: LexerState): Token {
  const { delim, trim } = atRightDelim(state);
  if (delim) {
    if (state.parenDepth === 0) {
      return lexRightDelim(state, trim);
    }
    return errorToken(state, 'unclosed left paren', currentLocation(state));
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (isAtEnd(state)) {
    return errorToken(state, 'unclosed action', start);
  }

  if (isSpace(ch)) {
    return readSpace(state);
  }

  if (ch === ':') {
    advance(state);
    if (peek(state) !== '=') {
      return errorToken(state, 'expected :=', start);
    }
    advance(state);
    return makeToken(
      TOKEN_TYPES.COLON_EQUALS,
      ':=',
      start,
      currentLocation(state)
    );
  }

  const operatorType = SINGLE_CHAR_OPERATORS.get(ch);
  if (operatorType) {
    advance(state);
    return makeToken(operatorType, ch, start, currentLocation(state));
  }

  if (ch === '(') {
    advance(state);
    state.parenDepth++;
    return makeToken(TOKEN_TYPES.LPAREN, ch, start, currentLocation(state));
  }

  if (ch === ')') {
    advance(state);
    state.parenDepth--;
    if (state.parenDepth < 0) {
      return errorToken(state, 'unexpected right paren', start);
    }
    return makeToken(TOKEN_TYPES.RPAREN, ch, start, currentLocation(state));
  }

  if (ch === '"') return readString(state);
  if (ch === '`') return readRawString(state);
  if (ch === "'") return readCharConstant(state);
  if (ch === '$') return readVariable(state);

  // '.' followed by a digit starts a number
  if (ch === '.' && !isDigit(peek(state, 1))) {
    return readField(state);
  }

  if (ch === '.' || ch === '+' || ch === '-' || isDigit(ch)) {
    return readNumber(state);
  }

  if (isAlphaNumeric(ch)) {
    return readIdentifier(state);
  }

  advance(state);
  return errorToken(state, 'unrecognized character in action', start);
}

/**
 * Produce the next token, or null once EOF or an ERROR token has been emitted.
 */
export function nextToken(state: LexerState): Token | null {
  if (state.done) return null;
  return state.mode === 'text' ? lexText(state) : lexAction(state);
}

/** Lazy token source over template text */
export function createTokenSource(
  source: string,
  options: LexerOptions = {}
): TokenSource {
  const state = createLexerState(source, options);
  return {
    next: () => nextToken(state),
  };
}

/** Tokenize the whole source, including the final EOF or ERROR token */
export function tokenize(source: string, options: LexerOptions = {}): Token[] {
  const state = createLexerState(source, options);
  const tokens: Token[] = [];

  for (
    let token = nextToken(state);
    token !== null;
    token = nextToken(state)
  ) {
    tokens.push(token);
  }

  return tokens;
}
