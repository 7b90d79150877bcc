/**
 * Token Readers
 * Functions to read specific token types inside an action
 */

import type { Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  atTerminator,
  errorToken,
  isAlphaNumeric,
  isSpace,
  makeToken,
} from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Read a delimited literal, skipping backslash escapes */
function readQuoted(
  state: LexerState,
  quote: string,
  type: TokenType,
  unterminated: string
): Token {
  const start = currentLocation(state);
  const from = state.pos;
  advance(state); // consume opening quote

  for (;;) {
    const ch = peek(state);
    if (ch === '' || ch === '\n') {
      return errorToken(state, unterminated, start);
    }
    advance(state);
    if (ch === quote) break;
    if (ch === '\\') {
      const escaped = peek(state);
      if (escaped === '' || escaped === '\n') {
        return errorToken(state, unterminated, start);
      }
      advance(state);
    }
  }

  return makeToken(
    type,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}

export function readString(state: LexerState): Token {
  return readQuoted(
    state,
    '"',
    TOKEN_TYPES.STRING,
    'unterminated quoted string'
  );
}

export function readCharConstant(state: LexerState): Token {
  return readQuoted(
    state,
    "'",
    TOKEN_TYPES.CHAR_CONSTANT,
    'unterminated character constant'
  );
}

/** Raw strings may span lines and have no escapes */
export function readRawString(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;
  advance(state); // consume opening `

  while (peek(state) !== '`') {
    if (isAtEnd(state)) {
      return errorToken(state, 'unterminated raw quoted string', start);
    }
    advance(state);
  }
  advance(state); // consume closing `

  return makeToken(
    TOKEN_TYPES.RAW_STRING,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}

function acceptOne(state: LexerState, valid: string): boolean {
  const ch = peek(state);
  if (ch !== '' && valid.includes(ch)) {
    advance(state);
    return true;
  }
  return false;
}

function acceptRun(state: LexerState, valid: string): void {
  while (acceptOne(state, valid));
}

const DECIMAL_DIGITS = '0123456789_';
const HEX_DIGITS = '0123456789abcdefABCDEF_';

/**
 * Read a number: optional sign, base prefix, digits, fraction and exponent.
 * Decoding happens in the parser; only the shape is checked here.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;

  acceptOne(state, '+-');
  let digits = DECIMAL_DIGITS;
  if (acceptOne(state, '0')) {
    if (acceptOne(state, 'xX')) {
      digits = HEX_DIGITS;
    } else if (acceptOne(state, 'oO')) {
      digits = '01234567_';
    } else if (acceptOne(state, 'bB')) {
      digits = '01_';
    }
  }
  acceptRun(state, digits);
  if (acceptOne(state, '.')) {
    acceptRun(state, digits);
  }
  if (digits === DECIMAL_DIGITS && acceptOne(state, 'eE')) {
    acceptOne(state, '+-');
    acceptRun(state, DECIMAL_DIGITS);
  }
  if (digits === HEX_DIGITS && acceptOne(state, 'pP')) {
    acceptOne(state, '+-');
    acceptRun(state, DECIMAL_DIGITS);
  }

  if (isAlphaNumeric(peek(state))) {
    advance(state);
    return errorToken(state, 'bad number syntax', start);
  }

  return makeToken(
    TOKEN_TYPES.NUMBER,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}

/** Read a word: keyword, bool, nil or function identifier */
export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;

  while (isAlphaNumeric(peek(state))) {
    advance(state);
  }
  if (!atTerminator(state)) {
    return errorToken(state, 'bad character', start);
  }

  const word = state.source.slice(from, state.pos);
  const type = KEYWORDS.get(word) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, word, start, currentLocation(state));
}

/**
 * Read `.name` or `$name`. A bare `.` is DOT; a bare `$` is the root variable.
 */
function readFieldOrVariable(state: LexerState, type: TokenType): Token {
  const start = currentLocation(state);
  const from = state.pos;
  advance(state); // consume . or $

  if (atTerminator(state)) {
    const bare = type === TOKEN_TYPES.FIELD ? TOKEN_TYPES.DOT : type;
    return makeToken(
      bare,
      state.source.slice(from, state.pos),
      start,
      currentLocation(state)
    );
  }

  while (isAlphaNumeric(peek(state))) {
    advance(state);
  }
  if (!atTerminator(state)) {
    return errorToken(state, 'bad character', start);
  }

  return makeToken(
    type,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}

export function readField(state: LexerState): Token {
  return readFieldOrVariable(state, TOKEN_TYPES.FIELD);
}

export function readVariable(state: LexerState): Token {
  return readFieldOrVariable(state, TOKEN_TYPES.VARIABLE);
}

/** Collapse a run of space characters into one SPACE token */
export function readSpace(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;
  while (isSpace(peek(state))) {
    // A space that opens a right trim marker belongs to the delimiter
    if (
      peek(state, 1) === '-' &&
      state.source.startsWith(state.rightDelim, state.pos + 2)
    ) {
      break;
    }
    advance(state);
  }
  return makeToken(
    TOKEN_TYPES.SPACE,
    state.source.slice(from, state.pos),
    start,
    currentLocation(state)
  );
}
