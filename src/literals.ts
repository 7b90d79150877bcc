/**
 * Literal Decoding
 * String, character and number literal conversion for the parser
 */

// ============================================================
// STRINGS
// ============================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
};

interface DecodedEscape {
  readonly value: string;
  /** Index just past the escape sequence */
  readonly next: number;
}

/**
 * Decode the escape sequence whose letter starts at `start` (just after the backslash).
 * `quote` is the enclosing quote character, which may itself be escaped.
 */
function decodeEscape(
  text: string,
  start: number,
  quote: string
): DecodedEscape | null {
  const c = text.charAt(start);

  const simple = SIMPLE_ESCAPES[c];
  if (simple !== undefined) {
    return { value: simple, next: start + 1 };
  }
  if (c === quote) {
    return { value: quote, next: start + 1 };
  }

  if (c >= '0' && c <= '7') {
    const digits = text.slice(start, start + 3);
    if (!/^[0-7]{3}$/.test(digits)) return null;
    const code = parseInt(digits, 8);
    if (code > 255) return null;
    return { value: String.fromCharCode(code), next: start + 3 };
  }

  const hexLength = c === 'x' ? 2 : c === 'u' ? 4 : c === 'U' ? 8 : 0;
  if (hexLength === 0) return null;

  const digits = text.slice(start + 1, start + 1 + hexLength);
  if (!new RegExp(`^[0-9a-fA-F]{${hexLength}}$`).test(digits)) return null;
  const code = parseInt(digits, 16);

  if (c === 'x') {
    return { value: String.fromCharCode(code), next: start + 3 };
  }
  // \u and \U must name a valid code point, not a surrogate half
  if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return null;
  return { value: String.fromCodePoint(code), next: start + 1 + hexLength };
}

/**
 * Decode a double-quoted or backquoted string literal.
 * Returns null when the literal is malformed.
 *
 * @example
 * unquote('"a\\tb"')  // "a\tb"
 * unquote('`a\\tb`')  // "a\\tb"
 */
export function unquote(text: string): string | null {
  if (text.length < 2) return null;
  const quote = text.charAt(0);
  if (text.charAt(text.length - 1) !== quote) return null;
  const body = text.slice(1, -1);

  if (quote === '`') {
    if (body.includes('`')) return null;
    return body.replace(/\r/g, '');
  }

  if (quote !== '"') return null;

  let result = '';
  let i = 0;
  while (i < body.length) {
    const ch = body.charAt(i);
    if (ch === '"' || ch === '\n') return null;
    if (ch !== '\\') {
      result += ch;
      i++;
      continue;
    }
    const escape = decodeEscape(body, i + 1, '"');
    if (!escape) return null;
    result += escape.value;
    i = escape.next;
  }
  return result;
}

/**
 * Decode a single-quoted character constant to its code point.
 * Returns null when the constant is malformed or holds more than one character.
 *
 * @example
 * unquoteChar("'a'")    // 97
 * unquoteChar("'\\n'")  // 10
 */
export function unquoteChar(text: string): number | null {
  if (text.length < 3) return null;
  if (text.charAt(0) !== "'" || text.charAt(text.length - 1) !== "'") {
    return null;
  }
  const body = text.slice(1, -1);

  if (body.charAt(0) === '\\') {
    const escape = decodeEscape(body, 1, "'");
    if (!escape || escape.next !== body.length) return null;
    return escape.value.codePointAt(0) ?? null;
  }

  const chars = [...body];
  if (chars.length !== 1 || body === "'" || body === '\n') return null;
  return body.codePointAt(0) ?? null;
}

// ============================================================
// NUMBERS
// ============================================================

/** Every interpretation a numeric literal supports */
export interface NumberLiteral {
  readonly isInt: boolean;
  readonly isUint: boolean;
  readonly isFloat: boolean;
  readonly intValue: bigint | null;
  readonly floatValue: number | null;
}

export type NumberParseResult =
  | { readonly ok: true; readonly value: NumberLiteral }
  | { readonly ok: false; readonly reason: string };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const INTEGER_PATTERN =
  /^([+-]?)(0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|0[0-7_]*|[1-9][0-9_]*)$/;
const DECIMAL_FLOAT_PATTERN =
  /^[+-]?(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?$/;
const HEX_FLOAT_PATTERN =
  /^([+-]?)0[xX]([\da-fA-F_]*)(?:\.([\da-fA-F_]*))?[pP]([+-]?\d[\d_]*)$/;
const BAD_UNDERSCORE = /__|_$|_\.|\._|_[eEpP+-]|[eEpP+-]_/;

/** Parse integer syntax (any base) without range checks. */
function parseInteger(text: string): bigint | null {
  const match = INTEGER_PATTERN.exec(text);
  if (!match) return null;
  const sign = match[1] ?? '';
  const body = match[2] ?? '';
  if (BAD_UNDERSCORE.test(body)) return null;

  let digits = body.replace(/_/g, '');
  if (/^0[xXoObB]$/.test(digits)) return null;
  // Legacy octal: 017
  if (digits.length > 1 && digits.charAt(0) === '0' && /\d/.test(digits.charAt(1))) {
    digits = `0o${digits.slice(1)}`;
  }

  const value = BigInt(digits);
  return sign === '-' ? -value : value;
}

function parseHexFloat(match: RegExpExecArray): number | null {
  const sign = match[1] === '-' ? -1 : 1;
  const whole = (match[2] ?? '').replace(/_/g, '');
  const fraction = (match[3] ?? '').replace(/_/g, '');
  const exponent = Number((match[4] ?? '0').replace(/_/g, ''));
  if (whole === '' && fraction === '') return null;

  let mantissa = whole === '' ? 0 : parseInt(whole, 16);
  let scale = 1 / 16;
  for (const digit of fraction) {
    mantissa += parseInt(digit, 16) * scale;
    scale /= 16;
  }
  return sign * mantissa * 2 ** exponent;
}

/** Parse float syntax (decimal or hexadecimal). Returns null for bad syntax or overflow. */
function parseFloatLiteral(text: string): number | null {
  if (BAD_UNDERSCORE.test(text)) return null;

  let value: number | null = null;
  if (DECIMAL_FLOAT_PATTERN.test(text)) {
    value = Number(text.replace(/_/g, ''));
  } else {
    const hex = HEX_FLOAT_PATTERN.exec(text);
    if (hex) value = parseHexFloat(hex);
  }

  if (value === null || !Number.isFinite(value)) return null;
  return value;
}

/**
 * Decode a number or character constant.
 *
 * Integers in int64 range are also floats; integral floats in range are also
 * ints. Integer syntax that does not fit 64 bits is an overflow error.
 *
 * @example
 * parseNumber('0x10', false)  // ok: isInt, intValue 16n, floatValue 16
 * parseNumber('1e3', false)   // ok: isFloat 1000, also isInt 1000n
 * parseNumber("'a'", true)    // ok: isInt 97n
 */
export function parseNumber(text: string, isChar: boolean): NumberParseResult {
  if (isChar) {
    const code = unquoteChar(text);
    if (code === null) {
      return { ok: false, reason: 'malformed character constant' };
    }
    return {
      ok: true,
      value: {
        isInt: true,
        isUint: true,
        isFloat: true,
        intValue: BigInt(code),
        floatValue: code,
      },
    };
  }

  const integer = parseInteger(text);
  if (integer !== null) {
    const isInt = integer >= INT64_MIN && integer <= INT64_MAX;
    const isUint = integer >= 0n && integer <= UINT64_MAX;
    if (!isInt && !isUint) {
      return { ok: false, reason: 'integer overflow' };
    }
    return {
      ok: true,
      value: {
        isInt,
        isUint,
        isFloat: true,
        intValue: integer,
        floatValue: Number(integer),
      },
    };
  }

  const float = parseFloatLiteral(text);
  if (float === null) {
    return { ok: false, reason: 'illegal number syntax' };
  }

  const integral = Number.isInteger(float);
  const isInt = integral && float >= -(2 ** 63) && float < 2 ** 63;
  const isUint = integral && float >= 0 && float < 2 ** 64;
  return {
    ok: true,
    value: {
      isInt,
      isUint,
      isFloat: true,
      intValue: isInt || isUint ? BigInt(float) : null,
      floatValue: float,
    },
  };
}
