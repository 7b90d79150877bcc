/**
 * Lexer Tests
 * Token sequences for text, actions, trim markers, comments and errors
 */

import { describe, expect, it } from 'vitest';
import {
  createTokenSource,
  describeToken,
  tokenize,
  type Token,
} from '../../src/index.js';

function types(tokens: Token[]): string[] {
  return tokens.map((t) => t.type);
}

function values(tokens: Token[]): string[] {
  return tokens.map((t) => t.value);
}

/** Message of the final ERROR token */
function lexError(source: string): string {
  const last = tokenize(source).at(-1);
  expect(last?.type).toBe('ERROR');
  return last?.value ?? '';
}

describe('tokenize', () => {
  describe('text and actions', () => {
    it('splits text around an action', () => {
      const tokens = tokenize('hello {{.Name}}!');
      expect(types(tokens)).toEqual([
        'TEXT',
        'LEFT_DELIM',
        'FIELD',
        'RIGHT_DELIM',
        'TEXT',
        'EOF',
      ]);
      expect(values(tokens)).toEqual(['hello ', '{{', '.Name', '}}', '!', '']);
    });

    it('records 1-based line and column with 0-based offset', () => {
      const tokens = tokenize('hello {{.Name}}!');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 7, offset: 6 });
      expect(tokens[2]?.span.start).toEqual({ line: 1, column: 9, offset: 8 });
      expect(tokens[5]?.span.start).toEqual({
        line: 1,
        column: 17,
        offset: 16,
      });
    });

    it('tracks lines across newlines', () => {
      const tokens = tokenize('a\n{{.b}}\n{{.c}}');
      const field = tokens.find((t) => t.value === '.c');
      expect(field?.span.start).toEqual({ line: 3, column: 3, offset: 11 });
    });

    it('counts offsets in UTF-8 bytes', () => {
      const tokens = tokenize('é{{.a}}');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 2, offset: 2 });
      expect(tokens[2]?.span.start).toEqual({ line: 1, column: 4, offset: 4 });
    });

    it('counts a surrogate pair as four bytes', () => {
      const tokens = tokenize('😀{{.a}}');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 3, offset: 4 });
    });

    it('produces only EOF for empty input', () => {
      expect(types(tokenize(''))).toEqual(['EOF']);
    });
  });

  describe('action tokens', () => {
    it('lexes a range declaration', () => {
      const tokens = tokenize('{{range $i, $e := .Items}}');
      expect(types(tokens)).toEqual([
        'LEFT_DELIM',
        'RANGE',
        'SPACE',
        'VARIABLE',
        'COMMA',
        'SPACE',
        'VARIABLE',
        'SPACE',
        'COLON_EQUALS',
        'SPACE',
        'FIELD',
        'RIGHT_DELIM',
        'EOF',
      ]);
    });

    it('lexes numbers, characters and raw strings', () => {
      const tokens = tokenize("{{1.5e3 0x1F -2 'a' `raw`}}").filter(
        (t) => t.type !== 'SPACE'
      );
      expect(types(tokens)).toEqual([
        'LEFT_DELIM',
        'NUMBER',
        'NUMBER',
        'NUMBER',
        'CHAR_CONSTANT',
        'RAW_STRING',
        'RIGHT_DELIM',
        'EOF',
      ]);
      expect(values(tokens).slice(1, 6)).toEqual([
        '1.5e3',
        '0x1F',
        '-2',
        "'a'",
        '`raw`',
      ]);
    });

    it('lexes nil, booleans, dot and the root variable', () => {
      const tokens = tokenize('{{nil true . $}}').filter(
        (t) => t.type !== 'SPACE'
      );
      expect(types(tokens)).toEqual([
        'LEFT_DELIM',
        'NIL',
        'BOOL',
        'DOT',
        'VARIABLE',
        'RIGHT_DELIM',
        'EOF',
      ]);
      expect(tokens[4]?.value).toBe('$');
    });

    it('splits a variable from its field chain', () => {
      const tokens = tokenize('{{$x.a.b}}');
      expect(values(tokens)).toEqual(['{{', '$x', '.a', '.b', '}}', '']);
    });

    it('lexes pipes and parentheses', () => {
      const tokens = tokenize('{{(f .) | g}}').filter(
        (t) => t.type !== 'SPACE'
      );
      expect(types(tokens)).toEqual([
        'LEFT_DELIM',
        'LPAREN',
        'IDENTIFIER',
        'DOT',
        'RPAREN',
        'PIPE',
        'IDENTIFIER',
        'RIGHT_DELIM',
        'EOF',
      ]);
    });
  });

  describe('trim markers', () => {
    it('trims whitespace on both sides', () => {
      const tokens = tokenize('a  {{- 3 -}}  b');
      expect(values(tokens)).toEqual(['a', '{{', '3', '}}', 'b', '']);
    });

    it('keeps a negative number after the delimiter', () => {
      const tokens = tokenize('a {{-3}}');
      expect(values(tokens)).toEqual(['a ', '{{', '-3', '}}', '']);
    });
  });

  describe('comments', () => {
    it('drops comments', () => {
      const tokens = tokenize('a{{/* note */}}b');
      expect(types(tokens)).toEqual(['TEXT', 'TEXT', 'EOF']);
      expect(values(tokens)).toEqual(['a', 'b', '']);
    });

    it('trims around comments', () => {
      expect(values(tokenize('a {{- /* c */ -}} b'))).toEqual(['a', 'b', '']);
    });
  });

  describe('custom delimiters', () => {
    it('uses the configured delimiters only', () => {
      const tokens = tokenize('<<.X>>{{y}}', {
        leftDelim: '<<',
        rightDelim: '>>',
      });
      expect(values(tokens)).toEqual(['<<', '.X', '>>', '{{y}}', '']);
    });

    it('falls back to braces for empty delimiters', () => {
      const tokens = tokenize('{{.}}', { leftDelim: '', rightDelim: '' });
      expect(types(tokens)).toEqual(['LEFT_DELIM', 'DOT', 'RIGHT_DELIM', 'EOF']);
    });
  });

  describe('errors', () => {
    it.each([
      ['{{.a', 'unclosed action'],
      ['{{"abc}}', 'unterminated quoted string'],
      ["{{'a}}", 'unterminated character constant'],
      ['{{`abc}}', 'unterminated raw quoted string'],
      ['{{(1}}', 'unclosed left paren'],
      ['{{)}}', 'unexpected right paren'],
      ['{{#}}', 'unrecognized character in action'],
      ['{{3x}}', 'bad number syntax'],
      ['{{/* x }}', 'unclosed comment'],
      ['{{/* x */ y}}', 'comment ends before closing delimiter'],
      ['{{a:b}}', 'expected :='],
      ['{{$x@}}', 'bad character'],
    ])('%s fails with %s', (source, message) => {
      expect(lexError(source)).toBe(message);
    });
  });
});

describe('createTokenSource', () => {
  it('returns null after EOF', () => {
    const source = createTokenSource('x');
    expect(source.next()?.type).toBe('TEXT');
    expect(source.next()?.type).toBe('EOF');
    expect(source.next()).toBeNull();
    expect(source.next()).toBeNull();
  });

  it('returns null after an ERROR token', () => {
    const source = createTokenSource('{{#}}');
    expect(source.next()?.type).toBe('LEFT_DELIM');
    expect(source.next()?.type).toBe('ERROR');
    expect(source.next()).toBeNull();
  });
});

describe('describeToken', () => {
  const [text, delim, keyword] = tokenize('hello{{if');

  it('quotes short values', () => {
    expect(text && describeToken(text)).toBe('"hello"');
    expect(delim && describeToken(delim)).toBe('"{{"');
  });

  it('wraps keywords in angle brackets', () => {
    expect(keyword && describeToken(keyword)).toBe('<if>');
  });

  it('truncates long values', () => {
    const [long] = tokenize('0123456789abc');
    expect(long && describeToken(long)).toBe('"0123456789"...');
  });

  it('names EOF', () => {
    const [eof] = tokenize('');
    expect(eof && describeToken(eof)).toBe('EOF');
  });
});
