/**
 * Parse Error Tests
 * Message shape, line attribution and structured data
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError, TemplateError } from '../../src/index.js';
import { parseFailure } from '../helpers/trees.js';

describe('parse errors', () => {
  it('reports the line of the last token read', () => {
    const err = parseFailure('a\nb\n{{.X | "y"}}');
    expect(err.line).toBe(3);
    expect(err.message).toBe(
      'template: t:3:non executable command in pipeline stage 2'
    );
  });

  it('reports end of input on the final line', () => {
    const err = parseFailure('line1\n{{if .A}}\n{{.B}}\n');
    expect(err.message).toBe('template: t:4:unexpected end of input in if');
  });

  it('names the innermost tree', () => {
    const err = parseFailure(
      '{{define "outer"}}{{block "inner" .}}{{.X 1}}{{bad}}{{end}}{{end}}'
    );
    expect(err.treeName).toBe('inner');
    expect(err.detail).toBe('function bad not defined');
  });

  it('is a TemplateError with structured data', () => {
    const err = parseFailure('{{$nope}}');
    expect(err).toBeInstanceOf(TemplateError);
    expect(err.name).toBe('ParseError');
    expect(err.toData()).toEqual({
      errorId: 'TMPL-P004',
      message: 'template: t:1:undefined variable $nope',
      location: { line: 1, column: 3, offset: 2 },
      context: { name: '$nope' },
    });
  });

  it('uses the given tree name for the top level', () => {
    let caught: unknown;
    try {
      parse('page.html', '{{end}}');
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof ParseError)) throw new Error('expected ParseError');
    expect(caught.message).toBe('template: page.html:1:unexpected {{end}}');
  });

  it('formats through a custom formatter', () => {
    const err = parseFailure('{{');
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[TMPL-P016] template: t:1:unclosed action'
    );
  });
});
