/**
 * Term Tests
 * Literals, names, variables, fields and chains
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError } from '../../src/index.js';
import {
  expectNode,
  firstNode,
  parseFailure,
  parseTrees,
  rootOf,
} from '../helpers/trees.js';

/** Operands of the first command in the first action */
function args(text: string, funcs: string[] = []) {
  return firstNode(text, 'Action', funcs).pipe.cmds[0]?.args ?? [];
}

describe('literals', () => {
  it('parses nil, booleans and dot', () => {
    const [nil, yes, no, dot] = args('{{nil true false .}}');
    expect(nil?.type).toBe('Nil');
    expect(expectNode(yes, 'Bool').value).toBe(true);
    expect(expectNode(no, 'Bool').value).toBe(false);
    expect(dot?.type).toBe('Dot');
  });

  it('parses numbers with their classification', () => {
    const [int, float] = args('{{42 1.5}}');
    const n = expectNode(int, 'Number');
    expect(n.text).toBe('42');
    expect(n.isChar).toBe(false);
    expect(n.intValue).toBe(42n);
    expect(n.isUint).toBe(true);
    const f = expectNode(float, 'Number');
    expect(f.isInt).toBe(false);
    expect(f.floatValue).toBe(1.5);
  });

  it('parses character constants as numbers', () => {
    const [ch] = args("{{'a'}}");
    const n = expectNode(ch, 'Number');
    expect(n.isChar).toBe(true);
    expect(n.intValue).toBe(97n);
    expect(n.text).toBe("'a'");
  });

  it('decodes quoted and raw strings', () => {
    const [quoted, raw] = args('{{"a\\tb" `c\\d`}}');
    expect(expectNode(quoted, 'String').quoted).toBe('"a\\tb"');
    expect(expectNode(quoted, 'String').text).toBe('a\tb');
    expect(expectNode(raw, 'String').text).toBe('c\\d');
  });

  it('reports numbers that do not decode', () => {
    const err = parseFailure('{{1e400}}');
    expect(err.errorId).toBe('TMPL-P007');
    expect(err.detail).toBe('illegal number syntax: 1e400');
  });

  it('reports integer overflow', () => {
    const err = parseFailure('{{18446744073709551616}}');
    expect(err.detail).toBe('integer overflow: 18446744073709551616');
  });

  it('reports malformed character constants', () => {
    const err = parseFailure("{{'ab'}}");
    expect(err.detail).toBe("malformed character constant: 'ab'");
  });

  it('reports strings that do not unquote', () => {
    const err = parseFailure('{{"\\q"}}');
    expect(err.errorId).toBe('TMPL-P006');
    expect(err.detail).toBe('unable to unquote string "\\q"');
  });
});

describe('names', () => {
  it('accepts known functions', () => {
    const [fn] = args('{{len .}}', ['len']);
    expect(expectNode(fn, 'Identifier').ident).toBe('len');
  });

  it('rejects unknown functions with their location', () => {
    let caught: unknown;
    try {
      parse('foo', '{{ if eq . "x" }}y{{ end }}');
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof ParseError)) throw new Error('expected ParseError');
    expect(caught.errorId).toBe('TMPL-P003');
    expect(caught.message).toBe('template: foo:1:function eq not defined');
    expect(caught.location).toEqual({ line: 1, column: 7, offset: 6 });
    expect(caught.context).toEqual({ name: 'eq' });
  });

  it('resolves variables with field chains', () => {
    const trees = parseTrees('{{$x := .}}{{$x.a.b}}');
    const action = expectNode(rootOf(trees).nodes[1], 'Action');
    const variable = expectNode(action.pipe.cmds[0]?.args[0], 'Variable');
    expect(variable.ident).toEqual(['$x', 'a', 'b']);
  });

  it('merges field chains into one field', () => {
    const [field] = args('{{.a.b}}');
    const node = expectNode(field, 'Field');
    expect(node.ident).toEqual(['a', 'b']);
    expect(node.pos).toEqual({ line: 1, column: 5, offset: 4 });
  });

  it('wraps a field access on a function in a chain', () => {
    const [chain] = args('{{now.Year}}', ['now']);
    const node = expectNode(chain, 'Chain');
    expect(expectNode(node.node, 'Identifier').ident).toBe('now');
    expect(node.field).toEqual(['Year']);
  });
});

describe('unchainable terms', () => {
  it.each([
    ['{{"x".a}}', 'unexpected . after term "x"'],
    ['{{..a}}', 'unexpected . after term .'],
    ['{{nil.a}}', 'unexpected . after term nil'],
    ['{{true.a}}', 'unexpected . after term true'],
  ])('%s fails', (text, detail) => {
    const err = parseFailure(text);
    expect(err.errorId).toBe('TMPL-P017');
    expect(err.detail).toBe(detail);
  });
});
