/**
 * Tree Registry Tests
 * define/block trees, ids, duplicate handling, observer and scope bookkeeping
 */

import { describe, expect, it } from 'vitest';
import {
  createTokenSource,
  isEmptyTree,
  ParseError,
  parseTokens,
  Parser,
  type Token,
} from '../../src/index.js';
import {
  arraySource,
  expectNode,
  parseFailure,
  parseTrees,
  rootOf,
  treeOf,
} from '../helpers/trees.js';

describe('named trees', () => {
  it('registers a define clause as its own tree', () => {
    const trees = parseTrees('{{define "a"}}A{{end}}body');
    expect([...trees.keys()]).toEqual(['a', 't']);
    expect(expectNode(rootOf(trees, 'a').nodes[0], 'Text').text).toBe('A');
    expect(rootOf(trees).nodes).toHaveLength(1);
    expect(expectNode(rootOf(trees).nodes[0], 'Text').text).toBe('body');
  });

  it('numbers trees in the order they start', () => {
    const trees = parseTrees(
      '{{define "outer"}}{{block "inner" .}}x{{end}}{{end}}'
    );
    expect(treeOf(trees).id).toBe(1);
    expect(treeOf(trees, 'outer').id).toBe(2);
    expect(treeOf(trees, 'inner').id).toBe(3);
    expect([...trees.keys()]).toEqual(['inner', 'outer', 't']);
  });

  it('tags nodes with the id of the tree that owns them', () => {
    const trees = parseTrees('{{define "a"}}{{.}}{{end}}x');
    const action = expectNode(rootOf(trees, 'a').nodes[0], 'Action');
    expect(action.treeId).toBe(2);
    expect(action.pipe.treeId).toBe(2);
    expect(rootOf(trees).nodes[0]?.treeId).toBe(1);
  });

  it('replaces a block invocation with a template node', () => {
    const trees = parseTrees('{{block "b" .}}x{{end}}');
    const node = expectNode(rootOf(trees).nodes[0], 'Template');
    expect(node.name).toBe('b');
    expect(node.pipe?.cmds[0]?.args[0]?.type).toBe('Dot');
    expect(expectNode(rootOf(trees, 'b').nodes[0], 'Text').text).toBe('x');
  });

  it('rejects two non-empty definitions of one name', () => {
    const err = parseFailure(
      '{{define "a"}}1{{end}}{{define "a"}}2{{end}}'
    );
    expect(err.errorId).toBe('TMPL-P005');
    expect(err.message).toBe('template: a:1:multiple definition of template a');
  });

  it('rejects an empty definition after a non-empty one', () => {
    const err = parseFailure('{{define "a"}}1{{end}}{{define "a"}}  {{end}}');
    expect(err.errorId).toBe('TMPL-P005');
    expect(err.message).toBe('template: a:1:multiple definition of template a');
  });

  it('replaces an empty definition with a later non-empty one', () => {
    const trees = parseTrees('{{define "a"}} {{end}}{{define "a"}}2{{end}}');
    expect(expectNode(rootOf(trees, 'a').nodes[0], 'Text').text).toBe('2');
  });

  it('rejects an empty top level after a define of its name', () => {
    const err = parseFailure('{{define "t"}}x{{end}}');
    expect(err.errorId).toBe('TMPL-P005');
    expect(err.message).toBe('template: t:1:multiple definition of template t');
  });

  it('records referenced field paths', () => {
    const trees = parseTrees('{{.a.b}}{{.c}}');
    expect([...treeOf(trees).fields].sort()).toEqual(['.a', '.a.b', '.c']);
  });

  it('keeps top-level declarations in scope and drops control ones', () => {
    expect(treeOf(parseTrees('{{$x := 1}}')).vars).toEqual(['$', '$x']);
    expect(treeOf(parseTrees('{{if $y := 1}}{{end}}')).vars).toEqual(['$']);
  });
});

describe('observer', () => {
  it('reports tree start and completion in order', () => {
    const events: string[] = [];
    parseTrees('{{define "a"}}{{end}}x', [], {
      observer: {
        onTreeStart: (name, id) => events.push(`start ${name} ${id}`),
        onTreeComplete: (tree) => events.push(`complete ${tree.name}`),
      },
    });
    expect(events).toEqual([
      'start t 1',
      'start a 2',
      'complete a',
      'complete t',
    ]);
  });
});

describe('isEmptyTree', () => {
  it('treats missing and whitespace-only bodies as empty', () => {
    expect(isEmptyTree(null)).toBe(true);
    expect(isEmptyTree(rootOf(parseTrees(' \n\t')))).toBe(true);
    expect(isEmptyTree(rootOf(parseTrees('')))).toBe(true);
  });

  it('treats text and actions as content', () => {
    expect(isEmptyTree(rootOf(parseTrees(' x ')))).toBe(false);
    expect(isEmptyTree(rootOf(parseTrees('{{.}}')))).toBe(false);
  });
});

describe('token sources', () => {
  it('parses through the Parser class', () => {
    const parser = new Parser('page', createTokenSource('{{len .}}'), ['len']);
    const trees = parser.parse();
    const action = expectNode(rootOf(trees, 'page').nodes[0], 'Action');
    expect(expectNode(action.pipe.cmds[0]?.args[0], 'Identifier').ident).toBe(
      'len'
    );
  });

  it('parses a hand-built token stream', () => {
    const at = { line: 1, column: 1, offset: 0 };
    const token = (type: Token['type'], value: string): Token => ({
      type,
      value,
      span: { start: at, end: at },
    });
    const trees = parseTokens(
      'custom',
      arraySource([
        token('LEFT_DELIM', '<%'),
        token('FIELD', '.Name'),
        token('RIGHT_DELIM', '%>'),
        token('EOF', ''),
      ])
    );
    const action = expectNode(rootOf(trees, 'custom').nodes[0], 'Action');
    expect(expectNode(action.pipe.cmds[0]?.args[0], 'Field').ident).toEqual([
      'Name',
    ]);
  });

  it('rejects a body parse with no active tree', () => {
    const parser = new Parser('t', createTokenSource('x'));
    let caught: unknown;
    try {
      parser.parseBody();
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof ParseError)) throw new Error('expected ParseError');
    expect(caught.errorId).toBe('TMPL-P015');
    expect(caught.message).toBe('template: t:0:no active tree in template body');
  });

  it('rejects a parenthesized pipeline left open at end of input', () => {
    const at = { line: 1, column: 1, offset: 0 };
    const token = (type: Token['type'], value: string): Token => ({
      type,
      value,
      span: { start: at, end: at },
    });
    const source = arraySource([
      token('LEFT_DELIM', '{{'),
      token('LPAREN', '('),
      token('DOT', '.'),
      token('RIGHT_DELIM', '}}'),
      token('EOF', ''),
    ]);
    let caught: unknown;
    try {
      parseTokens('t', source);
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof ParseError)) throw new Error('expected ParseError');
    expect(caught.errorId).toBe('TMPL-P013');
    expect(caught.message).toBe(
      'template: t:1:unclosed right paren: unexpected EOF'
    );
  });

  it('treats an exhausted source as end of input', () => {
    const trees = parseTokens('empty', arraySource([]));
    expect(rootOf(trees, 'empty').nodes).toEqual([]);
  });
});
