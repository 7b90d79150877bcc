/**
 * Parser Extension: Template Structure
 * Top-level body, define clauses, item lists and actions
 */

import { Parser } from './parser.js';
import { unquote } from '../literals.js';
import { nodeToString } from '../render.js';
import type {
  ActionNode,
  ElseNode,
  EndNode,
  ItemNode,
  ListNode,
  SourceLocation,
  TextNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  backup,
  backup2,
  expect,
  fail,
  nextMust,
  nextNonSpaceMust,
  peek,
  peekNonSpace,
  unexpected,
} from './state.js';
import { activeTree, nextTreeId, startParse, stopParse } from './tree.js';

/** What a single {{...}} or text run produces */
export type ActionResult = ItemNode | EndNode | ElseNode;

/** Body of a construct and the terminator that closed it */
export interface ItemList {
  readonly list: ListNode;
  readonly end: EndNode | ElseNode;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseTree(): void;
    parseBody(): void;
    parseDefinition(): void;
    itemList(context: string): ItemList;
    textOrAction(): ActionResult;
    action(): ActionResult;
  }
}

function newList(treeId: number, pos: SourceLocation): ListNode {
  return { type: 'List', treeId, pos, nodes: [] };
}

// ============================================================
// TOP LEVEL
// ============================================================

/**
 * Parse the top-level tree under the parser's name.
 */
Parser.prototype.parseTree = function (this: Parser): void {
  startParse(this.state, this.state.name, nextTreeId(this.state));
  this.parseBody();
  stopParse(this.state);
};

/**
 * Parse the active tree's body until end of input.
 * {{define}} clauses become separate trees and add nothing here.
 */
Parser.prototype.parseBody = function (this: Parser): void {
  const tree = activeTree(this.state, 'template body');
  peek(this.state);
  const root = newList(tree.id, this.state.location);
  tree.root = root;

  for (;;) {
    const token = peek(this.state);
    if (!token || token.type === TOKEN_TYPES.EOF) break;

    if (token.type === TOKEN_TYPES.LEFT_DELIM) {
      const delim = nextMust(this.state, 'input');
      const keyword = nextNonSpaceMust(this.state, 'input');
      if (keyword.type === TOKEN_TYPES.DEFINE) {
        this.parseDefinition();
        continue;
      }
      backup2(this.state, delim, keyword);
    }

    const node = this.textOrAction();
    if (node.type === 'End' || node.type === 'Else') {
      throw fail(this.state, 'TMPL-P018', { node: nodeToString(node) });
    }
    root.nodes.push(node);
  }
};

/**
 * Parse {{define "name"}} ... {{end}} after the define keyword.
 */
Parser.prototype.parseDefinition = function (this: Parser): void {
  const context = 'define clause';
  const nameToken = nextNonSpaceMust(this.state, context);
  if (
    nameToken.type !== TOKEN_TYPES.STRING &&
    nameToken.type !== TOKEN_TYPES.RAW_STRING
  ) {
    throw unexpected(this.state, nameToken, context);
  }
  const name = unquote(nameToken.value);
  if (name === null) {
    throw fail(this.state, 'TMPL-P006', { text: nameToken.value });
  }
  expect(this.state, TOKEN_TYPES.RIGHT_DELIM, context);

  startParse(this.state, name, nextTreeId(this.state));
  const tree = activeTree(this.state, context);
  const { list, end } = this.itemList(context);
  tree.root = list;
  if (end.type !== 'End') {
    throw fail(this.state, 'TMPL-P002', { token: nodeToString(end), context });
  }
  stopParse(this.state);
};

// ============================================================
// ITEM LISTS
// ============================================================

/**
 * Collect text and actions until {{end}} or {{else}}.
 */
Parser.prototype.itemList = function (this: Parser, context: string): ItemList {
  const tree = activeTree(this.state, context);
  peekNonSpace(this.state);
  const list = newList(tree.id, this.state.location);

  for (;;) {
    const token = peekNonSpace(this.state);
    if (!token || token.type === TOKEN_TYPES.EOF) {
      throw fail(this.state, 'TMPL-P001', { context });
    }
    const node = this.textOrAction();
    if (node.type === 'End' || node.type === 'Else') {
      return { list, end: node };
    }
    list.nodes.push(node);
  }
};

Parser.prototype.textOrAction = function (this: Parser): ActionResult {
  const token = nextNonSpaceMust(this.state, 'input');
  switch (token.type) {
    case TOKEN_TYPES.TEXT: {
      const text: TextNode = {
        type: 'Text',
        treeId: activeTree(this.state, 'text').id,
        pos: token.span.start,
        text: token.value,
      };
      return text;
    }
    case TOKEN_TYPES.LEFT_DELIM:
      return this.action();
    default:
      throw unexpected(this.state, token, 'input');
  }
};

// ============================================================
// ACTIONS
// ============================================================

/**
 * Parse the inside of {{ }} after the left delimiter.
 * Keywords dispatch to their control parsers; anything else is a pipeline.
 */
Parser.prototype.action = function (this: Parser): ActionResult {
  const token = nextNonSpaceMust(this.state, 'action');
  switch (token.type) {
    case TOKEN_TYPES.BLOCK:
      return this.blockControl();
    case TOKEN_TYPES.ELSE:
      return this.elseControl();
    case TOKEN_TYPES.END:
      return this.endControl();
    case TOKEN_TYPES.IF:
      return this.ifControl();
    case TOKEN_TYPES.RANGE:
      return this.rangeControl();
    case TOKEN_TYPES.TEMPLATE:
      return this.templateControl();
    case TOKEN_TYPES.WITH:
      return this.withControl();
  }

  backup(this.state, token);
  // Variables declared here persist until the enclosing {{end}}
  const node: ActionNode = {
    type: 'Action',
    treeId: activeTree(this.state, 'command').id,
    pos: token.span.start,
    pipe: this.pipeline('command'),
  };
  return node;
};
