/**
 * Parser Extension: Control Parsing
 * if, range, with, else, end, block and template
 */

import { Parser } from './parser.js';
import { describeToken } from '../lexer/index.js';
import { nodeToString } from '../render.js';
import type {
  ElseNode,
  EndNode,
  IfNode,
  ListNode,
  PipeNode,
  RangeNode,
  TemplateNode,
  WithNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  backup,
  expect,
  fail,
  nextMust,
  nextNonSpaceMust,
  peekNonSpace,
} from './state.js';
import {
  activeTree,
  nextTreeId,
  popVars,
  startParse,
  stopParse,
} from './tree.js';

/** Parts shared by if, range and with */
export interface ControlParts {
  readonly pipe: PipeNode;
  readonly list: ListNode;
  readonly elseList: ListNode | null;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseControl(allowElseIf: boolean, context: string): ControlParts;
    ifControl(): IfNode;
    rangeControl(): RangeNode;
    withControl(): WithNode;
    endControl(): EndNode;
    elseControl(): ElseNode;
    blockControl(): TemplateNode;
    templateControl(): TemplateNode;
  }
}

// ============================================================
// IF / RANGE / WITH
// ============================================================

/**
 * Parse `pipeline}} list [{{else}} list] {{end}}` after the keyword.
 * Variables declared in the pipeline go out of scope at {{end}}.
 */
Parser.prototype.parseControl = function (
  this: Parser,
  allowElseIf: boolean,
  context: string
): ControlParts {
  const tree = activeTree(this.state, context);
  const varsLength = tree.vars.length;

  const pipe = this.pipeline(context);
  const { list, end } = this.itemList(context);

  let elseList: ListNode | null = null;
  if (end.type === 'Else') {
    const following = peekNonSpace(this.state);
    if (allowElseIf && following?.type === TOKEN_TYPES.IF) {
      // {{else if ...}}: the nested if consumes the single {{end}}
      nextNonSpaceMust(this.state, context);
      elseList = {
        type: 'List',
        treeId: tree.id,
        pos: end.pos,
        nodes: [this.ifControl()],
      };
    } else {
      const elseBody = this.itemList(context);
      if (elseBody.end.type !== 'End') {
        throw fail(this.state, 'TMPL-P019', {
          node: nodeToString(elseBody.end),
        });
      }
      elseList = elseBody.list;
    }
  }

  popVars(this.state, varsLength);
  return { pipe, list, elseList };
};

Parser.prototype.ifControl = function (this: Parser): IfNode {
  const { pipe, list, elseList } = this.parseControl(true, 'if');
  return {
    type: 'If',
    treeId: activeTree(this.state, 'if').id,
    pos: pipe.pos,
    pipe,
    list,
    elseList,
  };
};

Parser.prototype.rangeControl = function (this: Parser): RangeNode {
  const { pipe, list, elseList } = this.parseControl(false, 'range');
  return {
    type: 'Range',
    treeId: activeTree(this.state, 'range').id,
    pos: pipe.pos,
    pipe,
    list,
    elseList,
  };
};

Parser.prototype.withControl = function (this: Parser): WithNode {
  const { pipe, list, elseList } = this.parseControl(false, 'with');
  return {
    type: 'With',
    treeId: activeTree(this.state, 'with').id,
    pos: pipe.pos,
    pipe,
    list,
    elseList,
  };
};

// ============================================================
// END / ELSE
// ============================================================

Parser.prototype.endControl = function (this: Parser): EndNode {
  const token = expect(this.state, TOKEN_TYPES.RIGHT_DELIM, 'end');
  return {
    type: 'End',
    treeId: activeTree(this.state, 'end').id,
    pos: token.span.start,
  };
};

/**
 * {{else}} or the start of {{else if ...}}; in the latter case `if` stays in the stream.
 */
Parser.prototype.elseControl = function (this: Parser): ElseNode {
  const treeId = activeTree(this.state, 'else').id;
  const following = peekNonSpace(this.state);
  if (following?.type === TOKEN_TYPES.IF) {
    return { type: 'Else', treeId, pos: following.span.start };
  }
  const token = expect(this.state, TOKEN_TYPES.RIGHT_DELIM, 'else');
  return { type: 'Else', treeId, pos: token.span.start };
};

// ============================================================
// BLOCK / TEMPLATE
// ============================================================

/**
 * {{block "name" pipeline}} list {{end}}
 * Defines the named tree and invokes it in place.
 */
Parser.prototype.blockControl = function (this: Parser): TemplateNode {
  const context = 'block clause';
  const token = nextNonSpaceMust(this.state, context);
  const name = this.parseTemplateName(token, context);
  const pipe = this.pipeline(context);

  startParse(this.state, name, nextTreeId(this.state));
  const block = activeTree(this.state, context);
  const { list, end } = this.itemList(context);
  block.root = list;
  if (end.type !== 'End') {
    throw fail(this.state, 'TMPL-P002', { token: nodeToString(end), context });
  }
  stopParse(this.state);

  return {
    type: 'Template',
    treeId: activeTree(this.state, context).id,
    pos: token.span.start,
    name,
    pipe,
  };
};

/**
 * {{template "name" [pipeline]}}, or {{template (pipeline) [pipeline]}}
 * when dynamic template names are enabled.
 */
Parser.prototype.templateControl = function (this: Parser): TemplateNode {
  const context = 'template clause';
  const token = nextNonSpaceMust(this.state, context);

  let name: string | PipeNode;
  if (token.type === TOKEN_TYPES.LPAREN) {
    if (!this.state.dynamicTemplates) {
      throw fail(this.state, 'TMPL-P014');
    }
    name = this.pipeline(context);
    const close = nextMust(this.state, context);
    if (close.type !== TOKEN_TYPES.RPAREN) {
      throw fail(this.state, 'TMPL-P013', { token: describeToken(close) });
    }
  } else {
    name = this.parseTemplateName(token, context);
  }

  let pipe: PipeNode | null = null;
  const following = nextNonSpaceMust(this.state, context);
  if (following.type !== TOKEN_TYPES.RIGHT_DELIM) {
    backup(this.state, following);
    // Variables declared here persist until the enclosing {{end}}
    pipe = this.pipeline(context);
  }

  return {
    type: 'Template',
    treeId: activeTree(this.state, context).id,
    pos: token.span.start,
    name,
    pipe,
  };
};
