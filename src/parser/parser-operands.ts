/**
 * Parser Extension: Operands and Terms
 * Literals, names, parenthesized pipelines and .field chains
 */

import { Parser } from './parser.js';
import { describeToken } from '../lexer/index.js';
import { parseNumber, unquote } from '../literals.js';
import { nodeToString } from '../render.js';
import type { OperandNode, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  backup,
  fail,
  nextMust,
  nextNonSpaceMust,
  peek,
  unexpected,
} from './state.js';
import { activeTree, hasVar } from './tree.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    operand(): OperandNode | null;
    term(): OperandNode | null;
    parseTemplateName(token: Token, context: string): string;
  }
}

/** Terms that cannot be followed by .field */
const UNCHAINABLE = new Set<string>(['Bool', 'String', 'Number', 'Nil', 'Dot']);

// ============================================================
// OPERANDS
// ============================================================

/**
 * Parse a term followed by an optional .field chain.
 * Chains on fields and variables extend them; chains on anything else wrap it.
 */
Parser.prototype.operand = function (this: Parser): OperandNode | null {
  const node = this.term();
  if (!node) return null;

  const first = nextMust(this.state, 'operand');
  if (first.type !== TOKEN_TYPES.FIELD) {
    backup(this.state, first);
    return node;
  }

  if (UNCHAINABLE.has(node.type)) {
    throw fail(this.state, 'TMPL-P017', { term: nodeToString(node) });
  }

  const field = [first.value.slice(1)];
  while (peek(this.state)?.type === TOKEN_TYPES.FIELD) {
    field.push(nextMust(this.state, 'operand').value.slice(1));
  }

  const tree = activeTree(this.state, 'operand');
  switch (node.type) {
    case 'Field': {
      const ident = [...node.ident, ...field];
      tree.fields.add(`.${ident.join('.')}`);
      return { type: 'Field', treeId: tree.id, pos: first.span.start, ident };
    }
    case 'Variable':
      return {
        type: 'Variable',
        treeId: tree.id,
        pos: first.span.start,
        ident: [...node.ident, ...field],
      };
    default:
      return { type: 'Chain', treeId: tree.id, pos: first.span.start, node, field };
  }
};

// ============================================================
// TERMS
// ============================================================

/**
 * Parse a single term. Returns null (token pushed back) when the next token starts none.
 */
Parser.prototype.term = function (this: Parser): OperandNode | null {
  const token = nextNonSpaceMust(this.state, 'operand');
  const tree = activeTree(this.state, 'operand');
  const base = { treeId: tree.id, pos: token.span.start };

  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      if (!this.state.funcs.has(token.value)) {
        throw fail(this.state, 'TMPL-P003', { name: token.value });
      }
      return { type: 'Identifier', ...base, ident: token.value };

    case TOKEN_TYPES.DOT:
      return { type: 'Dot', ...base };

    case TOKEN_TYPES.NIL:
      return { type: 'Nil', ...base };

    case TOKEN_TYPES.VARIABLE:
      if (!hasVar(this.state, token.value)) {
        throw fail(this.state, 'TMPL-P004', { name: token.value });
      }
      return { type: 'Variable', ...base, ident: [token.value] };

    case TOKEN_TYPES.FIELD:
      tree.fields.add(token.value);
      return { type: 'Field', ...base, ident: [token.value.slice(1)] };

    case TOKEN_TYPES.BOOL:
      return { type: 'Bool', ...base, value: token.value === 'true' };

    case TOKEN_TYPES.CHAR_CONSTANT:
    case TOKEN_TYPES.NUMBER: {
      const isChar = token.type === TOKEN_TYPES.CHAR_CONSTANT;
      const result = parseNumber(token.value, isChar);
      if (!result.ok) {
        throw fail(this.state, 'TMPL-P007', {
          reason: result.reason,
          text: token.value,
        });
      }
      return { type: 'Number', ...base, text: token.value, isChar, ...result.value };
    }

    case TOKEN_TYPES.LPAREN: {
      const context = 'parenthesized pipeline';
      const pipe = this.pipeline(context);
      const close = nextMust(this.state, context);
      if (close.type !== TOKEN_TYPES.RPAREN) {
        throw fail(this.state, 'TMPL-P013', { token: describeToken(close) });
      }
      return pipe;
    }

    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.RAW_STRING: {
      const text = unquote(token.value);
      if (text === null) {
        throw fail(this.state, 'TMPL-P006', { text: token.value });
      }
      return { type: 'String', ...base, quoted: token.value, text };
    }

    default:
      backup(this.state, token);
      return null;
  }
};

/**
 * Decode a quoted template name in {{template}} or {{block}}.
 */
Parser.prototype.parseTemplateName = function (
  this: Parser,
  token: Token,
  context: string
): string {
  if (
    token.type !== TOKEN_TYPES.STRING &&
    token.type !== TOKEN_TYPES.RAW_STRING
  ) {
    throw unexpected(this.state, token, context);
  }
  const name = unquote(token.value);
  if (name === null) {
    throw fail(this.state, 'TMPL-P006', { text: token.value });
  }
  return name;
};
