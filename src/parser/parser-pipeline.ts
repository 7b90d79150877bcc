/**
 * Parser Extension: Pipelines
 * Variable declarations, |-separated commands and pipeline checks
 */

import { Parser } from './parser.js';
import type { CommandNode, PipeNode, VariableNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  backup,
  backup2,
  backup3,
  fail,
  nextMust,
  nextNonSpaceMust,
  peekNonSpace,
  peekNonSpaceMust,
  unexpected,
} from './state.js';
import { activeTree, addVar } from './tree.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    pipeline(context: string): PipeNode;
    parseDeclarations(context: string): VariableNode[];
    checkPipeline(pipe: PipeNode, context: string): void;
    command(): CommandNode;
  }
}

/** Tokens that may start a command */
const COMMAND_START = new Set<string>([
  TOKEN_TYPES.BOOL,
  TOKEN_TYPES.CHAR_CONSTANT,
  TOKEN_TYPES.DOT,
  TOKEN_TYPES.FIELD,
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.NIL,
  TOKEN_TYPES.RAW_STRING,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.VARIABLE,
  TOKEN_TYPES.LPAREN,
]);

/** Node types that cannot receive a piped value */
const NON_EXECUTABLE = new Set<string>(['Bool', 'Dot', 'Nil', 'Number', 'String']);

// ============================================================
// PIPELINES
// ============================================================

/**
 * Parse `[decl :=] command { | command }` up to `}}` (consumed) or `)` (left in the stream).
 */
Parser.prototype.pipeline = function (this: Parser, context: string): PipeNode {
  const treeId = activeTree(this.state, context).id;
  const pos = peekNonSpaceMust(this.state, context).span.start;
  const decl = this.parseDeclarations(context);
  const pipe: PipeNode = { type: 'Pipe', treeId, pos, decl, cmds: [] };

  for (;;) {
    const token = nextNonSpaceMust(this.state, context);
    if (
      token.type === TOKEN_TYPES.RIGHT_DELIM ||
      token.type === TOKEN_TYPES.RPAREN
    ) {
      this.checkPipeline(pipe, context);
      if (token.type === TOKEN_TYPES.RPAREN) {
        backup(this.state, token);
      }
      return pipe;
    }
    if (!COMMAND_START.has(token.type)) {
      throw unexpected(this.state, token, context);
    }
    backup(this.state, token);
    pipe.cmds.push(this.command());
  }
};

/**
 * Parse an optional declaration: `$x :=`, or `$i, $e :=` inside range.
 * Needs up to three tokens of lookahead: variable, space, then `:=` or `,`.
 * Declared variables are in scope immediately.
 */
Parser.prototype.parseDeclarations = function (
  this: Parser,
  context: string
): VariableNode[] {
  const decl: VariableNode[] = [];
  let token = nextNonSpaceMust(this.state, context);
  if (token.type !== TOKEN_TYPES.VARIABLE) {
    backup(this.state, token);
    return decl;
  }

  for (;;) {
    const afterVariable = nextMust(this.state, 'variable');
    let following = afterVariable;
    if (afterVariable.type === TOKEN_TYPES.SPACE) {
      following = nextNonSpaceMust(this.state, 'variable');
      if (
        following.type !== TOKEN_TYPES.COLON_EQUALS &&
        following.type !== TOKEN_TYPES.COMMA
      ) {
        backup3(this.state, token, afterVariable, following);
        return decl;
      }
    }

    if (
      following.type !== TOKEN_TYPES.COLON_EQUALS &&
      following.type !== TOKEN_TYPES.COMMA
    ) {
      backup2(this.state, token, following);
      return decl;
    }

    decl.push({
      type: 'Variable',
      treeId: activeTree(this.state, context).id,
      pos: token.span.start,
      ident: [token.value],
    });
    addVar(this.state, token.value);

    if (following.type === TOKEN_TYPES.COLON_EQUALS) {
      return decl;
    }

    // Comma: only range may declare a second variable
    if (context !== 'range' || decl.length >= 2) {
      throw fail(this.state, 'TMPL-P008', { context });
    }
    if (peekNonSpace(this.state)?.type !== TOKEN_TYPES.VARIABLE) {
      throw fail(this.state, 'TMPL-P009');
    }
    token = nextNonSpaceMust(this.state, context);
  }
};

/**
 * A pipeline needs a command, and every stage after the first must be executable.
 */
Parser.prototype.checkPipeline = function (
  this: Parser,
  pipe: PipeNode,
  context: string
): void {
  if (pipe.cmds.length === 0) {
    throw fail(this.state, 'TMPL-P011', { context });
  }
  pipe.cmds.forEach((cmd, index) => {
    if (index === 0) return;
    const first = cmd.args[0];
    if (!first || NON_EXECUTABLE.has(first.type)) {
      throw fail(this.state, 'TMPL-P010', { stage: index + 1 });
    }
  });
};

// ============================================================
// COMMANDS
// ============================================================

/**
 * Parse space-separated operands up to `|` (consumed), `}}` or `)` (left in the stream).
 */
Parser.prototype.command = function (this: Parser): CommandNode {
  const cmd: CommandNode = {
    type: 'Command',
    treeId: activeTree(this.state, 'command').id,
    pos: peekNonSpaceMust(this.state, 'command').span.start,
    args: [],
  };

  for (;;) {
    peekNonSpaceMust(this.state, 'operand');
    const operand = this.operand();
    if (operand) {
      cmd.args.push(operand);
    }

    const token = nextMust(this.state, 'command');
    if (token.type === TOKEN_TYPES.SPACE) continue;
    if (
      token.type === TOKEN_TYPES.RIGHT_DELIM ||
      token.type === TOKEN_TYPES.RPAREN
    ) {
      backup(this.state, token);
    } else if (token.type !== TOKEN_TYPES.PIPE) {
      throw unexpected(this.state, token, 'operand');
    }
    break;
  }

  if (cmd.args.length === 0) {
    throw fail(this.state, 'TMPL-P012');
  }
  return cmd;
};
