/**
 * AST Visitor
 * Recursive pre-order traversal for validation rules.
 */

import type { ASTNode } from '../types.js';
import type { ValidationContext } from './types.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/** Visitor pattern interface for AST traversal. */
export interface NodeVisitor<C> {
  /** Called before visiting node's children. */
  enter(node: ASTNode, context: C): void;
}

/** Visitor used by the validator */
export type RuleVisitor = NodeVisitor<ValidationContext>;

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Recursively visit nodes, parents before children.
 *
 * Children are visited in source order: a pipeline's declarations before
 * its commands, a branch's pipeline before its list and else list.
 */
export function visitNode<C>(
  node: ASTNode,
  context: C,
  visitor: NodeVisitor<C>
): void {
  visitor.enter(node, context);

  switch (node.type) {
    case 'List':
      for (const item of node.nodes) {
        visitNode(item, context, visitor);
      }
      break;

    case 'Action':
      visitNode(node.pipe, context, visitor);
      break;

    case 'If':
    case 'Range':
    case 'With':
      visitNode(node.pipe, context, visitor);
      visitNode(node.list, context, visitor);
      if (node.elseList) {
        visitNode(node.elseList, context, visitor);
      }
      break;

    case 'Template':
      if (typeof node.name !== 'string') {
        visitNode(node.name, context, visitor);
      }
      if (node.pipe) {
        visitNode(node.pipe, context, visitor);
      }
      break;

    case 'Pipe':
      for (const variable of node.decl) {
        visitNode(variable, context, visitor);
      }
      for (const cmd of node.cmds) {
        visitNode(cmd, context, visitor);
      }
      break;

    case 'Command':
      for (const arg of node.args) {
        visitNode(arg, context, visitor);
      }
      break;

    case 'Chain':
      visitNode(node.node, context, visitor);
      break;

    // Leaves
    case 'Text':
    case 'End':
    case 'Else':
    case 'Field':
    case 'Variable':
    case 'Identifier':
    case 'Bool':
    case 'Number':
    case 'Nil':
    case 'Dot':
    case 'String':
      break;
  }
}
