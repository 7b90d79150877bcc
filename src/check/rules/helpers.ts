/**
 * Shared Helper Functions
 * Common utilities used across validation rules.
 */

import type { ASTNode, VariableNode } from '../../types.js';
import { visitNode, type NodeVisitor } from '../visitor.js';

/**
 * Extract source line at location for context display.
 * Splits source by newlines, retrieves the specified line (1-indexed), and trims it.
 */
export function extractContextLine(line: number, source: string): string {
  const lines = source.split('\n');
  const sourceLine = lines[line - 1];
  return sourceLine ? sourceLine.trim() : '';
}

/**
 * Collect the variable names read anywhere under the given nodes.
 * Declarations (`$x :=`) are not reads; `$x.a` reads `$x`.
 */
export function collectVariableReads(
  nodes: readonly (ASTNode | null)[]
): Set<string> {
  const declared = new Set<VariableNode>();
  const reads = new Set<string>();

  const visitor: NodeVisitor<Set<string>> = {
    enter(node, names) {
      if (node.type === 'Pipe') {
        for (const variable of node.decl) declared.add(variable);
      } else if (node.type === 'Variable' && !declared.has(node)) {
        const [name] = node.ident;
        if (name !== undefined) names.add(name);
      }
    },
  };

  for (const node of nodes) {
    if (node) visitNode(node, reads, visitor);
  }
  return reads;
}
