/**
 * Variable Rules
 * Flags declarations whose value is never read.
 */

import type { ValidationRule, Diagnostic, ValidationContext } from '../types.js';
import type { ASTNode, VariableNode } from '../../types.js';
import { collectVariableReads, extractContextLine } from './helpers.js';

function unusedDiagnostic(
  variable: VariableNode,
  context: ValidationContext
): Diagnostic {
  const name = variable.ident.join('.');
  return {
    location: variable.pos,
    severity: 'warning',
    code: 'UNUSED_VARIABLE',
    message: `Variable ${name} is declared but never used`,
    context: extractContextLine(variable.pos.line, context.source),
    tree: context.tree?.name ?? '',
  };
}

// ============================================================
// UNUSED_VARIABLE RULE
// ============================================================

/**
 * Warns on variables that are declared and never read.
 *
 * Scope follows the parser's:
 * - {{if/range/with $x := p}}: $x is visible until the matching {{end}},
 *   so reads in the body, the else branch or later pipeline commands count
 * - {{$x := p}}: visible in the rest of the enclosing list
 *
 * Example: {{range $i, $e := .Items}}{{$e}}{{end}} reports $i.
 */
export const UNUSED_VARIABLE: ValidationRule = {
  code: 'UNUSED_VARIABLE',
  category: 'variables',
  severity: 'warning',
  nodeTypes: ['If', 'Range', 'With', 'List'],

  validate(node: ASTNode, context: ValidationContext): Diagnostic[] {
    switch (node.type) {
      case 'If':
      case 'Range':
      case 'With': {
        if (node.pipe.decl.length === 0) return [];
        const reads = collectVariableReads([
          ...node.pipe.cmds,
          node.list,
          node.elseList,
        ]);
        return node.pipe.decl
          .filter((variable) => !isRead(variable, reads))
          .map((variable) => unusedDiagnostic(variable, context));
      }

      case 'List': {
        const diagnostics: Diagnostic[] = [];
        node.nodes.forEach((item, index) => {
          if (item.type !== 'Action' || item.pipe.decl.length === 0) return;
          const reads = collectVariableReads([
            ...item.pipe.cmds,
            ...node.nodes.slice(index + 1),
          ]);
          for (const variable of item.pipe.decl) {
            if (!isRead(variable, reads)) {
              diagnostics.push(unusedDiagnostic(variable, context));
            }
          }
        });
        return diagnostics;
      }

      default:
        return [];
    }
  },
};

function isRead(variable: VariableNode, reads: Set<string>): boolean {
  const [name] = variable.ident;
  return name !== undefined && reads.has(name);
}
