/**
 * Template Rules
 * Checks on {{template}} and {{block}} invocations.
 */

import type { ValidationRule, Diagnostic, ValidationContext } from '../types.js';
import type { ASTNode } from '../../types.js';
import { extractContextLine } from './helpers.js';

// ============================================================
// UNDEFINED_TEMPLATE RULE
// ============================================================

/**
 * Reports invocations of a template name that no tree defines.
 *
 * - {{template "missing" .}} with no {{define "missing"}} is an error
 * - dynamic names ({{template (.Name) .}}) are resolved at execution time and skipped
 */
export const UNDEFINED_TEMPLATE: ValidationRule = {
  code: 'UNDEFINED_TEMPLATE',
  category: 'templates',
  severity: 'error',
  nodeTypes: ['Template'],

  validate(node: ASTNode, context: ValidationContext): Diagnostic[] {
    if (node.type !== 'Template' || typeof node.name !== 'string') {
      return [];
    }
    if (context.trees.has(node.name)) {
      return [];
    }

    return [
      {
        location: node.pos,
        severity: 'error',
        code: 'UNDEFINED_TEMPLATE',
        message: `Template "${node.name}" is not defined`,
        context: extractContextLine(node.pos.line, context.source),
        tree: context.tree?.name ?? '',
      },
    ];
  },
};
