/**
 * Template Validator
 * Orchestrates validation by traversing every tree and invoking enabled rules.
 */

import type { ASTNode, TreeSet } from '../types.js';
import type {
  CheckConfig,
  Diagnostic,
  Severity,
  ValidationContext,
  ValidationRule,
} from './types.js';
import { visitNode, type RuleVisitor } from './visitor.js';
import { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate parsed trees against all enabled rules.
 * Returns diagnostics sorted by line number, then column.
 *
 * @param trees - Result of parse()
 * @param source - Template source for context extraction
 * @param config - Configuration determining which rules are active
 */
export function validateTemplates(
  trees: TreeSet,
  source: string,
  config: CheckConfig
): Diagnostic[] {
  const context: ValidationContext = {
    source,
    trees,
    config,
    diagnostics: [],
    tree: null,
  };

  const visitor: RuleVisitor = {
    enter(node: ASTNode, ctx: ValidationContext): void {
      for (const rule of VALIDATION_RULES) {
        if (!isRuleEnabled(rule.code, ctx.config)) {
          continue;
        }
        if (!rule.nodeTypes.includes(node.type)) {
          continue;
        }

        const severity = effectiveSeverity(rule, ctx.config);
        for (const diagnostic of rule.validate(node, ctx)) {
          ctx.diagnostics.push({ ...diagnostic, severity });
        }
      }
    },
  };

  for (const tree of trees.values()) {
    if (!tree.root) continue;
    context.tree = tree;
    visitNode(tree.root, context, visitor);
  }
  context.tree = null;

  return sortDiagnostics(context.diagnostics);
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Check if a rule is enabled based on configuration.
 * Rules are enabled if state is 'on' or 'warn'.
 */
function isRuleEnabled(ruleCode: string, config: CheckConfig): boolean {
  const state = config.rules[ruleCode];
  return state === 'on' || state === 'warn';
}

/**
 * 'warn' downgrades to warning; otherwise a configured override wins over the rule default.
 */
function effectiveSeverity(
  rule: ValidationRule,
  config: CheckConfig
): Severity {
  if (config.rules[rule.code] === 'warn') {
    return 'warning';
  }
  return config.severity[rule.code] ?? rule.severity;
}

/**
 * Sort diagnostics by line number first, then column number.
 * Stable sort preserves original order for diagnostics at same location.
 */
function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    if (a.location.line !== b.location.line) {
      return a.location.line - b.location.line;
    }
    return a.location.column - b.location.column;
  });
}
