/**
 * Check Types
 * Type definitions for the tmpl-check static analysis tool.
 */

import type {
  NodeType,
  ASTNode,
  SourceLocation,
  Tree,
  TreeSet,
} from '../types.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/**
 * A single diagnostic issue found during validation.
 */
export interface Diagnostic {
  /** Location of the issue in source */
  readonly location: SourceLocation;
  readonly severity: Severity;
  /** Rule code (e.g., UNDEFINED_TEMPLATE) */
  readonly code: string;
  readonly message: string;
  /** Source line containing the issue, trimmed */
  readonly context: string;
  /** Name of the tree the node belongs to */
  readonly tree: string;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/**
 * Rule states plus the parse settings read from .tmplcheck.yaml.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Record<string, RuleState>;
  /** Severity overrides by rule code */
  readonly severity: Record<string, Severity>;
  /** Function names accepted as identifiers */
  readonly funcs?: readonly string[] | undefined;
  readonly dynamicTemplates?: boolean | undefined;
  readonly leftDelim?: string | undefined;
  readonly rightDelim?: string | undefined;
}

// ============================================================
// VALIDATION CONTEXT
// ============================================================

/**
 * Context for a validation pass.
 * `tree` is the tree currently being walked.
 */
export interface ValidationContext {
  /** Original template source */
  readonly source: string;
  /** Every tree produced by the parse */
  readonly trees: TreeSet;
  readonly config: CheckConfig;
  /** Accumulated diagnostics */
  readonly diagnostics: Diagnostic[];
  tree: Tree | null;
}

// ============================================================
// VALIDATION RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory = 'templates' | 'variables';

/**
 * Validation rule interface.
 * Rules are stateless and return diagnostics; they never throw.
 */
export interface ValidationRule {
  /** Unique rule code (e.g., UNUSED_VARIABLE) */
  readonly code: string;

  readonly category: RuleCategory;

  /** Default severity level */
  readonly severity: Severity;

  /** Node types this rule applies to */
  readonly nodeTypes: NodeType[];

  /**
   * Validate a node, returning diagnostics for violations.
   * Called for each node matching nodeTypes.
   */
  validate(node: ASTNode, context: ValidationContext): Diagnostic[];
}
