/**
 * Check Module - Static Analysis for templates
 * Public API for the tmpl-check tool.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  ValidationRule,
  RuleCategory,
  Severity,
  RuleState,
  Diagnostic,
  CheckConfig,
  ValidationContext,
} from './types.js';

// ============================================================
// RULE REGISTRY
// ============================================================
export { VALIDATION_RULES } from './rules/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  createDefaultConfig,
} from './config.js';

// ============================================================
// VALIDATION
// ============================================================
export { validateTemplates } from './validator.js';
export { visitNode, type NodeVisitor, type RuleVisitor } from './visitor.js';
