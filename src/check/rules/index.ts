/**
 * Validation Rules Registry
 * Barrel export for all validation rules.
 */

import type { ValidationRule } from '../types.js';
import { UNDEFINED_TEMPLATE } from './templates.js';
import { UNUSED_VARIABLE } from './variables.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export { UNDEFINED_TEMPLATE } from './templates.js';
export { UNUSED_VARIABLE } from './variables.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/**
 * All registered validation rules.
 * Rules are applied during tree traversal via the validator.
 */
export const VALIDATION_RULES: ValidationRule[] = [
  // Template invocations
  UNDEFINED_TEMPLATE,

  // Variable declarations
  UNUSED_VARIABLE,
];
