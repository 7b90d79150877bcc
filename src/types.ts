/**
 * Template Types
 * Shared hub for locations, tokens, nodes, trees and errors
 */

import type { ListNode } from './ast-nodes.js';

export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  TOKEN_TYPES,
  type Token,
  type TokenSource,
  type TokenType,
} from './token-types.js';
export type * from './ast-nodes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  createError,
  ParseError,
  TemplateError,
  type TemplateErrorData,
} from './error-classes.js';

// ============================================================
// TREES
// ============================================================

/**
 * One named template: the top-level text, a {{define}} or a {{block}}.
 */
export interface Tree {
  readonly name: string;
  /** Unique per parse; the top-level tree is 1 */
  readonly id: number;
  /** Body; null until the tree has been parsed */
  root: ListNode | null;
  /** Variables in scope, innermost last. `$` is always first. */
  readonly vars: string[];
  /** Field paths referenced in this tree (".a", ".a.b") */
  readonly fields: Set<string>;
}

/** All trees produced by one parse, keyed by name */
export type TreeSet = Map<string, Tree>;

// ============================================================
// PARSE OPTIONS
// ============================================================

/** Lifecycle callbacks fired while trees are parsed */
export interface TreeObserver {
  /** A tree became active (top level, define or block) */
  onTreeStart?: ((name: string, id: number) => void) | undefined;
  /** A tree finished and was registered */
  onTreeComplete?: ((tree: Tree) => void) | undefined;
}

/**
 * Options for the parser.
 */
export interface ParseOptions {
  /**
   * Accept {{template (pipeline)}} with a computed name.
   * Default: false (fails with a parse error).
   */
  readonly dynamicTemplates?: boolean | undefined;
  /** Left action delimiter. Default: "{{" */
  readonly leftDelim?: string | undefined;
  /** Right action delimiter. Default: "}}" */
  readonly rightDelim?: string | undefined;
  readonly observer?: TreeObserver | undefined;
}
