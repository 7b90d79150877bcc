/**
 * Template Parser
 * Main entry points and re-exports
 */

import { createTokenSource } from '../lexer/index.js';
import type { ParseOptions, TokenSource, TreeSet } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-template.js';
import './parser-control.js';
import './parser-pipeline.js';
import './parser-operands.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse template text into named trees.
 *
 * Throws ParseError on the first error; there is no recovery.
 *
 * @param name - Name of the top-level tree
 * @param text - Template source
 * @param funcs - Function names that may appear as identifiers
 *
 * @example
 * ```typescript
 * const trees = parse('page', '{{define "row"}}{{.}}{{end}}{{template "row" .}}');
 * trees.get('row')?.root;
 * ```
 */
export function parse(
  name: string,
  text: string,
  funcs: Iterable<string> = [],
  options: ParseOptions = {}
): TreeSet {
  const source = createTokenSource(text, {
    leftDelim: options.leftDelim,
    rightDelim: options.rightDelim,
  });
  return parseTokens(name, source, funcs, options);
}

/**
 * Parse any token source into named trees.
 * Delimiter options are ignored; the source has already applied them.
 */
export function parseTokens(
  name: string,
  source: TokenSource,
  funcs: Iterable<string> = [],
  options: ParseOptions = {}
): TreeSet {
  return new Parser(name, source, funcs, options).parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser } from './parser.js';
export { createParserState, MAX_LOOKAHEAD, type ParserState } from './state.js';
export { isEmptyTree } from './tree.js';
