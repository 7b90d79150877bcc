/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ParseOptions, TokenSource, TreeSet } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that converts a token stream into named template trees.
 *
 * Methods are organized across multiple files:
 * - parser-template.ts: Top level, define, item lists, actions
 * - parser-control.ts: if, range, with, else, end, block, template
 * - parser-pipeline.ts: Declarations, pipelines, commands
 * - parser-operands.ts: Operands, field chains, terms
 *
 * A Parser instance parses one token stream once.
 *
 * @example
 * ```typescript
 * const parser = new Parser('page', createTokenSource(text), ['printf']);
 * const trees = parser.parse();
 * ```
 */
export class Parser {
  /** Lookahead buffer, tree stack and registry */
  state: ParserState;

  constructor(
    name: string,
    source: TokenSource,
    funcs: Iterable<string> = [],
    options: ParseOptions = {}
  ) {
    this.state = createParserState(name, source, funcs, options);
  }

  /**
   * Parse the token stream into the registry of named trees.
   */
  parse(): TreeSet {
    this.parseTree();
    return this.state.treeSet;
  }
}
