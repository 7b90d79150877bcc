/**
 * Parser State
 * Token lookahead buffer and parse-time bookkeeping
 * @internal
 */

import { describeToken } from '../lexer/index.js';
import type {
  ParseOptions,
  SourceLocation,
  Token,
  TokenSource,
  TokenType,
  Tree,
  TreeObserver,
  TreeSet,
} from '../types.js';
import {
  ERROR_REGISTRY,
  ParseError,
  renderMessage,
  TOKEN_TYPES,
} from '../types.js';

/** Tokens the grammar may push back at once */
export const MAX_LOOKAHEAD = 3;

export interface ParserState {
  /** Name of the top-level tree */
  readonly name: string;
  readonly source: TokenSource;
  /** Pushed-back tokens, next first */
  readonly pending: Token[];
  /** Line of the last token pulled (0 before the first) */
  line: number;
  /** Start of the last token pulled */
  location: SourceLocation;
  readonly funcs: ReadonlySet<string>;
  readonly dynamicTemplates: boolean;
  readonly observer: TreeObserver | undefined;
  /** Completed trees by name */
  readonly treeSet: TreeSet;
  /** Suspended parent trees, innermost last */
  readonly treeStack: Tree[];
  /** Tree currently receiving nodes */
  tree: Tree | null;
  /** Highest tree id handed out so far */
  maxTreeId: number;
}

export function createParserState(
  name: string,
  source: TokenSource,
  funcs: Iterable<string>,
  options: ParseOptions = {}
): ParserState {
  return {
    name,
    source,
    pending: [],
    line: 0,
    location: { line: 0, column: 0, offset: 0 },
    funcs: new Set(funcs),
    dynamicTemplates: options.dynamicTemplates ?? false,
    observer: options.observer,
    treeSet: new Map(),
    treeStack: [],
    tree: null,
    maxTreeId: 0,
  };
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Build a ParseError for the innermost active tree at the current line.
 * @internal
 */
export function fail(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown> = {}
): ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return new ParseError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    state.tree?.name ?? state.name,
    state.line,
    state.location,
    context
  );
}

/** @internal */
export function unexpected(
  state: ParserState,
  token: Token,
  context: string
): ParseError {
  return fail(state, 'TMPL-P002', { token: describeToken(token), context });
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Pull the next token: pushed-back tokens first, then the source.
 * ERROR tokens are raised immediately.
 * @internal
 */
export function next(state: ParserState): Token | null {
  const token = state.pending.shift() ?? state.source.next();
  if (!token) return null;

  state.line = token.span.start.line;
  state.location = token.span.start;

  if (token.type === TOKEN_TYPES.ERROR) {
    throw fail(state, 'TMPL-P016', { detail: token.value });
  }
  return token;
}

function pushBack(state: ParserState, tokens: Token[]): void {
  if (state.pending.length + tokens.length > MAX_LOOKAHEAD) {
    throw fail(state, 'TMPL-P020', { max: MAX_LOOKAHEAD });
  }
  state.pending.unshift(...tokens);
}

/** Push one token back. @internal */
export function backup(state: ParserState, t0: Token): void {
  pushBack(state, [t0]);
}

/** Push two tokens back; t0 is returned first. @internal */
export function backup2(state: ParserState, t0: Token, t1: Token): void {
  pushBack(state, [t0, t1]);
}

/** Push three tokens back; t0 is returned first. @internal */
export function backup3(
  state: ParserState,
  t0: Token,
  t1: Token,
  t2: Token
): void {
  pushBack(state, [t0, t1, t2]);
}

/** @internal */
export function peek(state: ParserState): Token | null {
  const token = next(state);
  if (token) backup(state, token);
  return token;
}

/** Next token, discarding SPACE tokens. @internal */
export function nextNonSpace(state: ParserState): Token | null {
  let token = next(state);
  while (token && token.type === TOKEN_TYPES.SPACE) {
    token = next(state);
  }
  return token;
}

/** @internal */
export function peekNonSpace(state: ParserState): Token | null {
  const token = nextNonSpace(state);
  if (token) backup(state, token);
  return token;
}

/** @internal */
export function nextMust(state: ParserState, context: string): Token {
  const token = next(state);
  if (!token) throw fail(state, 'TMPL-P001', { context });
  return token;
}

/** @internal */
export function nextNonSpaceMust(state: ParserState, context: string): Token {
  const token = nextNonSpace(state);
  if (!token) throw fail(state, 'TMPL-P001', { context });
  return token;
}

/** @internal */
export function peekNonSpaceMust(state: ParserState, context: string): Token {
  const token = peekNonSpace(state);
  if (!token) throw fail(state, 'TMPL-P001', { context });
  return token;
}

/**
 * Consume the next non-space token, which must have the given type.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  context: string
): Token {
  const token = nextNonSpaceMust(state, context);
  if (token.type !== type) {
    throw unexpected(state, token, context);
  }
  return token;
}
