/**
 * Scope Tree Lifecycle
 * Starting, registering and resuming named trees; variable scope
 * @internal
 */

import type { ItemNode, ListNode, Tree } from '../types.js';
import { fail, type ParserState } from './state.js';

function createTree(name: string, id: number): Tree {
  return { name, id, root: null, vars: ['$'], fields: new Set() };
}

/**
 * True when a body holds nothing but whitespace text.
 * A registered tree of this kind is replaced by a later definition.
 */
export function isEmptyTree(node: ListNode | ItemNode | null): boolean {
  if (node === null) return true;
  switch (node.type) {
    case 'List':
      return node.nodes.every((child) => isEmptyTree(child));
    case 'Text':
      return node.text.trim() === '';
    default:
      return false;
  }
}

/** The tree receiving nodes; fails when no tree is active */
export function activeTree(state: ParserState, context: string): Tree {
  if (!state.tree) {
    throw fail(state, 'TMPL-P015', { context });
  }
  return state.tree;
}

export function nextTreeId(state: ParserState): number {
  state.maxTreeId += 1;
  return state.maxTreeId;
}

/** Suspend the active tree (if any) and activate a new one */
export function startParse(state: ParserState, name: string, id: number): void {
  if (state.tree) {
    state.treeStack.push(state.tree);
  }
  state.tree = createTree(name, id);
  state.observer?.onTreeStart?.(name, id);
}

/**
 * Register a finished tree.
 * Only an empty registered tree may be replaced.
 */
function addToTreeSet(state: ParserState, tree: Tree): void {
  const existing = state.treeSet.get(tree.name);
  if (existing && !isEmptyTree(existing.root)) {
    throw fail(state, 'TMPL-P005', { name: tree.name });
  }
  state.treeSet.set(tree.name, tree);
}

/** Register the active tree and resume its parent */
export function stopParse(state: ParserState): void {
  const tree = activeTree(state, 'stop parse');
  addToTreeSet(state, tree);
  state.observer?.onTreeComplete?.(tree);
  state.tree = state.treeStack.pop() ?? null;
}

// ============================================================
// VARIABLES
// ============================================================

export function addVar(state: ParserState, name: string): void {
  activeTree(state, 'variable declaration').vars.push(name);
}

/** Truncate the active tree's variables to `length` */
export function popVars(state: ParserState, length: number): void {
  const tree = activeTree(state, 'variable scope');
  tree.vars.length = Math.min(tree.vars.length, length);
}

export function hasVar(state: ParserState, name: string): boolean {
  return name === '$' || (state.tree?.vars.includes(name) ?? false);
}
