/**
 * Operator and Keyword Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character operators inside actions (parentheses track depth separately) */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['|', TOKEN_TYPES.PIPE],
  [',', TOKEN_TYPES.COMMA],
]);

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['end', TOKEN_TYPES.END],
  ['range', TOKEN_TYPES.RANGE],
  ['with', TOKEN_TYPES.WITH],
  ['block', TOKEN_TYPES.BLOCK],
  ['define', TOKEN_TYPES.DEFINE],
  ['template', TOKEN_TYPES.TEMPLATE],
  ['nil', TOKEN_TYPES.NIL],
  ['true', TOKEN_TYPES.BOOL],
  ['false', TOKEN_TYPES.BOOL],
]);
