/**
 * Operator Lookup Tables
 */

import type { TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

/** Characters that always form a token on their own */
export const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
  '(': TOKEN_KINDS.LEFT_PAREN,
  ')': TOKEN_KINDS.RIGHT_PAREN,
  '{': TOKEN_KINDS.LEFT_BRACE,
  '}': TOKEN_KINDS.RIGHT_BRACE,
  ',': TOKEN_KINDS.COMMA,
  '.': TOKEN_KINDS.DOT,
  '-': TOKEN_KINDS.MINUS,
  '+': TOKEN_KINDS.PLUS,
  ';': TOKEN_KINDS.SEMICOLON,
  '*': TOKEN_KINDS.STAR,
};

export interface OperatorPair {
  readonly single: TokenKind;
  readonly withEqual: TokenKind;
}

/** Characters that form a two-character operator when followed by `=` */
export const ONE_OR_TWO_CHAR_TOKENS: Record<string, OperatorPair> = {
  '=': { single: TOKEN_KINDS.EQUAL, withEqual: TOKEN_KINDS.EQUAL_EQUAL },
  '!': { single: TOKEN_KINDS.BANG, withEqual: TOKEN_KINDS.BANG_EQUAL },
  '<': { single: TOKEN_KINDS.LESS, withEqual: TOKEN_KINDS.LESS_EQUAL },
  '>': { single: TOKEN_KINDS.GREATER, withEqual: TOKEN_KINDS.GREATER_EQUAL },
};
