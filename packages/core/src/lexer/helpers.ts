/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { Token, TokenKind, TokenLiteral } from '../types.js';
import {
  currentLocation,
  lexeme,
  type LexerState,
  startLocation,
} from './state.js';

/** Insignificant characters other than newline */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function isHighSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xd800 && code <= 0xdbff;
}

export function isLowSurrogate(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Build a token from the lexeme between the start mark and the cursor */
export function makeToken(
  state: LexerState,
  kind: TokenKind,
  literal: TokenLiteral | null = null
): Token {
  return {
    kind,
    lexeme: lexeme(state),
    literal,
    line: state.startLine,
    span: { start: startLocation(state), end: currentLocation(state) },
  };
}
