import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  // Delimiters
  LEFT_PAREN: 'LEFT_PAREN', // (
  RIGHT_PAREN: 'RIGHT_PAREN', // )
  LEFT_BRACE: 'LEFT_BRACE', // {
  RIGHT_BRACE: 'RIGHT_BRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  SEMICOLON: 'SEMICOLON', // ;

  // Arithmetic operators
  MINUS: 'MINUS', // -
  PLUS: 'PLUS', // +
  STAR: 'STAR', // *

  // Assignment and equality
  EQUAL: 'EQUAL', // =
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  BANG: 'BANG', // !
  BANG_EQUAL: 'BANG_EQUAL', // !=

  // Comparison operators
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=

  // Special
  EOF: 'EOF',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

/** Decoded value carried by literal-bearing kinds */
export type TokenLiteral = string | number;

export interface Token {
  readonly kind: TokenKind;
  /** Exact source text the token was scanned from */
  readonly lexeme: string;
  readonly literal: TokenLiteral | null;
  /** 1-based line where the token starts */
  readonly line: number;
  readonly span: SourceSpan;
}
