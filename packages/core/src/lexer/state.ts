/**
 * Lexer State
 * Tracks the cursor into the source text during scanning
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Offset where the lexeme being scanned begins */
  start: number;
  /** Offset of the next unconsumed character */
  current: number;
  line: number;
  column: number;
  startLine: number;
  startColumn: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    start: 0,
    current: 0,
    line: 1,
    column: 1,
    startLine: 1,
    startColumn: 1,
  };
}

/** Begin a new lexeme at the cursor */
export function markStart(state: LexerState): void {
  state.start = state.current;
  state.startLine = state.line;
  state.startColumn = state.column;
}

export function startLocation(state: LexerState): SourceLocation {
  return {
    line: state.startLine,
    column: state.startColumn,
    offset: state.start,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.current };
}

export function isAtEnd(state: LexerState): boolean {
  return state.current >= state.source.length;
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.current + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.source[state.current] ?? '';
  state.current++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume the next character only if it equals `expected` */
export function match(state: LexerState, expected: string): boolean {
  if (isAtEnd(state) || peek(state) !== expected) {
    return false;
  }
  advance(state);
  return true;
}

/** Text between the lexeme start and the cursor */
export function lexeme(state: LexerState): string {
  return state.source.slice(state.start, state.current);
}
