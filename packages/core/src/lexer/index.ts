/**
 * Lexer Module
 * Converts source text into tokens
 */

export { type Classification } from './classify.js';
export { LexerError, unexpectedCharacter } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { Scanner, scanSource, type ScanResult } from './scanner.js';
