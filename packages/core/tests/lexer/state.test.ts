/**
 * Flint Lexer Tests: cursor state and classification
 */

import { describe, expect, it } from 'vitest';

import { classify } from '../../src/lexer/classify.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  lexeme,
  markStart,
  match,
  peek,
  startLocation,
} from '../../src/lexer/state.js';

describe('LexerState', () => {
  it('starts at offset 0 on line 1', () => {
    const state = createLexerState('abc');
    expect(state.start).toBe(0);
    expect(state.current).toBe(0);
    expect(currentLocation(state)).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('advances columns and wraps lines on newline', () => {
    const state = createLexerState('a\nb');
    expect(advance(state)).toBe('a');
    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
    expect(advance(state)).toBe('\n');
    expect(currentLocation(state)).toEqual({ line: 2, column: 1, offset: 2 });
  });

  it('peeks without consuming', () => {
    const state = createLexerState('<=');
    expect(peek(state)).toBe('<');
    expect(peek(state, 1)).toBe('=');
    expect(peek(state, 2)).toBe('');
    expect(state.current).toBe(0);
  });

  describe('match', () => {
    it('consumes the expected character', () => {
      const state = createLexerState('==');
      advance(state);
      expect(match(state, '=')).toBe(true);
      expect(state.current).toBe(2);
    });

    it('leaves the cursor on mismatch', () => {
      const state = createLexerState('=+');
      advance(state);
      expect(match(state, '=')).toBe(false);
      expect(state.current).toBe(1);
    });

    it('returns false at end of input', () => {
      const state = createLexerState('=');
      advance(state);
      expect(match(state, '=')).toBe(false);
      expect(isAtEnd(state)).toBe(true);
    });
  });

  it('slices the lexeme from the start mark', () => {
    const state = createLexerState('(!=)');
    advance(state);
    markStart(state);
    advance(state);
    advance(state);
    expect(lexeme(state)).toBe('!=');
    expect(startLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
  });
});

describe('classify', () => {
  function classifyFirst(source: string) {
    const state = createLexerState(source);
    markStart(state);
    return { result: classify(state), state };
  }

  it('classifies single-character tokens', () => {
    expect(classifyFirst(';').result).toEqual({ ok: true, kind: 'SEMICOLON' });
  });

  it('classifies two-character operators', () => {
    const { result, state } = classifyFirst('>=1');
    expect(result).toEqual({ ok: true, kind: 'GREATER_EQUAL' });
    expect(state.current).toBe(2);
  });

  it('skips whitespace and newlines', () => {
    expect(classifyFirst(' ').result).toEqual({ ok: 'skip' });
    expect(classifyFirst('\t').result).toEqual({ ok: 'skip' });
    expect(classifyFirst('\r').result).toEqual({ ok: 'skip' });

    const { result, state } = classifyFirst('\n');
    expect(result).toEqual({ ok: 'skip' });
    expect(state.line).toBe(2);
  });

  it('returns the unrecognized character', () => {
    const { result, state } = classifyFirst('@(');
    expect(result).toEqual({ ok: false, char: '@' });
    expect(state.current).toBe(1);
  });

  it('consumes a surrogate pair as one character', () => {
    const { result, state } = classifyFirst('🎉(');
    expect(result).toEqual({ ok: false, char: '🎉' });
    expect(state.current).toBe(2);
  });

  it('reports a lone high surrogate by itself', () => {
    const { result, state } = classifyFirst('\ud83d(');
    expect(result).toEqual({ ok: false, char: '\ud83d' });
    expect(state.current).toBe(1);
  });
});
