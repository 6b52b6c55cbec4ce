/**
 * Scanner
 * Single left-to-right pass producing tokens and accumulated lexer errors
 */

import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import { classify } from './classify.js';
import { type LexerError, unexpectedCharacter } from './errors.js';
import { makeToken } from './helpers.js';
import {
  createLexerState,
  isAtEnd,
  type LexerState,
  markStart,
  startLocation,
} from './state.js';

export interface ScanResult {
  readonly tokens: readonly Token[];
  readonly errors: readonly LexerError[];
}

/**
 * Scans one source string. Each instance is single-use: construct it, call
 * `scan()` once, then read `tokens`, `errors` and `hasErrors()`.
 *
 * Unrecognized characters never stop the scan; each becomes a
 * {@link LexerError} and produces no token.
 *
 * @example
 * const scanner = new Scanner('(!@)');
 * scanner.scan();
 * scanner.tokens.map((t) => t.kind);
 * // ['LEFT_PAREN', 'BANG', 'RIGHT_PAREN', 'EOF']
 * scanner.errors[0]?.message;
 * // 'Unexpected character: @'
 */
export class Scanner {
  private readonly state: LexerState;
  private readonly tokenList: Token[] = [];
  private readonly errorList: LexerError[] = [];
  private scanned = false;

  constructor(source: string) {
    this.state = createLexerState(source);
  }

  get source(): string {
    return this.state.source;
  }

  get tokens(): readonly Token[] {
    return this.tokenList;
  }

  get errors(): readonly LexerError[] {
    return this.errorList;
  }

  hasErrors(): boolean {
    return this.errorList.length > 0;
  }

  /**
   * @throws TypeError when called a second time on the same instance
   */
  scan(): void {
    if (this.scanned) {
      throw new TypeError('Scanner.scan() may only be called once');
    }
    this.scanned = true;

    const state = this.state;
    while (!isAtEnd(state)) {
      markStart(state);
      const result = classify(state);

      if (result.ok === true) {
        this.tokenList.push(makeToken(state, result.kind));
      } else if (result.ok === false) {
        this.errorList.push(
          unexpectedCharacter(result.char, startLocation(state))
        );
      }
    }

    markStart(state);
    this.tokenList.push(makeToken(state, TOKEN_KINDS.EOF));
  }
}

/** Scan `source` with a fresh {@link Scanner} */
export function scanSource(source: string): ScanResult {
  const scanner = new Scanner(source);
  scanner.scan();
  return { tokens: scanner.tokens, errors: scanner.errors };
}
