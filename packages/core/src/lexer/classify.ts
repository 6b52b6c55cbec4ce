/**
 * Character Classification
 * Decides what the character under the cursor starts
 */

import type { TokenKind } from '../types.js';
import { isHighSurrogate, isLowSurrogate, isWhitespace } from './helpers.js';
import { ONE_OR_TWO_CHAR_TOKENS, SINGLE_CHAR_TOKENS } from './operators.js';
import { advance, type LexerState, match, peek } from './state.js';

/**
 * Outcome of classifying one lexeme.
 * - `ok: true`: a token of `kind` spans start..current
 * - `ok: false`: `char` starts no token and must be reported
 * - `ok: 'skip'`: whitespace or newline, nothing to emit
 */
export type Classification =
  | { readonly ok: true; readonly kind: TokenKind }
  | { readonly ok: false; readonly char: string }
  | { readonly ok: 'skip' };

const SKIP: Classification = { ok: 'skip' };

/**
 * Consume the characters of the next lexeme and classify them.
 * The cursor must not be at the end of the source.
 */
export function classify(state: LexerState): Classification {
  const ch = advance(state);

  if (ch === '\n' || isWhitespace(ch)) {
    return SKIP;
  }

  const singleKind = SINGLE_CHAR_TOKENS[ch];
  if (singleKind) {
    return { ok: true, kind: singleKind };
  }

  // One character of lookahead; a mismatch leaves the next character alone
  const pair = ONE_OR_TWO_CHAR_TOKENS[ch];
  if (pair) {
    return { ok: true, kind: match(state, '=') ? pair.withEqual : pair.single };
  }

  // Report astral characters whole rather than as a lone surrogate
  if (isHighSurrogate(ch) && isLowSurrogate(peek(state))) {
    return { ok: false, char: ch + advance(state) };
  }

  return { ok: false, char: ch };
}
