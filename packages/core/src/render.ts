/**
 * Output Rendering
 * Line formats shared by every consumer of scan results
 */

import type { Token } from './types.js';
import type { LexerError } from './lexer/errors.js';

/** Process exit code when the scan recorded lexical errors */
export const EXIT_DATA_ERROR = 65;

/**
 * Render one token as `<KIND> <lexeme> <literal>`.
 * A missing literal renders as `null`, so EOF becomes `EOF  null`.
 */
export function formatToken(token: Token): string {
  const literal = token.literal === null ? 'null' : String(token.literal);
  return `${token.kind} ${token.lexeme} ${literal}`;
}

/** Render one error as `[line <N>] Error: <message>` */
export function formatLexError(error: LexerError): string {
  return `[line ${error.line}] Error: ${error.message}`;
}

export function formatTokens(tokens: readonly Token[]): string[] {
  return tokens.map(formatToken);
}

export function formatLexErrors(errors: readonly LexerError[]): string[] {
  return errors.map(formatLexError);
}

export function exitCodeFor(hasErrors: boolean): number {
  return hasErrors ? EXIT_DATA_ERROR : 0;
}
