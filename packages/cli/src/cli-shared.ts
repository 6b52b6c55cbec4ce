/**
 * CLI Shared Utilities
 * Output serialization and error formatting for the flint CLI
 */

import * as yaml from 'yaml';
import { CliError, FlintError, LexerError } from 'flint-lang';
import type { ScanResult, TokenKind, TokenLiteral } from 'flint-lang';

export type OutputFormat = 'text' | 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'yaml'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Plain-data view of a scan for structured output */
export interface ScanDocument {
  tokens: {
    kind: TokenKind;
    lexeme: string;
    literal: TokenLiteral | null;
    line: number;
  }[];
  errors: { errorId: string; line: number; message: string }[];
}

export function toScanDocument(result: ScanResult): ScanDocument {
  return {
    tokens: result.tokens.map((t) => ({
      kind: t.kind,
      lexeme: t.lexeme,
      literal: t.literal,
      line: t.line,
    })),
    errors: result.errors.map((e) => ({
      errorId: e.errorId,
      line: e.line,
      message: e.message,
    })),
  };
}

/**
 * Serialize a scan document as JSON or YAML
 *
 * @throws {TypeError} for the text format, which is rendered line by line
 */
export function serializeDocument(
  document: ScanDocument,
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(document, null, 2);
    case 'yaml':
      return yaml.stringify(document).trimEnd();
    case 'text':
      throw new TypeError('Text output is not a document format');
  }
}

/**
 * Format error for stderr output
 *
 * Lexer errors keep their line prefix; other Flint errors print their
 * message with the error ID so it can be looked up.
 */
export function formatError(err: unknown): string {
  if (err instanceof LexerError) {
    return `[line ${err.line}] Error: ${err.message}`;
  }
  if (err instanceof CliError) {
    return err.message;
  }
  if (err instanceof FlintError) {
    return `error[${err.errorId}]: ${err.message}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/** Exit code for an error raised outside of scanning */
export function exitCodeForError(err: unknown): number {
  return err instanceof CliError ? err.exitCode : 1;
}
