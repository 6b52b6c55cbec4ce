/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import { CliError, createError, LexerError, scanSource } from 'flint-lang';
import {
  exitCodeForError,
  formatError,
  isOutputFormat,
  serializeDocument,
  toScanDocument,
} from '../src/cli-shared.js';

describe('cli-shared', () => {
  describe('isOutputFormat', () => {
    it('accepts the supported formats', () => {
      expect(isOutputFormat('text')).toBe(true);
      expect(isOutputFormat('json')).toBe(true);
      expect(isOutputFormat('yaml')).toBe(true);
      expect(isOutputFormat('xml')).toBe(false);
    });
  });

  describe('toScanDocument', () => {
    it('drops spans and keeps error IDs', () => {
      expect(toScanDocument(scanSource('!\n$'))).toEqual({
        tokens: [
          { kind: 'BANG', lexeme: '!', literal: null, line: 1 },
          { kind: 'EOF', lexeme: '', literal: null, line: 2 },
        ],
        errors: [
          {
            errorId: 'FLINT-L001',
            line: 2,
            message: 'Unexpected character: $',
          },
        ],
      });
    });
  });

  describe('serializeDocument', () => {
    const document = toScanDocument(scanSource(''));

    it('indents JSON by two spaces', () => {
      expect(serializeDocument(document, 'json')).toBe(
        JSON.stringify(document, null, 2)
      );
    });

    it('strips the trailing newline from YAML', () => {
      const text = serializeDocument(document, 'yaml');
      expect(text.endsWith('\n')).toBe(false);
    });

    it('rejects the text format', () => {
      expect(() => serializeDocument(document, 'text')).toThrow(TypeError);
    });
  });

  describe('formatError', () => {
    it('formats lexer errors with their line', () => {
      const err = new LexerError(
        'FLINT-L001',
        { line: 3, column: 1, offset: 9 },
        { char: '~' }
      );
      expect(formatError(err)).toBe('[line 3] Error: Unexpected character: ~');
    });

    it('prints CLI errors as their message', () => {
      const err = new CliError('FLINT-C002', { command: 'run' });
      expect(formatError(err)).toBe('Unknown command: run');
    });

    it('prefixes other Flint errors with their ID', () => {
      const err = createError('FLINT-C001', { path: 'x.flint' });
      expect(formatError(err)).toBe(
        'error[FLINT-C001]: Failed to read file x.flint'
      );
    });

    it('falls back to the message of plain errors', () => {
      expect(formatError(new Error('Generic error'))).toBe('Generic error');
      expect(formatError('boom')).toBe('boom');
    });
  });

  describe('exitCodeForError', () => {
    it('uses the CLI error exit code', () => {
      expect(exitCodeForError(new CliError('FLINT-C003', {}, 2))).toBe(2);
      expect(exitCodeForError(new Error('x'))).toBe(1);
    });
  });
});
