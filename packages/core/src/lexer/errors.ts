/**
 * Lexer Errors
 */

import { FlintError, ERROR_REGISTRY, renderMessage } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends FlintError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const definition = ERROR_REGISTRY.get(errorId);

    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
  }

  /** 1-based line the error was reported on */
  get line(): number {
    return this.location.line;
  }
}

/** Error for a character that starts no token */
export function unexpectedCharacter(
  char: string,
  location: SourceLocation
): LexerError {
  return new LexerError('FLINT-L001', location, { char });
}
