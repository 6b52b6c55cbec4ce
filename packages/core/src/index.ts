/**
 * Flint Module
 * Exports the scanner, token model and error taxonomy
 */

export {
  type Classification,
  LexerError,
  Scanner,
  scanSource,
  type ScanResult,
} from './lexer/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorSeverity,
  ERROR_REGISTRY,
  renderMessage,
  createError,
} from './types.js';

// ============================================================
// OUTPUT
// ============================================================
export {
  EXIT_DATA_ERROR,
  exitCodeFor,
  formatLexError,
  formatLexErrors,
  formatToken,
  formatTokens,
} from './render.js';

export { VERSION } from './version.js';

export * from './types.js';
