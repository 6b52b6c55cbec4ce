/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'cli';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Example demonstrating an error condition.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FLINT-{category}{3-digit} (e.g., FLINT-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup of every error definition by ID.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (FLINT-L0xx)
  {
    errorId: 'FLINT-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of any Flint token.',
    resolution:
      'Remove or replace the character. Scanning continues after it, so every stray character is reported.',
    examples: [
      {
        description: 'Stray symbol between parentheses',
        code: '(!@)',
      },
    ],
  },

  // CLI Errors (FLINT-C0xx)
  {
    errorId: 'FLINT-C001',
    category: 'cli',
    description: 'File not readable',
    messageTemplate: 'Failed to read file {path}',
    cause: 'The source file does not exist or cannot be opened.',
    resolution: 'Check the path and the file permissions.',
  },
  {
    errorId: 'FLINT-C002',
    category: 'cli',
    description: 'Unknown command',
    messageTemplate: 'Unknown command: {command}',
    cause: 'The first argument is not a supported command.',
    resolution: 'Use `flint tokenize <file>`.',
  },
  {
    errorId: 'FLINT-C003',
    category: 'cli',
    description: 'Missing argument',
    messageTemplate: 'Usage: flint tokenize <filename>',
    cause: 'The command or the file argument was omitted.',
    resolution: 'Pass a command followed by a file path.',
  },
  {
    errorId: 'FLINT-C004',
    category: 'cli',
    description: 'Invalid option',
    messageTemplate: '{details}',
    cause: 'An option is unknown or has an invalid value.',
    resolution: 'Run `flint --help` for the list of options.',
    examples: [
      {
        description: 'Unsupported output format',
        code: 'flint tokenize main.flint --format xml',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unexpected character: {char}", { char: "@" })
 * // Returns: "Unexpected character: @"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i + 1] !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
