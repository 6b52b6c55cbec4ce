#!/usr/bin/env node
/**
 * CLI Tokenize Entry Point
 *
 * Implements argument parsing and the `tokenize` command for the flint binary.
 * Token lines go to stdout and lexer errors to stderr; the exit code is 65
 * when the scan recorded errors.
 */

import * as fs from 'fs/promises';
import {
  CliError,
  exitCodeFor,
  formatLexErrors,
  formatTokens,
  scanSource,
  VERSION,
} from 'flint-lang';
import {
  exitCodeForError,
  formatError,
  isOutputFormat,
  type OutputFormat,
  serializeDocument,
  toScanDocument,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'tokenize'; file: string; format: OutputFormat }
  | { mode: 'help' | 'version' };

/** Lines to print and the exit code of one command run */
export interface CommandOutput {
  readonly stdout: string[];
  readonly stderr: string[];
  readonly exitCode: number;
}

export const USAGE = `Usage:
  flint tokenize <file>    Print the tokens of a Flint source file
  flint --help             Show this help message
  flint --version          Show version information

Options:
  --format <format>        Output format: text, json, yaml (default: text)

Exit codes:
  0   no lexical errors
  65  at least one lexical error
  1   usage or I/O error`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws {CliError} on a missing or unknown command, or an invalid option
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat = 'text';
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliError('FLINT-C004', {
          details: '--format requires argument: text, json or yaml',
        });
      }
      if (!isOutputFormat(value)) {
        throw new CliError('FLINT-C004', {
          details: `Invalid format: ${value}. Expected text, json or yaml`,
        });
      }
      format = value;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliError('FLINT-C004', { details: `Unknown option: ${arg}` });
    }

    positional.push(arg);
  }

  const [command, file] = positional;
  if (command === undefined || file === undefined) {
    throw new CliError('FLINT-C003');
  }
  if (command !== 'tokenize') {
    throw new CliError('FLINT-C002', { command });
  }

  return { mode: 'tokenize', file, format };
}

/**
 * Scan `source` and render the result in `format`
 */
export function tokenizeSource(
  source: string,
  format: OutputFormat = 'text'
): CommandOutput {
  const result = scanSource(source);
  const stderr = formatLexErrors(result.errors);
  const exitCode = exitCodeFor(result.errors.length > 0);

  if (format === 'text') {
    return { stdout: formatTokens(result.tokens), stderr, exitCode };
  }

  return {
    stdout: [serializeDocument(toScanDocument(result), format)],
    stderr,
    exitCode,
  };
}

/**
 * Read a source file and tokenize it
 *
 * @throws {CliError} FLINT-C001 when the file cannot be read
 */
export async function tokenizeFile(
  file: string,
  format: OutputFormat = 'text'
): Promise<CommandOutput> {
  let source: string;
  try {
    source = await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new CliError('FLINT-C001', {
      path: file,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  return tokenizeSource(source, format);
}

/**
 * Run the CLI for `argv` without touching the process
 */
export async function run(argv: string[]): Promise<CommandOutput> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        return { stdout: [USAGE], stderr: [], exitCode: 0 };
      case 'version':
        return { stdout: [VERSION], stderr: [], exitCode: 0 };
      case 'tokenize':
        return await tokenizeFile(parsed.file, parsed.format);
    }
  } catch (err) {
    const stderr = [formatError(err)];
    if (err instanceof CliError && err.errorId === 'FLINT-C003') {
      stderr.push(USAGE);
    }
    return { stdout: [], stderr, exitCode: exitCodeForError(err) };
  }
}

/**
 * Entry point for the flint binary
 *
 * Writes stdout lines with console.log and stderr lines with console.error,
 * then sets process.exitCode.
 */
export async function main(): Promise<void> {
  const output = await run(process.argv.slice(2));

  for (const line of output.stderr) {
    console.error(line);
  }
  for (const line of output.stdout) {
    console.log(line);
  }

  process.exitCode = output.exitCode;
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  await main();
}
