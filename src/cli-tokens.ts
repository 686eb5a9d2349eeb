#!/usr/bin/env node
/**
 * CLI Tokens Entry Point
 *
 * Implements argument parsing for pyscan-tokens.
 * Tokenizes a file, stdin or an inline snippet and prints the token stream.
 */

import { existsSync, readFileSync } from 'node:fs';
import { formatError, formatExplanation, formatItems } from './cli-shared.js';
import {
  createDefaultConfig,
  isOutputFormat,
  loadConfig,
  type OutputFormat,
} from './config.js';
import { CliError } from './error-classes.js';
import type { LexItem } from './lexer/helpers.js';
import { Lexer } from './lexer/lexer.js';

// ============================================================
// ARGUMENT PARSING
// ============================================================

/** Where the source text comes from */
export type TokenInput =
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'inline'; code: string };

/**
 * Parsed command-line arguments for pyscan-tokens
 */
export type ParsedTokensArgs =
  | {
      mode: 'tokens';
      input: TokenInput;
      /** Undefined when the flag is absent, so the config file applies */
      format: OutputFormat | undefined;
      failFast: boolean;
    }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' }
  | { mode: 'version' };

const HELP_TEXT = `pyscan-tokens - Print the token stream of Python source

Usage: pyscan-tokens [options] <file>
       pyscan-tokens [options] -
       pyscan-tokens [options] -e <code>

Options:
  -e <code>          Tokenize an inline snippet
  --format <fmt>     Output format: human (default), json or compact
  --fail-fast        Stop at the first error
  --explain <id>     Show documentation for an error ID
  -h, --help         Show this help message
  -v, --version      Show version number`;

function usage(reason: string): CliError {
  return new CliError('PYSCAN-C002', { reason });
}

/** Value following a flag, rejecting a missing value or another flag */
function flagValue(argv: string[], index: number, flag: string, expected: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw usage(`${flag} requires argument: ${expected}`);
  }
  return value;
}

/**
 * Parse command-line arguments for pyscan-tokens
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws CliError (PYSCAN-C002) for unknown options, missing values and
 * missing or conflicting inputs
 */
export function parseTokensArgs(argv: string[]): ParsedTokensArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let failFast = false;
  const inputs: TokenInput[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--explain':
        return { mode: 'explain', errorId: flagValue(argv, i, arg, 'error ID') };
      case '--format': {
        const value = flagValue(argv, i, arg, 'human, json or compact');
        if (!isOutputFormat(value)) {
          throw usage(`Invalid format: ${value}. Expected human, json or compact`);
        }
        format = value;
        i++;
        break;
      }
      case '--fail-fast':
        failFast = true;
        break;
      case '-e': {
        // Snippets may start with '-', so take the next argument as is
        const code = argv[i + 1];
        if (code === undefined) {
          throw usage('-e requires argument: code');
        }
        inputs.push({ kind: 'inline', code });
        i++;
        break;
      }
      case '-':
        inputs.push({ kind: 'stdin' });
        break;
      default:
        if (arg.startsWith('-')) {
          throw usage(`Unknown option: ${arg}`);
        }
        inputs.push({ kind: 'file', path: arg });
    }
  }

  const [input, ...extra] = inputs;
  if (!input) {
    throw usage('Missing input: pass a file, - for stdin, or -e <code>');
  }
  if (extra.length > 0) {
    throw usage('Only one input may be given');
  }

  return { mode: 'tokens', input, format, failFast };
}

// ============================================================
// EXECUTION
// ============================================================

/** Process boundary, replaced in tests */
export interface CliIO {
  cwd(): string;
  readStdin(): string;
  out(line: string): void;
  err(line: string): void;
}

const processIO: CliIO = {
  cwd: () => process.cwd(),
  readStdin: () => readFileSync(0, 'utf-8'),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Version from the package.json next to the sources or the build */
export function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error('package.json has no version');
}

function readSource(input: TokenInput, io: CliIO): string {
  switch (input.kind) {
    case 'inline':
      return input.code;
    case 'stdin':
      return io.readStdin();
    case 'file':
      if (!existsSync(input.path)) {
        throw new CliError('PYSCAN-C003', { path: input.path });
      }
      return readFileSync(input.path, 'utf-8');
  }
}

/**
 * Collect the lexer's items, stopping after the first error when
 * `failFast` is set.
 */
export function collectItems(
  source: string,
  failFast: boolean
): { items: LexItem[]; errorCount: number } {
  let errorCount = 0;
  const lexer = new Lexer(source, {
    callbacks: {
      onError: () => {
        errorCount++;
      },
    },
  });

  const items: LexItem[] = [];
  for (const item of lexer) {
    items.push(item);
    if (failFast && errorCount > 0) {
      break;
    }
  }
  return { items, errorCount };
}

/**
 * Run pyscan-tokens against `argv`.
 *
 * @returns Process exit code: 0 when no error item was produced, else 1
 */
export function runTokens(argv: string[], io: CliIO = processIO): number {
  try {
    const args = parseTokensArgs(argv);

    if (args.mode === 'help') {
      io.out(HELP_TEXT);
      return 0;
    }

    if (args.mode === 'version') {
      io.out(readVersion());
      return 0;
    }

    if (args.mode === 'explain') {
      const documentation = formatExplanation(args.errorId);
      if (documentation === undefined) {
        io.err(`Error: Unknown error ID: ${args.errorId}`);
        return 1;
      }
      io.out(documentation);
      return 0;
    }

    // Flags override the configuration file
    const config = loadConfig(io.cwd()) ?? createDefaultConfig();
    const format = args.format ?? config.format;
    const failFast = args.failFast || config.failFast;

    const source = readSource(args.input, io);
    const { items, errorCount } = collectItems(source, failFast);

    for (const line of formatItems(items, format)) {
      io.out(line);
    }
    return errorCount > 0 ? 1 : 0;
  } catch (err) {
    if (err instanceof Error) {
      io.err(`Error: ${formatError(err)}`);
    } else {
      io.err(`Error: ${String(err)}`);
    }
    return 1;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = runTokens(process.argv.slice(2));
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
