/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import type { OutputFormat } from './config.js';
import { ERROR_REGISTRY } from './error-registry.js';
import { LEXER_ERROR_IDS, LexerError } from './lexer/errors.js';
import type { LexItem } from './lexer/helpers.js';
import { formatToken } from './lexer/lexer.js';
import { isBytesToken, type Token } from './token-types.js';

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.line}: ${err.toData().message}`;
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** JSON shape of one item in `--format json` output */
export type JsonItem =
  | { line: number; type: Token['type']; value: string | number[] }
  | { line: number; error: { errorId: string; kind: string; message: string } };

export function toJsonItem(item: LexItem): JsonItem {
  const { line, result } = item;
  if (!result.ok) {
    const { error } = result;
    return {
      line,
      error: {
        errorId: error.errorId,
        kind: error.kind,
        message: error.toData().message,
      },
    };
  }

  const { token } = result;
  return isBytesToken(token)
    ? { line, type: token.type, value: Array.from(token.value) }
    : { line, type: token.type, value: token.value };
}

/** One line per item: the line number, then the token or the error */
function formatHuman(items: readonly LexItem[]): string[] {
  return items.map(({ line, result }) =>
    result.ok
      ? `${line}: ${formatToken(result.token)}`
      : formatError(result.error)
  );
}

/** Token types only, one logical line per output line */
function formatCompact(items: readonly LexItem[]): string[] {
  const lines: string[] = [];
  let current: string[] = [];

  for (const { result } of items) {
    if (!result.ok) {
      current.push(`!${result.error.errorId}`);
      continue;
    }
    current.push(result.token.type);
    if (result.token.type === 'NEWLINE') {
      lines.push(current.join(' '));
      current = [];
    }
  }

  if (current.length > 0) {
    lines.push(current.join(' '));
  }
  return lines;
}

/**
 * Render lexer items for stdout in the requested format.
 *
 * @returns Output lines (json renders a single line)
 */
export function formatItems(
  items: readonly LexItem[],
  format: OutputFormat
): string[] {
  switch (format) {
    case 'json':
      return [JSON.stringify(items.map(toJsonItem))];
    case 'compact':
      return formatCompact(items);
    case 'human':
      return formatHuman(items);
  }
}

/** Lexer error kind for each lexer registry ID */
const LEXER_KINDS_BY_ID: ReadonlyMap<string, string> = new Map(
  Object.entries(LEXER_ERROR_IDS).map(
    ([kind, errorId]): [string, string] => [errorId, kind]
  )
);

/**
 * `--explain` text for a registry ID, matched without regard to case.
 * Lexer entries name their error kind in the header line; each example
 * is printed as a quoted source block.
 */
export function formatExplanation(errorId: string): string | undefined {
  const definition = ERROR_REGISTRY.get(errorId.toUpperCase());
  if (!definition) {
    return undefined;
  }

  const kind = LEXER_KINDS_BY_ID.get(definition.errorId);
  const label = kind === undefined ? definition.errorId : `${definition.errorId} ${kind}`;
  const lines = [
    `${label}: ${definition.description}`,
    `Message: ${definition.messageTemplate}`,
  ];

  if (definition.cause !== undefined) {
    lines.push(`Cause: ${definition.cause}`);
  }
  if (definition.resolution !== undefined) {
    lines.push(`Fix: ${definition.resolution}`);
  }
  for (const { description, code } of definition.examples ?? []) {
    lines.push('', `Example: ${description}`);
    lines.push(...code.split('\n').map((text) => `  | ${text}`));
  }

  return lines.join('\n');
}
