/**
 * Lexer Helper Functions
 * Character classification and item construction
 */

import type { Token } from '../token-types.js';
import { LexerError, type LexerErrorContext, type LexerErrorKind } from './errors.js';

/** One scanned item: a token or a diagnosable error, tagged with its line */
export type LexResult =
  | { readonly ok: true; readonly token: Token }
  | { readonly ok: false; readonly error: LexerError };

export interface LexItem {
  readonly line: number;
  readonly result: LexResult;
}

export const TAB_STOP_SIZE = 8;

const IDENTIFIER_START = /^[\p{Alphabetic}_]$/u;
const IDENTIFIER_CHAR = /^[\p{Alphabetic}\p{N}_]$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isOctalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '7';
}

export function isBinaryDigit(ch: string): boolean {
  return ch === '0' || ch === '1';
}

export function isHexDigit(ch: string): boolean {
  return (
    isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F')
  );
}

/**
 * Approximates XID_Start with the Alphabetic property plus underscore.
 */
export function isIdentifierStart(ch: string): boolean {
  return IDENTIFIER_START.test(ch);
}

/**
 * Approximates XID_Continue with Alphabetic or Numeric characters plus underscore.
 */
export function isIdentifierChar(ch: string): boolean {
  return IDENTIFIER_CHAR.test(ch);
}

/** Inline whitespace. Carriage return counts as a blank, not a line end. */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\f' || ch === '\r';
}

export function isQuote(ch: string): boolean {
  return ch === "'" || ch === '"';
}

/** Column width of a run of leading whitespace, tabs expanded to 8 */
export function measureIndentation(leading: string): number {
  let width = 0;
  for (const ch of leading) {
    width += ch === '\t' ? TAB_STOP_SIZE - (width % TAB_STOP_SIZE) : 1;
  }
  return width;
}

export function okItem(line: number, token: Token): LexItem {
  return { line, result: { ok: true, token } };
}

export function errorItem(
  line: number,
  kind: LexerErrorKind,
  context?: LexerErrorContext
): LexItem {
  return { line, result: { ok: false, error: new LexerError(kind, line, context) } };
}
