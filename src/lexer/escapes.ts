/**
 * Escape Sequences
 * Decodes the character(s) following a backslash in non-raw literals
 */

import type { LexerErrorContext, LexerErrorKind } from './errors.js';
import { isHexDigit, isOctalDigit } from './helpers.js';
import { advance, type LineCursor, peek } from './state.js';
import { lookupUnicodeName } from './unicode-names.js';

export type EscapeResult =
  | { readonly ok: true; readonly codePoints: readonly number[] }
  | {
      readonly ok: false;
      readonly kind: LexerErrorKind;
      readonly context?: LexerErrorContext;
    };

const BACKSLASH = 0x5c;
const MAX_CODE_POINT = 0x10ffff;

/** Single-character escapes shared by text and byte literals */
export const SIMPLE_ESCAPES: Readonly<Record<string, number>> = Object.freeze({
  '\\': BACKSLASH,
  "'": 0x27,
  '"': 0x22,
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
});

function decoded(...codePoints: number[]): EscapeResult {
  return { ok: true, codePoints };
}

function failed(kind: LexerErrorKind, context?: LexerErrorContext): EscapeResult {
  return context ? { ok: false, kind, context } : { ok: false, kind };
}

export function codePointOf(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

/** The escaped character is kept together with its backslash */
function verbatim(ch: string): EscapeResult {
  return decoded(BACKSLASH, codePointOf(ch));
}

function lookupSimpleEscape(ch: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, ch)
    ? SIMPLE_ESCAPES[ch]
    : undefined;
}

/** Up to three octal digits, the first already consumed */
function readOctal(line: LineCursor, first: string): EscapeResult {
  let digits = first;
  while (digits.length < 3 && isOctalDigit(peek(line))) {
    digits += advance(line);
  }
  return decoded(parseInt(digits, 8));
}

/**
 * Exactly `count` hex digits. Digits that match are consumed even when
 * the run is short.
 */
function readHexDigits(line: LineCursor, count: number): number | undefined {
  let digits = '';
  while (digits.length < count && isHexDigit(peek(line))) {
    digits += advance(line);
  }
  return digits.length === count ? parseInt(digits, 16) : undefined;
}

function readHexEscape(line: LineCursor): EscapeResult {
  const value = readHexDigits(line, 2);
  return value === undefined ? failed('HexEscapeShort') : decoded(value);
}

function readUnicodeEscape(line: LineCursor, count: number): EscapeResult {
  const value = readHexDigits(line, count);
  if (value === undefined || value > MAX_CODE_POINT) {
    return failed('MalformedUnicodeEscape');
  }
  return decoded(value);
}

/** `\N{NAME}`; the `N` is already consumed */
function readNamedEscape(line: LineCursor): EscapeResult {
  if (peek(line) !== '{') {
    return failed('MalformedNamedUnicodeEscape');
  }
  advance(line);

  let name = '';
  while (peek(line) !== '' && peek(line) !== '}') {
    name += advance(line);
  }
  if (peek(line) !== '}') {
    return failed('MalformedNamedUnicodeEscape');
  }
  advance(line);

  const codePoint = lookupUnicodeName(name);
  return codePoint === undefined
    ? failed('UnknownUnicodeName', { name })
    : decoded(codePoint);
}

/**
 * Decode an escape in a non-raw text literal. `ch` is the character
 * right after the backslash, already consumed.
 */
export function readTextEscape(line: LineCursor, ch: string): EscapeResult {
  const simple = lookupSimpleEscape(ch);
  if (simple !== undefined) {
    return decoded(simple);
  }
  if (isOctalDigit(ch)) {
    return readOctal(line, ch);
  }

  switch (ch) {
    case 'x':
      return readHexEscape(line);
    case 'N':
      return readNamedEscape(line);
    case 'u':
      return readUnicodeEscape(line, 4);
    case 'U':
      return readUnicodeEscape(line, 8);
    default:
      return verbatim(ch);
  }
}

/**
 * Decode an escape in a non-raw byte literal. Values above 0xFF are
 * narrowed by the caller.
 */
export function readBytesEscape(line: LineCursor, ch: string): EscapeResult {
  const simple = lookupSimpleEscape(ch);
  if (simple !== undefined) {
    return decoded(simple);
  }
  if (isOctalDigit(ch)) {
    return readOctal(line, ch);
  }
  if (ch === 'x') {
    return readHexEscape(line);
  }
  // Character escapes have no meaning in bytes
  if (ch === 'N' || ch === 'u' || ch === 'U') {
    return failed('InvalidCharacter', { char: ch });
  }
  return readRawBytesEscape(ch);
}

/** Raw byte literals keep the backslash, but only for ASCII characters */
export function readRawBytesEscape(ch: string): EscapeResult {
  return codePointOf(ch) > 0x7f
    ? failed('InvalidCharacter', { char: ch })
    : verbatim(ch);
}

/** Raw text literals keep every escape verbatim */
export function readRawTextEscape(ch: string): EscapeResult {
  return verbatim(ch);
}
