/**
 * String and Byte-String Literals
 * One scanning loop shared by text and bytes, parameterised by a builder
 */

import {
  makeBytesToken,
  makeToken,
  type Token,
  TOKEN_TYPES,
} from '../token-types.js';
import {
  codePointOf,
  type EscapeResult,
  readBytesEscape,
  readRawBytesEscape,
  readRawTextEscape,
  readTextEscape,
} from './escapes.js';
import { errorItem, isQuote, type LexItem, okItem } from './helpers.js';
import {
  advance,
  isAtEnd,
  type LexerState,
  type LineCursor,
  peek,
  readLine,
} from './state.js';

/** Prefix detected in front of a quote */
export interface LiteralPrefix {
  readonly bytes: boolean;
  readonly raw: boolean;
  /** Number of prefix characters before the opening quote */
  readonly length: number;
}

/** Accumulates a literal's decoded content */
interface LiteralBuilder {
  readonly raw: boolean;
  append(text: string): void;
  escape(line: LineCursor, ch: string): EscapeResult;
  appendCodePoints(codePoints: readonly number[]): void;
  build(): Token;
}

class TextLiteralBuilder implements LiteralBuilder {
  private value = '';

  constructor(readonly raw: boolean) {}

  append(text: string): void {
    this.value += text;
  }

  escape(line: LineCursor, ch: string): EscapeResult {
    return this.raw ? readRawTextEscape(ch) : readTextEscape(line, ch);
  }

  appendCodePoints(codePoints: readonly number[]): void {
    this.value += String.fromCodePoint(...codePoints);
  }

  build(): Token {
    return makeToken(TOKEN_TYPES.STRING, this.value);
  }
}

/** Every appended character is narrowed to its low byte */
class BytesLiteralBuilder implements LiteralBuilder {
  private readonly bytes: number[] = [];

  constructor(readonly raw: boolean) {}

  append(text: string): void {
    for (const ch of text) {
      this.bytes.push(codePointOf(ch) & 0xff);
    }
  }

  escape(line: LineCursor, ch: string): EscapeResult {
    return this.raw ? readRawBytesEscape(ch) : readBytesEscape(line, ch);
  }

  appendCodePoints(codePoints: readonly number[]): void {
    for (const codePoint of codePoints) {
      this.bytes.push(codePoint & 0xff);
    }
  }

  build(): Token {
    return makeBytesToken(Uint8Array.from(this.bytes));
  }
}

function isRawMarker(ch: string): boolean {
  return ch === 'r' || ch === 'R';
}

function isBytesMarker(ch: string): boolean {
  return ch === 'b' || ch === 'B';
}

/**
 * Recognize a literal start at the cursor: a bare quote, or one of the
 * prefixes u, r, b, rb and br (any case) immediately followed by a quote.
 */
export function detectLiteralPrefix(line: LineCursor): LiteralPrefix | null {
  const first = peek(line);
  const second = peek(line, 1);

  if (isQuote(first)) {
    return { bytes: false, raw: false, length: 0 };
  }
  if ((first === 'u' || first === 'U') && isQuote(second)) {
    return { bytes: false, raw: false, length: 1 };
  }
  if (isRawMarker(first) && isQuote(second)) {
    return { bytes: false, raw: true, length: 1 };
  }
  if (isBytesMarker(first) && isQuote(second)) {
    return { bytes: true, raw: false, length: 1 };
  }

  const pairsRawBytes =
    (isRawMarker(first) && isBytesMarker(second)) ||
    (isBytesMarker(first) && isRawMarker(second));
  if (pairsRawBytes && isQuote(peek(line, 2))) {
    return { bytes: true, raw: true, length: 2 };
  }
  return null;
}

/**
 * Scan a string or byte literal. Triple-quoted and backslash-joined
 * literals pull further physical lines; the cursor left in
 * `state.current` is where scanning resumes.
 */
export function readLiteral(
  state: LexerState,
  line: LineCursor,
  prefix: LiteralPrefix
): LexItem {
  line.pos += prefix.length;
  const quote = advance(line);
  const triple = peek(line) === quote && peek(line, 1) === quote;
  if (triple) {
    advance(line);
    advance(line);
  }

  const builder: LiteralBuilder = prefix.bytes
    ? new BytesLiteralBuilder(prefix.raw)
    : new TextLiteralBuilder(prefix.raw);
  const firstLine = line.number;
  let cursor = line;

  for (;;) {
    if (isAtEnd(cursor)) {
      if (!triple) {
        state.current = cursor;
        return errorItem(cursor.number, 'UnterminatedString');
      }
      builder.append('\n');
      const next = readLine(state);
      if (next === null) {
        state.current = null;
        return errorItem(cursor.number + 1, 'UnterminatedTripleString');
      }
      builder.append(next.leadingSpaces);
      cursor = next;
      continue;
    }

    const ch = advance(cursor);

    if (ch === '\\') {
      if (isAtEnd(cursor)) {
        // Backslash-newline joins the next physical line into the literal
        if (builder.raw) {
          builder.append('\\\n');
        }
        const next = readLine(state);
        if (next === null) {
          state.current = null;
          return errorItem(
            cursor.number + 1,
            triple ? 'UnterminatedTripleString' : 'UnterminatedString'
          );
        }
        builder.append(next.leadingSpaces);
        cursor = next;
        continue;
      }

      const escaped = builder.escape(cursor, advance(cursor));
      if (!escaped.ok) {
        state.current = cursor;
        return errorItem(cursor.number, escaped.kind, escaped.context);
      }
      builder.appendCodePoints(escaped.codePoints);
      continue;
    }

    if (ch === quote) {
      if (!triple) {
        break;
      }
      if (peek(cursor) === quote && peek(cursor, 1) === quote) {
        advance(cursor);
        advance(cursor);
        break;
      }
    }

    builder.append(ch);
  }

  state.current = cursor;
  return okItem(firstLine, builder.build());
}
