/**
 * Lexer State
 * Physical line source and the mutable counters owned by one lexer
 */

import { isWhitespace, measureIndentation } from './helpers.js';

/** Cursor over one physical line, positioned after its indentation */
export interface LineCursor {
  readonly number: number;
  readonly indentation: number;
  /** Indentation characters, verbatim */
  readonly leadingSpaces: string;
  /** Code points following the indentation */
  readonly chars: readonly string[];
  pos: number;
}

/**
 * Dedent levels still to emit. A mismatched dedent emits one Dedent error
 * and then its remaining DEDENT tokens.
 */
export type DedentState =
  | { readonly kind: 'none' }
  | { readonly kind: 'balanced'; readonly remaining: number }
  | { readonly kind: 'mismatched'; readonly remaining: number };

export interface LexerState {
  readonly source: string;
  /** Offset of the first unread physical line */
  offset: number;
  /** Number of the last physical line read */
  lineNumber: number;
  current: LineCursor | null;
  readonly indentStack: number[];
  dedent: DedentState;
  bracketDepth: number;
}

export const NO_DEDENT: DedentState = { kind: 'none' };

export function createLexerState(source: string): LexerState {
  return {
    source,
    offset: 0,
    lineNumber: 0,
    current: null,
    indentStack: [0],
    dedent: NO_DEDENT,
    bracketDepth: 0,
  };
}

/**
 * Read the next physical line, or null at end of input. Lines end at `\n`;
 * a `\r` right before it is part of the line ending.
 */
export function readLine(state: LexerState): LineCursor | null {
  const { source } = state;
  if (state.offset >= source.length) {
    return null;
  }

  let text: string;
  const newline = source.indexOf('\n', state.offset);
  if (newline === -1) {
    text = source.slice(state.offset);
    state.offset = source.length;
  } else {
    text = source.slice(state.offset, newline);
    if (text.endsWith('\r')) {
      text = text.slice(0, -1);
    }
    state.offset = newline + 1;
  }

  state.lineNumber++;
  const chars = Array.from(text);
  let indentEnd = 0;
  while (indentEnd < chars.length && isWhitespace(chars[indentEnd] ?? '')) {
    indentEnd++;
  }
  const leadingSpaces = chars.slice(0, indentEnd).join('');

  return {
    number: state.lineNumber,
    indentation: measureIndentation(leadingSpaces),
    leadingSpaces,
    chars: chars.slice(indentEnd),
    pos: 0,
  };
}

export function peek(line: LineCursor, offset = 0): string {
  return line.chars[line.pos + offset] ?? '';
}

export function peekString(line: LineCursor, length: number): string {
  return line.chars.slice(line.pos, line.pos + length).join('');
}

export function advance(line: LineCursor): string {
  const ch = line.chars[line.pos] ?? '';
  if (ch !== '') {
    line.pos++;
  }
  return ch;
}

export function isAtEnd(line: LineCursor): boolean {
  return line.pos >= line.chars.length;
}
