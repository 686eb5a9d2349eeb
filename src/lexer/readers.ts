/**
 * Token Readers
 * Identifiers, keywords and operator symbols
 */

import { makeToken, type TextTokenType, TOKEN_TYPES } from '../token-types.js';
import { errorItem, isIdentifierChar, type LexItem, okItem } from './helpers.js';
import { lookupKeyword } from './keywords.js';
import {
  CLOSING_BRACKETS,
  OPENING_BRACKETS,
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  advance,
  type LexerState,
  type LineCursor,
  peek,
  peekString,
} from './state.js';

/** Operator tables by lexeme length, longest first */
const SYMBOL_TABLES: readonly (readonly [number, Readonly<Record<string, TextTokenType>>])[] = [
  [3, THREE_CHAR_OPERATORS],
  [2, TWO_CHAR_OPERATORS],
  [1, SINGLE_CHAR_OPERATORS],
];

export function readIdentifier(line: LineCursor): LexItem {
  let value = '';
  while (isIdentifierChar(peek(line))) {
    value += advance(line);
  }

  const type = lookupKeyword(value) ?? TOKEN_TYPES.IDENTIFIER;
  return okItem(line.number, makeToken(type, value));
}

function trackBracket(state: LexerState, symbol: string): void {
  if (OPENING_BRACKETS.has(symbol)) {
    state.bracketDepth++;
  } else if (CLOSING_BRACKETS.has(symbol)) {
    state.bracketDepth = Math.max(0, state.bracketDepth - 1);
  }
}

/**
 * Longest-match operator or delimiter. An unrecognized character is
 * consumed and reported as InvalidSymbol.
 */
export function readSymbol(state: LexerState, line: LineCursor): LexItem {
  for (const [length, table] of SYMBOL_TABLES) {
    const candidate = peekString(line, length);
    const type = Object.prototype.hasOwnProperty.call(table, candidate)
      ? table[candidate]
      : undefined;

    if (type !== undefined) {
      line.pos += length;
      trackBracket(state, candidate);
      return okItem(line.number, makeToken(type, candidate));
    }
  }

  const ch = advance(line);
  return errorItem(line.number, 'InvalidSymbol', { char: ch });
}
