/**
 * Tokenizer
 * Core scanner: one item per pull, driven line by line
 */

import { NEWLINE_TOKEN } from '../token-types.js';
import {
  errorItem,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  type LexItem,
  okItem,
} from './helpers.js';
import {
  drainDedent,
  drainIndentStack,
  hasPendingDedent,
  processLineStart,
} from './indentation.js';
import { readNumber } from './numbers.js';
import { readIdentifier, readSymbol } from './readers.js';
import {
  advance,
  isAtEnd,
  type LexerState,
  type LineCursor,
  peek,
  readLine,
} from './state.js';
import { detectLiteralPrefix, readLiteral } from './strings.js';

function skipWhitespace(line: LineCursor): void {
  while (isWhitespace(peek(line))) {
    advance(line);
  }
}

/**
 * Produce the next item, or null once the input and every pending
 * end-of-input DEDENT are exhausted.
 */
export function nextToken(state: LexerState): LexItem | null {
  for (;;) {
    const line = state.current;

    // Fresh physical line: indentation decides what comes first
    if (line === null) {
      const fresh = readLine(state);
      if (fresh === null) {
        return drainIndentStack(state);
      }
      const start = processLineStart(state, fresh);
      if (start.kind === 'blank') {
        continue;
      }
      state.current = fresh;
      if (start.kind === 'indent') {
        return start.item;
      }
      continue;
    }

    if (hasPendingDedent(state)) {
      return drainDedent(state, line);
    }

    skipWhitespace(line);
    const ch = peek(line);

    if (ch === '' || ch === '#') {
      if (state.bracketDepth === 0) {
        state.current = null;
        return okItem(line.number, NEWLINE_TOKEN);
      }
      // Inside brackets the logical line continues with no layout tokens
      state.current = readLine(state);
      continue;
    }

    const prefix = detectLiteralPrefix(line);
    if (prefix) {
      return readLiteral(state, line, prefix);
    }

    if (isIdentifierStart(ch)) {
      return readIdentifier(line);
    }

    if (isDigit(ch) || (ch === '.' && isDigit(peek(line, 1)))) {
      return readNumber(line);
    }

    if (ch === '\\') {
      advance(line);
      if (isAtEnd(line)) {
        state.current = readLine(state);
        continue;
      }
      return errorItem(line.number, 'BadLineContinuation');
    }

    return readSymbol(state, line);
  }
}
