/**
 * Lexer Facade
 * Scanner wrapped by the byte-join and string-join stages
 */

import { isBytesToken, type Token, TOKEN_TYPES } from '../token-types.js';
import type { LexerError } from './errors.js';
import type { LexItem } from './helpers.js';
import {
  BytesJoiningStream,
  ScannerStream,
  StringJoiningStream,
  type TokenStream,
} from './joining.js';
import { createLexerState } from './state.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted for each token the lexer yields */
export interface TokenEvent {
  /** Source line, or 0 for end-of-input DEDENT tokens */
  line: number;
  token: Token;
}

/** Event emitted for each error the lexer yields */
export interface LexErrorEvent {
  line: number;
  error: LexerError;
}

export interface LexerCallbacks {
  /** Called when a token is yielded */
  onToken?: (event: TokenEvent) => void;
  /** Called when an error is yielded in place of a token */
  onError?: (event: LexErrorEvent) => void;
}

export interface TokenizeOptions {
  callbacks?: LexerCallbacks;
}

// ============================================================
// LEXER
// ============================================================

/**
 * Lazy, single-pass token stream over one source text. Each pull yields
 * one token or one error tagged with its line; iteration ends once the
 * input and the closing DEDENT tokens are exhausted.
 */
export class Lexer implements Iterable<LexItem> {
  private readonly stream: TokenStream;
  private readonly callbacks: LexerCallbacks;

  constructor(source: string, options: TokenizeOptions = {}) {
    const scanner = new ScannerStream(createLexerState(source));
    this.stream = new StringJoiningStream(new BytesJoiningStream(scanner));
    this.callbacks = options.callbacks ?? {};
  }

  next(): LexItem | null {
    const item = this.stream.next();
    if (item === null) {
      return null;
    }

    if (item.result.ok) {
      this.callbacks.onToken?.({ line: item.line, token: item.result.token });
    } else {
      this.callbacks.onError?.({ line: item.line, error: item.result.error });
    }
    return item;
  }

  *[Symbol.iterator](): Iterator<LexItem> {
    for (let item = this.next(); item !== null; item = this.next()) {
      yield item;
    }
  }
}

/** Tokenize the whole source eagerly */
export function tokenize(source: string, options: TokenizeOptions = {}): LexItem[] {
  return Array.from(new Lexer(source, options));
}

// ============================================================
// FORMATTING
// ============================================================

const LAYOUT_TYPES: ReadonlySet<string> = new Set([
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.INDENT,
  TOKEN_TYPES.DEDENT,
]);

function formatBytes(bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) {
    if (byte === 0x22 || byte === 0x5c) {
      text += `\\${String.fromCharCode(byte)}`;
    } else if (byte >= 0x20 && byte < 0x7f) {
      text += String.fromCharCode(byte);
    } else {
      text += `\\x${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return `b"${text}"`;
}

/**
 * Human-readable rendering: the token type, then its value. Strings are
 * quoted with escapes, bytes use `b"..."` notation, layout tokens show
 * the type alone.
 */
export function formatToken(token: Token): string {
  if (isBytesToken(token)) {
    return `${token.type} ${formatBytes(token.value)}`;
  }
  if (LAYOUT_TYPES.has(token.type)) {
    return token.type;
  }
  if (token.type === TOKEN_TYPES.STRING) {
    return `${token.type} ${JSON.stringify(token.value)}`;
  }
  return `${token.type} ${token.value}`;
}
