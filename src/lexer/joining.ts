/**
 * Literal Joining
 * Pass-through stages merging adjacent string or byte literals
 */

import {
  isBytesToken,
  makeBytesToken,
  makeToken,
  type Token,
  TOKEN_TYPES,
} from '../token-types.js';
import { type LexItem, okItem } from './helpers.js';
import type { LexerState } from './state.js';
import { nextToken } from './tokenizer.js';

/** Shared pull contract of the scanner and every stage wrapping it */
export interface TokenStream {
  next(): LexItem | null;
}

export class ScannerStream implements TokenStream {
  constructor(private readonly state: LexerState) {}

  next(): LexItem | null {
    return nextToken(this.state);
  }
}

/** One item of lookahead over an inner stream */
class PeekableStream implements TokenStream {
  // undefined: nothing buffered; null: inner stream is exhausted
  private buffered: LexItem | null | undefined;

  constructor(private readonly inner: TokenStream) {}

  peek(): LexItem | null {
    if (this.buffered === undefined) {
      this.buffered = this.inner.next();
    }
    return this.buffered;
  }

  next(): LexItem | null {
    const item = this.peek();
    this.buffered = undefined;
    return item;
  }
}

/**
 * Merges a run of consecutive OK tokens of one literal kind. The merged
 * token carries the line of the run's first token.
 */
abstract class LiteralJoiningStream<TContent> implements TokenStream {
  private readonly inner: PeekableStream;

  constructor(inner: TokenStream) {
    this.inner = new PeekableStream(inner);
  }

  /** Content of a token of this stage's kind, undefined for anything else */
  protected abstract contentOf(token: Token): TContent | undefined;

  protected abstract combine(parts: readonly TContent[]): Token;

  next(): LexItem | null {
    const item = this.inner.next();
    if (item === null || !item.result.ok) {
      return item;
    }

    const first = this.contentOf(item.result.token);
    if (first === undefined) {
      return item;
    }

    const parts = [first];
    for (let follow = this.following(); follow !== undefined; follow = this.following()) {
      parts.push(follow);
    }

    return parts.length === 1 ? item : okItem(item.line, this.combine(parts));
  }

  private following(): TContent | undefined {
    const peeked = this.inner.peek();
    if (peeked === null || !peeked.result.ok) {
      return undefined;
    }

    const content = this.contentOf(peeked.result.token);
    if (content !== undefined) {
      this.inner.next();
    }
    return content;
  }
}

export class BytesJoiningStream extends LiteralJoiningStream<Uint8Array> {
  protected contentOf(token: Token): Uint8Array | undefined {
    return isBytesToken(token) ? token.value : undefined;
  }

  protected combine(parts: readonly Uint8Array[]): Token {
    const total = parts.reduce((sum, part) => sum + part.length, 0);
    const merged = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
      merged.set(part, offset);
      offset += part.length;
    }
    return makeBytesToken(merged);
  }
}

export class StringJoiningStream extends LiteralJoiningStream<string> {
  protected contentOf(token: Token): string | undefined {
    return !isBytesToken(token) && token.type === TOKEN_TYPES.STRING
      ? token.value
      : undefined;
  }

  protected combine(parts: readonly string[]): Token {
    return makeToken(TOKEN_TYPES.STRING, parts.join(''));
  }
}
