/**
 * Lexer Tests: Byte-String Literals
 */

import { describe, expect, it } from 'vitest';

import { lex } from '../helpers/lex.js';

describe('Lexer: Bytes', () => {
  it('scans triple-quoted bytes', () => {
    expect(lex(`b'''hello'''`)).toEqual([
      [1, 'BYTES', [104, 101, 108, 108, 111]],
      [1, 'NEWLINE'],
    ]);
    expect(lex(`b'''hello\nblah'''`)).toEqual([
      [1, 'BYTES', [104, 101, 108, 108, 111, 10, 98, 108, 97, 104]],
      [2, 'NEWLINE'],
    ]);
  });

  it('decodes octal and hex escapes to their low byte', () => {
    expect(lex(`b'\\x26\\040'`)).toEqual([
      [1, 'BYTES', [38, 32]],
      [1, 'NEWLINE'],
    ]);
    expect(lex(`b'\\x26\\040\\700\\300'`)).toEqual([
      [1, 'BYTES', [38, 32, 192, 192]],
      [1, 'NEWLINE'],
    ]);
  });

  it('narrows literal characters to their low byte', () => {
    expect(lex(`b'é'`)).toEqual([
      [1, 'BYTES', [233]],
      [1, 'NEWLINE'],
    ]);
  });

  it('keeps unknown escapes with their backslash', () => {
    expect(lex(`b'\\q'`)).toEqual([
      [1, 'BYTES', [92, 113]],
      [1, 'NEWLINE'],
    ]);
  });

  it('joins continued lines and adjacent byte literals', () => {
    expect(lex(`b'abc\\\n  \t 123'`)).toEqual([
      [1, 'BYTES', [97, 98, 99, 32, 32, 9, 32, 49, 50, 51]],
      [2, 'NEWLINE'],
    ]);
    expect(lex(`b'abc\\\n  \t 123' \\\n  b'123'`)).toEqual([
      [1, 'BYTES', [97, 98, 99, 32, 32, 9, 32, 49, 50, 51, 49, 50, 51]],
      [3, 'NEWLINE'],
    ]);
  });

  describe('raw bytes', () => {
    const joined = [97, 98, 99, 92, 39, 32, 92, 10, 32, 32, 9, 32, 49, 50, 51];

    it('keeps backslashes and the joined newline', () => {
      expect(lex(`rb'abc\\' \\\n  \t 123'`)).toEqual([
        [1, 'BYTES', joined],
        [2, 'NEWLINE'],
      ]);
    });

    it('accepts any case and order of the prefix letters', () => {
      expect(lex(`Br'abc\\' \\\n  \t' bR' 123'`)).toEqual([
        [1, 'BYTES', joined],
        [2, 'NEWLINE'],
      ]);
    });
  });

  describe('invalid characters', () => {
    it('rejects character escapes in non-raw bytes', () => {
      expect(lex(`b'\\N{x}'`)[0]).toEqual([1, '!InvalidCharacter', 'N']);
      expect(lex(`b'\\u0041'`)[0]).toEqual([1, '!InvalidCharacter', 'u']);
      expect(lex(`b'\\U00000041'`)[0]).toEqual([1, '!InvalidCharacter', 'U']);
    });

    it('rejects a non-ASCII character after a backslash', () => {
      expect(lex(`b'\\é'`)[0]).toEqual([1, '!InvalidCharacter', 'é']);
      expect(lex(`rb'\\é'`)[0]).toEqual([1, '!InvalidCharacter', 'é']);
    });

    it('keeps character escapes verbatim in raw bytes', () => {
      expect(lex(`rb'\\N'`)).toEqual([
        [1, 'BYTES', [92, 78]],
        [1, 'NEWLINE'],
      ]);
    });
  });
});
