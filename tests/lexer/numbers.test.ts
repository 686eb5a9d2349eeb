/**
 * Lexer Tests: Numeric Literals
 */

import { describe, expect, it } from 'vitest';

import { lex } from '../helpers/lex.js';

describe('Lexer: Numbers', () => {
  it('scans a mixed line of literals', () => {
    const source =
      '1 123 456 45 23.742 23. 12..3 .14 0123.2192 077e010 12e17 12e+17 ' +
      '12E-17 0 00000 00003 0.2 .e12 0o724 0X32facb7 0b10101010 0x ' +
      '00000e+00000 79228162514264337593543950336 0xdeadbeef 037j 2.3j ' +
      '2.j .3j . 3..2\n';

    expect(lex(source)).toEqual([
      [1, 'DEC_INTEGER', '1'],
      [1, 'DEC_INTEGER', '123'],
      [1, 'DEC_INTEGER', '456'],
      [1, 'DEC_INTEGER', '45'],
      [1, 'FLOAT', '23.742'],
      [1, 'FLOAT', '23.'],
      [1, 'FLOAT', '12.'],
      [1, 'FLOAT', '.3'],
      [1, 'FLOAT', '.14'],
      [1, 'FLOAT', '0123.2192'],
      [1, 'FLOAT', '077e010'],
      [1, 'FLOAT', '12e17'],
      [1, 'FLOAT', '12e+17'],
      [1, 'FLOAT', '12E-17'],
      [1, 'DEC_INTEGER', '0'],
      [1, 'DEC_INTEGER', '00000'],
      [1, '!MalformedFloat'],
      [1, 'FLOAT', '0.2'],
      [1, 'DOT', '.'],
      [1, 'IDENTIFIER', 'e12'],
      [1, 'OCT_INTEGER', '0o724'],
      [1, 'HEX_INTEGER', '0X32facb7'],
      [1, 'BIN_INTEGER', '0b10101010'],
      [1, '!MissingDigits'],
      [1, 'FLOAT', '00000e+00000'],
      [1, 'DEC_INTEGER', '79228162514264337593543950336'],
      [1, 'HEX_INTEGER', '0xdeadbeef'],
      [1, 'IMAGINARY', '037j'],
      [1, 'IMAGINARY', '2.3j'],
      [1, 'IMAGINARY', '2.j'],
      [1, 'IMAGINARY', '.3j'],
      [1, 'DOT', '.'],
      [1, 'FLOAT', '3.'],
      [1, 'FLOAT', '.2'],
      [1, 'NEWLINE'],
    ]);
  });

  describe('radix integers', () => {
    it('accepts upper-case prefixes', () => {
      expect(lex('0O17 0B1 0XfF')).toEqual([
        [1, 'OCT_INTEGER', '0O17'],
        [1, 'BIN_INTEGER', '0B1'],
        [1, 'HEX_INTEGER', '0XfF'],
        [1, 'NEWLINE'],
      ]);
    });

    it('reports a prefix with no digit of its radix', () => {
      expect(lex('0b')).toEqual([
        [1, '!MissingDigits'],
        [1, 'NEWLINE'],
      ]);
      expect(lex('0o8')).toEqual([
        [1, '!MissingDigits'],
        [1, 'DEC_INTEGER', '8'],
        [1, 'NEWLINE'],
      ]);
    });

    it('rejects a fractional part on a radix integer as one error', () => {
      expect(lex('0b1.5 x')).toEqual([
        [1, '!MalformedFloat'],
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
      ]);
    });

    it('rejects an exponent on a radix integer as one error', () => {
      expect(lex('0o7e-12 x')).toEqual([
        [1, '!MalformedFloat'],
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
      ]);
    });

    it('rejects an imaginary suffix on a radix integer as one error', () => {
      expect(lex('0x1j x')).toEqual([
        [1, '!MalformedImaginary'],
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
      ]);
    });
  });

  describe('leading zeros', () => {
    it('rejects a zero-prefixed decimal integer', () => {
      expect(lex('0123')).toEqual([
        [1, '!MalformedFloat'],
        [1, 'NEWLINE'],
      ]);
    });

    it('accepts a zero-prefixed float or imaginary', () => {
      expect(lex('00.5 007e1 09J')).toEqual([
        [1, 'FLOAT', '00.5'],
        [1, 'FLOAT', '007e1'],
        [1, 'IMAGINARY', '09J'],
        [1, 'NEWLINE'],
      ]);
    });
  });

  describe('exponents', () => {
    it('requires digits after the exponent marker', () => {
      expect(lex('1e')).toEqual([
        [1, '!MissingDigits'],
        [1, 'NEWLINE'],
      ]);
      expect(lex('1e+ x')).toEqual([
        [1, '!MissingDigits'],
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
      ]);
    });

    it('combines an exponent with an imaginary suffix', () => {
      expect(lex('1e+5j .5e-2')).toEqual([
        [1, 'IMAGINARY', '1e+5j'],
        [1, 'FLOAT', '.5e-2'],
        [1, 'NEWLINE'],
      ]);
    });
  });

  it('splits a literal from a following name', () => {
    expect(lex('1if')).toEqual([
      [1, 'DEC_INTEGER', '1'],
      [1, 'IF', 'if'],
      [1, 'NEWLINE'],
    ]);
  });
});
