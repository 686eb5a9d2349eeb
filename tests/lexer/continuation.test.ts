/**
 * Lexer Tests: Line Continuation
 * Backslash joins and implicit joins inside brackets
 */

import { describe, expect, it } from 'vitest';

import { lex } from '../helpers/lex.js';

describe('Lexer: Line Continuation', () => {
  describe('explicit', () => {
    it('joins the next line without layout tokens', () => {
      expect(lex('x = 1 + \\\n    2\n')).toEqual([
        [1, 'IDENTIFIER', 'x'],
        [1, 'ASSIGN', '='],
        [1, 'DEC_INTEGER', '1'],
        [1, 'PLUS', '+'],
        [2, 'DEC_INTEGER', '2'],
        [2, 'NEWLINE'],
      ]);
    });

    it('reports a backslash followed by more text', () => {
      expect(lex('a \\ b')).toEqual([
        [1, 'IDENTIFIER', 'a'],
        [1, '!BadLineContinuation'],
        [1, 'IDENTIFIER', 'b'],
        [1, 'NEWLINE'],
      ]);
    });

    it('ends the stream at a backslash on the last line', () => {
      expect(lex('x \\')).toEqual([[1, 'IDENTIFIER', 'x']]);
    });
  });

  describe('implicit', () => {
    it('continues a parenthesized expression', () => {
      expect(lex('(1 + \n      2 \n)')).toEqual([
        [1, 'LPAREN', '('],
        [1, 'DEC_INTEGER', '1'],
        [1, 'PLUS', '+'],
        [2, 'DEC_INTEGER', '2'],
        [3, 'RPAREN', ')'],
        [3, 'NEWLINE'],
      ]);
    });

    it('ignores indentation inside nested brackets', () => {
      const source = '   (1 + \n   (   2 \n + 9 \n ) * \n      2 \n )\n2';

      expect(lex(source)).toEqual([
        [1, 'INDENT'],
        [1, 'LPAREN', '('],
        [1, 'DEC_INTEGER', '1'],
        [1, 'PLUS', '+'],
        [2, 'LPAREN', '('],
        [2, 'DEC_INTEGER', '2'],
        [3, 'PLUS', '+'],
        [3, 'DEC_INTEGER', '9'],
        [4, 'RPAREN', ')'],
        [4, 'STAR', '*'],
        [5, 'DEC_INTEGER', '2'],
        [6, 'RPAREN', ')'],
        [6, 'NEWLINE'],
        [7, 'DEDENT'],
        [7, 'DEC_INTEGER', '2'],
        [7, 'NEWLINE'],
      ]);
    });

    it('joins strings split across bracketed lines', () => {
      expect(lex(`('abc' \n      'def' \n)`)).toEqual([
        [1, 'LPAREN', '('],
        [1, 'STRING', 'abcdef'],
        [3, 'RPAREN', ')'],
        [3, 'NEWLINE'],
      ]);
    });

    it('skips comment lines inside brackets', () => {
      expect(lex(`('abc'\n   #  'def' \n)`)).toEqual([
        [1, 'LPAREN', '('],
        [1, 'STRING', 'abc'],
        [3, 'RPAREN', ')'],
        [3, 'NEWLINE'],
      ]);
    });

    it('indents the body after a multi-line signature', () => {
      expect(lex('def abc(a, g,\n         c):\n   first')).toEqual([
        [1, 'DEF', 'def'],
        [1, 'IDENTIFIER', 'abc'],
        [1, 'LPAREN', '('],
        [1, 'IDENTIFIER', 'a'],
        [1, 'COMMA', ','],
        [1, 'IDENTIFIER', 'g'],
        [1, 'COMMA', ','],
        [2, 'IDENTIFIER', 'c'],
        [2, 'RPAREN', ')'],
        [2, 'COLON', ':'],
        [2, 'NEWLINE'],
        [3, 'INDENT'],
        [3, 'IDENTIFIER', 'first'],
        [3, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('does not join strings across a comment line outside brackets', () => {
      expect(lex(`'abc'\n   #  'def' \n123\n`)).toEqual([
        [1, 'STRING', 'abc'],
        [1, 'NEWLINE'],
        [3, 'DEC_INTEGER', '123'],
        [3, 'NEWLINE'],
      ]);
    });
  });
});
