/**
 * Lexer Tests: Indentation
 * INDENT/DEDENT emission, tab stops, blank lines and end-of-input unwinding
 */

import { describe, expect, it } from 'vitest';

import {
  createLexerState,
  IndentationInvariantError,
  nextToken,
} from '../../src/index.js';
import { lex } from '../helpers/lex.js';

describe('Lexer: Indentation', () => {
  describe('indent and dedent', () => {
    it('emits INDENT for deeper lines and DEDENT for each level closed', () => {
      const source = [
        'abf  \x0C _xyz',
        '   ',
        '  e2f',
        '  \tmq3',
        'n12\\\r',
        'n3\\ ',
        '  n23',
        '    n24',
        '   n25     # monkey says what?  ',
        '',
      ].join('\n');

      expect(lex(source)).toEqual([
        [1, 'IDENTIFIER', 'abf'],
        [1, 'IDENTIFIER', '_xyz'],
        [1, 'NEWLINE'],
        [3, 'INDENT'],
        [3, 'IDENTIFIER', 'e2f'],
        [3, 'NEWLINE'],
        [4, 'INDENT'],
        [4, 'IDENTIFIER', 'mq3'],
        [4, 'NEWLINE'],
        [5, 'DEDENT'],
        [5, 'DEDENT'],
        [5, 'IDENTIFIER', 'n12'],
        [6, 'IDENTIFIER', 'n3'],
        [6, '!BadLineContinuation'],
        [6, 'NEWLINE'],
        [7, 'INDENT'],
        [7, 'IDENTIFIER', 'n23'],
        [7, 'NEWLINE'],
        [8, 'INDENT'],
        [8, 'IDENTIFIER', 'n24'],
        [8, 'NEWLINE'],
        [9, '!Dedent'],
        [9, 'IDENTIFIER', 'n25'],
        [9, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('reports a misaligned line before its remaining DEDENTs', () => {
      const source =
        '    abf xyz\n\n\n\n        e2f\n             n12\n  n2\n';

      expect(lex(source)).toEqual([
        [1, 'INDENT'],
        [1, 'IDENTIFIER', 'abf'],
        [1, 'IDENTIFIER', 'xyz'],
        [1, 'NEWLINE'],
        [5, 'INDENT'],
        [5, 'IDENTIFIER', 'e2f'],
        [5, 'NEWLINE'],
        [6, 'INDENT'],
        [6, 'IDENTIFIER', 'n12'],
        [6, 'NEWLINE'],
        [7, '!Dedent'],
        [7, 'DEDENT'],
        [7, 'DEDENT'],
        [7, 'IDENTIFIER', 'n2'],
        [7, 'NEWLINE'],
      ]);
    });

    it('closes every open level at end of input with line 0', () => {
      expect(lex('if a:\n  if b:\n    c\n')).toEqual([
        [1, 'IF', 'if'],
        [1, 'IDENTIFIER', 'a'],
        [1, 'COLON', ':'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IF', 'if'],
        [2, 'IDENTIFIER', 'b'],
        [2, 'COLON', ':'],
        [2, 'NEWLINE'],
        [3, 'INDENT'],
        [3, 'IDENTIFIER', 'c'],
        [3, 'NEWLINE'],
        [0, 'DEDENT'],
        [0, 'DEDENT'],
      ]);
    });

    it('indents a first line that starts with spaces', () => {
      expect(lex('    x\n')).toEqual([
        [1, 'INDENT'],
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('emits nothing for empty input', () => {
      expect(lex('')).toEqual([]);
    });
  });

  describe('tab stops', () => {
    it('measures a tab as the next multiple of eight', () => {
      expect(lex('if a:\n\tb\n        c\n')).toEqual([
        [1, 'IF', 'if'],
        [1, 'IDENTIFIER', 'a'],
        [1, 'COLON', ':'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IDENTIFIER', 'b'],
        [2, 'NEWLINE'],
        [3, 'IDENTIFIER', 'c'],
        [3, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('rounds spaces before a tab up to the same stop', () => {
      expect(lex('x\n \ty\n\tz\n')).toEqual([
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IDENTIFIER', 'y'],
        [2, 'NEWLINE'],
        [3, 'IDENTIFIER', 'z'],
        [3, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('treats two tabs like sixteen spaces', () => {
      expect(lex('x\n\t\ty\n                z\n')).toEqual([
        [1, 'IDENTIFIER', 'x'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IDENTIFIER', 'y'],
        [2, 'NEWLINE'],
        [3, 'IDENTIFIER', 'z'],
        [3, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });
  });

  describe('blank lines', () => {
    it('ignores the indentation of comment-only lines', () => {
      expect(lex('if a:\n    b\n  # note\n    c\n')).toEqual([
        [1, 'IF', 'if'],
        [1, 'IDENTIFIER', 'a'],
        [1, 'COLON', ':'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IDENTIFIER', 'b'],
        [2, 'NEWLINE'],
        [4, 'IDENTIFIER', 'c'],
        [4, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('emits no NEWLINE for whitespace-only lines', () => {
      expect(lex('a\n   \n\t\nb\n')).toEqual([
        [1, 'IDENTIFIER', 'a'],
        [1, 'NEWLINE'],
        [4, 'IDENTIFIER', 'b'],
        [4, 'NEWLINE'],
      ]);
    });
  });

  describe('line endings', () => {
    it('treats CRLF like LF', () => {
      expect(lex('a\r\n  b\r\n')).toEqual(lex('a\n  b\n'));
      expect(lex('a\r\n  b\r\n')).toEqual([
        [1, 'IDENTIFIER', 'a'],
        [1, 'NEWLINE'],
        [2, 'INDENT'],
        [2, 'IDENTIFIER', 'b'],
        [2, 'NEWLINE'],
        [0, 'DEDENT'],
      ]);
    });

    it('ends the last line without a trailing newline', () => {
      expect(lex('pass')).toEqual([
        [1, 'PASS', 'pass'],
        [1, 'NEWLINE'],
      ]);
    });
  });

  describe('invariant', () => {
    it('throws when the indent stack has lost its base level', () => {
      const state = createLexerState('');
      state.indentStack.splice(0);

      expect(() => nextToken(state)).toThrow(IndentationInvariantError);
      expect(() => nextToken(state)).toThrow('Indentation stack is empty');
    });
  });
});
