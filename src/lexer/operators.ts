/**
 * Operator Lookup Tables
 */

import type { TextTokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Readonly<Record<string, TextTokenType>> = {
  '**=': TOKEN_TYPES.DOUBLE_STAR_ASSIGN,
  '//=': TOKEN_TYPES.DOUBLE_SLASH_ASSIGN,
  '>>=': TOKEN_TYPES.RSHIFT_ASSIGN,
  '<<=': TOKEN_TYPES.LSHIFT_ASSIGN,
  '...': TOKEN_TYPES.ELLIPSIS,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TextTokenType>> = {
  '**': TOKEN_TYPES.DOUBLE_STAR,
  '//': TOKEN_TYPES.DOUBLE_SLASH,
  '<<': TOKEN_TYPES.LSHIFT,
  '>>': TOKEN_TYPES.RSHIFT,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '->': TOKEN_TYPES.ARROW,
  '+=': TOKEN_TYPES.PLUS_ASSIGN,
  '-=': TOKEN_TYPES.MINUS_ASSIGN,
  '*=': TOKEN_TYPES.STAR_ASSIGN,
  '/=': TOKEN_TYPES.SLASH_ASSIGN,
  '%=': TOKEN_TYPES.PERCENT_ASSIGN,
  '@=': TOKEN_TYPES.AT_ASSIGN,
  '&=': TOKEN_TYPES.AMPERSAND_ASSIGN,
  '|=': TOKEN_TYPES.PIPE_ASSIGN,
  '^=': TOKEN_TYPES.CARET_ASSIGN,
};

/** Single-character operator lookup table. `!` has no entry: only `!=` is valid. */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TextTokenType>> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '@': TOKEN_TYPES.AT,
  '&': TOKEN_TYPES.AMPERSAND,
  '|': TOKEN_TYPES.PIPE,
  '^': TOKEN_TYPES.CARET,
  '~': TOKEN_TYPES.TILDE,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '=': TOKEN_TYPES.ASSIGN,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  '.': TOKEN_TYPES.DOT,
  ';': TOKEN_TYPES.SEMI,
};

export const OPENING_BRACKETS: ReadonlySet<string> = new Set(['(', '[', '{']);
export const CLOSING_BRACKETS: ReadonlySet<string> = new Set([')', ']', '}']);
