/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError, LEXER_ERROR_IDS, type LexerErrorContext, type LexerErrorKind } from './errors.js';
export type { LexItem, LexResult } from './helpers.js';
export { KEYWORDS, lookupKeyword } from './keywords.js';
export {
  formatToken,
  Lexer,
  type LexerCallbacks,
  type LexErrorEvent,
  tokenize,
  type TokenEvent,
  type TokenizeOptions,
} from './lexer.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken } from './tokenizer.js';
export { lookupUnicodeName } from './unicode-names.js';
