/**
 * pyscan
 * Lexer for Python-family source text
 */

export {
  createLexerState,
  formatToken,
  KEYWORDS,
  Lexer,
  LEXER_ERROR_IDS,
  LexerError,
  lookupKeyword,
  lookupUnicodeName,
  nextToken,
  tokenize,
  type LexerCallbacks,
  type LexerErrorContext,
  type LexerErrorKind,
  type LexerState,
  type LexErrorEvent,
  type LexItem,
  type LexResult,
  type TokenEvent,
  type TokenizeOptions,
} from './lexer/index.js';
export {
  isBytesToken,
  makeBytesToken,
  makeToken,
  TOKEN_TYPES,
  type BytesToken,
  type NumericTokenType,
  type TextToken,
  type TextTokenType,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  CliError,
  createError,
  IndentationInvariantError,
  PyscanError,
  type PyscanErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
