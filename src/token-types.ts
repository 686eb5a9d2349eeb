// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Layout
  NEWLINE: 'NEWLINE',
  INDENT: 'INDENT',
  DEDENT: 'DEDENT',

  // Keywords
  FALSE: 'FALSE',
  NONE: 'NONE',
  TRUE: 'TRUE',
  AND: 'AND',
  AS: 'AS',
  ASSERT: 'ASSERT',
  BREAK: 'BREAK',
  CLASS: 'CLASS',
  CONTINUE: 'CONTINUE',
  DEF: 'DEF',
  DEL: 'DEL',
  ELIF: 'ELIF',
  ELSE: 'ELSE',
  EXCEPT: 'EXCEPT',
  FINALLY: 'FINALLY',
  FOR: 'FOR',
  FROM: 'FROM',
  GLOBAL: 'GLOBAL',
  IF: 'IF',
  IMPORT: 'IMPORT',
  IN: 'IN',
  IS: 'IS',
  LAMBDA: 'LAMBDA',
  NONLOCAL: 'NONLOCAL',
  NOT: 'NOT',
  OR: 'OR',
  PASS: 'PASS',
  RAISE: 'RAISE',
  RETURN: 'RETURN',
  TRY: 'TRY',
  WHILE: 'WHILE',
  WITH: 'WITH',
  YIELD: 'YIELD',

  // Arithmetic and bitwise operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  DOUBLE_STAR: 'DOUBLE_STAR', // **
  SLASH: 'SLASH', // /
  DOUBLE_SLASH: 'DOUBLE_SLASH', // //
  PERCENT: 'PERCENT', // %
  AT: 'AT', // @
  LSHIFT: 'LSHIFT', // <<
  RSHIFT: 'RSHIFT', // >>
  AMPERSAND: 'AMPERSAND', // &
  PIPE: 'PIPE', // |
  CARET: 'CARET', // ^
  TILDE: 'TILDE', // ~

  // Comparison operators
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=
  EQ: 'EQ', // ==
  NE: 'NE', // !=

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  DOT: 'DOT', // .
  ELLIPSIS: 'ELLIPSIS', // ...
  SEMI: 'SEMI', // ;
  ARROW: 'ARROW', // ->

  // Assignment
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  DOUBLE_SLASH_ASSIGN: 'DOUBLE_SLASH_ASSIGN', // //=
  PERCENT_ASSIGN: 'PERCENT_ASSIGN', // %=
  AT_ASSIGN: 'AT_ASSIGN', // @=
  AMPERSAND_ASSIGN: 'AMPERSAND_ASSIGN', // &=
  PIPE_ASSIGN: 'PIPE_ASSIGN', // |=
  CARET_ASSIGN: 'CARET_ASSIGN', // ^=
  RSHIFT_ASSIGN: 'RSHIFT_ASSIGN', // >>=
  LSHIFT_ASSIGN: 'LSHIFT_ASSIGN', // <<=
  DOUBLE_STAR_ASSIGN: 'DOUBLE_STAR_ASSIGN', // **=

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  BYTES: 'BYTES',
  DEC_INTEGER: 'DEC_INTEGER',
  BIN_INTEGER: 'BIN_INTEGER',
  OCT_INTEGER: 'OCT_INTEGER',
  HEX_INTEGER: 'HEX_INTEGER',
  FLOAT: 'FLOAT',
  IMAGINARY: 'IMAGINARY',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types whose value is a string */
export type TextTokenType = Exclude<TokenType, typeof TOKEN_TYPES.BYTES>;

/** Token types whose value is a numeric lexeme kept verbatim from source */
export type NumericTokenType =
  | typeof TOKEN_TYPES.DEC_INTEGER
  | typeof TOKEN_TYPES.BIN_INTEGER
  | typeof TOKEN_TYPES.OCT_INTEGER
  | typeof TOKEN_TYPES.HEX_INTEGER
  | typeof TOKEN_TYPES.FLOAT
  | typeof TOKEN_TYPES.IMAGINARY;

/**
 * Byte-string literal. Carries the decoded bytes rather than source text.
 */
export interface BytesToken {
  readonly type: typeof TOKEN_TYPES.BYTES;
  readonly value: Uint8Array;
}

/**
 * Every other token. `value` is the canonical lexeme for keywords and
 * operators, the exact source text for identifiers and numbers, and the
 * decoded content for strings.
 */
export interface TextToken {
  readonly type: TextTokenType;
  readonly value: string;
}

export type Token = TextToken | BytesToken;

export function makeToken(
  type: TextTokenType,
  value: string
): TextToken {
  return { type, value };
}

export function makeBytesToken(value: Uint8Array): BytesToken {
  return { type: TOKEN_TYPES.BYTES, value };
}

export function isBytesToken(token: Token): token is BytesToken {
  return token.type === TOKEN_TYPES.BYTES;
}

/** Layout tokens carry no source text */
export const NEWLINE_TOKEN: TextToken = makeToken(TOKEN_TYPES.NEWLINE, '\n');
export const INDENT_TOKEN: TextToken = makeToken(TOKEN_TYPES.INDENT, '');
export const DEDENT_TOKEN: TextToken = makeToken(TOKEN_TYPES.DEDENT, '');
