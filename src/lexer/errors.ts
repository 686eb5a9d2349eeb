/**
 * Lexer Errors
 */

import { PyscanError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';

/** Closed set of diagnosable lexer error kinds */
export type LexerErrorKind =
  | 'BadLineContinuation'
  | 'UnterminatedString'
  | 'UnterminatedTripleString'
  | 'InvalidCharacter'
  | 'Dedent'
  | 'HexEscapeShort'
  | 'MalformedUnicodeEscape'
  | 'MalformedNamedUnicodeEscape'
  | 'UnknownUnicodeName'
  | 'MissingDigits'
  | 'MalformedFloat'
  | 'MalformedImaginary'
  | 'InvalidSymbol'
  | 'Internal';

export const LEXER_ERROR_IDS: Readonly<Record<LexerErrorKind, string>> = {
  BadLineContinuation: 'PYSCAN-L001',
  UnterminatedString: 'PYSCAN-L002',
  UnterminatedTripleString: 'PYSCAN-L003',
  InvalidCharacter: 'PYSCAN-L004',
  Dedent: 'PYSCAN-L005',
  HexEscapeShort: 'PYSCAN-L006',
  MalformedUnicodeEscape: 'PYSCAN-L007',
  MalformedNamedUnicodeEscape: 'PYSCAN-L008',
  UnknownUnicodeName: 'PYSCAN-L009',
  MissingDigits: 'PYSCAN-L010',
  MalformedFloat: 'PYSCAN-L011',
  MalformedImaginary: 'PYSCAN-L012',
  InvalidSymbol: 'PYSCAN-L013',
  Internal: 'PYSCAN-L014',
};

/**
 * Extra data attached to an error kind: the offending character for
 * InvalidCharacter/InvalidSymbol, the name for UnknownUnicodeName.
 */
export type LexerErrorContext = {
  readonly char?: string | undefined;
  readonly name?: string | undefined;
  readonly detail?: string | undefined;
};

export class LexerError extends PyscanError {
  readonly kind: LexerErrorKind;
  // Lexer errors always carry the line they were detected on
  override readonly line: number;
  override readonly context: LexerErrorContext;

  constructor(kind: LexerErrorKind, line: number, context: LexerErrorContext = {}) {
    const errorId = LEXER_ERROR_IDS[kind];
    const definition = ERROR_REGISTRY.get(errorId);

    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, { ...context }),
      line,
      context: { ...context },
    });

    this.name = 'LexerError';
    this.kind = kind;
    this.line = line;
    this.context = context;
  }
}
