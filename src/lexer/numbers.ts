/**
 * Numeric Literal Engine
 * Radix integers, decimal integers, floats and imaginary literals
 */

import type { NumericTokenType } from '../token-types.js';
import { makeToken, TOKEN_TYPES } from '../token-types.js';
import type { LexerErrorKind } from './errors.js';
import {
  errorItem,
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isOctalDigit,
  type LexItem,
  okItem,
} from './helpers.js';
import { advance, type LineCursor, peek } from './state.js';

/** Partial literal threaded through the float-suffix chain */
type NumberScan =
  | { readonly ok: true; readonly type: NumericTokenType; readonly text: string }
  | { readonly ok: false; readonly kind: LexerErrorKind };

const RADIX_PREFIXES: Readonly<
  Record<string, { type: NumericTokenType; isDigit: (ch: string) => boolean }>
> = {
  o: { type: TOKEN_TYPES.OCT_INTEGER, isDigit: isOctalDigit },
  x: { type: TOKEN_TYPES.HEX_INTEGER, isDigit: isHexDigit },
  b: { type: TOKEN_TYPES.BIN_INTEGER, isDigit: isBinaryDigit },
};

const FLOAT_MARKERS: ReadonlySet<string> = new Set(['.', 'e', 'E', 'j', 'J']);

function failure(kind: LexerErrorKind): NumberScan {
  return { ok: false, kind };
}

function consumeWhile(
  line: LineCursor,
  text: string,
  predicate: (ch: string) => boolean
): string {
  let result = text;
  while (predicate(peek(line))) {
    result += advance(line);
  }
  return result;
}

/** At least one digit must follow, else MissingDigits */
function requireDigits(
  line: LineCursor,
  text: string,
  type: NumericTokenType,
  predicate: (ch: string) => boolean = isDigit
): NumberScan {
  if (!predicate(peek(line))) {
    return failure('MissingDigits');
  }
  return { ok: true, type, text: consumeWhile(line, text, predicate) };
}

function isDecimal(scan: NumberScan): boolean {
  return scan.ok && scan.type === TOKEN_TYPES.DEC_INTEGER;
}

function isDecimalOrFloat(scan: NumberScan): boolean {
  return isDecimal(scan) || (scan.ok && scan.type === TOKEN_TYPES.FLOAT);
}

function scanPointFloat(line: LineCursor, scan: NumberScan): NumberScan {
  if (!scan.ok || peek(line) !== '.') {
    return scan;
  }
  if (!isDecimal(scan)) {
    advance(line);
    consumeWhile(line, '', isDigit);
    return failure('MalformedFloat');
  }

  const text = scan.text + advance(line);
  // Digits after the point are optional: `23.` is a float
  return { ok: true, type: TOKEN_TYPES.FLOAT, text: consumeWhile(line, text, isDigit) };
}

function scanExponent(line: LineCursor, scan: NumberScan): NumberScan {
  const marker = peek(line);
  if (!scan.ok || (marker !== 'e' && marker !== 'E')) {
    return scan;
  }
  let text = scan.text + advance(line);
  const sign = peek(line);
  if (sign === '+' || sign === '-') {
    text += advance(line);
  }
  if (!isDecimalOrFloat(scan)) {
    consumeWhile(line, '', isDigit);
    return failure('MalformedFloat');
  }
  return requireDigits(line, text, TOKEN_TYPES.FLOAT);
}

function scanImaginary(line: LineCursor, scan: NumberScan): NumberScan {
  const suffix = peek(line);
  if (!scan.ok || (suffix !== 'j' && suffix !== 'J')) {
    return scan;
  }
  if (!isDecimalOrFloat(scan)) {
    advance(line);
    return failure('MalformedImaginary');
  }
  return { ok: true, type: TOKEN_TYPES.IMAGINARY, text: scan.text + advance(line) };
}

/**
 * Point, exponent and imaginary extensions, each optional. A rejected
 * extension is consumed with its digits so the literal yields one error.
 */
function scanFloatSuffix(line: LineCursor, scan: NumberScan): NumberScan {
  return scanImaginary(line, scanExponent(line, scanPointFloat(line, scan)));
}

/** Like scanFloatSuffix, but at least one extension must be present */
function requireFloatSuffix(line: LineCursor, scan: NumberScan): NumberScan {
  if (!FLOAT_MARKERS.has(peek(line))) {
    return failure('MalformedFloat');
  }
  return scanFloatSuffix(line, scan);
}

function scanZeroPrefixed(line: LineCursor): NumberScan {
  const text = advance(line);
  const radix = RADIX_PREFIXES[peek(line).toLowerCase()];

  if (radix) {
    const prefixed = text + advance(line);
    return scanFloatSuffix(
      line,
      requireDigits(line, prefixed, radix.type, radix.isDigit)
    );
  }

  const zeros = consumeWhile(line, text, (ch) => ch === '0');

  // Leading zeros on a nonzero decimal are only valid as part of a float
  if (isDigit(peek(line))) {
    return requireFloatSuffix(
      line,
      requireDigits(line, zeros, TOKEN_TYPES.DEC_INTEGER)
    );
  }

  return scanFloatSuffix(line, {
    ok: true,
    type: TOKEN_TYPES.DEC_INTEGER,
    text: zeros,
  });
}

function scanDotPrefixed(line: LineCursor): NumberScan {
  const text = advance(line);
  const fraction = requireDigits(line, text, TOKEN_TYPES.FLOAT);
  return scanImaginary(line, scanExponent(line, fraction));
}

/**
 * Read a numeric literal starting at a digit, or at a `.` followed by a
 * digit. The token keeps the literal's exact source text.
 */
export function readNumber(line: LineCursor): LexItem {
  const first = peek(line);
  let scan: NumberScan;

  if (first === '0') {
    scan = scanZeroPrefixed(line);
  } else if (first === '.') {
    scan = scanDotPrefixed(line);
  } else {
    scan = scanFloatSuffix(
      line,
      requireDigits(line, '', TOKEN_TYPES.DEC_INTEGER)
    );
  }

  return scan.ok
    ? okItem(line.number, makeToken(scan.type, scan.text))
    : errorItem(line.number, scan.kind);
}
