/**
 * Unicode Character Names
 * Resolves `\N{NAME}` escapes against the Unicode character database plus
 * the algorithmically named CJK ideograph and Hangul syllable blocks
 */

import unicodeNames from '@unicode/unicode-15.1.0/Names/index.js';

const CJK_PREFIX = 'CJK UNIFIED IDEOGRAPH-';
const HANGUL_PREFIX = 'HANGUL SYLLABLE ';
const HANGUL_BASE = 0xac00;

// Jamo short names, in syllable composition order
const HANGUL_LEADING = 'G GG N D DD R M B BB S SS _ J JJ C K T P H'.split(' ');
const HANGUL_VOWELS =
  'A AE YA YAE EO E YEO YE O WA WAE OE YO U WEO WE WI YU EU YI I'.split(' ');
const HANGUL_TRAILING = [
  '',
  ...'G GG GS N NJ NH D L LG LM LB LS LT LP LH M B BS S SS NG J C K T P H'.split(' '),
];

/** Unified ideograph blocks whose names are derived from the code point */
const CJK_RANGES: readonly (readonly [number, number])[] = [
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b739],
  [0x2b740, 0x2b81d],
  [0x2b820, 0x2cea1],
  [0x2ceb0, 0x2ebe0],
  [0x2ebf0, 0x2ee5d],
  [0x30000, 0x3134a],
  [0x31350, 0x323af],
];

const HEX_CODE_POINT = /^[0-9A-F]{4,6}$/;

let namedCodePoints: ReadonlyMap<string, number> | undefined;
let hangulSyllables: ReadonlyMap<string, number> | undefined;

/** Reverse of the database's code point to name table, built on first use */
function getNamedCodePoints(): ReadonlyMap<string, number> {
  if (!namedCodePoints) {
    const names = new Map<string, number>();
    for (const [codePoint, name] of unicodeNames) {
      // Range and control entries carry a label like <control>, not a name
      if (!name.startsWith('<')) {
        names.set(name, codePoint);
      }
    }
    namedCodePoints = names;
  }
  return namedCodePoints;
}

function getHangulSyllables(): ReadonlyMap<string, number> {
  if (!hangulSyllables) {
    const names = new Map<string, number>();
    HANGUL_LEADING.forEach((l, li) => {
      const leading = l === '_' ? '' : l;
      HANGUL_VOWELS.forEach((v, vi) => {
        HANGUL_TRAILING.forEach((t, ti) => {
          const offset = (li * HANGUL_VOWELS.length + vi) * HANGUL_TRAILING.length + ti;
          names.set(`${leading}${v}${t}`, HANGUL_BASE + offset);
        });
      });
    });
    hangulSyllables = names;
  }
  return hangulSyllables;
}

function lookupCjkIdeograph(hex: string): number | undefined {
  if (!HEX_CODE_POINT.test(hex)) {
    return undefined;
  }
  const codePoint = parseInt(hex, 16);
  return CJK_RANGES.some(([low, high]) => codePoint >= low && codePoint <= high)
    ? codePoint
    : undefined;
}

/**
 * Code point for a Unicode character name, or undefined when the name is
 * not known. Matching ignores case.
 */
export function lookupUnicodeName(name: string): number | undefined {
  const key = name.toUpperCase();

  const listed = getNamedCodePoints().get(key);
  if (listed !== undefined) {
    return listed;
  }
  if (key.startsWith(CJK_PREFIX)) {
    return lookupCjkIdeograph(key.slice(CJK_PREFIX.length));
  }
  if (key.startsWith(HANGUL_PREFIX)) {
    return getHangulSyllables().get(key.slice(HANGUL_PREFIX.length));
  }
  return undefined;
}
