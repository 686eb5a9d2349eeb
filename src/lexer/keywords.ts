/**
 * Keyword Lookup Table
 */

import type { TextTokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Reserved words. Soft keywords (async, await, match, case) stay identifiers. */
export const KEYWORDS: Readonly<Record<string, TextTokenType>> = Object.freeze({
  False: TOKEN_TYPES.FALSE,
  None: TOKEN_TYPES.NONE,
  True: TOKEN_TYPES.TRUE,
  and: TOKEN_TYPES.AND,
  as: TOKEN_TYPES.AS,
  assert: TOKEN_TYPES.ASSERT,
  break: TOKEN_TYPES.BREAK,
  class: TOKEN_TYPES.CLASS,
  continue: TOKEN_TYPES.CONTINUE,
  def: TOKEN_TYPES.DEF,
  del: TOKEN_TYPES.DEL,
  elif: TOKEN_TYPES.ELIF,
  else: TOKEN_TYPES.ELSE,
  except: TOKEN_TYPES.EXCEPT,
  finally: TOKEN_TYPES.FINALLY,
  for: TOKEN_TYPES.FOR,
  from: TOKEN_TYPES.FROM,
  global: TOKEN_TYPES.GLOBAL,
  if: TOKEN_TYPES.IF,
  import: TOKEN_TYPES.IMPORT,
  in: TOKEN_TYPES.IN,
  is: TOKEN_TYPES.IS,
  lambda: TOKEN_TYPES.LAMBDA,
  nonlocal: TOKEN_TYPES.NONLOCAL,
  not: TOKEN_TYPES.NOT,
  or: TOKEN_TYPES.OR,
  pass: TOKEN_TYPES.PASS,
  raise: TOKEN_TYPES.RAISE,
  return: TOKEN_TYPES.RETURN,
  try: TOKEN_TYPES.TRY,
  while: TOKEN_TYPES.WHILE,
  with: TOKEN_TYPES.WITH,
  yield: TOKEN_TYPES.YIELD,
});

/** Keyword token type for `word`, or undefined for a plain identifier */
export function lookupKeyword(word: string): TextTokenType | undefined {
  return Object.prototype.hasOwnProperty.call(KEYWORDS, word)
    ? KEYWORDS[word]
    : undefined;
}
