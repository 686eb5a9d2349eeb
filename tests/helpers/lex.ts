/**
 * Test Helpers
 * Flattened views of lexer output for compact assertions
 */

import { isBytesToken, tokenize, TOKEN_TYPES } from '../../src/index.js';
import type { LexerError, LexItem } from '../../src/index.js';

/**
 * `[line, TYPE]` for layout tokens, `[line, TYPE, value]` for the rest.
 * Errors render as `[line, '!Kind']` or `[line, '!Kind', argument]`, where
 * the argument is the offending character or name.
 */
export type Rendered =
  | readonly [number, string]
  | readonly [number, string, string | number[]];

const LAYOUT: ReadonlySet<string> = new Set([
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.INDENT,
  TOKEN_TYPES.DEDENT,
]);

function renderError(line: number, error: LexerError): Rendered {
  const { char, name, detail } = error.context;
  const argument = char ?? name ?? detail;
  return argument === undefined
    ? [line, `!${error.kind}`]
    : [line, `!${error.kind}`, argument];
}

export function render(item: LexItem): Rendered {
  const { line, result } = item;
  if (!result.ok) {
    return renderError(line, result.error);
  }

  const { token } = result;
  if (isBytesToken(token)) {
    return [line, token.type, Array.from(token.value)];
  }
  return LAYOUT.has(token.type) ? [line, token.type] : [line, token.type, token.value];
}

/** Tokenize `source` and render every item */
export function lex(source: string): Rendered[] {
  return tokenize(source).map(render);
}
