/**
 * Indentation Tracker
 * Line-start decisions producing INDENT, DEDENT and Dedent errors
 */

import { IndentationInvariantError } from '../error-classes.js';
import { DEDENT_TOKEN, INDENT_TOKEN } from '../token-types.js';
import { errorItem, type LexItem, okItem } from './helpers.js';
import {
  type LexerState,
  type LineCursor,
  NO_DEDENT,
  peek,
} from './state.js';

/** Outcome of evaluating a fresh physical line */
export type LineStart =
  | { readonly kind: 'blank' }
  | { readonly kind: 'indent'; readonly item: LexItem }
  | { readonly kind: 'scan' };

function topOfStack(state: LexerState): number {
  const top = state.indentStack[state.indentStack.length - 1];
  if (top === undefined) {
    throw new IndentationInvariantError();
  }
  return top;
}

/** A line with nothing but indentation and possibly a comment */
export function isBlankLine(line: LineCursor): boolean {
  const first = peek(line);
  return first === '' || first === '#';
}

/**
 * Compare a line's indentation with the stack. Pushes on indent; on dedent
 * pops every deeper level and records how many DEDENT tokens are owed.
 */
export function processLineStart(state: LexerState, line: LineCursor): LineStart {
  const previous = topOfStack(state);

  if (isBlankLine(line)) {
    return { kind: 'blank' };
  }

  if (line.indentation > previous) {
    state.indentStack.push(line.indentation);
    return { kind: 'indent', item: okItem(line.number, INDENT_TOKEN) };
  }

  if (line.indentation < previous) {
    let popped = 0;
    while (line.indentation < topOfStack(state)) {
      state.indentStack.pop();
      popped++;
    }

    state.dedent =
      topOfStack(state) === line.indentation
        ? { kind: 'balanced', remaining: popped }
        : { kind: 'mismatched', remaining: popped - 1 };
  }

  return { kind: 'scan' };
}

export function hasPendingDedent(state: LexerState): boolean {
  return state.dedent.kind !== 'none';
}

/**
 * Emit one item of the pending dedent run. A mismatched run reports the
 * Dedent error first, then drains like a balanced one.
 */
export function drainDedent(state: LexerState, line: LineCursor): LexItem {
  const { dedent } = state;

  if (dedent.kind === 'none') {
    return errorItem(line.number, 'Internal', { detail: 'no pending dedent' });
  }

  if (dedent.kind === 'mismatched') {
    state.dedent =
      dedent.remaining > 0
        ? { kind: 'balanced', remaining: dedent.remaining }
        : NO_DEDENT;
    return errorItem(line.number, 'Dedent');
  }

  const remaining = dedent.remaining - 1;
  state.dedent = remaining > 0 ? { kind: 'balanced', remaining } : NO_DEDENT;
  return okItem(line.number, DEDENT_TOKEN);
}

/**
 * End of input: one DEDENT per level above the base, tagged with line 0,
 * then null once the stack is back to its base level.
 */
export function drainIndentStack(state: LexerState): LexItem | null {
  if (state.indentStack.length === 0) {
    throw new IndentationInvariantError();
  }
  if (state.indentStack.length === 1) {
    return null;
  }
  state.indentStack.pop();
  return okItem(0, DEDENT_TOKEN);
}
