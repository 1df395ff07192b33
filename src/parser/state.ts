/**
 * Parser State
 * Cursor over classified lines with lookahead helpers
 */

import {
  type LineStream,
  atEnd,
  createLineStream,
  peek as peekLine,
  take,
} from '../lexer/index.js';
import type {
  LineKind,
  LineToken,
  SourceSpan,
} from '../types.js';
import {
  LINE_KINDS,
  type ParseError,
  createParseError,
  makeSpan,
} from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState extends LineStream {
  /**
   * Fence kinds of the structured delimited blocks currently open, innermost
   * last. A nested section stops at the closing fence of its container.
   */
  readonly openFences: LineKind[];
  /** Number of conditional directive bodies currently open */
  directiveDepth: number;
}

export function createParserState(tokens: readonly LineToken[]): ParserState {
  return { ...createLineStream(tokens), openFences: [], directiveDepth: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** Current line token */
export function current(state: ParserState): LineToken {
  return peekLine(state);
}

export function peek(state: ParserState, offset = 1): LineToken {
  return peekLine(state, offset);
}

export function advance(state: ParserState): LineToken {
  return take(state);
}

export function isAtEnd(state: ParserState): boolean {
  return atEnd(state);
}

/** Whether the current token has one of `kinds` */
export function check(state: ParserState, ...kinds: LineKind[]): boolean {
  return kinds.includes(current(state).kind);
}

/**
 * Build a ParseError from the registry template of `errorId`, located at
 * the start of `token`.
 */
export function parseErrorAt(
  token: LineToken,
  errorId: string,
  context: Record<string, unknown> = {}
): ParseError {
  return createParseError(errorId, context, token.span.start);
}

/**
 * Consume a token of `kind` or throw. The error is reported at the token
 * where the expected one is missing.
 */
export function expect(
  state: ParserState,
  kind: LineKind,
  errorId: string,
  context?: Record<string, unknown>
): LineToken {
  if (!check(state, kind)) {
    throw parseErrorAt(current(state), errorId, context);
  }
  return advance(state);
}

/** Blank lines and `//` comments carry no content between blocks */
export function skipBlankAndComments(state: ParserState): void {
  while (check(state, LINE_KINDS.BLANK, LINE_KINDS.LINE_COMMENT)) {
    advance(state);
  }
}

/** Most recently consumed token, or the first token before any is consumed */
export function previous(state: ParserState): LineToken {
  return peekLine(state, state.pos > 0 ? -1 : 0);
}

/** Span from the start of `first` to the end of the last consumed token */
export function spanFrom(state: ParserState, first: LineToken): SourceSpan {
  const last = previous(state);
  const end = last.line >= first.line ? last.span.end : first.span.end;
  return makeSpan(first.span.start, end);
}
