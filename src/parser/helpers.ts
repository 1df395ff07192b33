/**
 * Parser Helpers
 * Line kind predicates and lookahead utilities
 * @internal This module contains internal parser utilities
 */

import type {
  BlockMetadata,
  DelimiterKind,
  LineKind,
  LineToken,
  ParagraphNode,
} from '../types.js';
import { LINE_KINDS, makeSpan } from '../types.js';
import { type ParserState, current, peek } from './state.js';

// ============================================================
// KIND SETS
// ============================================================

/** @internal */
export const METADATA_KINDS: ReadonlySet<LineKind> = new Set([
  LINE_KINDS.BLOCK_ANCHOR,
  LINE_KINDS.BLOCK_ATTRS,
  LINE_KINDS.BLOCK_TITLE,
]);

const DELIMITER_KINDS: ReadonlySet<LineKind> = new Set([
  LINE_KINDS.DELIM_LISTING,
  LINE_KINDS.DELIM_LITERAL,
  LINE_KINDS.DELIM_QUOTE,
  LINE_KINDS.DELIM_EXAMPLE,
  LINE_KINDS.DELIM_SIDEBAR,
  LINE_KINDS.DELIM_OPEN,
  LINE_KINDS.DELIM_COMMENT,
  LINE_KINDS.DELIM_PASSTHROUGH,
]);

/** Fences whose interior is kept verbatim */
const RAW_DELIMITER_KINDS: ReadonlySet<LineKind> = new Set([
  LINE_KINDS.DELIM_LISTING,
  LINE_KINDS.DELIM_LITERAL,
  LINE_KINDS.DELIM_PASSTHROUGH,
  LINE_KINDS.DELIM_COMMENT,
]);

/** @internal */
export const LIST_MARKER_KINDS: ReadonlySet<LineKind> = new Set([
  LINE_KINDS.UL_ITEM,
  LINE_KINDS.OL_ITEM,
  LINE_KINDS.DESC_TERM,
]);

/** Lines that end a paragraph when they follow one of its lines */
const PARAGRAPH_INTERRUPTS: ReadonlySet<LineKind> = new Set([
  LINE_KINDS.SECTION,
  LINE_KINDS.UL_ITEM,
  LINE_KINDS.OL_ITEM,
  LINE_KINDS.DESC_TERM,
  LINE_KINDS.TABLE_DELIM,
  LINE_KINDS.DELIM_LISTING,
  LINE_KINDS.DELIM_LITERAL,
  LINE_KINDS.ADMONITION,
  LINE_KINDS.BLOCK_MACRO,
  LINE_KINDS.DIRECTIVE,
]);

// ============================================================
// PREDICATES
// ============================================================

/** @internal */
export function isDelimiterKind(kind: LineKind): kind is DelimiterKind {
  return DELIMITER_KINDS.has(kind);
}

/** @internal */
export function isRawDelimiter(kind: DelimiterKind): boolean {
  return RAW_DELIMITER_KINDS.has(kind);
}

/** @internal */
export function interruptsParagraph(kind: LineKind): boolean {
  return PARAGRAPH_INTERRUPTS.has(kind);
}

/**
 * Delimited block opener at the current position: a fence, or a `[stem]`
 * line directly in front of one.
 * @internal
 */
export function opensDelimitedBlock(state: ParserState): boolean {
  const kind = peek(state, 0).kind;
  if (kind === LINE_KINDS.STEM_ATTRS) {
    return isDelimiterKind(peek(state, 1).kind);
  }
  return isDelimiterKind(kind);
}

/** `endif::` line */
export function isEndif(token: LineToken): boolean {
  return token.kind === LINE_KINDS.DIRECTIVE && token.head === 'endif';
}

// ============================================================
// LOOKAHEAD
// ============================================================

/**
 * First token after the metadata run starting at the current position.
 * Nothing is consumed.
 * @internal
 */
export function peekPastMetadata(state: ParserState): LineToken {
  let offset = 0;
  while (METADATA_KINDS.has(peek(state, offset).kind)) {
    offset++;
  }
  return peek(state, offset);
}

/**
 * Whether `token` closes a container that is open around the current
 * position: the fence of the innermost structured delimited block, or an
 * `endif::` inside a conditional body.
 * @internal
 */
export function closesEnclosing(
  state: ParserState,
  token: LineToken
): boolean {
  const fence = state.openFences[state.openFences.length - 1];
  if (fence !== undefined && token.kind === fence) return true;
  return state.directiveDepth > 0 && isEndif(token);
}

// ============================================================
// NODES
// ============================================================

/** Paragraph with no content, placed at the current token */
export function emptyParagraph(
  state: ParserState,
  metadata: BlockMetadata | null
): ParagraphNode {
  const at = current(state).span.start;
  return {
    type: 'Paragraph',
    metadata,
    content: [],
    span: makeSpan(at, at),
  };
}
