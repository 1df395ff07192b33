import type { SourceSpan } from './source-location.js';

// ============================================================
// LINE KINDS
// ============================================================

export const LINE_KINDS = {
  EOF: 'EOF',
  BLANK: 'BLANK',

  // Metadata lines
  BLOCK_ANCHOR: 'BLOCK_ANCHOR', // [[id,text]]
  BLOCK_ATTRS: 'BLOCK_ATTRS', // [a=b,c]
  BLOCK_TITLE: 'BLOCK_TITLE', // .Title

  // Blocks
  SECTION: 'SECTION', // = .. ======
  ADMONITION: 'ADMONITION', // NOTE: ...
  LINE_COMMENT: 'LINE_COMMENT', // //...

  // Breaks
  THEMATIC_BREAK: 'THEMATIC_BREAK', // ''' --- ***
  PAGE_BREAK: 'PAGE_BREAK', // <<<

  // Lists
  UL_ITEM: 'UL_ITEM', // * .. ******
  OL_ITEM: 'OL_ITEM', // . .. ......
  DESC_TERM: 'DESC_TERM', // term::
  LIST_CONT: 'LIST_CONT', // +

  // Delimited block fences
  DELIM_LISTING: 'DELIM_LISTING', // ----
  DELIM_LITERAL: 'DELIM_LITERAL', // ....
  DELIM_QUOTE: 'DELIM_QUOTE', // ____
  DELIM_EXAMPLE: 'DELIM_EXAMPLE', // ====
  DELIM_SIDEBAR: 'DELIM_SIDEBAR', // ****
  DELIM_OPEN: 'DELIM_OPEN', // --
  DELIM_COMMENT: 'DELIM_COMMENT', // ////
  DELIM_PASSTHROUGH: 'DELIM_PASSTHROUGH', // ++++
  STEM_ATTRS: 'STEM_ATTRS', // [stem]

  // Tables
  TABLE_DELIM: 'TABLE_DELIM', // |===
  TABLE_LINE: 'TABLE_LINE', // |a|b

  // Macros and preprocessor directives
  BLOCK_MACRO: 'BLOCK_MACRO', // include::file[] or name::target[]
  DIRECTIVE: 'DIRECTIVE', // ifdef:: ifndef:: endif::

  TEXT: 'TEXT',
} as const;

export type LineKind = (typeof LINE_KINDS)[keyof typeof LINE_KINDS];

/** Fence kinds that open a delimited block */
export type DelimiterKind =
  | typeof LINE_KINDS.DELIM_LISTING
  | typeof LINE_KINDS.DELIM_LITERAL
  | typeof LINE_KINDS.DELIM_QUOTE
  | typeof LINE_KINDS.DELIM_EXAMPLE
  | typeof LINE_KINDS.DELIM_SIDEBAR
  | typeof LINE_KINDS.DELIM_OPEN
  | typeof LINE_KINDS.DELIM_COMMENT
  | typeof LINE_KINDS.DELIM_PASSTHROUGH;

/**
 * One classified input line.
 *
 * `level` is 0 unless the kind carries one (heading depth, list marker depth,
 * trailing colon count of a description term). `head` and `rest` split the
 * line around its recognized prefix; their meaning depends on the kind.
 */
export interface LineToken {
  readonly kind: LineKind;
  readonly line: number;
  readonly raw: string;
  readonly level: number;
  readonly head: string;
  readonly rest: string;
  readonly span: SourceSpan;
}
