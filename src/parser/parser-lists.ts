/**
 * Parser Extension: List Parsing
 * Unordered, ordered and description lists
 */

import { Parser } from './parser.js';
import type {
  BlockMetadata,
  BlockNode,
  ChecklistMark,
  ListItemNode,
  ListNode,
  ListType,
  SourceSpan,
} from '../types.js';
import { LINE_KINDS, makeSpan } from '../types.js';
import { scanInline } from '../inline/index.js';
import { emptyParagraph, opensDelimitedBlock } from './helpers.js';
import {
  advance,
  check,
  current,
  skipBlankAndComments,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseList(metadata: BlockMetadata | null): ListNode;
    parseDescriptionItem(): ListItemNode;
    parseListItem(): ListItemNode;
  }
}

const CHECKLIST_MARKS: readonly ChecklistMark[] = ['*', 'x', ' '];

const ITEM_KIND = {
  unordered: LINE_KINDS.UL_ITEM,
  ordered: LINE_KINDS.OL_ITEM,
  description: LINE_KINDS.DESC_TERM,
} as const;

// ============================================================
// LISTS
// ============================================================

/**
 * The first marker fixes the list type; items are read while the next
 * marker has the same kind. Marker depth is recorded on each item but
 * items are not nested by it.
 */
Parser.prototype.parseList = function (
  this: Parser,
  metadata: BlockMetadata | null
): ListNode {
  const first = current(this.state);
  const listType: ListType =
    first.kind === LINE_KINDS.DESC_TERM
      ? 'description'
      : first.kind === LINE_KINDS.OL_ITEM
        ? 'ordered'
        : 'unordered';
  const itemKind = ITEM_KIND[listType];

  const items: ListItemNode[] = [];
  while (check(this.state, itemKind)) {
    items.push(
      listType === 'description'
        ? this.parseDescriptionItem()
        : this.parseListItem()
    );
    skipBlankAndComments(this.state);
  }

  const last = items[items.length - 1];
  return {
    type: 'List',
    metadata,
    listType,
    items,
    span: makeSpan(first.span.start, (last ?? first).span.end),
  };
};

// ============================================================
// ITEMS
// ============================================================

/**
 * `term::` with an optional one-line definition, then at most one `+`
 * continuation holding a delimited block or a paragraph. Only text lines
 * form that paragraph; any other line is left for the enclosing block and
 * the continuation holds an empty paragraph.
 */
Parser.prototype.parseDescriptionItem = function (this: Parser): ListItemNode {
  const term = advance(this.state);
  const blocks: BlockNode[] = [];

  const definition = current(this.state);
  if (definition.kind === LINE_KINDS.TEXT && definition.raw.trim() !== '') {
    advance(this.state);
    blocks.push({
      type: 'Paragraph',
      metadata: null,
      content: scanInline(definition.raw.trim(), definition.span),
      span: definition.span,
    });
  }
  let span: SourceSpan = spanFrom(this.state, term);

  skipBlankAndComments(this.state);
  if (check(this.state, LINE_KINDS.LIST_CONT)) {
    advance(this.state);
    skipBlankAndComments(this.state);
    if (opensDelimitedBlock(this.state)) {
      blocks.push(this.parseDelimited(null));
    } else if (check(this.state, LINE_KINDS.TEXT)) {
      blocks.push(this.parseParagraph(null));
    } else {
      blocks.push(emptyParagraph(this.state, null));
    }
    span = spanFrom(this.state, term);
  }

  return {
    type: 'ListItem',
    level: term.level,
    term: term.rest,
    check: null,
    blocks,
    span,
  };
};

/**
 * `* text` or `. text`, optionally starting with a checklist mark
 * (`[*]`, `[x]`, `[ ]`). Each `+` line attaches the next block.
 */
Parser.prototype.parseListItem = function (this: Parser): ListItemNode {
  const marker = advance(this.state);

  let text = marker.rest;
  let mark: ChecklistMark | null = null;
  if (text.length >= 3 && text[0] === '[' && text[2] === ']') {
    mark = CHECKLIST_MARKS.find((m) => m === text[1]) ?? null;
    if (mark !== null) text = text.slice(3).trim();
  }

  const blocks: BlockNode[] = [
    {
      type: 'Paragraph',
      metadata: null,
      content: scanInline(text, marker.span),
      span: marker.span,
    },
  ];
  let span: SourceSpan = marker.span;

  skipBlankAndComments(this.state);
  while (check(this.state, LINE_KINDS.LIST_CONT)) {
    advance(this.state);
    skipBlankAndComments(this.state);
    blocks.push(this.parseBlock());
    span = spanFrom(this.state, marker);
    skipBlankAndComments(this.state);
  }

  return {
    type: 'ListItem',
    level: marker.level,
    term: null,
    check: mark,
    blocks,
    span,
  };
};
