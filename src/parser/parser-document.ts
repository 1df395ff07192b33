/**
 * Parser Extension: Document Parsing
 * Document header, block metadata and block dispatch
 */

import { Parser } from './parser.js';
import type {
  BlockMetadata,
  BlockNode,
  DocumentHeader,
  DocumentNode,
} from '../types.js';
import { LINE_KINDS, makeSpan } from '../types.js';
import {
  createMetadataDraft,
  finishMetadata,
  parseAnchor,
  parseAttributeList,
} from './attributes.js';
import {
  LIST_MARKER_KINDS,
  METADATA_KINDS,
  closesEnclosing,
  emptyParagraph,
  opensDelimitedBlock,
} from './helpers.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  parseErrorAt,
  skipBlankAndComments,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDocument(): DocumentNode;
    parseHeader(): DocumentHeader;
    parseMetadata(): BlockMetadata | null;
    parseBlock(): BlockNode;
  }
}

// ============================================================
// DOCUMENT
// ============================================================

Parser.prototype.parseDocument = function (this: Parser): DocumentNode {
  const start = current(this.state).span.start;

  skipBlankAndComments(this.state);
  const header = this.parseHeader();

  const blocks: BlockNode[] = [];
  for (;;) {
    skipBlankAndComments(this.state);
    if (isAtEnd(this.state)) break;
    blocks.push(this.parseBlock());
  }

  return {
    type: 'Document',
    header,
    blocks,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Header: a level-1 heading, then an author line (contains `<` and `>`) and
 * a revision line (starts with `v`), both only after a title, then
 * `:name: value` entries. Every part is optional.
 */
Parser.prototype.parseHeader = function (this: Parser): DocumentHeader {
  let title: string | null = null;
  let titleLine: number | null = null;
  let authorLine: string | null = null;
  let authorLineNo: number | null = null;
  let revisionLine: string | null = null;
  let revisionLineNo: number | null = null;
  const attributes = new Map<string, string>();

  const heading = current(this.state);
  if (heading.kind === LINE_KINDS.SECTION && heading.level === 1) {
    advance(this.state);
    title = heading.rest;
    titleLine = heading.line;
    skipBlankAndComments(this.state);

    const author = current(this.state);
    const authorText = author.raw.trim();
    if (
      author.kind === LINE_KINDS.TEXT &&
      authorText.includes('<') &&
      authorText.includes('>')
    ) {
      advance(this.state);
      authorLine = authorText;
      authorLineNo = author.line;
      skipBlankAndComments(this.state);
    }

    const revision = current(this.state);
    const revisionText = revision.raw.trim();
    if (revision.kind === LINE_KINDS.TEXT && revisionText.startsWith('v')) {
      advance(this.state);
      revisionLine = revisionText;
      revisionLineNo = revision.line;
      skipBlankAndComments(this.state);
    }
  }

  while (check(this.state, LINE_KINDS.TEXT)) {
    const entry = current(this.state).raw.trim();
    if (!entry.startsWith(':')) break;
    const second = entry.indexOf(':', 1);
    if (second <= 1) break;
    attributes.set(
      entry.slice(1, second).trim(),
      entry.slice(second + 1).trim()
    );
    advance(this.state);
  }

  return {
    title,
    titleLine,
    authorLine,
    authorLineNo,
    revisionLine,
    revisionLineNo,
    attributes,
  };
};

// ============================================================
// BLOCK METADATA
// ============================================================

/**
 * Consume a run of anchor, attribute list and title lines in any order.
 * Later lines override earlier values. Returns null when the run is empty.
 */
Parser.prototype.parseMetadata = function (
  this: Parser
): BlockMetadata | null {
  if (!METADATA_KINDS.has(current(this.state).kind)) return null;

  const draft = createMetadataDraft();
  while (METADATA_KINDS.has(current(this.state).kind)) {
    const token = advance(this.state);
    switch (token.kind) {
      case LINE_KINDS.BLOCK_ANCHOR: {
        const anchor = parseAnchor(token.rest);
        draft.anchorId = anchor.id;
        draft.anchorText = anchor.text;
        break;
      }
      case LINE_KINDS.BLOCK_ATTRS:
        for (const [key, value] of parseAttributeList(token.rest)) {
          draft.attributes.set(key, value);
        }
        break;
      default:
        draft.title = token.rest.trim();
    }
  }
  return finishMetadata(draft);
};

// ============================================================
// BLOCK DISPATCH
// ============================================================

/**
 * Parse one block, starting with its metadata run.
 *
 * Callers skip blank lines first and decide beforehand whether the block
 * belongs to them; the metadata-scoping check happens in the section loop.
 */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const metadata = this.parseMetadata();
  const token = current(this.state);

  // Metadata with nothing to attach to
  if (
    metadata !== null &&
    (token.kind === LINE_KINDS.BLANK ||
      token.kind === LINE_KINDS.EOF ||
      closesEnclosing(this.state, token))
  ) {
    return emptyParagraph(this.state, metadata);
  }

  switch (token.kind) {
    case LINE_KINDS.SECTION:
      return this.parseSection(metadata);
    case LINE_KINDS.ADMONITION:
      return this.parseAdmonition(metadata);
    case LINE_KINDS.TABLE_DELIM:
      return this.parseTable(metadata);
    case LINE_KINDS.BLOCK_MACRO:
      return this.parseBlockMacro(metadata);
    case LINE_KINDS.DIRECTIVE:
      return this.parseDirective(metadata);
    case LINE_KINDS.THEMATIC_BREAK:
    case LINE_KINDS.PAGE_BREAK:
    case LINE_KINDS.LINE_COMMENT:
      return this.parseBreakOrComment(metadata);
    case LINE_KINDS.TABLE_LINE:
      throw parseErrorAt(token, 'LEANDOC-P003');
  }

  if (LIST_MARKER_KINDS.has(token.kind)) {
    return this.parseList(metadata);
  }
  if (opensDelimitedBlock(this.state)) {
    return this.parseDelimited(metadata);
  }
  return this.parseParagraph(metadata);
};
