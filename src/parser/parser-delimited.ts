/**
 * Parser Extension: Delimited Blocks
 * Listing, literal, quote, example, sidebar, open, comment and passthrough
 */

import { Parser } from './parser.js';
import type {
  BlockMetadata,
  BlockNode,
  DelimitedBlockNode,
} from '../types.js';
import { LINE_KINDS } from '../types.js';
import { isDelimiterKind, isRawDelimiter } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  skipBlankAndComments,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDelimited(metadata: BlockMetadata | null): DelimitedBlockNode;
  }
}

/**
 * Fenced block, optionally preceded by a `[stem]` line. The closing fence
 * is the same line kind as the opening one.
 *
 * Raw fences (listing, literal, passthrough, comment) and every stem block
 * keep their interior lines verbatim. The other fences contain blocks.
 */
Parser.prototype.parseDelimited = function (
  this: Parser,
  metadata: BlockMetadata | null
): DelimitedBlockNode {
  const first = current(this.state);
  const stem = check(this.state, LINE_KINDS.STEM_ATTRS);
  if (stem) advance(this.state);

  const open = advance(this.state);
  const delimiter = open.kind;
  if (!isDelimiterKind(delimiter)) {
    throw new Error(`Expected a fence at line ${open.line}`);
  }
  const fence = open.raw.trim();
  const raw = stem || isRawDelimiter(delimiter);

  const lines: string[] = [];
  const blocks: BlockNode[] = [];

  if (raw) {
    while (!isAtEnd(this.state) && !check(this.state, delimiter)) {
      lines.push(advance(this.state).raw);
    }
  } else {
    this.state.openFences.push(delimiter);
    for (;;) {
      skipBlankAndComments(this.state);
      if (isAtEnd(this.state) || check(this.state, delimiter)) break;
      blocks.push(this.parseBlock());
    }
    this.state.openFences.pop();
  }

  expect(this.state, delimiter, 'LEANDOC-P001', { delimiter: fence });

  return {
    type: 'DelimitedBlock',
    metadata,
    delimiter,
    stem,
    raw,
    text: lines.join('\n'),
    blocks,
    span: spanFrom(this.state, first),
  };
};
