/**
 * Parser Extension: Block Parsing
 * Sections, paragraphs, admonitions, macros, directives and breaks
 */

import { Parser } from './parser.js';
import type {
  AdmonitionParagraphNode,
  BlockMacroNode,
  BlockMetadata,
  BlockNode,
  DirectiveNode,
  LineCommentNode,
  LiteralParagraphNode,
  PageBreakNode,
  ParagraphNode,
  SectionNode,
  ThematicBreakNode,
} from '../types.js';
import { LINE_KINDS, makeSpan } from '../types.js';
import { scanInline } from '../inline/index.js';
import { ADMONITION_LABELS } from '../lexer/index.js';
import {
  closesEnclosing,
  interruptsParagraph,
  isEndif,
  peekPastMetadata,
} from './helpers.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  skipBlankAndComments,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseSection(metadata: BlockMetadata | null): SectionNode;
    parseParagraph(
      metadata: BlockMetadata | null
    ): ParagraphNode | LiteralParagraphNode;
    parseAdmonition(metadata: BlockMetadata | null): AdmonitionParagraphNode;
    parseBlockMacro(metadata: BlockMetadata | null): BlockMacroNode;
    parseDirective(metadata: BlockMetadata | null): DirectiveNode;
    parseBreakOrComment(
      metadata: BlockMetadata | null
    ): ThematicBreakNode | PageBreakNode | LineCommentNode;
  }
}

const DIRECTIVE_NAMES = ['ifdef', 'ifndef', 'ifeval', 'endif'] as const;

// ============================================================
// SECTIONS
// ============================================================

/**
 * Section body runs until a heading of the same or a lower level. The check
 * looks past pending metadata lines, so an anchor or title in front of a
 * sibling heading stays unconsumed and goes to the sibling.
 */
Parser.prototype.parseSection = function (
  this: Parser,
  metadata: BlockMetadata | null
): SectionNode {
  const heading = advance(this.state);
  const blocks: BlockNode[] = [];

  for (;;) {
    skipBlankAndComments(this.state);
    if (isAtEnd(this.state)) break;

    const next = peekPastMetadata(this.state);
    if (next.kind === LINE_KINDS.SECTION && next.level <= heading.level) break;
    if (closesEnclosing(this.state, next)) break;

    blocks.push(this.parseBlock());
  }

  return {
    type: 'Section',
    metadata,
    level: heading.level,
    title: heading.rest,
    blocks,
    span: spanFrom(this.state, heading),
  };
};

// ============================================================
// PARAGRAPHS
// ============================================================

/**
 * Normal or literal paragraph. A first line starting with whitespace opens a
 * literal paragraph: following indented lines are kept verbatim minus their
 * first character and joined by newlines. Otherwise trimmed lines are joined
 * by single spaces and scanned for inline markup.
 */
Parser.prototype.parseParagraph = function (
  this: Parser,
  metadata: BlockMetadata | null
): ParagraphNode | LiteralParagraphNode {
  const first = current(this.state);

  if (first.kind === LINE_KINDS.EOF || first.kind === LINE_KINDS.BLANK) {
    return {
      type: 'Paragraph',
      metadata,
      content: [],
      span: makeSpan(first.span.start, first.span.start),
    };
  }

  // A line no other block accepts (a stray `+`) stands as its own paragraph
  if (first.kind !== LINE_KINDS.TEXT) {
    advance(this.state);
    const span = spanFrom(this.state, first);
    return {
      type: 'Paragraph',
      metadata,
      content: scanInline(first.raw.trim(), span),
      span,
    };
  }

  const literal = /^\s/.test(first.raw);
  const lines: string[] = [];

  while (check(this.state, LINE_KINDS.TEXT)) {
    const token = current(this.state);
    if (literal) {
      if (!/^\s/.test(token.raw)) break;
      lines.push(token.raw.slice(1));
    } else {
      lines.push(token.raw.trim());
    }
    advance(this.state);

    if (check(this.state, LINE_KINDS.BLANK)) break;
    if (!literal && interruptsParagraph(current(this.state).kind)) break;
  }

  const span = spanFrom(this.state, first);
  if (literal) {
    return {
      type: 'LiteralParagraph',
      metadata,
      text: lines.join('\n'),
      span,
    };
  }
  return {
    type: 'Paragraph',
    metadata,
    content: scanInline(lines.join(' '), span),
    span,
  };
};

Parser.prototype.parseAdmonition = function (
  this: Parser,
  metadata: BlockMetadata | null
): AdmonitionParagraphNode {
  const token = advance(this.state);
  const label = ADMONITION_LABELS.find((l) => l === token.head);
  if (label === undefined) {
    throw new Error(`Unknown admonition label: ${token.head}`);
  }

  const span = spanFrom(this.state, token);
  return {
    type: 'AdmonitionParagraph',
    metadata,
    label,
    content: scanInline(token.rest, span),
    span,
  };
};

// ============================================================
// MACROS AND DIRECTIVES
// ============================================================

/** `name::target[attrs]`; the target keeps its bracketed attribute list */
Parser.prototype.parseBlockMacro = function (
  this: Parser,
  metadata: BlockMetadata | null
): BlockMacroNode {
  const token = advance(this.state);
  return {
    type: 'BlockMacro',
    metadata,
    name: token.head,
    target: token.rest,
    span: spanFrom(this.state, token),
  };
};

/**
 * Conditional directives own the blocks up to the first `endif::` line that
 * a conditional inside the body has not taken, and keep it as their last
 * block. An `endif::` closes the innermost open conditional whatever its
 * name or target.
 */
Parser.prototype.parseDirective = function (
  this: Parser,
  metadata: BlockMetadata | null
): DirectiveNode {
  const token = advance(this.state);
  const name = DIRECTIVE_NAMES.find((n) => n === token.head);
  if (name === undefined) {
    throw new Error(`Unknown directive: ${token.head}`);
  }

  const blocks: BlockNode[] = [];
  if (name !== 'endif') {
    this.state.directiveDepth++;
    for (;;) {
      skipBlankAndComments(this.state);
      const next = current(this.state);

      if (isEndif(next)) {
        advance(this.state);
        blocks.push({
          type: 'Directive',
          metadata: null,
          name: 'endif',
          text: next.rest,
          blocks: [],
          span: next.span,
        });
        break;
      }
      if (isAtEnd(this.state)) break;
      const ahead = peekPastMetadata(this.state);
      if (!isEndif(ahead) && closesEnclosing(this.state, ahead)) break;

      blocks.push(this.parseBlock());
    }
    this.state.directiveDepth--;
  }

  return {
    type: 'Directive',
    metadata,
    name,
    text: token.rest,
    blocks,
    span: spanFrom(this.state, token),
  };
};

// ============================================================
// BREAKS AND COMMENTS
// ============================================================

Parser.prototype.parseBreakOrComment = function (
  this: Parser,
  metadata: BlockMetadata | null
): ThematicBreakNode | PageBreakNode | LineCommentNode {
  const token = advance(this.state);
  const span = spanFrom(this.state, token);

  switch (token.kind) {
    case LINE_KINDS.THEMATIC_BREAK:
      return {
        type: 'ThematicBreak',
        metadata,
        text: token.raw.trim(),
        span,
      };
    case LINE_KINDS.PAGE_BREAK:
      return { type: 'PageBreak', metadata, text: token.rest, span };
    default:
      return { type: 'LineComment', metadata, text: token.rest, span };
  }
};
