/**
 * LeanDoc AST Types
 * Block-level and inline-level document tree
 */

import type { SourceSpan } from './source-location.js';
import type { DelimiterKind } from './token-types.js';

export type NodeType =
  | 'Document'
  | 'Section'
  | 'Paragraph'
  | 'LiteralParagraph'
  | 'AdmonitionParagraph'
  | 'DelimitedBlock'
  | 'List'
  | 'ListItem'
  | 'Table'
  | 'TableRow'
  | 'TableCell'
  | 'BlockMacro'
  | 'Directive'
  | 'ThematicBreak'
  | 'PageBreak'
  | 'LineComment'
  | 'Text'
  | 'Space'
  | 'LineBreak'
  | 'Emphasis'
  | 'Superscript'
  | 'Subscript'
  | 'Link'
  | 'InlineImage'
  | 'InlineAnchor'
  | 'CrossReference'
  | 'AttributeReference'
  | 'InlineMacro'
  | 'Passthrough';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// BLOCK METADATA
// ============================================================

/**
 * Anchor, attribute list and title lines preceding a block.
 * Boolean attributes map to ''. `roles` repeats the `.role` keys without the dot.
 */
export interface BlockMetadata {
  readonly anchorId: string;
  readonly anchorText: string;
  readonly title: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly roles: readonly string[];
}

interface MetadataNode extends BaseNode {
  readonly metadata: BlockMetadata | null;
}

// ============================================================
// DOCUMENT STRUCTURE
// ============================================================

export interface DocumentHeader {
  readonly title: string | null;
  readonly titleLine: number | null;
  readonly authorLine: string | null;
  readonly authorLineNo: number | null;
  readonly revisionLine: string | null;
  readonly revisionLineNo: number | null;
  /** `:name: value` entries in source order */
  readonly attributes: ReadonlyMap<string, string>;
}

export interface DocumentNode extends BaseNode {
  readonly type: 'Document';
  readonly header: DocumentHeader;
  readonly blocks: BlockNode[];
}

export interface SectionNode extends MetadataNode {
  readonly type: 'Section';
  readonly level: number;
  readonly title: string;
  readonly blocks: BlockNode[];
}

// ============================================================
// PARAGRAPHS
// ============================================================

export interface ParagraphNode extends MetadataNode {
  readonly type: 'Paragraph';
  readonly content: InlineNode[];
}

/** Indented paragraph kept verbatim, one leading character stripped per line */
export interface LiteralParagraphNode extends MetadataNode {
  readonly type: 'LiteralParagraph';
  readonly text: string;
}

export type AdmonitionLabel =
  | 'NOTE'
  | 'TIP'
  | 'IMPORTANT'
  | 'CAUTION'
  | 'WARNING';

export interface AdmonitionParagraphNode extends MetadataNode {
  readonly type: 'AdmonitionParagraph';
  readonly label: AdmonitionLabel;
  readonly content: InlineNode[];
}

// ============================================================
// DELIMITED BLOCKS
// ============================================================

/**
 * Fenced block. Raw kinds (listing, literal, passthrough, comment, and any
 * stem block) keep their interior in `text` and have no blocks; structured
 * kinds (quote, example, sidebar, open) parse their interior into `blocks`.
 */
export interface DelimitedBlockNode extends MetadataNode {
  readonly type: 'DelimitedBlock';
  readonly delimiter: DelimiterKind;
  readonly stem: boolean;
  readonly raw: boolean;
  readonly text: string;
  readonly blocks: BlockNode[];
}

// ============================================================
// LISTS
// ============================================================

export type ListType = 'unordered' | 'ordered' | 'description';

export interface ListNode extends MetadataNode {
  readonly type: 'List';
  readonly listType: ListType;
  readonly items: ListItemNode[];
}

export type ChecklistMark = '*' | 'x' | ' ';

/**
 * List entry. For description lists `term` holds the term text and `level`
 * the trailing colon count; otherwise `level` is the marker depth and `term`
 * is null. `blocks` starts with the lead (or definition) paragraph when present,
 * followed by continuation blocks.
 */
export interface ListItemNode extends BaseNode {
  readonly type: 'ListItem';
  readonly level: number;
  readonly term: string | null;
  readonly check: ChecklistMark | null;
  readonly blocks: BlockNode[];
}

// ============================================================
// TABLES
// ============================================================

export interface TableNode extends MetadataNode {
  readonly type: 'Table';
  readonly columns: number;
  readonly rows: TableRowNode[];
}

export interface TableRowNode extends BaseNode {
  readonly type: 'TableRow';
  readonly cells: TableCellNode[];
}

export interface TableCellNode extends BaseNode {
  readonly type: 'TableCell';
  readonly content: InlineNode[];
}

// ============================================================
// MACROS AND DIRECTIVES
// ============================================================

/** `name::target[attrs]`; `target` keeps the unparsed remainder after `::` */
export interface BlockMacroNode extends MetadataNode {
  readonly type: 'BlockMacro';
  readonly name: string;
  readonly target: string;
}

export type DirectiveName = 'ifdef' | 'ifndef' | 'ifeval' | 'endif';

/**
 * Preprocessor directive. Conditional directives own the blocks up to the
 * first `endif::` line, which is stored as the last block.
 */
export interface DirectiveNode extends MetadataNode {
  readonly type: 'Directive';
  readonly name: DirectiveName;
  readonly text: string;
  readonly blocks: BlockNode[];
}

// ============================================================
// BREAKS AND COMMENTS
// ============================================================

export interface ThematicBreakNode extends MetadataNode {
  readonly type: 'ThematicBreak';
  readonly text: string;
}

export interface PageBreakNode extends MetadataNode {
  readonly type: 'PageBreak';
  readonly text: string;
}

export interface LineCommentNode extends MetadataNode {
  readonly type: 'LineComment';
  readonly text: string;
}

export type BlockNode =
  | SectionNode
  | ParagraphNode
  | LiteralParagraphNode
  | AdmonitionParagraphNode
  | DelimitedBlockNode
  | ListNode
  | TableNode
  | BlockMacroNode
  | DirectiveNode
  | ThematicBreakNode
  | PageBreakNode
  | LineCommentNode;

// ============================================================
// INLINE NODES
// ============================================================

export interface TextNode extends BaseNode {
  readonly type: 'Text';
  readonly text: string;
}

export interface SpaceNode extends BaseNode {
  readonly type: 'Space';
  readonly text: string;
}

export interface LineBreakNode extends BaseNode {
  readonly type: 'LineBreak';
}

export type EmphasisStyle = 'bold' | 'italic' | 'mono' | 'highlight';

/**
 * Formatted span. Constrained mono (`x`) is not scanned: it carries `raw`
 * and no content. Every other form has `raw === null`.
 */
export interface EmphasisNode extends BaseNode {
  readonly type: 'Emphasis';
  readonly style: EmphasisStyle;
  readonly raw: string | null;
  readonly content: InlineNode[];
}

export interface SuperscriptNode extends BaseNode {
  readonly type: 'Superscript';
  readonly text: string;
}

export interface SubscriptNode extends BaseNode {
  readonly type: 'Subscript';
  readonly text: string;
}

export interface LinkNode extends BaseNode {
  readonly type: 'Link';
  readonly target: string;
}

export interface InlineImageNode extends BaseNode {
  readonly type: 'InlineImage';
  readonly target: string;
  readonly content: InlineNode[];
}

export interface InlineAnchorNode extends BaseNode {
  readonly type: 'InlineAnchor';
  readonly id: string;
  readonly content: InlineNode[];
}

export interface CrossReferenceNode extends BaseNode {
  readonly type: 'CrossReference';
  readonly target: string;
  readonly content: InlineNode[];
}

export interface AttributeReferenceNode extends BaseNode {
  readonly type: 'AttributeReference';
  readonly name: string;
}

export interface InlineMacroNode extends BaseNode {
  readonly type: 'InlineMacro';
  readonly name: string;
  readonly target: string;
  readonly content: InlineNode[];
}

/** `+x+`, `++x++` or `+++x+++`; `fence` is the plus count */
export interface PassthroughNode extends BaseNode {
  readonly type: 'Passthrough';
  readonly fence: 1 | 2 | 3;
  readonly content: InlineNode[];
}

export type InlineNode =
  | TextNode
  | SpaceNode
  | LineBreakNode
  | EmphasisNode
  | SuperscriptNode
  | SubscriptNode
  | LinkNode
  | InlineImageNode
  | InlineAnchorNode
  | CrossReferenceNode
  | AttributeReferenceNode
  | InlineMacroNode
  | PassthroughNode;

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode =
  | DocumentNode
  | BlockNode
  | ListItemNode
  | TableRowNode
  | TableCellNode
  | InlineNode;
