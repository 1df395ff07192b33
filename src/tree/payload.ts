/**
 * Payload View
 * Generic node shape consumed by output generators
 */

import type { ASTNode, BlockMetadata } from '../types.js';
import { childrenOf } from './visitor.js';

// ============================================================
// PAYLOAD TYPES
// ============================================================

export interface PayloadMeta {
  readonly anchorId: string;
  readonly anchorText: string;
  readonly title: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly roles: readonly string[];
}

/**
 * Uniform view of a node. Each kind reuses the four payload fields in a
 * fixed way:
 *
 * - `name`: section title, admonition label, macro and directive names,
 *   description term, emphasis style, anchor id, attribute name
 * - `target`: link URL, cross reference id, macro target
 * - `text`: verbatim content of literal and raw blocks, breaks, comments,
 *   text runs and raw inline spans
 * - `kv`: flags such as `level`, `type`, `check`, `stem`, `delim`, `plusN`,
 *   and the document header under `title`, `authorLine`, `attr:<name>`, ...
 */
export interface PayloadNode {
  readonly kind: ASTNode['type'];
  readonly position: { readonly line: number; readonly column: number };
  readonly meta: PayloadMeta | null;
  readonly text: string;
  readonly name: string;
  readonly target: string;
  readonly kv: Readonly<Record<string, string>>;
  readonly children: readonly PayloadNode[];
}

interface PayloadFields {
  meta?: BlockMetadata | null;
  text?: string;
  name?: string;
  target?: string;
  kv?: Record<string, string>;
}

// ============================================================
// CONVERSION
// ============================================================

function metaOf(metadata: BlockMetadata): PayloadMeta {
  return {
    anchorId: metadata.anchorId,
    anchorText: metadata.anchorText,
    title: metadata.title,
    attributes: Object.fromEntries(metadata.attributes),
    roles: metadata.roles,
  };
}

/** Kind-specific payload fields */
function fieldsOf(node: ASTNode): PayloadFields {
  switch (node.type) {
    case 'Document': {
      const h = node.header;
      const kv: Record<string, string> = {};
      if (h.title !== null) kv['title'] = h.title;
      if (h.titleLine !== null) kv['titleLine'] = String(h.titleLine);
      if (h.authorLine !== null) kv['authorLine'] = h.authorLine;
      if (h.authorLineNo !== null) kv['authorLineNo'] = String(h.authorLineNo);
      if (h.revisionLine !== null) kv['revisionLine'] = h.revisionLine;
      if (h.revisionLineNo !== null) {
        kv['revisionLineNo'] = String(h.revisionLineNo);
      }
      for (const [name, value] of h.attributes) {
        kv[`attr:${name}`] = value;
      }
      return { kv };
    }
    case 'Section':
      return {
        meta: node.metadata,
        name: node.title,
        kv: { level: String(node.level) },
      };
    case 'Paragraph':
      return { meta: node.metadata };
    case 'LiteralParagraph':
      return { meta: node.metadata, text: node.text };
    case 'AdmonitionParagraph':
      return { meta: node.metadata, name: node.label };
    case 'DelimitedBlock':
      return {
        meta: node.metadata,
        text: node.text,
        kv: { delim: node.delimiter, stem: node.stem ? '1' : '0' },
      };
    case 'List':
      return { meta: node.metadata, kv: { type: node.listType } };
    case 'ListItem': {
      const kv: Record<string, string> = { level: String(node.level) };
      if (node.check !== null) kv['check'] = node.check;
      if (node.term !== null) kv['kind'] = 'definition';
      return { name: node.term ?? '', kv };
    }
    case 'Table':
      return { meta: node.metadata, kv: { columns: String(node.columns) } };
    case 'BlockMacro':
      return { meta: node.metadata, name: node.name, target: node.target };
    case 'Directive':
      return { meta: node.metadata, name: node.name, text: node.text };
    case 'ThematicBreak':
    case 'PageBreak':
    case 'LineComment':
      return { meta: node.metadata, text: node.text };
    case 'Text':
    case 'Space':
    case 'Superscript':
    case 'Subscript':
      return { text: node.text };
    case 'Emphasis':
      return { name: node.style, text: node.raw ?? '' };
    case 'Link':
    case 'InlineImage':
      return { target: node.target };
    case 'InlineAnchor':
      return { name: node.id };
    case 'CrossReference':
      return { target: node.target };
    case 'AttributeReference':
      return { name: node.name };
    case 'InlineMacro':
      return { name: node.name, target: node.target };
    case 'Passthrough':
      return { kv: { plusN: String(node.fence) } };
    case 'TableRow':
    case 'TableCell':
    case 'LineBreak':
      return {};
  }
}

/**
 * Convert a node and its subtree to the payload view.
 *
 * @example
 * ```typescript
 * toPayload(parse('== Intro\n').blocks[0]);
 * // { kind: 'Section', name: 'Intro', kv: { level: '2' }, ... }
 * ```
 */
export function toPayload(node: ASTNode): PayloadNode {
  const fields = fieldsOf(node);
  return {
    kind: node.type,
    position: { line: node.span.start.line, column: node.span.start.column },
    meta: fields.meta ? metaOf(fields.meta) : null,
    text: fields.text ?? '',
    name: fields.name ?? '',
    target: fields.target ?? '',
    kv: fields.kv ?? {},
    children: childrenOf(node).map(toPayload),
  };
}
