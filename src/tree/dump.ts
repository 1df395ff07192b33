/**
 * Debug Dumps
 * Line-oriented listings of the token stream and the document tree
 */

import type { ASTNode, LineToken } from '../types.js';
import { type PayloadNode, toPayload } from './payload.js';

export interface DumpOptions {
  /** Longer text fields are collapsed and cut to this many characters */
  readonly textWidth?: number | undefined;
}

export const DEFAULT_TEXT_WIDTH = 64;

/** Collapse whitespace runs to one space and trim */
function simplify(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function formatText(text: string, width: number): string {
  if (text.length > width) {
    return `"${simplify(text).slice(0, width)}"...`;
  }
  return `"${text}"`;
}

function dumpPayload(
  node: PayloadNode,
  depth: number,
  width: number,
  out: string[]
): void {
  let line = `${'  '.repeat(depth)}${node.kind} @${node.position.line}`;

  const meta = node.meta;
  if (meta) {
    if (meta.anchorId) line += ` anchorId="${meta.anchorId}"`;
    if (meta.anchorText) line += ` anchorText="${meta.anchorText}"`;
    if (meta.title) line += ` title="${meta.title}"`;
    const attrCount = Object.keys(meta.attributes).length;
    if (attrCount > 0) line += ` attrs=${attrCount}`;
  }
  if (node.name) line += ` name="${node.name}"`;
  if (node.target) line += ` target="${node.target}"`;
  if (node.text) line += ` text=${formatText(node.text, width)}`;
  const kvCount = Object.keys(node.kv).length;
  if (kvCount > 0) line += ` kv=${kvCount}`;

  out.push(line);
  for (const child of node.children) {
    dumpPayload(child, depth + 1, width, out);
  }
}

/**
 * Indented tree listing, one node per line:
 * `Kind @line anchorId=".." anchorText=".." title=".." attrs=N name=".."
 * target=".." text=".." kv=N`, with empty fields omitted and children
 * indented by two spaces per level.
 *
 * @example
 * ```typescript
 * dumpTree(parse('= T\n\nHi *you*\n'));
 * // Document @1 kv=2
 * //   Paragraph @3
 * //     Text @3 text="Hi "
 * //     Emphasis @3 name="bold"
 * //       Text @3 text="you"
 * ```
 */
export function dumpTree(node: ASTNode, options: DumpOptions = {}): string {
  const out: string[] = [];
  dumpPayload(
    toPayload(node),
    0,
    options.textWidth ?? DEFAULT_TEXT_WIDTH,
    out
  );
  return out.join('\n') + '\n';
}

/**
 * Token listing, one line per token including the final EOF:
 * `lineNo: KIND level=N head=".." rest=".."`, with zero and empty fields
 * omitted.
 */
export function dumpTokens(tokens: readonly LineToken[]): string {
  return (
    tokens
      .map((t) => {
        let line = `${t.line}: ${t.kind}`;
        if (t.level) line += ` level=${t.level}`;
        if (t.head) line += ` head="${t.head}"`;
        if (t.rest) line += ` rest="${t.rest}"`;
        return line;
      })
      .join('\n') + '\n'
  );
}
