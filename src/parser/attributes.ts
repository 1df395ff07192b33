/**
 * Attribute Lists and Anchors
 * Pure parsers for `[name=value,...]` and `[[id,text]]`
 */

import type { BlockMetadata } from '../types.js';

/**
 * Trim `text` and remove one enclosing `open`/`close` pair when both are
 * present. Otherwise the trimmed text is returned.
 *
 * @example
 * stripOuter(' [a] ', '[', ']') // 'a'
 * stripOuter('"x', '"', '"') // '"x'
 */
export function stripOuter(text: string, open: string, close: string): string {
  const t = text.trim();
  if (t.length >= 2 && t.startsWith(open) && t.endsWith(close)) {
    return t.slice(open.length, t.length - close.length);
  }
  return t;
}

/**
 * Parse an attribute list, with or without its brackets.
 *
 * Entries are comma separated; empty entries are skipped. `key=value` keeps
 * the trimmed key and the trimmed value with one pair of double quotes
 * removed. A bare entry is a boolean attribute and maps to `''`. A repeated
 * key keeps its first position and takes the last value.
 *
 * @example
 * parseAttributeList('[source,lang="c++"]')
 * // Map { 'source' => '', 'lang' => 'c++' }
 */
export function parseAttributeList(text: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const inner = stripOuter(text, '[', ']');

  for (const part of inner.split(',')) {
    const entry = part.trim();
    if (entry === '') continue;

    const eq = entry.indexOf('=');
    if (eq < 0) {
      attributes.set(entry, '');
      continue;
    }
    const key = entry.slice(0, eq).trim();
    const value = stripOuter(entry.slice(eq + 1), '"', '"');
    attributes.set(key, value);
  }

  return attributes;
}

export interface Anchor {
  readonly id: string;
  readonly text: string;
}

/**
 * Split a block anchor line into id and display text.
 *
 * @example
 * parseAnchor('[[intro, Introduction]]') // { id: 'intro', text: 'Introduction' }
 */
export function parseAnchor(text: string): Anchor {
  const inner = stripOuter(stripOuter(text, '[', ']'), '[', ']');
  const comma = inner.indexOf(',');
  if (comma < 0) {
    return { id: inner.trim(), text: '' };
  }
  return {
    id: inner.slice(0, comma).trim(),
    text: inner.slice(comma + 1).trim(),
  };
}

// ============================================================
// METADATA ACCUMULATION
// ============================================================

/** Mutable metadata collected while reading a run of metadata lines */
export interface MetadataDraft {
  anchorId: string;
  anchorText: string;
  title: string;
  attributes: Map<string, string>;
}

export function createMetadataDraft(): MetadataDraft {
  return { anchorId: '', anchorText: '', title: '', attributes: new Map() };
}

/** Freeze a draft; roles are the attribute keys starting with `.` */
export function finishMetadata(draft: MetadataDraft): BlockMetadata {
  const roles = [...draft.attributes.keys()]
    .filter((key) => key.startsWith('.'))
    .map((key) => key.slice(1));
  return {
    anchorId: draft.anchorId,
    anchorText: draft.anchorText,
    title: draft.title,
    attributes: draft.attributes,
    roles,
  };
}
