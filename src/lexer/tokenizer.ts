/**
 * Line Classifier
 * Splits a document into lines and tags each with exactly one kind
 */

import type { SourceLocation } from '../source-location.js';
import type { LineKind, LineToken } from '../token-types.js';
import { LINE_KINDS } from '../token-types.js';
import { isWhitespace, markerLevel, trailingRun } from './helpers.js';
import {
  ADMONITION_LABELS,
  BLOCK_MACRO_PREFIXES,
  DIRECTIVE_PREFIXES,
  FENCES,
  THEMATIC_BREAKS,
} from './markers.js';

interface Classification {
  kind: LineKind;
  level?: number;
  head?: string;
  rest?: string;
}

/** Split `s` at the first `::` into the text before and the text after it */
function splitAtDoubleColon(s: string): { head: string; rest: string } {
  const p = s.indexOf('::');
  return { head: s.slice(0, p), rest: s.slice(p + 2) };
}

/**
 * Classify one line. The first matching rule wins; every line gets a kind.
 * Rules look at the trimmed line, except that TEXT keeps the raw line in
 * `rest` because leading whitespace marks a literal paragraph. A line that is
 * exactly a fence (`....`, `////`) is never read as a title or comment.
 */
function classify(raw: string): Classification {
  const s = raw.trim();

  if (s === '') {
    return { kind: LINE_KINDS.BLANK };
  }

  // Metadata lines
  if (s.startsWith('[[') && s.endsWith(']]')) {
    return { kind: LINE_KINDS.BLOCK_ANCHOR, rest: s };
  }
  if (s === '[stem]') {
    return { kind: LINE_KINDS.STEM_ATTRS, rest: s };
  }
  if (s.length >= 2 && s.startsWith('[') && s.endsWith(']')) {
    return { kind: LINE_KINDS.BLOCK_ATTRS, rest: s };
  }
  if (
    s.length >= 2 &&
    s[0] === '.' &&
    !isWhitespace(s[1]) &&
    !FENCES.has(s)
  ) {
    return { kind: LINE_KINDS.BLOCK_TITLE, rest: s.slice(1) };
  }

  // Preprocessor directives
  if (DIRECTIVE_PREFIXES.some((prefix) => s.startsWith(prefix))) {
    return { kind: LINE_KINDS.DIRECTIVE, ...splitAtDoubleColon(s) };
  }

  // Block macros: include:: by prefix, otherwise name::target[...]
  if (BLOCK_MACRO_PREFIXES.some((prefix) => s.startsWith(prefix))) {
    return { kind: LINE_KINDS.BLOCK_MACRO, ...splitAtDoubleColon(s) };
  }
  const colons = s.indexOf('::');
  if (colons > 0 && s.indexOf('[') > colons) {
    return { kind: LINE_KINDS.BLOCK_MACRO, ...splitAtDoubleColon(s) };
  }

  // Comments and breaks
  if (s.startsWith('//') && !FENCES.has(s)) {
    return { kind: LINE_KINDS.LINE_COMMENT, rest: s.slice(2) };
  }
  if (THEMATIC_BREAKS.has(s)) {
    return { kind: LINE_KINDS.THEMATIC_BREAK };
  }
  if (s.startsWith('<<<')) {
    return { kind: LINE_KINDS.PAGE_BREAK, rest: s.slice(3).trim() };
  }

  // Section headings and list markers
  const headingLevel = markerLevel(s, '=');
  if (headingLevel > 0) {
    return {
      kind: LINE_KINDS.SECTION,
      level: headingLevel,
      rest: s.slice(headingLevel).trim(),
    };
  }
  const bulletLevel = markerLevel(s, '*');
  if (bulletLevel > 0) {
    return {
      kind: LINE_KINDS.UL_ITEM,
      level: bulletLevel,
      rest: s.slice(bulletLevel).trim(),
    };
  }
  const numberLevel = markerLevel(s, '.');
  if (numberLevel > 0) {
    return {
      kind: LINE_KINDS.OL_ITEM,
      level: numberLevel,
      rest: s.slice(numberLevel).trim(),
    };
  }
  if (s === '+') {
    return { kind: LINE_KINDS.LIST_CONT };
  }

  // Description term: text followed by two or more colons
  const termColons = trailingRun(s, ':');
  if (termColons >= 2 && termColons < s.length) {
    return {
      kind: LINE_KINDS.DESC_TERM,
      level: termColons,
      rest: s.slice(0, s.length - termColons).trim(),
    };
  }

  // Tables
  if (s === '|===') {
    return { kind: LINE_KINDS.TABLE_DELIM };
  }
  if (s.startsWith('|')) {
    return { kind: LINE_KINDS.TABLE_LINE, rest: raw };
  }

  const fence = FENCES.get(s);
  if (fence) {
    return { kind: fence };
  }

  const label = ADMONITION_LABELS.find((l) => s.startsWith(`${l}:`));
  if (label) {
    return {
      kind: LINE_KINDS.ADMONITION,
      head: label,
      rest: s.slice(label.length + 1).trim(),
    };
  }

  return { kind: LINE_KINDS.TEXT, rest: raw };
}

/**
 * Classify a single line.
 *
 * @param raw - The line without its newline
 * @param line - 1-based line number
 * @param offset - Offset of the line start in the document
 */
export function classifyLine(
  raw: string,
  line: number,
  offset = 0
): LineToken {
  const c = classify(raw);
  const start: SourceLocation = { line, column: 1, offset };
  const end: SourceLocation = {
    line,
    column: raw.length + 1,
    offset: offset + raw.length,
  };
  return {
    kind: c.kind,
    line,
    raw,
    level: c.level ?? 0,
    head: c.head ?? '',
    rest: c.rest ?? '',
    span: { start, end },
  };
}

/**
 * Classify every line of `source` and append the EOF token.
 *
 * Lines are split on `\n`; a trailing `\r` is dropped. Like a plain split, a
 * final newline yields one last empty (BLANK) line. The EOF token sits on the
 * line after the last one.
 *
 * @example
 * ```typescript
 * tokenize('= Title\n').map((t) => t.kind);
 * // ['SECTION', 'BLANK', 'EOF']
 * ```
 */
export function tokenize(source: string): LineToken[] {
  const tokens: LineToken[] = [];
  const lines = source.split('\n');
  let offset = 0;

  lines.forEach((text, i) => {
    const raw = text.endsWith('\r') ? text.slice(0, -1) : text;
    tokens.push(classifyLine(raw, i + 1, offset));
    offset += text.length + 1;
  });

  const end: SourceLocation = {
    line: lines.length + 1,
    column: 1,
    offset: source.length,
  };
  tokens.push({
    kind: LINE_KINDS.EOF,
    line: lines.length + 1,
    raw: '',
    level: 0,
    head: '',
    rest: '',
    span: { start: end, end },
  });

  return tokens;
}
