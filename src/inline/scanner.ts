/**
 * Inline Scanner
 * Single left-to-right pass over a text span producing inline nodes
 */

import type {
  EmphasisStyle,
  InlineNode,
  PassthroughNode,
} from '../ast-nodes.js';
import type { SourceSpan } from '../source-location.js';
import {
  MIN_AUTOLINK_LENGTH,
  MacroLookahead,
  findClose,
  isUrlTerminator,
  startsWithUrlScheme,
} from './helpers.js';

/** A recognized element and the index just past it */
interface InlineMatch {
  readonly node: InlineNode;
  readonly end: number;
}

type Recognizer = (
  text: string,
  index: number,
  span: SourceSpan,
  lookahead: MacroLookahead
) => InlineMatch | null;

// ============================================================
// REFERENCES AND ANCHORS
// ============================================================

/** `{name}` */
function attributeReference(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  if (text[index] !== '{') return null;
  const close = text.indexOf('}', index + 1);
  if (close <= index + 1) return null;
  return {
    node: {
      type: 'AttributeReference',
      name: text.slice(index + 1, close).trim(),
      span,
    },
    end: close + 1,
  };
}

/**
 * Split `id,text` at the first comma. The text part, when present, is
 * scanned recursively.
 */
function splitLabelled(
  inner: string,
  span: SourceSpan
): { id: string; content: InlineNode[] } {
  const comma = inner.indexOf(',');
  if (comma < 0) {
    return { id: inner.trim(), content: [] };
  }
  return {
    id: inner.slice(0, comma).trim(),
    content: scanInline(inner.slice(comma + 1).trim(), span),
  };
}

/** `<<id>>` or `<<id,text>>` */
function crossReference(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  if (!text.startsWith('<<', index)) return null;
  const close = text.indexOf('>>', index + 2);
  if (close <= index + 2) return null;
  const { id, content } = splitLabelled(text.slice(index + 2, close), span);
  return {
    node: { type: 'CrossReference', target: id, content, span },
    end: close + 2,
  };
}

/** `[[id]]` or `[[id,text]]` */
function inlineAnchor(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  if (!text.startsWith('[[', index)) return null;
  const close = text.indexOf(']]', index + 2);
  if (close <= index + 2) return null;
  const { id, content } = splitLabelled(text.slice(index + 2, close), span);
  return {
    node: { type: 'InlineAnchor', id, content, span },
    end: close + 2,
  };
}

// ============================================================
// LINKS AND MACROS
// ============================================================

/** Bare URL up to the next whitespace or bracket */
function autolink(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  if (!startsWithUrlScheme(text, index)) return null;
  let end = index;
  while (end < text.length && !isUrlTerminator(text[end] ?? ' ')) end++;
  if (end - index < MIN_AUTOLINK_LENGTH) return null;
  return {
    node: { type: 'Link', target: text.slice(index, end), span },
    end,
  };
}

/**
 * `name:target[inner]`. The name must start at `index`; the target runs up to
 * the bracket without whitespace and may be empty (`kbd:[Ctrl]`). The first
 * `]` after the bracket closes the macro.
 */
function inlineMacro(
  text: string,
  index: number,
  span: SourceSpan,
  lookahead: MacroLookahead
): InlineMatch | null {
  const colon = lookahead.nextColon(index);
  if (colon <= index || colon + 1 >= text.length) return null;
  if (index < lookahead.nameStartBefore(colon)) return null;

  const open = lookahead.nextOpen(colon + 1);
  if (open < 0) return null;
  const close = lookahead.nextClose(open + 1);
  if (close < 0) return null;

  const blank = lookahead.nextWhitespace(colon + 1);
  if (blank >= 0 && blank < open) return null;

  const target = text.slice(colon + 1, open);

  return {
    node: {
      type: 'InlineMacro',
      name: text.slice(index, colon),
      target,
      content: scanInline(text.slice(open + 1, close), span),
      span,
    },
    end: close + 1,
  };
}

// ============================================================
// FORMATTING
// ============================================================

/** Delimiter pairs in priority order: doubled (unconstrained) before single */
const EMPHASIS_DELIMITERS: readonly {
  readonly delim: string;
  readonly style: EmphasisStyle;
}[] = [
  { delim: '**', style: 'bold' },
  { delim: '*', style: 'bold' },
  { delim: '__', style: 'italic' },
  { delim: '_', style: 'italic' },
  { delim: '``', style: 'mono' },
  { delim: '`', style: 'mono' },
  { delim: '#', style: 'highlight' },
];

/** Constrained mono keeps its content unscanned */
const RAW_EMPHASIS = '`';

function emphasis(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  for (const { delim, style } of EMPHASIS_DELIMITERS) {
    if (!text.startsWith(delim, index)) continue;
    const close = findClose(text, index, delim);
    if (close < 0) continue;

    const inner = text.slice(index + delim.length, close);
    const raw = delim === RAW_EMPHASIS;
    return {
      node: {
        type: 'Emphasis',
        style,
        raw: raw ? inner : null,
        content: raw ? [] : scanInline(inner, span),
        span,
      },
      end: close + delim.length,
    };
  }
  return null;
}

/** `^sup^` and `~sub~`, both kept as raw text */
function script(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  const ch = text[index];
  if (ch !== '^' && ch !== '~') return null;
  const close = findClose(text, index, ch);
  if (close < 0) return null;
  const inner = text.slice(index + 1, close);
  return {
    node:
      ch === '^'
        ? { type: 'Superscript', text: inner, span }
        : { type: 'Subscript', text: inner, span },
    end: close + 1,
  };
}

/** `+x+`, `++x++`, `+++x+++`: the closing fence repeats the opening run */
function passthrough(
  text: string,
  index: number,
  span: SourceSpan
): InlineMatch | null {
  if (text[index] !== '+') return null;
  let run = 1;
  while (text[index + run] === '+') run++;
  if (run !== 1 && run !== 2 && run !== 3) return null;

  const fence: PassthroughNode['fence'] = run;
  const close = findClose(text, index, '+'.repeat(run));
  if (close < 0) return null;
  return {
    node: {
      type: 'Passthrough',
      fence,
      content: scanInline(text.slice(index + run, close), span),
      span,
    },
    end: close + run,
  };
}

// ============================================================
// SCANNER
// ============================================================

/** Tried at every position, first match wins */
const RECOGNIZERS: readonly Recognizer[] = [
  attributeReference,
  crossReference,
  inlineAnchor,
  autolink,
  inlineMacro,
  emphasis,
  script,
  passthrough,
];

/**
 * Scan `text` into inline nodes.
 *
 * Closing delimiters are found by forward search for the next occurrence;
 * an opener without a close is kept as plain text. Adjacent plain characters
 * are merged into one Text node. Every node produced carries `span`, the
 * location of the source text being scanned.
 *
 * @example
 * ```typescript
 * scanInline('Hello *world*.', span);
 * // [Text "Hello ", Emphasis bold [Text "world"], Text "."]
 * ```
 */
export function scanInline(text: string, span: SourceSpan): InlineNode[] {
  const out: InlineNode[] = [];
  let pending = '';

  const flush = (): void => {
    if (pending !== '') {
      out.push({ type: 'Text', text: pending, span });
      pending = '';
    }
  };

  const lookahead = new MacroLookahead(text);
  let i = 0;
  scan: while (i < text.length) {
    for (const recognize of RECOGNIZERS) {
      const match = recognize(text, i, span, lookahead);
      if (match) {
        flush();
        out.push(match.node);
        i = match.end;
        continue scan;
      }
    }
    pending += text[i];
    i++;
  }

  flush();
  return out;
}
