/**
 * Marker Lookup Tables
 */

import type { LineKind } from '../token-types.js';
import { LINE_KINDS } from '../token-types.js';

/** Whole-line fences of delimited blocks */
export const FENCES: ReadonlyMap<string, LineKind> = new Map([
  ['----', LINE_KINDS.DELIM_LISTING],
  ['....', LINE_KINDS.DELIM_LITERAL],
  ['____', LINE_KINDS.DELIM_QUOTE],
  ['====', LINE_KINDS.DELIM_EXAMPLE],
  ['****', LINE_KINDS.DELIM_SIDEBAR],
  ['--', LINE_KINDS.DELIM_OPEN],
  ['////', LINE_KINDS.DELIM_COMMENT],
  ['++++', LINE_KINDS.DELIM_PASSTHROUGH],
]);

/** Whole-line thematic break markers */
export const THEMATIC_BREAKS: ReadonlySet<string> = new Set([
  "'''",
  '---',
  '***',
]);

export const ADMONITION_LABELS = [
  'NOTE',
  'TIP',
  'IMPORTANT',
  'CAUTION',
  'WARNING',
] as const;

export const DIRECTIVE_PREFIXES = [
  'ifdef::',
  'ifndef::',
  'ifeval::',
  'endif::',
] as const;

/** Block macros recognized by prefix alone, before the generic `name::target[` pattern */
export const BLOCK_MACRO_PREFIXES = ['include::'] as const;
