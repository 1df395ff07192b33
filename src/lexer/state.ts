/**
 * Line Stream
 * Random-access cursor over classified lines
 */

import type { LineToken } from '../token-types.js';
import { LINE_KINDS } from '../token-types.js';

export interface LineStream {
  /** Classified lines followed by exactly one EOF token */
  readonly tokens: readonly LineToken[];
  pos: number;
}

export function createLineStream(tokens: readonly LineToken[]): LineStream {
  if (tokens.length === 0) {
    throw new Error('Line stream requires at least the EOF token');
  }
  return { tokens, pos: 0 };
}

/** Token `offset` lines ahead; clamps to the EOF token */
export function peek(stream: LineStream, offset = 0): LineToken {
  const idx = Math.max(0, stream.pos + offset);
  const token = stream.tokens[idx] ?? stream.tokens[stream.tokens.length - 1];
  if (!token) throw new Error('No tokens available');
  return token;
}

/** Consume and return the current token; EOF is never consumed */
export function take(stream: LineStream): LineToken {
  const token = peek(stream);
  if (stream.pos < stream.tokens.length - 1) stream.pos++;
  return token;
}

export function atEnd(stream: LineStream): boolean {
  return peek(stream).kind === LINE_KINDS.EOF;
}
