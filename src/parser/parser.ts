/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { DocumentNode, LineToken } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts classified lines into a document tree.
 *
 * Methods are organized across multiple files:
 * - parser-document.ts: Document header, block dispatch, metadata
 * - parser-blocks.ts: Sections, paragraphs, macros, directives, breaks
 * - parser-delimited.ts: Fenced blocks
 * - parser-lists.ts: Unordered, ordered and description lists
 * - parser-tables.ts: Tables and cell splitting
 *
 * A parser instance is single use: its cursor only moves forward.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const doc = parser.parse();
 * ```
 */
export class Parser {
  /** Cursor over the line tokens and the containers open around it */
  state: ParserState;

  constructor(tokens: readonly LineToken[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete document tree.
   * Throws ParseError on the first structural error.
   */
  parse(): DocumentNode {
    return this.parseDocument();
  }
}
