/**
 * LeanDoc Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { DocumentNode, ParseOutcome } from '../types.js';
import { ParseError } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-document.js';
import './parser-blocks.js';
import './parser-delimited.js';
import './parser-lists.js';
import './parser-tables.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse a LeanDoc document into a tree.
 *
 * Throws ParseError on the first structural error; no partial tree is
 * returned.
 *
 * @example
 * ```typescript
 * const doc = parse('= Title\n\nHello *world*.\n');
 * doc.header.title; // 'Title'
 * ```
 */
export function parse(source: string): DocumentNode {
  const parser = new Parser(tokenize(source));
  return parser.parse();
}

/**
 * Parse without throwing on structural errors.
 *
 * @example
 * ```typescript
 * const outcome = tryParse(source);
 * if (!outcome.success) {
 *   console.error(outcome.error.message);
 * }
 * ```
 */
export function tryParse(source: string): ParseOutcome {
  try {
    return { success: true, document: parse(source) };
  } catch (err) {
    if (err instanceof ParseError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

// Pure sub-parsers
export {
  parseAnchor,
  parseAttributeList,
  stripOuter,
  type Anchor,
} from './attributes.js';
export { splitUnescapedPipe } from './parser-tables.js';

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
