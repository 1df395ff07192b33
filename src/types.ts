/**
 * LeanDoc Types
 * Re-exports source locations, line tokens, errors and AST nodes
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
export * from './ast-nodes.js';

// ============================================================
// PARSE RESULT
// ============================================================

import type { DocumentNode } from './ast-nodes.js';
import type { ParseError } from './error-classes.js';

/**
 * Outcome of `tryParse`: the document tree, or the first structural error.
 * A failed parse never yields a partial tree.
 */
export type ParseOutcome =
  | { readonly success: true; readonly document: DocumentNode }
  | { readonly success: false; readonly error: ParseError };
