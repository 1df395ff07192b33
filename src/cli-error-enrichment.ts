/**
 * CLI Error Enrichment
 * Attach source snippets to structured errors
 */

import type { LeanDocError, SourceLocation } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Source lines around the error line, when it is inside the source */
  readonly snippet?: SnippetLine[] | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Source lines from `contextLines` before to `contextLines` after the
 * 1-based `line`, clamped to the source.
 *
 * @throws {RangeError} When `line` is outside the source
 */
export function extractSnippet(
  source: string,
  line: number,
  contextLines: number = 2
): SnippetLine[] {
  if (source === '') return [];

  const lines = source.split('\n');
  if (line < 1 || line > lines.length) {
    throw new RangeError(`Line ${line} is outside the source`);
  }

  const first = Math.max(1, line - contextLines);
  const last = Math.min(lines.length, line + contextLines);
  return lines.slice(first - 1, last).map((content, i) => ({
    lineNumber: first + i,
    content: content.replace(/\r$/, ''),
    isErrorLine: first + i === line,
  }));
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Enrich a LeanDocError with a source snippet.
 *
 * Errors without a location, and locations past the last source line (the
 * end of input), carry no snippet.
 */
export function enrichError(
  error: LeanDocError,
  source: string,
  contextLines: number = 2
): EnrichedError {
  const location = error.location;
  const inSource =
    location !== undefined &&
    source !== '' &&
    location.line <= source.split('\n').length;

  return {
    errorId: error.errorId,
    message: error.toData().message,
    location,
    context: error.context,
    snippet: inSource
      ? extractSnippet(source, location.line, contextLines)
      : undefined,
  };
}
