/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceLocation } from './types.js';
import type { EnrichedError } from './cli-error-enrichment.js';
import type { ErrorFormat } from './config.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type { EnrichedError };

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: ErrorFormat;
  /** Shown in front of the location when present */
  readonly file?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format enriched error for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: EnrichedError,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'json':
      return formatErrorJson(error);
    case 'compact':
      return formatErrorCompact(error, options);
    case 'human':
      return formatErrorHuman(error, options);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

function locationOf(
  location: SourceLocation,
  file: string | undefined
): string {
  const position = `${location.line}:${location.column}`;
  return file ? `${file}:${position}` : position;
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[LEANDOC-P003]: Unexpected table line
 *   --> guide.adoc:2:1
 *    |
 *  1 | == Data
 *  2 | |a|b
 *    | ^^^^
 *  3 |
 *    |
 * ```
 *
 * The error line is underlined from its first to its last non-blank
 * character.
 */
function formatErrorHuman(error: EnrichedError, options: FormatOptions): string {
  const lines: string[] = [];

  lines.push(`error[${error.errorId}]: ${error.message}`);

  if (error.location) {
    lines.push(`  --> ${locationOf(error.location, options.file)}`);
  }

  const snippet = error.snippet;
  if (snippet && snippet.length > 0) {
    lines.push('   |');

    const maxLineNumber = Math.max(...snippet.map((l) => l.lineNumber));
    const lineNumberWidth = String(maxLineNumber).length;

    for (const line of snippet) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`.trimEnd());

      if (line.isErrorLine) {
        const padding = ' '.repeat(lineNumberWidth);
        lines.push(` ${padding} | ${renderLineUnderline(line.content)}`);
      }
    }
    lines.push('   |');
  }

  return lines.join('\n');
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 */
function formatErrorJson(error: EnrichedError): string {
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    range?: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
  } = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'leandoc',
    code: error.errorId,
  };

  if (error.location) {
    // LSP positions are 0-based; the range is the start of the error line
    const position = {
      line: error.location.line - 1,
      character: error.location.column - 1,
    };
    diagnostic.range = { start: position, end: { ...position } };
  }

  return JSON.stringify(diagnostic, null, 2);
}

/**
 * Format error in compact format (single line for CI).
 */
function formatErrorCompact(
  error: EnrichedError,
  options: FormatOptions
): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  if (error.location) {
    parts.push(`at ${locationOf(error.location, options.file)}`);
  }

  return parts.join(' ');
}

// ============================================================
// UNDERLINE
// ============================================================

/** Carets under the non-blank text of `lineContent`; one caret for a blank line */
export function renderLineUnderline(lineContent: string): string {
  const text = lineContent.trim();
  if (text === '') return '^';
  const indent = lineContent.indexOf(text);
  return ' '.repeat(indent) + '^'.repeat(text.length);
}
