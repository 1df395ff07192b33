/**
 * Parser Extension: Table Parsing
 * `|===` fenced tables with escape-aware cell splitting
 */

import { Parser } from './parser.js';
import type {
  BlockMetadata,
  LineToken,
  TableCellNode,
  TableNode,
  TableRowNode,
} from '../types.js';
import { LINE_KINDS, makeSpan } from '../types.js';
import { scanInline } from '../inline/index.js';
import {
  advance,
  check,
  expect,
  isAtEnd,
  parseErrorAt,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseTable(metadata: BlockMetadata | null): TableNode;
  }
}

// ============================================================
// CELL SPLITTING
// ============================================================

/**
 * Split a row line on `|` separators.
 *
 * A pipe preceded by an odd run of backslashes is escaped: one backslash is
 * removed and the pipe is kept as text. An even run leaves the pipe a
 * separator. The text before the first separator is part of the result, so
 * `|a|b` yields `['', 'a', 'b']`.
 *
 * @example
 * splitUnescapedPipe('|a\\|b|c') // ['', 'a|b', 'c']
 */
export function splitUnescapedPipe(line: string): string[] {
  const parts: string[] = [];
  let segment = '';
  let backslashes = 0;

  for (const ch of line) {
    if (ch === '|') {
      if (backslashes % 2 === 0) {
        parts.push(segment);
        segment = '';
      } else {
        segment = segment.slice(0, -1) + '|';
      }
      backslashes = 0;
      continue;
    }
    segment += ch;
    backslashes = ch === '\\' ? backslashes + 1 : 0;
  }

  parts.push(segment);
  return parts;
}

/**
 * Cells of one row line. The text before the leading pipe is dropped, and so
 * is a blank segment after a trailing pipe.
 */
function readCells(token: LineToken): TableCellNode[] {
  const parts = splitUnescapedPipe(token.raw).slice(1);
  const last = parts[parts.length - 1];
  if (last !== undefined && last.trim() === '') parts.pop();

  return parts.map((part) => ({
    type: 'TableCell',
    content: scanInline(part.trim(), token.span),
    span: token.span,
  }));
}

function makeRow(cells: TableCellNode[], fallback: LineToken): TableRowNode {
  const first = cells[0];
  const last = cells[cells.length - 1];
  return {
    type: 'TableRow',
    cells,
    span: makeSpan(
      (first ?? fallback).span.start,
      (last ?? fallback).span.end
    ),
  };
}

// ============================================================
// TABLES
// ============================================================

/**
 * Rows run to the next `|===` or the end of input; other lines in between
 * are skipped. The first row with cells fixes the column count and every
 * later cell is regrouped into rows of that width.
 */
Parser.prototype.parseTable = function (
  this: Parser,
  metadata: BlockMetadata | null
): TableNode {
  const open = expect(this.state, LINE_KINDS.TABLE_DELIM, 'LEANDOC-P002');

  let header: { token: LineToken; cells: TableCellNode[] } | null = null;
  const rest: TableCellNode[] = [];

  while (!isAtEnd(this.state)) {
    if (check(this.state, LINE_KINDS.TABLE_DELIM)) {
      advance(this.state);
      break;
    }
    const token = advance(this.state);
    if (token.kind !== LINE_KINDS.TABLE_LINE) continue;

    const cells = readCells(token);
    if (cells.length === 0) continue;
    if (header === null) {
      header = { token, cells };
    } else {
      rest.push(...cells);
    }
  }

  const rows: TableRowNode[] = [];
  let columns = 0;

  if (header !== null) {
    columns = header.cells.length;
    if (rest.length % columns !== 0) {
      throw parseErrorAt(header.token, 'LEANDOC-P004', {
        cells: columns + rest.length,
        columns,
      });
    }

    rows.push(makeRow(header.cells, header.token));
    for (let i = 0; i < rest.length; i += columns) {
      rows.push(makeRow(rest.slice(i, i + columns), header.token));
    }
  }

  return {
    type: 'Table',
    metadata,
    columns,
    rows,
    span: spanFrom(this.state, open),
  };
};
