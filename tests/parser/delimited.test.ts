/**
 * LeanDoc Parser Tests: Delimited Blocks
 */

import { describe, expect, it } from 'vitest';
import { ParseError, tryParse } from '../../src/index.js';
import { blocksOf, nodeAs } from '../helpers/document.js';

describe('LeanDoc Parser: delimited blocks', () => {
  describe('raw fences', () => {
    it('keeps listing lines verbatim', () => {
      expect(blocksOf('----\nlet x = 1;\n\n  indented\n----\n')).toEqual([
        expect.objectContaining({
          type: 'DelimitedBlock',
          delimiter: 'DELIM_LISTING',
          stem: false,
          raw: true,
          text: 'let x = 1;\n\n  indented',
          blocks: [],
        }),
      ]);
    });

    it('does not parse markup inside a literal block', () => {
      expect(blocksOf('....\n== Not a heading\n* not a list\n....\n')).toMatchObject([
        {
          delimiter: 'DELIM_LITERAL',
          text: '== Not a heading\n* not a list',
        },
      ]);
    });

    it('keeps comment blocks', () => {
      expect(blocksOf('////\nhidden\n////\n')).toMatchObject([
        { delimiter: 'DELIM_COMMENT', raw: true, text: 'hidden' },
      ]);
    });

    it('keeps an empty interior as empty text', () => {
      expect(blocksOf('----\n----\n')).toMatchObject([{ text: '' }]);
    });
  });

  describe('stem blocks', () => {
    it('marks a fence preceded by [stem]', () => {
      expect(blocksOf('[stem]\n++++\nx^2^\n++++\n')).toMatchObject([
        {
          type: 'DelimitedBlock',
          delimiter: 'DELIM_PASSTHROUGH',
          stem: true,
          raw: true,
          text: 'x^2^',
        },
      ]);
    });

    it('keeps any stem block raw', () => {
      expect(blocksOf('[stem]\n====\na *b*\n====\n')).toMatchObject([
        { delimiter: 'DELIM_EXAMPLE', stem: true, raw: true, text: 'a *b*' },
      ]);
    });

    it('spans from the stem line', () => {
      const block = nodeAs(blocksOf('[stem]\n++++\nx\n++++\n')[0], 'DelimitedBlock');
      expect(block.span.start.line).toBe(1);
      expect(block.span.end.line).toBe(4);
    });
  });

  describe('structured fences', () => {
    it('parses blocks inside an example block', () => {
      expect(blocksOf('====\nInside *bold*.\n\n* item\n====\n')).toMatchObject([
        {
          type: 'DelimitedBlock',
          delimiter: 'DELIM_EXAMPLE',
          raw: false,
          text: '',
          blocks: [{ type: 'Paragraph' }, { type: 'List' }],
        },
      ]);
    });

    it('ends a nested section at the closing fence', () => {
      expect(blocksOf('****\n== Inner\ntext\n****\nafter\n')).toMatchObject([
        {
          delimiter: 'DELIM_SIDEBAR',
          blocks: [
            { type: 'Section', title: 'Inner', blocks: [{ type: 'Paragraph' }] },
          ],
        },
        { type: 'Paragraph', content: [{ text: 'after' }] },
      ]);
    });

    it('nests different fences', () => {
      expect(blocksOf('____\n--\nquoted\n--\n____\n')).toMatchObject([
        {
          delimiter: 'DELIM_QUOTE',
          blocks: [
            {
              delimiter: 'DELIM_OPEN',
              blocks: [{ type: 'Paragraph', content: [{ text: 'quoted' }] }],
            },
          ],
        },
      ]);
    });

    it('attaches metadata before the closing fence to an empty paragraph', () => {
      expect(blocksOf('====\n[[end]]\n====\n')).toMatchObject([
        {
          blocks: [
            { type: 'Paragraph', content: [], metadata: { anchorId: 'end' } },
          ],
        },
      ]);
    });
  });

  describe('missing closing fence', () => {
    it('reports P001 at the end of input', () => {
      const outcome = tryParse('----\ncode\n');
      expect(outcome.success).toBe(false);
      if (outcome.success) return;
      expect(outcome.error).toBeInstanceOf(ParseError);
      expect(outcome.error.errorId).toBe('LEANDOC-P001');
      expect(outcome.error.toData().message).toBe(
        'Expected closing delimiter ----'
      );
      expect(outcome.error.location).toEqual({
        line: 4,
        column: 1,
        offset: 10,
      });
    });

    it('reports the outer fence when an inner block closes', () => {
      const outcome = tryParse('====\n----\ncode\n----\n');
      if (outcome.success) throw new Error('Expected a parse error');
      expect(outcome.error.context).toEqual({ delimiter: '====' });
    });
  });
});
