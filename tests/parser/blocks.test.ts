/**
 * LeanDoc Parser Tests: Paragraphs, Macros, Directives and Breaks
 */

import { describe, expect, it } from 'vitest';
import { blocksOf, inlineOf, nodeAs } from '../helpers/document.js';

describe('LeanDoc Parser: paragraphs', () => {
  it('joins trimmed lines with single spaces', () => {
    expect(inlineOf('one\ntwo\n  three\n')).toMatchObject([
      { type: 'Text', text: 'one two three' },
    ]);
  });

  it('keeps object property names inside the paragraph', () => {
    expect(blocksOf('Call the\nconstructor\nnow\n')).toMatchObject([
      {
        type: 'Paragraph',
        content: [{ type: 'Text', text: 'Call the constructor now' }],
      },
    ]);
  });

  it('ends at a blank line', () => {
    expect(blocksOf('one\n\ntwo\n')).toMatchObject([
      { type: 'Paragraph', content: [{ text: 'one' }] },
      { type: 'Paragraph', content: [{ text: 'two' }] },
    ]);
  });

  it('ends before a list marker', () => {
    expect(blocksOf('intro\n* item\n')).toMatchObject([
      { type: 'Paragraph', content: [{ text: 'intro' }] },
      { type: 'List', listType: 'unordered' },
    ]);
  });

  it('keeps an indented paragraph verbatim minus one character', () => {
    expect(blocksOf('  code line\n   more\nafter\n')).toMatchObject([
      { type: 'LiteralParagraph', text: ' code line\n  more' },
      { type: 'Paragraph', content: [{ text: 'after' }] },
    ]);
  });

  it('turns a stray continuation into a one-line paragraph', () => {
    expect(blocksOf('+\n')).toMatchObject([
      { type: 'Paragraph', content: [{ type: 'Text', text: '+' }] },
    ]);
  });

  it('turns [stem] without a fence into a paragraph', () => {
    expect(blocksOf('[stem]\ntext\n')).toMatchObject([
      { type: 'Paragraph', content: [{ text: '[stem]' }] },
      { type: 'Paragraph', content: [{ text: 'text' }] },
    ]);
  });

  it('spans the lines it consumed', () => {
    const para = nodeAs(blocksOf('\none\ntwo\n')[0], 'Paragraph');
    expect(para.span.start.line).toBe(2);
    expect(para.span.end.line).toBe(3);
    expect(para.content[0]?.span).toEqual(para.span);
  });
});

describe('LeanDoc Parser: admonitions', () => {
  it('scans the text after the label', () => {
    expect(blocksOf('WARNING: Read *this*.\n')).toMatchObject([
      {
        type: 'AdmonitionParagraph',
        label: 'WARNING',
        content: [
          { type: 'Text', text: 'Read ' },
          { type: 'Emphasis', style: 'bold' },
          { type: 'Text', text: '.' },
        ],
      },
    ]);
  });
});

describe('LeanDoc Parser: block macros', () => {
  it('keeps the unparsed target', () => {
    expect(blocksOf('image::diagram.png[Diagram]\n')).toMatchObject([
      { type: 'BlockMacro', name: 'image', target: 'diagram.png[Diagram]' },
    ]);
  });

  it('ends a paragraph before a macro line', () => {
    expect(blocksOf('text\ninclude::ch1.adoc[]\n')).toMatchObject([
      { type: 'Paragraph' },
      { type: 'BlockMacro', name: 'include', target: 'ch1.adoc[]' },
    ]);
  });
});

describe('LeanDoc Parser: directives', () => {
  it('owns the blocks up to endif and keeps endif as the last block', () => {
    expect(
      blocksOf('ifdef::env-web[]\nWeb only.\nendif::[]\nAfter.\n')
    ).toMatchObject([
      {
        type: 'Directive',
        name: 'ifdef',
        text: 'env-web[]',
        blocks: [
          { type: 'Paragraph', content: [{ text: 'Web only.' }] },
          { type: 'Directive', name: 'endif', text: '[]', blocks: [] },
        ],
      },
      { type: 'Paragraph', content: [{ text: 'After.' }] },
    ]);
  });

  it('closes the innermost conditional at the first endif', () => {
    const outer = nodeAs(
      blocksOf('ifdef::a[]\nifndef::b[]\ninner\nendif::[]\nouter\nendif::[]\n')[0],
      'Directive'
    );
    expect(outer.blocks).toMatchObject([
      {
        type: 'Directive',
        name: 'ifndef',
        blocks: [{ type: 'Paragraph' }, { name: 'endif' }],
      },
      { type: 'Paragraph', content: [{ text: 'outer' }] },
      { type: 'Directive', name: 'endif' },
    ]);
  });

  it('ends a section body at the endif of its conditional', () => {
    expect(
      blocksOf('ifdef::x[]\n== S\ntext\nendif::[]\nafter\n')
    ).toMatchObject([
      {
        type: 'Directive',
        blocks: [
          { type: 'Section', blocks: [{ type: 'Paragraph' }] },
          { type: 'Directive', name: 'endif' },
        ],
      },
      { type: 'Paragraph', content: [{ text: 'after' }] },
    ]);
  });

  it('runs an unterminated conditional to the end of input', () => {
    expect(blocksOf('ifeval::[1 > 0]\ntext\n')).toMatchObject([
      { type: 'Directive', name: 'ifeval', blocks: [{ type: 'Paragraph' }] },
    ]);
  });

  it('keeps a stray endif as an empty directive', () => {
    expect(blocksOf('endif::[]\n')).toMatchObject([
      { type: 'Directive', name: 'endif', blocks: [] },
    ]);
  });
});

describe('LeanDoc Parser: breaks', () => {
  it('keeps the marker and the page break text', () => {
    expect(blocksOf("'''\n\n<<< next\n")).toMatchObject([
      { type: 'ThematicBreak', text: "'''" },
      { type: 'PageBreak', text: 'next' },
    ]);
  });

  it('drops line comments between blocks', () => {
    expect(blocksOf('a\n\n// hidden\n\nb\n')).toMatchObject([
      { type: 'Paragraph' },
      { type: 'Paragraph' },
    ]);
  });
});
