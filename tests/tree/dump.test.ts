/**
 * LeanDoc Tree Tests: Debug Dumps
 */

import { describe, expect, it } from 'vitest';
import { dumpTokens, dumpTree, parse, tokenize } from '../../src/index.js';

describe('LeanDoc Tree: dumpTree', () => {
  it('prints one indented line per node', () => {
    expect(dumpTree(parse('= T\n\nHi *you*\n'))).toBe(
      [
        'Document @1 kv=2',
        '  Paragraph @3',
        '    Text @3 text="Hi "',
        '    Emphasis @3 name="bold"',
        '      Text @3 text="you"',
        '',
      ].join('\n')
    );
  });

  it('prints metadata fields before the payload fields', () => {
    expect(dumpTree(parse('[[top,Top]]\n.Caption\n[a=1,b]\n== S\n'))).toBe(
      [
        'Document @1',
        '  Section @4 anchorId="top" anchorText="Top" title="Caption" attrs=2 name="S" kv=1',
        '',
      ].join('\n')
    );
  });

  it('cuts text longer than the width', () => {
    expect(dumpTree(parse('abcdefgh\n'), { textWidth: 5 })).toBe(
      'Document @1\n  Paragraph @1\n    Text @1 text="abcde"...\n'
    );
  });

  it('collapses whitespace in cut text', () => {
    const dump = dumpTree(parse('----\na\n\n   b\n----\n'), { textWidth: 3 });
    expect(dump.split('\n')[1]).toBe(
      '  DelimitedBlock @1 text="a b"... kv=2'
    );
  });
});

describe('LeanDoc Tree: dumpTokens', () => {
  it('prints every token including EOF', () => {
    expect(dumpTokens(tokenize('== A\n* b\n'))).toBe(
      [
        '1: SECTION level=2 rest="A"',
        '2: UL_ITEM level=1 rest="b"',
        '3: BLANK',
        '4: EOF',
        '',
      ].join('\n')
    );
  });

  it('prints the head of split lines', () => {
    expect(dumpTokens(tokenize('NOTE: x'))).toBe(
      '1: ADMONITION head="NOTE" rest="x"\n2: EOF\n'
    );
  });
});
