/**
 * LeanDoc Tree Tests: Visitor
 */

import { describe, expect, it } from 'vitest';
import {
  type ASTNode,
  childrenOf,
  type NodeVisitor,
  parse,
  visitNode,
} from '../../src/index.js';

interface Trace {
  entered: string[];
  exited: string[];
}

const tracer: NodeVisitor<Trace> = {
  enter(node, ctx) {
    ctx.entered.push(node.type);
  },
  exit(node, ctx) {
    ctx.exited.push(node.type);
  },
};

describe('LeanDoc Tree: visitNode', () => {
  it('enters parents before children and exits them after', () => {
    const trace: Trace = { entered: [], exited: [] };
    visitNode(parse('* a\n'), trace, tracer);
    expect(trace.entered).toEqual([
      'Document',
      'List',
      'ListItem',
      'Paragraph',
      'Text',
    ]);
    expect(trace.exited).toEqual([
      'Text',
      'Paragraph',
      'ListItem',
      'List',
      'Document',
    ]);
  });

  it('walks table rows and cells', () => {
    const trace: Trace = { entered: [], exited: [] };
    visitNode(parse('|===\n|a|b\n|===\n'), trace, tracer);
    expect(trace.entered).toEqual([
      'Document',
      'Table',
      'TableRow',
      'TableCell',
      'Text',
      'TableCell',
      'Text',
    ]);
  });
});

describe('LeanDoc Tree: childrenOf', () => {
  it('returns inline content of paragraphs', () => {
    const [para] = parse('x *y*\n').blocks;
    if (!para) throw new Error('Expected a paragraph');
    expect(childrenOf(para).map((n: ASTNode) => n.type)).toEqual([
      'Text',
      'Emphasis',
    ]);
  });

  it('treats literal paragraphs as leaves', () => {
    const [literal] = parse(' code\n').blocks;
    if (!literal) throw new Error('Expected a literal paragraph');
    expect(literal.type).toBe('LiteralParagraph');
    expect(childrenOf(literal)).toEqual([]);
  });
});
