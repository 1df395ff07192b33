/**
 * LeanDoc Tree Tests: Payload View
 */

import { describe, expect, it } from 'vitest';
import { parse, toPayload } from '../../src/index.js';
import { blocksOf, SPAN } from '../helpers/document.js';

describe('LeanDoc Tree: toPayload', () => {
  it('flattens the header into the document key/value map', () => {
    const payload = toPayload(
      parse('= Doc\nAda <ada@example.com>\n:lang: en\n\n== Intro\n')
    );
    expect(payload.kind).toBe('Document');
    expect(payload.kv).toEqual({
      title: 'Doc',
      titleLine: '1',
      authorLine: 'Ada <ada@example.com>',
      authorLineNo: '2',
      'attr:lang': 'en',
    });
    expect(payload.children).toEqual([
      {
        kind: 'Section',
        position: { line: 5, column: 1 },
        meta: null,
        text: '',
        name: 'Intro',
        target: '',
        kv: { level: '2' },
        children: [],
      },
    ]);
  });

  it('exposes metadata as plain objects', () => {
    const [block] = blocksOf('[[t,Top]]\n.Caption\n[source,.wide]\n----\nx\n----\n');
    if (!block) throw new Error('Expected a block');
    expect(toPayload(block)).toMatchObject({
      kind: 'DelimitedBlock',
      meta: {
        anchorId: 't',
        anchorText: 'Top',
        title: 'Caption',
        attributes: { source: '', '.wide': '' },
        roles: ['wide'],
      },
      text: 'x',
      kv: { delim: 'DELIM_LISTING', stem: '0' },
      children: [],
    });
  });

  it('stores list type, item level, check mark and term', () => {
    const [unordered] = blocksOf('* [x] done\n');
    const [description] = blocksOf('Term::\nDef\n');
    if (!unordered || !description) throw new Error('Expected lists');

    expect(toPayload(unordered)).toMatchObject({
      kv: { type: 'unordered' },
      children: [{ kind: 'ListItem', name: '', kv: { level: '1', check: 'x' } }],
    });
    expect(toPayload(description)).toMatchObject({
      kv: { type: 'description' },
      children: [
        {
          kind: 'ListItem',
          name: 'Term',
          kv: { level: '2', kind: 'definition' },
          children: [{ kind: 'Paragraph' }],
        },
      ],
    });
  });

  it('uses name and text for macros, directives and admonitions', () => {
    const payloads = blocksOf(
      'include::a.adoc[]\n\nifdef::x[]\nendif::[]\n\nTIP: Hi\n'
    ).map(toPayload);
    expect(payloads).toMatchObject([
      { kind: 'BlockMacro', name: 'include', target: 'a.adoc[]' },
      {
        kind: 'Directive',
        name: 'ifdef',
        text: 'x[]',
        children: [{ kind: 'Directive', name: 'endif', text: '[]' }],
      },
      { kind: 'AdmonitionParagraph', name: 'TIP' },
    ]);
  });

  it('maps inline nodes to their fields', () => {
    const [para] = blocksOf(
      'A `raw` <<sec>> {attr} https://example.org ++p++ btn:[OK]\n'
    );
    if (!para) throw new Error('Expected a paragraph');
    expect(toPayload(para).children).toMatchObject([
      { kind: 'Text', text: 'A ' },
      { kind: 'Emphasis', name: 'mono', text: 'raw' },
      { kind: 'Text', text: ' ' },
      { kind: 'CrossReference', target: 'sec' },
      { kind: 'Text', text: ' ' },
      { kind: 'AttributeReference', name: 'attr' },
      { kind: 'Text', text: ' ' },
      { kind: 'Link', target: 'https://example.org' },
      { kind: 'Text', text: ' ' },
      { kind: 'Passthrough', kv: { plusN: '2' } },
      { kind: 'Text', text: ' ' },
      { kind: 'InlineMacro', name: 'btn', target: '' },
    ]);
  });

  it('converts nodes the scanner does not produce', () => {
    expect(toPayload({ type: 'LineBreak', span: SPAN })).toMatchObject({
      kind: 'LineBreak',
      kv: {},
      children: [],
    });
    expect(
      toPayload({ type: 'InlineImage', target: 'a.png', content: [], span: SPAN })
    ).toMatchObject({ kind: 'InlineImage', target: 'a.png' });
  });
});
