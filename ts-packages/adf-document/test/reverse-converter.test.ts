/**
 * ADF to AsciiDoc Tests
 */

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import {
  bulletList,
  codeBlock,
  documentNode,
  hardBreak,
  heading,
  linkMark,
  listItem,
  mention,
  orderedList,
  panel,
  paragraph,
  rule,
  textNode
} from '../src/builders.js';
import { AdfToAsciidocConverter } from '../src/reverse-converter.js';
import type { AdfNode } from '../src/types.js';

const converter = new AdfToAsciidocConverter();

function render(...content: AdfNode[]): string {
  return converter.convert({ type: 'doc', content });
}

describe('AdfToAsciidocConverter', () => {
  test('paragraph', () => {
    assert.equal(render(paragraph([textNode('Hello')])), '\nHello\n');
  });

  test('empty paragraph renders nothing', () => {
    assert.equal(render(paragraph([])), '');
  });

  test('heading', () => {
    assert.equal(render(heading(2, [textNode('Title')])), '\n== Title\n');
  });

  test('marks', () => {
    const line = render(paragraph([
      textNode('b', [{ type: 'strong' }]),
      textNode(' '),
      textNode('i', [{ type: 'em' }]),
      textNode(' '),
      textNode('c', [{ type: 'code' }]),
      textNode(' '),
      textNode('s', [{ type: 'strike' }]),
      textNode(' '),
      textNode('docs', [linkMark('https://example.com')])
    ]));
    assert.equal(line, '\n*b* _i_ `c` [.line-through]#s# link:https://example.com[docs]\n');
  });

  test('marks wrap in order', () => {
    assert.equal(render(paragraph([textNode('x', [{ type: 'strong' }, { type: 'em' }])])), '\n_*x*_\n');
  });

  test('bullet list', () => {
    assert.equal(
      render(bulletList([listItem([paragraph([textNode('one')])]), listItem([paragraph([textNode('two')])])])),
      '\n* one\n* two\n'
    );
  });

  test('ordered list', () => {
    assert.equal(
      render(orderedList([listItem([paragraph([textNode('a')])]), listItem([paragraph([textNode('b')])])])),
      '\n. a\n. b\n'
    );
  });

  test('nested list starts on its own line', () => {
    const nested = bulletList([
      listItem([
        paragraph([textNode('one')]),
        orderedList([listItem([paragraph([textNode('inner')])])])
      ])
    ]);
    assert.equal(render(nested), '\n* one\n.. inner\n');
  });

  test('code block', () => {
    assert.equal(render(codeBlock('python', 'print(1)')), '\n[source,python]\n----\nprint(1)\n----\n');
  });

  test('rule', () => {
    assert.equal(render(rule()), "\n'''\n");
  });

  test('panels become admonition blocks', () => {
    assert.equal(render(panel('warning', [paragraph([textNode('Careful')])])), '\n[WARNING]\n====\nCareful\n====\n');
    assert.equal(render(panel('success', [paragraph([textNode('Done')])])), '\n[TIP]\n====\nDone\n====\n');
    assert.equal(render(panel('error', [paragraph([textNode('No')])])), '\n[CAUTION]\n====\nNo\n====\n');
    assert.equal(render(panel('info', [paragraph([textNode('FYI')])])), '\n[NOTE]\n====\nFYI\n====\n');
  });

  test('hard breaks and mentions', () => {
    assert.equal(
      render(paragraph([textNode('a'), hardBreak(), mention('u1', '@Ann')])),
      '\na +\n@Ann\n'
    );
  });

  test('unknown nodes render their children', () => {
    assert.equal(render({ type: 'blockquote', content: [paragraph([textNode('q')])] }), '\nq\n');
    assert.equal(render({ type: 'status', attrs: { text: 'DONE' } }), '');
  });

  test('accepts JSON text', () => {
    const json = JSON.stringify(documentNode([paragraph([textNode('From JSON')])]));
    assert.equal(converter.convert(json), '\nFrom JSON\n');
  });

  test('rejects JSON that is not ADF', () => {
    assert.throws(() => converter.convert('{"version":1}'), /Not an ADF node/);
  });
});
