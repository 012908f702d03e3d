/**
 * Document Converter Tests
 *
 * Conversion of source trees built by hand, without a markup parser.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { anchorExtension, tocExtension } from '../src/builders.js';
import { DocumentConverter } from '../src/document-converter.js';
import { sequentialIds } from '../src/ids.js';
import type { InlineHandler, MarkupParser, ParseOptions, SourceBlock } from '../src/source-types.js';
import { MemoryLogger, StaticImageProber, sourceDocument } from './helpers/fixtures.js';

function converter(options: { parser?: MarkupParser; prober?: StaticImageProber } = {}): DocumentConverter {
  return new DocumentConverter({
    parser: options.parser,
    imageProber: options.prober ?? new StaticImageProber(),
    logger: new MemoryLogger(),
    idFactory: sequentialIds('key')
  });
}

function convertBlocks(blocks: SourceBlock[]): unknown {
  return converter().convertDocument(sourceDocument(blocks)).content;
}

describe('document envelope', () => {
  test('single paragraph', () => {
    const doc = converter().convertDocument(sourceDocument([{ kind: 'paragraph', text: 'This is a paragraph.' }]));
    assert.deepEqual(doc, {
      version: 1,
      type: 'doc',
      content: [{ type: 'paragraph', content: [{ type: 'text', text: 'This is a paragraph.' }] }]
    });
  });

  test('empty document', () => {
    assert.deepEqual(converter().convertDocument(sourceDocument([])), { version: 1, type: 'doc', content: [] });
  });

  test('convert() needs a parser', () => {
    assert.throws(() => converter().convert('text'), /requires a markup parser/);
  });
});

describe('blocks', () => {
  test('empty paragraphs are kept', () => {
    assert.deepEqual(convertBlocks([{ kind: 'paragraph', text: '' }]), [{ type: 'paragraph', content: [] }]);
  });

  test('block extensions in paragraph text split the paragraph', () => {
    const text = 'Before {"type":"extension","attrs":{"extensionKey":"k"}} after';
    assert.deepEqual(convertBlocks([{ kind: 'paragraph', text }]), [
      { type: 'paragraph', content: [{ type: 'text', text: 'Before ' }] },
      { type: 'extension', attrs: { extensionKey: 'k' } },
      { type: 'paragraph', content: [{ type: 'text', text: ' after' }] }
    ]);
  });

  test('a lone block extension leaves no empty paragraph', () => {
    const text = '{"type":"extension","attrs":{"extensionKey":"k"}}';
    assert.deepEqual(convertBlocks([{ kind: 'paragraph', text }]), [
      { type: 'extension', attrs: { extensionKey: 'k' } }
    ]);
  });

  test('section becomes a heading with an anchor, followed by its blocks', () => {
    const content = convertBlocks([{
      kind: 'section',
      level: 1,
      title: 'Section Title',
      id: '_section_title',
      blocks: [{ kind: 'paragraph', text: 'Body' }]
    }]);
    assert.deepEqual(content, [
      {
        type: 'heading',
        attrs: { level: 2 },
        content: [{ type: 'text', text: 'Section Title' }, anchorExtension('_section_title')]
      },
      { type: 'paragraph', content: [{ type: 'text', text: 'Body' }] }
    ]);
  });

  test('section without id has no anchor', () => {
    const content = convertBlocks([{ kind: 'section', level: 2, title: 'Plain', blocks: [] }]);
    assert.deepEqual(content, [{ type: 'heading', attrs: { level: 3 }, content: [{ type: 'text', text: 'Plain' }] }]);
  });

  test('lists keep nested lists inside the item', () => {
    const content = convertBlocks([{
      kind: 'ulist',
      items: [
        { text: 'one', blocks: [{ kind: 'olist', items: [{ text: 'inner', blocks: [] }] }] },
        { text: 'two', blocks: [] }
      ]
    }]);
    assert.deepEqual(content, [{
      type: 'bulletList',
      content: [
        {
          type: 'listItem',
          content: [
            { type: 'paragraph', content: [{ type: 'text', text: 'one' }] },
            {
              type: 'orderedList',
              content: [{ type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'inner' }] }] }]
            }
          ]
        },
        { type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'two' }] }] }
      ]
    }]);
  });

  test('table rows, headers and spans', () => {
    const content = convertBlocks([{
      kind: 'table',
      head: [[{ style: 'default', text: 'H' }]],
      body: [[{ style: 'default', text: 'a', colspan: 2 }], [{ style: 'header', text: 'b', rowspan: 2 }]],
      foot: [[{ style: 'default', text: 'f' }]]
    }]);
    const cell = (type: string, text: string, colspan = 1, rowspan = 1): unknown => ({
      type,
      attrs: { colspan, rowspan },
      content: [{ type: 'paragraph', content: [{ type: 'text', text }] }]
    });
    assert.deepEqual(content, [{
      type: 'table',
      content: [
        { type: 'tableRow', content: [cell('tableHeader', 'H')] },
        { type: 'tableRow', content: [cell('tableCell', 'a', 2)] },
        { type: 'tableRow', content: [cell('tableHeader', 'b', 1, 2)] },
        { type: 'tableRow', content: [cell('tableCell', 'f')] }
      ]
    }]);
  });

  test('admonitions map to panel types', () => {
    const panelType = (name: string): unknown => {
      const [panel] = converter().convertDocument(sourceDocument([{ kind: 'admonition', name, text: 'x', blocks: [] }])).content;
      return panel.attrs?.panelType;
    };
    assert.equal(panelType('note'), 'info');
    assert.equal(panelType('tip'), 'info');
    assert.equal(panelType('warning'), 'warning');
    assert.equal(panelType('important'), 'error');
    assert.equal(panelType('CAUTION'), 'error');
    assert.equal(panelType('custom'), 'info');
  });

  test('compound admonition converts its blocks', () => {
    const content = convertBlocks([{
      kind: 'admonition',
      name: 'tip',
      blocks: [{ kind: 'paragraph', text: 'first' }, { kind: 'paragraph', text: 'second' }]
    }]);
    assert.deepEqual(content, [{
      type: 'panel',
      attrs: { panelType: 'info' },
      content: [
        { type: 'paragraph', content: [{ type: 'text', text: 'first' }] },
        { type: 'paragraph', content: [{ type: 'text', text: 'second' }] }
      ]
    }]);
  });

  test('quote wraps its text in a blockquote', () => {
    assert.deepEqual(convertBlocks([{ kind: 'quote', text: 'Said', blocks: [] }]), [
      { type: 'blockquote', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Said' }] }] }
    ]);
  });

  test('listing and literal blocks are verbatim code blocks', () => {
    assert.deepEqual(convertBlocks([
      { kind: 'listing', language: 'python', source: 'print("a & b")' },
      { kind: 'literal', source: 'as is' }
    ]), [
      { type: 'codeBlock', attrs: { language: 'python' }, content: [{ type: 'text', text: 'print("a & b")' }] },
      { type: 'codeBlock', attrs: { language: 'plaintext' }, content: [{ type: 'text', text: 'as is' }] }
    ]);
  });

  test('page breaks become rules; breaks, sidebars and floating titles vanish', () => {
    assert.deepEqual(convertBlocks([
      { kind: 'page_break' },
      { kind: 'thematic_break' },
      { kind: 'sidebar', title: 'Aside' },
      { kind: 'floating_title', title: 'Float' }
    ]), [{ type: 'rule' }]);
  });

  test('preamble and open blocks are transparent', () => {
    assert.deepEqual(convertBlocks([
      { kind: 'preamble', blocks: [{ kind: 'paragraph', text: 'a' }] },
      { kind: 'open', blocks: [{ kind: 'paragraph', text: 'b' }] }
    ]), [
      { type: 'paragraph', content: [{ type: 'text', text: 'a' }] },
      { type: 'paragraph', content: [{ type: 'text', text: 'b' }] }
    ]);
  });

  test('toc block', () => {
    assert.deepEqual(convertBlocks([{ kind: 'toc' }]), [tocExtension()]);
  });

  test('pass blocks emit ADF JSON as is', () => {
    assert.deepEqual(convertBlocks([
      { kind: 'pass', content: '{"type":"rule"}' },
      { kind: 'pass', content: 'raw text' },
      { kind: 'pass', content: '  ' }
    ]), [
      { type: 'rule' },
      { type: 'paragraph', content: [{ type: 'text', text: 'raw text' }] }
    ]);
  });
});

describe('table of contents', () => {
  const section: SourceBlock = { kind: 'section', level: 1, title: 'S', blocks: [] };

  test('auto placement adds the macro first', () => {
    const doc = converter().convertDocument(sourceDocument([section], { toc: '', 'toc-placement': 'auto' }));
    assert.deepEqual(doc.content[0], tocExtension());
  });

  test('other placements do not', () => {
    const doc = converter().convertDocument(sourceDocument([section], { toc: '', 'toc-placement': 'macro' }));
    assert.equal(doc.content[0].type, 'heading');
  });

  test('documents without sections do not', () => {
    const doc = converter().convertDocument(sourceDocument([{ kind: 'paragraph', text: 'p' }], { toc: '', 'toc-placement': 'auto' }));
    assert.equal(doc.content[0].type, 'paragraph');
  });
});

describe('images', () => {
  test('block image with explicit size', () => {
    const content = convertBlocks([{ kind: 'image', target: 'diagram.png', alt: 'Diagram', width: '200', height: '100' }]);
    assert.deepEqual(content, [{
      type: 'mediaSingle',
      attrs: { layout: 'wide', width: 200, widthType: 'pixel' },
      content: [{
        type: 'media',
        attrs: {
          type: 'file',
          id: 'diagram.png',
          collection: 'attachments',
          alt: 'Diagram',
          occurrenceKey: 'key-1',
          width: 200,
          height: 100
        }
      }]
    }]);
  });

  test('remote image height follows the probed aspect ratio', () => {
    const prober = new StaticImageProber({ 'https://example.com/a.png': { width: 400, height: 300 } });
    const doc = converter({ prober }).convertDocument(sourceDocument([
      { kind: 'image', target: 'https://example.com/a.png', width: '200' }
    ]));
    assert.deepEqual(doc.content[0].content?.[0].attrs, {
      type: 'file',
      id: 'https://example.com/a.png',
      collection: 'attachments',
      alt: '',
      occurrenceKey: 'key-1',
      width: 200,
      height: 150
    });
  });

  test('missing image keeps its explicit width only', () => {
    const logger = new MemoryLogger();
    const doc = new DocumentConverter({ imageProber: new StaticImageProber(), logger, idFactory: sequentialIds() })
      .convertDocument(sourceDocument([{ kind: 'image', target: 'nowhere.png', width: '80' }], {}, { baseDir: '/no/such/dir' }));
    assert.deepEqual(doc.content[0].attrs, { layout: 'wide', width: 80, widthType: 'pixel' });
    assert.equal(logger.messages('warn').length, 1);
  });
});

describe('asciidoc table cells', () => {
  class StubParser implements MarkupParser {
    readonly calls: Array<{ source: string; options: ParseOptions; inline: InlineHandler }> = [];

    constructor(private readonly blocks: SourceBlock[]) {}

    parse(source: string, options: ParseOptions, inline: InlineHandler) {
      this.calls.push({ source, options, inline });
      return sourceDocument(this.blocks, {}, options);
    }
  }

  const table = (text: string): SourceBlock => ({
    kind: 'table',
    head: [],
    body: [[{ style: 'asciidoc', text }]],
    foot: []
  });

  test('are parsed as nested documents with inherited options', () => {
    const parser = new StubParser([{ kind: 'ulist', items: [{ text: 'nested', blocks: [] }] }]);
    const docConverter = converter({ parser });
    const parseOptions: ParseOptions = { safe: 'safe', attributes: { product: 'Widget' }, baseDir: '/docs' };
    const doc = docConverter.convertDocument(sourceDocument([table('* nested')], {}, parseOptions));

    assert.equal(parser.calls.length, 1);
    assert.equal(parser.calls[0].source, '* nested');
    assert.deepEqual(parser.calls[0].options, parseOptions);
    assert.equal(parser.calls[0].inline, docConverter.inlineHandler);
    assert.deepEqual(doc.content[0].content?.[0].content?.[0].content, [{
      type: 'bulletList',
      content: [{ type: 'listItem', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'nested' }] }] }]
    }]);
  });

  test('fall back to a paragraph when nothing is parsed', () => {
    const doc = converter({ parser: new StubParser([]) }).convertDocument(sourceDocument([table('just text')]));
    assert.deepEqual(doc.content[0].content?.[0].content?.[0].content, [
      { type: 'paragraph', content: [{ type: 'text', text: 'just text' }] }
    ]);
  });

  test('fall back to a paragraph without a parser', () => {
    const doc = converter().convertDocument(sourceDocument([table('plain')]));
    assert.deepEqual(doc.content[0].content?.[0].content?.[0].content, [
      { type: 'paragraph', content: [{ type: 'text', text: 'plain' }] }
    ]);
  });

  test('use pre-parsed blocks when present', () => {
    const parser = new StubParser([]);
    const doc = converter({ parser }).convertDocument(sourceDocument([{
      kind: 'table',
      head: [],
      body: [[{ style: 'asciidoc', text: 'ignored', blocks: [{ kind: 'paragraph', text: 'pre' }] }]],
      foot: []
    }]));
    assert.equal(parser.calls.length, 0);
    assert.deepEqual(doc.content[0].content?.[0].content?.[0].content, [
      { type: 'paragraph', content: [{ type: 'text', text: 'pre' }] }
    ]);
  });
});

describe('inline nodes', () => {
  function paragraphWith(build: (inline: InlineHandler) => string): unknown {
    const docConverter = converter();
    const text = build(docConverter.inlineHandler);
    return docConverter.convertDocument(sourceDocument([{ kind: 'paragraph', text }])).content[0].content;
  }

  test('links', () => {
    const content = paragraphWith(inline =>
      `See ${inline.convertInline({ kind: 'inline_anchor', type: 'link', target: 'https://example.com', text: 'docs' })} now`);
    assert.deepEqual(content, [
      { type: 'text', text: 'See ' },
      { type: 'text', text: 'docs', marks: [{ type: 'link', attrs: { href: 'https://example.com' } }] },
      { type: 'text', text: ' now' }
    ]);
  });

  test('links without text use the target', () => {
    const content = paragraphWith(inline =>
      inline.convertInline({ kind: 'inline_anchor', type: 'link', target: 'https://example.com' }));
    assert.deepEqual(content, [
      { type: 'text', text: 'https://example.com', marks: [{ type: 'link', attrs: { href: 'https://example.com' } }] }
    ]);
  });

  test('cross references use the referenced title', () => {
    const content = paragraphWith(inline =>
      inline.convertInline({ kind: 'inline_anchor', type: 'xref', refid: 'intro', referenceTitle: 'Introduction' }));
    assert.deepEqual(content, [
      { type: 'text', text: 'Introduction', marks: [{ type: 'link', attrs: { href: '#intro' } }] }
    ]);
  });

  test('unresolved cross references show the id', () => {
    const content = paragraphWith(inline =>
      inline.convertInline({ kind: 'inline_anchor', type: 'xref', refid: 'missing' }));
    assert.deepEqual(content, [
      { type: 'text', text: '[missing]', marks: [{ type: 'link', attrs: { href: '#missing' } }] }
    ]);
  });

  test('inline anchors register for later cross references', () => {
    const content = paragraphWith(inline => {
      const anchor = inline.convertInline({ kind: 'inline_anchor', type: 'ref', refid: 'here', reftext: 'Here' });
      const xref = inline.convertInline({ kind: 'inline_anchor', type: 'xref', refid: 'here' });
      return `${anchor}Go ${xref}`;
    });
    assert.deepEqual(content, [
      anchorExtension('here'),
      { type: 'text', text: 'Go ' },
      { type: 'text', text: 'Here', marks: [{ type: 'link', attrs: { href: '#here' } }] }
    ]);
  });

  test('quoted text becomes marked text', () => {
    const content = paragraphWith(inline => [
      inline.convertInline({ kind: 'inline_quoted', type: 'strong', text: 'bold' }),
      inline.convertInline({ kind: 'inline_quoted', type: 'mark', text: 'lit' }),
      inline.convertInline({ kind: 'inline_quoted', type: 'double', text: 'q' })
    ].join(' '));
    assert.deepEqual(content, [
      { type: 'text', text: 'bold', marks: [{ type: 'strong' }] },
      { type: 'text', text: ' ' },
      { type: 'text', text: 'lit', marks: [{ type: 'backgroundColor', attrs: { color: '#FFFF00' } }] },
      { type: 'text', text: ' “q”' }
    ]);
  });

  test('quoted structured JSON is registered as a node', () => {
    const content = paragraphWith(inline => inline.convertInline({
      kind: 'inline_quoted',
      type: 'strong',
      text: '{"type":"mention","attrs":{"id":"u1","text":"@Ann"}}'
    }));
    assert.deepEqual(content, [{ type: 'mention', attrs: { id: 'u1', text: '@Ann' } }]);
  });

  test('hard breaks', () => {
    const content = paragraphWith(inline =>
      `${inline.convertInline({ kind: 'inline_break', text: 'line one' })}\nline two`);
    assert.deepEqual(content, [
      { type: 'text', text: 'line one' },
      { type: 'hardBreak' },
      { type: 'text', text: '\nline two' }
    ]);
  });

  test('inline images', () => {
    const content = paragraphWith(inline => inline.convertInline({
      kind: 'inline_image',
      target: 'icon.png',
      alt: 'icon',
      width: '16',
      height: '16',
      documentAttributes: {}
    }));
    assert.deepEqual(content, [{
      type: 'mediaInline',
      attrs: {
        type: 'file',
        id: 'icon.png',
        collection: 'attachments',
        alt: 'icon',
        occurrenceKey: 'key-1',
        width: 16,
        height: 16,
        data: {}
      }
    }]);
  });

  test('embedded nodes', () => {
    const content = paragraphWith(inline => `Hi ${inline.embedNode({ type: 'status', attrs: { text: 'DONE' } })}`);
    assert.deepEqual(content, [
      { type: 'text', text: 'Hi ' },
      { type: 'status', attrs: { text: 'DONE' } }
    ]);
  });
});
