/**
 * Block Tree Reader
 *
 * Walks a loaded Asciidoctor document and builds the `SourceDocument` the
 * conversion core consumes. Reading content, titles and cell text applies
 * Asciidoctor's substitutions, so inline nodes reach the `adf` backend
 * while the tree is read.
 */

import type {
  CellStyle,
  Logger,
  ParseOptions,
  SafeMode,
  SourceBlock,
  SourceCell,
  SourceDocument,
  SourceListItem
} from '@asciidoc-adf/document';
import { AsciidoctorNode, toRows } from './asciidoctor-node.js';

const SAFE_MODES: Record<number, SafeMode> = {
  0: 'unsafe',
  1: 'safe',
  10: 'server',
  20: 'secure'
};

const CELL_STYLES: readonly CellStyle[] = ['asciidoc', 'header', 'literal', 'emphasis', 'strong', 'monospaced'];

function positive(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

export class BlockReader {
  constructor(private readonly logger: Logger) {}

  readDocument(doc: AsciidoctorNode, requested: ParseOptions): SourceDocument {
    const attributes = doc.attributes();
    const safeLevel = doc.number('getSafe');
    const parseOptions: ParseOptions = {
      safe: (safeLevel === undefined ? undefined : SAFE_MODES[safeLevel]) ?? requested.safe,
      attributes: requested.attributes,
      baseDir: doc.string('getBaseDir') ?? requested.baseDir
    };

    const result: SourceDocument = {
      kind: 'document',
      attributes,
      hasSections: doc.bool('hasSections'),
      parseOptions,
      blocks: this.readBlocks(doc.nodes('getBlocks'))
    };
    const title = attributes.doctitle;
    if (title !== undefined) {
      result.title = title;
    }
    return result;
  }

  readBlocks(nodes: AsciidoctorNode[]): SourceBlock[] {
    const blocks: SourceBlock[] = [];
    for (const node of nodes) {
      const block = this.readBlock(node);
      if (block !== undefined) {
        blocks.push(block);
      }
    }
    return blocks;
  }

  readBlock(node: AsciidoctorNode): SourceBlock | undefined {
    const name = node.nodeName;
    switch (name) {
      case 'paragraph':
        return { kind: 'paragraph', text: node.string('getContent') ?? '' };

      case 'section':
        return {
          kind: 'section',
          level: node.number('getLevel') ?? 1,
          title: node.string('getTitle') ?? '',
          id: node.string('getId'),
          blocks: this.readBlocks(node.nodes('getBlocks'))
        };

      case 'ulist':
      case 'olist':
        return { kind: name, items: node.nodes('getItems').map(item => this.readListItem(item)) };

      case 'table':
        return this.readTable(node);

      case 'quote':
      case 'verse':
        return { kind: 'quote', ...this.readCompound(node) };

      case 'admonition':
        return { kind: 'admonition', name: node.attr('name') ?? 'note', ...this.readCompound(node) };

      case 'image':
        return {
          kind: 'image',
          target: node.attr('target') ?? '',
          alt: node.attr('alt'),
          width: node.attr('width'),
          height: node.attr('height'),
          occurrenceKey: node.attr('occurrenceKey')
        };

      case 'listing':
      case 'literal':
        return { kind: name, language: node.attr('language'), source: node.string('getSource') ?? '' };

      case 'pass':
        return { kind: 'pass', content: node.string('getContent') ?? '' };

      case 'page_break':
      case 'thematic_break':
      case 'toc':
        return { kind: name };

      case 'sidebar':
      case 'floating_title':
        return { kind: name, title: node.string('getTitle') };

      case 'preamble':
      case 'open':
      case 'example':
        return { kind: name === 'preamble' ? 'preamble' : 'open', blocks: this.readBlocks(node.nodes('getBlocks')) };

      default:
        this.logger.debug(`Skipping unsupported block: ${name}`);
        return undefined;
    }
  }

  private readListItem(item: AsciidoctorNode): SourceListItem {
    return { text: item.string('getText') ?? '', blocks: this.readBlocks(item.nodes('getBlocks')) };
  }

  /**
   * Quote and admonition bodies are either a single run of text or nested blocks
   */
  private readCompound(node: AsciidoctorNode): { text?: string; blocks: SourceBlock[] } {
    if (node.string('getContentModel') === 'compound') {
      return { blocks: this.readBlocks(node.nodes('getBlocks')) };
    }
    return { text: node.string('getContent') ?? '', blocks: [] };
  }

  private readTable(node: AsciidoctorNode): SourceBlock {
    return {
      kind: 'table',
      head: this.readRows(node, 'getHeadRows'),
      body: this.readRows(node, 'getBodyRows'),
      foot: this.readRows(node, 'getFootRows')
    };
  }

  private readRows(table: AsciidoctorNode, method: string): SourceCell[][] {
    return toRows(table.call(method)).map(row => row.map(cell => this.readCell(cell)));
  }

  private readCell(cell: AsciidoctorNode): SourceCell {
    const style = CELL_STYLES.find(candidate => candidate === cell.string('getStyle')) ?? 'default';
    const result: SourceCell = { style, text: cell.string('getText') ?? '' };

    const colspan = positive(cell.number('getColumnSpan'));
    const rowspan = positive(cell.number('getRowSpan'));
    if (colspan !== undefined) result.colspan = colspan;
    if (rowspan !== undefined) result.rowspan = rowspan;

    if (style === 'asciidoc') {
      // Asciidoctor already parsed the cell as a nested document
      const inner = cell.node('getInnerDocument');
      if (inner !== undefined) {
        result.blocks = this.readBlocks(inner.nodes('getBlocks'));
      }
    }
    return result;
  }
}
