/**
 * Block Conversion
 *
 * Converts source blocks into ADF block nodes. Every handler returns the
 * nodes it produced; parents concatenate the results.
 */

import type { AnchorTable } from './anchors.js';
import {
  anchorExtension,
  blockquote,
  bulletList,
  codeBlock,
  heading,
  listItem,
  media,
  mediaSingle,
  orderedList,
  panel,
  paragraph,
  rule,
  table,
  tableCell,
  tableRow,
  tocExtension
} from './builders.js';
import type { IdFactory } from './ids.js';
import type { ImageDimensionResolver } from './image-dimensions.js';
import type { InlineContentParser } from './inline-content.js';
import type { Logger } from './logger.js';
import { toAdfNodes } from './node-schema.js';
import type {
  InlineHandler,
  MarkupParser,
  SourceAdmonition,
  SourceBlock,
  SourceCell,
  SourceDocument,
  SourceImage,
  SourceList,
  SourcePass,
  SourceSection,
  SourceTable
} from './source-types.js';
import type { AdfListItem, AdfNode, AdfTableCell, AdfTableRow, PanelType } from './types.js';

/**
 * Panel type for each admonition name
 */
export const ADMONITION_PANEL_TYPES: Record<string, PanelType> = {
  note: 'info',
  tip: 'info',
  warning: 'warning',
  important: 'error',
  caution: 'error'
};

export function panelTypeFor(name: string): PanelType {
  return ADMONITION_PANEL_TYPES[name.toLowerCase()] ?? 'info';
}

/** Nodes that may not sit inside a paragraph */
const BLOCK_LEVEL_TYPES = new Set(['extension', 'bodiedExtension']);

function isBlankRun(nodes: AdfNode[]): boolean {
  return nodes.every(node => node.type === 'text' && (node.text ?? '').trim().length === 0);
}

/**
 * Wrap inline content in a paragraph. Block-level nodes a macro placed in
 * the text are lifted out, splitting the paragraph around them.
 */
export function paragraphsFor(content: AdfNode[]): AdfNode[] {
  if (!content.some(node => BLOCK_LEVEL_TYPES.has(node.type))) {
    return [paragraph(content)];
  }

  const result: AdfNode[] = [];
  let run: AdfNode[] = [];
  for (const node of content) {
    if (BLOCK_LEVEL_TYPES.has(node.type)) {
      if (!isBlankRun(run)) {
        result.push(paragraph(run));
      }
      result.push(node);
      run = [];
    } else {
      run.push(node);
    }
  }
  if (!isBlankRun(run)) {
    result.push(paragraph(run));
  }
  return result;
}

/**
 * Document being converted. Nested (table cell) documents get their own scope.
 */
export interface ConversionScope {
  document: SourceDocument;
}

export interface BlockConverterDeps {
  inline: InlineContentParser;
  inlineHandler: InlineHandler;
  anchors: AnchorTable;
  images: ImageDimensionResolver;
  newId: IdFactory;
  logger: Logger;
  parser?: MarkupParser;
}

export class BlockConverter {
  constructor(private readonly deps: BlockConverterDeps) {}

  convertBlocks(blocks: SourceBlock[], scope: ConversionScope): AdfNode[] {
    return blocks.flatMap(block => this.convertBlock(block, scope));
  }

  convertBlock(block: SourceBlock, scope: ConversionScope): AdfNode[] {
    switch (block.kind) {
      case 'paragraph':
        return paragraphsFor(this.deps.inline.parseOrEscape(block.text));

      case 'section':
        return this.convertSection(block, scope);

      case 'ulist':
      case 'olist':
        return [this.convertList(block, scope)];

      case 'table':
        return [this.convertTable(block, scope)];

      case 'quote':
        return [blockquote(this.simpleOrCompound(block.text, block.blocks, scope))];

      case 'admonition':
        return [this.convertAdmonition(block, scope)];

      case 'image':
        return [this.convertImage(block, scope)];

      case 'listing':
      case 'literal':
        return [codeBlock(block.language, block.source)];

      case 'pass':
        return this.convertPass(block);

      case 'toc':
        return [tocExtension()];

      case 'page_break':
        return [rule()];

      // No ADF counterpart
      case 'thematic_break':
      case 'sidebar':
      case 'floating_title':
        return [];

      case 'preamble':
      case 'open':
        return this.convertBlocks(block.blocks, scope);

      default: {
        const exhaustive: never = block;
        throw new Error(`Unhandled block kind: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /**
   * Heading (with an anchor for the section id) followed by the section's
   * blocks as siblings
   */
  private convertSection(section: SourceSection, scope: ConversionScope): AdfNode[] {
    const content = this.deps.inline.parseOrEscape(section.title);
    if (section.id !== undefined && section.id.length > 0) {
      this.deps.anchors.register(section.id, section.title);
      content.push(anchorExtension(section.id));
    }

    return [
      heading(section.level + 1, content),
      ...this.convertBlocks(section.blocks, scope)
    ];
  }

  private convertList(list: SourceList, scope: ConversionScope): AdfNode {
    const items: AdfListItem[] = list.items.map(item => listItem([
      paragraph(this.deps.inline.parseOrEscape(item.text)),
      ...this.convertBlocks(item.blocks, scope)
    ]));
    return list.kind === 'ulist' ? bulletList(items) : orderedList(items);
  }

  private convertTable(source: SourceTable, scope: ConversionScope): AdfNode {
    const rows: AdfTableRow[] = [
      ...source.head.map(row => this.convertRow(row, scope, true)),
      ...source.body.map(row => this.convertRow(row, scope, false)),
      ...source.foot.map(row => this.convertRow(row, scope, false))
    ];
    return table(rows);
  }

  private convertRow(cells: SourceCell[], scope: ConversionScope, headRow: boolean): AdfTableRow {
    return tableRow(cells.map(cell => this.convertCell(cell, scope, headRow)));
  }

  private convertCell(cell: SourceCell, scope: ConversionScope, headRow: boolean): AdfTableCell {
    const span = { colspan: cell.colspan, rowspan: cell.rowspan };
    const header = headRow || cell.style === 'header';

    if (cell.style === 'asciidoc') {
      return tableCell(this.convertAsciidocCell(cell, scope), span, header);
    }
    return tableCell([paragraph(this.deps.inline.parseOrEscape(cell.text))], span, header);
  }

  /**
   * Asciidoc cells hold a document of their own. It is parsed with the
   * enclosing document's options and shares this conversion's registry.
   */
  private convertAsciidocCell(cell: SourceCell, scope: ConversionScope): AdfNode[] {
    if (cell.blocks !== undefined && cell.blocks.length > 0) {
      return this.convertBlocks(cell.blocks, scope);
    }

    let content: AdfNode[] = [];
    if (this.deps.parser === undefined) {
      this.deps.logger.debug('No markup parser configured; asciidoc cell converted as plain text');
    } else {
      const nested = this.deps.parser.parse(cell.text, scope.document.parseOptions, this.deps.inlineHandler);
      content = this.convertBlocks(nested.blocks, { document: nested });
    }

    if (content.length === 0 && cell.text.trim().length > 0) {
      content = [paragraph(this.deps.inline.parseOrEscape(cell.text))];
    }
    return content;
  }

  private convertAdmonition(block: SourceAdmonition, scope: ConversionScope): AdfNode {
    return panel(panelTypeFor(block.name), this.simpleOrCompound(block.text, block.blocks, scope));
  }

  /**
   * Content of a block that either has simple text or child blocks
   */
  private simpleOrCompound(text: string | undefined, blocks: SourceBlock[], scope: ConversionScope): AdfNode[] {
    if (blocks.length > 0) {
      return this.convertBlocks(blocks, scope);
    }
    return [paragraph(this.deps.inline.parseOrEscape(text ?? ''))];
  }

  private convertImage(image: SourceImage, scope: ConversionScope): AdfNode {
    const dimensions = this.deps.images.resolve({
      target: image.target,
      width: image.width,
      height: image.height,
      imagesDir: scope.document.attributes.imagesdir,
      baseDir: scope.document.parseOptions.baseDir
    });

    return mediaSingle(media({
      target: image.target,
      alt: image.alt,
      occurrenceKey: image.occurrenceKey ?? this.deps.newId(),
      dimensions
    }));
  }

  /**
   * Pass-through content: ADF JSON is emitted as is, anything else becomes a paragraph
   */
  private convertPass(block: SourcePass): AdfNode[] {
    const trimmed = block.content.trim();
    if (trimmed.length === 0) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      parsed = undefined;
    }
    const nodes = parsed === undefined ? undefined : toAdfNodes(parsed);
    return nodes ?? [paragraph(this.deps.inline.parseOrEscape(block.content))];
  }
}
