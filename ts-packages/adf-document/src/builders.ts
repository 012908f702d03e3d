/**
 * Node Builders
 *
 * Pure factories for every node the converter emits. Key order is fixed
 * (`type`, then `attrs`, then `content`/`text`/`marks`) so serialised
 * output is stable.
 */

import type {
  AdfBlockquote,
  AdfBulletList,
  AdfCodeBlock,
  AdfDocument,
  AdfExtension,
  AdfHardBreak,
  AdfHeading,
  AdfInlineExtension,
  AdfLinkMark,
  AdfListItem,
  AdfMark,
  AdfMedia,
  AdfMediaInline,
  AdfMediaSingle,
  AdfMention,
  AdfNode,
  AdfOrderedList,
  AdfPanel,
  AdfParagraph,
  AdfRule,
  AdfTable,
  AdfTableCell,
  AdfTableRow,
  AdfText,
  Dimensions,
  HeadingLevel,
  PanelType
} from './types.js';

export const CONFLUENCE_MACRO_EXTENSION = 'com.atlassian.confluence.macro.core';
export const DEFAULT_CODE_LANGUAGE = 'plaintext';
export const MEDIA_COLLECTION = 'attachments';
export const HIGHLIGHT_COLOR = '#FFFF00';

/**
 * Text node. Empty text is a caller bug: ADF rejects empty text nodes.
 */
export function textNode(text: string, marks: AdfMark[] = []): AdfText {
  if (typeof text !== 'string' || text.length === 0) {
    throw new Error('Text node requires non-empty text');
  }
  return marks.length > 0 ? { type: 'text', text, marks } : { type: 'text', text };
}

export function linkMark(href: string): AdfLinkMark {
  return { type: 'link', attrs: { href } };
}

export function hardBreak(): AdfHardBreak {
  return { type: 'hardBreak' };
}

export function paragraph(content: AdfNode[]): AdfParagraph {
  return { type: 'paragraph', content };
}

export function heading(level: number, content: AdfNode[]): AdfHeading {
  return { type: 'heading', attrs: { level: clampHeadingLevel(level) }, content };
}

function clampHeadingLevel(level: number): HeadingLevel {
  if (level <= 1) return 1;
  if (level === 2) return 2;
  if (level === 3) return 3;
  if (level === 4) return 4;
  if (level === 5) return 5;
  return 6;
}

export function listItem(content: AdfNode[]): AdfListItem {
  return { type: 'listItem', content };
}

export function bulletList(items: AdfListItem[]): AdfBulletList {
  return { type: 'bulletList', content: items };
}

export function orderedList(items: AdfListItem[]): AdfOrderedList {
  return { type: 'orderedList', content: items };
}

export interface CellSpan {
  colspan?: number;
  rowspan?: number;
}

export function tableCell(content: AdfNode[], span: CellSpan = {}, header = false): AdfTableCell {
  return {
    type: header ? 'tableHeader' : 'tableCell',
    attrs: { colspan: span.colspan ?? 1, rowspan: span.rowspan ?? 1 },
    content
  };
}

export function tableRow(cells: AdfTableCell[]): AdfTableRow {
  return { type: 'tableRow', content: cells };
}

export function table(rows: AdfTableRow[]): AdfTable {
  return { type: 'table', content: rows };
}

export function codeBlock(language: string | undefined, code: string): AdfCodeBlock {
  const lang = language !== undefined && language.trim().length > 0 ? language : DEFAULT_CODE_LANGUAGE;
  return {
    type: 'codeBlock',
    attrs: { language: lang },
    content: code.length > 0 ? [textNode(code)] : []
  };
}

export function panel(panelType: PanelType, content: AdfNode[]): AdfPanel {
  return { type: 'panel', attrs: { panelType }, content };
}

export function blockquote(content: AdfNode[]): AdfBlockquote {
  return { type: 'blockquote', content };
}

export function rule(): AdfRule {
  return { type: 'rule' };
}

export function mention(id: string, text: string): AdfMention {
  return { type: 'mention', attrs: { id, text } };
}

export interface MediaOptions {
  target: string;
  alt?: string;
  occurrenceKey: string;
  dimensions?: Partial<Dimensions>;
}

export function media(options: MediaOptions): AdfMedia {
  const { width, height } = options.dimensions ?? {};
  return {
    type: 'media',
    attrs: {
      type: 'file',
      id: options.target,
      collection: MEDIA_COLLECTION,
      alt: options.alt ?? '',
      occurrenceKey: options.occurrenceKey,
      ...(width !== undefined ? { width } : {}),
      ...(height !== undefined ? { height } : {})
    }
  };
}

export function mediaSingle(child: AdfMedia): AdfMediaSingle {
  const width = child.attrs.width;
  return {
    type: 'mediaSingle',
    attrs: width !== undefined
      ? { layout: 'wide', width, widthType: 'pixel' }
      : { layout: 'wide', widthType: 'pixel' },
    content: [child]
  };
}

export function mediaInline(options: MediaOptions): AdfMediaInline {
  const { attrs } = media({ ...options, target: options.target || 'unknown-id' });
  return { type: 'mediaInline', attrs: { ...attrs, data: {} } };
}

export function inlineExtension(
  extensionType: string,
  extensionKey: string,
  macroParams: Record<string, { value: string }>,
  macroMetadata: Record<string, unknown>
): AdfInlineExtension {
  return {
    type: 'inlineExtension',
    attrs: {
      extensionType,
      extensionKey,
      parameters: { macroParams, macroMetadata }
    }
  };
}

/**
 * Block extension. `extensionType` and `extensionKey` follow the other attributes.
 */
export function extension(
  extensionType: string,
  extensionKey: string,
  attributes: Record<string, unknown> = {}
): AdfExtension {
  return {
    type: 'extension',
    attrs: { ...attributes, extensionType, extensionKey }
  };
}

/**
 * Confluence anchor macro for an element id
 */
export function anchorExtension(id: string): AdfInlineExtension {
  return inlineExtension(
    CONFLUENCE_MACRO_EXTENSION,
    'anchor',
    { '': { value: id }, legacyAnchorId: { value: `LEGACY-${id}` } },
    { schemaVersion: { value: '1' }, title: 'Anchor' }
  );
}

/**
 * Confluence table of contents macro
 */
export function tocExtension(): AdfInlineExtension {
  return inlineExtension(
    CONFLUENCE_MACRO_EXTENSION,
    'toc',
    {},
    { schemaVersion: { value: '1' }, title: 'Table of Contents' }
  );
}

/**
 * Document envelope
 */
export function documentNode(content: AdfNode[]): AdfDocument {
  return { version: 1, type: 'doc', content };
}
