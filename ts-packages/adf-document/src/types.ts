/**
 * Type definitions for Atlassian Document Format (ADF)
 *
 * ADF is the JSON tree Confluence and Jira use for rich text. Every node has
 * a `type` and, depending on the kind, `attrs`, `content`, `text` or `marks`.
 *
 * `AdfNode` is the open shape every node satisfies, including nodes that
 * arrive as JSON from macros. The specific interfaces below describe the
 * nodes this package builds itself.
 */

// =============================================================================
// 1. Supporting Types
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Mark applied to a text node
 */
export interface AdfMark {
  type: string;
  attrs?: Record<string, unknown>;
}

export interface AdfLinkMark extends AdfMark {
  type: 'link';
  attrs: { href: string };
}

export interface AdfBackgroundColorMark extends AdfMark {
  type: 'backgroundColor';
  attrs: { color: string };
}

/**
 * Open node shape
 */
export interface AdfNode {
  type: string;
  attrs?: Record<string, unknown>;
  content?: AdfNode[];
  text?: string;
  marks?: AdfMark[];
}

// =============================================================================
// 2. Inline Nodes
// =============================================================================

export interface AdfText extends AdfNode {
  type: 'text';
  text: string;
}

export interface AdfHardBreak extends AdfNode {
  type: 'hardBreak';
}

export interface AdfMention extends AdfNode {
  type: 'mention';
  attrs: { id: string; text: string };
}

export interface AdfMediaInline extends AdfNode {
  type: 'mediaInline';
  attrs: MediaAttrs & { data: Record<string, never> };
}

export type ExtensionParameters = {
  macroParams: Record<string, { value: string }>;
  macroMetadata: Record<string, unknown>;
};

export interface AdfInlineExtension extends AdfNode {
  type: 'inlineExtension';
  attrs: {
    extensionType: string;
    extensionKey: string;
    parameters: ExtensionParameters;
  };
}

// =============================================================================
// 3. Block Nodes
// =============================================================================

export interface AdfParagraph extends AdfNode {
  type: 'paragraph';
  content: AdfNode[];
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface AdfHeading extends AdfNode {
  type: 'heading';
  attrs: { level: HeadingLevel };
  content: AdfNode[];
}

export interface AdfListItem extends AdfNode {
  type: 'listItem';
  content: AdfNode[];
}

export interface AdfBulletList extends AdfNode {
  type: 'bulletList';
  content: AdfListItem[];
}

export interface AdfOrderedList extends AdfNode {
  type: 'orderedList';
  content: AdfListItem[];
}

export type CellAttrs = {
  colspan: number;
  rowspan: number;
};

export interface AdfTableCell extends AdfNode {
  type: 'tableCell' | 'tableHeader';
  attrs: CellAttrs;
  content: AdfNode[];
}

export interface AdfTableRow extends AdfNode {
  type: 'tableRow';
  content: AdfTableCell[];
}

export interface AdfTable extends AdfNode {
  type: 'table';
  content: AdfTableRow[];
}

export interface AdfCodeBlock extends AdfNode {
  type: 'codeBlock';
  attrs: { language: string };
  content: AdfText[];
}

export type PanelType = 'info' | 'note' | 'success' | 'warning' | 'error';

export interface AdfPanel extends AdfNode {
  type: 'panel';
  attrs: { panelType: PanelType };
  content: AdfNode[];
}

export interface AdfBlockquote extends AdfNode {
  type: 'blockquote';
  content: AdfNode[];
}

export interface AdfRule extends AdfNode {
  type: 'rule';
}

export type MediaAttrs = {
  type: 'file';
  id: string;
  collection: string;
  alt: string;
  occurrenceKey: string;
  width?: number;
  height?: number;
};

export interface AdfMedia extends AdfNode {
  type: 'media';
  attrs: MediaAttrs;
}

export interface AdfMediaSingle extends AdfNode {
  type: 'mediaSingle';
  attrs: { layout: 'wide'; width?: number; widthType: 'pixel' };
  content: [AdfMedia];
}

export interface AdfExtension extends AdfNode {
  type: 'extension';
  attrs: Record<string, unknown> & { extensionType: string; extensionKey: string };
}

// =============================================================================
// 4. Document
// =============================================================================

export interface AdfDocument {
  version: 1;
  type: 'doc';
  content: AdfNode[];
}

/**
 * Pixel dimensions of an image
 */
export interface Dimensions {
  width: number;
  height: number;
}
