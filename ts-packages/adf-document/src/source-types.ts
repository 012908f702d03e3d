/**
 * Source Document Types
 *
 * The closed, JSON-serialisable tree a markup parser hands to the
 * converter. Block kinds and inline kinds are discriminated by `kind`;
 * converters switch over them with a `never` check so a new kind cannot be
 * left unhandled.
 *
 * Inline text (`paragraph.text`, `section.title`, list item text, ...) is
 * the parser's substituted output. It may carry placeholder tokens and JSON
 * fragments produced by the `InlineHandler` while the parser substituted it.
 */

import type { AdfNode } from './types.js';

// =============================================================================
// 1. Parse Options
// =============================================================================

export type SafeMode = 'unsafe' | 'safe' | 'server' | 'secure';

export interface ParseOptions {
  safe?: SafeMode;
  attributes?: Record<string, string>;
  baseDir?: string;
}

// =============================================================================
// 2. Blocks
// =============================================================================

export interface SourceParagraph {
  kind: 'paragraph';
  text: string;
}

export interface SourceSection {
  kind: 'section';
  level: number;
  title: string;
  id?: string;
  blocks: SourceBlock[];
}

export interface SourceListItem {
  text: string;
  blocks: SourceBlock[];
}

export interface SourceList {
  kind: 'ulist' | 'olist';
  items: SourceListItem[];
}

export type CellStyle = 'default' | 'asciidoc' | 'header' | 'literal' | 'emphasis' | 'strong' | 'monospaced';

export interface SourceCell {
  style: CellStyle;
  text: string;
  colspan?: number;
  rowspan?: number;
  /** Pre-parsed content of an asciidoc cell, when the parser already has it */
  blocks?: SourceBlock[];
}

export interface SourceTable {
  kind: 'table';
  head: SourceCell[][];
  body: SourceCell[][];
  foot: SourceCell[][];
}

export interface SourceQuote {
  kind: 'quote';
  text?: string;
  blocks: SourceBlock[];
}

export interface SourceAdmonition {
  kind: 'admonition';
  name: string;
  text?: string;
  blocks: SourceBlock[];
}

export interface SourceImage {
  kind: 'image';
  target: string;
  alt?: string;
  width?: string;
  height?: string;
  occurrenceKey?: string;
}

export interface SourceCode {
  kind: 'listing' | 'literal';
  language?: string;
  source: string;
}

export interface SourcePass {
  kind: 'pass';
  content: string;
}

export interface SourceMarker {
  kind: 'page_break' | 'toc' | 'thematic_break';
}

export interface SourceTitled {
  kind: 'sidebar' | 'floating_title';
  title?: string;
}

export interface SourceContainer {
  kind: 'preamble' | 'open';
  blocks: SourceBlock[];
}

export type SourceBlock =
  | SourceParagraph
  | SourceSection
  | SourceList
  | SourceTable
  | SourceQuote
  | SourceAdmonition
  | SourceImage
  | SourceCode
  | SourcePass
  | SourceMarker
  | SourceTitled
  | SourceContainer;

export type SourceBlockKind = SourceBlock['kind'];

// =============================================================================
// 3. Document
// =============================================================================

export interface SourceDocument {
  kind: 'document';
  title?: string;
  attributes: Record<string, string>;
  hasSections: boolean;
  /** Effective options, inherited by nested parses */
  parseOptions: ParseOptions;
  blocks: SourceBlock[];
}

// =============================================================================
// 4. Inlines
// =============================================================================

export type QuotedType =
  | 'strong'
  | 'emphasis'
  | 'monospaced'
  | 'superscript'
  | 'subscript'
  | 'underline'
  | 'strikethrough'
  | 'mark'
  | 'double'
  | 'single'
  | 'unquoted'
  | 'asciimath'
  | 'latexmath';

export interface InlineQuoted {
  kind: 'inline_quoted';
  type: QuotedType;
  text: string;
}

export type AnchorType = 'xref' | 'link' | 'ref' | 'bibref';

export interface InlineAnchor {
  kind: 'inline_anchor';
  type: AnchorType;
  target?: string;
  text?: string;
  refid?: string;
  reftext?: string;
  /** Title of the referenced node, looked up in the parser's own catalog */
  referenceTitle?: string;
}

export interface InlineImage {
  kind: 'inline_image';
  target: string;
  alt?: string;
  width?: string;
  height?: string;
  occurrenceKey?: string;
  /** Attributes of the enclosing document (imagesdir, ...) */
  documentAttributes: Record<string, string>;
  baseDir?: string;
}

export interface InlineBreak {
  kind: 'inline_break';
  text: string;
}

export interface InlineOther {
  kind: 'inline_other';
  name: string;
  text: string;
}

export type SourceInline = InlineQuoted | InlineAnchor | InlineImage | InlineBreak | InlineOther;

// =============================================================================
// 5. Parser Boundary
// =============================================================================

/**
 * Receives inline nodes while the parser substitutes text and returns the
 * string to splice in their place.
 */
export interface InlineHandler {
  convertInline(node: SourceInline): string;
  /** Register a finished node and return its placeholder token */
  embedNode(node: AdfNode): string;
}

/**
 * External markup parser
 */
export interface MarkupParser {
  parse(source: string, options: ParseOptions, inline: InlineHandler): SourceDocument;
}
