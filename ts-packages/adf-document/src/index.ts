/**
 * @asciidoc-adf/document
 *
 * Converts a parsed markup tree into Atlassian Document Format (ADF) and
 * renders ADF back to AsciiDoc.
 */

// ADF types
export type {
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
  JsonValue,
  PanelType
} from './types.js';

// Source tree types
export type {
  AnchorType,
  CellStyle,
  InlineAnchor,
  InlineBreak,
  InlineHandler,
  InlineImage,
  InlineOther,
  InlineQuoted,
  MarkupParser,
  ParseOptions,
  QuotedType,
  SafeMode,
  SourceBlock,
  SourceBlockKind,
  SourceCell,
  SourceDocument,
  SourceInline,
  SourceListItem
} from './source-types.js';

export * from './builders.js';
export { scanTextOrJson } from './text-or-json.js';
export type { JsonSegment, ScanOptions, ScanSegment, TextSegment } from './text-or-json.js';
export { InlineNodeRegistry, findTokens, formatToken } from './inline-registry.js';
export type { MarkSpan, PlaceholderToken, TokenKind } from './inline-registry.js';
export { InlineContentParser, mergeMarks } from './inline-content.js';
export { AdfNodeSchema, AdfMarkSchema, AdfDocumentSchema, parseStructuredNode, toAdfNodes } from './node-schema.js';
export { expandPlaceholders } from './expansion.js';
export { AnchorTable } from './anchors.js';
export { FileImageProber, ImageDimensionResolver, isRemoteImage, parseDimension } from './image-dimensions.js';
export type { ImageProber, ImageRequest } from './image-dimensions.js';
export { InlineConverter, QUOTED_MARKS } from './inline-converter.js';
export { BlockConverter, panelTypeFor, paragraphsFor } from './block-converter.js';
export { DocumentConverter } from './document-converter.js';
export type { DocumentConverterOptions } from './document-converter.js';
export { AdfToAsciidocConverter } from './reverse-converter.js';
export { randomId, sequentialIds } from './ids.js';
export type { IdFactory } from './ids.js';
export { createLogger, getDefaultLogger, isLogLevel } from './logger.js';
export type { LogLevel, Logger, LoggerConfig } from './logger.js';
