/**
 * Document Conversion
 *
 * Orchestrates a single conversion: owns the per-conversion registry,
 * anchor table and inline handler, converts the block tree and wraps the
 * result in the `doc` envelope.
 */

import { AnchorTable } from './anchors.js';
import { BlockConverter } from './block-converter.js';
import { documentNode, tocExtension } from './builders.js';
import { expandPlaceholders } from './expansion.js';
import { randomId, type IdFactory } from './ids.js';
import { FileImageProber, ImageDimensionResolver, type ImageProber } from './image-dimensions.js';
import { InlineContentParser } from './inline-content.js';
import { InlineConverter } from './inline-converter.js';
import { InlineNodeRegistry } from './inline-registry.js';
import { getDefaultLogger, type Logger } from './logger.js';
import type { InlineHandler, MarkupParser, ParseOptions, SourceDocument } from './source-types.js';
import type { AdfDocument, AdfNode } from './types.js';

export interface DocumentConverterOptions {
  /** Needed for asciidoc table cells and for `convert()` */
  parser?: MarkupParser;
  imageProber?: ImageProber;
  logger?: Logger;
  /** Media occurrence keys; random UUIDs by default */
  idFactory?: IdFactory;
}

/**
 * Converts one document. Create a new instance per conversion: the
 * placeholder registry and anchor table are not shared between documents.
 */
export class DocumentConverter {
  private readonly registry = new InlineNodeRegistry();
  private readonly anchors = new AnchorTable();
  private readonly inlineContent: InlineContentParser;
  private readonly inlineConverter: InlineConverter;
  private readonly blockConverter: BlockConverter;
  private readonly parser: MarkupParser | undefined;

  constructor(options: DocumentConverterOptions = {}) {
    const logger = options.logger ?? getDefaultLogger();
    const newId = options.idFactory ?? randomId;
    const images = new ImageDimensionResolver(options.imageProber ?? new FileImageProber(), logger);

    this.parser = options.parser;
    this.inlineContent = new InlineContentParser(this.registry);
    this.inlineConverter = new InlineConverter(this.registry, this.anchors, images, newId, logger);
    this.blockConverter = new BlockConverter({
      inline: this.inlineContent,
      inlineHandler: this.inlineConverter,
      anchors: this.anchors,
      images,
      newId,
      logger,
      parser: options.parser
    });
  }

  /**
   * Handler to pass to `MarkupParser.parse()` for this conversion
   */
  get inlineHandler(): InlineHandler {
    return this.inlineConverter;
  }

  /**
   * Parse `source` with the configured parser and convert it
   */
  convert(source: string, options: ParseOptions = {}): AdfDocument {
    if (this.parser === undefined) {
      throw new Error('DocumentConverter.convert() requires a markup parser');
    }
    return this.convertDocument(this.parser.parse(source, options, this.inlineConverter));
  }

  convertDocument(doc: SourceDocument): AdfDocument {
    const content: AdfNode[] = [];
    if (this.wantsAutoToc(doc)) {
      content.push(tocExtension());
    }
    content.push(...this.blockConverter.convertBlocks(doc.blocks, { document: doc }));

    return documentNode(expandPlaceholders(content, this.inlineContent));
  }

  private wantsAutoToc(doc: SourceDocument): boolean {
    return doc.hasSections
      && doc.attributes.toc !== undefined
      && doc.attributes['toc-placement'] === 'auto';
  }
}
