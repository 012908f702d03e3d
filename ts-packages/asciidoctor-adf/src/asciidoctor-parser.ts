/**
 * Asciidoctor Markup Parser
 *
 * `MarkupParser` implementation on top of Asciidoctor.js. Each parse loads
 * the source with the `adf` backend and a fresh extension registry, then
 * reads the block tree. Inline nodes go to the given `InlineHandler` while
 * the tree is read.
 */

import {
  getDefaultLogger,
  type InlineHandler,
  type Logger,
  type MarkupParser,
  type ParseOptions,
  type SourceDocument
} from '@asciidoc-adf/document';
import { BACKEND_NAME, installBackend, processor, withSession } from './adf-backend.js';
import { AsciidoctorNode } from './asciidoctor-node.js';
import { BlockReader } from './block-reader.js';
import { createRegistry, type MacroSet } from './extensions.js';

export interface AsciidoctorParserOptions {
  /** Macros to register for every parse */
  macros?: MacroSet;
  logger?: Logger;
}

export class AsciidoctorParser implements MarkupParser {
  private readonly macros: MacroSet | undefined;
  private readonly logger: Logger;

  constructor(options: AsciidoctorParserOptions = {}) {
    this.macros = options.macros;
    this.logger = options.logger ?? getDefaultLogger();
    installBackend();
  }

  parse(source: string, options: ParseOptions, inline: InlineHandler): SourceDocument {
    return withSession({ inline, logger: this.logger }, () => {
      const doc = processor.load(source, {
        safe: options.safe ?? 'safe',
        backend: BACKEND_NAME,
        attributes: { ...options.attributes },
        extension_registry: createRegistry(this.macros, inline),
        ...(options.baseDir === undefined ? {} : { base_dir: options.baseDir })
      });
      return new BlockReader(this.logger).readDocument(new AsciidoctorNode(doc), options);
    });
  }
}
