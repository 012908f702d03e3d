/**
 * Inline Conversion
 *
 * Handles the inline nodes a parser meets while substituting text. Each
 * handler returns the string to splice into the substituted text: a
 * placeholder token for structured nodes, a pair of span tokens around
 * formatted text, or plain text.
 */

import he from 'he';
import type { AnchorTable } from './anchors.js';
import {
  HIGHLIGHT_COLOR,
  anchorExtension,
  hardBreak,
  linkMark,
  mediaInline,
  textNode
} from './builders.js';
import type { IdFactory } from './ids.js';
import type { ImageDimensionResolver } from './image-dimensions.js';
import type { InlineNodeRegistry } from './inline-registry.js';
import type { Logger } from './logger.js';
import { parseStructuredNode } from './node-schema.js';
import type {
  InlineAnchor,
  InlineHandler,
  InlineImage,
  InlineQuoted,
  QuotedType,
  SourceInline
} from './source-types.js';
import type { AdfMark, AdfNode } from './types.js';

/**
 * Marks for quoted text kinds. Kinds without an entry carry no mark.
 */
export const QUOTED_MARKS: Partial<Record<QuotedType, AdfMark>> = {
  strong: { type: 'strong' },
  emphasis: { type: 'em' },
  monospaced: { type: 'code' },
  superscript: { type: 'sup' },
  subscript: { type: 'sub' },
  underline: { type: 'underline' },
  strikethrough: { type: 'strike' },
  mark: { type: 'backgroundColor', attrs: { color: HIGHLIGHT_COLOR } }
};

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value.length > 0);
}

export class InlineConverter implements InlineHandler {
  constructor(
    private readonly registry: InlineNodeRegistry,
    private readonly anchors: AnchorTable,
    private readonly images: ImageDimensionResolver,
    private readonly newId: IdFactory,
    private readonly logger: Logger
  ) {}

  convertInline(node: SourceInline): string {
    switch (node.kind) {
      case 'inline_quoted':
        return this.convertQuoted(node);

      case 'inline_anchor':
        return this.convertAnchor(node);

      case 'inline_image':
        return this.convertImage(node);

      case 'inline_break':
        return `${node.text}${this.registry.register(hardBreak())}`;

      case 'inline_other':
        return node.text;

      default: {
        const exhaustive: never = node;
        throw new Error(`Unhandled inline kind: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  embedNode(node: AdfNode): string {
    return this.registry.register(node);
  }

  private convertQuoted(node: InlineQuoted): string {
    // Macro output that reached us wrapped in formatting syntax
    const structured = parseStructuredNode(he.decode(node.text));
    if (structured !== undefined) {
      return this.registry.register(structured);
    }

    if (node.text.length === 0) {
      return '';
    }

    const mark = QUOTED_MARKS[node.type];
    if (mark !== undefined) {
      const span = this.registry.registerMark(mark);
      return `${span.open}${node.text}${span.close}`;
    }

    switch (node.type) {
      case 'double':
        return `“${node.text}”`;
      case 'single':
        return `‘${node.text}’`;
      default:
        return node.text;
    }
  }

  private convertAnchor(node: InlineAnchor): string {
    switch (node.type) {
      case 'xref': {
        const refid = node.refid ?? node.target?.replace(/^#/, '') ?? '';
        const text = firstNonEmpty(node.text, node.referenceTitle, this.anchors.titleFor(refid)) ?? `[${refid}]`;
        return this.registry.register(textNode(text, [linkMark(`#${refid}`)]));
      }

      case 'link': {
        const href = node.target ?? '';
        const text = firstNonEmpty(node.text, node.reftext, href);
        if (text === undefined) {
          this.logger.debug('Skipping link without target or text');
          return '';
        }
        return this.registry.register(textNode(text, [linkMark(href)]));
      }

      case 'ref':
      case 'bibref': {
        const id = firstNonEmpty(node.refid, node.target);
        if (id === undefined) {
          return node.text ?? '';
        }
        this.anchors.register(id, node.reftext);
        return this.registry.register(anchorExtension(id));
      }

      default: {
        const exhaustive: never = node.type;
        throw new Error(`Unhandled anchor type: ${String(exhaustive)}`);
      }
    }
  }

  private convertImage(node: InlineImage): string {
    const dimensions = this.images.resolve(
      {
        target: node.target,
        width: node.width,
        height: node.height,
        imagesDir: node.documentAttributes.imagesdir,
        baseDir: node.baseDir
      },
      { quiet: true }
    );

    return this.registry.register(mediaInline({
      target: node.target,
      alt: node.alt,
      occurrenceKey: node.occurrenceKey ?? this.newId(),
      dimensions
    }));
  }
}
