/**
 * ADF to AsciiDoc
 *
 * Renders an ADF tree back to AsciiDoc source. Node types without a
 * rendering contribute the rendering of their children.
 */

import { AdfDocumentSchema, AdfNodeSchema } from './node-schema.js';
import type { AdfMark, AdfNode } from './types.js';

interface RenderContext {
  listDepth: number;
  listMarker: '*' | '.';
}

const ROOT_CONTEXT: RenderContext = { listDepth: 0, listMarker: '*' };

const PANEL_ADMONITIONS: Record<string, string> = {
  info: 'NOTE',
  note: 'NOTE',
  success: 'TIP',
  warning: 'WARNING',
  error: 'CAUTION'
};

function stringAttr(node: AdfNode | AdfMark, name: string): string | undefined {
  const value = node.attrs?.[name];
  return typeof value === 'string' ? value : undefined;
}

function numberAttr(node: AdfNode, name: string): number | undefined {
  const value = node.attrs?.[name];
  return typeof value === 'number' ? value : undefined;
}

export class AdfToAsciidocConverter {
  /**
   * Convert a document, a single node, or their JSON text
   */
  convert(input: AdfNode | string): string {
    return this.render(typeof input === 'string' ? this.parse(input) : input, ROOT_CONTEXT);
  }

  private parse(json: string): AdfNode {
    const value: unknown = JSON.parse(json);
    const doc = AdfDocumentSchema.safeParse(value);
    if (doc.success) {
      return { type: 'doc', content: doc.data.content };
    }
    const node = AdfNodeSchema.safeParse(value);
    if (!node.success) {
      throw new Error(`Not an ADF node: ${node.error.issues[0]?.message ?? 'invalid input'}`);
    }
    return node.data;
  }

  private render(node: AdfNode, ctx: RenderContext): string {
    switch (node.type) {
      case 'doc':
        return this.renderChildren(node, ctx);

      case 'paragraph': {
        const text = this.renderChildren(node, ctx);
        if (text.length === 0) return '';
        return ctx.listDepth > 0 ? text : `\n${text}\n`;
      }

      case 'text':
        return this.renderText(node);

      case 'hardBreak':
        return ' +\n';

      case 'mention':
        return stringAttr(node, 'text') ?? '';

      case 'heading': {
        const level = numberAttr(node, 'level') ?? 1;
        return `\n${'='.repeat(level)} ${this.renderChildren(node, ctx)}\n`;
      }

      case 'bulletList':
        return this.renderList(node, ctx, '*');

      case 'orderedList':
        return this.renderList(node, ctx, '.');

      case 'listItem':
        return this.renderListItem(node, ctx);

      case 'codeBlock': {
        const language = stringAttr(node, 'language') ?? '';
        const code = (node.content ?? []).map(child => child.text ?? '').join('\n');
        return `\n[source,${language}]\n----\n${code}\n----\n`;
      }

      case 'rule':
        return "\n'''\n";

      case 'panel': {
        const admonition = PANEL_ADMONITIONS[stringAttr(node, 'panelType') ?? ''] ?? 'NOTE';
        return `\n[${admonition}]\n====\n${this.renderChildren(node, ctx).trim()}\n====\n`;
      }

      default:
        return this.renderChildren(node, ctx);
    }
  }

  private renderChildren(node: AdfNode, ctx: RenderContext): string {
    return (node.content ?? []).map(child => this.render(child, ctx)).join('');
  }

  private renderList(node: AdfNode, ctx: RenderContext, marker: '*' | '.'): string {
    const inner: RenderContext = { listDepth: ctx.listDepth + 1, listMarker: marker };
    const items = this.renderChildren(node, inner);
    return ctx.listDepth === 0 ? `\n${items.trim()}\n` : items;
  }

  private renderListItem(node: AdfNode, ctx: RenderContext): string {
    const indent = ctx.listMarker.repeat(Math.max(ctx.listDepth, 1));
    const parts: string[] = [];

    for (const child of node.content ?? []) {
      const rendered = this.render(child, ctx);
      const previous = parts[parts.length - 1];
      // Nested lists start on their own line
      if (child.type.endsWith('List') && previous !== undefined && !previous.endsWith('\n')) {
        parts.push(`\n${rendered}`);
      } else {
        parts.push(rendered);
      }
    }

    return `${indent} ${parts.join('').trim()}\n`;
  }

  private renderText(node: AdfNode): string {
    let text = node.text ?? '';
    for (const mark of node.marks ?? []) {
      text = this.applyMark(text, mark);
    }
    return text;
  }

  private applyMark(text: string, mark: AdfMark): string {
    switch (mark.type) {
      case 'strong':
        return `*${text}*`;
      case 'em':
        return `_${text}_`;
      case 'strike':
        return `[.line-through]#${text}#`;
      case 'underline':
        return `[.underline]#${text}#`;
      case 'code':
        return `\`${text}\``;
      case 'sup':
        return `^${text}^`;
      case 'sub':
        return `~${text}~`;
      case 'backgroundColor':
        return `#${text}#`;
      case 'link': {
        const href = stringAttr(mark, 'href');
        return href === undefined ? text : `link:${href}[${text}]`;
      }
      default:
        return text;
    }
  }
}
