/**
 * Inline Node Reader
 *
 * Turns an Asciidoctor inline node into the parser-neutral `SourceInline`
 * the conversion core understands.
 */

import type { AnchorType, QuotedType, SourceInline } from '@asciidoc-adf/document';
import { AsciidoctorNode, attributeString } from './asciidoctor-node.js';

const QUOTED_TYPES: readonly QuotedType[] = [
  'strong',
  'emphasis',
  'monospaced',
  'superscript',
  'subscript',
  'mark',
  'double',
  'single',
  'unquoted',
  'asciimath',
  'latexmath'
];

const ANCHOR_TYPES: readonly AnchorType[] = ['xref', 'link', 'ref', 'bibref'];

function quotedType(node: AsciidoctorNode): QuotedType {
  const type = QUOTED_TYPES.find(candidate => candidate === node.string('getType')) ?? 'unquoted';
  if (type !== 'unquoted') {
    return type;
  }
  // [.underline]#text# and [.line-through]#text#
  const roles = (node.string('getRole') ?? '').split(/\s+/);
  if (roles.includes('underline')) {
    return 'underline';
  }
  if (roles.includes('line-through')) {
    return 'strikethrough';
  }
  return 'unquoted';
}

/**
 * Title a cross reference to `refid` would show: the target's reftext or
 * title, as Asciidoctor catalogued it
 */
function referenceTitle(document: AsciidoctorNode, refid: string | undefined): string | undefined {
  if (refid === undefined) {
    return undefined;
  }
  const refs = document.call('getRefs');
  if (typeof refs !== 'object' || refs === null) {
    return undefined;
  }
  const target = AsciidoctorNode.from(Reflect.get(refs, refid));
  if (target === undefined) {
    return undefined;
  }
  return target.attr('reftext') ?? target.string('getTitle');
}

function keyboardText(node: AsciidoctorNode): string {
  const keys = node.call('getAttribute', 'keys');
  if (Array.isArray(keys)) {
    return keys.map(attributeString).filter(key => key !== undefined).join('+');
  }
  return node.string('getText') ?? '';
}

function menuText(node: AsciidoctorNode): string {
  const parts: string[] = [];
  const menu = node.attr('menu');
  if (menu !== undefined) {
    parts.push(menu);
  }
  const submenus = node.call('getAttribute', 'submenus');
  if (Array.isArray(submenus)) {
    for (const submenu of submenus) {
      const text = attributeString(submenu);
      if (text !== undefined) {
        parts.push(text);
      }
    }
  }
  const item = node.attr('menuitem');
  if (item !== undefined) {
    parts.push(item);
  }
  return parts.join(' > ');
}

export function readInline(node: AsciidoctorNode, nodeName: string): SourceInline {
  switch (nodeName) {
    case 'inline_quoted':
      return { kind: 'inline_quoted', type: quotedType(node), text: node.string('getText') ?? '' };

    case 'inline_anchor': {
      const type = ANCHOR_TYPES.find(candidate => candidate === node.string('getType')) ?? 'link';
      const refid = node.attr('refid') ?? (type === 'ref' || type === 'bibref' ? node.string('getId') : undefined);
      return {
        kind: 'inline_anchor',
        type,
        target: node.string('getTarget'),
        text: node.string('getText'),
        refid,
        reftext: node.attr('reftext') ?? (type === 'ref' ? node.string('getText') : undefined),
        referenceTitle: type === 'xref' ? referenceTitle(node.document, refid) : undefined
      };
    }

    case 'inline_image': {
      if (node.string('getType') === 'icon') {
        return { kind: 'inline_other', name: 'icon', text: node.attr('alt') ?? `[${node.string('getTarget') ?? ''}]` };
      }
      const document = node.document;
      return {
        kind: 'inline_image',
        target: node.string('getTarget') ?? '',
        alt: node.attr('alt'),
        width: node.attr('width'),
        height: node.attr('height'),
        occurrenceKey: node.attr('occurrenceKey'),
        documentAttributes: document.attributes(),
        baseDir: document.string('getBaseDir')
      };
    }

    case 'inline_break':
      return { kind: 'inline_break', text: node.string('getText') ?? '' };

    case 'inline_kbd':
      return { kind: 'inline_other', name: nodeName, text: keyboardText(node) };

    case 'inline_menu':
      return { kind: 'inline_other', name: nodeName, text: menuText(node) };

    default:
      return { kind: 'inline_other', name: nodeName, text: node.string('getText') ?? '' };
  }
}
