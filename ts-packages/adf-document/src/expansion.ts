/**
 * Placeholder expansion
 *
 * Final pass over a converted tree. Text children of paragraphs and
 * headings that still contain placeholder tokens are split, and the tokens
 * replaced by their registered nodes. Tokens with unknown ids stay in the
 * text unchanged.
 */

import type { InlineContentParser } from './inline-content.js';
import { TOKEN_SENTINEL } from './inline-registry.js';
import type { AdfNode } from './types.js';

const INLINE_CONTAINERS: readonly string[] = ['paragraph', 'heading'];

export function expandPlaceholders(nodes: AdfNode[], inline: InlineContentParser): AdfNode[] {
  return nodes.map(node => expandNode(node, inline));
}

function expandNode(node: AdfNode, inline: InlineContentParser): AdfNode {
  if (node.content === undefined) {
    return node;
  }

  let content = node.content.map(child => expandNode(child, inline));
  if (INLINE_CONTAINERS.includes(node.type)) {
    content = content.flatMap(child => expandText(child, inline));
  }
  return { ...node, content };
}

function expandText(node: AdfNode, inline: InlineContentParser): AdfNode[] {
  if (node.type !== 'text' || node.text === undefined || !node.text.includes(TOKEN_SENTINEL)) {
    return [node];
  }
  // Entities were decoded when the text node was first built
  return inline.parseOrEscape(node.text, node.marks ?? [], { decodeEntities: false });
}
