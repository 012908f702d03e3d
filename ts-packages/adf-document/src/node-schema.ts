/**
 * Runtime validation for ADF nodes that arrive as JSON (macro output,
 * pass-through blocks, REST responses).
 */

import { z } from 'zod';
import type { AdfMark, AdfNode } from './types.js';

export const AdfMarkSchema: z.ZodType<AdfMark> = z.object({
  type: z.string().min(1),
  attrs: z.record(z.unknown()).optional()
}).passthrough();

export const AdfNodeSchema: z.ZodType<AdfNode> = z.lazy(() =>
  z.object({
    type: z.string().min(1),
    attrs: z.record(z.unknown()).optional(),
    content: z.array(AdfNodeSchema).optional(),
    text: z.string().optional(),
    marks: z.array(AdfMarkSchema).optional()
  }).passthrough()
);

export const AdfDocumentSchema = z.object({
  version: z.number().optional(),
  type: z.literal('doc'),
  content: z.array(AdfNodeSchema)
}).passthrough();

/** Node types that macros emit as standalone structured nodes */
export const STRUCTURED_NODE_TYPES: readonly string[] = ['inlineExtension', 'extension', 'mention', 'inlineCard'];

/**
 * Convert a parsed JSON value into ADF nodes. Objects yield one node,
 * arrays yield one node per element. Returns undefined unless every
 * element is a node.
 */
export function toAdfNodes(value: unknown): AdfNode[] | undefined {
  const candidates = Array.isArray(value) ? value : [value];
  const nodes: AdfNode[] = [];
  for (const candidate of candidates) {
    const result = AdfNodeSchema.safeParse(candidate);
    if (!result.success) {
      return undefined;
    }
    nodes.push(result.data);
  }
  return nodes.length > 0 ? nodes : undefined;
}

/**
 * Parse `text` as a single structured node (mention, extension, ...).
 */
export function parseStructuredNode(text: string): AdfNode | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  const result = AdfNodeSchema.safeParse(parsed);
  if (!result.success || !STRUCTURED_NODE_TYPES.includes(result.data.type)) {
    return undefined;
  }
  return result.data;
}
