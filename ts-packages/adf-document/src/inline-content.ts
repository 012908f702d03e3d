/**
 * Inline Content
 *
 * Turns substituted inline text into ADF inline nodes: placeholder tokens
 * are resolved through the registry, mark spans apply their marks to the
 * text they enclose, and literal text is scanned for embedded JSON nodes.
 */

import { textNode } from './builders.js';
import { findTokens, type InlineNodeRegistry } from './inline-registry.js';
import { toAdfNodes } from './node-schema.js';
import { scanTextOrJson } from './text-or-json.js';
import type { AdfMark, AdfNode } from './types.js';

export interface InlineParseOptions {
  /** Decode HTML entities in literal text (default true) */
  decodeEntities?: boolean;
}

interface ActiveMark {
  id: number;
  mark: AdfMark;
}

/**
 * Merge marks, outer marks first. A mark type already present is not added twice.
 */
export function mergeMarks(outer: AdfMark[], inner: AdfMark[] = []): AdfMark[] {
  const merged = [...outer];
  for (const mark of inner) {
    if (!merged.some(existing => existing.type === mark.type)) {
      merged.push(mark);
    }
  }
  return merged;
}

export class InlineContentParser {
  constructor(private readonly registry: InlineNodeRegistry) {}

  /**
   * Parse `text` into inline nodes, with `marks` applied to every text run.
   * Text that cannot be interpreted is kept verbatim.
   */
  parseOrEscape(text: string, marks: AdfMark[] = [], options: InlineParseOptions = {}): AdfNode[] {
    const out: AdfNode[] = [];
    const active: ActiveMark[] = [];
    const currentMarks = (): AdfMark[] => mergeMarks(marks, active.map(entry => entry.mark));

    let cursor = 0;
    for (const token of findTokens(text)) {
      this.appendLiteral(out, text.slice(cursor, token.index), currentMarks(), options);
      cursor = token.index + token.raw.length;

      switch (token.kind) {
        case 'node': {
          const node = this.registry.resolve(token.id);
          if (node === undefined) {
            out.push(textNode(token.raw, currentMarks()));
          } else {
            out.push(...this.materialize(node, currentMarks(), options));
          }
          break;
        }

        case 'open': {
          const mark = this.registry.resolveMark(token.id);
          if (mark === undefined) {
            out.push(textNode(token.raw, currentMarks()));
          } else {
            active.push({ id: token.id, mark });
          }
          break;
        }

        case 'close': {
          const position = active.map(entry => entry.id).lastIndexOf(token.id);
          if (position === -1) {
            out.push(textNode(token.raw, currentMarks()));
          } else {
            active.splice(position, 1);
          }
          break;
        }

        default: {
          const exhaustive: never = token.kind;
          throw new Error(`Unhandled token kind: ${String(exhaustive)}`);
        }
      }
    }
    this.appendLiteral(out, text.slice(cursor), currentMarks(), options);

    return out;
  }

  /**
   * A registered text node is parsed again so tokens inside its text (a
   * formatted link label, for instance) resolve too.
   */
  private materialize(node: AdfNode, marks: AdfMark[], options: InlineParseOptions): AdfNode[] {
    if (node.type === 'text' && typeof node.text === 'string') {
      return this.parseOrEscape(node.text, mergeMarks(marks, node.marks), options);
    }
    return [node];
  }

  private appendLiteral(out: AdfNode[], text: string, marks: AdfMark[], options: InlineParseOptions): void {
    if (text.length === 0) {
      return;
    }

    let pending = '';
    const flush = (): void => {
      if (pending.length > 0) {
        out.push(textNode(pending, marks));
        pending = '';
      }
    };

    // Code text is shown as written, JSON included
    const detectJson = !marks.some(mark => mark.type === 'code');
    const segments = scanTextOrJson(text, { decodeEntities: options.decodeEntities ?? true, detectJson });
    for (const segment of segments) {
      if (segment.kind === 'text') {
        pending += segment.text;
        continue;
      }

      const nodes = toAdfNodes(segment.value);
      if (nodes === undefined) {
        pending += segment.source;
        continue;
      }

      flush();
      for (const node of nodes) {
        if (node.type !== 'text') {
          out.push(node);
          continue;
        }
        // Empty JSON text nodes are dropped
        if (typeof node.text !== 'string' || node.text.length === 0) {
          continue;
        }
        const merged = mergeMarks(marks, node.marks);
        out.push(merged.length > 0 ? { ...node, marks: merged } : node);
      }
    }
    flush();
  }
}
