/**
 * Inline Node Registry
 *
 * Structured inline content cannot travel through the parser's string
 * substitutions as JSON, because later passes rewrite URLs, quotes and
 * entities inside it. Instead the node is stored here and a NUL-delimited
 * token is spliced into the text:
 *
 *   \u0000adf:<hex>\u0000   a registered node
 *   \u0000adf+<hex>\u0000   start of a mark span
 *   \u0000adf-<hex>\u0000   end of a mark span
 *
 * Mark spans wrap text that is still plain, so later substitutions keep
 * working inside formatted text. Ids are sequential from 0 and unique per
 * registry; one registry serves one conversion.
 */

import type { AdfMark, AdfNode } from './types.js';

export const TOKEN_SENTINEL = '\u0000';
const TOKEN_PREFIX = 'adf';

export type TokenKind = 'node' | 'open' | 'close';

const KIND_SIGILS: Record<TokenKind, string> = {
  node: ':',
  open: '+',
  close: '-'
};

export interface PlaceholderToken {
  kind: TokenKind;
  id: number;
  /** Token text as it appears in the input */
  raw: string;
  index: number;
}

export interface MarkSpan {
  id: number;
  open: string;
  close: string;
}

function tokenPattern(): RegExp {
  return /\u0000adf([:+-])([0-9a-f]+)\u0000/g;
}

export function formatToken(kind: TokenKind, id: number): string {
  return `${TOKEN_SENTINEL}${TOKEN_PREFIX}${KIND_SIGILS[kind]}${id.toString(16)}${TOKEN_SENTINEL}`;
}

function kindOfSigil(sigil: string): TokenKind {
  switch (sigil) {
    case ':':
      return 'node';
    case '+':
      return 'open';
    default:
      return 'close';
  }
}

/**
 * Find every placeholder token in `text`, in order of appearance.
 */
export function findTokens(text: string): PlaceholderToken[] {
  if (!text.includes(TOKEN_SENTINEL)) {
    return [];
  }

  const tokens: PlaceholderToken[] = [];
  for (const match of text.matchAll(tokenPattern())) {
    tokens.push({
      kind: kindOfSigil(match[1]),
      id: parseInt(match[2], 16),
      raw: match[0],
      index: match.index ?? 0
    });
  }
  return tokens;
}

export class InlineNodeRegistry {
  private nextId = 0;
  private readonly nodes = new Map<number, AdfNode>();
  private readonly marks = new Map<number, AdfMark>();

  /**
   * Store a node and return the token that stands for it
   */
  register(node: AdfNode): string {
    const id = this.nextId++;
    this.nodes.set(id, node);
    return formatToken('node', id);
  }

  /**
   * Store a mark and return the tokens delimiting its span
   */
  registerMark(mark: AdfMark): MarkSpan {
    const id = this.nextId++;
    this.marks.set(id, mark);
    return { id, open: formatToken('open', id), close: formatToken('close', id) };
  }

  resolve(id: number): AdfNode | undefined {
    return this.nodes.get(id);
  }

  resolveMark(id: number): AdfMark | undefined {
    return this.marks.get(id);
  }

  get size(): number {
    return this.nodes.size + this.marks.size;
  }
}
