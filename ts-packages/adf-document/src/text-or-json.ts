/**
 * Text/JSON Scanner
 *
 * Splits a string into literal text and embedded JSON object/array
 * fragments. Macros and the inline handler may leave JSON in substituted
 * text; everything that is not a complete, non-empty JSON value stays text.
 */

import he from 'he';
import type { JsonValue } from './types.js';

export interface TextSegment {
  kind: 'text';
  text: string;
}

export interface JsonSegment {
  kind: 'json';
  value: JsonValue[] | { [key: string]: JsonValue };
  /** Fragment exactly as it appeared in the input */
  source: string;
}

export type ScanSegment = TextSegment | JsonSegment;

export interface ScanOptions {
  /** Decode HTML entities before scanning (default true) */
  decodeEntities?: boolean;
  /** Look for JSON fragments (default true); when false the whole input is one text segment */
  detectJson?: boolean;
}

function isOpener(ch: string): boolean {
  return ch === '{' || ch === '[';
}

function isCloser(ch: string): boolean {
  return ch === '}' || ch === ']';
}

/**
 * Parse a candidate fragment. Returns undefined for invalid or empty JSON.
 */
function parseFragment(fragment: string): JsonSegment['value'] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fragment);
  } catch {
    return undefined;
  }

  if (Array.isArray(parsed)) {
    return parsed.length > 0 ? parsed : undefined;
  }
  if (isJsonObject(parsed)) {
    return Object.keys(parsed).length > 0 ? parsed : undefined;
  }
  return undefined;
}

function isJsonObject(value: unknown): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scan `input` into text and JSON segments.
 *
 * Depth counting treats `{` and `[` alike and ignores brackets inside JSON
 * string literals. Adjacent literal text is always merged into one segment
 * and empty text is never emitted.
 */
export function scanTextOrJson(input: string, options: ScanOptions = {}): ScanSegment[] {
  const text = options.decodeEntities === false ? input : he.decode(input);
  if (options.detectJson === false) {
    return text.length > 0 ? [{ kind: 'text', text }] : [];
  }
  const segments: ScanSegment[] = [];

  let buffer = '';
  let fragment = '';
  let depth = 0;
  let inString = false;
  let escaped = false;

  const flushText = (): void => {
    if (buffer.length > 0) {
      segments.push({ kind: 'text', text: buffer });
      buffer = '';
    }
  };

  for (const ch of text) {
    if (depth === 0) {
      if (isOpener(ch)) {
        depth = 1;
        fragment = ch;
      } else {
        buffer += ch;
      }
      continue;
    }

    fragment += ch;

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (isOpener(ch)) {
      depth++;
    } else if (isCloser(ch)) {
      depth--;
      if (depth === 0) {
        const value = parseFragment(fragment);
        if (value === undefined) {
          buffer += fragment;
        } else {
          flushText();
          segments.push({ kind: 'json', value, source: fragment });
        }
        fragment = '';
      }
    }
  }

  // Unterminated fragment
  if (depth > 0) {
    buffer += fragment;
  }
  flushText();

  return segments;
}
