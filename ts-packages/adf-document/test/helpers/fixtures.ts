/**
 * Shared test fixtures: in-memory logger, stub image prober and source
 * document builders.
 */

import type { ImageProber } from '../../src/image-dimensions.js';
import type { LogLevel, Logger } from '../../src/logger.js';
import type { ParseOptions, SourceBlock, SourceDocument } from '../../src/source-types.js';
import type { Dimensions } from '../../src/types.js';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

/**
 * Prober answering from a fixed table, recording every location asked for
 */
export class StaticImageProber implements ImageProber {
  readonly calls: string[] = [];

  constructor(private readonly sizes: Record<string, Dimensions> = {}) {}

  probe(location: string): Dimensions | undefined {
    this.calls.push(location);
    return this.sizes[location];
  }
}

export function sourceDocument(
  blocks: SourceBlock[],
  attributes: Record<string, string> = {},
  parseOptions: ParseOptions = {}
): SourceDocument {
  return {
    kind: 'document',
    attributes,
    hasSections: blocks.some(block => block.kind === 'section'),
    parseOptions,
    blocks
  };
}
