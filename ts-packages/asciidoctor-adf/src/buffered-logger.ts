/**
 * Holds log messages until a conversion pass is known to be the final one
 */

import type { LogLevel, Logger } from '@asciidoc-adf/document';

export class BufferedLogger implements Logger {
  private readonly entries: Array<{ level: LogLevel; message: string }> = [];

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

  flush(target: Logger): void {
    for (const { level, message } of this.entries.splice(0)) {
      target[level](message);
    }
  }
}
