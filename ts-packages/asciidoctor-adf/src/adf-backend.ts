/**
 * ADF Backend
 *
 * The converter Asciidoctor calls for inline nodes while it substitutes
 * text. It does not produce a document: it reads the node, hands it to the
 * `InlineHandler` of the parse in progress and returns the string to
 * splice in (text, span tokens or a placeholder token).
 *
 * Asciidoctor is synchronous, so the parse in progress is the top of a
 * stack. Nested parses (AsciiDoc table cells) push their own entry.
 */

import asciidoctor from '@asciidoctor/core';
import { getDefaultLogger, type InlineHandler, type Logger } from '@asciidoc-adf/document';
import { AsciidoctorNode, hasMethod } from './asciidoctor-node.js';
import { readInline } from './inline-reader.js';

export const BACKEND_NAME = 'adf';

export const processor = asciidoctor();

export interface ParseSession {
  inline: InlineHandler;
  logger: Logger;
}

const sessions: ParseSession[] = [];

function currentSession(): ParseSession | undefined {
  return sessions[sessions.length - 1];
}

export function withSession<T>(session: ParseSession, run: () => T): T {
  sessions.push(session);
  try {
    return run();
  } finally {
    sessions.pop();
  }
}

export class AdfBackend {
  readonly backend = BACKEND_NAME;
  readonly backendTraits = { basebackend: BACKEND_NAME, outfilesuffix: '.adf', filetype: 'json' };

  convert(node: unknown, transform?: unknown): string {
    const view = AsciidoctorNode.from(node);
    if (view === undefined) {
      return '';
    }
    const name = typeof transform === 'string' ? transform : view.nodeName;
    if (!name.startsWith('inline_')) {
      // Blocks are read from the tree, never converted here
      return '';
    }

    const session = currentSession();
    if (session === undefined) {
      throw new Error(`The ${BACKEND_NAME} backend only converts inline nodes during AsciidoctorParser.parse()`);
    }
    return session.inline.convertInline(readInline(view, name));
  }
}

/**
 * Asciidoctor severities: DEBUG, INFO, WARN, ERROR, FATAL
 */
function forward(logger: Logger, severity: unknown, message: string): void {
  const level = typeof severity === 'number' ? severity : 2;
  if (level >= 3) {
    logger.error(message);
  } else if (level === 2) {
    logger.warn(message);
  } else if (level === 1) {
    logger.info(message);
  } else {
    logger.debug(message);
  }
}

function messageText(message: unknown): string {
  if (typeof message === 'string') {
    return message;
  }
  if (hasMethod(message, 'getText')) {
    const text = message.getText();
    return typeof text === 'string' ? text : String(text);
  }
  return String(message);
}

let installed = false;

/**
 * Register the backend and send Asciidoctor's own log messages to the
 * logger of the parse in progress. Runs once per process.
 */
export function installBackend(): void {
  if (installed) {
    return;
  }
  installed = true;

  const factory: unknown = Reflect.get(processor, 'ConverterFactory');
  if (!hasMethod(factory, 'register')) {
    throw new Error('Asciidoctor.js does not expose ConverterFactory.register()');
  }
  factory.register(new AdfBackend(), [BACKEND_NAME]);

  const loggers: unknown = Reflect.get(processor, 'LoggerManager');
  if (hasMethod(loggers, 'newLogger') && hasMethod(loggers, 'setLogger')) {
    const logger = loggers.newLogger('AdfLogger', {
      add(severity: unknown, _progname: unknown, message: unknown): void {
        forward(currentSession()?.logger ?? getDefaultLogger(), severity, messageText(message));
      }
    });
    loggers.setLogger(logger);
  }
}
