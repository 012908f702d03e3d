/**
 * AsciiDoc to ADF
 *
 * `convertAsciidoc` converts in passes. A pass that needs remote data
 * (Jira issues, Confluence users, remote image sizes) records the lookups
 * and falls back to placeholder output; the lookups are awaited and the
 * document converted again. Only the final pass's log messages are kept.
 *
 * `convertAsciidocSync` runs a single pass without network access.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  DocumentConverter,
  FileImageProber,
  getDefaultLogger,
  type AdfDocument,
  type IdFactory,
  type Logger,
  type ParseOptions
} from '@asciidoc-adf/document';
import { AsciidoctorParser } from './asciidoctor-parser.js';
import { HttpAtlassianClient } from './atlassian-client.js';
import { BufferedLogger } from './buffered-logger.js';
import { defaultMacros } from './extensions.js';
import { MacroContext, type ClientFactory } from './macro-context.js';
import { fetchImageDimensions } from './remote-images.js';
import { SettingsResolver, type AtlassianSettings } from './settings.js';

/** Passes before lookups found in the last one are given up on */
export const MAX_PASSES = 3;

export interface ConvertOptions extends ParseOptions {
  /** Atlassian settings; document attributes override them, they override the environment */
  settings?: AtlassianSettings;
  env?: NodeJS.ProcessEnv;
  clientFactory?: ClientFactory;
  /** HTTP client for remote images and the default Atlassian client */
  http?: AxiosInstance;
  logger?: Logger;
  /** Media occurrence keys */
  idFactory?: IdFactory;
}

function parseOptions(options: ConvertOptions): ParseOptions {
  return { safe: options.safe, attributes: options.attributes, baseDir: options.baseDir };
}

function convertPass(
  source: string,
  options: ConvertOptions,
  context: MacroContext,
  prober: FileImageProber,
  logger: Logger
): AdfDocument {
  context.beginPass(logger);
  const parser = new AsciidoctorParser({ macros: defaultMacros(context), logger });
  const converter = new DocumentConverter({ parser, imageProber: prober, logger, idFactory: options.idFactory });
  return converter.convert(source, parseOptions(options));
}

function createContext(options: ConvertOptions, logger: Logger, http: AxiosInstance | undefined): MacroContext {
  return new MacroContext({
    settings: new SettingsResolver({ settings: options.settings, env: options.env, logger }),
    clientFactory: options.clientFactory ?? (credentials => new HttpAtlassianClient({ credentials, http, logger })),
    logger
  });
}

export async function convertAsciidoc(source: string, options: ConvertOptions = {}): Promise<AdfDocument> {
  const logger = options.logger ?? getDefaultLogger();
  const http = options.http ?? axios.create({ timeout: 30_000 });
  const context = createContext(options, logger, http);
  const prober = new FileImageProber();
  context.mode = 'prefetch';

  for (let pass = 1; ; pass++) {
    if (pass === MAX_PASSES) {
      context.mode = 'offline';
    }

    const buffered = new BufferedLogger();
    const doc = convertPass(source, options, context, prober, buffered);
    const remoteImages = prober.pendingRemote;

    if (context.mode === 'offline' || (!context.hasPending() && remoteImages.length === 0)) {
      buffered.flush(logger);
      return doc;
    }

    logger.debug(`Pass ${pass}: waiting for remote lookups (${remoteImages.length} images)`);
    await Promise.all([
      context.settle(),
      fetchImageDimensions(remoteImages, prober, http, logger)
    ]);
  }
}

export function convertAsciidocSync(source: string, options: ConvertOptions = {}): AdfDocument {
  const logger = options.logger ?? getDefaultLogger();
  const context = createContext(options, logger, options.http);
  return convertPass(source, options, context, new FileImageProber(), logger);
}
