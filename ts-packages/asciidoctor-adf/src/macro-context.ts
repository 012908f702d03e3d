/**
 * Macro Context
 *
 * Per-conversion state shared by the macros: settings, REST clients and
 * the cache of remote lookups. Asciidoctor runs macros synchronously, so a
 * macro never waits on the network. It asks the context for a lookup and
 * gets either the cached value or `pending`; the pipeline then awaits the
 * pending lookups and converts again.
 */

import { getDefaultLogger, type InlineHandler, type Logger } from '@asciidoc-adf/document';
import {
  HttpAtlassianClient,
  type ApiResult,
  type AtlassianClient,
  type AtlassianUser,
  type IssueSearchResult,
  type JiraField
} from './atlassian-client.js';
import { JiraFieldResolver, type FieldResolution } from './jira-fields.js';
import { SettingsResolver, type AtlassianCredentials, type CompleteCredentials } from './settings.js';

// =============================================================================
// Macro Definitions
// =============================================================================

export type MacroAttributes = Record<string, string>;

export interface MacroEnvironment {
  context: MacroContext;
  inline: InlineHandler;
  /** Attributes of the document the macro appears in */
  attributes: Record<string, string>;
  logger: Logger;
}

export interface InlineMacro {
  name: string;
  positionalAttributes?: string[];
  /** Returns the text to splice in: plain text or placeholder tokens */
  process(target: string, attrs: MacroAttributes, env: MacroEnvironment): string;
}

export type BlockMacroResult =
  | { kind: 'content'; source: string }
  | { kind: 'paragraph'; text: string };

export interface BlockMacro {
  name: string;
  positionalAttributes?: string[];
  process(target: string, attrs: MacroAttributes, env: MacroEnvironment): BlockMacroResult;
}

// =============================================================================
// Lookups
// =============================================================================

/**
 * `prefetch` records missing lookups for the pipeline to await; `offline`
 * reports them as unavailable.
 */
export type LookupMode = 'prefetch' | 'offline';

export type Lookup<T> =
  | { state: 'ready'; value: T }
  | { state: 'pending' }
  | { state: 'unavailable'; reason: string };

export const OFFLINE_REASON = 'remote lookups need the asynchronous convertAsciidoc()';

class LookupCache<T> {
  private readonly settled = new Map<string, { value: T }>();
  private readonly failed = new Map<string, string>();
  private readonly inflight = new Map<string, Promise<void>>();

  get(key: string, load: () => Promise<T>, mode: LookupMode): Lookup<T> {
    const settled = this.settled.get(key);
    if (settled !== undefined) {
      return { state: 'ready', value: settled.value };
    }
    const failure = this.failed.get(key);
    if (failure !== undefined) {
      return { state: 'unavailable', reason: failure };
    }
    if (mode === 'offline') {
      return { state: 'unavailable', reason: OFFLINE_REASON };
    }

    if (!this.inflight.has(key)) {
      this.inflight.set(key, load().then(
        value => {
          this.settled.set(key, { value });
        },
        (error: unknown) => {
          this.failed.set(key, error instanceof Error ? error.message : String(error));
        }
      ));
    }
    return { state: 'pending' };
  }

  get pendingCount(): number {
    return this.inflight.size;
  }

  async settle(): Promise<void> {
    const waiting = [...this.inflight.values()];
    await Promise.all(waiting);
    this.inflight.clear();
  }
}

export interface IssuesTableData {
  fields: ApiResult<JiraField[]>;
  resolution: FieldResolution;
  /** Absent when some field names could not be resolved */
  issues?: ApiResult<IssueSearchResult>;
}

export type ClientFactory = (credentials: CompleteCredentials) => AtlassianClient;

export interface MacroContextOptions {
  settings?: SettingsResolver;
  clientFactory?: ClientFactory;
  mode?: LookupMode;
  logger?: Logger;
}

export class MacroContext {
  mode: LookupMode;
  private passLogger: Logger;
  private fieldReferencePrinted = false;
  private readonly settings: SettingsResolver;
  private readonly clientFactory: ClientFactory;
  private readonly clients = new Map<string, AtlassianClient>();
  private readonly fieldRequests = new Map<string, Promise<ApiResult<JiraField[]>>>();
  private readonly users = new LookupCache<AtlassianUser | undefined>();
  private readonly tables = new LookupCache<IssuesTableData>();

  constructor(options: MacroContextOptions = {}) {
    const logger = options.logger ?? getDefaultLogger();
    this.mode = options.mode ?? 'offline';
    this.passLogger = logger;
    this.settings = options.settings ?? new SettingsResolver({ logger });
    this.clientFactory = options.clientFactory
      ?? (credentials => new HttpAtlassianClient({ credentials, logger }));
  }

  get logger(): Logger {
    return this.passLogger;
  }

  /**
   * Start a conversion pass. Messages logged by macros go to `logger`.
   */
  beginPass(logger: Logger): void {
    this.passLogger = logger;
    this.fieldReferencePrinted = false;
  }

  credentials(attributes: Record<string, string>): AtlassianCredentials {
    return this.settings.resolve(attributes);
  }

  findUser(credentials: CompleteCredentials, fullName: string): Lookup<AtlassianUser | undefined> {
    const key = `${credentials.confluenceBaseUrl}\n${fullName}`;
    return this.users.get(key, () => this.client(credentials).findUserByFullName(fullName), this.mode);
  }

  /**
   * Field metadata and query results for one issues table
   */
  issuesTable(credentials: CompleteCredentials, jql: string, fieldTokens: string[]): Lookup<IssuesTableData> {
    const key = JSON.stringify([credentials.jiraBaseUrl, jql, fieldTokens]);
    return this.tables.get(key, async () => {
      const fields = await this.fieldMetadata(credentials);
      const resolution = new JiraFieldResolver(fields).resolve(fieldTokens);
      if (resolution.unknown.length > 0) {
        return { fields, resolution };
      }
      const issues = await this.client(credentials).queryIssues(jql, resolution.resolved);
      return { fields, resolution, issues };
    }, this.mode);
  }

  /**
   * Log the field reference, at most once per pass
   */
  printFieldReference(lines: string[]): void {
    if (this.fieldReferencePrinted) {
      return;
    }
    this.fieldReferencePrinted = true;
    for (const line of lines) {
      this.passLogger.info(line);
    }
  }

  hasPending(): boolean {
    return this.users.pendingCount > 0 || this.tables.pendingCount > 0;
  }

  async settle(): Promise<void> {
    await Promise.all([this.users.settle(), this.tables.settle()]);
  }

  private client(credentials: CompleteCredentials): AtlassianClient {
    const key = JSON.stringify([credentials.jiraBaseUrl, credentials.confluenceBaseUrl, credentials.userEmail]);
    let client = this.clients.get(key);
    if (client === undefined) {
      client = this.clientFactory(credentials);
      this.clients.set(key, client);
    }
    return client;
  }

  private fieldMetadata(credentials: CompleteCredentials): Promise<ApiResult<JiraField[]>> {
    let request = this.fieldRequests.get(credentials.jiraBaseUrl);
    if (request === undefined) {
      request = this.client(credentials).getFields();
      this.fieldRequests.set(credentials.jiraBaseUrl, request);
    }
    return request;
  }
}
