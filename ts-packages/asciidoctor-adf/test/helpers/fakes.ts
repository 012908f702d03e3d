/**
 * Test doubles: in-memory logger, recording inline handler, Atlassian
 * client fake and an axios instance with a stub adapter.
 */

import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { AdfNode, InlineHandler, LogLevel, Logger, SourceInline } from '@asciidoc-adf/document';
import type {
  ApiResult,
  AtlassianClient,
  AtlassianUser,
  IssueSearchResult,
  JiraField
} from '../../src/atlassian-client.js';
import { MacroContext, type LookupMode, type MacroEnvironment } from '../../src/macro-context.js';
import { SettingsResolver, type CompleteCredentials } from '../../src/settings.js';

export const CREDENTIALS: CompleteCredentials = {
  jiraBaseUrl: 'https://jira.example.com',
  confluenceBaseUrl: 'https://example.atlassian.net',
  apiToken: 'test-secret',
  userEmail: 'user@example.com'
};

/** Document attributes carrying complete credentials */
export const CREDENTIAL_ATTRIBUTES: Record<string, string> = {
  'atlassian-base-url': 'https://jira.example.com',
  'confluence-api-token': 'test-secret',
  'confluence-user-email': 'user@example.com'
};

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
 * Inline handler that records what it is given and returns readable markers
 */
export class RecordingInlineHandler implements InlineHandler {
  readonly inlines: SourceInline[] = [];
  readonly nodes: AdfNode[] = [];

  convertInline(node: SourceInline): string {
    this.inlines.push(node);
    return `<inline:${this.inlines.length}>`;
  }

  embedNode(node: AdfNode): string {
    this.nodes.push(node);
    return `<node:${this.nodes.length}>`;
  }
}

export interface FakeClientData {
  users?: Record<string, AtlassianUser>;
  fields?: ApiResult<JiraField[]>;
  issues?: ApiResult<IssueSearchResult>;
  /** Rejects user lookups with this error */
  userError?: Error;
}

export class FakeAtlassianClient implements AtlassianClient {
  readonly calls: string[] = [];

  constructor(private readonly data: FakeClientData = {}) {}

  async queryIssues(jql: string, fields?: string[]): Promise<ApiResult<IssueSearchResult>> {
    this.calls.push(`queryIssues:${jql}:${(fields ?? []).join(',')}`);
    return this.data.issues ?? { success: true, data: { issues: [] } };
  }

  async getFields(): Promise<ApiResult<JiraField[]>> {
    this.calls.push('getFields');
    return this.data.fields ?? { success: true, data: [] };
  }

  async findUserByFullName(fullName: string): Promise<AtlassianUser | undefined> {
    this.calls.push(`findUserByFullName:${fullName}`);
    if (this.data.userError !== undefined) {
      throw this.data.userError;
    }
    return this.data.users?.[fullName];
  }
}

export function macroContext(
  client: AtlassianClient,
  logger: MemoryLogger,
  mode: LookupMode = 'prefetch'
): MacroContext {
  return new MacroContext({
    settings: new SettingsResolver({ env: {}, logger }),
    clientFactory: () => client,
    mode,
    logger
  });
}

export function macroEnvironment(
  context: MacroContext,
  inline: InlineHandler,
  attributes: Record<string, string> = {}
): MacroEnvironment {
  return { context, inline, attributes, logger: context.logger };
}

// =============================================================================
// HTTP
// =============================================================================

export interface RecordedRequest {
  url: string;
  params: Record<string, string>;
  auth?: { username: string; password: string };
}

export interface StubReply {
  status: number;
  data: unknown;
  statusText?: string;
}

function stringParams(value: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof value === 'object' && value !== null) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string') {
        params[key] = entry;
      }
    }
  }
  return params;
}

/**
 * axios instance answering every request from `reply`; a returned Error is thrown
 */
export function stubHttp(reply: (request: RecordedRequest) => StubReply | Error): {
  http: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = { url: config.url ?? '', params: stringParams(config.params) };
      if (config.auth !== undefined) {
        request.auth = { username: config.auth.username, password: config.auth.password };
      }
      requests.push(request);

      const answer = reply(request);
      if (answer instanceof Error) {
        throw answer;
      }
      return { data: answer.data, status: answer.status, statusText: answer.statusText ?? '', headers: {}, config };
    }
  });
  return { http, requests };
}
