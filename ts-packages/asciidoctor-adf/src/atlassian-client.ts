/**
 * Atlassian REST Client
 *
 * The three lookups the macros need: Jira issue search, Jira field
 * metadata and Confluence user search. Calls never throw; failures come
 * back as `{ success: false, error }` (or `undefined` for user search) and
 * responses are validated before use.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { getDefaultLogger, type Logger } from '@asciidoc-adf/document';
import type { CompleteCredentials } from './settings.js';

export type ApiResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

// =============================================================================
// Response Schemas
// =============================================================================

export const JiraFieldSchema = z.object({
  id: z.string(),
  name: z.string(),
  custom: z.boolean().optional(),
  description: z.string().nullish(),
  schema: z.object({ type: z.string().optional() }).nullish()
});

export type JiraField = z.infer<typeof JiraFieldSchema>;

export const JiraIssueSchema = z.object({
  key: z.string(),
  fields: z.record(z.unknown()).default({})
});

export type JiraIssue = z.infer<typeof JiraIssueSchema>;

const IssueSearchSchema = z.object({
  issues: z.array(JiraIssueSchema)
});

export type IssueSearchResult = z.infer<typeof IssueSearchSchema>;

const UserSearchSchema = z.object({
  results: z.array(z.object({
    user: z.object({
      accountId: z.string(),
      displayName: z.string()
    })
  }))
});

export interface AtlassianUser {
  id: string;
  displayName: string;
}

// =============================================================================
// Client
// =============================================================================

export interface AtlassianClient {
  queryIssues(jql: string, fields?: string[]): Promise<ApiResult<IssueSearchResult>>;
  getFields(): Promise<ApiResult<JiraField[]>>;
  findUserByFullName(fullName: string): Promise<AtlassianUser | undefined>;
}

export interface HttpAtlassianClientOptions {
  credentials: CompleteCredentials;
  /** Preconfigured axios instance; tests pass one with a stub adapter */
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
}

type GetOutcome =
  | { kind: 'ok'; data: unknown }
  | { kind: 'status'; status: number; statusText: string; body: string }
  | { kind: 'error'; message: string };

export class HttpAtlassianClient implements AtlassianClient {
  private readonly http: AxiosInstance;
  private readonly credentials: CompleteCredentials;
  private readonly logger: Logger;

  constructor(options: HttpAtlassianClientOptions) {
    this.credentials = options.credentials;
    this.logger = options.logger ?? getDefaultLogger();
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30_000 });
  }

  async queryIssues(jql: string, fields?: string[]): Promise<ApiResult<IssueSearchResult>> {
    const url = `${this.credentials.jiraBaseUrl}/rest/api/3/search/jql`;
    const params: Record<string, string> = { jql };
    if (fields !== undefined) {
      params.fields = fields.join(',');
    }

    const outcome = await this.get(url, params);
    switch (outcome.kind) {
      case 'ok':
        return validate(IssueSearchSchema, outcome.data, url);
      case 'status':
        return { success: false, error: `Jira API query failed: ${url} -> ${outcome.status} ${outcome.body}` };
      case 'error':
        return { success: false, error: `Failed to query Jira: ${outcome.message}` };
    }
  }

  async getFields(): Promise<ApiResult<JiraField[]>> {
    const url = `${this.credentials.jiraBaseUrl}/rest/api/3/field`;

    const outcome = await this.get(url);
    switch (outcome.kind) {
      case 'ok':
        return validate(z.array(JiraFieldSchema), outcome.data, url);
      case 'status':
        return { success: false, error: `Failed to get Jira fields: ${url} -> ${outcome.status} ${outcome.body}` };
      case 'error':
        return { success: false, error: `Error fetching Jira fields: ${outcome.message}` };
    }
  }

  async findUserByFullName(fullName: string): Promise<AtlassianUser | undefined> {
    const url = `${this.credentials.confluenceBaseUrl}/wiki/rest/api/search/user`;

    const outcome = await this.get(url, { cql: `user.fullname~"${fullName}"` });
    switch (outcome.kind) {
      case 'ok': {
        const parsed = validate(UserSearchSchema, outcome.data, url);
        if (!parsed.success) {
          this.logger.warn(`Failed to query Confluence user: ${parsed.error}`);
          return undefined;
        }
        const first = parsed.data.results[0];
        return first === undefined ? undefined : { id: first.user.accountId, displayName: first.user.displayName };
      }
      case 'status':
        this.logger.warn(`Failed to query Confluence user: ${url} -> ${outcome.status} ${outcome.statusText}`);
        return undefined;
      case 'error':
        this.logger.warn(`Failed to query Confluence user: ${outcome.message}`);
        return undefined;
    }
  }

  private async get(url: string, params?: Record<string, string>): Promise<GetOutcome> {
    try {
      const response = await this.http.get<unknown>(url, {
        params,
        auth: { username: this.credentials.userEmail, password: this.credentials.apiToken },
        headers: { Accept: 'application/json' },
        validateStatus: () => true
      });
      if (response.status !== 200) {
        return {
          kind: 'status',
          status: response.status,
          statusText: response.statusText,
          body: bodyText(response.data)
        };
      }
      return { kind: 'ok', data: response.data };
    } catch (error) {
      return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
    }
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, url: string): ApiResult<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: `Unexpected response from ${url}: ${parsed.error.issues.map(issue => issue.message).join('; ')}` };
  }
  return { success: true, data: parsed.data };
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return data === undefined ? '' : JSON.stringify(data);
}
