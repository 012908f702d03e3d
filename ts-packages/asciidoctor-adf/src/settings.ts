/**
 * Atlassian Settings
 *
 * Base URLs and credentials for the Jira and Confluence macros. Each value
 * is looked up in the document attributes, then in the explicit settings
 * object, then in the environment. Values that fail validation are reported
 * and skipped.
 */

import { z } from 'zod';
import { getDefaultLogger, type Logger } from '@asciidoc-adf/document';

export interface AtlassianSettings {
  atlassianBaseUrl?: string;
  /** @deprecated use `atlassianBaseUrl` */
  jiraBaseUrl?: string;
  /** @deprecated use `atlassianBaseUrl` */
  confluenceBaseUrl?: string;
  apiToken?: string;
  userEmail?: string;
}

export type SettingName = keyof AtlassianSettings;

/**
 * Effective endpoints and credentials. Both base URLs are filled from the
 * unified setting when it is present.
 */
export interface AtlassianCredentials {
  jiraBaseUrl?: string;
  confluenceBaseUrl?: string;
  apiToken?: string;
  userEmail?: string;
}

export interface CompleteCredentials {
  jiraBaseUrl: string;
  confluenceBaseUrl: string;
  apiToken: string;
  userEmail: string;
}

const baseUrl = z.string().url().transform(url => url.replace(/\/+$/, ''));

interface SettingSource {
  attribute: string;
  env: string;
  schema: z.ZodType<string, z.ZodTypeDef, string>;
}

const SETTING_SOURCES: Record<SettingName, SettingSource> = {
  atlassianBaseUrl: { attribute: 'atlassian-base-url', env: 'ATLASSIAN_BASE_URL', schema: baseUrl },
  jiraBaseUrl: { attribute: 'jira-base-url', env: 'JIRA_BASE_URL', schema: baseUrl },
  confluenceBaseUrl: { attribute: 'confluence-base-url', env: 'CONFLUENCE_BASE_URL', schema: baseUrl },
  apiToken: { attribute: 'confluence-api-token', env: 'CONFLUENCE_API_TOKEN', schema: z.string().min(1) },
  userEmail: { attribute: 'confluence-user-email', env: 'CONFLUENCE_USER_EMAIL', schema: z.string().email() }
};

type Origin = 'attribute' | 'settings' | 'environment';

export function hasApiCredentials(credentials: AtlassianCredentials): credentials is CompleteCredentials {
  return credentials.jiraBaseUrl !== undefined
    && credentials.confluenceBaseUrl !== undefined
    && credentials.apiToken !== undefined
    && credentials.userEmail !== undefined;
}

export interface SettingsResolverOptions {
  settings?: AtlassianSettings;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class SettingsResolver {
  private readonly settings: AtlassianSettings;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly reported = new Set<string>();

  constructor(options: SettingsResolverOptions = {}) {
    this.settings = options.settings ?? {};
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Value of one setting for a document with the given attributes
   */
  lookup(name: SettingName, attributes: Record<string, string>): string | undefined {
    const source = SETTING_SOURCES[name];
    const candidates: Array<[Origin, string | undefined]> = [
      ['attribute', attributes[source.attribute]],
      ['settings', this.settings[name]],
      ['environment', this.env[source.env]]
    ];

    for (const [origin, raw] of candidates) {
      if (raw === undefined || raw.trim().length === 0) {
        continue;
      }
      const parsed = source.schema.safeParse(raw.trim());
      if (parsed.success) {
        return parsed.data;
      }
      this.reportOnce(`invalid:${origin}:${name}`, () => {
        const issue = parsed.error.issues[0]?.message ?? 'invalid value';
        this.logger.warn(`Ignoring ${describe(origin, source)}: ${issue}`);
      });
    }
    return undefined;
  }

  resolve(attributes: Record<string, string>): AtlassianCredentials {
    const unified = this.lookup('atlassianBaseUrl', attributes);
    const jira = this.lookup('jiraBaseUrl', attributes);
    const confluence = this.lookup('confluenceBaseUrl', attributes);

    if (unified === undefined) {
      if (jira !== undefined) {
        this.reportOnce('deprecated:jira', () => this.logger.warn(
          "'jira-base-url' / JIRA_BASE_URL is deprecated. Use 'atlassian-base-url' / ATLASSIAN_BASE_URL instead."
        ));
      }
      if (confluence !== undefined) {
        this.reportOnce('deprecated:confluence', () => this.logger.warn(
          "'confluence-base-url' / CONFLUENCE_BASE_URL is deprecated. Use 'atlassian-base-url' / ATLASSIAN_BASE_URL instead."
        ));
      }
    }

    return compact({
      jiraBaseUrl: unified ?? jira ?? confluence,
      confluenceBaseUrl: unified ?? confluence ?? jira,
      apiToken: this.lookup('apiToken', attributes),
      userEmail: this.lookup('userEmail', attributes)
    });
  }

  private reportOnce(key: string, report: () => void): void {
    if (!this.reported.has(key)) {
      this.reported.add(key);
      report();
    }
  }
}

function describe(origin: Origin, source: SettingSource): string {
  switch (origin) {
    case 'attribute':
      return `document attribute '${source.attribute}'`;
    case 'settings':
      return `setting for '${source.attribute}'`;
    case 'environment':
      return `environment variable ${source.env}`;
  }
}

function compact(credentials: AtlassianCredentials): AtlassianCredentials {
  const result: AtlassianCredentials = {};
  if (credentials.jiraBaseUrl !== undefined) result.jiraBaseUrl = credentials.jiraBaseUrl;
  if (credentials.confluenceBaseUrl !== undefined) result.confluenceBaseUrl = credentials.confluenceBaseUrl;
  if (credentials.apiToken !== undefined) result.apiToken = credentials.apiToken;
  if (credentials.userEmail !== undefined) result.userEmail = credentials.userEmail;
  return result;
}
