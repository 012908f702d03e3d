/**
 * Jira Field Names
 *
 * Parses the `fields` attribute of the issues table macro and maps the
 * display names a writer uses to Jira field ids.
 */

import type { ApiResult, JiraField, JiraIssue } from './atlassian-client.js';

export const DEFAULT_ISSUE_FIELDS: readonly string[] = ['key', 'summary', 'status'];

const PASS_THROUGH_FIELDS = new Set(['key', 'summary', 'status', 'description']);

/**
 * Split a comma separated field list. Tokens may be wrapped in double
 * quotes (`""` escapes a quote) or single quotes (`''` escapes a quote) to
 * carry commas.
 */
export function parseFieldList(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim().length === 0) {
    return [...DEFAULT_ISSUE_FIELDS];
  }

  const fields: string[] = [];
  let pos = 0;
  while (pos <= raw.length) {
    while (pos < raw.length && /[ \t]/.test(raw[pos])) pos++;

    let token: string;
    const quote = raw[pos];
    if (quote === '"' || quote === "'") {
      token = '';
      pos++;
      while (pos < raw.length) {
        if (raw[pos] === quote) {
          if (raw[pos + 1] === quote) {
            token += quote;
            pos += 2;
            continue;
          }
          pos++;
          break;
        }
        token += raw[pos];
        pos++;
      }
      // Anything between the closing quote and the next comma is kept
      const comma = raw.indexOf(',', pos);
      const end = comma === -1 ? raw.length : comma;
      token += raw.slice(pos, end);
      pos = end + 1;
    } else {
      const comma = raw.indexOf(',', pos);
      const end = comma === -1 ? raw.length : comma;
      token = raw.slice(pos, end);
      pos = end + 1;
    }

    const trimmed = token.trim();
    if (trimmed.length > 0) {
      fields.push(trimmed);
    }
  }
  return fields;
}

export function normalizeFieldName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export interface FieldResolution {
  resolved: string[];
  unknown: string[];
}

/**
 * Maps field tokens to field ids. Custom field ids and the standard fields
 * pass through; other tokens match field names case-insensitively. Without
 * field metadata every token passes through.
 */
export class JiraFieldResolver {
  private readonly byName = new Map<string, string>();

  constructor(private readonly fields: ApiResult<JiraField[]>) {
    if (fields.success) {
      for (const field of fields.data) {
        this.byName.set(normalizeFieldName(field.name.trimEnd()), field.id);
      }
    }
  }

  resolve(tokens: string[]): FieldResolution {
    if (!this.fields.success) {
      return { resolved: [...tokens], unknown: [] };
    }

    const resolved: string[] = [];
    const unknown: string[] = [];
    for (const token of tokens) {
      if (/^customfield_\d+$/.test(token) || PASS_THROUGH_FIELDS.has(token)) {
        resolved.push(token);
        continue;
      }
      const id = this.byName.get(normalizeFieldName(token));
      if (id === undefined) {
        unknown.push(token);
      } else {
        resolved.push(id);
      }
    }
    return { resolved, unknown };
  }
}

/**
 * Display names by field id, trailing whitespace removed
 */
export function fieldDisplayNames(fields: ApiResult<JiraField[]>): Map<string, string> {
  const names = new Map<string, string>();
  if (fields.success) {
    for (const field of fields.data) {
      names.set(field.id, field.name.trimEnd());
    }
  }
  return names;
}

function referenceLine(field: JiraField, present: boolean): string {
  const name = `"${field.name.trimEnd()}"`;
  const type = field.schema?.type ?? 'unknown';
  return `${field.id.padEnd(25)} = ${name.padEnd(30)} [${type}]${present ? ' (PRESENT IN RESULTS)' : ''}`;
}

/**
 * Human readable listing of the available fields, custom fields first.
 * Fields present on the first sample issue are flagged.
 */
export function fieldReference(fields: JiraField[], sampleIssues: JiraIssue[] = []): string[] {
  const present = new Set(Object.keys(sampleIssues[0]?.fields ?? {}));
  const lines = ['JIRA FIELD REFERENCE:', '=====================', 'Custom Fields:', '-------------'];

  for (const field of fields.filter(f => f.custom === true)) {
    lines.push(referenceLine(field, present.has(field.id)));
    if (field.description) {
      lines.push(`   Description: ${field.description}`);
    }
  }

  lines.push('', 'Standard Fields:', '---------------');
  for (const field of fields.filter(f => f.custom !== true)) {
    lines.push(referenceLine(field, present.has(field.id)));
  }

  lines.push(
    '',
    "USAGE EXAMPLE: jiraIssuesTable::['project = DEMO', fields='key,summary,status,customfield_10984']",
    '============='
  );
  return lines;
}
