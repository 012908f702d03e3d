/**
 * Jira Issues Table
 *
 * Renders query results as AsciiDoc table source, which the block macro
 * then parses into the document. Values are formatted per field: issue
 * keys link to the issue, statuses carry their category, option objects
 * show their label and rich text fields (ADF documents) become AsciiDoc
 * cells.
 */

import { AdfToAsciidocConverter, AdfNodeSchema } from '@asciidoc-adf/document';
import type { JiraIssue } from './atlassian-client.js';

const COLUMN_WIDTHS: Record<string, string> = {
  key: '1',
  summary: '2',
  description: '3'
};

const LABEL_KEYS = ['value', 'name', 'displayName'] as const;

export interface IssuesTableOptions {
  jiraBaseUrl: string;
  /** Display names of custom fields by id */
  fieldNames?: Map<string, string>;
  title?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function escapePipes(value: string): string {
  return value.replace(/\|/g, '\\|');
}

/** `split` without the trailing empty strings */
function splitLines(text: string, separator: RegExp): string[] {
  const lines = text.split(separator);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Convert Jira wiki links (`[url|text]`, `[url]`) to AsciiDoc link macros
 */
export function convertWikiLinks(content: string): string {
  const labelled = content.replace(/\[(https?:\/\/[^\]]+?)\|([^\]|]+?)(?:\|[^\]]+?)?\]/g, (match: string) => {
    const [url, text] = match.slice(1, -1).split('|');
    return text === undefined ? match : `link:${url}[${text}]`;
  });
  return labelled.replace(/\[(https?:\/\/[^\]|]+)\]/g, (_match: string, url: string) => `link:${url}[${url}]`);
}

/**
 * Lists need a blank line before them unless they follow another item
 */
export function ensureBlankLineBeforeLists(text: string): string {
  const out: string[] = [];
  let previousNonBlank: string | undefined;
  for (const line of splitLines(text, /\n/)) {
    if (line.startsWith('* ')
      && previousNonBlank !== undefined
      && !previousNonBlank.startsWith('* ')
      && (out[out.length - 1] ?? '') !== '') {
      out.push('');
    }
    out.push(line);
    if (line.trim().length > 0) {
      previousNonBlank = line;
    }
  }
  return out.join('\n');
}

function formatMultiline(content: string): string {
  const processed: string[] = [];
  for (const line of splitLines(content, /\r?\n/)) {
    if (/^[ \t]*\*[ \t]+/.test(line)) {
      const previous = [...processed].reverse().find(l => l.trim().length > 0);
      if (previous !== undefined && !previous.startsWith('* ')) {
        processed.push('');
      }
      processed.push(line.replace(/^[ \t]*\*/, '*').replace(/\*[ ]+/, '* '));
    } else {
      processed.push(line);
    }
  }
  return ensureBlankLineBeforeLists(processed.join('\n'));
}

export function formatStatus(value: unknown): string {
  if (!isRecord(value)) {
    return value === undefined || value === null ? '' : String(value);
  }
  const name = typeof value.name === 'string' ? value.name : undefined;
  const category = isRecord(value.statusCategory) && typeof value.statusCategory.name === 'string'
    ? value.statusCategory.name
    : undefined;
  if (category !== undefined) {
    return `${name ?? ''} (${category})`;
  }
  return name ?? JSON.stringify(value);
}

export class IssueFieldFormatter {
  private readonly reverse = new AdfToAsciidocConverter();

  /**
   * Cell source for one field value: either inline text or a block cell
   * starting with `a|`
   */
  format(value: unknown): string {
    if (Array.isArray(value)) {
      return this.formatArray(value);
    }
    if (isRecord(value)) {
      if (value.type === 'doc') {
        return this.formatDocument(value);
      }
      return labelOf(value);
    }
    if (typeof value === 'string') {
      return this.formatString(value);
    }
    return value === undefined || value === null ? '' : String(value);
  }

  private formatArray(values: unknown[]): string {
    const [first] = values;
    if (first === undefined) {
      return '';
    }
    if (isRecord(first)) {
      const key = LABEL_KEYS.find(k => k in first);
      return values
        .map(item => (key !== undefined && isRecord(item) ? stringify(item[key]) : stringify(item)))
        .join(', ');
    }
    return values.map(stringify).join(', ');
  }

  private formatDocument(value: Record<string, unknown>): string {
    const parsed = AdfNodeSchema.safeParse(value);
    if (!parsed.success) {
      return JSON.stringify(value);
    }
    const converted = this.reverse.convert(parsed.data).replace(/^\n+/, '').replace(/\n+$/, '');
    return `a|\n${ensureBlankLineBeforeLists(converted)}`;
  }

  private formatString(content: string): string {
    if (content.length === 0) {
      return '';
    }
    const linked = convertWikiLinks(content);
    if (linked.includes('\n') || /^[ \t]*[*-][ \t]+/m.test(linked)) {
      return `a|\n${formatMultiline(linked)}`;
    }
    return linked.replace(/[\r\n]+/g, ' ');
  }
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function labelOf(value: Record<string, unknown>): string {
  const key = LABEL_KEYS.find(k => k in value);
  return key === undefined ? JSON.stringify(value) : stringify(value[key]);
}

function headerFor(field: string, fieldNames: Map<string, string>): string {
  if (field.startsWith('customfield_')) {
    return fieldNames.get(field) ?? capitalize(field);
  }
  return capitalize(field);
}

function renderCell(value: string): string {
  // Block cells start at the beginning of a line
  if (value.startsWith('a|')) {
    return value.endsWith('\n') ? value : `${value}\n`;
  }
  return `| ${escapePipes(value)}\n`;
}

/**
 * AsciiDoc source of the issues table, with the optional bold title above it
 */
export function renderIssuesTable(
  issues: JiraIssue[],
  fields: string[],
  options: IssuesTableOptions,
  formatter: IssueFieldFormatter = new IssueFieldFormatter()
): string {
  const fieldNames = options.fieldNames ?? new Map<string, string>();
  const cols = fields.map(field => COLUMN_WIDTHS[field] ?? '1').join(',');

  let table = `[cols="${cols}", options="header,autowidth"]\n|===\n`;
  table += `| ${fields.map(field => headerFor(field, fieldNames)).join(' | ')}\n`;

  for (const issue of issues) {
    for (const field of fields) {
      const value = issue.fields[field];
      switch (field) {
        case 'key':
          table += renderCell(`link:${options.jiraBaseUrl}/browse/${issue.key}[${issue.key}]`);
          break;
        case 'status':
          table += renderCell(formatStatus(value));
          break;
        default:
          table += renderCell(formatter.format(value));
      }
    }
  }
  table += '|===\n';

  if (options.title !== undefined) {
    return `**${options.title}**\n\n${table}`;
  }
  return table;
}
