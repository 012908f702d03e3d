/**
 * `jiraIssuesTable::['JQL', fields='key,summary', title='Open issues']`
 *
 * Queries Jira and inserts the results as a table. Every failure writes
 * the macro back as a paragraph so the document still converts.
 */

import { fieldDisplayNames, fieldReference, parseFieldList } from '../jira-fields.js';
import { renderIssuesTable } from '../jira-table.js';
import type { BlockMacro, BlockMacroResult, MacroAttributes } from '../macro-context.js';
import { hasApiCredentials } from '../settings.js';

const KNOWN_ATTRIBUTES = new Set(['jql', 'fields', 'title']);

export function unknownAttributes(attrs: MacroAttributes): string[] {
  return Object.keys(attrs).filter(key =>
    !KNOWN_ATTRIBUTES.has(key) && !key.startsWith('_') && !/^\d+$/.test(key)
  );
}

function invocation(jql: string, fields: string): BlockMacroResult {
  return { kind: 'paragraph', text: `jiraIssuesTable::['${jql}', fields='${fields}']` };
}

export const jiraIssuesTableMacro: BlockMacro = {
  name: 'jiraIssuesTable',
  positionalAttributes: ['jql'],

  process(target, attrs, env) {
    const jql = target.length > 0 ? target : (attrs.jql ?? attrs['1'] ?? '');
    const fieldsAttr = attrs.fields ?? '';

    const unknown = unknownAttributes(attrs);
    if (unknown.length > 0) {
      env.logger.warn(`Unknown attributes for jiraIssuesTable macro: ${unknown.join(', ')}`);
      return invocation(jql, 'INVALID ATTRIBUTES');
    }

    const credentials = env.context.credentials(env.attributes);
    if (!hasApiCredentials(credentials)) {
      env.logger.warn('Missing Jira API credentials for jiraIssuesTable macro.');
      return invocation(jql, fieldsAttr);
    }

    if (jql.length === 0) {
      env.logger.warn('Missing JQL query for jiraIssuesTable macro.');
      return invocation('', fieldsAttr);
    }

    const lookup = env.context.issuesTable(credentials, jql, parseFieldList(attrs.fields));
    if (lookup.state === 'pending') {
      return invocation(jql, fieldsAttr);
    }
    if (lookup.state === 'unavailable') {
      env.logger.warn(`Jira issues for '${jql}' could not be loaded: ${lookup.reason}`);
      return invocation(jql, fieldsAttr);
    }

    const { fields, resolution, issues } = lookup.value;
    if (resolution.unknown.length > 0) {
      if (fields.success) {
        env.context.printFieldReference(fieldReference(fields.data));
      } else {
        env.logger.warn(`Unable to fetch field metadata: ${fields.error}`);
      }
      const names = resolution.unknown.map(name => `"${name}"`).join(', ');
      env.logger.error(
        `Unknown Jira field name(s): ${names}. Use an exact field name as shown above or the custom field id (e.g. customfield_12345).`
      );
      return invocation(jql, fieldsAttr);
    }

    if (issues === undefined || !issues.success) {
      const reason = issues === undefined || issues.success ? 'Unknown error' : issues.error;
      env.logger.warn(`Jira API query failed or returned no issues: ${reason}`);
      return invocation(jql, fieldsAttr);
    }

    return {
      kind: 'content',
      source: renderIssuesTable(issues.data.issues, resolution.resolved, {
        jiraBaseUrl: credentials.jiraBaseUrl,
        fieldNames: fieldDisplayNames(fields),
        title: attrs.title
      })
    };
  }
};
