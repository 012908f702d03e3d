/**
 * Jira Field Name Tests
 */

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import type { JiraField } from '../src/atlassian-client.js';
import { JiraFieldResolver, fieldDisplayNames, fieldReference, parseFieldList } from '../src/jira-fields.js';

const FIELDS: JiraField[] = [
  { id: 'customfield_10001', name: 'Story Points ', custom: true, description: 'Estimate', schema: { type: 'number' } },
  { id: 'summary', name: 'Summary', custom: false, schema: { type: 'string' } },
  { id: 'assignee', name: 'Assignee', custom: false }
];

describe('parseFieldList', () => {
  test('defaults to key, summary and status', () => {
    assert.deepEqual(parseFieldList(undefined), ['key', 'summary', 'status']);
    assert.deepEqual(parseFieldList('  '), ['key', 'summary', 'status']);
  });

  test('splits on commas and trims', () => {
    assert.deepEqual(parseFieldList('key, summary,Story Points'), ['key', 'summary', 'Story Points']);
  });

  test('quoted tokens keep commas and doubled quotes', () => {
    assert.deepEqual(parseFieldList(`"Team, Core",'It''s',status`), ['Team, Core', "It's", 'status']);
  });

  test('empty tokens are dropped', () => {
    assert.deepEqual(parseFieldList(',,key,'), ['key']);
  });
});

describe('JiraFieldResolver', () => {
  test('maps names to ids and reports the rest', () => {
    const resolver = new JiraFieldResolver({ success: true, data: FIELDS });
    assert.deepEqual(resolver.resolve(['key', 'story  POINTS', 'customfield_99', 'Assignee', 'Sprint']), {
      resolved: ['key', 'customfield_10001', 'customfield_99', 'assignee'],
      unknown: ['Sprint']
    });
  });

  test('without metadata every token passes through', () => {
    const resolver = new JiraFieldResolver({ success: false, error: 'offline' });
    assert.deepEqual(resolver.resolve(['Sprint', 'key']), { resolved: ['Sprint', 'key'], unknown: [] });
  });
});

describe('field metadata output', () => {
  test('display names drop trailing whitespace', () => {
    const names = fieldDisplayNames({ success: true, data: FIELDS });
    assert.equal(names.get('customfield_10001'), 'Story Points');
    assert.equal(names.get('assignee'), 'Assignee');
  });

  test('reference lists custom fields first and flags fields in the results', () => {
    const lines = fieldReference(FIELDS, [{ key: 'DEMO-1', fields: { summary: 'First' } }]);
    assert.deepEqual(lines, [
      'JIRA FIELD REFERENCE:',
      '=====================',
      'Custom Fields:',
      '-------------',
      `customfield_10001${' '.repeat(8)} = "Story Points"${' '.repeat(16)} [number]`,
      '   Description: Estimate',
      '',
      'Standard Fields:',
      '---------------',
      `summary${' '.repeat(18)} = "Summary"${' '.repeat(21)} [string] (PRESENT IN RESULTS)`,
      `assignee${' '.repeat(17)} = "Assignee"${' '.repeat(20)} [unknown]`,
      '',
      "USAGE EXAMPLE: jiraIssuesTable::['project = DEMO', fields='key,summary,status,customfield_10984']",
      '============='
    ]);
  });
});
