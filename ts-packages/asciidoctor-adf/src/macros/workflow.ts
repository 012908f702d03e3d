/**
 * Confluence workflow app macros
 *
 * - `appfoxWorkflowMetadata:<keyword>[]`: inline metadata value
 * - `workflowApproval:<all|latest>[]`: approvers table
 * - `workflowChangeTable:all[]`: document control table
 */

import { CONFLUENCE_MACRO_EXTENSION, extension, type AdfNode } from '@asciidoc-adf/document';
import type { InlineMacro } from '../macro-context.js';

export const WORKFLOW_ICON_URL = 'https://ac-cloud.com/workflows/images/logo.png';

const SCHEMA_VERSION = { value: '1' };
const PLACEHOLDER = [{ type: 'icon', data: { url: WORKFLOW_ICON_URL } }];

export const METADATA_KEYWORDS: Record<string, string> = {
  approvers: 'Approvers for Current Status',
  versiondesc: 'Current Official Version Description',
  version: 'Current Official Version',
  expiry: 'Expiry Date',
  transition: 'Transition Date',
  pageid: 'Unique Page ID',
  status: 'Workflow Status'
};

const LATEST_APPROVALS = 'Latest Approvals for Current Workflow';

export function workflowMetadataNode(text: string): AdfNode {
  return {
    type: 'inlineExtension',
    attrs: {
      extensionType: CONFLUENCE_MACRO_EXTENSION,
      extensionKey: 'metadata-macro',
      parameters: {
        macroParams: { data: { value: text } },
        macroMetadata: {
          schemaVersion: SCHEMA_VERSION,
          indexedMacroParams: { text, type: 'text' },
          placeholder: PLACEHOLDER,
          title: 'Workflows Metadata'
        }
      }
    }
  };
}

export function workflowApproversNode(option: 'all' | 'latest'): AdfNode {
  const macroMetadata: Record<string, unknown> = {
    schemaVersion: SCHEMA_VERSION,
    placeholder: PLACEHOLDER,
    title: 'Workflows Approvers Metadata'
  };
  let macroParams = {};
  if (option === 'latest') {
    macroParams = { data: { value: LATEST_APPROVALS } };
    macroMetadata.indexedMacroParams = { text: LATEST_APPROVALS, type: 'text' };
  }
  return extension(CONFLUENCE_MACRO_EXTENSION, 'approvers-macro', {
    layout: 'default',
    parameters: { macroParams, macroMetadata }
  });
}

export function workflowChangeTableNode(): AdfNode {
  return extension(CONFLUENCE_MACRO_EXTENSION, 'document-control-table-macro', {
    layout: 'default',
    parameters: {
      macroParams: {},
      macroMetadata: {
        schemaVersion: SCHEMA_VERSION,
        placeholder: PLACEHOLDER,
        title: 'Workflows Document Control Table'
      }
    }
  });
}

export const workflowMetadataMacro: InlineMacro = {
  name: 'appfoxWorkflowMetadata',

  process(target, _attrs, env) {
    const text = METADATA_KEYWORDS[target.toLowerCase()];
    if (text === undefined) {
      env.logger.warn(`Unknown appfoxWorkflowMetadata keyword: ${target}`);
      return `appfoxWorkflowMetadata:${target}[]`;
    }
    return env.inline.embedNode(workflowMetadataNode(text));
  }
};

export const workflowApprovalMacro: InlineMacro = {
  name: 'workflowApproval',

  process(target, _attrs, env) {
    const option = target.toLowerCase();
    if (option !== 'all' && option !== 'latest') {
      env.logger.warn(`Unknown workflowApproval option: ${target}`);
      return `workflowApproval:${target}[]`;
    }
    return env.inline.embedNode(workflowApproversNode(option));
  }
};

export const workflowChangeTableMacro: InlineMacro = {
  name: 'workflowChangeTable',

  process(_target, _attrs, env) {
    return env.inline.embedNode(workflowChangeTableNode());
  }
};
