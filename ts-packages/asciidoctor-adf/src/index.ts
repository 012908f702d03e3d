/**
 * @asciidoc-adf/asciidoctor
 *
 * AsciiDoc to Atlassian Document Format on top of Asciidoctor.js, with
 * Jira, Confluence and workflow macros.
 */

export { convertAsciidoc, convertAsciidocSync, MAX_PASSES } from './convert.js';
export type { ConvertOptions } from './convert.js';

export { AsciidoctorParser } from './asciidoctor-parser.js';
export type { AsciidoctorParserOptions } from './asciidoctor-parser.js';
export { AdfBackend, BACKEND_NAME, installBackend } from './adf-backend.js';
export { BlockReader } from './block-reader.js';
export { readInline } from './inline-reader.js';

export {
  DEFAULT_BLOCK_MACROS,
  DEFAULT_INLINE_MACROS,
  createRegistry,
  defaultMacros,
  registerBlockMacro,
  registerInlineMacro
} from './extensions.js';
export type { MacroSet } from './extensions.js';

export { MacroContext, OFFLINE_REASON } from './macro-context.js';
export type {
  BlockMacro,
  BlockMacroResult,
  ClientFactory,
  InlineMacro,
  IssuesTableData,
  Lookup,
  LookupMode,
  MacroAttributes,
  MacroContextOptions,
  MacroEnvironment
} from './macro-context.js';

export { jiraLinkMacro } from './macros/jira-link.js';
export { atlasMentionMacro } from './macros/atlas-mention.js';
export { jiraIssuesTableMacro, unknownAttributes } from './macros/jira-issues-table.js';
export {
  METADATA_KEYWORDS,
  WORKFLOW_ICON_URL,
  workflowApprovalMacro,
  workflowApproversNode,
  workflowChangeTableMacro,
  workflowChangeTableNode,
  workflowMetadataMacro,
  workflowMetadataNode
} from './macros/workflow.js';

export { HttpAtlassianClient, JiraFieldSchema, JiraIssueSchema } from './atlassian-client.js';
export type {
  ApiResult,
  AtlassianClient,
  AtlassianUser,
  HttpAtlassianClientOptions,
  IssueSearchResult,
  JiraField,
  JiraIssue
} from './atlassian-client.js';

export { SettingsResolver, hasApiCredentials } from './settings.js';
export type {
  AtlassianCredentials,
  AtlassianSettings,
  CompleteCredentials,
  SettingName,
  SettingsResolverOptions
} from './settings.js';

export {
  DEFAULT_ISSUE_FIELDS,
  JiraFieldResolver,
  fieldDisplayNames,
  fieldReference,
  normalizeFieldName,
  parseFieldList
} from './jira-fields.js';
export type { FieldResolution } from './jira-fields.js';
export {
  IssueFieldFormatter,
  convertWikiLinks,
  ensureBlankLineBeforeLists,
  formatStatus,
  renderIssuesTable
} from './jira-table.js';
export type { IssuesTableOptions } from './jira-table.js';
export { fetchImageDimensions } from './remote-images.js';
