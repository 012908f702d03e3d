/**
 * Macro Registration
 *
 * Binds `InlineMacro` / `BlockMacro` definitions to an Asciidoctor.js
 * extension registry. The DSL objects Asciidoctor hands to the
 * registration callbacks are narrowed at runtime.
 */

import type { InlineHandler } from '@asciidoc-adf/document';
import { processor } from './adf-backend.js';
import { AsciidoctorNode, hasMethod, stringRecord } from './asciidoctor-node.js';
import type { BlockMacro, InlineMacro, MacroContext, MacroEnvironment } from './macro-context.js';
import { atlasMentionMacro } from './macros/atlas-mention.js';
import { jiraIssuesTableMacro } from './macros/jira-issues-table.js';
import { jiraLinkMacro } from './macros/jira-link.js';
import { workflowApprovalMacro, workflowChangeTableMacro, workflowMetadataMacro } from './macros/workflow.js';

export interface MacroSet {
  context: MacroContext;
  inline: InlineMacro[];
  block: BlockMacro[];
}

export const DEFAULT_INLINE_MACROS: readonly InlineMacro[] = [
  jiraLinkMacro,
  atlasMentionMacro,
  workflowMetadataMacro,
  workflowApprovalMacro,
  workflowChangeTableMacro
];

export const DEFAULT_BLOCK_MACROS: readonly BlockMacro[] = [jiraIssuesTableMacro];

export function defaultMacros(context: MacroContext): MacroSet {
  return { context, inline: [...DEFAULT_INLINE_MACROS], block: [...DEFAULT_BLOCK_MACROS] };
}

export type ExtensionRegistry = ReturnType<typeof processor.Extensions.create>;

function environment(parent: unknown, context: MacroContext, inline: InlineHandler): MacroEnvironment {
  const node = AsciidoctorNode.from(parent);
  return {
    context,
    inline,
    attributes: node === undefined ? {} : node.document.attributes(),
    logger: context.logger
  };
}

function declarePositional(dsl: object, names: string[] | undefined): void {
  if (names !== undefined && names.length > 0 && hasMethod(dsl, 'positionalAttributes')) {
    dsl.positionalAttributes(names);
  }
}

export function registerInlineMacro(
  registry: ExtensionRegistry,
  macro: InlineMacro,
  context: MacroContext,
  inline: InlineHandler
): void {
  registry.inlineMacro(macro.name, function (this: unknown) {
    const dsl = this;
    if (!hasMethod(dsl, 'process')) {
      throw new Error(`Cannot register inline macro ${macro.name}: unexpected extension DSL`);
    }
    declarePositional(dsl, macro.positionalAttributes);

    dsl.process((parent: unknown, target: unknown, attrs: unknown) => {
      const text = macro.process(
        typeof target === 'string' ? target : '',
        stringRecord(attrs),
        environment(parent, context, inline)
      );
      return hasMethod(dsl, 'createInline') ? dsl.createInline(parent, 'quoted', text) : text;
    });
  });
}

export function registerBlockMacro(
  registry: ExtensionRegistry,
  macro: BlockMacro,
  context: MacroContext,
  inline: InlineHandler
): void {
  registry.blockMacro(macro.name, function (this: unknown) {
    const dsl = this;
    if (!hasMethod(dsl, 'process') || !hasMethod(dsl, 'parseContent') || !hasMethod(dsl, 'createParagraph')) {
      throw new Error(`Cannot register block macro ${macro.name}: unexpected extension DSL`);
    }
    declarePositional(dsl, macro.positionalAttributes);

    dsl.process((parent: unknown, target: unknown, attrs: unknown) => {
      const result = macro.process(
        typeof target === 'string' ? target : '',
        stringRecord(attrs),
        environment(parent, context, inline)
      );
      switch (result.kind) {
        case 'content':
          // The parsed blocks are appended to parent; no block of our own
          dsl.parseContent(parent, result.source, {});
          return undefined;
        case 'paragraph':
          return dsl.createParagraph(parent, result.text, {});
      }
    });
  });
}

/**
 * Fresh extension registry with every macro of `macros` registered
 */
export function createRegistry(macros: MacroSet | undefined, inline: InlineHandler): ExtensionRegistry {
  const registry = processor.Extensions.create();
  if (macros !== undefined) {
    for (const macro of macros.inline) {
      registerInlineMacro(registry, macro, macros.context, inline);
    }
    for (const macro of macros.block) {
      registerBlockMacro(registry, macro, macros.context, inline);
    }
  }
  return registry;
}
