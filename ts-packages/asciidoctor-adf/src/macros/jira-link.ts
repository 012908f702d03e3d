/**
 * `jira:KEY[text]` links to a Jira issue
 */

import type { InlineMacro } from '../macro-context.js';

export const jiraLinkMacro: InlineMacro = {
  name: 'jira',
  positionalAttributes: ['text'],

  process(target, attrs, env) {
    const text = attrs.text ?? attrs['1'];
    const baseUrl = env.context.credentials(env.attributes).jiraBaseUrl;

    if (baseUrl === undefined) {
      env.logger.warn('No Jira base URL found, the Jira extension may not work as expected.');
      return `jira:${target}[${text ?? ''}]`;
    }

    return env.inline.convertInline({
      kind: 'inline_anchor',
      type: 'link',
      target: `${baseUrl}/browse/${target}`,
      text: text !== undefined && text.length > 0 ? text : target
    });
  }
};
