/**
 * `atlasMention:First_Last[]` mentions a Confluence user found by full
 * name. Without credentials, or when nobody matches, the name is written
 * as plain `@First Last`.
 */

import { mention } from '@asciidoc-adf/document';
import type { InlineMacro } from '../macro-context.js';
import { hasApiCredentials } from '../settings.js';

export const atlasMentionMacro: InlineMacro = {
  name: 'atlasMention',
  positionalAttributes: ['text'],

  process(target, _attrs, env) {
    const name = target.replace(/_/g, ' ');
    const plain = `@${name}`;

    const credentials = env.context.credentials(env.attributes);
    if (!hasApiCredentials(credentials)) {
      env.logger.warn('Missing Confluence API credentials for atlasMention macro.');
      return plain;
    }

    const lookup = env.context.findUser(credentials, name);
    switch (lookup.state) {
      case 'ready':
        return lookup.value === undefined
          ? plain
          : env.inline.embedNode(mention(lookup.value.id, `@${lookup.value.displayName}`));
      case 'pending':
        return plain;
      case 'unavailable':
        env.logger.warn(`Could not look up Confluence user "${name}": ${lookup.reason}`);
        return plain;
    }
  }
};
