import { admonitionsRule } from './admonitions.js';
import { codeBlocksRule } from './codeBlocks.js';
import { commentsRule } from './comments.js';
import { footnotesRule } from './footnotes.js';
import { tableOfContentsRule } from './tableOfContents.js';
import type { RewriteRule } from './types.js';

export type { RewriteRule } from './types.js';

/**
 * Rules in the order they run. The table of contents has to be matched before
 * comments turn its markers into placeholders.
 */
export const DEFAULT_REWRITE_RULES: readonly RewriteRule[] = [
  admonitionsRule,
  tableOfContentsRule,
  commentsRule,
  codeBlocksRule,
  footnotesRule
];
