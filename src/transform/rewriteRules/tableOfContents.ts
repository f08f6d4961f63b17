import { structuredMacro } from '../storageFormat.js';
import type { RewriteRule } from './types.js';

// From the comment carrying "START doctoc" through the comment carrying "END doctoc".
const DOCTOC_REGEX = /<!--\s*START doctoc[\s\S]*?END doctoc[\s\S]*?-->/g;

export const TOC_MACRO = structuredMacro('toc', {
  printable: 'true',
  style: 'disc',
  maxLevel: '7',
  minLevel: '1',
  type: 'list',
  outline: 'clear',
  include: '.*'
});

export function convertDoctoc(html: string): string {
  return html.replace(DOCTOC_REGEX, () => TOC_MACRO);
}

export const tableOfContentsRule: RewriteRule = {
  name: 'table-of-contents',
  description: 'Replaces a generated doctoc block with the toc macro',
  apply: convertDoctoc
};
