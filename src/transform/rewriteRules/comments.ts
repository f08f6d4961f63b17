import type { RewriteRule } from './types.js';

const COMMENT_REGEX = /<!--([\s\S]*?)-->/g;

/**
 * HTML comments become placeholders, which the editor shows collapsed and
 * readers never see.
 */
export function convertComments(html: string): string {
  return html.replace(COMMENT_REGEX, (_match, content: string) => `<ac:placeholder>${content}</ac:placeholder>`);
}

export const commentsRule: RewriteRule = {
  name: 'comments',
  description: 'Turns HTML comments into hidden placeholders',
  apply: convertComments
};
