import { plainTextBody, structuredMacro } from '../storageFormat.js';
import type { RewriteRule } from './types.js';

const CODE_BLOCK_REGEX = /<pre><code([^>]*)>([\s\S]*?)<\/code><\/pre>/g;
const CLASS_ATTRIBUTE_REGEX = /\bclass="([^"]*)"/;
const LANGUAGE_CLASS_REGEX = /(?:^|\s)language-(\S+)/;

const ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  amp: '&'
};

export const CODE_THEME = 'Midnight';
export const DEFAULT_LANGUAGE = 'none';

/**
 * Decode the entities the markdown renderer escapes, in a single pass so
 * `&amp;lt;` becomes `&lt;` and not `<`.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(lt|gt|quot|amp);/g, (_match, name: string) => ENTITIES[name]);
}

export function languageFromAttributes(attributes: string): string {
  const classes = CLASS_ATTRIBUTE_REGEX.exec(attributes)?.[1] ?? '';
  return LANGUAGE_CLASS_REGEX.exec(classes)?.[1] ?? DEFAULT_LANGUAGE;
}

export function codeMacro(language: string, code: string): string {
  return structuredMacro(
    'code',
    { theme: CODE_THEME, linenumbers: 'true', language },
    plainTextBody(code)
  );
}

export function convertCodeBlocks(html: string): string {
  return html.replace(CODE_BLOCK_REGEX, (_match, attributes: string, content: string) => {
    const code = decodeHtmlEntities(content).replace(/\n$/, '');
    return codeMacro(languageFromAttributes(attributes), code);
  });
}

export const codeBlocksRule: RewriteRule = {
  name: 'code-blocks',
  description: 'Converts pre/code blocks into the code macro',
  apply: convertCodeBlocks
};
