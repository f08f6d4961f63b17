/**
 * Footnotes: `[^n] … <a href="…">…</a>` definition lines (colon optional) are
 * removed and every `[^n]` marker becomes a superscript link to the
 * definition's href.
 */

import { FootnoteExtractionError } from '../../core/errors.js';
import type { RewriteRule } from './types.js';

// Definition at the start of the document, of a line, or of a paragraph.
// Without the colon a line only counts as a definition when it carries an href.
const DEFINITION_REGEX = /(^|\n|<p>)\[\^(\d+)\](:?)([^\n]*)/g;
const MARKER_REGEX = /\[\^(\d+)\]/g;
const HREF_REGEX = /href="([^"]*)"/;
const EMPTY_PARAGRAPH_REGEX = /<p>\s*<\/p>\n?/g;
const CDATA_REGEX = /<!\[CDATA\[[\s\S]*?\]\]>/g;

function extractCdataSections(html: string): { content: string; replacements: Map<string, string> } {
  const replacements = new Map<string, string>();
  let counter = 0;
  const content = html.replace(CDATA_REGEX, (match) => {
    const placeholder = `__FOOTNOTE_CDATA_${counter++}__`;
    replacements.set(placeholder, match);
    return placeholder;
  });
  return { content, replacements };
}

function restoreCdataSections(html: string, replacements: Map<string, string>): string {
  let restored = html;
  for (const [placeholder, original] of replacements) {
    restored = restored.replace(placeholder, () => original);
  }
  return restored;
}

export function footnoteLink(id: string, href: string): string {
  return `<a href="${href}"><sup>${id}</sup></a>`;
}

export function convertFootnotes(html: string): string {
  const { content, replacements } = extractCdataSections(html);
  const hrefs = new Map<string, string>();

  let processed = content.replace(DEFINITION_REGEX, (match, prefix: string, id: string, colon: string, rest: string) => {
    const closing = rest.endsWith('</p>') ? '</p>' : '';
    const definition = rest.slice(0, rest.length - closing.length);
    const href = HREF_REGEX.exec(definition)?.[1];
    if (href === undefined && !colon) {
      return match;
    }
    if (href === undefined) {
      throw new FootnoteExtractionError(id, definition.trim());
    }
    if (!hrefs.has(id)) {
      hrefs.set(id, href);
    }
    return (prefix === '<p>' ? prefix : '') + closing;
  });

  if (hrefs.size === 0) {
    return html;
  }

  processed = processed
    .replace(EMPTY_PARAGRAPH_REGEX, '')
    .replace(MARKER_REGEX, (marker, id: string) => {
      const href = hrefs.get(id);
      return href === undefined ? marker : footnoteLink(id, href);
    });

  return restoreCdataSections(processed, replacements);
}

export const footnotesRule: RewriteRule = {
  name: 'footnotes',
  description: 'Replaces footnote markers with superscript links and drops their definitions',
  apply: convertFootnotes
};
