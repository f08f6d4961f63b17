/**
 * Callouts: `~? … ?~` style sigil paragraphs and blockquotes become
 * info/note/warning macros.
 */

import { richTextBody, structuredMacro } from '../storageFormat.js';
import type { RewriteRule } from './types.js';

export type CalloutKind = 'info' | 'note' | 'warning';

const SIGIL_KINDS: Record<string, CalloutKind> = {
  '?': 'info',
  '!': 'note',
  '%': 'warning'
};

// Opening sigil at the start of a paragraph, matching closer at the end of the
// same or a later paragraph.
const SIGIL_REGEX = /<p>~([?!%])\s*([\s\S]*?)\s*\1~<\/p>/g;

// Blockquote without another blockquote inside it.
const INNERMOST_BLOCKQUOTE_REGEX = /<blockquote>((?:(?!<blockquote>)[\s\S])*?)<\/blockquote>/g;

const LABEL_REGEX = /^(?:<[^>]+>\s*)*(note|warning)\b/i;

export function callout(kind: CalloutKind, body: string): string {
  return structuredMacro(kind, {}, richTextBody(body));
}

export function convertSigils(html: string): string {
  return html.replace(SIGIL_REGEX, (_match, sigil: string, content: string) =>
    callout(SIGIL_KINDS[sigil], `<p>${content}</p>`)
  );
}

/**
 * Remove a leading `Note:`-style label, bare or wrapped in em/strong with the
 * colon inside or outside the tag. Without a colon the text is left alone.
 */
export function stripLabel(html: string, label: string): string {
  const stripped = html.replace(
    new RegExp(
      '^((?:<(?!em>|strong>)[^>]+>\\s*)*)' +
      `(?:<(em|strong)>\\s*${label}\\s*:\\s*<\\/\\2>|<(em|strong)>\\s*${label}\\s*<\\/\\3>\\s*:|${label}\\s*:)\\s*`,
      'i'
    ),
    (_match, leadingTags: string) => leadingTags
  );
  return capitalizeAfterFirstTag(stripped);
}

/**
 * Upper-case the first character after the first tag.
 */
export function capitalizeAfterFirstTag(html: string): string {
  return html.replace(/^(\s*<[^>]+>)([^<])/, (_match, tag: string, ch: string) => tag + ch.toUpperCase());
}

function convertBlockquote(inner: string): string {
  const body = inner.trim();
  const label = LABEL_REGEX.exec(body)?.[1];
  if (!label) {
    return callout('info', body);
  }
  const kind: CalloutKind = label.toLowerCase() === 'note' ? 'note' : 'warning';
  return callout(kind, stripLabel(body, label));
}

export function convertBlockquotes(html: string): string {
  let current = html;
  let previous: string;
  do {
    previous = current;
    current = current.replace(INNERMOST_BLOCKQUOTE_REGEX, (_match, inner: string) => convertBlockquote(inner));
  } while (current !== previous);
  return current;
}

export const admonitionsRule: RewriteRule = {
  name: 'admonitions',
  description: 'Converts sigil paragraphs and blockquotes into info, note and warning callouts',
  apply: (html) => convertBlockquotes(convertSigils(html))
};
