import type { NamingOptions } from '../models/entities.js';

const MARKDOWN_EXTENSION = '.md';
// Some exporters suffix every file name with a short hex id: "Release Notes 0a1b2c3d.md"
const EXPORT_ID_REGEX = /\s+[0-9a-f]{8}$/i;
const PATH_SEPARATOR_REGEX = /[\\/]/g;

export const DEFAULT_NAMING: NamingOptions = {
  titleSource: 'filename',
  stripExportId: false
};

/**
 * Remove exactly one trailing `.md`.
 */
export function stripMarkdownExtension(fileName: string): string {
  return fileName.endsWith(MARKDOWN_EXTENSION)
    ? fileName.slice(0, -MARKDOWN_EXTENSION.length)
    : fileName;
}

/**
 * Page title for a plan file: the file name without its extension and, when
 * enabled, without the exporter's id suffix.
 */
export function pageTitleFromFileName(fileName: string, opts: Pick<NamingOptions, 'stripExportId'> = DEFAULT_NAMING): string {
  const title = stripMarkdownExtension(fileName);
  if (!opts.stripExportId) return title;
  const stripped = title.replace(EXPORT_ID_REGEX, '');
  return stripped || title;
}

/**
 * Plan subfolder name for a nested index. Spaces become underscores.
 */
export function folderName(title: string, opts: Pick<NamingOptions, 'stripExportId'> = DEFAULT_NAMING): string {
  return pageTitleFromFileName(title, opts)
    .replace(PATH_SEPARATOR_REGEX, '_')
    .replace(/ /g, '_');
}

/**
 * File name a leaf gets inside the plan tree when titles come from index links.
 */
export function leafFileNameFromTitle(title: string): string {
  return `${title.trim().replace(PATH_SEPARATOR_REGEX, '_')}${MARKDOWN_EXTENSION}`;
}
