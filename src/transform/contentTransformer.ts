/**
 * Markdown to Confluence storage format.
 *
 * The markdown is rendered once with markdown-it (tables and fenced code are
 * part of its default preset), then each rewrite rule runs in order over the
 * resulting HTML.
 */

import { readFile } from 'fs/promises';
import MarkdownIt from 'markdown-it';
import { ImportError } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { DEFAULT_REWRITE_RULES, type RewriteRule } from './rewriteRules/index.js';

export class ContentTransformer {
  private readonly md: MarkdownIt;

  constructor(private readonly rules: readonly RewriteRule[] = DEFAULT_REWRITE_RULES) {
    // Raw HTML must survive rendering: comments and doctoc markers are rewritten later
    this.md = new MarkdownIt({
      html: true,
      linkify: false,
      breaks: false
    });
  }

  render(markdown: string): string {
    return this.md.render(markdown);
  }

  transform(markdown: string): string {
    let html = this.render(markdown);
    for (const rule of this.rules) {
      html = rule.apply(html);
    }
    return html;
  }

  async transformFile(filePath: string): Promise<string> {
    const markdown = await readFile(filePath, 'utf-8');
    try {
      const html = this.transform(markdown);
      logger.debug('Transformed markdown file', { file: filePath, htmlLength: html.length });
      return html;
    } catch (error) {
      if (error instanceof ImportError) {
        error.context.file = filePath;
      }
      throw error;
    }
  }
}
