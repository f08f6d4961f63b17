/**
 * Index files: markdown files made only of `* [title](path)` lines.
 */

import { readFile } from 'fs/promises';
import type { IndexEntry } from '../models/entities.js';
import { InvalidIndexEntryError, PlanningError } from './errors.js';

const INDEX_ENTRY_REGEX = /^\* \[(.*)\]\((.*)\)/;

/**
 * Split file content into lines. A final newline does not open another line.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function parseIndexEntry(line: string, lineNumber: number): IndexEntry | null {
  const match = INDEX_ENTRY_REGEX.exec(line);
  if (!match) return null;
  return { title: match[1], path: match[2], line: lineNumber };
}

/**
 * True when every line is an index entry. Empty content qualifies.
 */
export function isIndexContent(content: string): boolean {
  return splitLines(content).every((line) => INDEX_ENTRY_REGEX.test(line));
}

/**
 * Parse all entries of an index, failing on the first line that is not one.
 */
export function parseIndexEntries(content: string, indexPath: string): IndexEntry[] {
  return splitLines(content).map((line, i) => {
    const entry = parseIndexEntry(line, i + 1);
    if (!entry) {
      throw new InvalidIndexEntryError(indexPath, i + 1, line);
    }
    return entry;
  });
}

export async function readMarkdownFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new PlanningError(`Failed to open file ${filePath}`, {
      path: filePath,
      error: error instanceof Error ? error.message : String(error)
    }, { cause: error });
  }
}

export async function isIndexFile(filePath: string): Promise<boolean> {
  return isIndexContent(await readMarkdownFile(filePath));
}
