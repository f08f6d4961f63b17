/**
 * Hierarchy planner: turns the workspace's nested index files into the plan
 * folder, one subfolder per nested index and one copy per leaf document.
 */

import { constants } from 'fs';
import { copyFile, mkdir, stat } from 'fs/promises';
import path from 'path';
import type { IndexEntry, NamingOptions, PlanSummary } from '../models/entities.js';
import { logger } from '../util/logger.js';
import { folderName, leafFileNameFromTitle } from '../util/naming.js';
import {
  CyclicIndexError,
  MissingIndexError,
  PlanExistsError,
  PlanningError,
  UnresolvedReferenceError
} from './errors.js';
import { isIndexFile, parseIndexEntries, readMarkdownFile } from './indexFile.js';

export const ROOT_INDEX_FILE = 'index.md';
export const PLAN_FOLDER = 'plan';

export interface PlannerOptions {
  workspaceDir: string;
  planDir: string;
  naming: NamingOptions;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

function decodePercentEscapes(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export class HierarchyPlanner {
  private readonly log = logger.child({ phase: 'plan' });

  constructor(private readonly options: PlannerOptions) {}

  async plan(): Promise<PlanSummary> {
    const { workspaceDir, planDir } = this.options;
    const indexPath = path.join(workspaceDir, ROOT_INDEX_FILE);

    await this.checkRequirements(indexPath);

    this.log.info('Creating plan folder', { planDir });
    await mkdir(planDir, { recursive: true });

    const summary: PlanSummary = { planRoot: planDir, folders: [], files: [] };
    await this.processIndex(indexPath, '', [], summary);
    return summary;
  }

  /**
   * The root index must exist and no earlier plan may be present.
   */
  async checkRequirements(indexPath: string): Promise<void> {
    if (!(await isFile(indexPath))) {
      throw new MissingIndexError(indexPath);
    }
    this.log.info('Workspace index file found', { indexPath });

    if (await pathExists(this.options.planDir)) {
      throw new PlanExistsError(this.options.planDir);
    }
  }

  private async processIndex(
    indexPath: string,
    subpath: string,
    chain: string[],
    summary: PlanSummary
  ): Promise<void> {
    const resolvedIndex = path.resolve(indexPath);
    if (chain.includes(resolvedIndex)) {
      throw new CyclicIndexError([...chain, resolvedIndex].map((p) => this.relativeToWorkspace(p)));
    }
    const nextChain = [...chain, resolvedIndex];

    this.log.info('Processing index file', { index: this.relativeToWorkspace(indexPath) });

    if (subpath) {
      await this.createSubfolder(subpath);
      summary.folders.push(subpath);
    }

    const entries = parseIndexEntries(await readMarkdownFile(indexPath), indexPath);

    for (const entry of entries) {
      const mdFile = await this.resolveReference(entry, indexPath);
      this.log.debug('Markdown file found', { file: mdFile, line: entry.line });

      if (await isIndexFile(mdFile)) {
        const childSubpath = path.join(subpath, this.subfolderName(entry, mdFile));
        await this.processIndex(mdFile, childSubpath, nextChain, summary);
      } else {
        summary.files.push(await this.copyLeaf(entry, mdFile, subpath));
      }
    }
  }

  /**
   * Try the literal path, then without backslash escapes, then percent-decoded.
   */
  private async resolveReference(entry: IndexEntry, indexPath: string): Promise<string> {
    const unescaped = entry.path.replace(/\\/g, '');
    const candidates = [...new Set([entry.path, unescaped, decodePercentEscapes(unescaped)])]
      .map((candidate) => path.join(this.options.workspaceDir, candidate));

    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        return candidate;
      }
    }
    throw new UnresolvedReferenceError(entry.path, candidates, indexPath);
  }

  private subfolderName(entry: IndexEntry, mdFile: string): string {
    const { naming } = this.options;
    const source = this.usesLinkTitle(entry) ? entry.title : path.basename(mdFile);
    return folderName(source, naming);
  }

  // Blank link titles fall back to the file name
  private usesLinkTitle(entry: IndexEntry): boolean {
    return this.options.naming.titleSource === 'link' && entry.title.trim() !== '';
  }

  private async createSubfolder(subpath: string): Promise<void> {
    const target = path.join(this.options.planDir, subpath);
    this.log.info('Creating subfolder', { subpath });
    try {
      await mkdir(target);
    } catch (error) {
      throw new PlanningError(`Failed to create plan folder ${subpath}`, {
        path: target,
        error: error instanceof Error ? error.message : String(error)
      }, { cause: error });
    }
  }

  private async copyLeaf(entry: IndexEntry, mdFile: string, subpath: string): Promise<string> {
    const fileName = this.usesLinkTitle(entry)
      ? leafFileNameFromTitle(entry.title)
      : path.basename(mdFile);
    const relative = path.join(subpath, fileName);
    const dest = path.join(this.options.planDir, relative);

    this.log.info('Copying markdown file', { from: this.relativeToWorkspace(mdFile), to: relative });
    try {
      await copyFile(mdFile, dest, constants.COPYFILE_EXCL);
    } catch (error) {
      throw new PlanningError(`Failed to copy ${mdFile} into the plan`, {
        from: mdFile,
        to: dest,
        error: error instanceof Error ? error.message : String(error)
      }, { cause: error });
    }
    return relative;
  }

  private relativeToWorkspace(filePath: string): string {
    return path.relative(this.options.workspaceDir, filePath) || filePath;
  }
}
