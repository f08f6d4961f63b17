/**
 * Remote hierarchy builder: walks the plan folder and makes sure a Confluence
 * page exists for every folder (empty container) and every markdown file.
 */

import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import path from 'path';
import type {
  BuildReport,
  NamingOptions,
  RemotePageKind,
  RemotePageRecord,
  WikiPageApi
} from '../models/entities.js';
import type { ContentTransformer } from '../transform/contentTransformer.js';
import { logger, type Logger } from '../util/logger.js';
import { PlanningError } from './errors.js';
import { pageTitleFromFileName } from '../util/naming.js';

export interface BuilderOptions {
  spaceKey: string;
  naming: Pick<NamingOptions, 'stripExportId'>;
}

interface PageRequest {
  path: string;
  title: string;
  body: string;
  ancestorId: string;
  kind: RemotePageKind;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Page id a plan folder's entries hang from: the base id at the plan root,
 * otherwise the page recorded for that folder.
 */
export function resolveAncestorId(
  records: ReadonlyMap<string, RemotePageRecord>,
  relativeDir: string,
  baseAncestorId: string
): string {
  if (!relativeDir) {
    return baseAncestorId;
  }
  const parent = records.get(relativeDir);
  if (!parent) {
    throw new PlanningError(`No page recorded for plan folder ${relativeDir}`, { relativeDir });
  }
  return parent.pageId;
}

export class RemoteHierarchyBuilder {
  // Container pages by plan-relative folder path
  private records = new Map<string, RemotePageRecord>();
  private visited: RemotePageRecord[] = [];
  private baseAncestorId = '';
  private readonly log: Logger;

  constructor(
    private readonly api: WikiPageApi,
    private readonly transformer: ContentTransformer,
    private readonly options: BuilderOptions
  ) {
    this.log = logger.child({ phase: 'execute', spaceKey: options.spaceKey });
  }

  async build(planRoot: string, baseAncestorId: string): Promise<BuildReport> {
    this.records = new Map();
    this.visited = [];
    this.baseAncestorId = baseAncestorId;

    this.log.info('Building page hierarchy', { planRoot, baseAncestorId });
    await this.visitDirectory(planRoot, '');

    const created = this.visited.filter((page) => page.status === 'created').length;
    return {
      baseAncestorId,
      pages: this.visited,
      created,
      reused: this.visited.length - created
    };
  }

  /**
   * Subfolders first, then files, each in name order. A folder's page is
   * recorded before anything below it is visited.
   */
  private async visitDirectory(absoluteDir: string, relativeDir: string): Promise<void> {
    const entries = (await readdir(absoluteDir, { withFileTypes: true }))
      .filter((entry) => !entry.name.startsWith('.'))
      .sort(byName);
    const ancestorId = resolveAncestorId(this.records, relativeDir, this.baseAncestorId);

    for (const entry of entries.filter((e) => e.isDirectory())) {
      const relativePath = path.join(relativeDir, entry.name);
      const record = await this.ensurePage({
        path: relativePath,
        title: entry.name,
        body: '',
        ancestorId,
        kind: 'container'
      });
      this.records.set(relativePath, record);
      await this.visitDirectory(path.join(absoluteDir, entry.name), relativePath);
    }

    for (const entry of entries.filter((e) => e.isFile())) {
      const relativePath = path.join(relativeDir, entry.name);
      const body = await this.transformer.transformFile(path.join(absoluteDir, entry.name));
      await this.ensurePage({
        path: relativePath,
        title: pageTitleFromFileName(entry.name, this.options.naming),
        body,
        ancestorId,
        kind: 'leaf'
      });
    }
  }

  private async ensurePage(request: PageRequest): Promise<RemotePageRecord> {
    const { spaceKey } = this.options;
    const existingId = await this.findChildPage(request.title, request.ancestorId);

    let record: RemotePageRecord;
    if (existingId) {
      this.log.info('Page already exists', { title: request.title, id: existingId, ancestorId: request.ancestorId });
      record = { ...this.recordFields(request), pageId: existingId, status: 'reused' };
    } else {
      this.log.info('Creating page', { title: request.title, kind: request.kind, ancestorId: request.ancestorId });
      const pageId = await this.api.createPage({
        title: request.title,
        body: request.body,
        ancestorId: request.ancestorId,
        spaceKey
      });
      record = { ...this.recordFields(request), pageId, status: 'created' };
    }

    this.visited.push(record);
    return record;
  }

  private recordFields(request: PageRequest): Pick<RemotePageRecord, 'path' | 'title' | 'ancestorId' | 'kind'> {
    return { path: request.path, title: request.title, ancestorId: request.ancestorId, kind: request.kind };
  }

  /**
   * First page with this title whose direct parent is `ancestorId`
   */
  private async findChildPage(title: string, ancestorId: string): Promise<string | undefined> {
    const candidates = await this.api.findPagesByTitle(title, this.options.spaceKey);
    for (const candidateId of candidates) {
      const ancestors = await this.api.getAncestors(candidateId);
      if (ancestors[ancestors.length - 1] === ancestorId) {
        return candidateId;
      }
    }
    return undefined;
  }
}
