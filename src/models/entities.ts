// Core domain & DTO interfaces

import type { LogLevel } from '../util/logger.js';

export type ImportCommand = 'plan' | 'execute';

/**
 * Where plan folder and file names come from:
 * - `filename`: the basename of the referenced markdown file
 * - `link`: the display title of the index entry
 */
export type TitleSource = 'filename' | 'link';

export interface NamingOptions {
  titleSource: TitleSource;
  stripExportId: boolean; // also drop a trailing " 0a1b2c3d" export id from file names
}

export interface ImportConfig {
  spaceKey: string;
  workspaceDir: string; // exported workspace root, holds index.md
  planDir: string; // <workspaceDir>/plan
  command: ImportCommand;
  username: string;
  password: string;
  orgName: string;
  baseUrl: string; // e.g. https://your-org.atlassian.net/wiki
  logLevel: LogLevel;
  naming: NamingOptions;
}

// ============================================================================
// Planning
// ============================================================================

export interface IndexEntry {
  title: string;
  path: string; // as written in the index, relative to the workspace root
  line: number; // 1-based
}

export interface PlanSummary {
  planRoot: string;
  folders: string[]; // plan-relative, creation order
  files: string[]; // plan-relative, copy order
}

// ============================================================================
// Remote pages
// ============================================================================

export interface Space {
  id?: number | string;
  key: string;
  name?: string;
  homepage?: { id: string; title?: string };
  _expandable?: { homepage?: string };
}

export interface PageAncestorRef {
  id: string;
  title?: string;
}

export interface CreatePageInput {
  title: string;
  body: string; // Confluence storage format
  ancestorId: string;
  spaceKey: string;
}

/**
 * The slice of the wiki API the hierarchy builder depends on.
 */
export interface WikiPageApi {
  findPagesByTitle(title: string, spaceKey: string): Promise<string[]>;
  getAncestors(pageId: string): Promise<string[]>;
  createPage(input: CreatePageInput): Promise<string>;
}

export type RemotePageKind = 'container' | 'leaf';

export interface RemotePageRecord {
  path: string; // plan-relative
  title: string;
  pageId: string;
  ancestorId: string;
  kind: RemotePageKind;
  status: 'created' | 'reused';
}

export interface BuildReport {
  baseAncestorId: string;
  pages: RemotePageRecord[]; // visit order
  created: number;
  reused: number;
}
