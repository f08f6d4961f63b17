import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdir, readdir, readFile } from 'fs/promises';
import path from 'path';
import {
  CyclicIndexError,
  InvalidIndexEntryError,
  MissingIndexError,
  PlanExistsError,
  PlanningError,
  UnresolvedReferenceError
} from '../../src/core/errors';
import { HierarchyPlanner } from '../../src/core/hierarchyPlanner';
import type { NamingOptions } from '../../src/models/entities';
import { createWorkspace, removeWorkspace } from '../fixtures/workspace';

const FILENAME_TITLES: NamingOptions = { titleSource: 'filename', stripExportId: false };
const LINK_TITLES: NamingOptions = { titleSource: 'link', stripExportId: false };

describe('Integration: planning a workspace', () => {
  let workspace: string | undefined;

  const planner = (dir: string, naming: NamingOptions = FILENAME_TITLES) =>
    new HierarchyPlanner({ workspaceDir: dir, planDir: path.join(dir, 'plan'), naming });

  async function setup(files: Record<string, string>): Promise<string> {
    workspace = await createWorkspace(files);
    return workspace;
  }

  beforeEach(() => {
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    if (workspace) {
      await removeWorkspace(workspace);
      workspace = undefined;
    }
  });

  it('mirrors nested indexes as folders named after the index file', async () => {
    const dir = await setup({
      'index.md': '* [Getting Started](Getting%20Started.md)\n* [Guides](Guides.md)\n',
      'Getting Started.md': '# Getting Started\n\nWelcome.\n',
      'Guides.md': '* [Install](Guides/Install.md)\n',
      'Guides/Install.md': 'Run the installer.\n'
    });

    const summary = await planner(dir).plan();

    expect(summary).toEqual({
      planRoot: path.join(dir, 'plan'),
      folders: ['Guides'],
      files: ['Getting Started.md', path.join('Guides', 'Install.md')]
    });
    await expect(readFile(path.join(dir, 'plan', 'Guides', 'Install.md'), 'utf-8')).resolves.toBe('Run the installer.\n');
    expect((await readdir(path.join(dir, 'plan'))).sort()).toEqual(['Getting Started.md', 'Guides']);
  });

  it('names folders and files after link titles', async () => {
    const dir = await setup({
      'index.md': '* [A](a.md)\n* [B](sub/index.md)\n',
      'a.md': 'alpha\n',
      'sub/index.md': '* [C](sub/c.md)\n',
      'sub/c.md': 'gamma\n'
    });

    const summary = await planner(dir, LINK_TITLES).plan();

    expect(summary.folders).toEqual(['B']);
    expect(summary.files).toEqual(['A.md', path.join('B', 'C.md')]);
    await expect(readFile(path.join(dir, 'plan', 'B', 'C.md'), 'utf-8')).resolves.toBe('gamma\n');
  });

  it('treats a file with one non-entry line as a leaf', async () => {
    const dir = await setup({
      'index.md': '* [Mixed](mixed.md)\n',
      'mixed.md': '* [X](x.md)\nSome text\n'
    });

    const summary = await planner(dir).plan();

    expect(summary.files).toEqual(['mixed.md']);
    expect(summary.folders).toEqual([]);
  });

  it('resolves references written with backslash escapes', async () => {
    const dir = await setup({
      'index.md': '* [Notes](Notes\\_v2.md)\n',
      'Notes_v2.md': 'notes\n'
    });

    await expect(planner(dir).plan()).resolves.toMatchObject({ files: ['Notes_v2.md'] });
  });

  it('plans nothing for an empty index', async () => {
    const dir = await setup({ 'index.md': '' });

    await expect(planner(dir).plan()).resolves.toEqual({ planRoot: path.join(dir, 'plan'), folders: [], files: [] });
  });

  it('requires the root index', async () => {
    const dir = await setup({ 'readme.md': 'hello\n' });

    await expect(planner(dir).plan()).rejects.toBeInstanceOf(MissingIndexError);
  });

  it('refuses to overwrite an earlier plan', async () => {
    const dir = await setup({ 'index.md': '* [A](a.md)\n', 'a.md': 'alpha\n' });
    await mkdir(path.join(dir, 'plan'));

    await expect(planner(dir).plan()).rejects.toBeInstanceOf(PlanExistsError);
  });

  it('fails on a root index line that is not an entry', async () => {
    const dir = await setup({ 'index.md': '* [A](a.md)\nintro text\n', 'a.md': 'alpha\n' });

    await expect(planner(dir).plan()).rejects.toMatchObject({ line: 2, text: 'intro text' });
    await expect(planner(dir).plan()).rejects.toBeInstanceOf(PlanExistsError);
  });

  it('reports the root index error type', async () => {
    const dir = await setup({ 'index.md': 'intro text\n' });

    await expect(planner(dir).plan()).rejects.toBeInstanceOf(InvalidIndexEntryError);
  });

  it('fails on a missing reference', async () => {
    const dir = await setup({ 'index.md': '* [Gone](missing.md)\n' });

    await expect(planner(dir).plan()).rejects.toBeInstanceOf(UnresolvedReferenceError);
  });

  it('detects index cycles', async () => {
    const dir = await setup({
      'index.md': '* [Loop](loop.md)\n',
      'loop.md': '* [Back](index.md)\n'
    });

    let caught: unknown;
    try {
      await planner(dir).plan();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CyclicIndexError);
    expect(caught).toMatchObject({ chain: ['index.md', 'loop.md', 'index.md'] });
  });

  it('never overwrites a planned file', async () => {
    const dir = await setup({ 'index.md': '* [A](a.md)\n* [Again](a.md)\n', 'a.md': 'alpha\n' });

    let caught: unknown;
    try {
      await planner(dir).plan();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PlanningError);
    expect(caught).toMatchObject({ message: `Failed to copy ${path.join(dir, 'a.md')} into the plan` });
  });
});
