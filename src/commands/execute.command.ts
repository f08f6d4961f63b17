/**
 * Execute command handler - creates the planned pages in the wiki space
 */

import { stat } from 'fs/promises';
import { ConfluenceApi } from '../confluence/api.js';
import { MissingPlanError } from '../core/errors.js';
import { RemoteHierarchyBuilder } from '../core/hierarchyBuilder.js';
import type { ImportConfig, WikiPageApi } from '../models/entities.js';
import { ContentTransformer } from '../transform/contentTransformer.js';
import { logger } from '../util/logger.js';
import type { CommandContext, CommandHandler } from './types.js';

export type WikiApiFactory = (config: ImportConfig) => WikiPageApi & {
  getSpaceHomepageId(spaceKey: string): Promise<string>;
};

const defaultApiFactory: WikiApiFactory = (config) => new ConfluenceApi({
  baseUrl: config.baseUrl,
  username: config.username,
  password: config.password
});

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export class ExecuteCommand implements CommandHandler {
  constructor(
    private readonly createApi: WikiApiFactory = defaultApiFactory,
    private readonly transformer: ContentTransformer = new ContentTransformer()
  ) {}

  async execute({ config }: CommandContext): Promise<void> {
    if (!(await isDirectory(config.planDir))) {
      throw new MissingPlanError(config.planDir);
    }

    const api = this.createApi(config);
    const homepageId = await api.getSpaceHomepageId(config.spaceKey);
    logger.info('Importing into space', { spaceKey: config.spaceKey, homepageId });

    const builder = new RemoteHierarchyBuilder(api, this.transformer, {
      spaceKey: config.spaceKey,
      naming: config.naming
    });
    const report = await builder.build(config.planDir, homepageId);

    logger.info('Import finished', {
      pages: report.pages.length,
      created: report.created,
      reused: report.reused
    });
  }
}
