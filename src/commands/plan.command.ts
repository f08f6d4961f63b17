/**
 * Plan command handler - mirrors the index hierarchy into the plan folder
 */

import { HierarchyPlanner } from '../core/hierarchyPlanner.js';
import { logger } from '../util/logger.js';
import type { CommandContext, CommandHandler } from './types.js';

export class PlanCommand implements CommandHandler {
  async execute({ config }: CommandContext): Promise<void> {
    logger.info('Planning import', { workspaceDir: config.workspaceDir, planDir: config.planDir });

    const planner = new HierarchyPlanner({
      workspaceDir: config.workspaceDir,
      planDir: config.planDir,
      naming: config.naming
    });
    const summary = await planner.plan();

    logger.info('Plan created', {
      planRoot: summary.planRoot,
      folders: summary.folders,
      files: summary.files
    });
  }
}
