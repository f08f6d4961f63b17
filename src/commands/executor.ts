/**
 * Command executor - runs the handler for the configured command
 */

import { logger } from '../util/logger.js';
import { CommandRegistry } from './registry.js';
import type { CommandContext } from './types.js';

export class CommandExecutor {
  constructor(private readonly registry: CommandRegistry = new CommandRegistry()) {}

  async execute(context: CommandContext): Promise<void> {
    const { command } = context.config;
    const handler = this.registry.getHandler(command);
    if (!handler) {
      throw new Error(`No handler found for command: ${command}`);
    }

    const started = Date.now();
    await handler.execute(context);
    logger.info('Command completed', { command, durationMs: Date.now() - started });
  }
}
