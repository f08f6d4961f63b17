/**
 * Command registry - maps command names to handlers
 */

import { PlanCommand } from './plan.command.js';
import { ExecuteCommand } from './execute.command.js';
import type { Command, CommandHandler } from './types.js';

export class CommandRegistry {
  private handlers: Map<Command, CommandHandler>;

  constructor(handlers?: Partial<Record<Command, CommandHandler>>) {
    this.handlers = new Map<Command, CommandHandler>([
      ['plan', handlers?.plan ?? new PlanCommand()],
      ['execute', handlers?.execute ?? new ExecuteCommand()]
    ]);
  }

  getHandler(command: Command): CommandHandler | undefined {
    return this.handlers.get(command);
  }
}
