/**
 * Command-related type definitions
 */

import type { ImportCommand, ImportConfig } from '../models/entities.js';

export type Command = ImportCommand;

export interface CommandContext {
  config: ImportConfig;
}

export interface CommandHandler {
  execute(context: CommandContext): Promise<void>;
}
