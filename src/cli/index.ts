/**
 * Command line interface: md-wiki-import <spacekey> <folder> <command>
 */

import { Command } from 'commander';
import { CommandExecutor } from '../commands/executor.js';
import { loadConfig, type CLIOptions } from './configLoader.js';

export function createProgram(executor: CommandExecutor = new CommandExecutor()): Command {
  const program = new Command();

  program
    .name('md-wiki-import')
    .description('Import an exported markdown workspace into a Confluence space')
    .version('0.1.0')
    .argument('<spacekey>', 'Key of the destination space')
    .argument('<folder>', 'Workspace folder holding index.md')
    .argument('<command>', 'plan: build the plan folder; execute: create the planned pages')
    .option('-u, --username <username>', 'Confluence user; takes precedence over CONFLUENCE_USERNAME')
    .option('-p, --password <password>', 'Confluence password or API token; takes precedence over CONFLUENCE_PASSWORD')
    .option('-o, --orgname <orgname>', 'Cloud site name or host name; takes precedence over CONFLUENCE_ORGNAME')
    .option('-l, --loglevel <level>', 'Log level: debug, info, warning, error, critical; takes precedence over LOG_LEVEL')
    .option('-c, --config <file>', 'YAML configuration file (optional)')
    .option('--titles <source>', 'Title source for nested folders: filename or link')
    .option('--strip-export-id', 'Drop the export id suffix from page titles')
    .action(async (spaceKey: string, folder: string, command: string, options: CLIOptions) => {
      const config = await loadConfig(spaceKey, folder, command, options);
      await executor.execute({ config });
    });

  return program;
}

export async function run(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
