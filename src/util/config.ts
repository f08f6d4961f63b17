import path from 'path';
import { ConfigurationError } from '../core/errors.js';
import { PLAN_FOLDER } from '../core/hierarchyPlanner.js';
import type { ImportCommand, ImportConfig, TitleSource } from '../models/entities.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface RawEnv {
  CONFLUENCE_USERNAME?: string;
  CONFLUENCE_PASSWORD?: string;
  CONFLUENCE_ORGNAME?: string;
  LOG_LEVEL?: string;
}

export interface CliFlags {
  spaceKey: string;
  folder: string;
  command: string;
  username?: string;
  password?: string;
  orgname?: string;
  loglevel?: string;
  titles?: string;
  stripExportId?: boolean;
}

/** Settings accepted from a YAML config file */
export interface FileConfig {
  username?: string;
  password?: string;
  orgname?: string;
  loglevel?: string;
  titles?: string;
  stripExportId?: boolean;
}

const COMMANDS: readonly ImportCommand[] = ['plan', 'execute'];
const TITLE_SOURCES: readonly TitleSource[] = ['filename', 'link'];

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'error'
};

const WIKI_HOST = 'atlassian.net';

/**
 * An org name containing a dot is a host name; anything else is a cloud site.
 */
export function resolveBaseUrl(orgName: string): string {
  return orgName.includes('.')
    ? `https://${orgName}`
    : `https://${orgName}.${WIKI_HOST}/wiki`;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const lvl = (value || 'info').trim().toLowerCase();
  const resolved = LOG_LEVEL_ALIASES[lvl] ?? lvl;
  if (!isLogLevel(resolved)) {
    throw new ConfigurationError(`Invalid log level: ${value}`, { logLevel: value });
  }
  return resolved;
}

export function parseCommand(value: string): ImportCommand {
  const command = COMMANDS.find((c) => c === value.trim().toLowerCase());
  if (!command) {
    throw new ConfigurationError(`Invalid command ${value}. The command must be: ${COMMANDS.join(' or ')}`, { command: value });
  }
  return command;
}

export function parseTitleSource(value: string | undefined): TitleSource {
  const source = TITLE_SOURCES.find((s) => s === (value || 'filename').trim().toLowerCase());
  if (!source) {
    throw new ConfigurationError(`Invalid title source: ${value}. Use one of: ${TITLE_SOURCES.join(', ')}`, { titles: value });
  }
  return source;
}

function required(value: string | undefined, message: string, field: string): string {
  if (!value) {
    throw new ConfigurationError(message, { field });
  }
  return value;
}

/**
 * Merge flags, environment and config file (in that order of precedence)
 * into the one configuration value the run uses.
 */
export function buildConfig(env: RawEnv, flags: CliFlags, file: FileConfig = {}): ImportConfig {
  const command = parseCommand(flags.command);
  const spaceKey = required(flags.spaceKey?.trim(), 'Space key not specified', 'spaceKey');
  const username = required(
    flags.username || env.CONFLUENCE_USERNAME || file.username,
    'Username not specified by environment variable or option',
    'username'
  );
  const password = required(
    flags.password || env.CONFLUENCE_PASSWORD || file.password,
    'Password not specified by environment variable or option',
    'password'
  );
  const orgName = required(
    flags.orgname || env.CONFLUENCE_ORGNAME || file.orgname,
    'Org name not specified by environment variable or option',
    'orgname'
  );

  return {
    spaceKey,
    workspaceDir: flags.folder,
    planDir: path.join(flags.folder, PLAN_FOLDER),
    command,
    username,
    password,
    orgName,
    baseUrl: resolveBaseUrl(orgName),
    logLevel: parseLogLevel(flags.loglevel || env.LOG_LEVEL || file.loglevel),
    naming: {
      titleSource: parseTitleSource(flags.titles || file.titles),
      stripExportId: flags.stripExportId ?? file.stripExportId ?? false
    }
  };
}
