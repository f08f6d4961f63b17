/**
 * Configuration loader and validation for the CLI
 */

import { config as loadDotenv } from 'dotenv';
import { readFile, stat } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import type { ImportConfig } from '../models/entities.js';
import { buildConfig, type FileConfig, type RawEnv } from '../util/config.js';
import { logger } from '../util/logger.js';

export interface CLIOptions {
  username?: string;
  password?: string;
  orgname?: string;
  loglevel?: string;
  config?: string;
  titles?: string;
  stripExportId?: boolean;
}

/**
 * Loads environment variables, `.env` included
 */
export function loadEnvironment(): RawEnv {
  loadDotenv();
  return {
    CONFLUENCE_USERNAME: process.env.CONFLUENCE_USERNAME,
    CONFLUENCE_PASSWORD: process.env.CONFLUENCE_PASSWORD,
    CONFLUENCE_ORGNAME: process.env.CONFLUENCE_ORGNAME,
    LOG_LEVEL: process.env.LOG_LEVEL,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(data: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Config file setting "${key}" must be a string`, { configPath, key });
  }
  return value;
}

function optionalBoolean(data: Record<string, unknown>, key: string, configPath: string): boolean | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Config file setting "${key}" must be a boolean`, { configPath, key });
  }
  return value;
}

/**
 * Loads the optional YAML configuration file
 */
export async function loadConfigFile(configPath?: string): Promise<FileConfig> {
  if (!configPath) {
    return {};
  }

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Config file cannot be read: ${configPath}`, {
      configPath,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid YAML: ${configPath}`, {
      configPath,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw new ConfigurationError(`Config file must contain a mapping: ${configPath}`, { configPath });
  }

  return {
    username: optionalString(data, 'username', configPath),
    password: optionalString(data, 'password', configPath),
    orgname: optionalString(data, 'orgname', configPath),
    loglevel: optionalString(data, 'loglevel', configPath),
    titles: optionalString(data, 'titles', configPath),
    stripExportId: optionalBoolean(data, 'stripExportId', configPath)
  };
}

/**
 * The workspace folder must exist and be a directory
 */
export async function validateWorkspace(folder: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(folder)).isDirectory();
  } catch {
    throw new ConfigurationError(`Path ${folder} does not exist`, { folder });
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Path ${folder} is not a folder`, { folder });
  }
}

/**
 * Loads and validates configuration from positional arguments, CLI options,
 * environment and the optional config file
 */
export async function loadConfig(
  spaceKey: string,
  folder: string,
  command: string,
  options: CLIOptions,
  env: RawEnv = loadEnvironment()
): Promise<ImportConfig> {
  const fileConfig = await loadConfigFile(options.config);

  const config = buildConfig(env, {
    spaceKey,
    folder,
    command,
    username: options.username,
    password: options.password,
    orgname: options.orgname,
    loglevel: options.loglevel,
    titles: options.titles,
    stripExportId: options.stripExportId,
  }, fileConfig);

  await validateWorkspace(config.workspaceDir);

  logger.setLevel(config.logLevel);
  logger.debug('Configuration loaded', {
    spaceKey: config.spaceKey,
    workspaceDir: config.workspaceDir,
    command: config.command,
    baseUrl: config.baseUrl,
    naming: config.naming,
  });

  return config;
}
