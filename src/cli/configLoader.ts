/**
 * Configuration loading for the CLI: flags, environment, `.env` and an
 * optional YAML file.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { ConfigError, IOError } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { buildConfig, parseFileConfig, type CliFlags, type Doc2MdConfig, type FileConfig, type RawEnv } from '../util/config.js';

export const DEFAULT_CONFIG_FILE = '.doc2md.yaml';

export type CLIOptions = {
  verbose: number;
  format: boolean;
  config?: string;
  logFormat?: string;
};

export interface LoadContext {
  cwd?: string;
  /** Defaults to `process.env` after `.env` has been applied. */
  env?: NodeJS.ProcessEnv;
}

function loadEnvironment(env: NodeJS.ProcessEnv): RawEnv {
  return {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_FORMAT: env.LOG_FORMAT,
    DOC2MD_CODE_FONTS: env.DOC2MD_CODE_FONTS,
  };
}

/**
 * Reads the configuration file named by `--config`, or the default file in
 * the working directory when it exists. An explicit path that is missing is
 * an error; a missing default is not.
 */
export async function loadConfigFile(configPath: string | undefined, cwd: string): Promise<FileConfig> {
  const explicit = configPath !== undefined;
  const path = explicit ? resolve(cwd, configPath) : join(cwd, DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicit) throw new ConfigError(`Config file not found: ${path}`);
    return {};
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(path, 'read', error);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`${path}: invalid YAML: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }

  logger.debug('Loaded config file', { path });
  return parseFileConfig(raw, path);
}

/**
 * Resolves the settings of one run from the parsed command line.
 */
export async function loadConfig(
  inputPath: string,
  outputPath: string,
  options: CLIOptions,
  context: LoadContext = {}
): Promise<Doc2MdConfig> {
  const cwd = context.cwd ?? process.cwd();
  if (context.env === undefined) {
    loadDotenv({ path: join(cwd, '.env') });
  }
  const env = loadEnvironment(context.env ?? process.env);

  const flags: CliFlags = {
    inputPath: resolve(cwd, inputPath),
    outputPath: resolve(cwd, outputPath),
    verbose: options.verbose,
    format: options.format,
    logFormat: options.logFormat,
  };

  const fileConfig = await loadConfigFile(options.config, cwd);
  return buildConfig(env, flags, fileConfig);
}
