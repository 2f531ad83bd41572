/**
 * Session Insights Configuration
 * Resolves the data directory, database path and session log location.
 *
 * Precedence: CLI flag > environment > <dataDir>/config.json > defaults
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import chalk from 'chalk';
import type { ConfigOverrides, InsightsFileConfig, ResolvedConfig } from '../types/index.js';
import {
  CONFIG_FILENAME,
  DEFAULT_DATA_DIR_NAME,
  DEFAULT_DB_FILENAME,
  LOCAL_USER_ID,
  WEEKS_TO_COMPUTE_DEFAULT,
} from './constants.js';
import { validateWeeks } from './validation.js';

export const ENV_DATA_DIR = 'SESSION_INSIGHTS_DATA_DIR';
export const ENV_PROJECTS_DIR = 'SESSION_INSIGHTS_PROJECTS_DIR';

export interface ConfigEnvironment {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export function getDefaultDataDir(homeDir: string = homedir()): string {
  return join(homeDir, DEFAULT_DATA_DIR_NAME);
}

export function getDefaultProjectsDir(homeDir: string = homedir()): string {
  return join(homeDir, '.amplifier', 'projects');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load <dataDir>/config.json
 * A missing file yields {}; an unreadable or malformed one is reported and ignored.
 */
export function loadConfigFile(dataDir: string): InsightsFileConfig {
  const configPath = join(dataDir, CONFIG_FILENAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    console.error(chalk.yellow(`Ignoring unreadable config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`));
    return {};
  }

  if (!isRecord(parsed)) {
    console.error(chalk.yellow(`Ignoring config file ${configPath}: expected a JSON object`));
    return {};
  }

  const config: InsightsFileConfig = {};
  if (typeof parsed.projectsDir === 'string') config.projectsDir = parsed.projectsDir;
  if (typeof parsed.userId === 'string' && parsed.userId.trim().length > 0) config.userId = parsed.userId.trim();
  if (typeof parsed.weeksToCompute === 'number') config.weeksToCompute = parsed.weeksToCompute;
  return config;
}

/**
 * Save <dataDir>/config.json
 */
export function saveConfigFile(dataDir: string, config: InsightsFileConfig): void {
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true, mode: 0o700 });
  }
  writeFileSync(join(dataDir, CONFIG_FILENAME), JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Merge overrides, environment, config file and defaults into one config
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  environment: ConfigEnvironment = {}
): ResolvedConfig {
  const env = environment.env ?? process.env;
  const homeDir = environment.homeDir ?? homedir();

  const dataDir = resolve(overrides.dataDir || env[ENV_DATA_DIR] || getDefaultDataDir(homeDir));
  const fileConfig = loadConfigFile(dataDir);

  const projectsDir = resolve(
    overrides.projectsDir || env[ENV_PROJECTS_DIR] || fileConfig.projectsDir || getDefaultProjectsDir(homeDir)
  );

  const weeksToCompute = validateWeeks(
    overrides.weeksToCompute ?? fileConfig.weeksToCompute ?? WEEKS_TO_COMPUTE_DEFAULT
  );

  return {
    dataDir,
    dbFilename: DEFAULT_DB_FILENAME,
    dbPath: join(dataDir, DEFAULT_DB_FILENAME),
    projectsDir,
    weeksToCompute,
    userId: fileConfig.userId ?? LOCAL_USER_ID,
  };
}
