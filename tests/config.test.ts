import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, promises as fs, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { ValidationError } from '../src/types/index.js';
import {
  ENV_DATA_DIR,
  ENV_PROJECTS_DIR,
  loadConfigFile,
  resolveConfig,
  saveConfigFile,
} from '../src/utils/config.js';
import { makeTempDir } from './helpers.js';

describe('config', () => {
  let homeDir: string;

  beforeEach(() => {
    homeDir = makeTempDir('insights-config');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  it('resolves defaults under the home directory', () => {
    const config = resolveConfig({}, { env: {}, homeDir });

    expect(config).toEqual({
      dataDir: join(homeDir, '.session-insights'),
      dbFilename: 'metrics.db',
      dbPath: join(homeDir, '.session-insights', 'metrics.db'),
      projectsDir: join(homeDir, '.amplifier', 'projects'),
      weeksToCompute: 4,
      userId: 'local',
    });
  });

  it('reads projectsDir, weeks and userId from config.json', () => {
    const dataDir = join(homeDir, '.session-insights');
    mkdirSync(dataDir, { recursive: true });
    writeFileSync(join(dataDir, 'config.json'), JSON.stringify({
      projectsDir: join(homeDir, 'logs'),
      weeksToCompute: 8,
      userId: '  dev-user  ',
    }));

    const config = resolveConfig({}, { env: {}, homeDir });

    expect(config.projectsDir).toBe(join(homeDir, 'logs'));
    expect(config.weeksToCompute).toBe(8);
    expect(config.userId).toBe('dev-user');
  });

  it('applies flag > env > file precedence', () => {
    const envDataDir = join(homeDir, 'env-data');
    mkdirSync(envDataDir, { recursive: true });
    writeFileSync(join(envDataDir, 'config.json'), JSON.stringify({ projectsDir: join(homeDir, 'file-projects') }));

    const env = {
      [ENV_DATA_DIR]: envDataDir,
      [ENV_PROJECTS_DIR]: join(homeDir, 'env-projects'),
    };

    const fromEnv = resolveConfig({}, { env, homeDir });
    expect(fromEnv.dataDir).toBe(envDataDir);
    expect(fromEnv.projectsDir).toBe(join(homeDir, 'env-projects'));

    const fromFlags = resolveConfig(
      { projectsDir: join(homeDir, 'flag-projects'), weeksToCompute: 2 },
      { env, homeDir }
    );
    expect(fromFlags.projectsDir).toBe(join(homeDir, 'flag-projects'));
    expect(fromFlags.weeksToCompute).toBe(2);
  });

  it('rejects an out-of-range weeksToCompute from the file', () => {
    const dataDir = join(homeDir, '.session-insights');
    mkdirSync(dataDir, { recursive: true });
    writeFileSync(join(dataDir, 'config.json'), JSON.stringify({ weeksToCompute: 99 }));

    expect(() => resolveConfig({}, { env: {}, homeDir })).toThrow(ValidationError);
  });

  it('ignores a malformed config file with a warning', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(homeDir, 'config.json'), '{ not json');

    expect(loadConfigFile(homeDir)).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('ignores a config file that is not an object', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(join(homeDir, 'config.json'), '[1, 2]');

    expect(loadConfigFile(homeDir)).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('round-trips a saved config', () => {
    const dataDir = join(homeDir, 'fresh');
    saveConfigFile(dataDir, { userId: 'dev-user', weeksToCompute: 6 });

    expect(existsSync(join(dataDir, 'config.json'))).toBe(true);
    expect(JSON.parse(readFileSync(join(dataDir, 'config.json'), 'utf-8'))).toEqual({ userId: 'dev-user', weeksToCompute: 6 });
    expect(loadConfigFile(dataDir)).toEqual({ userId: 'dev-user', weeksToCompute: 6 });
  });
});
