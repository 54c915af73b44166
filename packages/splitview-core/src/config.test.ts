import { test, expect, describe, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigManager } from './config';
import { ConfigurationError } from './error-boundary';

let testDir: string;
let configPath: string;

beforeEach(async () => {
  testDir = await mkdtemp(path.join(os.tmpdir(), 'splitview-config-'));
  configPath = path.join(testDir, 'nested', 'config.json');
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(testDir, { recursive: true, force: true });
});

test('default config browses assets with a 30% sidebar', () => {
  const config = ConfigManager.getDefaultConfig();

  expect(config.rootPath).toBe('assets');
  expect(config.sidebarWidth).toBe(30);
  expect(config.ignore).toEqual(['__pycache__']);
  expect(config.logging).toEqual({ enabled: true, level: 'debug', filePath: 'viewer_debug.log' });
});

test('config path lives under the home directory', () => {
  const home = process.env.HOME || process.env.USERPROFILE || '.';
  expect(ConfigManager.getConfigPath()).toBe(path.join(home, '.splitview', 'config.json'));
});

describe('load', () => {
  test('writes the defaults when no file exists', async () => {
    const config = await ConfigManager.load(configPath);

    expect(config).toEqual(ConfigManager.getDefaultConfig());
    const written = JSON.parse(await readFile(configPath, 'utf8'));
    expect(written).toEqual(ConfigManager.getDefaultConfig());
  });

  test('merges a partial file over the defaults', async () => {
    await ConfigManager.save(ConfigManager.getDefaultConfig(), configPath);
    await writeFile(configPath, JSON.stringify({ rootPath: 'entries', logging: { enabled: false } }));

    const config = await ConfigManager.load(configPath);

    expect(config.rootPath).toBe('entries');
    expect(config.title).toBe('Split Viewer');
    expect(config.logging).toEqual({ enabled: false, level: 'debug', filePath: 'viewer_debug.log' });
  });

  test('falls back to the defaults for an invalid file', async () => {
    await ConfigManager.save(ConfigManager.getDefaultConfig(), configPath);
    await writeFile(configPath, JSON.stringify({ sidebarWidth: 500 }));

    const config = await ConfigManager.load(configPath);

    expect(config.sidebarWidth).toBe(30);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('falls back to the defaults for malformed JSON', async () => {
    await ConfigManager.save(ConfigManager.getDefaultConfig(), configPath);
    await writeFile(configPath, '{ not json');

    expect(await ConfigManager.load(configPath)).toEqual(ConfigManager.getDefaultConfig());
  });
});

describe('parse', () => {
  test('rejects unknown keys', () => {
    expect(() => ConfigManager.parse({ colour: 'red' })).toThrow(ConfigurationError);
  });

  test('rejects values that are not objects', () => {
    expect(() => ConfigManager.parse([])).toThrow('Invalid configuration: expected a JSON object');
  });

  test('rejects an unknown log level', () => {
    expect(() => ConfigManager.parse({ logging: { level: 'trace' } })).toThrow(/Invalid configuration/);
  });
});

test('save refuses an invalid config', async () => {
  const config = { ...ConfigManager.getDefaultConfig(), sidebarWidth: 5 };
  await expect(ConfigManager.save(config, configPath)).rejects.toThrow(ConfigurationError);
});

test('get and set read and update a single key', async () => {
  await ConfigManager.set('title', 'Entries', configPath);

  expect(await ConfigManager.get('title', configPath)).toBe('Entries');
  expect(await ConfigManager.get('rootPath', configPath)).toBe('assets');
});
