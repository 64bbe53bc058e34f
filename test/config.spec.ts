import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import { CONFIG_FILE_NAME, ConfigStore, DEFAULT_CONFIG, parseConfigValue } from '../src/config/config.js';
import { ConfigError } from '../src/utils/errors.js';
import { makeTempDir } from './helpers.js';

describe('ConfigStore', () => {
  let dir: string;
  let store: ConfigStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = ConfigStore.inDirectory(dir);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('writes defaults when the file is missing', async () => {
    expect(await store.get()).toEqual({ output_format: 'text', auto_commit: true, save_history: true, timeout_ms: 10_000 });
    expect(await fs.readJson(path.join(dir, CONFIG_FILE_NAME))).toEqual(DEFAULT_CONFIG);
  });

  it('treats an empty object as missing', async () => {
    await fs.writeJson(store.filePath, {});
    expect(await store.get()).toEqual(DEFAULT_CONFIG);
  });

  it('updates one key and validates it', async () => {
    expect((await store.set('timeout_ms', 500)).timeout_ms).toBe(500);
    expect((await store.get()).timeout_ms).toBe(500);

    await expect(store.set('timeout_ms', 5)).rejects.toMatchObject({ name: 'ConfigError', field: 'timeout_ms' });
    await expect(store.set('output_format', 'yaml')).rejects.toBeInstanceOf(ConfigError);
  });

  it('keeps keys it does not know', async () => {
    await store.set('theme', 'dark');
    expect(await fs.readJson(store.filePath)).toEqual({ ...DEFAULT_CONFIG, theme: 'dark' });
  });

  it('refuses unreadable files', async () => {
    await fs.writeFile(store.filePath, '{ not json', 'utf8');
    await expect(store.get()).rejects.toThrow(/not valid JSON/);

    await fs.writeJson(store.filePath, [1, 2]);
    await expect(store.get()).rejects.toThrow(/must hold a JSON object/);
  });

  it('resets to defaults', async () => {
    await store.set('auto_commit', false);
    expect(await store.reset()).toEqual(DEFAULT_CONFIG);
    expect((await store.get()).auto_commit).toBe(true);
  });
});

describe('parseConfigValue', () => {
  it('reads typed values', () => {
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue('false')).toBe(false);
    expect(parseConfigValue('null')).toBeNull();
    expect(parseConfigValue('2500')).toBe(2500);
    expect(parseConfigValue('[1, 2]')).toEqual([1, 2]);
    expect(parseConfigValue('json')).toBe('json');
    expect(parseConfigValue('{broken')).toBe('{broken');
  });
});
