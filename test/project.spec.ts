import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import { initializeProject } from '../src/project/initializer.js';
import { GitSnapshotter } from '../src/vcs/git.js';
import { DEFAULT_CONFIG } from '../src/config/config.js';
import { ConfigError, SnapshotError } from '../src/utils/errors.js';
import { makeTempDir } from './helpers.js';

describe('initializeProject', () => {
  let parent: string;

  beforeEach(async () => {
    parent = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(parent);
  });

  it('lays out a project', async () => {
    const projectDir = await initializeProject('survey', parent, { git: false });

    expect(projectDir).toBe(path.join(parent, 'survey'));
    expect((await fs.readdir(projectDir)).sort()).toEqual(['.statquery.json', 'data', 'history.json']);
    expect((await fs.readdir(path.join(projectDir, 'data'))).sort()).toEqual(['processed', 'raw']);
    expect(await fs.readJson(path.join(projectDir, 'history.json'))).toEqual([]);
    expect(await fs.readJson(path.join(projectDir, '.statquery.json'))).toEqual(DEFAULT_CONFIG);
  });

  it('refuses bad names and occupied directories', async () => {
    await expect(initializeProject('two words', parent)).rejects.toBeInstanceOf(ConfigError);

    await fs.outputFile(path.join(parent, 'taken', 'notes.txt'), 'x');
    await expect(initializeProject('taken', parent)).rejects.toThrow(/not empty/);
  });
});

describe('GitSnapshotter', () => {
  const missing = new GitSnapshotter(process.cwd(), { git: path.join('/nonexistent', 'git-binary') });

  it('is not a repository when git cannot run', async () => {
    expect(await missing.isRepository()).toBe(false);
  });

  it('reports the failing step', async () => {
    await expect(missing.init()).rejects.toMatchObject({ name: 'SnapshotError', step: 'init' });
    await expect(missing.snapshot('Analysis: mean of A')).rejects.toBeInstanceOf(SnapshotError);
    await expect(missing.snapshot('Analysis: mean of A')).rejects.toMatchObject({ step: 'add' });
  });
});
