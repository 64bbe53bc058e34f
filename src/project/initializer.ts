import fs from 'fs-extra';
import * as path from 'path';
import { ConfigStore } from '../config/config.js';
import { HISTORY_FILE_NAME } from '../StatQuery.js';
import { ConfigError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { GitSnapshotter } from '../vcs/git.js';

const PROJECT_DIRECTORIES = ['data/raw', 'data/processed'];

const GITIGNORE = ['node_modules/', 'dist/', 'logs/', '.env', 'data/raw/', 'data/processed/', '*.tmp', '*.lock', ''].join('\n');

export interface InitializeOptions {
  git?: boolean;
  logger?: Logger;
}

/**
 * Create an analysis project: data folders, an empty history, default
 * settings and optionally a git repository. Returns the project directory.
 */
export async function initializeProject(name: string, parentDir: string, options: InitializeOptions = {}): Promise<string> {
  const logger = componentLogger(options.logger, 'project');
  if (!/^[\w][\w.-]*$/.test(name)) {
    throw new ConfigError(`Invalid project name: ${JSON.stringify(name)}`, 'name');
  }

  const projectDir = path.resolve(parentDir, name);
  if ((await fs.pathExists(projectDir)) && (await fs.readdir(projectDir)).length > 0) {
    throw new ConfigError(`Directory already exists and is not empty: ${projectDir}`, 'name');
  }

  for (const directory of PROJECT_DIRECTORIES) {
    await fs.ensureDir(path.join(projectDir, directory));
  }
  await fs.writeJson(path.join(projectDir, HISTORY_FILE_NAME), [], { spaces: 2 });
  await ConfigStore.inDirectory(projectDir, { logger: options.logger }).reset();

  if (options.git) {
    await fs.writeFile(path.join(projectDir, '.gitignore'), GITIGNORE, 'utf8');
    await new GitSnapshotter(projectDir, { logger: options.logger }).init();
  }

  logger.info('Project initialized', { projectDir });
  return projectDir;
}
