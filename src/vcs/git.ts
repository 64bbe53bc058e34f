import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { SnapshotError, errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Called after a successful turn. Returns false when there was nothing to snapshot. */
export interface SnapshotHook {
  snapshot(message: string): Promise<boolean>;
}

export interface GitSnapshotterOptions {
  /** Binary to run; defaults to `git` on PATH. */
  git?: string;
  logger?: Logger;
}

function outputOf(error: unknown): string {
  if (typeof error !== 'object' || error === null) return '';
  const parts: string[] = [];
  if ('stdout' in error && typeof error.stdout === 'string') parts.push(error.stdout);
  if ('stderr' in error && typeof error.stderr === 'string') parts.push(error.stderr);
  return parts.join('\n');
}

export class GitSnapshotter implements SnapshotHook {
  private readonly git: string;
  private readonly logger: Logger;

  constructor(
    readonly cwd: string,
    options: GitSnapshotterOptions = {},
  ) {
    this.git = options.git ?? 'git';
    this.logger = componentLogger(options.logger, 'git');
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.git, args, { cwd: this.cwd, encoding: 'utf8', maxBuffer: 1024 * 1024 });
    return stdout;
  }

  async isRepository(): Promise<boolean> {
    try {
      return (await this.run(['rev-parse', '--is-inside-work-tree'])).trim() === 'true';
    } catch {
      return false;
    }
  }

  async init(): Promise<void> {
    try {
      await this.run(['init']);
      this.logger.info('Initialized git repository', { cwd: this.cwd });
    } catch (error) {
      throw new SnapshotError(`git init failed: ${errorMessage(error)}`, 'init');
    }
  }

  async snapshot(message: string): Promise<boolean> {
    try {
      await this.run(['add', '-A']);
    } catch (error) {
      throw new SnapshotError(`git add failed: ${errorMessage(error)}`, 'add');
    }

    try {
      await this.run(['commit', '-m', message]);
    } catch (error) {
      if (/nothing to commit|no changes added/i.test(outputOf(error))) {
        this.logger.debug('Nothing to commit', { cwd: this.cwd });
        return false;
      }
      throw new SnapshotError(`git commit failed: ${errorMessage(error)}`, 'commit');
    }

    this.logger.info('Committed changes', { message });
    return true;
  }
}
