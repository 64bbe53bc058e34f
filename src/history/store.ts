import fs from 'fs-extra';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { HistoryEntry, NewHistoryEntry } from '../ir/types.js';
import { jsonValueSchema } from '../ir/json.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';

/** Append-only turn log. Sequence numbers start at 1 and never repeat. */
export interface HistoryRepository {
  read(): Promise<HistoryEntry[]>;
  append(entry: NewHistoryEntry): Promise<HistoryEntry>;
  bulkAppend(entries: readonly NewHistoryEntry[]): Promise<HistoryEntry[]>;
  count(): Promise<number>;
}

const violationSchema = z.object({ ruleId: z.string(), offendingToken: z.string(), message: z.string() });

const outcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success'), value: jsonValueSchema, stdout: z.string().optional() }),
  z.object({ status: z.literal('timeout'), timeoutMs: z.number() }),
  z.object({ status: z.literal('runtime-failure'), kind: z.string(), message: z.string() }),
  z.object({ status: z.literal('rejected'), violations: z.array(violationSchema) }),
]);

// Entries written before sequence/outcome/generator/session existed carry only
// query, code, timestamp and context.
const entrySchema = z.object({
  sequence: z.number().int().positive().optional(),
  query: z.string(),
  code: z.string(),
  timestamp: z.string(),
  context: z.record(jsonValueSchema),
  outcome: outcomeSchema.optional(),
  generator: z.object({ name: z.string(), version: z.string(), seed: z.number().optional() }).optional(),
  session: z.string().optional(),
});

const LOCK_OPTIONS = {
  realpath: false,
  stale: 10_000,
  retries: { retries: 10, minTimeout: 20, maxTimeout: 500 },
};

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function stamp(entries: readonly NewHistoryEntry[], persisted: number): HistoryEntry[] {
  return entries.map((entry, index) => ({ sequence: persisted + index + 1, ...entry }));
}

/**
 * History kept in one JSON array file. Every write rewrites the file through
 * a temporary sibling and a rename, under an in-process queue and a
 * cross-process lock.
 */
export class HistoryStore implements HistoryRepository {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    options: { logger?: Logger } = {},
  ) {
    this.logger = componentLogger(options.logger, 'history');
  }

  async read(): Promise<HistoryEntry[]> {
    return this.toEntries(await this.readRaw());
  }

  async count(): Promise<number> {
    return (await this.readRaw()).length;
  }

  async append(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const [stored] = await this.bulkAppend([entry]);
    return stored;
  }

  bulkAppend(entries: readonly NewHistoryEntry[]): Promise<HistoryEntry[]> {
    if (entries.length === 0) return Promise.resolve([]);

    return this.exclusive(() =>
      this.withFileLock(async () => {
        const raw = await this.readRaw();
        this.toEntries(raw); // refuse to extend a file we could not read back
        const stamped = stamp(entries, raw.length);
        await this.writeRaw([...raw, ...stamped]);
        this.logger.debug('Appended history entries', {
          file: this.filePath,
          sequences: stamped.map((entry) => entry.sequence),
        });
        return stamped;
      }),
    );
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async withFileLock<T>(task: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      release = await lockfile.lock(this.filePath, LOCK_OPTIONS);
    } catch (error) {
      throw new PersistenceError(`Could not lock ${this.filePath}: ${errorMessage(error)}`, this.filePath, 'lock', error);
    }

    try {
      return await task();
    } finally {
      await release().catch((error: unknown) => {
        this.logger.warn('Could not release history lock', { file: this.filePath, error: errorMessage(error) });
      });
    }
  }

  private async readRaw(): Promise<unknown[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceError(`Could not read ${this.filePath}: ${errorMessage(error)}`, this.filePath, 'read', error);
    }
    if (text.trim() === '') return [];

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new PersistenceError(`History file ${this.filePath} is not valid JSON`, this.filePath, 'read', error);
    }
    if (!Array.isArray(data)) {
      throw new PersistenceError(`History file ${this.filePath} does not hold a JSON array`, this.filePath, 'read');
    }
    return data;
  }

  private toEntries(raw: readonly unknown[]): HistoryEntry[] {
    return raw.map((item, index) => {
      const parsed = entrySchema.safeParse(item);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new PersistenceError(
          `History entry ${index + 1} in ${this.filePath} is malformed: ${issue.path.join('.')} ${issue.message}`.trim(),
          this.filePath,
          'read',
        );
      }
      return { ...parsed.data, sequence: parsed.data.sequence ?? index + 1 };
    });
  }

  private async writeRaw(entries: readonly unknown[]): Promise<void> {
    const tmpPath = `${this.filePath}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(entries, null, 2) + '\n', 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.remove(tmpPath).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temporary history file', { file: tmpPath, error: errorMessage(cleanupError) });
      });
      throw new PersistenceError(`Could not write ${this.filePath}: ${errorMessage(error)}`, this.filePath, 'write', error);
    }
  }
}

/** Same contract, nothing written to disk. */
export class MemoryHistoryStore implements HistoryRepository {
  private readonly entries: HistoryEntry[] = [];

  async read(): Promise<HistoryEntry[]> {
    return this.entries.map((entry) => ({ ...entry }));
  }

  async count(): Promise<number> {
    return this.entries.length;
  }

  async append(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const [stored] = await this.bulkAppend([entry]);
    return stored;
  }

  async bulkAppend(entries: readonly NewHistoryEntry[]): Promise<HistoryEntry[]> {
    const stamped = stamp(entries, this.entries.length);
    this.entries.push(...stamped);
    return stamped.map((entry) => ({ ...entry }));
  }
}
