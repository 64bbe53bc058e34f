import fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import type { JsonValue } from '../ir/types.js';
import { parseJson } from '../ir/json.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = '.statquery.json';

export const configSchema = z
  .object({
    output_format: z.enum(['text', 'json']).default('text'),
    auto_commit: z.boolean().default(true),
    save_history: z.boolean().default(true),
    timeout_ms: z.number().int().min(100).max(600_000).default(10_000),
  })
  .passthrough();

export type StatQueryConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: StatQueryConfig = Object.freeze(configSchema.parse({}));

/**
 * Interpret a value typed on the command line: booleans, numbers and JSON
 * literals are parsed, anything else stays a string.
 */
export function parseConfigValue(raw: string): JsonValue {
  const text = raw.trim();
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text === 'null') return null;
  if (text !== '' && /^-?\d+(\.\d+)?$/.test(text)) return Number(text);
  if (/^[[{"]/.test(text)) {
    try {
      return parseJson(text);
    } catch {
      return raw;
    }
  }
  return raw;
}

/** Flat JSON settings file. Keys it does not know are kept as they are. */
export class ConfigStore {
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    options: { logger?: Logger } = {},
  ) {
    this.logger = componentLogger(options.logger, 'config');
  }

  static inDirectory(directory: string, options: { logger?: Logger } = {}): ConfigStore {
    return new ConfigStore(path.join(directory, CONFIG_FILE_NAME), options);
  }

  private parse(raw: unknown): StatQueryConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue.path.join('.');
      throw new ConfigError(`Invalid configuration value for ${field || 'file'}: ${issue.message}`, field || undefined);
    }
    return result.data;
  }

  private async write(config: StatQueryConfig): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeJson(this.filePath, config, { spaces: 2 });
    } catch (error) {
      throw new ConfigError(`Could not write ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  /** Current settings. A missing or empty file is (re)written with defaults. */
  async get(): Promise<StatQueryConfig> {
    let text: string | null = null;
    if (await fs.pathExists(this.filePath)) {
      try {
        text = await fs.readFile(this.filePath, 'utf8');
      } catch (error) {
        throw new ConfigError(`Could not read ${this.filePath}: ${errorMessage(error)}`);
      }
    }

    let raw: unknown = null;
    if (text !== null && text.trim() !== '') {
      try {
        raw = JSON.parse(text);
      } catch {
        throw new ConfigError(`${this.filePath} is not valid JSON`);
      }
    }

    const empty =
      raw === null || (typeof raw === 'object' && !Array.isArray(raw) && Object.keys(raw).length === 0);
    if (empty) {
      const defaults = { ...DEFAULT_CONFIG };
      await this.write(defaults);
      this.logger.info('Wrote default configuration', { file: this.filePath });
      return defaults;
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
      throw new ConfigError(`${this.filePath} must hold a JSON object`);
    }
    return this.parse(raw);
  }

  async set(key: string, value: JsonValue): Promise<StatQueryConfig> {
    if (key.trim() === '') throw new ConfigError('Configuration key must not be empty');
    const current = await this.get();
    const next = this.parse({ ...current, [key]: value });
    await this.write(next);
    this.logger.info(`Updated configuration: ${key}=${JSON.stringify(value)}`);
    return next;
  }

  async reset(): Promise<StatQueryConfig> {
    const defaults = { ...DEFAULT_CONFIG };
    await this.write(defaults);
    this.logger.info('Reset configuration to defaults');
    return defaults;
  }
}
