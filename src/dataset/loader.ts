import fs from 'fs-extra';
import * as path from 'path';
import type { Dataset } from '../ir/types.js';
import { DatasetError, UnsupportedFormatError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { defaultRegistry, type ReaderRegistry } from './readers.js';
import { buildDataset } from './schema.js';

export interface DatasetLoaderOptions {
  registry?: ReaderRegistry;
  maxFileSize?: number;
  logger?: Logger;
}

export class DatasetLoader {
  private readonly registry: ReaderRegistry;
  private readonly maxFileSize: number;
  private readonly logger: Logger;

  constructor(options: DatasetLoaderOptions = {}) {
    this.registry = options.registry ?? defaultRegistry();
    if (!this.registry.isSealed) {
      this.registry.seal();
    }
    this.maxFileSize = options.maxFileSize ?? 30 * 1024 * 1024;
    this.logger = componentLogger(options.logger, 'dataset-loader');
  }

  supportedExtensions(): string[] {
    return this.registry.extensions();
  }

  async load(filePath: string): Promise<Dataset> {
    const startTime = Date.now();
    const extension = path.extname(filePath).toLowerCase();
    const reader = this.registry.lookup(extension);
    if (!reader) {
      throw new UnsupportedFormatError(extension, filePath);
    }

    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats || !stats.isFile()) {
      throw new DatasetError(`File not found: ${filePath}`, 'not-found', filePath);
    }
    if (stats.size > this.maxFileSize) {
      throw new DatasetError(
        `File size ${stats.size} exceeds maximum allowed size of ${this.maxFileSize} bytes`,
        'too-large',
        filePath,
      );
    }

    this.logger.info(`Loading dataset: ${filePath}`, { reader: reader.kind });

    let records: unknown[];
    try {
      records = await reader.read(filePath);
    } catch (error) {
      if (error instanceof DatasetError) throw error;
      this.logger.error(`Error reading ${filePath}`, { error: error instanceof Error ? error.message : String(error) });
      throw new DatasetError(
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        'read-failed',
        filePath,
      );
    }

    const name = path.basename(filePath, path.extname(filePath));
    const dataset = buildDataset(name, filePath, records);

    this.logger.info(`Dataset loaded: ${name}`, {
      rows: dataset.rowCount,
      columns: dataset.columns.length,
      processingTime: Date.now() - startTime,
    });
    return dataset;
  }
}
