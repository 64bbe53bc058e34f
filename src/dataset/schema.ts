import type { Cell, ColumnInfo, ColumnType, Dataset, DatasetSchema, Row } from '../ir/types.js';
import { InvalidDataError } from '../utils/errors.js';

const SAMPLE_SIZE = 100;

function looksLikeDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(value));
}

function looksLikeDateTime(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/.test(value) && !Number.isNaN(Date.parse(value));
}

/** Coerce a raw value from any reader to a cell. Strings are parsed as numbers/booleans where they look like one. */
export function normalizeCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    // Try to parse as number
    if (!Number.isNaN(Number(trimmed)) && /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
      return Number(trimmed);
    }
    // Try to parse as boolean
    const lower = trimmed.toLowerCase();
    if (lower === 'true' || lower === 'false') return lower === 'true';
    return value;
  }
  return JSON.stringify(value) ?? null;
}

function typeOfCell(value: Exclude<Cell, null>): ColumnType {
  if (typeof value === 'number') return Number.isInteger(value) ? 'INTEGER' : 'REAL';
  if (typeof value === 'boolean') return 'BOOLEAN';
  if (looksLikeDate(value)) return 'DATE';
  if (looksLikeDateTime(value)) return 'DATETIME';
  return 'TEXT';
}

export function inferColumnType(column: string, rows: readonly Row[]): ColumnType {
  const values = rows
    .slice(0, SAMPLE_SIZE)
    .map((row) => row[column])
    .filter((v): v is Exclude<Cell, null> => v !== null && v !== undefined);
  if (values.length === 0) return 'NULL';

  let type = typeOfCell(values[0]);
  for (const value of values.slice(1)) {
    const next = typeOfCell(value);
    if (next === type) continue;
    if ((type === 'INTEGER' && next === 'REAL') || (type === 'REAL' && next === 'INTEGER')) {
      type = 'REAL';
      continue;
    }
    return 'TEXT';
  }
  return type;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNumericType(type: ColumnType): boolean {
  return type === 'INTEGER' || type === 'REAL';
}

/**
 * Build a frozen dataset from reader output. Column order is first-seen order
 * across all records; absent keys become null.
 */
export function buildDataset(name: string, source: string, records: readonly unknown[]): Dataset {
  if (records.length === 0) {
    throw new InvalidDataError(`Dataset ${name} has no rows`, source);
  }

  const columnNames: string[] = [];
  const seen = new Set<string>();
  const objects: Record<string, unknown>[] = [];
  for (const record of records) {
    if (!isRecord(record)) {
      throw new InvalidDataError(`Dataset ${name} is not tabular: every record must be an object`, source);
    }
    objects.push(record);
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columnNames.push(key);
      }
    }
  }
  if (columnNames.length === 0) {
    throw new InvalidDataError(`Dataset ${name} has no columns`, source);
  }

  const rows: Row[] = objects.map((record) => {
    const row: Record<string, Cell> = {};
    for (const column of columnNames) {
      row[column] = normalizeCell(record[column]);
    }
    return Object.freeze(row);
  });

  const columns = columnNames.map((column) => Object.freeze({ name: column, type: inferColumnType(column, rows) }));

  return Object.freeze({
    name,
    source,
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
    rowCount: rows.length,
  });
}

export function schemaOf(dataset: Dataset): DatasetSchema {
  return Object.freeze({
    name: dataset.name,
    rowCount: dataset.rowCount,
    columns: Object.freeze(dataset.columns.map((c): ColumnInfo => Object.freeze({ name: c.name, type: c.type }))),
  });
}
