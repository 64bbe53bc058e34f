import fs from 'fs-extra';
import * as xlsx from 'xlsx';
import { asyncBufferFromFile, parquetReadObjects } from 'hyparquet';
import { DatasetError, InvalidDataError } from '../utils/errors.js';

/** Reads a file into raw records; the loader normalises cells and infers the schema. */
export type DatasetReader = (filePath: string) => Promise<unknown[]>;

export type ReaderKind = 'delimited' | 'spreadsheet' | 'records' | 'columnar';

export interface ReaderRegistration {
  readonly extension: string;
  readonly kind: ReaderKind;
  readonly read: DatasetReader;
}

const EXTENSION_PATTERN = /^\.[a-z0-9]+$/;

/**
 * Closed mapping from file extension to reader. Entries are checked when they
 * are registered; once sealed the mapping cannot change.
 */
export class ReaderRegistry {
  private readonly readers = new Map<string, ReaderRegistration>();
  private sealed = false;

  register(extension: string, kind: ReaderKind, read: DatasetReader): this {
    if (this.sealed) {
      throw new DatasetError(`Reader registry is sealed; cannot register ${extension}`, 'registry-sealed');
    }
    if (!EXTENSION_PATTERN.test(extension)) {
      throw new DatasetError(`Invalid extension "${extension}": expected a lowercase form like ".csv"`, 'invalid-extension');
    }
    if (this.readers.has(extension)) {
      throw new DatasetError(`A reader for ${extension} is already registered`, 'duplicate-extension');
    }
    this.readers.set(extension, Object.freeze({ extension, kind, read }));
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  lookup(extension: string): ReaderRegistration | undefined {
    return this.readers.get(extension.toLowerCase());
  }

  extensions(): string[] {
    return [...this.readers.keys()].sort();
  }
}

/**
 * Split delimited text into records, honouring double quotes and
 * doubled-quote escapes. A quoted field may span line breaks.
 */
export function splitDelimitedRecords(content: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let quoted = false;
  let sawQuote = false;

  const endRecord = (): void => {
    fields.push(current);
    // blank lines carry no record
    if (sawQuote || fields.length > 1 || fields[0].trim() !== '') records.push(fields);
    fields = [];
    current = '';
    sawQuote = false;
  };

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
      sawQuote = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++;
      endRecord();
    } else {
      current += ch;
    }
  }

  if (quoted) {
    throw new InvalidDataError(`Quoted field is not closed (record ${records.length + 1})`);
  }
  if (current !== '' || fields.length > 0 || sawQuote) endRecord();
  return records;
}

export function parseDelimited(content: string, delimiter: string): Record<string, string>[] {
  const records = splitDelimitedRecords(content.replace(/^\uFEFF/, ''), delimiter);
  if (records.length === 0) return [];

  const headers = records[0].map((h) => h.trim());
  if (headers.some((h) => h === '')) {
    throw new InvalidDataError('Header row contains an empty column name');
  }

  return records.slice(1).map((values) => {
    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = values[index] ?? '';
    });
    return row;
  });
}

function detectDelimiter(filePath: string, headerLine: string): string {
  if (filePath.toLowerCase().endsWith('.tsv')) return '\t';
  return headerLine.includes('\t') && !headerLine.includes(',') ? '\t' : ',';
}

export async function readDelimited(filePath: string): Promise<unknown[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  return parseDelimited(content, detectDelimiter(filePath, firstLine));
}

export async function readSpreadsheet(filePath: string): Promise<unknown[]> {
  const buffer = await fs.readFile(filePath);
  const workbook = xlsx.read(buffer, { type: 'buffer' });

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    const data = xlsx.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null });
    if (data.length > 0) {
      return data;
    }
  }
  return [];
}

export async function readRecords(filePath: string): Promise<unknown[]> {
  const content = (await fs.readFile(filePath, 'utf-8')).trim();
  if (content === '') return [];

  // A JSON array, or one object per line
  if (content.startsWith('[')) {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new InvalidDataError('JSON file must contain an array of records', filePath);
    }
    return parsed;
  }

  const records: unknown[] = [];
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      throw new InvalidDataError(`Line ${i + 1} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, filePath);
    }
  }
  return records;
}

export async function readColumnar(filePath: string): Promise<unknown[]> {
  const file = await asyncBufferFromFile(filePath);
  return parquetReadObjects({ file });
}

export function defaultRegistry(): ReaderRegistry {
  return new ReaderRegistry()
    .register('.csv', 'delimited', readDelimited)
    .register('.tsv', 'delimited', readDelimited)
    .register('.txt', 'delimited', readDelimited)
    .register('.xlsx', 'spreadsheet', readSpreadsheet)
    .register('.xls', 'spreadsheet', readSpreadsheet)
    .register('.ods', 'spreadsheet', readSpreadsheet)
    .register('.json', 'records', readRecords)
    .register('.jsonl', 'records', readRecords)
    .register('.ndjson', 'records', readRecords)
    .register('.parquet', 'columnar', readColumnar)
    .seal();
}
