import type { DatasetSchema, ExecutionOutcome, HistoryEntry, JsonValue } from '../ir/types.js';
import { summarizeOutcome } from '../session/context.js';

export type OutputFormat = 'text' | 'json';

type JsonObject = { [key: string]: JsonValue };

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function inline(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function renderTable(records: JsonObject[]): string {
  const columns: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  const cells = records.map((record) => columns.map((column) => (column in record ? inline(record[column]) : '')));
  const widths = columns.map((column, i) => Math.max(column.length, ...cells.map((row) => row[i].length)));
  const line = (values: string[]) => values.map((value, i) => value.padEnd(widths[i])).join('  ').trimEnd();

  return [line(columns), line(widths.map((width) => '-'.repeat(width))), ...cells.map(line)].join('\n');
}

/** Human-readable rendering of an answer. */
export function renderValue(value: JsonValue): string {
  if (Array.isArray(value)) {
    if (value.length > 0 && value.every(isObject)) {
      return renderTable(value.filter(isObject));
    }
    return value.map(inline).join(', ');
  }
  if (isObject(value)) {
    const keys = Object.keys(value);
    if (keys.length === 0) return '{}';
    const width = Math.max(...keys.map((key) => key.length));
    return keys.map((key) => `${key.padEnd(width)}  ${inline(value[key])}`).join('\n');
  }
  return inline(value);
}

export function renderOutcome(outcome: ExecutionOutcome, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(summarizeOutcome(outcome), null, 2);
  }
  switch (outcome.status) {
    case 'success':
      return outcome.stdout === '' ? renderValue(outcome.value) : `${outcome.stdout.trimEnd()}\n${renderValue(outcome.value)}`;
    case 'timeout':
      return `Timed out after ${outcome.timeoutMs}ms`;
    case 'runtime-failure':
      return `Failed (${outcome.kind}): ${outcome.message}`;
    case 'rejected':
      return [
        'Rejected:',
        ...outcome.violations.map(
          (v) => `  - ${v.ruleId}: ${v.message}${v.offendingToken ? ` [${v.offendingToken}]` : ''}`,
        ),
      ].join('\n');
  }
}

export function renderHistory(entries: readonly HistoryEntry[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(entries, null, 2);
  }
  if (entries.length === 0) return 'No history yet.';
  return entries
    .map((entry) => `#${entry.sequence}  ${entry.timestamp}  [${entry.outcome?.status ?? 'unknown'}]  ${entry.query}`)
    .join('\n');
}

export function renderSchema(schema: DatasetSchema): string {
  const columns = schema.columns.map((column) => `${column.name} (${column.type})`).join(', ');
  return `Loaded ${schema.name}: ${schema.rowCount} rows; ${columns}`;
}
