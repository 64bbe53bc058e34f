import type { DatasetSchema, StructuredQuery } from '../ir/types.js';
import type { AggregateFunc, AnalysisPlan, FilterOp, FilterSpec, PlanOptions } from '../ir/plan.js';
import { GenerationError } from '../utils/errors.js';

interface CapabilityRule {
  ruleId: string;
  pattern: RegExp;
  reason: string;
}

// Checked in order; the first hit wins.
const CAPABILITY_RULES: CapabilityRule[] = [
  {
    ruleId: 'filesystem-access',
    pattern: /\b(delete|remove|erase|wipe|rm|write|save|overwrite|read|open|export|move|copy|rename)\b[^.?!]*\b(files?|folders?|director(?:y|ies)|disk|paths?)\b/,
    reason: 'file system operations are not supported',
  },
  {
    ruleId: 'filesystem-access',
    pattern: /(?:^|\s)((?:~|\.{1,2})?\/[\w.-]+[\w.\-/]*)/,
    reason: 'queries may not refer to file system paths',
  },
  {
    ruleId: 'network-access',
    pattern: /(https?:\/\/\S*|\b(?:download|upload|webhook|fetch|e-?mail)\b)/,
    reason: 'network access is not supported',
  },
  {
    ruleId: 'process-access',
    pattern: /\b(shell|terminal|subprocess|sudo|bash|install|kill|reboot)\b/,
    reason: 'running commands is not supported',
  },
  {
    ruleId: 'unsupported-capability',
    pattern:
      /\b(plot|plots|chart|charts|graph|graphs|histogram|scatter|visuali[sz]e|visuali[sz]ation|draw|regression|regress|predict|prediction|forecast|cluster|clustering|classify|train)\b/,
    reason: 'only tabular aggregation, filtering and summaries are supported',
  },
];

const AGGREGATE_KEYWORDS: [RegExp, AggregateFunc][] = [
  [/\b(?:mean|average|avg)\b/g, 'mean'],
  [/\bmedian\b/g, 'median'],
  [/\b(?:sum|total)\b/g, 'sum'],
  [/\b(?:min|minimum|lowest|smallest)\b/g, 'min'],
  [/\b(?:max|maximum|highest|largest|biggest)\b/g, 'max'],
  [/\b(?:std|stdev|std dev|standard deviation)\b/g, 'std'],
  [/\bvariance\b/g, 'var'],
  [/\b(?:mode|most common|most frequent)\b/g, 'mode'],
  [/\b(?:unique|distinct)\b/g, 'nunique'],
  [/\b(?:count|how many|number of)\b/g, 'count'],
];

const FILTER_OPS: [RegExp, FilterOp][] = [
  [/^(?:>=|greater than or equal to|at least)$/, '>='],
  [/^(?:<=|less than or equal to|at most)$/, '<='],
  [/^(?:!=|is not|not equal to|<>)$/, '!='],
  [/^(?:==|=|is|equals|equal to)$/, '='],
  [/^(?:>|greater than|above|over|more than)$/, '>'],
  [/^(?:<|less than|below|under|fewer than)$/, '<'],
];

const NAME = `(?:"[^"]+"|'[^']+'|\`[^\`]+\`|[\\w.-]+)`;
const CONDITION = new RegExp(
  `^(?:column\\s+)?(${NAME})\\s*(>=|<=|!=|<>|==|=|>|<|is not|is|equals|equal to|not equal to|greater than or equal to|less than or equal to|greater than|less than|at least|at most|above|below|over|under|more than|fewer than)\\s*(.+)$`,
  'i',
);
const FILTER_CLAUSE =
  /\b(?:where|when|for rows where|only where)\s+(.+?)(?=\s+(?:grouped by|group by|by|per|for each|round|rounded|ignore|skip|drop|exclude|include|keep|use|top|first)\b|[,;?]|$)/i;
const GROUP_CLAUSE = new RegExp(`\\b(?:grouped by|group by|by|per|for each|for every|across)\\s+(?:column\\s+)?(${NAME})`, 'gi');
const EXPLICIT_COLUMNS = new RegExp(`\\bcolumns?\\s+(${NAME})((?:\\s*(?:,|and|&)\\s*${NAME})*)`, 'gi');

function unquote(name: string): string {
  return /^(["'`]).*\1$/.test(name) ? name.slice(1, -1) : name;
}

function resolveColumn(schema: DatasetSchema, name: string): string | undefined {
  const wanted = unquote(name).toLowerCase();
  return schema.columns.find((c) => c.name.toLowerCase() === wanted)?.name;
}

function requireColumn(schema: DatasetSchema, name: string): string {
  const column = resolveColumn(schema, name);
  if (!column) {
    throw new GenerationError(
      `Column "${unquote(name)}" does not exist. Available columns: ${schema.columns.map((c) => c.name).join(', ')}`,
      'unknown-column',
      unquote(name),
    );
  }
  return column;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseFilterValue(raw: string): FilterSpec['value'] {
  const value = raw.trim();
  if (/^(["'`]).*\1$/.test(value)) return value.slice(1, -1);
  if (/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(value)) return Number(value);
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === 'false') return lower === 'true';
  if (lower === 'null' || lower === 'missing' || lower === 'empty') return null;
  return value;
}

function parseFilters(text: string, schema: DatasetSchema): { filters: FilterSpec[]; span?: [number, number] } {
  const match = FILTER_CLAUSE.exec(text);
  if (!match) return { filters: [] };

  const filters: FilterSpec[] = [];
  for (const part of match[1].split(/\s+and\s+/i)) {
    const condition = CONDITION.exec(part.trim());
    if (!condition) {
      throw new GenerationError(`Cannot understand the condition "${part.trim()}"`, 'invalid-request', part.trim());
    }
    const opText = condition[2].toLowerCase();
    const op = FILTER_OPS.find(([pattern]) => pattern.test(opText))?.[1];
    if (!op) {
      throw new GenerationError(`Unsupported comparison "${condition[2]}"`, 'invalid-request', condition[2]);
    }
    filters.push({ column: requireColumn(schema, condition[1]), op, value: parseFilterValue(condition[3]) });
  }
  return { filters, span: [match.index, match.index + match[0].length] };
}

function parseGroupBy(text: string, schema: DatasetSchema): { column?: string; span?: [number, number] } {
  for (const match of text.matchAll(GROUP_CLAUSE)) {
    const column = resolveColumn(schema, match[1]);
    if (column && match.index !== undefined) {
      return { column, span: [match.index, match.index + match[0].length] };
    }
  }
  return {};
}

/**
 * Columns the query asks about, in order of first mention. `column X` forms
 * must name an existing column; bare names are matched case-insensitively,
 * except single-character names which must match exactly.
 */
export function findColumns(text: string, schema: DatasetSchema): string[] {
  const hits: { index: number; column: string }[] = [];

  for (const match of text.matchAll(EXPLICIT_COLUMNS)) {
    const index = match.index ?? 0;
    hits.push({ index, column: requireColumn(schema, match[1]) });
    const rest = match[2].split(/\s*(?:,|\band\b|&)\s*/).filter((s) => s.trim() !== '');
    for (const name of rest) {
      const column = resolveColumn(schema, name.trim());
      if (!column) break;
      hits.push({ index: index + 1, column });
    }
  }

  for (const match of text.matchAll(/"([^"]+)"|'([^']+)'|`([^`]+)`/g)) {
    const column = resolveColumn(schema, match[1] ?? match[2] ?? match[3]);
    if (column) hits.push({ index: match.index ?? 0, column });
  }

  for (const { name } of schema.columns) {
    const flags = name.length === 1 ? 'g' : 'gi';
    const pattern = new RegExp(`(?<![\\w.])${escapeRegExp(name)}(?![\\w])`, flags);
    for (const match of text.matchAll(pattern)) {
      hits.push({ index: match.index ?? 0, column: name });
    }
  }

  hits.sort((a, b) => a.index - b.index);
  const ordered: string[] = [];
  for (const hit of hits) {
    if (!ordered.includes(hit.column)) ordered.push(hit.column);
  }
  return ordered;
}

function blankSpan(text: string, span?: [number, number]): string {
  if (!span) return text;
  return text.slice(0, span[0]) + ' '.repeat(span[1] - span[0]) + text.slice(span[1]);
}

function findAggregates(lower: string): AggregateFunc[] {
  const hits: { index: number; func: AggregateFunc }[] = [];
  for (const [pattern, func] of AGGREGATE_KEYWORDS) {
    for (const match of lower.matchAll(pattern)) {
      hits.push({ index: match.index ?? 0, func });
    }
  }
  hits.sort((a, b) => a.index - b.index);
  const funcs: AggregateFunc[] = [];
  for (const { func } of hits) {
    if (!funcs.includes(func)) funcs.push(func);
  }
  // "number of unique X" is a distinct count, not a row count
  return funcs.includes('nunique') ? funcs.filter((f) => f !== 'count') : funcs;
}

function checkCapability(lower: string): void {
  for (const rule of CAPABILITY_RULES) {
    const match = rule.pattern.exec(lower);
    if (match) {
      const token = (match[1] ?? match[0]).trim();
      throw new GenerationError(`Request not supported: ${rule.reason} ("${token}")`, rule.ruleId, token);
    }
  }
}

function planOptions(query: StructuredQuery, filters: FilterSpec[]): PlanOptions {
  const precision = query.requirements.precision;
  return {
    filters,
    precision: typeof precision === 'number' && Number.isInteger(precision) && precision >= 0 && precision <= 12 ? precision : undefined,
    dropMissing: query.requirements.dropMissing !== false,
  };
}

function numericColumns(schema: DatasetSchema): string[] {
  return schema.columns.filter((c) => c.type === 'INTEGER' || c.type === 'REAL').map((c) => c.name);
}

/**
 * Heuristic NL → plan parser for common descriptive statistics.
 * Supports aggregates (optionally grouped and filtered), describe, correlation,
 * frequency tables, row previews, dataset shape and references to the previous result.
 */
export function parseIntentToPlan(query: StructuredQuery): AnalysisPlan {
  const text = query.queryText;
  const lower = text.toLowerCase();

  checkCapability(lower);

  if (/\b(?:previous|last|prior)\s+(?:analysis|result|answer|output)\b/.test(lower)) {
    if (!query.previous) {
      throw new GenerationError('There is no previous successful analysis in this session', 'missing-previous', 'previous');
    }
    return { kind: 'previous', ...planOptions(query, []) };
  }

  const schema = query.schema;
  if (!schema) {
    const mentionsColumn = /\bcolumns?\b/.test(lower);
    throw new GenerationError(
      mentionsColumn
        ? 'The query references columns but no dataset is loaded'
        : 'No dataset is loaded; load one before asking questions about data',
      'missing-schema',
    );
  }

  const { filters, span: filterSpan } = parseFilters(text, schema);
  const withoutFilters = blankSpan(text, filterSpan);
  const { column: groupBy, span: groupSpan } = parseGroupBy(withoutFilters, schema);
  const targetText = blankSpan(withoutFilters, groupSpan);
  const columns = findColumns(targetText, schema);
  const focus = typeof query.requirements.column === 'string' ? resolveColumn(schema, query.requirements.column) : undefined;
  const options = planOptions(query, filters);

  if (/\bcorrelat/.test(lower)) {
    const pair = columns.length >= 2 ? columns : numericColumns(schema).length === 2 ? numericColumns(schema) : columns;
    if (pair.length < 2) {
      throw new GenerationError('A correlation needs two columns', 'invalid-request', 'correlation');
    }
    return { kind: 'correlation', columns: [pair[0], pair[1]], ...options };
  }

  if (/\b(?:describe|description|summary|summari[sz]e|overview)\b/.test(lower)) {
    const numeric = numericColumns(schema);
    const chosen = columns.length > 0 ? columns : focus ? [focus] : numeric.length > 0 ? numeric : schema.columns.map((c) => c.name);
    return { kind: 'describe', columns: chosen, ...options };
  }

  if (/\b(?:distribution|frequency|frequencies|value counts|breakdown|how many of each|counts? (?:of|for|per) each|occurrences)\b/.test(lower)) {
    const column = columns[0] ?? groupBy ?? focus;
    if (!column) {
      throw new GenerationError('Which column should be counted?', 'invalid-request', 'frequency');
    }
    const top = lower.match(/\btop\s+(\d+)\b/);
    return { kind: 'frequency', column, limit: top ? Number(top[1]) : undefined, ...options };
  }

  if (
    /\b(?:show|display|list|print|preview|head|first|sample)\b/.test(lower) &&
    /\b(?:rows?|records?|entries|head|preview|sample)\b/.test(lower)
  ) {
    const count = lower.match(/\b(?:first|top|head|sample)\s+(\d+)\b/) ?? lower.match(/\b(\d+)\s+(?:rows?|records?|entries)\b/);
    const limit = Math.min(count ? Number(count[1]) : 5, 1000);
    return { kind: 'preview', columns, limit, ...options };
  }

  if (/\b(?:how many (?:rows|records)|number of (?:rows|records)|row count|shape|dimensions|size of the (?:data|dataset))\b/.test(lower) && !groupBy) {
    return { kind: 'shape', ...options };
  }

  const funcs = findAggregates(lower);
  if (funcs.length === 0) {
    throw new GenerationError(`Cannot work out which analysis "${text}" asks for`, 'unrecognized-request', text);
  }

  const targets = columns.length > 0 ? columns : focus ? [focus] : [];
  if (targets.length === 0 && funcs.some((f) => f !== 'count')) {
    throw new GenerationError(`Which column should the ${funcs.join('/')} be computed over?`, 'invalid-request', funcs[0]);
  }

  return { kind: 'aggregate', funcs, columns: targets, groupBy, ...options };
}
