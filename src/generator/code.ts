import type { AggregateFunc, AggregatePlan, AnalysisPlan, FilterSpec } from '../ir/plan.js';

export interface EmittedFragment {
  source: string;
  declaredInputs: string[];
}

const NUMERIC_HELPER: Record<Exclude<AggregateFunc, 'count' | 'nunique' | 'mode'>, string> = {
  sum: 'sum',
  mean: 'mean',
  median: 'median',
  min: 'min',
  max: 'max',
  std: 'std',
  var: 'variance',
};

const COMPARATOR: Record<FilterSpec['op'], string> = {
  '=': '===',
  '!=': '!==',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

function lit(value: unknown): string {
  return JSON.stringify(value);
}

function emitFilter(filters: FilterSpec[]): string {
  if (filters.length === 0) return 'df';
  const predicate = filters.map((f) => `row[${lit(f.column)}] ${COMPARATOR[f.op]} ${lit(f.value)}`).join(' && ');
  return `df.where((row) => ${predicate})`;
}

function emitAggregate(func: AggregateFunc, values: string, dropMissing: boolean): string {
  switch (func) {
    case 'count':
      return `stats.count(${values}, ${dropMissing})`;
    case 'nunique':
      return `stats.nunique(${values}, ${dropMissing})`;
    case 'mode':
      return `stats.mode(${values}, ${dropMissing})`;
    default:
      return `stats.${NUMERIC_HELPER[func]}(stats.numeric(${values}, ${dropMissing}))`;
  }
}

/** Expression answering an aggregate plan over one table variable. */
function emitAggregateOver(plan: AggregatePlan, table: string): string {
  if (plan.columns.length === 0) {
    return `${table}.rowCount`;
  }

  const perColumn = (column: string): string => {
    const values = `${table}.column(${lit(column)})`;
    if (plan.funcs.length === 1) {
      return emitAggregate(plan.funcs[0], values, plan.dropMissing);
    }
    return `{ ${plan.funcs.map((f) => `${f}: ${emitAggregate(f, values, plan.dropMissing)}`).join(', ')} }`;
  };

  if (plan.columns.length === 1) {
    return perColumn(plan.columns[0]);
  }
  return `{ ${plan.columns.map((c) => `${lit(c)}: ${perColumn(c)}`).join(', ')} }`;
}

function emitBody(plan: AnalysisPlan): string[] {
  switch (plan.kind) {
    case 'previous':
      return ['const value = previous;'];

    case 'shape':
      return ['const value = { rows: table.rowCount, columns: table.columns.length };'];

    case 'preview':
      return plan.columns.length === 0
        ? [`const value = table.head(${plan.limit});`]
        : [`const value = table.head(${plan.limit}, ${lit(plan.columns)});`];

    case 'frequency': {
      const args = [`table.column(${lit(plan.column)})`, String(plan.dropMissing)];
      if (plan.limit !== undefined) args.push(String(plan.limit));
      return [`const value = stats.frequencies(${args.join(', ')});`];
    }

    case 'correlation': {
      const [x, y] = plan.columns;
      return [`const value = stats.corr(table.column(${lit(x)}), table.column(${lit(y)}), ${plan.dropMissing});`];
    }

    case 'describe': {
      if (plan.columns.length === 1) {
        return [`const value = stats.describe(table.column(${lit(plan.columns[0])}), ${plan.dropMissing});`];
      }
      const entries = plan.columns.map((c) => `  ${lit(c)}: stats.describe(table.column(${lit(c)}), ${plan.dropMissing}),`);
      return ['const value = {', ...entries, '};'];
    }

    case 'aggregate': {
      if (plan.groupBy === undefined) {
        return [`const value = ${emitAggregateOver(plan, 'table')};`];
      }
      return [
        `const groups = stats.groupBy(table, ${lit(plan.groupBy)});`,
        `const value = Object.fromEntries(groups.map(([key, group]) => [key, ${emitAggregateOver(plan, 'group')}]));`,
      ];
    }
  }
}

/**
 * Emit a fragment for a plan. Fragments bind their answer to `result` and
 * only touch the columns named by the plan.
 */
export function emitFragment(plan: AnalysisPlan, queryText: string): EmittedFragment {
  const lines: string[] = [`// ${queryText.replace(/[\r\n\u2028\u2029]+/g, ' ')}`];
  const usesTable = plan.kind !== 'previous';

  if (usesTable) {
    lines.push(`const table = ${emitFilter(plan.filters)};`);
  }
  lines.push(...emitBody(plan));
  lines.push(plan.precision !== undefined ? `const result = stats.round(value, ${plan.precision});` : 'const result = value;');

  return {
    source: lines.join('\n') + '\n',
    declaredInputs: usesTable ? ['df'] : ['previous'],
  };
}
