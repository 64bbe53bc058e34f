import type { AnalysisPlan, FilterSpec } from '../ir/plan.js';

const FUNC_LABEL: Record<string, string> = {
  count: 'count of non-missing values',
  sum: 'sum',
  mean: 'mean',
  median: 'median',
  min: 'minimum',
  max: 'maximum',
  std: 'sample standard deviation',
  var: 'sample variance',
  mode: 'most frequent value',
  nunique: 'number of distinct values',
};

function describeFilter(filter: FilterSpec): string {
  return `${filter.column} ${filter.op} ${JSON.stringify(filter.value)}`;
}

export function explainPlan(plan: AnalysisPlan): string {
  const lines: string[] = [];
  lines.push('Reasoning & Explanation:');

  switch (plan.kind) {
    case 'aggregate':
      if (plan.columns.length === 0) {
        lines.push('- Count rows');
      } else {
        for (const func of plan.funcs) {
          lines.push(`- Aggregate: ${FUNC_LABEL[func]} of ${plan.columns.join(', ')}`);
        }
      }
      if (plan.groupBy) lines.push(`- Group by: ${plan.groupBy} (rows with a missing key are left out)`);
      break;
    case 'describe':
      lines.push(`- Summary statistics for ${plan.columns.join(', ')}`);
      break;
    case 'correlation':
      lines.push(`- Pearson correlation between ${plan.columns[0]} and ${plan.columns[1]}`);
      break;
    case 'frequency':
      lines.push(`- Value counts for ${plan.column}${plan.limit !== undefined ? `, top ${plan.limit}` : ''}`);
      break;
    case 'preview':
      lines.push(`- First ${plan.limit} rows of ${plan.columns.length > 0 ? plan.columns.join(', ') : 'every column'}`);
      break;
    case 'shape':
      lines.push('- Row and column counts');
      break;
    case 'previous':
      lines.push('- Reuse the result of the previous analysis');
      break;
  }

  if (plan.filters.length > 0) {
    lines.push('- Filters: ' + plan.filters.map(describeFilter).join(' AND '));
  }
  if (plan.kind !== 'previous' && plan.kind !== 'shape' && plan.kind !== 'preview') {
    lines.push(plan.dropMissing ? '- Missing values are skipped' : '- Missing values are kept; numeric steps fail on them');
  }
  if (plan.precision !== undefined) {
    lines.push(`- Numbers rounded to ${plan.precision} decimal place${plan.precision === 1 ? '' : 's'}`);
  }
  return lines.join('\n');
}
