export type AggregateFunc = 'count' | 'sum' | 'mean' | 'median' | 'min' | 'max' | 'std' | 'var' | 'mode' | 'nunique';

export type FilterOp = '=' | '!=' | '<' | '<=' | '>' | '>=';

export interface FilterSpec {
  column: string;
  op: FilterOp;
  value: number | string | boolean | null;
}

export interface PlanOptions {
  filters: FilterSpec[];
  precision?: number;
  dropMissing: boolean;
}

export interface AggregatePlan extends PlanOptions {
  kind: 'aggregate';
  funcs: AggregateFunc[];
  columns: string[]; // empty only for a plain row count
  groupBy?: string;
}

export interface DescribePlan extends PlanOptions {
  kind: 'describe';
  columns: string[];
}

export interface CorrelationPlan extends PlanOptions {
  kind: 'correlation';
  columns: [string, string];
}

export interface FrequencyPlan extends PlanOptions {
  kind: 'frequency';
  column: string;
  limit?: number;
}

export interface PreviewPlan extends PlanOptions {
  kind: 'preview';
  columns: string[];
  limit: number;
}

export interface ShapePlan extends PlanOptions {
  kind: 'shape';
}

export interface PreviousPlan extends PlanOptions {
  kind: 'previous';
}

export type AnalysisPlan =
  | AggregatePlan
  | DescribePlan
  | CorrelationPlan
  | FrequencyPlan
  | PreviewPlan
  | ShapePlan
  | PreviousPlan;
