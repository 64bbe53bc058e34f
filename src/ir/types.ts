export type Cell = number | string | boolean | null;

export type Row = Readonly<Record<string, Cell>>;

export type ColumnType = 'INTEGER' | 'REAL' | 'BOOLEAN' | 'DATE' | 'DATETIME' | 'TEXT' | 'NULL';

export interface ColumnInfo {
  readonly name: string;
  readonly type: ColumnType;
}

export interface Dataset {
  readonly name: string;
  readonly source: string; // file the rows were read from
  readonly columns: readonly ColumnInfo[];
  readonly rows: readonly Row[];
  readonly rowCount: number;
}

export interface DatasetSchema {
  readonly name: string;
  readonly rowCount: number;
  readonly columns: readonly ColumnInfo[];
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type RequirementValue = JsonValue;

export type Requirements = Readonly<Record<string, RequirementValue>>;

export interface PreviousResult {
  readonly query: string;
  readonly value: JsonValue;
}

export interface StructuredQuery {
  readonly queryText: string;
  readonly schema: DatasetSchema | null;
  readonly requirements: Requirements;
  readonly previous: PreviousResult | null;
}

export interface GeneratorInfo {
  readonly name: string;
  readonly version: string;
  readonly seed?: number; // model-backed generators only
}

export interface GeneratedCode {
  readonly source: string;
  readonly declaredInputs: ReadonlySet<string>;
  readonly generator: GeneratorInfo;
}

export type RuleId =
  | 'syntax-error'
  | 'unsupported-construct'
  | 'filesystem-access'
  | 'process-access'
  | 'network-access'
  | 'dynamic-import'
  | 'dynamic-code'
  | 'global-access'
  | 'external-mutation'
  | 'unknown-identifier'
  | 'disallowed-call'
  | 'dynamic-property-access'
  | 'undeclared-input'
  | 'missing-result';

export interface Violation {
  readonly ruleId: string; // a RuleId, or the ruleId of a structuring/generation error
  readonly offendingToken: string;
  readonly message: string;
}

export interface ValidationVerdict {
  readonly approved: boolean;
  readonly violations: readonly Violation[];
}

export type FailureKind =
  | 'type-mismatch'
  | 'missing-column'
  | 'division-by-zero'
  | 'resource-exhausted'
  | 'unserializable-result'
  | 'worker-crash'
  | 'interrupted'
  | 'dataset-error'
  | 'unclassified';

export type ExecutionOutcome =
  | { readonly status: 'success'; readonly value: JsonValue; readonly stdout: string }
  | { readonly status: 'timeout'; readonly timeoutMs: number }
  | { readonly status: 'runtime-failure'; readonly kind: FailureKind; readonly message: string }
  | { readonly status: 'rejected'; readonly violations: readonly Violation[] };

export interface SessionContext {
  readonly dataset: Dataset | null;
  readonly requirements: Requirements;
  readonly lastResult: ExecutionOutcome | null;
  readonly lastQuery: string | null;
}

// Shape stored under `context` in the history file.
export interface ContextSnapshot {
  dataset: { name: string; source: string; rowCount: number; columns: string[] } | null;
  requirements: Record<string, JsonValue>;
  previous: { query: string; status: ExecutionOutcome['status'] } | null;
}

export type OutcomeSummary =
  | { status: 'success'; value: JsonValue; stdout?: string }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'runtime-failure'; kind: string; message: string }
  | { status: 'rejected'; violations: { ruleId: string; offendingToken: string; message: string }[] };

export interface HistoryEntry {
  sequence: number;
  query: string;
  code: string;
  timestamp: string;
  context: ContextSnapshot | Record<string, JsonValue>;
  outcome?: OutcomeSummary;
  generator?: { name: string; version: string; seed?: number };
  session?: string;
}

export type NewHistoryEntry = Omit<HistoryEntry, 'sequence'>;
