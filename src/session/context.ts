import type {
  ContextSnapshot,
  Dataset,
  ExecutionOutcome,
  JsonValue,
  OutcomeSummary,
  Requirements,
  SessionContext,
  StructuredQuery,
} from '../ir/types.js';

export function createContext(dataset: Dataset | null = null, requirements: Requirements = {}): SessionContext {
  return Object.freeze({ dataset, requirements: Object.freeze({ ...requirements }), lastResult: null, lastQuery: null });
}

/**
 * Context after one turn. A successful turn replaces the last result and
 * merges the turn's requirements over the accumulated ones; any other
 * outcome only records itself as the last result. Either way `lastQuery`
 * names the turn that produced `lastResult`. `query` is null when the turn
 * failed before a query could be structured; `queryText` is then the text
 * the turn was recorded under.
 */
export function applyTurn(
  old: SessionContext,
  query: StructuredQuery | null,
  outcome: ExecutionOutcome,
  queryText: string | null = query?.queryText ?? null,
): SessionContext {
  if (outcome.status !== 'success' || query === null) {
    return Object.freeze({ ...old, lastResult: outcome, lastQuery: queryText });
  }
  return Object.freeze({
    dataset: old.dataset,
    requirements: Object.freeze({ ...old.requirements, ...query.requirements }),
    lastResult: outcome,
    lastQuery: query.queryText,
  });
}

/** Explicit reload. Requirements survive; results of the old dataset do not. */
export function withDataset(old: SessionContext, dataset: Dataset): SessionContext {
  return Object.freeze({ dataset, requirements: old.requirements, lastResult: null, lastQuery: null });
}

/**
 * The part of a context worth persisting with a turn. `query` supplies the
 * requirements the turn actually ran with.
 */
export function snapshotContext(context: SessionContext, query?: StructuredQuery): ContextSnapshot {
  const dataset = context.dataset;
  const requirements: Record<string, JsonValue> = { ...(query?.requirements ?? context.requirements) };
  const previous =
    context.lastResult !== null && context.lastQuery !== null
      ? { query: context.lastQuery, status: context.lastResult.status }
      : null;

  return {
    dataset: dataset
      ? { name: dataset.name, source: dataset.source, rowCount: dataset.rowCount, columns: dataset.columns.map((c) => c.name) }
      : null,
    requirements,
    previous,
  };
}

export function summarizeOutcome(outcome: ExecutionOutcome): OutcomeSummary {
  switch (outcome.status) {
    case 'success':
      return outcome.stdout === ''
        ? { status: 'success', value: outcome.value }
        : { status: 'success', value: outcome.value, stdout: outcome.stdout };
    case 'timeout':
      return { status: 'timeout', timeoutMs: outcome.timeoutMs };
    case 'runtime-failure':
      return { status: 'runtime-failure', kind: outcome.kind, message: outcome.message };
    case 'rejected':
      return {
        status: 'rejected',
        violations: outcome.violations.map((v) => ({ ruleId: v.ruleId, offendingToken: v.offendingToken, message: v.message })),
      };
  }
}
