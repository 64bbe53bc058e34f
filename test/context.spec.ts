import { describe, it, expect } from 'vitest';
import { applyTurn, createContext, snapshotContext, summarizeOutcome, withDataset } from '../src/session/context.js';
import { structure } from '../src/parser/structurer.js';
import type { ExecutionOutcome } from '../src/ir/types.js';
import { sampleDataset } from './helpers.js';

const SUCCESS: ExecutionOutcome = { status: 'success', value: 3, stdout: '' };
const TIMEOUT: ExecutionOutcome = { status: 'timeout', timeoutMs: 100 };

describe('applyTurn', () => {
  it('merges requirements and records a successful result', () => {
    const before = createContext(sampleDataset(), { precision: 3 });
    const query = structure('mean of A, ignore missing values', before);
    const after = applyTurn(before, query, SUCCESS);

    expect(after.requirements).toEqual({ precision: 3, dropMissing: true });
    expect(after.lastResult).toBe(SUCCESS);
    expect(after.lastQuery).toBe('mean of A, ignore missing values');
    expect(after.dataset).toBe(before.dataset);
  });

  it('does not modify the old context', () => {
    const before = createContext(sampleDataset());
    const query = structure('mean of A, round to 2 decimals', before);
    applyTurn(before, query, SUCCESS);

    expect(before.requirements).toEqual({});
    expect(before.lastResult).toBeNull();
    expect(Object.isFrozen(before)).toBe(true);
  });

  it('keeps requirements when a turn fails', () => {
    const before = createContext(sampleDataset(), { precision: 1 });
    const query = structure('mean of A, round to 4 decimals', before);
    const after = applyTurn(before, query, TIMEOUT);

    expect(after.requirements).toEqual({ precision: 1 });
    expect(after.lastResult).toBe(TIMEOUT);
    expect(after.lastQuery).toBe('mean of A, round to 4 decimals');
  });

  it('pairs a failure with the query that failed', () => {
    const start = createContext(sampleDataset());
    const first = applyTurn(start, structure('mean of A', start), SUCCESS);
    const second = applyTurn(first, structure('mean of Z', first), TIMEOUT);

    expect(second.lastQuery).toBe('mean of Z');
    expect(snapshotContext(second).previous).toEqual({ query: 'mean of Z', status: 'timeout' });
    expect(applyTurn(second, null, TIMEOUT, 'sum of B').lastQuery).toBe('sum of B');
  });
});

describe('withDataset', () => {
  it('keeps requirements and forgets results', () => {
    const before = applyTurn(createContext(sampleDataset(), { precision: 2 }), null, TIMEOUT);
    const replacement = sampleDataset();
    const after = withDataset(before, replacement);

    expect(after).toEqual({ dataset: replacement, requirements: { precision: 2 }, lastResult: null, lastQuery: null });
  });
});

describe('snapshotContext', () => {
  it('keeps the dataset identity and the previous turn', () => {
    const context = applyTurn(
      createContext(sampleDataset()),
      structure('mean of A', createContext(sampleDataset())),
      SUCCESS,
    );

    expect(snapshotContext(context)).toEqual({
      dataset: { name: 'sample', source: 'sample.csv', rowCount: 4, columns: ['A', 'B', 'C'] },
      requirements: {},
      previous: { query: 'mean of A', status: 'success' },
    });
  });

  it('uses the requirements a query ran with', () => {
    const context = createContext(null, { precision: 2 });
    const query = structure('how many rows, round to 0 decimals', context);
    expect(snapshotContext(context, query)).toEqual({ dataset: null, requirements: { precision: 0 }, previous: null });
  });
});

describe('summarizeOutcome', () => {
  it('omits empty output', () => {
    expect(summarizeOutcome(SUCCESS)).toEqual({ status: 'success', value: 3 });
    expect(summarizeOutcome({ status: 'success', value: 1, stdout: 'hi\n' })).toEqual({
      status: 'success',
      value: 1,
      stdout: 'hi\n',
    });
  });
});
