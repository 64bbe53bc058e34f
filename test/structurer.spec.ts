import { describe, it, expect } from 'vitest';
import { extractRequirements, structure } from '../src/parser/structurer.js';
import { createContext } from '../src/session/context.js';
import { EmptyQueryError, StructuringError } from '../src/utils/errors.js';
import type { SessionContext } from '../src/ir/types.js';
import { sampleDataset } from './helpers.js';

describe('structure', () => {
  it('normalises whitespace and copies the schema', () => {
    const query = structure('  mean   of\tcolumn A ', createContext(sampleDataset()));

    expect(query.queryText).toBe('mean of column A');
    expect(query.schema?.name).toBe('sample');
    expect(query.schema?.columns.map((c) => c.name)).toEqual(['A', 'B', 'C']);
    expect(query.requirements).toEqual({});
    expect(query.previous).toBeNull();
    expect(Object.isFrozen(query)).toBe(true);
  });

  it('rejects empty queries', () => {
    expect(() => structure('   ', createContext())).toThrow(EmptyQueryError);
    try {
      structure('', createContext());
    } catch (error) {
      expect(error).toBeInstanceOf(StructuringError);
      expect(error instanceof StructuringError && error.code).toBe('empty-query');
    }
  });

  it('rejects overly long queries', () => {
    expect(() => structure('a'.repeat(2001), createContext())).toThrow(/longer than 2000/);
  });

  it('merges stated requirements over the session ones', () => {
    const context = createContext(sampleDataset(), { precision: 3, column: 'A' });
    const query = structure('median of C, ignore missing values', context);

    expect(query.requirements).toEqual({ precision: 3, column: 'A', dropMissing: true });
  });

  it('exposes the previous successful result', () => {
    const context: SessionContext = {
      ...createContext(sampleDataset()),
      lastResult: { status: 'success', value: 3, stdout: '' },
      lastQuery: 'mean of column A',
    };

    expect(structure('round the previous result', context).previous).toEqual({ query: 'mean of column A', value: 3 });
  });

  it('does not expose a failed previous turn', () => {
    const context: SessionContext = {
      ...createContext(sampleDataset()),
      lastResult: { status: 'timeout', timeoutMs: 100 },
      lastQuery: 'mean of column A',
    };

    expect(structure('previous result', context).previous).toBeNull();
  });
});

describe('extractRequirements', () => {
  const schema = { name: 'sample', rowCount: 4, columns: sampleDataset().columns };

  it('reads precision and missing-value handling', () => {
    expect(extractRequirements('mean of A, round to 2 decimals and ignore missing values', schema)).toEqual({
      precision: 2,
      dropMissing: true,
    });
    expect(extractRequirements('sum of C with 4 decimal places, keep missing values', schema)).toEqual({
      precision: 4,
      dropMissing: false,
    });
  });

  it('resolves a focus column case-insensitively', () => {
    expect(extractRequirements('use column b', schema)).toEqual({ column: 'B' });
  });

  it('refuses a focus column the dataset lacks', () => {
    expect(() => extractRequirements('use column Z', schema)).toThrow(StructuringError);
  });

  it('keeps the focus column as written without a dataset', () => {
    expect(extractRequirements('focus on column price', null)).toEqual({ column: 'price' });
  });
});
