import { describe, it, expect } from 'vitest';
import { TemplateCodeGenerator } from '../src/generator/generator.js';
import { parseIntentToPlan } from '../src/parser/intent.js';
import { structure } from '../src/parser/structurer.js';
import { createContext } from '../src/session/context.js';
import { validate } from '../src/validator/validator.js';
import { GenerationError } from '../src/utils/errors.js';
import type { SessionContext, StructuredQuery } from '../src/ir/types.js';
import { sampleDataset } from './helpers.js';

function queryFor(text: string, context: SessionContext = createContext(sampleDataset())): StructuredQuery {
  return structure(text, context);
}

function generationError(run: () => unknown): GenerationError {
  try {
    run();
  } catch (error) {
    if (error instanceof GenerationError) return error;
    throw error;
  }
  throw new Error('expected a GenerationError');
}

describe('TemplateCodeGenerator', () => {
  const generator = new TemplateCodeGenerator();

  it('emits a fragment for a single aggregate', () => {
    const code = generator.generate(queryFor('mean of column A'));

    expect(code.source).toBe(
      [
        '// mean of column A',
        'const table = df;',
        'const value = stats.mean(stats.numeric(table.column("A"), true));',
        'const result = value;',
        '',
      ].join('\n'),
    );
    expect([...code.declaredInputs]).toEqual(['df']);
    expect(code.generator).toEqual({ name: 'template', version: '1.0.0' });
  });

  it('is deterministic for the same query', () => {
    const query = queryFor('median of C by B');
    expect(generator.generate(query).source).toBe(generator.generate(query).source);
  });

  it('groups and filters', () => {
    expect(generator.generate(queryFor('mean of A by B')).source).toBe(
      [
        '// mean of A by B',
        'const table = df;',
        'const groups = stats.groupBy(table, "B");',
        'const value = Object.fromEntries(groups.map(([key, group]) => [key, stats.mean(stats.numeric(group.column("A"), true))]));',
        'const result = value;',
        '',
      ].join('\n'),
    );
    expect(generator.generate(queryFor('mean of A where B = x')).source).toContain(
      'const table = df.where((row) => row["B"] === "x");',
    );
  });

  it('rounds when a precision is required', () => {
    const source = generator.generate(queryFor('mean of column A, round to 2 decimals')).source;
    expect(source.trimEnd().split('\n').at(-1)).toBe('const result = stats.round(value, 2);');
  });

  it('reads the previous result instead of the dataset', () => {
    const context: SessionContext = {
      ...createContext(sampleDataset()),
      lastResult: { status: 'success', value: 3, stdout: '' },
      lastQuery: 'mean of column A',
    };
    const code = generator.generate(queryFor('show the previous result', context));

    expect([...code.declaredInputs]).toEqual(['previous']);
    expect(code.source).toBe('// show the previous result\nconst value = previous;\nconst result = value;\n');
  });

  it('produces fragments the validator approves', () => {
    const queries = [
      'mean of column A',
      'mean of A by B',
      'mean of A where B = x',
      'describe column C',
      'correlation between A and C',
      'frequency of B',
      'show first 2 rows',
      'how many rows',
      'sum and max of A, round to 1 decimal places',
    ];
    for (const text of queries) {
      const verdict = validate(generator.generate(queryFor(text)));
      expect(verdict, text).toEqual({ approved: true, violations: [] });
    }
  });
});

describe('parseIntentToPlan', () => {
  it('refuses file system requests', () => {
    const error = generationError(() => parseIntentToPlan(queryFor('delete all files in /tmp')));
    expect(error.ruleId).toBe('filesystem-access');
    expect(error.offendingToken).toBe('delete');
  });

  it('refuses capabilities outside descriptive statistics', () => {
    const error = generationError(() => parseIntentToPlan(queryFor('plot a histogram of A')));
    expect(error.ruleId).toBe('unsupported-capability');
    expect(error.offendingToken).toBe('plot');
  });

  it('needs a dataset', () => {
    const error = generationError(() => parseIntentToPlan(queryFor('mean of column A', createContext())));
    expect(error.ruleId).toBe('missing-schema');
  });

  it('names unknown columns', () => {
    const error = generationError(() => parseIntentToPlan(queryFor('mean of column Z')));
    expect(error.ruleId).toBe('unknown-column');
    expect(error.offendingToken).toBe('Z');
  });

  it('reports queries it cannot map', () => {
    expect(generationError(() => parseIntentToPlan(queryFor('tell me a story'))).ruleId).toBe('unrecognized-request');
  });

  it('needs a previous result to refer to it', () => {
    expect(generationError(() => parseIntentToPlan(queryFor('show the previous result'))).ruleId).toBe('missing-previous');
  });

  it('builds aggregate plans', () => {
    expect(parseIntentToPlan(queryFor('median of C by B, round to 1 decimal places'))).toEqual({
      kind: 'aggregate',
      funcs: ['median'],
      columns: ['C'],
      groupBy: 'B',
      filters: [],
      precision: 1,
      dropMissing: true,
    });
  });
});
