import { describe, it, expect } from 'vitest';
import { validate, validateSource } from '../src/validator/validator.js';
import { fragment } from './helpers.js';

const DF = new Set(['df']);

function rules(source: string, inputs: ReadonlySet<string> = DF): string[] {
  return validateSource(source, inputs).violations.map((v) => v.ruleId);
}

describe('validateSource', () => {
  it('approves plain analysis code', () => {
    const source = [
      'const values = stats.numeric(df.column("A"), true);',
      'const scaled = values.map((v) => Math.round(v * 10) / 10);',
      'const seen = new Set();',
      'for (const v of scaled) { if (v > 1) { seen.add(v); } }',
      'const result = { count: seen.size, top: [...seen].sort((a, b) => b - a)[0] };',
    ].join('\n');

    expect(validateSource(source, DF)).toEqual({ approved: true, violations: [] });
  });

  it('is a pure function of its input', () => {
    const source = 'const result = require("fs").readFileSync("/etc/hosts");';
    expect(validateSource(source, DF)).toEqual(validateSource(source, DF));
  });

  it('rejects module loading', () => {
    const verdict = validateSource('const data = require("fs");\nconst result = 1;', DF);
    expect(verdict.approved).toBe(false);
    expect(verdict.violations).toEqual([
      { ruleId: 'dynamic-import', offendingToken: 'require', message: "'require' is not available to analysis code" },
    ]);
    expect(rules('import fs from "fs";\nconst result = 1;')).toEqual(['dynamic-import']);
  });

  it('rejects process access', () => {
    expect(rules('const result = process.exit(1);')).toEqual(['process-access', 'process-access']);
  });

  it('rejects network access', () => {
    expect(rules('const result = fetch("http://example.test");')).toEqual(['network-access']);
  });

  it('rejects dynamic code', () => {
    expect(rules('const result = eval("1 + 1");')).toEqual(['dynamic-code']);
    expect(rules('const result = Function("return 1");')).toEqual(['dynamic-code']);
  });

  it('rejects reaching the global object', () => {
    expect(rules('const result = globalThis.x;')).toEqual(['global-access']);
    expect(rules('const result = df.constructor;')).toEqual(['global-access']);
    expect(rules('const result = this;')).toEqual(['global-access']);
  });

  it('rejects mutating values the fragment does not own', () => {
    expect(rules('df.rows.push(1);\nconst result = 1;')).toEqual(['external-mutation']);
    expect(rules('df = 1;\nconst result = 1;')).toEqual(['external-mutation']);
    expect(rules('const copy = df.column("A");\ncopy.push(1);\nconst result = copy;')).toEqual([]);
  });

  it('does not let an alias stand in for a value it does not own', () => {
    expect(rules('const m = Math;\nm.abs = (x) => 0;\nconst result = Math.abs(-5);')).toEqual([
      'global-access',
      'external-mutation',
    ]);
    expect(rules('const r = df.rows;\nr.push(1);\nconst result = r;')).toEqual(['external-mutation']);
    expect(rules('const append = (xs) => xs.push(1);\nconst result = append([]);')).toEqual(['external-mutation']);
    expect(rules('const boxes = [df.column("A")];\nboxes[0].push(1);\nconst result = boxes;')).toEqual([
      'external-mutation',
    ]);
  });

  it('keeps mutation of values built by the fragment', () => {
    expect(rules('let total = [];\ntotal = total.concat([1]);\ntotal.push(2);\nconst result = total;')).toEqual([]);
    expect(rules('const counts = { a: 0 };\ncounts.a += 1;\nconst result = counts;')).toEqual([]);
  });

  it('only lets namespaces be called or read from', () => {
    expect(validateSource('const result = df.column("A").map(Number);', DF).violations).toEqual([
      { ruleId: 'global-access', offendingToken: 'Number', message: "'Number' can only be called or have its members read" },
    ]);
    expect(rules('const result = [Math, stats];')).toEqual(['global-access', 'global-access']);
    expect(rules('const result = Number.isFinite(Infinity) ? undefined : NaN;')).toEqual([]);
  });

  it('rejects names it does not know', () => {
    const verdict = validateSource('const result = foo;', DF);
    expect(verdict.violations).toEqual([
      { ruleId: 'unknown-identifier', offendingToken: 'foo', message: "'foo' is not defined" },
    ]);
  });

  it('rejects calls outside the allow-list', () => {
    expect(validateSource('const result = Math.random();', DF).violations).toEqual([
      { ruleId: 'disallowed-call', offendingToken: 'Math.random', message: 'Math.random is not allowed' },
    ]);
    expect(rules('const result = new Date();')).toEqual(['disallowed-call']);
    expect(rules('const result = df.column("A").fill(0);')).toEqual(['disallowed-call']);
  });

  it('rejects computed property names', () => {
    expect(rules('const key = "A";\nconst result = df[key];')).toEqual(['dynamic-property-access']);
  });

  it('reads HTML-like comments the way the sandbox runs the code', () => {
    const source = 'const f = (x) => x;\nconst a = f <!-- c;\n["con" + "structor"];\nconst result = a;';
    expect(validateSource(source, DF).violations).toEqual([
      {
        ruleId: 'dynamic-property-access',
        offendingToken: '"con" + "structor"',
        message: 'Property names must be written out',
      },
    ]);
    expect(rules('const result = 1;\n--> df.rows.push(1);')).toEqual([]);
  });

  it('rejects inputs that were not declared', () => {
    expect(rules('const result = df.rowCount;', new Set())).toEqual(['undeclared-input']);
    expect(validateSource('const result = 1;', new Set(['secrets'])).violations).toEqual([
      { ruleId: 'undeclared-input', offendingToken: 'secrets', message: "'secrets' is not an input the sandbox can provide" },
    ]);
  });

  it('requires a top-level result', () => {
    expect(rules('const answer = 1;')).toEqual(['missing-result']);
  });

  it('reports syntax errors', () => {
    const verdict = validateSource('const result = ;', DF);
    expect(verdict.approved).toBe(false);
    expect(verdict.violations.map((v) => v.ruleId)).toEqual(['syntax-error']);
    expect(verdict.violations[0].offendingToken).toBe('const result = ;');
  });

  it('rejects constructs outside the grammar', () => {
    expect(rules('var result = 1;')).toEqual(['unsupported-construct']);
    expect(rules('while (true) {}\nconst result = 1;')).toEqual(['unsupported-construct']);
    expect(rules('const result = /a+/;')).toEqual(['unsupported-construct']);
    expect(rules('const o = { a: 1 };\ndelete o.a;\nconst result = o;')).toEqual(['unsupported-construct']);
  });

  it('rejects oversized code', () => {
    const verdict = validateSource(`const result = 1;${' '.repeat(20_000)}`, DF);
    expect(verdict.violations).toEqual([
      {
        ruleId: 'unsupported-construct',
        offendingToken: '20017 characters',
        message: 'Code is longer than 20000 characters',
      },
    ]);
  });

  it('orders violations by position', () => {
    expect(rules('const a = foo;\nconst b = eval("1");')).toEqual(['unknown-identifier', 'dynamic-code', 'missing-result']);
  });
});

describe('validate', () => {
  it('uses the declared inputs of generated code', () => {
    expect(validate(fragment('const result = previous;', ['previous'])).approved).toBe(true);
    expect(validate(fragment('const result = previous;', ['df'])).violations.map((v) => v.ruleId)).toEqual([
      'undeclared-input',
    ]);
  });
});
