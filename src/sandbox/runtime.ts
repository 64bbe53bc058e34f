/**
 * Source of the runtime installed in every fragment context. It evaluates to
 * an install function; the worker calls it with the serialized inputs and
 * keeps the returned `serialize`/`output` pair. Everything a fragment can
 * reach besides the realm's own builtins is defined here.
 *
 * Errors raised for the analyst carry a `name` the parent maps to a failure
 * kind: MissingColumnError, TypeMismatchError, DivisionByZeroError and
 * UnserializableResultError.
 */
export const RUNTIME_SOURCE = String.raw`
(function install(rowsJson, columnsJson, previousJson, inputsJson, outputLimit) {
  'use strict';

  class AnalysisError extends Error {
    constructor(name, message) {
      super(message);
      this.name = name;
    }
  }

  const missingColumn = (column) => new AnalysisError('MissingColumnError', 'Column not found: ' + JSON.stringify(column));
  const typeMismatch = (message) => new AnalysisError('TypeMismatchError', message);
  const divisionByZero = (message) => new AnalysisError('DivisionByZeroError', message);
  const unserializable = (message) => new AnalysisError('UnserializableResultError', message);

  const MISSING_VALUES = 'Values are missing; ask to ignore missing values to skip them';

  const isMissing = (value) =>
    value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));

  const compareValues = (a, b) => {
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    const left = String(a);
    const right = String(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };

  const pick = (row, names) =>
    Object.freeze(Object.fromEntries(names.map((name) => [name, row[name] === undefined ? null : row[name]])));

  class Table {
    #rows;
    #columns;

    constructor(rows, columns) {
      this.#rows = Object.freeze(rows);
      this.#columns = Object.freeze(columns.slice());
      Object.freeze(this);
    }

    get rows() {
      return this.#rows;
    }

    get columns() {
      return this.#columns;
    }

    get rowCount() {
      return this.#rows.length;
    }

    #require(names) {
      if (!Array.isArray(names)) throw typeMismatch('Column names must be given as a list');
      for (const name of names) {
        if (!this.#columns.includes(name)) throw missingColumn(name);
      }
    }

    column(name) {
      this.#require([name]);
      return this.#rows.map((row) => (row[name] === undefined ? null : row[name]));
    }

    where(predicate) {
      if (typeof predicate !== 'function') throw typeMismatch('where() expects a predicate');
      return new Table(this.#rows.filter((row) => predicate(row)), this.#columns);
    }

    select(names) {
      this.#require(names);
      return new Table(this.#rows.map((row) => pick(row, names)), names);
    }

    head(limit, names) {
      const wanted = names === undefined ? this.#columns : names;
      this.#require(wanted);
      const count = limit === undefined ? 5 : limit;
      if (!Number.isInteger(count) || count < 0) throw typeMismatch('head() expects a non-negative row count');
      return this.#rows.slice(0, count).map((row) => pick(row, wanted));
    }
  }

  function numeric(values, dropMissing) {
    const drop = dropMissing !== false;
    const out = [];
    for (const value of values) {
      if (isMissing(value)) {
        if (drop) continue;
        throw typeMismatch(MISSING_VALUES);
      }
      if (typeof value === 'number') out.push(value);
      else if (typeof value === 'boolean') out.push(value ? 1 : 0);
      else throw typeMismatch('Value ' + JSON.stringify(value) + ' is not numeric');
    }
    return out;
  }

  const strict = (values) => numeric(values, false);

  function count(values, dropMissing) {
    let n = 0;
    for (const value of values) {
      if (dropMissing === false || !isMissing(value)) n += 1;
    }
    return n;
  }

  function nunique(values, dropMissing) {
    const seen = new Set();
    for (const value of values) {
      if (isMissing(value)) {
        if (dropMissing !== false) continue;
        seen.add(null);
      } else {
        seen.add(value);
      }
    }
    return seen.size;
  }

  function sum(values) {
    let total = 0;
    for (const value of strict(values)) total += value;
    return total;
  }

  function mean(values) {
    const nums = strict(values);
    if (nums.length === 0) throw divisionByZero('Mean of an empty selection');
    return sum(nums) / nums.length;
  }

  function median(values) {
    const nums = strict(values).sort((a, b) => a - b);
    if (nums.length === 0) throw divisionByZero('Median of an empty selection');
    const middle = Math.floor(nums.length / 2);
    return nums.length % 2 === 1 ? nums[middle] : (nums[middle - 1] + nums[middle]) / 2;
  }

  function min(values) {
    const nums = strict(values);
    if (nums.length === 0) return null;
    let lowest = nums[0];
    for (const value of nums) if (value < lowest) lowest = value;
    return lowest;
  }

  function max(values) {
    const nums = strict(values);
    if (nums.length === 0) return null;
    let highest = nums[0];
    for (const value of nums) if (value > highest) highest = value;
    return highest;
  }

  function variance(values, ddof) {
    const nums = strict(values);
    const dof = ddof === undefined ? 1 : ddof;
    if (nums.length - dof <= 0) throw divisionByZero('Variance needs more than ' + dof + ' value(s)');
    const centre = sum(nums) / nums.length;
    let squares = 0;
    for (const value of nums) squares += (value - centre) * (value - centre);
    return squares / (nums.length - dof);
  }

  function std(values, ddof) {
    return Math.sqrt(variance(values, ddof));
  }

  function quantile(values, q) {
    if (typeof q !== 'number' || !(q >= 0 && q <= 1)) throw typeMismatch('Quantile must be between 0 and 1');
    const nums = strict(values).sort((a, b) => a - b);
    if (nums.length === 0) return null;
    const position = (nums.length - 1) * q;
    const lower = Math.floor(position);
    const upper = Math.ceil(position);
    return nums[lower] + (nums[upper] - nums[lower]) * (position - lower);
  }

  function frequencies(values, dropMissing, limit) {
    const counts = new Map();
    for (const value of values) {
      if (isMissing(value) && dropMissing !== false) continue;
      const key = isMissing(value) ? null : value;
      counts.set(key, (counts.get(key) || 0) + 1);
    }
    const entries = Array.from(counts, ([value, n]) => ({ value, count: n }));
    entries.sort((a, b) => b.count - a.count);
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  function mode(values, dropMissing) {
    const entries = frequencies(values, dropMissing);
    if (entries.length === 0) return null;
    const top = entries[0].count;
    const tied = entries.filter((entry) => entry.count === top).map((entry) => entry.value);
    return tied.sort(compareValues)[0];
  }

  function corr(xs, ys, dropMissing) {
    if (xs.length !== ys.length) throw typeMismatch('Correlation needs columns of equal length');
    const left = [];
    const right = [];
    for (let i = 0; i < xs.length; i += 1) {
      if (isMissing(xs[i]) || isMissing(ys[i])) {
        if (dropMissing === false) throw typeMismatch(MISSING_VALUES);
        continue;
      }
      left.push(xs[i]);
      right.push(ys[i]);
    }
    const x = strict(left);
    const y = strict(right);
    if (x.length < 2) throw divisionByZero('Correlation needs at least two complete rows');
    const mx = sum(x) / x.length;
    const my = sum(y) / y.length;
    let sxy = 0;
    let sxx = 0;
    let syy = 0;
    for (let i = 0; i < x.length; i += 1) {
      sxy += (x[i] - mx) * (y[i] - my);
      sxx += (x[i] - mx) * (x[i] - mx);
      syy += (y[i] - my) * (y[i] - my);
    }
    if (sxx === 0 || syy === 0) throw divisionByZero('Correlation is undefined for a constant column');
    return sxy / Math.sqrt(sxx * syy);
  }

  function describe(values, dropMissing) {
    const present = [];
    let missing = 0;
    for (const value of values) {
      if (isMissing(value)) missing += 1;
      else present.push(value);
    }
    if (missing > 0 && dropMissing === false) throw typeMismatch(MISSING_VALUES);

    const numericOnly = present.every((value) => typeof value === 'number' || typeof value === 'boolean');
    if (!numericOnly) {
      const top = frequencies(present, true, 1)[0];
      return { count: present.length, unique: nunique(present, true), top: top.value, freq: top.count };
    }

    const nums = numeric(present, true);
    if (nums.length === 0) {
      return { count: 0, mean: null, std: null, min: null, q25: null, median: null, q75: null, max: null };
    }
    return {
      count: nums.length,
      mean: mean(nums),
      std: nums.length > 1 ? std(nums) : null,
      min: min(nums),
      q25: quantile(nums, 0.25),
      median: median(nums),
      q75: quantile(nums, 0.75),
      max: max(nums),
    };
  }

  function groupBy(table, column) {
    if (!(table instanceof Table)) throw typeMismatch('groupBy() expects a table');
    const keys = table.column(column);
    const buckets = new Map();
    table.rows.forEach((row, index) => {
      const key = keys[index];
      if (isMissing(key)) return;
      const bucket = buckets.get(key);
      if (bucket) bucket.push(row);
      else buckets.set(key, [row]);
    });
    return Array.from(buckets.keys())
      .sort(compareValues)
      .map((key) => Object.freeze([String(key), new Table(buckets.get(key), table.columns)]));
  }

  function round(value, digits) {
    const places = digits === undefined ? 0 : digits;
    if (!Number.isInteger(places) || places < 0) throw typeMismatch('Decimal places must be a non-negative integer');
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) return value;
      const factor = Math.pow(10, places);
      return Math.round(value * factor) / factor;
    }
    if (Array.isArray(value)) return value.map((item) => round(item, places));
    if (value instanceof Table || value === null || typeof value !== 'object') return value;
    if (value instanceof Map) return new Map(Array.from(value, ([key, item]) => [key, round(item, places)]));
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, round(item, places)]));
  }

  function divide(numerator, denominator) {
    const [a, b] = strict([numerator, denominator]);
    if (b === 0) throw divisionByZero('Division by zero');
    return a / b;
  }

  function normalize(value, ancestors) {
    if (value === null) return null;
    switch (typeof value) {
      case 'string':
      case 'boolean':
        return value;
      case 'number':
        return Number.isFinite(value) ? value : null;
      case 'object':
        break;
      default:
        throw unserializable('Result contains a value of type ' + typeof value);
    }
    if (ancestors.has(value)) throw unserializable('Result refers to itself');
    ancestors.add(value);
    let out;
    if (value instanceof Table) {
      out = { columns: value.columns.slice(), rows: value.rows.map((row) => normalize(row, ancestors)) };
    } else if (Array.isArray(value)) {
      out = Array.from(value, (item) => normalize(item === undefined ? null : item, ancestors));
    } else if (value instanceof Map) {
      out = Object.fromEntries(Array.from(value, ([key, item]) => [String(key), normalize(item, ancestors)]));
    } else if (value instanceof Set) {
      out = Array.from(value, (item) => normalize(item, ancestors));
    } else {
      out = Object.fromEntries(Object.entries(value).map(([key, item]) => [key, normalize(item, ancestors)]));
    }
    ancestors.delete(value);
    return out;
  }

  function serialize(value) {
    if (value === undefined) throw unserializable('result is undefined');
    return JSON.stringify(normalize(value, new Set()));
  }

  const lines = [];
  let written = 0;
  let truncated = false;

  function formatArg(arg) {
    if (typeof arg === 'string') return arg;
    try {
      const text = JSON.stringify(normalize(arg, new Set()));
      return text === undefined ? String(arg) : text;
    } catch (error) {
      return String(arg);
    }
  }

  function write(args) {
    if (truncated) return;
    const line = args.map(formatArg).join(' ');
    if (written + line.length + 1 > outputLimit) {
      truncated = true;
      return;
    }
    lines.push(line);
    written += line.length + 1;
  }

  function output() {
    const text = lines.map((line) => line + '\n').join('');
    return truncated ? text + '[output truncated]\n' : text;
  }

  const deepFreeze = (value) => {
    if (value !== null && typeof value === 'object') {
      Object.values(value).forEach(deepFreeze);
      Object.freeze(value);
    }
    return value;
  };

  const define = (name, value) =>
    Object.defineProperty(globalThis, name, { value, writable: false, enumerable: false, configurable: false });

  const inputs = new Set(JSON.parse(inputsJson));

  define('stats', Object.freeze({
    numeric, count, nunique, sum, mean, median, min, max, std, variance,
    mode, quantile, corr, describe, frequencies, groupBy, round, divide,
  }));
  define('console', Object.freeze({
    log: (...args) => write(args),
    info: (...args) => write(args),
    warn: (...args) => write(args),
    error: (...args) => write(args),
  }));
  if (inputs.has('df')) {
    const rows = JSON.parse(rowsJson).map((row) => Object.freeze(row));
    define('df', new Table(rows, JSON.parse(columnsJson)));
  }
  if (inputs.has('previous')) {
    define('previous', deepFreeze(JSON.parse(previousJson)));
  }

  return Object.freeze({ serialize, output });
})
`;
