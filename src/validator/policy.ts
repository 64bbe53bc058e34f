import type { RuleId } from '../ir/types.js';

/** Names the sandbox can bind from outside a fragment. */
export const BINDABLE_INPUTS: ReadonlySet<string> = new Set(['df', 'previous']);

/** Installed by the sandbox runtime in every context. */
export const RUNTIME_NAMESPACES: ReadonlySet<string> = new Set(['stats', 'console']);

export const GLOBAL_VALUES: ReadonlySet<string> = new Set([
  'Math',
  'Number',
  'String',
  'Boolean',
  'Object',
  'Array',
  'JSON',
  'Map',
  'Set',
  'Infinity',
  'NaN',
  'undefined',
  'isNaN',
  'isFinite',
  'parseFloat',
  'parseInt',
]);

/** Globals that hold plain values and may appear anywhere an expression can. */
export const PRIMITIVE_GLOBALS: ReadonlySet<string> = new Set(['Infinity', 'NaN', 'undefined']);

export const GLOBAL_CALLABLES: ReadonlySet<string> = new Set([
  'Number',
  'String',
  'Boolean',
  'isNaN',
  'isFinite',
  'parseFloat',
  'parseInt',
]);

export const CONSTRUCTABLE: ReadonlySet<string> = new Set(['Map', 'Set']);

// Every member reachable through a namespace, called or not.
export const NAMESPACE_MEMBERS: Readonly<Record<string, ReadonlySet<string>>> = {
  Math: new Set([
    'abs', 'sqrt', 'cbrt', 'pow', 'min', 'max', 'round', 'floor', 'ceil', 'trunc', 'sign',
    'log', 'log2', 'log10', 'log1p', 'exp', 'expm1', 'hypot',
    'PI', 'E', 'LN2', 'LN10', 'LOG2E', 'LOG10E', 'SQRT2', 'SQRT1_2',
  ]),
  Number: new Set([
    'isFinite', 'isNaN', 'isInteger', 'isSafeInteger', 'parseFloat', 'parseInt',
    'MAX_SAFE_INTEGER', 'MIN_SAFE_INTEGER', 'EPSILON', 'MAX_VALUE', 'MIN_VALUE',
    'POSITIVE_INFINITY', 'NEGATIVE_INFINITY',
  ]),
  Object: new Set(['keys', 'values', 'entries', 'fromEntries']),
  Array: new Set(['from', 'isArray', 'of']),
  JSON: new Set(['stringify', 'parse']),
  String: new Set<string>(),
  Boolean: new Set<string>(),
  Map: new Set<string>(),
  Set: new Set<string>(),
  stats: new Set([
    'numeric', 'count', 'nunique', 'sum', 'mean', 'median', 'min', 'max', 'std', 'variance',
    'mode', 'quantile', 'corr', 'describe', 'frequencies', 'groupBy', 'round', 'divide',
  ]),
  console: new Set(['log', 'info', 'warn', 'error']),
};

/** Methods callable on any value that is not a namespace. */
export const ALLOWED_METHODS: ReadonlySet<string> = new Set([
  // dataset tables
  'column', 'where', 'head', 'select',
  // arrays
  'map', 'filter', 'reduce', 'some', 'every', 'find', 'findIndex', 'includes', 'indexOf',
  'slice', 'concat', 'join', 'sort', 'reverse', 'flat', 'flatMap', 'at', 'forEach', 'push',
  'keys', 'values', 'entries',
  // maps and sets
  'get', 'set', 'has', 'add',
  // strings and numbers
  'toFixed', 'toPrecision', 'toString', 'toLowerCase', 'toUpperCase', 'trim', 'startsWith',
  'endsWith', 'split', 'padStart', 'padEnd', 'localeCompare',
]);

/** Methods that change their receiver; only allowed on fragment-local values. */
export const MUTATING_METHODS: ReadonlySet<string> = new Set(['sort', 'reverse', 'push', 'set', 'add']);

/** Property names that lead out of plain data into the realm's internals. */
export const BLOCKED_PROPERTIES: ReadonlySet<string> = new Set([
  'constructor',
  'prototype',
  '__proto__',
  '__defineGetter__',
  '__defineSetter__',
  '__lookupGetter__',
  '__lookupSetter__',
  'caller',
  'callee',
  'arguments',
]);

const FORBIDDEN: [RuleId, string[]][] = [
  [
    'filesystem-access',
    [
      'fs', 'readFile', 'readFileSync', 'writeFile', 'writeFileSync', 'appendFile', 'appendFileSync',
      'unlink', 'unlinkSync', 'rm', 'rmSync', 'rmdir', 'rmdirSync', 'mkdir', 'mkdirSync', 'readdir',
      'readdirSync', 'createReadStream', 'createWriteStream', 'open', 'openSync', '__dirname', '__filename',
    ],
  ],
  [
    'process-access',
    [
      'process', 'child_process', 'spawn', 'spawnSync', 'exec', 'execSync', 'execFile', 'execFileSync',
      'fork', 'kill', 'exit', 'abort', 'chdir', 'Worker',
    ],
  ],
  [
    'network-access',
    ['fetch', 'XMLHttpRequest', 'WebSocket', 'EventSource', 'http', 'https', 'net', 'dgram', 'dns', 'tls', 'axios', 'request'],
  ],
  ['dynamic-import', ['require', 'module', 'exports', 'importScripts']],
  [
    'dynamic-code',
    [
      'eval', 'Function', 'setTimeout', 'setInterval', 'setImmediate', 'queueMicrotask', 'WebAssembly',
      'Reflect', 'Proxy', 'Atomics', 'SharedArrayBuffer', 'Promise',
    ],
  ],
  ['global-access', ['globalThis', 'global', 'window', 'self', ...BLOCKED_PROPERTIES]],
];

export const FORBIDDEN_NAMES: ReadonlyMap<string, RuleId> = new Map(
  FORBIDDEN.flatMap(([ruleId, names]) => names.map((name): [string, RuleId] => [name, ruleId])),
);

// Prepended to every fragment both when it is parsed and when it runs, so the
// two agree on strictness and on script-only syntax such as `<!--` comments.
export const FRAGMENT_PRELUDE = "'use strict'; ";

export const LIMITS = Object.freeze({
  maxSourceLength: 20_000,
  maxNodes: 5_000,
  maxDepth: 64,
});
