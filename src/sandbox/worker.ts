// Evaluated as the body of a worker thread (`eval: true`); CommonJS scope.
export const WORKER_SOURCE = String.raw`
'use strict';
const { parentPort, workerData } = require('node:worker_threads');
const vm = require('node:vm');

function describeError(error) {
  if (error !== null && typeof error === 'object') {
    return {
      name: String(error.name),
      message: String(error.message),
      code: typeof error.code === 'string' ? error.code : undefined,
    };
  }
  return { name: 'Error', message: String(error), code: undefined };
}

let runtime = null;
try {
  const context = vm.createContext({}, {
    name: 'statquery-fragment',
    codeGeneration: { strings: false, wasm: false },
  });
  const install = new vm.Script(workerData.runtimeSource, { filename: 'statquery-runtime.js' }).runInContext(context);
  runtime = install(
    workerData.rowsJson,
    workerData.columnsJson,
    workerData.previousJson,
    workerData.inputsJson,
    workerData.outputLimit,
  );

  const options = { timeout: workerData.timeoutMs, displayErrors: false };
  new vm.Script(workerData.source, { filename: 'fragment.js' }).runInContext(context, options);
  const result = new vm.Script('result', { filename: 'result.js' }).runInContext(context, options);
  const json = runtime.serialize(result);
  parentPort.postMessage({ ok: true, json, stdout: runtime.output() });
} catch (error) {
  const failure = describeError(error);
  parentPort.postMessage({
    ok: false,
    name: failure.name,
    message: failure.message,
    code: failure.code,
    stdout: runtime ? runtime.output() : '',
  });
}
`;
