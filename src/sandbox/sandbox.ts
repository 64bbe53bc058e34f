import { Worker, type ResourceLimits } from 'node:worker_threads';
import { z } from 'zod';
import type {
  Dataset,
  ExecutionOutcome,
  FailureKind,
  GeneratedCode,
  JsonValue,
  ValidationVerdict,
} from '../ir/types.js';
import { parseJson } from '../ir/json.js';
import { FRAGMENT_PRELUDE } from '../validator/policy.js';
import { validate as defaultValidate } from '../validator/validator.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { RUNTIME_SOURCE } from './runtime.js';
import { WORKER_SOURCE } from './worker.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_OUTPUT_LIMIT = 64 * 1024; // 64KB of captured console output
// The vm timeout covers the fragment; this covers worker start-up and serialization.
const TERMINATE_GRACE_MS = 500;

const DEFAULT_RESOURCE_LIMITS: ResourceLimits = {
  maxOldGenerationSizeMb: 256,
  maxYoungGenerationSizeMb: 32,
  stackSizeMb: 4,
};

export interface SandboxOptions {
  timeoutMs?: number;
  resourceLimits?: ResourceLimits;
  outputLimit?: number;
  /** Re-validation hook; defaults to the allow-list validator. */
  validate?: (code: GeneratedCode) => ValidationVerdict;
  logger?: Logger;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  /** Bound to `previous` when the fragment declares it. */
  previous?: JsonValue;
  signal?: AbortSignal;
}

const workerMessageSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), json: z.string(), stdout: z.string() }),
  z.object({
    ok: z.literal(false),
    name: z.string(),
    message: z.string(),
    code: z.string().optional(),
    stdout: z.string(),
  }),
]);

/**
 * Map an error raised inside the worker to an outcome. Names come from the
 * runtime's own errors or the realm's builtins; codes from Node.
 */
export function classifyFailure(name: string, message: string, code?: string, timeoutMs = DEFAULT_TIMEOUT_MS): ExecutionOutcome {
  if (code === 'ERR_SCRIPT_EXECUTION_TIMEOUT' || /Script execution timed out/.test(message)) {
    return { status: 'timeout', timeoutMs };
  }

  let kind: FailureKind;
  if (code === 'ERR_WORKER_OUT_OF_MEMORY') {
    kind = 'resource-exhausted';
  } else if (name === 'MissingColumnError') {
    kind = 'missing-column';
  } else if (name === 'DivisionByZeroError') {
    kind = 'division-by-zero';
  } else if (name === 'TypeMismatchError' || name === 'TypeError') {
    kind = 'type-mismatch';
  } else if (name === 'UnserializableResultError' || name === 'DataCloneError') {
    kind = 'unserializable-result';
  } else if (name === 'RangeError' && /call stack|Invalid array length|Invalid string length/i.test(message)) {
    kind = 'resource-exhausted';
  } else {
    kind = 'unclassified';
  }
  return { status: 'runtime-failure', kind, message: name === 'Error' || !name ? message : `${name}: ${message}` };
}

/**
 * Runs approved fragments in a worker thread, inside a fresh vm context.
 * Each call gets its own worker; nothing it does survives the call.
 */
export class ExecutionSandbox {
  private readonly timeoutMs: number;
  private readonly resourceLimits: ResourceLimits;
  private readonly outputLimit: number;
  private readonly check: (code: GeneratedCode) => ValidationVerdict;
  private readonly logger: Logger;
  private readonly serialized = new WeakMap<Dataset, { rowsJson: string; columnsJson: string }>();

  constructor(options: SandboxOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.resourceLimits = options.resourceLimits ?? DEFAULT_RESOURCE_LIMITS;
    this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
    this.check = options.validate ?? defaultValidate;
    this.logger = componentLogger(options.logger, 'sandbox');
  }

  private serialize(dataset: Dataset): { rowsJson: string; columnsJson: string } {
    let cached = this.serialized.get(dataset);
    if (!cached) {
      cached = {
        rowsJson: JSON.stringify(dataset.rows),
        columnsJson: JSON.stringify(dataset.columns.map((column) => column.name)),
      };
      this.serialized.set(dataset, cached);
    }
    return cached;
  }

  /** Never rejects: every failure is an outcome. */
  async execute(code: GeneratedCode, dataset: Dataset | null, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const verdict = this.check(code);
    if (!verdict.approved) {
      this.logger.warn('Refusing unapproved fragment', { rules: verdict.violations.map((v) => v.ruleId) });
      return { status: 'rejected', violations: verdict.violations };
    }

    if (code.declaredInputs.has('df') && dataset === null) {
      return { status: 'runtime-failure', kind: 'dataset-error', message: 'No dataset is loaded' };
    }
    if (options.signal?.aborted) {
      return { status: 'runtime-failure', kind: 'interrupted', message: 'Execution was interrupted' };
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const data = dataset ? this.serialize(dataset) : { rowsJson: '[]', columnsJson: '[]' };
    const workerData = {
      runtimeSource: RUNTIME_SOURCE,
      source: FRAGMENT_PRELUDE + code.source,
      rowsJson: data.rowsJson,
      columnsJson: data.columnsJson,
      previousJson: JSON.stringify(options.previous ?? null),
      inputsJson: JSON.stringify([...code.declaredInputs]),
      outputLimit: this.outputLimit,
      timeoutMs,
    };

    return new Promise<ExecutionOutcome>((resolve) => {
      const started = Date.now();
      let settled = false;
      let worker: Worker;

      const finish = (outcome: ExecutionOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        worker.terminate().catch((error: unknown) => {
          this.logger.warn('Worker did not terminate cleanly', { error: errorMessage(error) });
        });
        this.logger.debug('Fragment finished', { status: outcome.status, durationMs: Date.now() - started });
        resolve(outcome);
      };

      const onAbort = (): void => {
        finish({ status: 'runtime-failure', kind: 'interrupted', message: 'Execution was interrupted' });
      };

      try {
        worker = new Worker(WORKER_SOURCE, { eval: true, workerData, resourceLimits: this.resourceLimits });
      } catch (error) {
        resolve({ status: 'runtime-failure', kind: 'worker-crash', message: errorMessage(error) });
        return;
      }

      const timer = setTimeout(() => {
        this.logger.warn('Terminating fragment after timeout', { timeoutMs });
        finish({ status: 'timeout', timeoutMs });
      }, timeoutMs + TERMINATE_GRACE_MS);
      options.signal?.addEventListener('abort', onAbort, { once: true });

      worker.on('message', (raw: unknown) => {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          finish({ status: 'runtime-failure', kind: 'worker-crash', message: 'Worker sent an unreadable message' });
          return;
        }
        const message = parsed.data;
        if (!message.ok) {
          finish(classifyFailure(message.name, message.message, message.code, timeoutMs));
          return;
        }
        try {
          finish({ status: 'success', value: parseJson(message.json), stdout: message.stdout });
        } catch (error) {
          finish({ status: 'runtime-failure', kind: 'unserializable-result', message: errorMessage(error) });
        }
      });

      worker.on('error', (error: Error) => {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        finish(classifyFailure(error.name, error.message, code, timeoutMs));
      });

      worker.on('exit', (exitCode: number) => {
        finish({ status: 'runtime-failure', kind: 'worker-crash', message: `Worker exited with code ${exitCode}` });
      });
    });
  }
}
