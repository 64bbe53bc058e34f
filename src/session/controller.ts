import { v4 as uuidv4 } from 'uuid';
import type {
  Dataset,
  DatasetSchema,
  ExecutionOutcome,
  GeneratedCode,
  HistoryEntry,
  NewHistoryEntry,
  Requirements,
  SessionContext,
  StructuredQuery,
  ValidationVerdict,
} from '../ir/types.js';
import { schemaOf } from '../dataset/schema.js';
import type { CodeGenerator } from '../generator/generator.js';
import type { HistoryRepository } from '../history/store.js';
import { structure } from '../parser/structurer.js';
import type { ExecuteOptions } from '../sandbox/sandbox.js';
import { validate as defaultValidate } from '../validator/validator.js';
import type { SnapshotHook } from '../vcs/git.js';
import {
  DatasetError,
  ExecutionRuntimeFailure,
  ExecutionTimeout,
  GenerationError,
  PersistenceError,
  SessionBusyError,
  SessionClosedError,
  StructuringError,
  ValidationRejection,
  errorMessage,
} from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import { applyTurn, createContext, snapshotContext, summarizeOutcome, withDataset } from './context.js';

export type ControllerState =
  | 'idle'
  | 'awaiting-query'
  | 'structuring'
  | 'generating'
  | 'validating'
  | 'executing'
  | 'interrupted'
  | 'recording'
  | 'terminated';

const TRANSITIONS: Record<ControllerState, readonly ControllerState[]> = {
  idle: ['awaiting-query', 'terminated'],
  // a dataset load failure goes straight to recording
  'awaiting-query': ['structuring', 'interrupted', 'recording', 'terminated'],
  structuring: ['generating', 'interrupted', 'recording'],
  generating: ['validating', 'interrupted', 'recording'],
  validating: ['executing', 'interrupted', 'recording'],
  executing: ['interrupted', 'recording'],
  interrupted: ['recording'],
  recording: ['awaiting-query'],
  terminated: [],
};

const CANCELLABLE: ReadonlySet<ControllerState> = new Set(['structuring', 'generating', 'validating', 'executing']);

export const HELP_TEXT = [
  'Ask a question about the loaded dataset, for example:',
  '  mean of column price',
  '  median income by region where age > 30, round to 2 decimals',
  '  correlation between height and weight',
  '  top 5 most common city',
  'Commands:',
  '  help            show this text',
  '  history [n]     list the last n recorded turns',
  '  repeat [n]      run turn n again (default: the latest)',
  '  load <path>     replace the dataset',
  '  exit            end the session',
].join('\n');

/** Runs a fragment; the execution sandbox is the production implementation. */
export interface FragmentExecutor {
  execute(code: GeneratedCode, dataset: Dataset | null, options?: ExecuteOptions): Promise<ExecutionOutcome>;
}

export interface DatasetSource {
  load(filePath: string): Promise<Dataset>;
}

export interface SessionControllerOptions {
  generator: CodeGenerator;
  executor: FragmentExecutor;
  history: HistoryRepository;
  loader?: DatasetSource;
  validate?: (code: GeneratedCode) => ValidationVerdict;
  dataset?: Dataset | null;
  requirements?: Requirements;
  timeoutMs?: number;
  snapshot?: SnapshotHook;
  sessionId?: string;
  clock?: () => Date;
  logger?: Logger;
}

export interface TurnResult {
  entry: HistoryEntry;
  outcome: ExecutionOutcome;
  query: StructuredQuery | null;
  code: GeneratedCode | null;
}

export type CommandResult =
  | { type: 'turn'; turn: TurnResult }
  | { type: 'help'; text: string }
  | { type: 'history'; entries: HistoryEntry[] }
  | { type: 'loaded'; schema: DatasetSchema }
  | { type: 'exit' }
  | { type: 'empty' };

export type StateListener = (state: ControllerState, previous: ControllerState) => void;

interface PipelineResult {
  query: StructuredQuery | null;
  code: GeneratedCode | null;
  outcome: ExecutionOutcome;
}

const INTERRUPTED: ExecutionOutcome = Object.freeze({
  status: 'runtime-failure',
  kind: 'interrupted',
  message: 'Turn was cancelled',
});

/**
 * Sequences one turn at a time through structuring, generation, validation,
 * execution and recording. Per-turn failures become recorded outcomes; only
 * a failure to record propagates.
 */
export class SessionController {
  readonly sessionId: string;
  private state: ControllerState = 'idle';
  private context: SessionContext;
  private current: { promise: Promise<TurnResult>; abort: AbortController } | null = null;
  private reloading: Promise<unknown> | null = null;
  private readonly listeners = new Set<StateListener>();
  private readonly generator: CodeGenerator;
  private readonly executor: FragmentExecutor;
  private readonly store: HistoryRepository;
  private readonly loader?: DatasetSource;
  private readonly check: (code: GeneratedCode) => ValidationVerdict;
  private readonly timeoutMs?: number;
  private readonly snapshotHook?: SnapshotHook;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: SessionControllerOptions) {
    this.generator = options.generator;
    this.executor = options.executor;
    this.store = options.history;
    this.loader = options.loader;
    this.check = options.validate ?? defaultValidate;
    this.timeoutMs = options.timeoutMs;
    this.snapshotHook = options.snapshot;
    this.clock = options.clock ?? (() => new Date());
    this.sessionId = options.sessionId ?? uuidv4();
    this.logger = componentLogger(options.logger, 'session').child({ session: this.sessionId });
    this.context = createContext(options.dataset ?? null, options.requirements ?? {});
  }

  getState(): ControllerState {
    return this.state;
  }

  getContext(): SessionContext {
    return this.context;
  }

  isBusy(): boolean {
    return this.current !== null || this.reloading !== null;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(next: ControllerState): void {
    const previous = this.state;
    if (previous === next) return;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid session transition ${previous} -> ${next}`);
    }
    this.state = next;
    this.logger.debug('State changed', { from: previous, to: next });
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  private assertOpen(): void {
    if (this.state === 'terminated') throw new SessionClosedError();
  }

  start(): void {
    this.assertOpen();
    if (this.state === 'idle') this.transition('awaiting-query');
  }

  end(): void {
    if (this.state === 'terminated') return;
    if (this.isBusy()) throw new SessionBusyError();
    this.transition('terminated');
    this.logger.info('Session ended');
  }

  /** Interrupt the turn in flight. Returns false when there is nothing to cancel. */
  cancel(): boolean {
    if (!this.current || this.current.abort.signal.aborted) return false;
    this.current.abort.abort();
    if (CANCELLABLE.has(this.state)) this.transition('interrupted');
    this.logger.info('Turn cancelled');
    return true;
  }

  async history(limit?: number): Promise<HistoryEntry[]> {
    const entries = await this.store.read();
    return limit === undefined ? entries : entries.slice(Math.max(0, entries.length - limit));
  }

  /** Dispatch a line of input: a built-in command, or a query. */
  async handle(input: string): Promise<CommandResult> {
    this.assertOpen();
    const text = input.trim();
    if (text === '') return { type: 'empty' };

    const [word, ...rest] = text.split(/\s+/);
    const command = word.toLowerCase();
    const argument = rest.join(' ');

    if (command === 'exit' || command === 'quit') {
      if (rest.length === 0) {
        this.end();
        return { type: 'exit' };
      }
    } else if (command === 'help') {
      if (rest.length === 0) return { type: 'help', text: HELP_TEXT };
    } else if (command === 'history') {
      if (rest.length === 0) return { type: 'history', entries: await this.history() };
      if (/^\d+$/.test(argument)) return { type: 'history', entries: await this.history(Number(argument)) };
    } else if (command === 'repeat') {
      if (rest.length === 0) return { type: 'turn', turn: await this.repeat() };
      if (/^\d+$/.test(argument)) return { type: 'turn', turn: await this.repeat(Number(argument)) };
    } else if (command === 'load' && argument !== '') {
      const dataset = await this.reload(argument);
      return { type: 'loaded', schema: schemaOf(dataset) };
    }

    return { type: 'turn', turn: await this.ask(text) };
  }

  /** Re-run a recorded query (default: the latest) as a new turn. */
  async repeat(sequence?: number): Promise<TurnResult> {
    const entries = await this.store.read();
    const target = sequence === undefined ? entries.at(-1) : entries.find((entry) => entry.sequence === sequence);
    if (!target) {
      throw new StructuringError(
        sequence === undefined ? 'No recorded turn to repeat' : `No recorded turn #${sequence}`,
        'unknown-turn',
      );
    }
    return this.ask(target.query);
  }

  /** Replace the dataset. Waits for the turn in flight; records nothing. */
  async reload(filePath: string): Promise<Dataset> {
    this.assertOpen();
    if (!this.loader) throw new DatasetError('No dataset loader configured', 'no-loader', filePath);
    if (this.reloading) throw new SessionBusyError();

    const task = (async () => {
      if (this.current) await Promise.allSettled([this.current.promise]);
      const dataset = await this.loadOrThrow(filePath);
      this.context = withDataset(this.context, dataset);
      this.logger.info('Dataset loaded', { name: dataset.name, rows: dataset.rowCount });
      return dataset;
    })();
    this.reloading = task;
    try {
      return await task;
    } finally {
      this.reloading = null;
    }
  }

  private async loadOrThrow(filePath: string): Promise<Dataset> {
    if (!this.loader) throw new DatasetError('No dataset loader configured', 'no-loader', filePath);
    try {
      return await this.loader.load(filePath);
    } catch (error) {
      if (error instanceof DatasetError) throw error;
      throw new DatasetError(`Could not load ${filePath}: ${errorMessage(error)}`, 'load-failed', filePath);
    }
  }

  /**
   * Run one turn. With `datasetPath` the dataset is loaded first; a load
   * failure is recorded without consulting the generator.
   */
  async ask(rawText: string, options: { datasetPath?: string } = {}): Promise<TurnResult> {
    this.assertOpen();
    if (this.isBusy()) throw new SessionBusyError();
    this.start();

    const abort = new AbortController();
    const promise = this.runTurn(rawText, options.datasetPath, abort.signal);
    this.current = { promise, abort };
    try {
      return await promise;
    } finally {
      this.current = null;
    }
  }

  private async runTurn(rawText: string, datasetPath: string | undefined, signal: AbortSignal): Promise<TurnResult> {
    let result: PipelineResult;

    if (datasetPath !== undefined) {
      try {
        const dataset = await this.loadOrThrow(datasetPath);
        this.context = withDataset(this.context, dataset);
      } catch (error) {
        this.logger.warn('Dataset load failed', { path: datasetPath, error: errorMessage(error) });
        return this.record(rawText, { query: null, code: null, outcome: this.toOutcome(error) });
      }
    }

    if (signal.aborted) {
      result = { query: null, code: null, outcome: INTERRUPTED };
    } else {
      result = await this.pipeline(rawText, signal);
    }
    return this.record(rawText, result);
  }

  private async pipeline(rawText: string, signal: AbortSignal): Promise<PipelineResult> {
    let query: StructuredQuery | null = null;
    let code: GeneratedCode | null = null;

    try {
      this.transition('structuring');
      query = structure(rawText, this.context);

      this.transition('generating');
      code = this.generator.generate(query);

      this.transition('validating');
      const verdict = this.check(code);
      if (!verdict.approved) {
        throw new ValidationRejection(verdict.violations);
      }

      this.transition('executing');
      const options: ExecuteOptions = { signal };
      if (this.timeoutMs !== undefined) options.timeoutMs = this.timeoutMs;
      if (query.previous) options.previous = query.previous.value;
      const outcome = await this.executor.execute(code, this.context.dataset, options);
      return { query, code, outcome: signal.aborted ? INTERRUPTED : outcome };
    } catch (error) {
      return { query, code, outcome: signal.aborted ? INTERRUPTED : this.toOutcome(error) };
    }
  }

  private toOutcome(error: unknown): ExecutionOutcome {
    if (error instanceof ValidationRejection) {
      return { status: 'rejected', violations: error.violations };
    }
    if (error instanceof StructuringError) {
      return { status: 'rejected', violations: [{ ruleId: error.code, offendingToken: '', message: error.message }] };
    }
    if (error instanceof GenerationError) {
      return {
        status: 'rejected',
        violations: [{ ruleId: error.ruleId, offendingToken: error.offendingToken, message: error.message }],
      };
    }
    if (error instanceof ExecutionTimeout) {
      return { status: 'timeout', timeoutMs: error.timeoutMs };
    }
    if (error instanceof ExecutionRuntimeFailure) {
      return { status: 'runtime-failure', kind: error.kind, message: error.message };
    }
    if (error instanceof DatasetError) {
      return { status: 'runtime-failure', kind: 'dataset-error', message: error.message };
    }
    this.logger.error('Unexpected error during turn', { error: errorMessage(error) });
    return { status: 'runtime-failure', kind: 'unclassified', message: errorMessage(error) };
  }

  private async record(rawText: string, result: PipelineResult): Promise<TurnResult> {
    const { query, code, outcome } = result;
    this.transition('recording');

    const entry: NewHistoryEntry = {
      query: query?.queryText ?? rawText.replace(/\s+/g, ' ').trim(),
      code: code?.source ?? '',
      timestamp: this.clock().toISOString(),
      context: snapshotContext(this.context, query ?? undefined),
      outcome: summarizeOutcome(outcome),
      generator: { ...(code?.generator ?? this.generator.info) },
      session: this.sessionId,
    };

    let stored: HistoryEntry;
    try {
      stored = await this.store.append(entry);
    } catch (error) {
      this.transition('awaiting-query');
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Could not record turn: ${errorMessage(error)}`, '', 'write', error);
      this.logger.error('Turn could not be recorded', { error: failure.message, path: failure.path });
      throw failure;
    }

    this.context = applyTurn(this.context, query, outcome, stored.query);
    this.transition('awaiting-query');
    this.logger.info('Turn recorded', { sequence: stored.sequence, status: outcome.status });

    if (outcome.status === 'success' && this.snapshotHook) {
      await this.runSnapshot(stored.query);
    }
    return { entry: stored, outcome, query, code };
  }

  private async runSnapshot(query: string): Promise<void> {
    if (!this.snapshotHook) return;
    try {
      await this.snapshotHook.snapshot(`Analysis: ${query}`);
    } catch (error) {
      this.logger.warn('Snapshot failed', { error: errorMessage(error) });
    }
  }
}
