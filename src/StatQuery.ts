import * as path from 'path';
import { DatasetLoader } from './dataset/loader.js';
import { explainPlan } from './explain/explainer.js';
import { TemplateCodeGenerator, type CodeGenerator } from './generator/generator.js';
import { HistoryStore, MemoryHistoryStore, type HistoryRepository } from './history/store.js';
import type { Dataset, ExecutionOutcome, JsonValue } from './ir/types.js';
import { ExecutionSandbox } from './sandbox/sandbox.js';
import { SessionController, type TurnResult } from './session/controller.js';
import type { SnapshotHook } from './vcs/git.js';
import {
  ExecutionRuntimeFailure,
  ExecutionTimeout,
  GenerationError,
  ValidationRejection,
} from './utils/errors.js';
import { silentLogger, type Logger } from './utils/logger.js';

export const HISTORY_FILE_NAME = 'history.json';

export interface StatQueryOptions {
  /** Directory holding the history file; required unless `historyFile` is given or history is off. */
  home?: string;
  historyFile?: string;
  saveHistory?: boolean;
  timeoutMs?: number;
  generator?: CodeGenerator;
  snapshot?: SnapshotHook;
  logger?: Logger;
}

export interface RunOptions {
  query: string;
  /** Loaded before the turn; a load failure is recorded as the turn's outcome. */
  datasetPath?: string;
  dataset?: Dataset;
}

/** The value of a successful outcome; any other outcome is thrown as its error. */
export function unwrapOutcome(outcome: ExecutionOutcome): JsonValue {
  switch (outcome.status) {
    case 'success':
      return outcome.value;
    case 'timeout':
      throw new ExecutionTimeout(outcome.timeoutMs);
    case 'runtime-failure':
      throw new ExecutionRuntimeFailure(outcome.message, outcome.kind);
    case 'rejected':
      throw new ValidationRejection(outcome.violations);
  }
}

export class StatQuery {
  readonly loader: DatasetLoader;
  readonly sandbox: ExecutionSandbox;
  readonly generator: CodeGenerator;
  readonly history: HistoryRepository;
  private readonly options: StatQueryOptions;
  private readonly logger: Logger;

  constructor(options: StatQueryOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger();
    this.loader = new DatasetLoader({ logger: this.logger });
    this.sandbox = new ExecutionSandbox({ timeoutMs: options.timeoutMs, logger: this.logger });
    this.generator = options.generator ?? new TemplateCodeGenerator({ logger: this.logger });
    this.history = StatQuery.openHistory(options, this.logger);
  }

  private static openHistory(options: StatQueryOptions, logger: Logger): HistoryRepository {
    if (options.saveHistory === false) return new MemoryHistoryStore();
    const file = options.historyFile ?? (options.home ? path.join(options.home, HISTORY_FILE_NAME) : undefined);
    return file ? new HistoryStore(file, { logger }) : new MemoryHistoryStore();
  }

  /** A new interactive session sharing this instance's history and sandbox. */
  session(dataset: Dataset | null = null): SessionController {
    return new SessionController({
      generator: this.generator,
      executor: this.sandbox,
      history: this.history,
      loader: this.loader,
      dataset,
      timeoutMs: this.options.timeoutMs,
      snapshot: this.options.snapshot,
      logger: this.logger,
    });
  }

  /** One non-interactive turn in a session of its own. */
  async run(options: RunOptions): Promise<TurnResult> {
    const session = this.session(options.dataset ?? null);
    session.start();
    try {
      return await session.ask(options.query, { datasetPath: options.datasetPath });
    } finally {
      session.end();
    }
  }

  /** Like `run`, returning only the answer. */
  async evaluate(options: RunOptions): Promise<JsonValue> {
    const turn = await this.run(options);
    return unwrapOutcome(turn.outcome);
  }

  /** Plain-language account of how the template generator read a turn's query. */
  explain(turn: TurnResult): string | null {
    if (!turn.query || !(this.generator instanceof TemplateCodeGenerator)) return null;
    try {
      return explainPlan(this.generator.plan(turn.query));
    } catch (error) {
      if (error instanceof GenerationError) return null;
      throw error;
    }
  }
}
