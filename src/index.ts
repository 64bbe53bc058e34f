export { StatQuery, unwrapOutcome, HISTORY_FILE_NAME } from './StatQuery.js';
export type { StatQueryOptions, RunOptions } from './StatQuery.js';

export * from './ir/types.js';
export type { AnalysisPlan } from './ir/plan.js';

export { DatasetLoader } from './dataset/loader.js';
export { ReaderRegistry, defaultRegistry } from './dataset/readers.js';
export { buildDataset, schemaOf } from './dataset/schema.js';

export { structure } from './parser/structurer.js';
export { TemplateCodeGenerator } from './generator/generator.js';
export type { CodeGenerator } from './generator/generator.js';
export { validate, validateSource } from './validator/validator.js';
export { ExecutionSandbox, DEFAULT_TIMEOUT_MS } from './sandbox/sandbox.js';
export type { SandboxOptions, ExecuteOptions } from './sandbox/sandbox.js';

export { HistoryStore, MemoryHistoryStore } from './history/store.js';
export type { HistoryRepository } from './history/store.js';
export { createContext, applyTurn, withDataset, snapshotContext } from './session/context.js';
export { SessionController } from './session/controller.js';
export type { CommandResult, ControllerState, SessionControllerOptions, TurnResult } from './session/controller.js';

export { explainPlan } from './explain/explainer.js';
export { ConfigStore, DEFAULT_CONFIG } from './config/config.js';
export type { StatQueryConfig } from './config/config.js';
export { initializeProject } from './project/initializer.js';
export { GitSnapshotter } from './vcs/git.js';
export type { SnapshotHook } from './vcs/git.js';
export { createLogger } from './utils/logger.js';
export * from './utils/errors.js';
