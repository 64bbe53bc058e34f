import { describe, it, expect, vi } from 'vitest';
import { TemplateCodeGenerator, type CodeGenerator } from '../src/generator/generator.js';
import { MemoryHistoryStore, type HistoryRepository } from '../src/history/store.js';
import { ExecutionSandbox } from '../src/sandbox/sandbox.js';
import { SessionController, type ControllerState, type SessionControllerOptions } from '../src/session/controller.js';
import {
  DatasetError,
  PersistenceError,
  SessionBusyError,
  SessionClosedError,
  StructuringError,
} from '../src/utils/errors.js';
import type { Dataset } from '../src/ir/types.js';
import { busyLoopSource, fixedGenerator, sampleDataset } from './helpers.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function setup(overrides: Partial<SessionControllerOptions> = {}) {
  const dataset = sampleDataset();
  const history = new MemoryHistoryStore();
  const snapshot = vi.fn(async (_message: string) => true);
  const loader = { load: vi.fn(async (_path: string): Promise<Dataset> => sampleDataset()) };
  const controller = new SessionController({
    generator: new TemplateCodeGenerator(),
    executor: new ExecutionSandbox(),
    history,
    loader,
    dataset,
    snapshot: { snapshot },
    sessionId: 'session-1',
    clock: () => NOW,
    ...overrides,
  });
  controller.start();
  return { controller, dataset, history, snapshot, loader };
}

describe('SessionController', () => {
  it('answers a question and records the turn', async () => {
    const { controller, history, snapshot } = setup();
    const turn = await controller.ask('mean of column A');

    expect(turn.outcome).toEqual({ status: 'success', value: 3, stdout: '' });
    expect(turn.entry).toEqual({
      sequence: 1,
      query: 'mean of column A',
      code: turn.code?.source,
      timestamp: '2026-03-01T12:00:00.000Z',
      context: {
        dataset: { name: 'sample', source: 'sample.csv', rowCount: 4, columns: ['A', 'B', 'C'] },
        requirements: {},
        previous: null,
      },
      outcome: { status: 'success', value: 3 },
      generator: { name: 'template', version: '1.0.0' },
      session: 'session-1',
    });
    expect(await history.count()).toBe(1);
    expect(snapshot).toHaveBeenCalledWith('Analysis: mean of column A');
    expect(controller.getState()).toBe('awaiting-query');
    expect(controller.getContext().lastQuery).toBe('mean of column A');
  });

  it('records a rejected request without running anything', async () => {
    const execute = vi.fn();
    const { controller, history, snapshot } = setup({ executor: { execute } });
    const turn = await controller.ask('delete all files in /tmp');

    expect(turn.outcome).toEqual({
      status: 'rejected',
      violations: [
        {
          ruleId: 'filesystem-access',
          offendingToken: 'delete',
          message: 'Request not supported: file system operations are not supported ("delete")',
        },
      ],
    });
    expect(turn.entry.code).toBe('');
    expect(await history.count()).toBe(1);
    expect(execute).not.toHaveBeenCalled();
    expect(snapshot).not.toHaveBeenCalled();
  });

  it('carries requirements into later turns', async () => {
    const { controller, history } = setup();
    await controller.ask('mean of A, round to 2 decimals');
    const second = await controller.ask('median of C');

    expect(second.code?.source.trimEnd().split('\n').at(-1)).toBe('const result = stats.round(value, 2);');
    expect(second.outcome).toEqual({ status: 'success', value: 4, stdout: '' });
    expect(second.entry.context).toEqual({
      dataset: { name: 'sample', source: 'sample.csv', rowCount: 4, columns: ['A', 'B', 'C'] },
      requirements: { precision: 2 },
      previous: { query: 'mean of A, round to 2 decimals', status: 'success' },
    });
    expect(controller.getContext().requirements).toEqual({ precision: 2 });
    expect((await history.read()).map((e) => e.sequence)).toEqual([1, 2]);
  });

  it('records which query a failed previous turn belonged to', async () => {
    const { controller } = setup();
    await controller.ask('mean of column A');
    const failed = await controller.ask('mean of column Z');
    const third = await controller.ask('median of column A');

    expect(failed.outcome.status).toBe('rejected');
    expect(third.entry.context.previous).toEqual({ query: 'mean of column Z', status: 'rejected' });
  });

  it('leaves the context alone when a turn times out', async () => {
    const { controller, dataset, snapshot } = setup({
      generator: fixedGenerator(busyLoopSource()),
      requirements: { precision: 1 },
      timeoutMs: 200,
    });
    const turn = await controller.ask('count everything, round to 3 decimals');

    expect(turn.outcome).toEqual({ status: 'timeout', timeoutMs: 200 });
    expect(turn.entry.outcome).toEqual({ status: 'timeout', timeoutMs: 200 });
    const context = controller.getContext();
    expect(context.requirements).toEqual({ precision: 1 });
    expect(context.dataset).toBe(dataset);
    expect(context.lastResult).toEqual({ status: 'timeout', timeoutMs: 200 });
    expect(snapshot).not.toHaveBeenCalled();
  });

  it('records a dataset load failure without generating code', async () => {
    const generate = vi.fn();
    const generator: CodeGenerator = { info: { name: 'spy', version: '1' }, generate };
    const load = vi.fn(async (path: string): Promise<Dataset> => {
      throw new DatasetError(`File not found: ${path}`, 'not-found', path);
    });
    const { controller } = setup({ generator, loader: { load } });
    const turn = await controller.ask('mean of column A', { datasetPath: 'missing.csv' });

    expect(turn.outcome).toEqual({ status: 'runtime-failure', kind: 'dataset-error', message: 'File not found: missing.csv' });
    expect(turn.entry.code).toBe('');
    expect(turn.entry.generator).toEqual({ name: 'spy', version: '1' });
    expect(generate).not.toHaveBeenCalled();
  });

  it('cancels the turn in flight', async () => {
    const { controller } = setup({ generator: fixedGenerator(busyLoopSource()) });
    const states: ControllerState[] = [];
    controller.onStateChange((state) => {
      states.push(state);
      if (state === 'executing') setTimeout(() => controller.cancel(), 50);
    });

    const turn = await controller.ask('spin');

    expect(turn.outcome).toEqual({ status: 'runtime-failure', kind: 'interrupted', message: 'Turn was cancelled' });
    expect(states).toEqual(['structuring', 'generating', 'validating', 'executing', 'interrupted', 'recording', 'awaiting-query']);
    expect(controller.cancel()).toBe(false);
  });

  it('refuses a second turn while one is running', async () => {
    const { controller } = setup();
    const first = controller.ask('mean of column A');

    await expect(controller.ask('median of column A')).rejects.toBeInstanceOf(SessionBusyError);
    expect((await first).entry.sequence).toBe(1);
  });

  it('handles commands without recording them', async () => {
    const { controller, history } = setup();

    expect(await controller.handle('   ')).toEqual({ type: 'empty' });
    const help = await controller.handle('help');
    expect(help.type === 'help' && help.text).toContain('Commands:');
    expect(await controller.handle('history')).toEqual({ type: 'history', entries: [] });
    expect(await history.count()).toBe(0);

    expect(await controller.handle('exit')).toEqual({ type: 'exit' });
    expect(controller.getState()).toBe('terminated');
    await expect(controller.ask('mean of column A')).rejects.toBeInstanceOf(SessionClosedError);
  });

  it('reloads the dataset on request', async () => {
    const { controller, loader } = setup();
    await controller.ask('mean of column A');
    const result = await controller.handle('load other.csv');

    expect(loader.load).toHaveBeenCalledWith('other.csv');
    expect(result.type === 'loaded' && result.schema.name).toBe('sample');
    expect(controller.getContext().lastResult).toBeNull();
  });

  it('repeats a recorded turn', async () => {
    const { controller } = setup();
    await controller.ask('mean of column A');
    const repeated = await controller.handle('repeat 1');

    expect(repeated.type === 'turn' && repeated.turn.entry).toMatchObject({ sequence: 2, query: 'mean of column A' });
    await expect(controller.repeat(9)).rejects.toBeInstanceOf(StructuringError);
  });

  it('propagates a failure to record', async () => {
    const history: HistoryRepository = {
      read: async () => [],
      count: async () => 0,
      append: async () => {
        throw new PersistenceError('disk full', 'history.json', 'write');
      },
      bulkAppend: async () => [],
    };
    const { controller } = setup({ history });

    await expect(controller.ask('mean of column A')).rejects.toBeInstanceOf(PersistenceError);
    expect(controller.getState()).toBe('awaiting-query');
    expect(controller.isBusy()).toBe(false);
  });

  it('keeps the answer when the snapshot fails', async () => {
    const snapshot = vi.fn(async (_message: string): Promise<boolean> => {
      throw new Error('git is not installed');
    });
    const { controller } = setup({ snapshot: { snapshot } });

    const turn = await controller.ask('mean of column A');
    expect(turn.outcome.status).toBe('success');
    expect(snapshot).toHaveBeenCalledTimes(1);
  });
});
