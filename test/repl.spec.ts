import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { runRepl } from '../src/cli/repl.js';
import { TemplateCodeGenerator } from '../src/generator/generator.js';
import { MemoryHistoryStore } from '../src/history/store.js';
import { ExecutionSandbox } from '../src/sandbox/sandbox.js';
import { SessionController } from '../src/session/controller.js';
import { sampleDataset } from './helpers.js';

async function session(lines: string[]): Promise<{ output: string[]; controller: SessionController }> {
  const controller = new SessionController({
    generator: new TemplateCodeGenerator(),
    executor: new ExecutionSandbox(),
    history: new MemoryHistoryStore(),
    dataset: sampleDataset(),
    clock: () => new Date('2026-03-01T12:00:00.000Z'),
  });
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });

  input.end(lines.map((line) => `${line}\n`).join(''));
  await runRepl(controller, { input, output });
  await new Promise((resolve) => setImmediate(resolve));
  return { output: written.split('\n'), controller };
}

describe('runRepl', () => {
  it('answers questions and commands until exit', async () => {
    const { output, controller } = await session(['mean of column A', 'history', 'exit', 'median of column A']);

    expect(output[0]).toBe("Type a question, 'help' for commands or 'exit' to leave.");
    expect(output).toContain('statquery> 3');
    expect(output).toContain('statquery> #1  2026-03-01T12:00:00.000Z  [success]  mean of column A');
    expect(output).not.toContain('statquery> 2.5');
    expect(controller.getState()).toBe('terminated');
  });

  it('reports command errors and carries on', async () => {
    const { output, controller } = await session(['repeat 5', 'help']);

    expect(output).toContain('statquery> Error: No recorded turn #5');
    expect(output).toContain('Commands:');
    expect(controller.getState()).toBe('terminated');
  });
});
