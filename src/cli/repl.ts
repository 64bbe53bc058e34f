import * as readline from 'node:readline';
import type { SessionController } from '../session/controller.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { renderHistory, renderOutcome, renderSchema, type OutputFormat } from './render.js';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  format?: OutputFormat;
  prompt?: string;
  /** Print each turn's generated code before its answer. */
  showCode?: boolean;
}

/**
 * Interactive loop over a session. Ctrl-C cancels the turn in flight, or
 * closes the session when idle. Resolves once the session has ended.
 */
export async function runRepl(controller: SessionController, options: ReplOptions): Promise<void> {
  const format = options.format ?? 'text';
  const write = (text: string) => {
    options.output.write(text.endsWith('\n') ? text : `${text}\n`);
  };
  const terminal = 'isTTY' in options.output && options.output.isTTY === true;
  const rl = readline.createInterface({ input: options.input, output: options.output, terminal });
  rl.setPrompt(options.prompt ?? 'statquery> ');

  rl.on('SIGINT', () => {
    if (!controller.cancel()) rl.close();
  });

  controller.start();
  write("Type a question, 'help' for commands or 'exit' to leave.");
  rl.prompt();

  try {
    for await (const line of rl) {
      try {
        const result = await controller.handle(line);
        switch (result.type) {
          case 'exit':
            return;
          case 'help':
            write(result.text);
            break;
          case 'history':
            write(renderHistory(result.entries, format));
            break;
          case 'loaded':
            write(renderSchema(result.schema));
            break;
          case 'turn':
            if (options.showCode && result.turn.code) write(result.turn.code.source);
            write(renderOutcome(result.turn.outcome, format));
            break;
          case 'empty':
            break;
        }
      } catch (error) {
        if (error instanceof PersistenceError) throw error;
        write(`Error: ${errorMessage(error)}`);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    if (controller.getState() !== 'terminated' && !controller.isBusy()) controller.end();
  }
}
