#!/usr/bin/env node
import dotenv from 'dotenv';
import * as path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ConfigStore, parseConfigValue, type StatQueryConfig } from './config/config.js';
import { runRepl } from './cli/repl.js';
import { renderHistory, renderOutcome, renderSchema, type OutputFormat } from './cli/render.js';
import { initializeProject } from './project/initializer.js';
import { StatQuery } from './StatQuery.js';
import { GitSnapshotter } from './vcs/git.js';
import { createLogger, type Logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

interface GlobalArgs {
  home: string;
  logLevel: string;
}

interface App {
  home: string;
  logger: Logger;
  config: StatQueryConfig;
  statquery: StatQuery;
}

async function openApp(args: GlobalArgs): Promise<App> {
  const home = path.resolve(args.home);
  const logger = createLogger({ level: args.logLevel, logDir: path.join(home, 'logs'), console: true });
  const config = await ConfigStore.inDirectory(home, { logger }).get();

  const git = new GitSnapshotter(home, { logger });
  const snapshot = config.auto_commit && (await git.isRepository()) ? git : undefined;

  const statquery = new StatQuery({
    home,
    saveHistory: config.save_history,
    timeoutMs: config.timeout_ms,
    snapshot,
    logger,
  });
  return { home, logger, config, statquery };
}

function print(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

async function main() {
  dotenv.config();

  await yargs(hideBin(process.argv))
    .scriptName('statquery')
    .usage('$0 <command> [options]')
    .option('home', {
      type: 'string',
      default: process.env.STATQUERY_HOME ?? process.cwd(),
      desc: 'Directory holding history.json and .statquery.json',
    })
    .option('log-level', { type: 'string', default: process.env.LOG_LEVEL ?? 'warn', desc: 'winston log level' })
    .command(
      'ask <query>',
      'Answer one question about a dataset',
      (y) =>
        y
          .positional('query', { type: 'string', demandOption: true, desc: 'Natural language question' })
          .option('data', { type: 'string', demandOption: true, desc: 'Dataset file (csv, tsv, xlsx, json, jsonl, parquet)' })
          .option('format', { choices: ['text', 'json'] as const, desc: 'Output format (default from config)' })
          .option('show-code', { type: 'boolean', default: false, desc: 'Print the generated code' })
          .option('explain', { type: 'boolean', default: false, desc: 'Explain how the question was read' }),
      async (argv) => {
        const app = await openApp(argv);
        const format: OutputFormat = argv.format ?? app.config.output_format;
        const turn = await app.statquery.run({ query: argv.query, datasetPath: argv.data });

        if (argv.showCode && turn.code) print(`--- Code ---\n${turn.code.source}`);
        if (argv.explain) {
          const explanation = app.statquery.explain(turn);
          if (explanation) print(explanation);
        }
        print(renderOutcome(turn.outcome, format));
        if (turn.outcome.status !== 'success') process.exitCode = 1;
      },
    )
    .command(
      'chat',
      'Start an interactive session',
      (y) =>
        y
          .option('data', { type: 'string', desc: 'Dataset file to load first' })
          .option('format', { choices: ['text', 'json'] as const, desc: 'Output format (default from config)' })
          .option('show-code', { type: 'boolean', default: false, desc: 'Print the generated code of every turn' }),
      async (argv) => {
        const app = await openApp(argv);
        const session = app.statquery.session();
        if (argv.data) {
          const dataset = await session.reload(argv.data);
          print(renderSchema({ name: dataset.name, rowCount: dataset.rowCount, columns: dataset.columns }));
        }
        await runRepl(session, {
          input: process.stdin,
          output: process.stdout,
          format: argv.format ?? app.config.output_format,
          showCode: argv.showCode,
        });
      },
    )
    .command(
      'history',
      'List recorded turns',
      (y) =>
        y
          .option('limit', { type: 'number', desc: 'Only the last N turns' })
          .option('format', { choices: ['text', 'json'] as const }),
      async (argv) => {
        const app = await openApp(argv);
        const entries = await app.statquery.history.read();
        const shown = argv.limit === undefined ? entries : entries.slice(Math.max(0, entries.length - argv.limit));
        print(renderHistory(shown, argv.format ?? app.config.output_format));
      },
    )
    .command(
      'config <action> [key] [value]',
      'Show or change settings',
      (y) =>
        y
          .positional('action', { choices: ['get', 'set', 'reset'] as const, demandOption: true })
          .positional('key', { type: 'string' })
          .positional('value', { type: 'string' }),
      async (argv) => {
        const logger = createLogger({ level: argv.logLevel, console: true });
        const store = ConfigStore.inDirectory(path.resolve(argv.home), { logger });

        if (argv.action === 'reset') {
          print(JSON.stringify(await store.reset(), null, 2));
          return;
        }
        if (argv.action === 'set') {
          if (argv.key === undefined || argv.value === undefined) {
            throw new Error('Usage: statquery config set <key> <value>');
          }
          print(JSON.stringify(await store.set(argv.key, parseConfigValue(argv.value)), null, 2));
          return;
        }
        const config = await store.get();
        if (argv.key === undefined) {
          print(JSON.stringify(config, null, 2));
        } else {
          print(JSON.stringify(config[argv.key] ?? null));
        }
      },
    )
    .command(
      'init <name>',
      'Create an analysis project',
      (y) =>
        y
          .positional('name', { type: 'string', demandOption: true })
          .option('path', { type: 'string', default: '.', desc: 'Where to create the project' })
          .option('git', { type: 'boolean', default: true, desc: 'Initialize a git repository' }),
      async (argv) => {
        const logger = createLogger({ level: argv.logLevel, console: true });
        const projectDir = await initializeProject(argv.name, argv.path, { git: argv.git, logger });
        print(`Project initialized at ${projectDir}`);
      },
    )
    .command(
      'commit',
      'Commit the project directory to git',
      (y) => y.option('message', { alias: 'm', type: 'string', default: 'Update: Analysis results' }),
      async (argv) => {
        const logger = createLogger({ level: argv.logLevel, console: true });
        const committed = await new GitSnapshotter(path.resolve(argv.home), { logger }).snapshot(argv.message);
        print(committed ? 'Changes committed.' : 'Nothing to commit.');
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
