#!/usr/bin/env node
/**
 * ai-agent-app — agent task execution over HTTP.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { Command, Option } from 'commander';
import { runServe } from './commands/serve.js';
import { runExec, type ExecMode } from './commands/exec.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('agent-app')
  .description('Run agent tasks over an HTTP API')
  .version(VERSION);

program
  .command('serve', { isDefault: true })
  .description('Start the HTTP API server')
  .option('-p, --port <port>', 'Port to listen on (overrides APP_PORT)', (v: string) => Number.parseInt(v, 10))
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: { port?: number; debug?: boolean }) => {
    await runServe(opts);
  });

program
  .command('exec <task>')
  .description('Run a single task and print the JSON result')
  .option('-c, --context <json>', 'Context object passed with the task (execute mode only)')
  .addOption(new Option('-m, --mode <mode>', 'Agent operation').choices(['execute', 'analyze', 'generate']).default('execute'))
  .action(async (task: string, opts: { context?: string; mode: ExecMode }) => {
    await runExec(task, opts);
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
