/**
 * Exec command — run a single task without the HTTP server and print the result.
 * stdout carries only the JSON result; logs go to stderr.
 */

import { z } from 'zod';
import { loadConfig } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import type { ExecutionResult, TaskContext } from '../agent/index.js';
import { safeJsonParse } from '../utils/helpers.js';
import * as log from '../utils/logger.js';

export type ExecMode = 'execute' | 'analyze' | 'generate';

export interface ExecCommandOptions {
  context?: string;
  mode?: ExecMode;
}

const ContextSchema = z.record(z.unknown());

export function parseContextArg(raw: string): TaskContext {
  const parsed = ContextSchema.safeParse(safeJsonParse(raw));
  if (!parsed.success) {
    throw new Error(`--context must be a JSON object, got: ${raw}`);
  }
  return parsed.data;
}

export async function runExec(task: string, opts: ExecCommandOptions = {}): Promise<ExecutionResult> {
  const mode = opts.mode ?? 'execute';
  if (opts.context !== undefined && mode !== 'execute') {
    throw new Error(`--context only applies to --mode execute, not ${mode}`);
  }
  const context = opts.context !== undefined ? parseContextArg(opts.context) : undefined;

  log.setLogDestination('stderr');

  const config = await loadConfig();
  const agent = createApp(config).createAgent();

  const result = mode === 'analyze'
    ? await agent.analyze(task)
    : mode === 'generate'
      ? await agent.generate(task)
      : await agent.execute(task, context);

  console.log(JSON.stringify(result, null, 2));
  return result;
}
