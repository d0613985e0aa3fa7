import { BaseAgent } from './base-agent.js';
import type { AgentOptions, ExecutionResult, SuccessResult, TaskContext } from './types.js';
import type { AgentOverrides, AgentSettings } from '../config/schema.js';
import { AgentOverridesSchema } from '../config/schema.js';
import { sleep } from '../utils/helpers.js';
import * as log from '../utils/logger.js';

export const SAMPLE_AGENT_NAME = 'sample-agent';
export const DEFAULT_PROCESSING_DELAY_MS = 500;

export interface SampleAgentOptions extends Omit<AgentOptions, 'name'> {
  /** Simulated processing time per execute() call (default: 500ms) */
  processingDelayMs?: number;
}

/**
 * Echo agent: waits a fixed delay and reports the task back.
 * Stands in for a real model integration.
 */
export class SampleAgent extends BaseAgent {
  private readonly processingDelayMs: number;

  constructor(opts: SampleAgentOptions) {
    super({ ...opts, name: SAMPLE_AGENT_NAME });
    this.processingDelayMs = opts.processingDelayMs ?? DEFAULT_PROCESSING_DELAY_MS;
  }

  /**
   * Run a task. Never rejects: a failure during processing is returned as
   * an error result. Either way one record is appended to the history.
   */
  async execute(task: string, context?: TaskContext): Promise<ExecutionResult> {
    const start = Date.now();
    log.info(`Executing task: ${task}`);

    let result: ExecutionResult;
    try {
      result = await this.process(task, context);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Error executing task: ${message}`);
      result = {
        status: 'error',
        task,
        error: message,
        timestamp: new Date().toISOString(),
      };
    }

    this.logExecution(task, result, (Date.now() - start) / 1000);
    return result;
  }

  async analyze(data: string): Promise<ExecutionResult> {
    return this.execute(`Analyze: ${data}`, { operation: 'analyze' });
  }

  async generate(prompt: string): Promise<ExecutionResult> {
    return this.execute(`Generate: ${prompt}`, { operation: 'generate' });
  }

  protected async process(task: string, context?: TaskContext): Promise<SuccessResult> {
    await sleep(this.processingDelayMs);

    const result: SuccessResult = {
      status: 'success',
      task,
      response: `Processed task: ${task}`,
      agent: this.name,
      model: this.model,
      context_provided: context !== undefined,
      timestamp: new Date().toISOString(),
    };

    const keys = context ? Object.keys(context) : [];
    if (keys.length > 0) {
      result.context_keys = keys;
    }
    return result;
  }
}

/**
 * Build a SampleAgent from configured defaults plus request-level overrides
 * (snake_case keys, as they arrive over HTTP). Throws on out-of-range overrides.
 */
export function createSampleAgent(
  defaults: AgentSettings,
  overrides?: unknown,
  extra: Pick<SampleAgentOptions, 'processingDelayMs'> = {},
): SampleAgent {
  const o: AgentOverrides = AgentOverridesSchema.parse(overrides ?? {});
  return new SampleAgent({
    model: o.model ?? defaults.model,
    temperature: o.temperature ?? defaults.temperature,
    maxIterations: o.max_iterations ?? defaults.maxIterations,
    timeout: o.timeout ?? defaults.timeout,
    ...extra,
  });
}
