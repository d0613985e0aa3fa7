import type { Agent, AgentOptions, ExecutionRecord, ExecutionResult, TaskContext } from './types.js';
import * as log from '../utils/logger.js';

/** Frozen copy of a result, detached from the object handed to the caller. */
function snapshotResult(result: ExecutionResult): ExecutionResult {
  const copy: ExecutionResult = { ...result };
  if (copy.status === 'success' && copy.context_keys) {
    copy.context_keys = [...copy.context_keys];
    Object.freeze(copy.context_keys);
  }
  return Object.freeze(copy);
}

/**
 * Shared agent state: identity, model settings and the per-instance
 * execution history. History lives exactly as long as the instance.
 */
export abstract class BaseAgent implements Agent {
  readonly name: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxIterations: number;
  readonly timeout: number;

  private readonly history: ExecutionRecord[] = [];

  constructor(opts: AgentOptions) {
    this.name = opts.name;
    this.model = opts.model;
    this.temperature = opts.temperature;
    this.maxIterations = opts.maxIterations;
    this.timeout = opts.timeout;

    log.info(`Initialized agent: ${this.name} with model: ${this.model}`);
  }

  abstract execute(task: string, context?: TaskContext): Promise<ExecutionResult>;

  /** Append one frozen record. Records are never edited afterwards. */
  protected logExecution(task: string, result: ExecutionResult, durationSeconds: number): void {
    const record: ExecutionRecord = Object.freeze({
      timestamp: new Date().toISOString(),
      agent_name: this.name,
      task,
      result: snapshotResult(result),
      duration_seconds: durationSeconds,
      model: this.model,
    });
    this.history.push(record);
    log.info(`Agent ${this.name} executed task in ${durationSeconds.toFixed(2)}s`);
  }

  getExecutionHistory(): readonly ExecutionRecord[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history.length = 0;
    log.info(`Cleared execution history for agent: ${this.name}`);
  }
}
