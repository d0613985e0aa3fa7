export type TaskContext = Record<string, unknown>;

export interface SuccessResult {
  status: 'success';
  task: string;
  response: string;
  agent: string;
  model: string;
  context_provided: boolean;
  /** Present only when the context carries at least one key */
  context_keys?: string[];
  timestamp: string;
}

export interface ErrorResult {
  status: 'error';
  task: string;
  error: string;
  timestamp: string;
}

export type ExecutionResult = SuccessResult | ErrorResult;

export interface ExecutionRecord {
  /** Completion instant, ISO-8601 UTC */
  timestamp: string;
  agent_name: string;
  task: string;
  result: ExecutionResult;
  duration_seconds: number;
  model: string;
}

export interface AgentOptions {
  name: string;
  model: string;
  temperature: number;
  /** Declared only; execution never checks it */
  maxIterations: number;
  /** Seconds. Declared only; execution never enforces it */
  timeout: number;
}

export interface Agent {
  readonly name: string;
  readonly model: string;
  execute(task: string, context?: TaskContext): Promise<ExecutionResult>;
  getExecutionHistory(): readonly ExecutionRecord[];
  clearHistory(): void;
}
