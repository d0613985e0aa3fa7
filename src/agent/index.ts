export { BaseAgent } from './base-agent.js';
export { SampleAgent, createSampleAgent, SAMPLE_AGENT_NAME, DEFAULT_PROCESSING_DELAY_MS } from './sample-agent.js';
export type { SampleAgentOptions } from './sample-agent.js';
export type {
  Agent,
  AgentOptions,
  ExecutionRecord,
  ExecutionResult,
  SuccessResult,
  ErrorResult,
  TaskContext,
} from './types.js';
