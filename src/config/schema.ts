import { z } from 'zod';

export const DEFAULT_SECRET = 'change-me-in-production';

const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'error',
};

const LogLevelSchema = z.preprocess(
  v => {
    if (typeof v !== 'string') return v;
    const lower = v.trim().toLowerCase();
    return LOG_LEVEL_ALIASES[lower] ?? lower;
  },
  z.enum(['debug', 'info', 'warn', 'error']),
);

const AppSchema = z.object({
  name: z.string().default('ai-agent-app'),
  env: z.string().default('development'),
  debug: z.boolean().default(true),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(8000),
});

const ApiKeysSchema = z.object({
  openai: z.string().optional(),
  anthropic: z.string().optional(),
  google: z.string().optional(),
});

const WorkflowEngineSchema = z.object({
  url: z.string().default('http://localhost:8000'),
  token: z.string().optional(),
  workspace: z.string().default('default'),
});

const StorageSchema = z.object({
  databaseUrl: z.string().optional(),
  redisUrl: z.string().optional(),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: z.enum(['json', 'text']).default('json'),
});

const SecuritySchema = z.object({
  secretKey: z.string().default(DEFAULT_SECRET),
  jwtSecret: z.string().default(DEFAULT_SECRET),
});

const CorsSchema = z.object({
  origins: z.array(z.string()).default(['*']),
});

export const AgentSettingsSchema = z.object({
  model: z.string().default('gpt-4'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxIterations: z.number().int().min(1).max(100).default(10),
  timeout: z.number().int().min(1).max(3600).default(300),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

/**
 * Per-request agent overrides, as sent in the `agent_config` field of an
 * execute request. Unknown keys are dropped.
 */
export const AgentOverridesSchema = z.object({
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_iterations: z.number().int().min(1).max(100).optional(),
  timeout: z.number().int().min(1).max(3600).optional(),
});

export type AgentOverrides = z.infer<typeof AgentOverridesSchema>;

export const AppConfigSchema = z.object({
  app: AppSchema.optional().transform(v => AppSchema.parse(v ?? {})),
  apiKeys: ApiKeysSchema.optional().transform(v => ApiKeysSchema.parse(v ?? {})),
  workflowEngine: WorkflowEngineSchema.optional().transform(v => WorkflowEngineSchema.parse(v ?? {})),
  storage: StorageSchema.optional().transform(v => StorageSchema.parse(v ?? {})),
  logging: LoggingSchema.optional().transform(v => LoggingSchema.parse(v ?? {})),
  security: SecuritySchema.optional().transform(v => SecuritySchema.parse(v ?? {})),
  cors: CorsSchema.optional().transform(v => CorsSchema.parse(v ?? {})),
  agent: AgentSettingsSchema.optional().transform(v => AgentSettingsSchema.parse(v ?? {})),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
