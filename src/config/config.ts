import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { AppConfigSchema, DEFAULT_SECRET, type AppConfig } from './schema.js';

export const WORKSPACE_CONFIG_FILE = 'agent-app.json';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Workspace config file (default: ./agent-app.json) */
  configPath?: string;
}

/**
 * Load config with priority: overrides > env vars > workspace json > defaults.
 * The returned value is deep-frozen; components receive it by reference.
 */
export async function loadConfig(
  overrides?: Record<string, unknown>,
  opts: LoadConfigOptions = {},
): Promise<AppConfig> {
  const workspaceConfig = await loadJSON(opts.configPath ?? resolve('.', WORKSPACE_CONFIG_FILE));
  const envConfig = loadEnvVars(opts.env ?? process.env);

  const merged = deepMerge(workspaceConfig, envConfig, overrides ?? {});
  const config = AppConfigSchema.parse(merged);

  validateProductionSecrets(config);
  return deepFreeze(config);
}

/**
 * Refuse to start in production while either secret still holds the shipped default.
 */
export function validateProductionSecrets(config: AppConfig): void {
  if (config.app.env !== 'production') return;

  const offending: string[] = [];
  if (config.security.secretKey === DEFAULT_SECRET) offending.push('SECRET_KEY');
  if (config.security.jwtSecret === DEFAULT_SECRET) offending.push('JWT_SECRET');

  if (offending.length > 0) {
    throw new ConfigError(`${offending.join(' and ')} must be changed from the default value in production`);
  }
}

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const section = (entries: Record<string, unknown>): Record<string, unknown> | undefined => {
    const defined = Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
    return Object.keys(defined).length > 0 ? defined : undefined;
  };

  const result: Record<string, unknown> = {
    app: section({
      name: env.APP_NAME,
      env: env.APP_ENV,
      debug: parseBool(env.APP_DEBUG),
      host: env.APP_HOST,
      port: parseNumber(env.APP_PORT),
    }),
    apiKeys: section({
      openai: env.OPENAI_API_KEY,
      anthropic: env.ANTHROPIC_API_KEY,
      google: env.GOOGLE_API_KEY,
    }),
    workflowEngine: section({
      url: env.WINDMILL_URL,
      token: env.WINDMILL_TOKEN,
      workspace: env.WINDMILL_WORKSPACE,
    }),
    storage: section({
      databaseUrl: env.DATABASE_URL,
      redisUrl: env.REDIS_URL,
    }),
    logging: section({
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    }),
    security: section({
      secretKey: env.SECRET_KEY,
      jwtSecret: env.JWT_SECRET,
    }),
    cors: section({
      origins: env.CORS_ORIGINS === undefined ? undefined : parseOrigins(env.CORS_ORIGINS),
    }),
    agent: section({
      model: env.AGENT_MODEL,
      temperature: parseNumber(env.AGENT_TEMPERATURE),
      maxIterations: parseNumber(env.AGENT_MAX_ITERATIONS),
      timeout: parseNumber(env.AGENT_TIMEOUT),
    }),
  };

  return Object.fromEntries(Object.entries(result).filter(([, v]) => v !== undefined));
}

/** `*` (or an empty value) allows every origin; otherwise a comma-separated list. */
export function parseOrigins(raw: string): string[] {
  const origins = raw.split(',').map(o => o.trim()).filter(o => o.length > 0);
  if (origins.length === 0 || origins.includes('*')) return ['*'];
  return origins;
}

// Unrecognized text is passed through so the schema reports it.
function parseBool(raw: string | undefined): boolean | string | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  return raw;
}

function parseNumber(raw: string | undefined): number | string | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return raw.trim() === '' || Number.isNaN(n) ? raw : n;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(content);
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

function deepFreeze<T extends object>(obj: T): T {
  for (const key of Object.keys(obj)) {
    const value: unknown = Reflect.get(obj, key);
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
