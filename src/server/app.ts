/**
 * HTTP API — metadata endpoints plus the agent routes.
 */
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from '../config/schema.js';
import { validateApiKeys, formatTimestamp, type ApiKeyProvider } from '../utils/helpers.js';
import { createAgentRoutes, type AgentFactory } from './routes.js';
import * as log from '../utils/logger.js';

export const API_PREFIX = '/api/v1';

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  environment: string;
  /** Provider name → whether a usable API key is configured */
  components: Record<ApiKeyProvider, boolean>;
}

export interface ServerDeps {
  config: AppConfig;
  version: string;
  createAgent: AgentFactory;
}

export function createServerApp(deps: ServerDeps): Hono {
  const { config, version } = deps;
  const app = new Hono();

  const origins = config.cors.origins;
  app.use('*', origins.includes('*')
    ? cors({ origin: '*' })
    : cors({ origin: [...origins], credentials: true }));

  app.get('/', (c) => c.json({
    message: 'AI Agent Application is running',
    version,
    timestamp: formatTimestamp(),
  }));

  app.get('/health', (c) => {
    const health: HealthStatus = {
      status: 'healthy',
      timestamp: formatTimestamp(),
      environment: config.app.env,
      components: validateApiKeys(config.apiKeys),
    };
    return c.json(health);
  });

  app.get('/info', (c) => c.json({
    app_name: config.app.name,
    environment: config.app.env,
    debug: config.app.debug,
    agent_config: {
      max_iterations: config.agent.maxIterations,
      timeout: config.agent.timeout,
      model: config.agent.model,
      temperature: config.agent.temperature,
    },
  }));

  app.route(API_PREFIX, createAgentRoutes(deps.createAgent));

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  app.onError((err, c) => {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ detail: err.message }, 500);
  });

  return app;
}
