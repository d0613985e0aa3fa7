/**
 * Agent API routes, mounted under /api/v1.
 *
 * Each route builds a fresh agent, calls it, and wraps the result.
 * Nothing here keeps state between requests.
 */
import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { SampleAgent } from '../agent/index.js';
import * as log from '../utils/logger.js';

export type AgentFactory = (overrides?: unknown) => SampleAgent;

const ContextSchema = z.record(z.unknown());

const ExecuteRequestSchema = z.object({
  task: z.string(),
  context: ContextSchema.nullish(),
  agent_config: ContextSchema.nullish(),
});

const AnalyzeRequestSchema = z.object({ data: z.string() });
const GenerateRequestSchema = z.object({ prompt: z.string() });

function fail(c: Context, label: string, err: unknown): Response {
  const detail = err instanceof Error ? err.message : String(err);
  log.error(`${label}: ${detail}`);
  return c.json({ detail }, 500);
}

export function createAgentRoutes(createAgent: AgentFactory): Hono {
  const routes = new Hono();

  routes.post('/agent/execute', async (c) => {
    try {
      const body = ExecuteRequestSchema.parse(await c.req.json());
      log.info(`Received agent task: ${body.task}`);

      const agent = createAgent(body.agent_config ?? {});
      const result = await agent.execute(body.task, body.context ?? undefined);
      return c.json({ status: 'success', result });
    } catch (err) {
      return fail(c, 'Error executing agent task', err);
    }
  });

  // A new agent is built per request, so this is always empty.
  routes.get('/agent/history', (c) => {
    try {
      const history = createAgent().getExecutionHistory();
      return c.json({ status: 'success', count: history.length, history });
    } catch (err) {
      return fail(c, 'Error retrieving agent history', err);
    }
  });

  routes.post('/agent/analyze', async (c) => {
    try {
      const { data } = AnalyzeRequestSchema.parse(await c.req.json());
      const result = await createAgent().analyze(data);
      return c.json({ status: 'success', result });
    } catch (err) {
      return fail(c, 'Error analyzing data', err);
    }
  });

  routes.post('/agent/generate', async (c) => {
    try {
      const { prompt } = GenerateRequestSchema.parse(await c.req.json());
      const result = await createAgent().generate(prompt);
      return c.json({ status: 'success', result });
    } catch (err) {
      return fail(c, 'Error generating content', err);
    }
  });

  return routes;
}
