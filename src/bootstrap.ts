/**
 * Shared bootstrap — wires config, logging, agent factory and HTTP app.
 * Used by both the serve and exec commands.
 */

import type { Hono } from 'hono';
import type { AppConfig } from './config/schema.js';
import { createSampleAgent } from './agent/index.js';
import { createServerApp } from './server/app.js';
import type { AgentFactory } from './server/routes.js';
import { VERSION } from './version.js';
import * as log from './utils/logger.js';

export interface AppDeps {
  config: AppConfig;
  createAgent: AgentFactory;
  server: Hono;
}

export interface CreateAppOptions {
  /** Override the simulated processing delay of every agent built */
  processingDelayMs?: number;
}

export function createApp(config: AppConfig, opts: CreateAppOptions = {}): AppDeps {
  log.configureLogging(config.logging);

  const createAgent: AgentFactory = (overrides) =>
    createSampleAgent(config.agent, overrides, { processingDelayMs: opts.processingDelayMs });

  const server = createServerApp({ config, version: VERSION, createAgent });

  return { config, createAgent, server };
}
