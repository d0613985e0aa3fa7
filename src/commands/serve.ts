/**
 * Serve command — runs the HTTP API until SIGINT/SIGTERM or the given signal aborts.
 */

import { loadConfig } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import { startHttpServer, type ServerHandle } from '../server/serve.js';
import * as log from '../utils/logger.js';

export interface ServeCommandOptions {
  port?: number;
  host?: string;
  debug?: boolean;
  signal?: AbortSignal;
  onListening?: (handle: ServerHandle) => void;
}

export async function runServe(opts: ServeCommandOptions = {}): Promise<void> {
  const app: Record<string, unknown> = {};
  if (opts.port !== undefined) app.port = opts.port;
  if (opts.host !== undefined) app.host = opts.host;

  const config = await loadConfig(Object.keys(app).length > 0 ? { app } : undefined);
  const deps = createApp(config);
  if (opts.debug) log.setLogLevel('debug');

  log.info(`Starting ${config.app.name}...`);
  log.info(`Environment: ${config.app.env}`);
  log.info(`Debug mode: ${config.app.debug}`);

  const handle = await startHttpServer(deps.server, {
    port: config.app.port,
    hostname: config.app.host,
  });
  log.info(`Listening on http://${config.app.host}:${handle.port}`);

  const ac = new AbortController();
  const stop = (): void => ac.abort();
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
  if (opts.signal?.aborted) stop();
  opts.signal?.addEventListener('abort', stop, { once: true });

  opts.onListening?.(handle);

  try {
    if (!ac.signal.aborted) {
      await new Promise<void>(resolve => ac.signal.addEventListener('abort', () => resolve(), { once: true }));
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    opts.signal?.removeEventListener('abort', stop);
  }

  log.info(`Shutting down ${config.app.name}...`);
  await handle.close();
}
