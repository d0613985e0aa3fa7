/**
 * Node HTTP server for the Hono app.
 *
 * Callers only see ServerHandle and never touch the underlying http.Server.
 */

import { serve } from '@hono/node-server';
import type { Hono } from 'hono';

export interface ServerHandle {
  /** Actual port the server is listening on */
  port: number;
  close(): Promise<void>;
}

export interface ServeOptions {
  port: number;
  hostname?: string;
}

export function startHttpServer(app: Hono, options: ServeOptions): Promise<ServerHandle> {
  return new Promise<ServerHandle>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port: options.port,
        hostname: options.hostname,
      },
      (info) => {
        resolve({
          port: info.port,
          close: () => new Promise<void>((done, fail) => {
            server.close(err => (err ? fail(err) : done()));
          }),
        });
      },
    );

    server.on('error', reject);
  });
}
