/**
 * Server lifecycle tests — binds an ephemeral port on the loopback interface.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { startHttpServer } from '../../src/server/serve.js';
import { runServe } from '../../src/commands/serve.js';
import type { ServerHandle } from '../../src/server/serve.js';
import { createTestApp } from '../helpers/test-fixtures.js';
import * as log from '../../src/utils/logger.js';

describe('startHttpServer', () => {
  it('should serve the app on an ephemeral port and close cleanly', async () => {
    const handle = await startHttpServer(createTestApp().server, { port: 0, hostname: '127.0.0.1' });
    expect(handle.port).toBeGreaterThan(0);

    const res = await fetch(`http://127.0.0.1:${handle.port}/health`);
    expect(res.status).toBe(200);
    await res.text();

    await expect(handle.close()).resolves.toBeUndefined();
  });
});

describe('runServe', () => {
  afterEach(() => {
    log.configureLogging({ level: 'info', format: 'text' });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should serve until the signal aborts, then shut down', async () => {
    vi.stubEnv('APP_ENV', 'test');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const ac = new AbortController();
    let status = 0;

    const onListening = async (handle: ServerHandle): Promise<void> => {
      try {
        const res = await fetch(`http://127.0.0.1:${handle.port}/info`);
        status = res.status;
        await res.text();
      } finally {
        ac.abort();
      }
    };

    await runServe({
      port: 0,
      host: '127.0.0.1',
      signal: ac.signal,
      onListening: (handle) => {
        void onListening(handle);
      },
    });

    expect(status).toBe(200);
  });

  it('should return at once when the signal is already aborted', async () => {
    vi.stubEnv('APP_ENV', 'test');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const ac = new AbortController();
    ac.abort();

    await expect(runServe({ port: 0, host: '127.0.0.1', signal: ac.signal })).resolves.toBeUndefined();
  });
});
