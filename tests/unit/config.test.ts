import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, parseOrigins, ConfigError, validateProductionSecrets } from '../../src/config/config.js';
import { AppConfigSchema } from '../../src/config/schema.js';

describe('loadConfig', () => {
  let dir: string;
  let missingPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'agent-app-test-'));
    missingPath = join(dir, 'missing.json');
  });

  it('should fall back to defaults with no file and empty env', async () => {
    const config = await loadConfig(undefined, { env: {}, configPath: missingPath });

    expect(config.app.name).toBe('ai-agent-app');
    expect(config.app.port).toBe(8000);
    expect(config.agent.model).toBe('gpt-4');
    expect(config.cors.origins).toEqual(['*']);
  });

  it('should return a deep-frozen value', async () => {
    const config = await loadConfig(undefined, { env: {}, configPath: missingPath });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.agent)).toBe(true);
    expect(Object.isFrozen(config.cors.origins)).toBe(true);
  });

  it('should read typed values from env vars', async () => {
    const config = await loadConfig(undefined, {
      configPath: missingPath,
      env: {
        APP_NAME: 'env-app',
        APP_PORT: '9000',
        APP_DEBUG: 'false',
        OPENAI_API_KEY: 'test-key',
        WINDMILL_WORKSPACE: 'team',
        LOG_LEVEL: 'DEBUG',
        LOG_FORMAT: 'text',
        CORS_ORIGINS: 'http://a.test, http://b.test',
        AGENT_MODEL: 'gpt-4o',
        AGENT_TEMPERATURE: '1.2',
        AGENT_MAX_ITERATIONS: '25',
        AGENT_TIMEOUT: '60',
      },
    });

    expect(config.app.name).toBe('env-app');
    expect(config.app.port).toBe(9000);
    expect(config.app.debug).toBe(false);
    expect(config.apiKeys.openai).toBe('test-key');
    expect(config.workflowEngine.workspace).toBe('team');
    expect(config.logging).toEqual({ level: 'debug', format: 'text' });
    expect(config.cors.origins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.agent).toEqual({ model: 'gpt-4o', temperature: 1.2, maxIterations: 25, timeout: 60 });
  });

  it('should reject a non-numeric port', async () => {
    await expect(loadConfig(undefined, { env: { APP_PORT: 'abc' }, configPath: missingPath }))
      .rejects.toThrow();
  });

  it('should reject an unrecognized boolean', async () => {
    await expect(loadConfig(undefined, { env: { APP_DEBUG: 'maybe' }, configPath: missingPath }))
      .rejects.toThrow();
  });

  it('should layer workspace file < env < overrides', async () => {
    const path = join(dir, 'agent-app.json');
    writeFileSync(path, JSON.stringify({ app: { name: 'from-file', port: 7000, env: 'staging' } }));

    const fromFileAndEnv = await loadConfig(undefined, { env: { APP_PORT: '9100' }, configPath: path });
    expect(fromFileAndEnv.app.name).toBe('from-file');
    expect(fromFileAndEnv.app.env).toBe('staging');
    expect(fromFileAndEnv.app.port).toBe(9100);

    const withOverride = await loadConfig({ app: { port: 1234 } }, { env: { APP_PORT: '9100' }, configPath: path });
    expect(withOverride.app.port).toBe(1234);
    expect(withOverride.app.name).toBe('from-file');
  });

  it('should reject a workspace file that is not an object', async () => {
    const path = join(dir, 'agent-app.json');
    writeFileSync(path, '[1, 2]');

    await expect(loadConfig(undefined, { env: {}, configPath: path })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should refuse default secrets in production', async () => {
    await expect(loadConfig(undefined, { env: { APP_ENV: 'production' }, configPath: missingPath }))
      .rejects.toThrow('SECRET_KEY and JWT_SECRET must be changed from the default value in production');
  });

  it('should name only the secret still at its default', async () => {
    await expect(loadConfig(undefined, {
      env: { APP_ENV: 'production', SECRET_KEY: 'test-secret' },
      configPath: missingPath,
    })).rejects.toThrow('JWT_SECRET must be changed from the default value in production');
  });

  it('should accept production with both secrets set', async () => {
    const config = await loadConfig(undefined, {
      env: { APP_ENV: 'production', SECRET_KEY: 'test-secret', JWT_SECRET: 'test-jwt-secret' },
      configPath: missingPath,
    });
    expect(config.app.env).toBe('production');
  });
});

describe('validateProductionSecrets', () => {
  it('should ignore default secrets outside production', () => {
    expect(() => validateProductionSecrets(AppConfigSchema.parse({ app: { env: 'development' } }))).not.toThrow();
  });
});

describe('parseOrigins', () => {
  it('should treat * and empty values as allow-all', () => {
    expect(parseOrigins('*')).toEqual(['*']);
    expect(parseOrigins('')).toEqual(['*']);
    expect(parseOrigins('http://a.test,*')).toEqual(['*']);
  });

  it('should split and trim comma-separated origins', () => {
    expect(parseOrigins(' http://a.test , http://b.test,')).toEqual(['http://a.test', 'http://b.test']);
  });
});
