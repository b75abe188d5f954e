import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildConfig } from '../index.js';
import { parseServerEnv } from '../env.js';

describe('buildConfig', () => {
  it('only configures the remote embedder when an API key is set', () => {
    const config = buildConfig(parseServerEnv({ DATABASE_URL: 'postgres://localhost/kb_test' }));

    expect(config.embeddings.openai).toBeUndefined();
    expect(config.embeddings.local).toEqual({ model: 'Xenova/all-MiniLM-L6-v2', dimensions: 384 });
  });

  it('maps embedding and search settings', () => {
    const config = buildConfig(parseServerEnv({
      DATABASE_URL: 'postgres://localhost/kb_test',
      OPENAI_API_KEY: 'test-key',
      EMBEDDING_TIMEOUT_MS: '2500',
      LOCAL_EMBEDDINGS_ENABLED: 'false',
      SEARCH_DEFAULT_LIMIT: '50',
      SEARCH_MAX_LIMIT: '20',
    }));

    expect(config.embeddings.openai).toEqual({
      apiKey: 'test-key',
      baseUrl: undefined,
      model: 'text-embedding-3-small',
      dimensions: 1536,
      maxTokens: 8191,
      timeoutMs: 2500,
    });
    expect(config.embeddings.local).toBeUndefined();
    expect(config.search).toEqual({ defaultLimit: 20, maxLimit: 20, snippetLength: 200 });
  });

  it('defaults the log level by environment', () => {
    expect(buildConfig(parseServerEnv({ DATABASE_URL: 'postgres://localhost/kb_test' })).logLevel).toBe('debug');
    expect(buildConfig(parseServerEnv({
      DATABASE_URL: 'postgres://localhost/kb_test',
      NODE_ENV: 'production',
    })).logLevel).toBe('info');
    expect(buildConfig(parseServerEnv({
      DATABASE_URL: 'postgres://localhost/kb_test',
      NODE_ENV: 'production',
      LOG_LEVEL: 'error',
    })).logLevel).toBe('error');
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('applies the validated log level to the shared logger', async () => {
    vi.stubEnv('DATABASE_URL', 'postgres://localhost/kb_test');
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.resetModules();
    const { loadConfig, logger } = await import('../index.js');

    expect(loadConfig().logLevel).toBe('warn');
    expect(logger.level).toBe('warn');
  });
});
