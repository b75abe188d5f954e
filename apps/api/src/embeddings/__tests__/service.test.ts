import { describe, it, expect, vi, type Mock } from 'vitest';
import type { Embedder, EmbedderProvider } from '../types.js';

vi.mock('../../config/index.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  },
}));

const { EmbeddingService } = await import('../service.js');
const { EmbeddingUnavailableError, ProviderUnavailableError } = await import('../types.js');

type FakeEmbedder = Embedder & { embed: Mock<Embedder['embed']> };

function fakeEmbedder(
  provider: EmbedderProvider,
  behaviour: number[] | 'timeout' | 'malformed',
  dimensions = 3
): FakeEmbedder {
  return {
    provider,
    embed: vi.fn<Embedder['embed']>(async () => {
      if (behaviour === 'timeout' || behaviour === 'malformed') {
        throw new ProviderUnavailableError(`${provider} ${behaviour}`, provider, behaviour);
      }
      return behaviour;
    }),
    getModel: () => `${provider}-model`,
    getDimensions: () => dimensions,
    isAvailable: async () => Array.isArray(behaviour),
  };
}

describe('EmbeddingService', () => {
  it('uses the remote provider when it answers', async () => {
    const remote = fakeEmbedder('openai', [1, 0, 0]);
    const local = fakeEmbedder('local', [0, 1]);
    const service = new EmbeddingService([remote, local]);

    await expect(service.embed('project timeline')).resolves.toEqual({
      vector: [1, 0, 0],
      provider: 'openai',
      model: 'openai-model',
      dimensions: 3,
    });
    expect(local.embed).not.toHaveBeenCalled();
  });

  it('falls back to the local provider when the remote one fails', async () => {
    const remote = fakeEmbedder('openai', 'timeout');
    const local = fakeEmbedder('local', [0, 1], 2);
    const service = new EmbeddingService([remote, local]);

    const result = await service.embed('project timeline');

    expect(result.provider).toBe('local');
    expect(result.dimensions).toBe(2);
    expect(remote.embed).toHaveBeenCalledWith('project timeline', undefined);
    expect(local.embed).toHaveBeenCalledWith('project timeline', undefined);
  });

  it('throws EmbeddingUnavailableError listing every failure when all providers fail', async () => {
    const service = new EmbeddingService([
      fakeEmbedder('openai', 'timeout'),
      fakeEmbedder('local', 'malformed'),
    ]);

    const error = await service.embed('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error).toMatchObject({
      failures: [
        { provider: 'openai', reason: 'timeout', message: 'openai timeout' },
        { provider: 'local', reason: 'malformed', message: 'local malformed' },
      ],
    });
  });

  it('treats an empty chain as unavailable', async () => {
    await expect(new EmbeddingService([]).embed('x')).rejects.toThrow('No embedding providers configured');
  });

  it('does not try the fallback once the caller has aborted', async () => {
    const controller = new AbortController();
    const remote = fakeEmbedder('openai', 'timeout');
    remote.embed.mockImplementation(async () => {
      controller.abort();
      throw new ProviderUnavailableError('aborted', 'openai', 'aborted');
    });
    const local = fakeEmbedder('local', [0, 1]);
    const service = new EmbeddingService([remote, local]);

    const error = await service.embed('x', controller.signal).catch((e: unknown) => e);
    expect(error instanceof Error ? error.name : undefined).toBe('AbortError');
    expect(local.embed).not.toHaveBeenCalled();
  });

  it('propagates errors that are not provider failures', async () => {
    const remote = fakeEmbedder('openai', [1]);
    remote.embed.mockRejectedValue(new TypeError('bug'));
    const service = new EmbeddingService([remote, fakeEmbedder('local', [0, 1])]);

    await expect(service.embed('x')).rejects.toBeInstanceOf(TypeError);
  });

  it('builds the chain from config, remote first', () => {
    const both = EmbeddingService.fromConfig({
      openai: { apiKey: 'test-key', model: 'text-embedding-3-small', dimensions: 1536 },
      local: { model: 'Xenova/all-MiniLM-L6-v2', dimensions: 384 },
    });
    const localOnly = EmbeddingService.fromConfig({
      local: { model: 'Xenova/all-MiniLM-L6-v2', dimensions: 384 },
    });

    expect(both.providers).toEqual(['openai', 'local']);
    expect(localOnly.providers).toEqual(['local']);
  });

  it('reports provider status', async () => {
    const service = new EmbeddingService([
      fakeEmbedder('openai', 'timeout', 1536),
      fakeEmbedder('local', [0, 1], 384),
    ]);

    await expect(service.getStatus()).resolves.toEqual([
      { provider: 'openai', model: 'openai-model', dimensions: 1536, available: false },
      { provider: 'local', model: 'local-model', dimensions: 384, available: true },
    ]);
  });
});
