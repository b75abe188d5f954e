import { logger } from '../config/index.js';
import {
  EmbeddingUnavailableError,
  ProviderUnavailableError,
  type Embedder,
  type EmbedderProvider,
  type EmbeddingResult,
  type EmbeddingServiceConfig,
  type ProviderFailure
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';
import { LocalEmbedder } from './providers/local.js';

export interface ProviderStatus {
  provider: EmbedderProvider;
  model: string;
  dimensions: number;
  available: boolean;
}

/**
 * Embeds text with the first provider in the chain that succeeds.
 */
export class EmbeddingService {
  private readonly embedders: readonly Embedder[];

  constructor(embedders: readonly Embedder[]) {
    this.embedders = embedders;
  }

  static fromConfig(config: EmbeddingServiceConfig): EmbeddingService {
    const embedders: Embedder[] = [];
    if (config.openai) {
      embedders.push(new OpenAIEmbedder(config.openai));
    }
    if (config.local) {
      embedders.push(new LocalEmbedder(config.local));
    }

    logger.info({
      providers: embedders.map(e => ({ provider: e.provider, model: e.getModel(), dimensions: e.getDimensions() }))
    }, 'Embedding service configured');

    return new EmbeddingService(embedders);
  }

  get providers(): EmbedderProvider[] {
    return this.embedders.map(e => e.provider);
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    const failures: ProviderFailure[] = [];

    for (const [index, embedder] of this.embedders.entries()) {
      signal?.throwIfAborted();

      try {
        const vector = await embedder.embed(text, signal);
        if (index > 0) {
          logger.info({
            provider: embedder.provider,
            skipped: failures.map(f => f.provider)
          }, 'Using fallback embedder');
        }
        return {
          vector,
          provider: embedder.provider,
          model: embedder.getModel(),
          dimensions: vector.length,
        };
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError)) {
          throw error;
        }
        failures.push({ provider: error.provider, reason: error.reason, message: error.message });
        logger.warn({
          provider: embedder.provider,
          reason: error.reason,
          remaining: this.embedders.length - index - 1
        }, 'Embedding provider unavailable');
      }
    }

    signal?.throwIfAborted();
    throw new EmbeddingUnavailableError(failures);
  }

  async getStatus(): Promise<ProviderStatus[]> {
    return Promise.all(this.embedders.map(async embedder => ({
      provider: embedder.provider,
      model: embedder.getModel(),
      dimensions: embedder.getDimensions(),
      available: await embedder.isAvailable(),
    })));
  }
}
