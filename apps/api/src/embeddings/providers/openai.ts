import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { logger } from '../../config/index.js';
import {
  ProviderUnavailableError,
  type Embedder,
  type OpenAIEmbedderConfig,
  type ProviderFailureReason
} from '../types.js';
import { parseVector, truncateToByteLength } from '../utils.js';

/**
 * The slice of the OpenAI SDK this embedder calls.
 */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string; dimensions?: number; encoding_format?: 'float' },
    options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number }
  ): Promise<{ data: Array<{ embedding: unknown }> }>;
}

export class OpenAIEmbedder implements Embedder {
  readonly provider = 'openai' as const;
  private api: EmbeddingsApi;
  private config: Required<Omit<OpenAIEmbedderConfig, 'baseUrl'>> & Pick<OpenAIEmbedderConfig, 'baseUrl'>;

  constructor(config: OpenAIEmbedderConfig, api?: EmbeddingsApi) {
    this.config = {
      ...config,
      maxTokens: config.maxTokens ?? 8191,
      timeoutMs: config.timeoutMs ?? 5000,
    };

    this.api = api ?? new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
    }).embeddings;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    // Tokens never outnumber UTF-8 bytes, so a byte budget keeps any script under the ceiling
    const input = truncateToByteLength(text, this.config.maxTokens);
    if (input.length < text.length) {
      logger.debug({
        provider: this.provider,
        originalLength: text.length,
        truncatedLength: input.length
      }, 'Truncated embedding input');
    }

    let payload: unknown;
    try {
      const response = await this.api.create({
        model: this.config.model,
        input,
        // Only the text-embedding-3 family accepts a dimensions override
        ...(this.config.model.startsWith('text-embedding-3') ? { dimensions: this.config.dimensions } : {}),
        encoding_format: 'float',
      }, {
        signal,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
      payload = response.data[0]?.embedding;
    } catch (error) {
      const reason = this.classifyFailure(error, signal);
      logger.warn({ provider: this.provider, reason, error }, 'OpenAI embedding failed');
      throw new ProviderUnavailableError(
        `OpenAI embedding failed (${reason}): ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.provider,
        reason,
        { cause: error }
      );
    }

    const vector = parseVector(payload, this.config.dimensions);
    if (!vector) {
      logger.warn({ provider: this.provider, model: this.config.model }, 'OpenAI returned a malformed embedding');
      throw new ProviderUnavailableError('OpenAI returned a malformed embedding', this.provider, 'malformed');
    }
    return vector;
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.embed('test');
      return true;
    } catch (error) {
      logger.warn({ error }, 'OpenAI embedder availability check failed');
      return false;
    }
  }

  private classifyFailure(error: unknown, signal?: AbortSignal): ProviderFailureReason {
    if (signal?.aborted || error instanceof APIUserAbortError) {
      return 'aborted';
    }
    if (error instanceof APIConnectionTimeoutError) {
      return 'timeout';
    }
    if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) {
      return 'rate_limited';
    }
    return 'error';
  }
}
