import { logger } from '../../config/index.js';
import {
  ProviderUnavailableError,
  type Embedder,
  type LocalEmbedderConfig
} from '../types.js';
import { parseVector, truncateAtWordBoundary } from '../utils.js';

export type FeatureExtractor = (
  text: string,
  options: { pooling: 'mean' | 'cls'; normalize: boolean }
) => Promise<unknown>;

export type ExtractorLoader = (model: string) => Promise<FeatureExtractor>;

async function loadTransformersPipeline(model: string): Promise<FeatureExtractor> {
  // Loaded on demand: pulling in onnxruntime is expensive and most requests never reach this provider
  const { pipeline } = await import('@huggingface/transformers');
  return pipeline('feature-extraction', model);
}

export class LocalEmbedder implements Embedder {
  readonly provider = 'local' as const;
  private config: Required<Omit<LocalEmbedderConfig, 'maxTokens'>> & { maxTokens: number };
  private loadExtractor: ExtractorLoader;
  private extractor: FeatureExtractor | null = null;
  private initializationPromise: Promise<FeatureExtractor> | null = null;

  constructor(config: Partial<LocalEmbedderConfig> = {}, loadExtractor: ExtractorLoader = loadTransformersPipeline) {
    const defaults = {
      model: 'Xenova/all-MiniLM-L6-v2',
      dimensions: 384, // all-MiniLM-L6-v2 default
      // MiniLM truncates at 256 word pieces; keep the input near that
      maxTokens: 256,
      pooling: 'mean' as const,
      normalize: true,
    };

    this.config = {
      ...defaults,
      ...config
    };
    this.loadExtractor = loadExtractor;
  }

  private async initialize(): Promise<FeatureExtractor> {
    if (this.extractor) {
      return this.extractor;
    }

    if (!this.initializationPromise) {
      this.initializationPromise = this._initialize();
    }
    return this.initializationPromise;
  }

  private async _initialize(): Promise<FeatureExtractor> {
    try {
      logger.info({ model: this.config.model }, 'Initializing local embedder');
      this.extractor = await this.loadExtractor(this.config.model);
      logger.info({ model: this.config.model }, 'Local embedder initialized');
      return this.extractor;
    } catch (error) {
      // Let the next call retry the load
      this.initializationPromise = null;
      logger.error({ error, model: this.config.model }, 'Failed to initialize local embedder');
      throw new ProviderUnavailableError(
        `Failed to initialize local embedder: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.provider,
        'error',
        { cause: error }
      );
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (signal?.aborted) {
      throw new ProviderUnavailableError('Local embedding aborted', this.provider, 'aborted');
    }

    const extractor = await this.initialize();
    const input = truncateAtWordBoundary(text, this.config.maxTokens * 4);

    let output: unknown;
    try {
      output = await extractor(input, {
        pooling: this.config.pooling,
        normalize: this.config.normalize,
      });
    } catch (error) {
      logger.error({ error, model: this.config.model }, 'Local embedding failed');
      throw new ProviderUnavailableError(
        `Local embedding failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.provider,
        'error',
        { cause: error }
      );
    }

    const vector = parseVector(this.tensorToArray(output), this.config.dimensions);
    if (!vector) {
      throw new ProviderUnavailableError('Local model returned a malformed embedding', this.provider, 'malformed');
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
      await this.initialize();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Local embedder availability check failed');
      return false;
    }
  }

  private tensorToArray(output: unknown): unknown {
    // Pooled output is a [1, D] tensor whose data is a Float32Array
    if (typeof output === 'object' && output !== null && 'data' in output) {
      const data = output.data;
      if (data instanceof Float32Array || data instanceof Float64Array) {
        return Array.from(data);
      }
      return data;
    }
    return output;
  }
}
