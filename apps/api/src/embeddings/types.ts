/**
 * Core embedding system interfaces and types
 */

export type EmbedderProvider = 'openai' | 'local';

export interface EmbeddingResult {
  vector: number[];
  provider: EmbedderProvider;
  model: string;
  dimensions: number;
}

export interface Embedder {
  readonly provider: EmbedderProvider;

  /**
   * Generate the embedding for one text. Rejects with ProviderUnavailableError.
   */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;

  getModel(): string;

  getDimensions(): number;

  /**
   * Check if the embedder is reachable/initialized
   */
  isAvailable(): Promise<boolean>;
}

export interface EmbedderConfig {
  model: string;
  dimensions: number;
  maxTokens?: number;
}

export interface OpenAIEmbedderConfig extends EmbedderConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface LocalEmbedderConfig extends EmbedderConfig {
  pooling?: 'mean' | 'cls';
  normalize?: boolean;
}

/**
 * Providers are tried in the order they appear: remote first, then local.
 * A provider without config is left out of the chain.
 */
export interface EmbeddingServiceConfig {
  openai?: OpenAIEmbedderConfig;
  local?: LocalEmbedderConfig;
}

export type ProviderFailureReason = 'timeout' | 'rate_limited' | 'malformed' | 'aborted' | 'error';

export class ProviderUnavailableError extends Error {
  constructor(
    message: string,
    public readonly provider: EmbedderProvider,
    public readonly reason: ProviderFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderUnavailableError';
  }
}

export interface ProviderFailure {
  provider: EmbedderProvider;
  reason: ProviderFailureReason;
  message: string;
}

export class EmbeddingUnavailableError extends Error {
  constructor(public readonly failures: ProviderFailure[]) {
    super(
      failures.length
        ? `All embedding providers failed: ${failures.map(f => `${f.provider} (${f.reason})`).join(', ')}`
        : 'No embedding providers configured'
    );
    this.name = 'EmbeddingUnavailableError';
  }
}
