/**
 * Embedding subsystem - pluggable providers for text embeddings with ordered fallback
 * (OpenAI first, local transformers model second).
 */

export * from './types.js';

export { OpenAIEmbedder } from './providers/openai.js';
export type { EmbeddingsApi } from './providers/openai.js';
export { LocalEmbedder } from './providers/local.js';
export type { FeatureExtractor, ExtractorLoader } from './providers/local.js';

export { EmbeddingService } from './service.js';
export type { ProviderStatus } from './service.js';

export { cosineSimilarity, dotProduct, magnitude, parseVector, truncateAtWordBoundary, truncateToByteLength } from './utils.js';
