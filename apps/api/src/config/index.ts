import { loadServerEnv, parseServerEnv, type ServerEnv } from './env.js';
import { logger } from '../utils/logger.js';
import type { EmbeddingServiceConfig } from '../embeddings/types.js';
import type { SearchServiceConfig } from '../services/search-service.js';

export interface Config {
  server: {
    port: number;
    host: string;
    frontendOrigin: string;
  };
  database: {
    url: string;
  };
  embeddings: EmbeddingServiceConfig;
  search: SearchServiceConfig;
  nodeEnv: ServerEnv['NODE_ENV'];
  logLevel: NonNullable<ServerEnv['LOG_LEVEL']>;
}

export function buildConfig(env: ServerEnv): Config {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      frontendOrigin: env.FRONTEND_ORIGIN,
    },
    database: {
      url: env.DATABASE_URL,
    },
    embeddings: {
      openai: env.OPENAI_API_KEY ? {
        apiKey: env.OPENAI_API_KEY,
        baseUrl: env.OPENAI_BASE_URL,
        model: env.OPENAI_EMBEDDING_MODEL,
        dimensions: env.OPENAI_EMBEDDING_DIMENSIONS,
        maxTokens: env.OPENAI_MAX_INPUT_TOKENS,
        timeoutMs: env.EMBEDDING_TIMEOUT_MS,
      } : undefined,
      local: env.LOCAL_EMBEDDINGS_ENABLED ? {
        model: env.LOCAL_EMBEDDING_MODEL,
        dimensions: env.LOCAL_EMBEDDING_DIMENSIONS,
      } : undefined,
    },
    search: {
      defaultLimit: Math.min(env.SEARCH_DEFAULT_LIMIT, env.SEARCH_MAX_LIMIT),
      maxLimit: env.SEARCH_MAX_LIMIT,
      snippetLength: env.SNIPPET_MAX_LENGTH,
    },
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  };
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildConfig(loadServerEnv());
  logger.level = cachedConfig.logLevel;

  logger.info({
    server: cachedConfig.server,
    nodeEnv: cachedConfig.nodeEnv,
    hasOpenAIKey: Boolean(cachedConfig.embeddings.openai),
    localEmbeddings: Boolean(cachedConfig.embeddings.local),
    search: cachedConfig.search,
  }, 'Configuration loaded');

  return cachedConfig;
}

export { loadServerEnv, parseServerEnv };
export { logger } from '../utils/logger.js';
