import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_ORIGIN: z.string().default('http://localhost:3000'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),

  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  OPENAI_MAX_INPUT_TOKENS: z.coerce.number().int().positive().default(8191),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  LOCAL_EMBEDDINGS_ENABLED: booleanFlag.default('true'),
  LOCAL_EMBEDDING_MODEL: z.string().default('Xenova/all-MiniLM-L6-v2'),
  LOCAL_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),

  SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).default(10),
  SEARCH_MAX_LIMIT: z.coerce.number().int().min(1).default(100),
  SNIPPET_MAX_LENGTH: z.coerce.number().int().min(1).default(200),
});

export type ServerEnv = z.infer<typeof envSchema>;

export function parseServerEnv(source: Record<string, string | undefined>): ServerEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error('Missing/invalid server env: ' + JSON.stringify(result.error.format()));
  }
  return result.data;
}

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function loadServerEnv(): ServerEnv {
  if (!cachedEnv) {
    cachedEnv = parseServerEnv(process.env);
  }
  return cachedEnv;
}
