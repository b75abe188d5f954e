import 'dotenv/config';
import { loadConfig, logger } from '../src/config/index.js';
import { EmbeddingService } from '../src/embeddings/index.js';
import { connectDatabase, createPool, disconnectDatabase } from '../src/services/database.js';
import { PgDocumentStore } from '../src/services/document-store.js';
import { backfillEmbeddings } from '../src/services/embedding-backfill.js';

/**
 * Backfill Embeddings Script
 *
 * Embeds every document without a stored vector, recording which provider
 * produced it so searches only compare compatible vectors.
 *
 * Usage:
 *   DATABASE_URL="..." OPENAI_API_KEY="..." npm run backfill:embeddings --workspace @kb-search/api -- [maxDocuments]
 */

async function main() {
  const config = loadConfig();
  const pool = createPool(config.database.url);
  const maxArg = process.argv[2];
  const maxDocuments = maxArg ? Number.parseInt(maxArg, 10) : undefined;

  try {
    await connectDatabase(pool);
    const summary = await backfillEmbeddings(
      new PgDocumentStore(pool),
      EmbeddingService.fromConfig(config.embeddings),
      { maxDocuments: Number.isFinite(maxDocuments) ? maxDocuments : undefined }
    );
    logger.info(summary, 'Embedding backfill finished');
  } finally {
    await disconnectDatabase(pool);
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Embedding backfill failed');
  process.exit(1);
});
