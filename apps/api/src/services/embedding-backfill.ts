import { logger } from '../config/index.js';
import { EmbeddingUnavailableError } from '../embeddings/types.js';
import type { Document } from '../types/document.js';
import type { DocumentStore } from './document-store.js';
import type { QueryEmbedder } from './search-service.js';

export interface BackfillOptions {
  batchSize?: number;
  /** Stop after this many documents; unbounded when omitted */
  maxDocuments?: number;
}

export interface BackfillSummary {
  embedded: number;
  failed: number[];
  byProvider: Record<string, number>;
}

/**
 * Text embedded for a stored document: title, tags and body.
 */
export function createEmbeddingText(document: Pick<Document, 'title' | 'content' | 'tags'>): string {
  const parts = [document.title];
  if (document.tags.length) {
    parts.push(document.tags.join(' '));
  }
  parts.push(document.content);
  return parts.join('\n');
}

/**
 * Embed every document that has no stored vector yet and persist the vector
 * with the provider that produced it.
 */
export async function backfillEmbeddings(
  store: DocumentStore,
  embedder: QueryEmbedder,
  options: BackfillOptions = {}
): Promise<BackfillSummary> {
  const batchSize = options.batchSize ?? 50;
  const maxDocuments = options.maxDocuments ?? Number.POSITIVE_INFINITY;
  const summary: BackfillSummary = { embedded: 0, failed: [], byProvider: {} };
  const attempted = new Set<number>();

  while (attempted.size < maxDocuments) {
    const batch = (await store.fetchDocumentsWithoutEmbeddings(batchSize + summary.failed.length))
      .filter(document => !attempted.has(document.id))
      .slice(0, Math.min(batchSize, maxDocuments - attempted.size));

    if (!batch.length) {
      break;
    }

    for (const document of batch) {
      attempted.add(document.id);
      try {
        const result = await embedder.embed(createEmbeddingText(document));
        await store.saveEmbedding(document.id, result.vector, result.provider);
        summary.embedded++;
        summary.byProvider[result.provider] = (summary.byProvider[result.provider] ?? 0) + 1;
      } catch (error) {
        if (!(error instanceof EmbeddingUnavailableError)) {
          throw error;
        }
        logger.warn({ documentId: document.id, failures: error.failures }, 'Could not embed document');
        summary.failed.push(document.id);
      }
    }

    logger.info({
      embedded: summary.embedded,
      failed: summary.failed.length
    }, 'Backfill batch completed');
  }

  return summary;
}
