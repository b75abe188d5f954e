/**
 * Similarity Engine
 *
 * Exact cosine ranking of stored document vectors against a query vector.
 * Every candidate is scored before the top N are taken.
 */

import { logger } from '../config/index.js';
import { cosineSimilarity } from '../embeddings/utils.js';
import type { EmbedderProvider } from '../embeddings/types.js';

export const TIE_EPSILON = 1e-9;

export interface RankCandidate {
  id: number;
  vector: readonly number[];
  createdAt: Date;
  /** Provider that produced `vector`, when known */
  provider?: EmbedderProvider | null;
}

export interface QueryVector {
  vector: readonly number[];
  provider?: EmbedderProvider;
}

export interface RankedEntry {
  id: number;
  /** Cosine clamped to [0, 1] */
  score: number;
  /** Raw cosine in [-1, 1], used for ordering */
  similarity: number;
}

export interface RankOutcome {
  ranked: RankedEntry[];
  /** Candidates that were compatible and scored, before the limit */
  considered: number;
  /** Ids excluded for dimensionality or provider mismatch */
  skipped: number[];
}

interface Scored extends RankedEntry {
  createdAt: number;
}

function byRecency(a: Scored, b: Scored): number {
  return b.createdAt - a.createdAt || a.id - b.id;
}

/**
 * Reorder runs of near-equal scores by recency. A run is every entry within
 * TIE_EPSILON of the run's leading (highest) score, so `sorted` must already
 * be in descending score order.
 */
function breakTies(sorted: readonly Scored[]): Scored[] {
  const ordered: Scored[] = [];
  let start = 0;
  while (start < sorted.length) {
    let end = start + 1;
    while (end < sorted.length && sorted[start].similarity - sorted[end].similarity <= TIE_EPSILON) {
      end++;
    }
    ordered.push(...sorted.slice(start, end).sort(byRecency));
    start = end;
  }
  return ordered;
}

export class SimilarityEngine {
  rank(query: QueryVector, candidates: readonly RankCandidate[], limit: number): RankOutcome {
    const dimensions = query.vector.length;
    const skipped: number[] = [];
    const scored: Scored[] = [];

    for (const candidate of candidates) {
      if (candidate.vector.length !== dimensions) {
        logger.debug({
          documentId: candidate.id,
          expected: dimensions,
          got: candidate.vector.length
        }, 'Skipping candidate with mismatched embedding dimensions');
        skipped.push(candidate.id);
        continue;
      }
      if (query.provider && candidate.provider && candidate.provider !== query.provider) {
        logger.debug({
          documentId: candidate.id,
          expected: query.provider,
          got: candidate.provider
        }, 'Skipping candidate embedded by a different provider');
        skipped.push(candidate.id);
        continue;
      }

      const similarity = cosineSimilarity(query.vector, candidate.vector);
      scored.push({
        id: candidate.id,
        similarity,
        score: Math.max(0, similarity),
        createdAt: candidate.createdAt.getTime(),
      });
    }

    if (skipped.length) {
      logger.info({ skipped: skipped.length, dimensions }, 'Excluded incompatible candidates from ranking');
    }

    // Exact score order; equal scores by id
    scored.sort((a, b) => b.similarity - a.similarity || a.id - b.id);
    const ordered = breakTies(scored);

    return {
      ranked: ordered.slice(0, Math.max(0, limit)).map(({ id, score, similarity }) => ({ id, score, similarity })),
      considered: ordered.length,
      skipped,
    };
  }
}
