/**
 * Search Service
 *
 * Semantic document search with keyword degradation. Resolves the query
 * embedding, ranks stored document vectors, attaches snippets and times the
 * whole request.
 */

import { logger } from '../config/index.js';
import {
  EmbeddingUnavailableError,
  type EmbeddingResult
} from '../embeddings/types.js';
import { SimilarityEngine } from '../engine/similarity.js';
import { extractSnippet, queryTerms } from '../engine/snippet.js';
import { KeywordMatcher } from '../engine/matchers/keyword.js';
import {
  hasEmbedding,
  type Document,
  type SearchFilters,
  type SearchMode
} from '../types/document.js';
import type { DocumentStore } from './document-store.js';
import { DocumentNotFoundError, SearchUnavailableError } from './errors.js';

export interface SearchServiceConfig {
  defaultLimit: number;
  maxLimit: number;
  /** Maximum snippet length in characters */
  snippetLength: number;
}

export interface QueryEmbedder {
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
}

export interface SearchRequest {
  query: string;
  limit?: number;
  mode?: SearchMode;
  filters?: SearchFilters;
}

export interface ResultDocument {
  id: number;
  title: string;
  content: string;
  file_type: string;
  tags: string[];
  summary: string | null;
  created_at: Date;
}

export interface ScoredResult {
  document: ResultDocument;
  /** In [0, 1]; cosine similarity for semantic mode, term coverage for keyword mode */
  score: number;
  snippet: string;
  rank: number;
}

export interface SearchResponse {
  readonly query: string;
  readonly results: readonly ScoredResult[];
  /** Candidates considered before the limit was applied */
  readonly total_results: number;
  /** Wall-clock seconds */
  readonly execution_time: number;
  /** Mode that produced the results */
  readonly mode: SearchMode;
  readonly requested_mode: SearchMode;
  /** True when a semantic request fell back to keyword matching */
  readonly degraded: boolean;
  /** Documents left out of ranking because their embedding is incompatible */
  readonly skipped: readonly number[];
  /** Documents returned with an empty snippet because extraction failed */
  readonly snippet_failures: readonly number[];
}

export interface RelatedDocumentsResponse {
  readonly document_id: number;
  readonly results: ReadonlyArray<{ document: ResultDocument; score: number }>;
}

interface RankedDocument {
  document: Document;
  score: number;
}

interface Ranking {
  ranked: RankedDocument[];
  considered: number;
  skipped: number[];
}

export function toResultDocument(document: Document): ResultDocument {
  return {
    id: document.id,
    title: document.title,
    content: document.content,
    file_type: document.fileType,
    tags: document.tags,
    summary: document.summary,
    created_at: document.createdAt,
  };
}

export class SearchService {
  private store: DocumentStore;
  private embedder: QueryEmbedder;
  private config: SearchServiceConfig;
  private similarity = new SimilarityEngine();
  private keywordMatcher = new KeywordMatcher();

  constructor(store: DocumentStore, embedder: QueryEmbedder, config: SearchServiceConfig) {
    this.store = store;
    this.embedder = embedder;
    this.config = config;
  }

  async search(request: SearchRequest, options: { signal?: AbortSignal } = {}): Promise<SearchResponse> {
    const startTime = Date.now();
    const { signal } = options;
    const requestedMode = request.mode ?? 'semantic';
    const limit = this.resolveLimit(request.limit);
    const filters = request.filters ?? {};

    logger.debug({ query: request.query, mode: requestedMode, limit, filters }, 'Starting document search');

    let mode: SearchMode = requestedMode;
    let ranking: Ranking | null = null;

    if (requestedMode === 'semantic') {
      // The embedding depends only on the query, the fetch only on stored state
      const [embedding, candidates] = await Promise.all([
        this.resolveQueryEmbedding(request.query, signal),
        this.fromStore('fetchDocumentsWithEmbeddings', () => this.store.fetchDocumentsWithEmbeddings(filters)),
      ]);

      if (embedding) {
        ranking = this.rankSemantic(embedding, candidates, limit);
      } else {
        mode = 'keyword';
      }
    }

    if (!ranking) {
      ranking = await this.rankKeyword(request.query, filters, limit);
    }

    signal?.throwIfAborted();

    const snippetFailures: number[] = [];
    const results = ranking.ranked.map(({ document, score }, index) => ({
      document: toResultDocument(document),
      score,
      snippet: this.snippetFor(document, request.query, snippetFailures),
      rank: index + 1,
    }));

    await this.recordSearch(request.query, mode, results.length);

    const response: SearchResponse = Object.freeze({
      query: request.query,
      results: Object.freeze(results),
      total_results: ranking.considered,
      execution_time: (Date.now() - startTime) / 1000,
      mode,
      requested_mode: requestedMode,
      degraded: mode !== requestedMode,
      skipped: Object.freeze(ranking.skipped),
      snippet_failures: Object.freeze(snippetFailures),
    });

    logger.info({
      query: request.query,
      mode,
      degraded: response.degraded,
      resultCount: results.length,
      totalResults: response.total_results,
      executionTime: response.execution_time
    }, 'Document search completed');

    return response;
  }

  /**
   * Documents whose stored embedding is closest to the given document's.
   */
  async findRelated(documentId: number, limit = 5): Promise<RelatedDocumentsResponse> {
    const document = await this.fromStore('fetchDocumentById', () => this.store.fetchDocumentById(documentId));
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    if (!hasEmbedding(document)) {
      logger.debug({ documentId }, 'Document has no embedding, no related documents');
      return { document_id: documentId, results: [] };
    }

    const candidates = await this.fromStore('fetchDocumentsWithEmbeddings', () => this.store.fetchDocumentsWithEmbeddings());
    const ranking = this.rankSemantic(
      {
        vector: document.embedding,
        provider: document.embeddingProvider ?? undefined,
      },
      candidates.filter(candidate => candidate.id !== documentId),
      this.resolveLimit(limit)
    );

    return Object.freeze({
      document_id: documentId,
      results: Object.freeze(ranking.ranked.map(({ document: related, score }) => ({
        document: toResultDocument(related),
        score,
      }))),
    });
  }

  private resolveLimit(limit: number | undefined): number {
    const requested = limit ?? this.config.defaultLimit;
    return Math.max(1, Math.min(Math.floor(requested), this.config.maxLimit));
  }

  private async resolveQueryEmbedding(query: string, signal?: AbortSignal): Promise<EmbeddingResult | null> {
    try {
      return await this.embedder.embed(query, signal);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        logger.warn({ failures: error.failures }, 'Query embedding unavailable, degrading to keyword search');
        return null;
      }
      throw error;
    }
  }

  private rankSemantic(
    query: { vector: number[]; provider?: EmbeddingResult['provider'] },
    candidates: readonly Document[],
    limit: number
  ): Ranking {
    const embedded = candidates.filter(hasEmbedding);
    const byId = new Map(embedded.map(document => [document.id, document]));

    const outcome = this.similarity.rank(
      query,
      embedded.map(document => ({
        id: document.id,
        vector: document.embedding,
        createdAt: document.createdAt,
        provider: document.embeddingProvider,
      })),
      limit
    );

    const ranked: RankedDocument[] = [];
    for (const entry of outcome.ranked) {
      const document = byId.get(entry.id);
      if (document) {
        ranked.push({ document, score: entry.score });
      }
    }

    return { ranked, considered: outcome.considered, skipped: outcome.skipped };
  }

  private async rankKeyword(query: string, filters: SearchFilters, limit: number): Promise<Ranking> {
    const terms = [...new Set(queryTerms(query))];
    const documents = await this.fromStore(
      'fetchDocumentsMatchingTerms',
      () => this.store.fetchDocumentsMatchingTerms(terms, filters)
    );
    const outcome = this.keywordMatcher.findMatches(query, documents, limit);

    return {
      ranked: outcome.matches.map(match => ({ document: match.document, score: match.score })),
      considered: outcome.considered,
      skipped: [],
    };
  }

  private snippetFor(document: Document, query: string, failures: number[]): string {
    try {
      return extractSnippet(document.content, query, this.config.snippetLength, document.summary);
    } catch (error) {
      logger.warn({ error, documentId: document.id }, 'Snippet extraction failed');
      failures.push(document.id);
      return '';
    }
  }

  private async recordSearch(query: string, mode: SearchMode, resultsCount: number): Promise<void> {
    try {
      await this.store.recordSearch({ query, mode, resultsCount });
    } catch (error) {
      logger.warn({ error, query }, 'Failed to record search query');
    }
  }

  private async fromStore<T>(operation: string, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (error) {
      logger.error({ error, operation }, 'Document store request failed');
      throw new SearchUnavailableError(
        `Document store unavailable: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }
  }
}
