import type { EmbedderProvider, EmbeddingResult } from '../embeddings/types.js';
import { EmbeddingUnavailableError } from '../embeddings/types.js';
import type { DocumentStore } from '../services/document-store.js';
import type { QueryEmbedder } from '../services/search-service.js';
import {
  matchesFilters,
  type Document,
  type SearchFilters,
  type SearchLogEntry
} from '../types/document.js';

let nextId = 1;

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    id: overrides.id ?? nextId++,
    title: 'Untitled',
    content: '',
    fileType: 'txt',
    tags: [],
    summary: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    embedding: null,
    embeddingProvider: null,
    ...overrides,
  };
}

/**
 * Document store over an array, for tests.
 */
export class InMemoryDocumentStore implements DocumentStore {
  readonly searches: SearchLogEntry[] = [];
  failWith: Error | null = null;

  constructor(public documents: Document[] = []) {}

  async fetchDocumentsWithEmbeddings(filters: SearchFilters = {}): Promise<Document[]> {
    this.throwIfFailing();
    return this.documents.filter(d => d.embedding !== null && matchesFilters(d, filters));
  }

  async fetchDocumentsMatchingTerms(terms: string[], filters: SearchFilters = {}): Promise<Document[]> {
    this.throwIfFailing();
    return this.documents.filter(d => {
      const fields = [d.title, d.content, ...d.tags].map(f => f.toLowerCase());
      return matchesFilters(d, filters) && terms.some(term => fields.some(f => f.includes(term)));
    });
  }

  async fetchDocumentById(id: number): Promise<Document | null> {
    this.throwIfFailing();
    return this.documents.find(d => d.id === id) ?? null;
  }

  async fetchDocumentsWithoutEmbeddings(limit: number): Promise<Document[]> {
    this.throwIfFailing();
    return this.documents.filter(d => d.embedding === null).slice(0, limit);
  }

  async saveEmbedding(id: number, vector: number[], provider: EmbedderProvider): Promise<void> {
    this.throwIfFailing();
    this.documents = this.documents.map(d =>
      d.id === id ? { ...d, embedding: vector, embeddingProvider: provider } : d
    );
  }

  async recordSearch(entry: SearchLogEntry): Promise<void> {
    this.throwIfFailing();
    this.searches.push(entry);
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/**
 * Query embedder returning fixed vectors per text, or failing like an exhausted provider chain.
 */
export class FakeQueryEmbedder implements QueryEmbedder {
  readonly calls: string[] = [];

  constructor(
    private vectors: Record<string, number[]>,
    private provider: EmbedderProvider = 'openai',
    public unavailable = false
  ) {}

  async embed(text: string): Promise<EmbeddingResult> {
    this.calls.push(text);
    const vector = this.vectors[text];
    if (this.unavailable || !vector) {
      throw new EmbeddingUnavailableError([
        { provider: 'openai', reason: 'error', message: 'remote down' },
        { provider: 'local', reason: 'error', message: 'model missing' },
      ]);
    }
    return { vector, provider: this.provider, model: 'fake-model', dimensions: vector.length };
  }
}
