/**
 * Document store
 *
 * Storage collaborator for the search core: read-only snapshots of documents
 * and their stored embeddings, plus the two writes the service needs
 * (search history and embedding backfill).
 */

import { z } from 'zod';
import { logger } from '../config/index.js';
import type { EmbedderProvider } from '../embeddings/types.js';
import type { Document, SearchFilters, SearchLogEntry } from '../types/document.js';

export interface DocumentStore {
  fetchDocumentsWithEmbeddings(filters?: SearchFilters): Promise<Document[]>;
  /** Documents whose title, content or tags contain any of `terms` (case-insensitive) */
  fetchDocumentsMatchingTerms(terms: string[], filters?: SearchFilters): Promise<Document[]>;
  fetchDocumentById(id: number): Promise<Document | null>;
  fetchDocumentsWithoutEmbeddings(limit: number): Promise<Document[]>;
  saveEmbedding(id: number, vector: number[], provider: EmbedderProvider): Promise<void>;
  recordSearch(entry: SearchLogEntry): Promise<void>;
}

/**
 * The part of a pg Pool or Client the store uses.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const documentRowSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  content: z.string(),
  file_type: z.string(),
  tags: z.array(z.string()).nullable(),
  summary: z.string().nullable(),
  created_at: z.coerce.date(),
  embedding: z.array(z.number()).nullable(),
  embedding_provider: z.enum(['openai', 'local']).nullable(),
});

type DocumentRow = z.infer<typeof documentRowSchema>;

// A JSONB 'null' literal passes IS NOT NULL, so test the stored type
const HAS_EMBEDDING = "COALESCE(jsonb_typeof(embedding) = 'array', false)";

const DOCUMENT_COLUMNS = 'id, title, content, file_type, tags, summary, created_at, embedding, embedding_provider';

function rowToDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    fileType: row.file_type,
    tags: row.tags ?? [],
    summary: row.summary,
    createdAt: row.created_at,
    embedding: row.embedding,
    embeddingProvider: row.embedding_provider,
  };
}

export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, match => `\\${match}`);
}

/**
 * Append WHERE clauses for `filters`, numbering placeholders after `values`.
 */
export function buildFilterClauses(filters: SearchFilters, values: unknown[]): string[] {
  const clauses: string[] = [];

  if (filters.fileTypes?.length) {
    values.push(filters.fileTypes);
    clauses.push(`file_type = ANY($${values.length}::text[])`);
  }
  if (filters.tags?.length) {
    values.push(filters.tags);
    clauses.push(
      `NOT EXISTS (SELECT 1 FROM unnest($${values.length}::text[]) AS wanted(tag) ` +
      `WHERE NOT EXISTS (SELECT 1 FROM jsonb_array_elements_text(COALESCE(tags, '[]'::jsonb)) AS have(tag) ` +
      `WHERE lower(have.tag) = lower(wanted.tag)))`
    );
  }
  if (filters.dateFrom) {
    values.push(filters.dateFrom);
    clauses.push(`created_at >= $${values.length}`);
  }
  if (filters.dateTo) {
    values.push(filters.dateTo);
    clauses.push(`created_at <= $${values.length}`);
  }

  return clauses;
}

export class PgDocumentStore implements DocumentStore {
  private db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async fetchDocumentsWithEmbeddings(filters: SearchFilters = {}): Promise<Document[]> {
    const values: unknown[] = [];
    const clauses = [HAS_EMBEDDING, ...buildFilterClauses(filters, values)];
    return this.selectDocuments(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE ${clauses.join(' AND ')} ORDER BY created_at DESC, id ASC`,
      values
    );
  }

  async fetchDocumentsMatchingTerms(terms: string[], filters: SearchFilters = {}): Promise<Document[]> {
    if (!terms.length) {
      return [];
    }

    const values: unknown[] = [terms.map(term => `%${escapeLikePattern(term)}%`)];
    const clauses = [
      `(title ILIKE ANY($1::text[]) OR content ILIKE ANY($1::text[]) OR EXISTS (` +
      `SELECT 1 FROM jsonb_array_elements_text(COALESCE(tags, '[]'::jsonb)) AS t(tag) WHERE t.tag ILIKE ANY($1::text[])))`,
      ...buildFilterClauses(filters, values)
    ];
    return this.selectDocuments(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE ${clauses.join(' AND ')} ORDER BY created_at DESC, id ASC`,
      values
    );
  }

  async fetchDocumentById(id: number): Promise<Document | null> {
    const documents = await this.selectDocuments(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1`,
      [id]
    );
    return documents[0] ?? null;
  }

  async fetchDocumentsWithoutEmbeddings(limit: number): Promise<Document[]> {
    return this.selectDocuments(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE NOT ${HAS_EMBEDDING} ORDER BY id ASC LIMIT $1`,
      [limit]
    );
  }

  async saveEmbedding(id: number, vector: number[], provider: EmbedderProvider): Promise<void> {
    // pg sends JS arrays as Postgres arrays, so JSONB needs the serialized form
    await this.db.query(
      'UPDATE documents SET embedding = $2::jsonb, embedding_provider = $3, updated_at = NOW() WHERE id = $1',
      [id, JSON.stringify(vector), provider]
    );
  }

  async recordSearch(entry: SearchLogEntry): Promise<void> {
    await this.db.query(
      'INSERT INTO search_queries (query, mode, results_count) VALUES ($1, $2, $3)',
      [entry.query, entry.mode, entry.resultsCount]
    );
  }

  private async selectDocuments(sql: string, values: unknown[]): Promise<Document[]> {
    const { rows } = await this.db.query(sql, values);
    const documents: Document[] = [];

    for (const row of rows) {
      const parsed = documentRowSchema.safeParse(row);
      if (parsed.success) {
        documents.push(rowToDocument(parsed.data));
      } else {
        logger.warn({ issues: parsed.error.issues }, 'Skipping malformed document row');
      }
    }
    return documents;
  }
}
