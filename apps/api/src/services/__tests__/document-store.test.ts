import { describe, it, expect, vi } from 'vitest';
import type { SqlClient } from '../document-store.js';

vi.mock('../../config/index.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  },
}));

const { PgDocumentStore, buildFilterClauses, escapeLikePattern } = await import('../document-store.js');

const row = {
  id: '12',
  title: 'Meeting notes',
  content: 'Discussed the timeline',
  file_type: 'md',
  tags: ['planning'],
  summary: null,
  created_at: '2024-03-05T10:00:00.000Z',
  embedding: [0.1, 0.2],
  embedding_provider: 'local',
};

function fakeClient(rows: unknown[] = []) {
  const query = vi.fn<SqlClient['query']>(async () => ({ rows }));
  return { client: { query }, query };
}

describe('PgDocumentStore', () => {
  it('maps rows into documents', async () => {
    const { client } = fakeClient([row]);
    const store = new PgDocumentStore(client);

    const [document] = await store.fetchDocumentsWithEmbeddings();

    expect(document).toEqual({
      id: 12,
      title: 'Meeting notes',
      content: 'Discussed the timeline',
      fileType: 'md',
      tags: ['planning'],
      summary: null,
      createdAt: new Date('2024-03-05T10:00:00.000Z'),
      embedding: [0.1, 0.2],
      embeddingProvider: 'local',
    });
  });

  it('skips malformed rows', async () => {
    const { client } = fakeClient([{ ...row, embedding: 'not a vector' }, { ...row, id: 13, tags: null }]);
    const store = new PgDocumentStore(client);

    const documents = await store.fetchDocumentsWithEmbeddings();

    expect(documents.map(d => d.id)).toEqual([13]);
    expect(documents[0].tags).toEqual([]);
  });

  it('numbers filter placeholders after the embedding clause', async () => {
    const { client, query } = fakeClient();
    const store = new PgDocumentStore(client);
    const dateFrom = new Date('2024-01-01T00:00:00Z');

    await store.fetchDocumentsWithEmbeddings({ fileTypes: ['pdf'], dateFrom });

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain("WHERE COALESCE(jsonb_typeof(embedding) = 'array', false) AND file_type = ANY($1::text[]) AND created_at >= $2 ORDER BY");
    expect(values).toEqual([['pdf'], dateFrom]);
  });

  it('matches terms with escaped ILIKE patterns', async () => {
    const { client, query } = fakeClient();
    const store = new PgDocumentStore(client);

    await store.fetchDocumentsMatchingTerms(['50%', 'plan'], { tags: ['Q3'] });

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('title ILIKE ANY($1::text[])');
    expect(sql).toContain('unnest($2::text[])');
    expect(values).toEqual([['%50\\%%', '%plan%'], ['Q3']]);
  });

  it('skips the query when there are no terms', async () => {
    const { client, query } = fakeClient();
    const store = new PgDocumentStore(client);

    expect(await store.fetchDocumentsMatchingTerms([])).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it('treats a JSON null embedding as missing', async () => {
    const { client, query } = fakeClient([{ ...row, embedding: null, embedding_provider: null }]);
    const store = new PgDocumentStore(client);

    const [document] = await store.fetchDocumentsWithoutEmbeddings(25);

    expect(query).toHaveBeenCalledWith(
      "SELECT id, title, content, file_type, tags, summary, created_at, embedding, embedding_provider FROM documents " +
      "WHERE NOT COALESCE(jsonb_typeof(embedding) = 'array', false) ORDER BY id ASC LIMIT $1",
      [25]
    );
    expect(document.embedding).toBeNull();
  });

  it('returns null for a missing document', async () => {
    const { client } = fakeClient();
    const store = new PgDocumentStore(client);

    expect(await store.fetchDocumentById(99)).toBeNull();
  });

  it('stores embeddings as JSON with their provider', async () => {
    const { client, query } = fakeClient();
    const store = new PgDocumentStore(client);

    await store.saveEmbedding(5, [0.5, -0.5], 'openai');

    expect(query).toHaveBeenCalledWith(
      'UPDATE documents SET embedding = $2::jsonb, embedding_provider = $3, updated_at = NOW() WHERE id = $1',
      [5, '[0.5,-0.5]', 'openai']
    );
  });

  it('records search history', async () => {
    const { client, query } = fakeClient();
    const store = new PgDocumentStore(client);

    await store.recordSearch({ query: 'timeline', mode: 'keyword', resultsCount: 2 });

    expect(query).toHaveBeenCalledWith(
      'INSERT INTO search_queries (query, mode, results_count) VALUES ($1, $2, $3)',
      ['timeline', 'keyword', 2]
    );
  });
});

describe('buildFilterClauses', () => {
  it('adds nothing for empty filters', () => {
    const values: unknown[] = [];
    expect(buildFilterClauses({}, values)).toEqual([]);
    expect(values).toEqual([]);
  });

  it('adds an upper date bound', () => {
    const values: unknown[] = ['existing'];
    const dateTo = new Date('2024-12-31T00:00:00Z');

    expect(buildFilterClauses({ dateTo }, values)).toEqual(['created_at <= $2']);
    expect(values).toEqual(['existing', dateTo]);
  });
});

describe('escapeLikePattern', () => {
  it('escapes LIKE wildcards and backslashes', () => {
    expect(escapeLikePattern('a_b%c\\d')).toBe('a\\_b\\%c\\\\d');
  });
});
