/**
 * Document records as served by the document store. The search core reads
 * these and never mutates them.
 */

import type { EmbedderProvider } from '../embeddings/types.js';

export interface Document {
  id: number;
  title: string;
  content: string;
  fileType: string;
  tags: string[];
  summary: string | null;
  createdAt: Date;
  embedding: number[] | null;
  /** Which provider produced `embedding`; null for rows embedded before tagging */
  embeddingProvider: EmbedderProvider | null;
}

export type EmbeddedDocument = Document & { embedding: number[] };

export interface SearchFilters {
  fileTypes?: string[];
  /** Every listed tag must be present */
  tags?: string[];
  dateFrom?: Date;
  dateTo?: Date;
}

export type SearchMode = 'semantic' | 'keyword';

export interface SearchLogEntry {
  query: string;
  mode: SearchMode;
  resultsCount: number;
}

export function hasEmbedding(document: Document): document is EmbeddedDocument {
  return document.embedding !== null;
}

export function matchesFilters(document: Document, filters: SearchFilters = {}): boolean {
  if (filters.fileTypes?.length && !filters.fileTypes.includes(document.fileType)) {
    return false;
  }
  if (filters.tags?.length) {
    const tags = new Set(document.tags.map(tag => tag.toLowerCase()));
    if (!filters.tags.every(tag => tags.has(tag.toLowerCase()))) {
      return false;
    }
  }
  if (filters.dateFrom && document.createdAt < filters.dateFrom) {
    return false;
  }
  if (filters.dateTo && document.createdAt > filters.dateTo) {
    return false;
  }
  return true;
}
