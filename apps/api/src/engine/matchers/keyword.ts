/**
 * Keyword Matcher
 *
 * Case-insensitive term matching over title, content and tags. Used for
 * keyword-mode searches and when no query embedding can be produced.
 */

import { logger } from '../../config/index.js';
import type { Document } from '../../types/document.js';
import { queryTerms } from '../snippet.js';

export interface KeywordMatch {
  document: Document;
  /** Fraction of query terms found anywhere in the document, in (0, 1] */
  score: number;
  matchedTerms: string[];
  occurrences: number;
}

export interface KeywordOutcome {
  matches: KeywordMatch[];
  /** Matching documents before the limit */
  considered: number;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export class KeywordMatcher {
  findMatches(query: string, documents: readonly Document[], limit: number): KeywordOutcome {
    const terms = [...new Set(queryTerms(query))];
    if (!terms.length) {
      return { matches: [], considered: 0 };
    }

    const matches: KeywordMatch[] = [];
    for (const document of documents) {
      const fields = [
        document.title.toLowerCase(),
        document.content.toLowerCase(),
        ...document.tags.map(tag => tag.toLowerCase())
      ];

      const matchedTerms: string[] = [];
      let occurrences = 0;
      for (const term of terms) {
        const count = fields.reduce((sum, field) => sum + countOccurrences(field, term), 0);
        if (count > 0) {
          matchedTerms.push(term);
          occurrences += count;
        }
      }

      if (matchedTerms.length) {
        matches.push({
          document,
          score: matchedTerms.length / terms.length,
          matchedTerms,
          occurrences,
        });
      }
    }

    matches.sort((a, b) =>
      b.score - a.score ||
      b.occurrences - a.occurrences ||
      b.document.createdAt.getTime() - a.document.createdAt.getTime() ||
      a.document.id - b.document.id
    );

    logger.debug({
      terms,
      documents: documents.length,
      matches: matches.length
    }, 'Keyword matching completed');

    return {
      matches: matches.slice(0, Math.max(0, limit)),
      considered: matches.length,
    };
  }
}
