/**
 * Snippet extraction
 *
 * Picks a bounded excerpt of a document for display next to a search hit.
 * Lengths are counted in code points so surrogate pairs are never split.
 */

export class SnippetExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnippetExtractionError';
  }
}

export function queryTerms(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

interface TermMatch {
  /** Code point index of the match */
  start: number;
  /** Length of the match in code points */
  length: number;
}

function findEarliestTerm(chars: readonly string[], terms: readonly string[]): TermMatch | null {
  // Lower-case per code point so string offsets map back to code point indexes
  const offsets: number[] = [];
  let lowered = '';
  for (const char of chars) {
    offsets.push(lowered.length);
    lowered += char.toLowerCase();
  }

  let best: TermMatch | null = null;
  for (const term of terms) {
    const at = lowered.indexOf(term);
    if (at === -1) continue;

    const start = codePointIndexAt(offsets, at);
    if (best === null || start < best.start) {
      const end = codePointIndexAt(offsets, at + term.length - 1) + 1;
      best = { start, length: end - start };
    }
  }
  return best;
}

function codePointIndexAt(offsets: readonly number[], stringOffset: number): number {
  let low = 0;
  let high = offsets.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (offsets[mid] <= stringOffset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

export function extractSnippet(
  text: string,
  query: string,
  maxLength: number,
  summary?: string | null
): string {
  if (!Number.isFinite(maxLength)) {
    throw new SnippetExtractionError(`Invalid snippet length: ${maxLength}`);
  }
  const limit = Math.floor(maxLength);
  if (limit <= 0) {
    return '';
  }

  const chars = Array.from(text);
  const match = findEarliestTerm(chars, queryTerms(query));

  if (match) {
    const center = match.start + Math.floor(match.length / 2);
    let start = Math.max(0, center - Math.floor(limit / 2));
    const end = Math.min(chars.length, start + limit);
    // Near the end of the text, slide left to keep the window full
    start = Math.max(0, end - limit);
    return chars.slice(start, end).join('');
  }

  if (summary && summary.trim() && Array.from(summary).length <= limit) {
    return summary;
  }
  return chars.slice(0, limit).join('');
}
