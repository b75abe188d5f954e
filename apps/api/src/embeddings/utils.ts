import { z } from 'zod';

/**
 * Vector math and payload helpers for embeddings
 */

const vectorSchema = z.array(z.number().finite()).nonempty();

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same dimensions');
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitude(vector: readonly number[]): number {
  let sum = 0;
  for (const component of vector) {
    sum += component * component;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1], where 1 means identical direction.
 * A zero-magnitude vector has similarity 0 with everything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const dot = dotProduct(a, b);
  const magnitudeA = magnitude(a);
  const magnitudeB = magnitude(b);

  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  // Rounding can push identical directions a hair past 1
  return Math.max(-1, Math.min(1, dot / (magnitudeA * magnitudeB)));
}

/**
 * Validate an embedding payload. Returns null for anything that is not a
 * non-empty array of finite numbers, or whose length differs from `expectedDimensions`.
 */
export function parseVector(payload: unknown, expectedDimensions?: number): number[] | null {
  const result = vectorSchema.safeParse(payload);
  if (!result.success) {
    return null;
  }
  if (expectedDimensions !== undefined && result.data.length !== expectedDimensions) {
    return null;
  }
  return result.data;
}

function cutAtWordBoundary(chars: readonly string[], cut: number): string {
  const floor = Math.floor(cut * 0.8);
  for (let i = cut - 1; i >= floor; i--) {
    if (/\s/.test(chars[i])) {
      return chars.slice(0, i).join('').trimEnd();
    }
  }
  return chars.slice(0, cut).join('');
}

/**
 * Cut text to at most `maxChars` code points, backing up to the last whitespace
 * when one falls in the final fifth of the window.
 */
export function truncateAtWordBoundary(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) {
    return text;
  }
  return cutAtWordBoundary(chars, maxChars);
}

function utf8Length(char: string): number {
  const codePoint = char.codePointAt(0) ?? 0;
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Cut text to at most `maxBytes` bytes of UTF-8, on a code point and, where one
 * falls in the final fifth, a whitespace boundary. A byte-level BPE tokenizer
 * never emits more tokens than input bytes, so a token ceiling used as the
 * byte budget always fits.
 */
export function truncateToByteLength(text: string, maxBytes: number): string {
  const chars = Array.from(text);
  let bytes = 0;
  let cut = 0;
  while (cut < chars.length && bytes + utf8Length(chars[cut]) <= maxBytes) {
    bytes += utf8Length(chars[cut]);
    cut++;
  }
  if (cut === chars.length) {
    return text;
  }
  return cutAtWordBoundary(chars, cut);
}
