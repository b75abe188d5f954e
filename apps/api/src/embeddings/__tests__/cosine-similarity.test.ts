import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '../utils.js';

describe('Cosine Similarity - Vector Comparison Accuracy', () => {
  describe('Basic Mathematical Properties', () => {
    it('should return 1.0 for identical vectors', () => {
      const vector = [0.5, 0.3, 0.8, 0.1];
      expect(cosineSimilarity(vector, [...vector])).toBeCloseTo(1.0, 10);
    });

    it('should return 0.0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0, 0, 0], [0, 1, 0, 0])).toBeCloseTo(0.0, 10);
    });

    it('should return -1.0 for opposite vectors', () => {
      expect(cosineSimilarity([1, 0, 0], [-1, 0, 0])).toBeCloseTo(-1.0, 10);
    });

    it('should be symmetric', () => {
      const a = [0.2, 0.7, 0.3, 0.9];
      const b = [0.8, 0.1, 0.6, 0.4];
      expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
    });

    it('should be symmetric for vectors of equal magnitude', () => {
      const a = [3, 4, 0];
      const b = [0, 3, 4];
      expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
      expect(cosineSimilarity(a, b)).toBeCloseTo(12 / 25, 12);
    });

    it('should return 0 when either vector has zero magnitude', () => {
      expect(cosineSimilarity([0, 0, 0, 0], [1, 2, 3, 4])).toBe(0);
      expect(cosineSimilarity([1, 2, 3, 4], [0, 0, 0, 0])).toBe(0);
      expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
    });
  });

  describe('Numerical Precision and Edge Cases', () => {
    it('should maintain precision with small values', () => {
      const vector = [1e-10, 2e-10, 3e-10];
      expect(cosineSimilarity(vector, vector)).toBeCloseTo(1.0, 8);
    });

    it('should handle large values without overflow', () => {
      const vector = [1e6, 2e6, 3e6];
      expect(cosineSimilarity(vector, vector)).toBeCloseTo(1.0, 10);
    });

    it('should ignore magnitude', () => {
      expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1.0, 10);
    });

    it('should never leave [-1, 1]', () => {
      const vector = [0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1];
      const similarity = cosineSimilarity(vector, vector);
      expect(similarity).toBeLessThanOrEqual(1);
      expect(similarity).toBeGreaterThanOrEqual(-1);
    });

    it('should calculate correct similarity at 60 degrees', () => {
      expect(cosineSimilarity([1, 0], [0.5, Math.sqrt(3) / 2])).toBeCloseTo(0.5, 10);
    });

    it('should handle sparse vectors', () => {
      expect(cosineSimilarity([1, 0, 0, 0, 1, 0], [1, 0, 0, 0, 0, 1])).toBeCloseTo(0.5, 10);
    });
  });

  describe('Dimension Validation', () => {
    it('should throw error for mismatched dimensions', () => {
      expect(() => cosineSimilarity([1, 2, 3], [1, 2, 3, 4]))
        .toThrow('Vectors must have the same dimensions');
    });

    it('should handle high-dimensional vectors', () => {
      const vector = Array(1536).fill(0.1);
      expect(cosineSimilarity(vector, vector)).toBeCloseTo(1.0, 10);
    });
  });

  describe('Document Embedding Scenarios', () => {
    it('should order related notes above unrelated ones', () => {
      const query = [0.5, 0.5, 0.5, 0.5];
      const embeddings = [
        [0.6, 0.4, 0.5, 0.5],
        [0.2, 0.8, 0.7, 0.3],
        [0.5, 0.5, 0.5, 0.5],
        [0.1, 0.1, 0.1, 0.9]
      ];

      const similarities = embeddings.map(embedding => cosineSimilarity(query, embedding));

      expect(similarities[2]).toBeCloseTo(1.0, 10);
      expect(similarities[0]).toBeGreaterThan(similarities[1]);
      expect(similarities[1]).toBeGreaterThan(similarities[3]);
    });
  });
});
