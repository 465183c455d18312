/**
 * Vector utility functions for similarity calculations and embedding caching
 */

export type Vector = ArrayLike<number>;

export interface SimilarityResult {
  index: number;
  score: number;
}

export interface EmbeddingCache {
  get(key: string): number[] | undefined;
  set(key: string, embedding: number[]): void;
  clear(): void;
  size(): number;
}

export class VectorUtils {
  /**
   * Calculate cosine similarity between two vectors
   */
  static cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  }

  /**
   * Check if vector has valid values (not NaN or infinite)
   */
  static isValid(vector: Vector): boolean {
    for (let i = 0; i < vector.length; i++) {
      if (!isFinite(vector[i])) {
        return false;
      }
    }
    return true;
  }

  /**
   * Rank candidates against a query by cosine similarity.
   *
   * The sort is stable, so equal scores keep candidate order. `topK` is applied
   * first and results at or below `threshold` are then dropped, which may leave
   * fewer than `topK`.
   */
  static findSimilarVectors(
    query: Vector,
    candidates: Vector[],
    topK: number = 5,
    threshold: number = 0
  ): SimilarityResult[] {
    const results: SimilarityResult[] = candidates.map((candidate, index) => ({
      index,
      score: this.cosineSimilarity(query, candidate)
    }));

    results.sort((a, b) => b.score - a.score);

    return results
      .slice(0, Math.max(0, topK))
      .filter(result => result.score > threshold);
  }

  /**
   * Create a bounded embedding cache; the oldest entry is evicted first
   */
  static createEmbeddingCache(maxSize: number = 1000): EmbeddingCache {
    const cache = new Map<string, number[]>();

    return {
      get: (key: string) => cache.get(key),
      set: (key: string, embedding: number[]) => {
        if (!cache.has(key) && cache.size >= maxSize) {
          const oldest = cache.keys().next();
          if (!oldest.done) {
            cache.delete(oldest.value);
          }
        }
        cache.set(key, embedding);
      },
      clear: () => cache.clear(),
      size: () => cache.size
    };
  }
}
