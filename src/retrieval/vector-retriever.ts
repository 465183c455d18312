/**
 * Brute-force vector retrieval over a user's stored chunks
 *
 * Every chunk in the partition is scored against the query with cosine
 * similarity. Stored vectors are reused only when they came from the model
 * the query is embedded with; anything else is re-embedded in one batch.
 */

import type { StoredChunk, VectorResult } from '../core/types.js';
import type { GraphStore } from '../storage/types.js';
import type { EmbeddingService } from '../services/embedding-service.js';
import { VectorUtils } from '../utils/vector-utils.js';

/** Results at or below this similarity are dropped */
export const RELEVANCE_THRESHOLD = 0.1;

export const DEFAULT_TOP_K = 5;

export class VectorRetriever {
  private store: GraphStore;
  private embeddings: EmbeddingService;
  private defaultTopK: number;

  constructor(store: GraphStore, embeddings: EmbeddingService, defaultTopK: number = DEFAULT_TOP_K) {
    this.store = store;
    this.embeddings = embeddings;
    this.defaultTopK = defaultTopK;
  }

  /**
   * Top-k chunks by descending similarity, ties kept in storage order
   */
  async search(query: string, userId: string, topK: number = this.defaultTopK, signal?: AbortSignal): Promise<VectorResult[]> {
    const chunks = await this.store.listChunks(userId);
    if (chunks.length === 0 || topK <= 0) {
      return [];
    }

    const [queryVector] = await this.embeddings.embed([query], signal);
    const vectors = await this.chunkVectors(chunks, signal);

    return VectorUtils.findSimilarVectors(queryVector, vectors, topK, RELEVANCE_THRESHOLD).map(result => ({
      chunk: chunks[result.index],
      similarity: result.score
    }));
  }

  private async chunkVectors(chunks: StoredChunk[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: Array<number[] | undefined> = chunks.map(chunk =>
      chunk.embedding && chunk.embeddingModel === this.embeddings.model ? chunk.embedding : undefined
    );

    const missing = chunks
      .map((chunk, index) => ({ text: chunk.text, index }))
      .filter(({ index }) => vectors[index] === undefined);

    if (missing.length > 0) {
      const embedded = await this.embeddings.embed(missing.map(item => item.text), signal);
      missing.forEach(({ index }, position) => {
        vectors[index] = embedded[position];
      });
    }

    return vectors.map((vector, index) => {
      if (!vector) {
        throw new Error(`No embedding available for chunk ${chunks[index].id}`);
      }
      return vector;
    });
  }
}
