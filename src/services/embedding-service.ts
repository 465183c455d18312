/**
 * Embedding Service for coursegraph
 *
 * Provides the embedding contract used by ingestion and vector retrieval, and
 * an implementation over any OpenAI-compatible embeddings endpoint with
 * caching and batch processing. Vectors are only comparable when they come
 * from the same model, so the model name travels with every stored vector.
 */

import OpenAI from 'openai';
import { VectorUtils, type EmbeddingCache } from '../utils/vector-utils.js';

/**
 * Ordered texts in, ordered fixed-dimension vectors out; deterministic for a
 * fixed model version.
 */
export interface EmbeddingService {
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * The slice of the OpenAI SDK this service calls
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[] },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface EmbeddingServiceConfig {
  baseURL: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  /** Cached vectors keyed by text; 0 disables the cache */
  cacheSize: number;
  /** Texts sent per embeddings request */
  maxBatchSize: number;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  readonly model: string;
  private client: EmbeddingsClient;
  private config: EmbeddingServiceConfig;
  private cache: EmbeddingCache;

  constructor(config: Omit<EmbeddingServiceConfig, 'maxBatchSize'> & { maxBatchSize?: number }, client?: EmbeddingsClient) {
    this.config = {
      ...config,
      maxBatchSize: config.maxBatchSize ?? 32
    };
    this.model = config.model;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries
    });
    this.cache = VectorUtils.createEmbeddingCache(Math.max(1, config.cacheSize));
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: Array<number[] | undefined> = texts.map(text => this.cacheEnabled ? this.cache.get(text) : undefined);
    const missing = texts
      .map((text, index) => ({ text, index }))
      .filter(({ index }) => results[index] === undefined);

    for (const batch of this.chunkArray(missing, this.config.maxBatchSize)) {
      const response = await this.client.embeddings.create(
        { model: this.model, input: batch.map(item => item.text) },
        { signal }
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(`Embedding generation failed: expected ${batch.length} vectors, got ${ordered.length}`);
      }

      ordered.forEach((item, position) => {
        const { text, index } = batch[position];
        if (!VectorUtils.isValid(item.embedding)) {
          throw new Error(`Embedding generation failed: invalid vector for input ${index}`);
        }
        results[index] = item.embedding;
        if (this.cacheEnabled) {
          this.cache.set(text, item.embedding);
        }
      });
    }

    return results.map((embedding, index) => {
      if (!embedding) {
        throw new Error(`Embedding generation failed: no vector for input ${index}`);
      }
      return embedding;
    });
  }

  clearCache(): void {
    this.cache.clear();
  }

  private get cacheEnabled(): boolean {
    return this.config.cacheSize > 0;
  }

  private chunkArray<T>(array: T[], chunkSize: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += chunkSize) {
      chunks.push(array.slice(i, i + chunkSize));
    }
    return chunks;
  }
}
