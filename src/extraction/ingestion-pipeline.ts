/**
 * Ingestion pipeline: chunks in, graph partition writes out
 *
 * Chunks are processed one at a time. Each chunk's entities and relationships
 * are written as soon as they are extracted, and its text is stored with an
 * embedding for vector retrieval. A failure on a later chunk never rolls back
 * what earlier chunks wrote; every write is an idempotent upsert.
 */

import { v5 as uuidv5 } from 'uuid';
import type { ProcessingResult } from '../core/types.js';
import type { GraphStore } from '../storage/types.js';
import type { EmbeddingService } from '../services/embedding-service.js';
import { semanticChunk, DEFAULT_MAX_CHARS } from '../chunking/semantic-chunker.js';
import { KnowledgeExtractor } from './llm-extractor.js';
import { ErrorHandler, ErrorCategory } from '../utils/error-handler.js';

/** Namespace for chunk ids */
const CHUNK_NAMESPACE = '3b0c6a52-9e47-4f1d-8a2b-c5d6e7f80912';

export interface IngestionConfig {
  /** Chunk size budget handed to the chunker */
  maxChars: number;
  /** Attempts per store write */
  maxWriteAttempts: number;
  /** First retry delay for store writes; doubles per attempt */
  retryBaseDelayMs: number;
}

/**
 * Deterministic chunk id: identical text in the same partition maps to the same id
 */
export function chunkId(userId: string, text: string): string {
  return uuidv5(`${userId}\n${text}`, CHUNK_NAMESPACE);
}

export class IngestionPipeline {
  private store: GraphStore;
  private extractor: KnowledgeExtractor;
  private embeddings: EmbeddingService;
  private config: IngestionConfig;

  constructor(
    store: GraphStore,
    extractor: KnowledgeExtractor,
    embeddings: EmbeddingService,
    config: Partial<IngestionConfig> = {}
  ) {
    this.store = store;
    this.extractor = extractor;
    this.embeddings = embeddings;
    this.config = {
      maxChars: config.maxChars ?? DEFAULT_MAX_CHARS,
      maxWriteAttempts: config.maxWriteAttempts ?? 3,
      retryBaseDelayMs: config.retryBaseDelayMs ?? 500
    };
  }

  /**
   * Chunk raw text and ingest it. Text that yields no chunks is reported as
   * an unsuccessful run with zero totals.
   */
  async ingestText(text: string, userId: string, signal?: AbortSignal): Promise<ProcessingResult> {
    const chunks = semanticChunk(text, this.config.maxChars);

    if (chunks.length === 0) {
      return { processedChunks: 0, totalEntities: 0, totalRelationships: 0, success: false };
    }

    return this.processTextChunks(chunks, userId, signal);
  }

  async processTextChunks(chunks: string[], userId: string, signal?: AbortSignal): Promise<ProcessingResult> {
    await this.store.ensurePartition(userId);

    let processedChunks = 0;
    let totalEntities = 0;
    let totalRelationships = 0;

    for (let i = 0; i < chunks.length; i++) {
      signal?.throwIfAborted();

      const chunk = chunks[i];
      if (!chunk.trim()) continue;

      console.log(`🧩 Processing chunk ${i + 1}/${chunks.length} (${chunk.length} chars)`);

      const { entities, relationships } = await this.extractor.extract(chunk, userId, signal);

      if (entities.length > 0 || relationships.length > 0) {
        await this.write(
          () => this.store.upsertEntities(entities, userId),
          'upsert entities',
          { userId, chunkIndex: i, count: entities.length },
          signal
        );
        const written = await this.write(
          () => this.store.upsertRelationships(relationships, userId),
          'upsert relationships',
          { userId, chunkIndex: i, count: relationships.length },
          signal
        );

        totalEntities += entities.length;
        totalRelationships += written;
        processedChunks++;
      }

      const [embedding] = await this.embeddings.embed([chunk], signal);
      await this.write(
        () => this.store.upsertChunk(
          { id: chunkId(userId, chunk), text: chunk, embedding, embeddingModel: this.embeddings.model },
          userId
        ),
        'upsert chunk',
        { userId, chunkIndex: i },
        signal
      );
    }

    console.log(`✅ Ingested ${processedChunks}/${chunks.length} chunks: ${totalEntities} entities, ${totalRelationships} relationships`);

    return { processedChunks, totalEntities, totalRelationships, success: true };
  }

  private write<T>(
    operation: () => Promise<T>,
    operationName: string,
    context: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    return ErrorHandler.withRetry(operation, ErrorCategory.STORAGE, operationName, {
      maxAttempts: this.config.maxWriteAttempts,
      baseDelayMs: this.config.retryBaseDelayMs,
      signal,
      context
    });
  }
}
