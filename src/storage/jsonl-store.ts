/**
 * JSONL-backed graph store
 *
 * Keeps each tenant's partition in memory and writes it through to one JSON
 * Lines file per tenant after every mutation. Each line holds a single
 * entity, relationship or chunk record, so files stay greppable and can be
 * streamed line by line.
 *
 * File names are UUID v5 digests of the tenant id; the raw id never becomes
 * part of a path.
 *
 * References:
 * - JSONL specification: https://jsonlines.org/
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import { PartitionGraph, type PartitionSnapshot } from '../core/graph.js';
import { ENTITY_TYPES, RELATIONSHIP_TYPES } from '../core/types.js';
import type {
  Entity,
  Relationship,
  StoredChunk,
  GraphContext,
  GraphData
} from '../core/types.js';
import { InMemoryGraphStore } from './memory-store.js';
import {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  StoreError,
  toError
} from '../utils/error-handler.js';

/** Namespace for tenant file names */
const PARTITION_NAMESPACE = '8f4b2c1e-5d6a-4f3b-9c2d-7e1a0b3c4d5e';

const recordSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('partition'),
    data: z.object({ userId: z.string() })
  }),
  z.object({
    type: z.literal('entity'),
    data: z.object({
      name: z.string().min(1),
      type: z.enum(ENTITY_TYPES),
      createdAt: z.string(),
      updatedAt: z.string()
    })
  }),
  z.object({
    type: z.literal('relationship'),
    data: z.object({
      from: z.string().min(1),
      to: z.string().min(1),
      type: z.enum(RELATIONSHIP_TYPES),
      createdAt: z.string()
    })
  }),
  z.object({
    type: z.literal('chunk'),
    data: z.object({
      id: z.string().min(1),
      text: z.string(),
      embedding: z.array(z.number()).optional(),
      embeddingModel: z.string().optional()
    })
  })
]);

// fs errors may come from another realm, so no instanceof check
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export interface JsonlGraphStoreConfig {
  /** Base directory; partitions live under `<directory>/partitions` */
  directory: string;
}

export class JsonlGraphStore extends InMemoryGraphStore {
  private config: JsonlGraphStoreConfig;
  /** One load per tenant; every caller awaits the same read */
  private loading: Map<string, Promise<void>> = new Map();
  private writeQueue: Map<string, Promise<void>> = new Map();

  constructor(config: JsonlGraphStoreConfig) {
    super();
    this.config = config;
  }

  /**
   * Path of the tenant's partition file
   */
  partitionPath(userId: string): string {
    return join(this.config.directory, 'partitions', `${uuidv5(userId, PARTITION_NAMESPACE)}.jsonl`);
  }

  async ensurePartition(userId: string): Promise<void> {
    await this.load(userId);
    const existed = await this.fileExists(this.partitionPath(userId));
    await super.ensurePartition(userId);
    if (!existed) {
      await this.persist(userId);
    }
  }

  async upsertEntities(entities: Entity[], userId: string): Promise<void> {
    await this.load(userId);
    await super.upsertEntities(entities, userId);
    await this.persist(userId);
  }

  async upsertRelationships(relationships: Relationship[], userId: string): Promise<number> {
    await this.load(userId);
    const written = await super.upsertRelationships(relationships, userId);
    await this.persist(userId);
    return written;
  }

  async getNeighborhood(entityName: string, userId: string): Promise<GraphContext> {
    await this.load(userId);
    return super.getNeighborhood(entityName, userId);
  }

  async listChunks(userId: string): Promise<StoredChunk[]> {
    await this.load(userId);
    return super.listChunks(userId);
  }

  async upsertChunk(chunk: StoredChunk, userId: string): Promise<void> {
    await this.load(userId);
    await super.upsertChunk(chunk, userId);
    await this.persist(userId);
  }

  async exportGraph(userId: string): Promise<GraphData> {
    await this.load(userId);
    return super.exportGraph(userId);
  }

  async deletePartition(userId: string): Promise<void> {
    await this.load(userId);
    await this.writeQueue.get(userId);
    await super.deletePartition(userId);

    try {
      await fs.rm(this.partitionPath(userId), { force: true });
    } catch (error) {
      throw new StoreError(`Failed to delete partition file: ${toError(error).message}`, 'deletePartition', { cause: error });
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.writeQueue.values());
    this.writeQueue.clear();
    this.loading.clear();
    await super.close();
  }

  private load(userId: string): Promise<void> {
    const pending = this.loading.get(userId);
    if (pending) {
      return pending;
    }

    const read = this.readPartition(userId).catch((error: unknown) => {
      this.loading.delete(userId);
      throw error;
    });
    this.loading.set(userId, read);
    return read;
  }

  private async readPartition(userId: string): Promise<void> {
    const filePath = this.partitionPath(userId);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new StoreError(`Failed to read partition file: ${toError(error).message}`, 'load', { cause: error });
    }

    const snapshot: PartitionSnapshot = { entities: [], relationships: [], chunks: [] };
    const lines = content.split('\n');

    lines.forEach((line, index) => {
      if (!line.trim()) return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        this.reportInvalidLine(filePath, index, toError(error).message);
        return;
      }

      const record = recordSchema.safeParse(parsed);
      if (!record.success) {
        this.reportInvalidLine(filePath, index, record.error.message);
        return;
      }

      switch (record.data.type) {
        case 'entity':
          snapshot.entities.push(record.data.data);
          break;
        case 'relationship':
          snapshot.relationships.push(record.data.data);
          break;
        case 'chunk':
          snapshot.chunks.push(record.data.data);
          break;
        case 'partition':
          break;
      }
    });

    this.partitions.set(userId, PartitionGraph.fromSnapshot(snapshot));
  }

  /**
   * Rewrite the tenant's file atomically; writes for one tenant are serialized
   */
  private persist(userId: string): Promise<void> {
    const previous = this.writeQueue.get(userId) ?? Promise.resolve();
    const next = previous.then(() => this.writePartition(userId));
    const settled = next.catch(() => undefined);
    this.writeQueue.set(userId, settled);
    return next;
  }

  private async writePartition(userId: string): Promise<void> {
    const graph = this.partitions.get(userId);
    if (!graph) {
      return;
    }

    const snapshot = graph.toSnapshot();
    const lines = [
      JSON.stringify({ type: 'partition', data: { userId } }),
      ...snapshot.entities.map(data => JSON.stringify({ type: 'entity', data })),
      ...snapshot.relationships.map(data => JSON.stringify({ type: 'relationship', data })),
      ...snapshot.chunks.map(data => JSON.stringify({ type: 'chunk', data }))
    ];

    const filePath = this.partitionPath(userId);
    const tempPath = `${filePath}.tmp`;

    try {
      await fs.mkdir(join(this.config.directory, 'partitions'), { recursive: true });
      await fs.writeFile(tempPath, lines.join('\n') + '\n', 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new StoreError(`Failed to write partition file: ${toError(error).message}`, 'persist', { cause: error });
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private reportInvalidLine(filePath: string, index: number, reason: string): void {
    ErrorHandler.handle(
      ErrorCategory.STORAGE,
      ErrorSeverity.MEDIUM,
      `Skipping invalid record on line ${index + 1}`,
      undefined,
      { filePath, reason },
      'Inspect the partition file; the record is dropped on the next write'
    );
  }
}
