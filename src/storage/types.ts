/**
 * Storage contract for the per-user knowledge graph
 *
 * Every operation is scoped to one tenant (user) partition. Implementations
 * must treat the tenant id as data, never as part of a query's structure.
 */

import type {
  Entity,
  Relationship,
  StoredChunk,
  GraphContext,
  GraphData
} from '../core/types.js';

export interface GraphStore {
  /**
   * Create the tenant's partition marker if it does not exist yet
   */
  ensurePartition(userId: string): Promise<void>;

  /**
   * Insert entities by name, overwriting the type of existing ones
   */
  upsertEntities(entities: Entity[], userId: string): Promise<void>;

  /**
   * Insert relationships whose endpoints both exist in the partition.
   * Returns how many relationships are present after the call (new or
   * already stored); the rest are skipped.
   */
  upsertRelationships(relationships: Relationship[], userId: string): Promise<number>;

  /**
   * Named entity plus one outgoing hop; empty when the entity is unknown
   */
  getNeighborhood(entityName: string, userId: string): Promise<GraphContext>;

  listChunks(userId: string): Promise<StoredChunk[]>;

  upsertChunk(chunk: StoredChunk, userId: string): Promise<void>;

  exportGraph(userId: string): Promise<GraphData>;

  /**
   * Remove every entity, relationship and chunk of the tenant
   */
  deletePartition(userId: string): Promise<void>;

  close(): Promise<void>;
}
