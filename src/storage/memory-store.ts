/**
 * In-memory graph store
 *
 * One PartitionGraph per tenant. Suitable for tests and single-process use;
 * the JSONL store builds on it for persistence.
 */

import { PartitionGraph, type PartitionMetrics } from '../core/graph.js';
import type {
  Entity,
  Relationship,
  StoredChunk,
  GraphContext,
  GraphData
} from '../core/types.js';
import type { GraphStore } from './types.js';

export class InMemoryGraphStore implements GraphStore {
  protected partitions: Map<string, PartitionGraph> = new Map();

  async ensurePartition(userId: string): Promise<void> {
    this.partition(userId);
  }

  async upsertEntities(entities: Entity[], userId: string): Promise<void> {
    const graph = this.partition(userId);
    for (const entity of entities) {
      graph.upsertEntity(entity);
    }
  }

  async upsertRelationships(relationships: Relationship[], userId: string): Promise<number> {
    const graph = this.partition(userId);
    let written = 0;

    for (const relationship of relationships) {
      if (graph.upsertRelationship(relationship) === 'written') {
        written++;
      }
    }

    return written;
  }

  async getNeighborhood(entityName: string, userId: string): Promise<GraphContext> {
    const graph = this.partitions.get(userId);
    return graph ? graph.getNeighborhood(entityName) : { entities: [], relationships: [] };
  }

  async listChunks(userId: string): Promise<StoredChunk[]> {
    return this.partitions.get(userId)?.getAllChunks() ?? [];
  }

  async upsertChunk(chunk: StoredChunk, userId: string): Promise<void> {
    this.partition(userId).upsertChunk(chunk);
  }

  async exportGraph(userId: string): Promise<GraphData> {
    const graph = this.partitions.get(userId);
    if (!graph) {
      return { nodes: [], edges: [] };
    }

    return {
      nodes: graph.getAllNodes().map(node => ({ id: node.name, label: node.name, type: node.type })),
      edges: graph.getAllEdges().map(edge => ({ from: edge.from, to: edge.to, label: edge.type }))
    };
  }

  async deletePartition(userId: string): Promise<void> {
    this.partitions.get(userId)?.clear();
    this.partitions.delete(userId);
  }

  async close(): Promise<void> {
    this.partitions.clear();
  }

  /**
   * Partition metrics, mostly for diagnostics and tests
   */
  getMetrics(userId: string): PartitionMetrics | undefined {
    return this.partitions.get(userId)?.getMetrics();
  }

  protected partition(userId: string): PartitionGraph {
    let graph = this.partitions.get(userId);
    if (!graph) {
      graph = new PartitionGraph();
      this.partitions.set(userId, graph);
    }
    return graph;
  }
}
