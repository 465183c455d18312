/**
 * Adjacency-list graph for a single user partition
 *
 * Entities are keyed by name, edges by their (from, type, to) triple, so
 * every write is an idempotent upsert. Forward and reverse adjacency lists are
 * kept in sync so one-hop expansion and partition export stay O(degree) and
 * O(n + m) respectively.
 */

import type {
  Entity,
  Relationship,
  StoredChunk,
  GraphContext
} from './types.js';

/**
 * Edge as stored in the adjacency lists
 */
export interface PartitionEdge extends Relationship {
  createdAt: Date;
}

/**
 * Entity as stored in the node map
 */
export interface PartitionNode extends Entity {
  createdAt: Date;
  updatedAt: Date;
}

export interface PartitionMetrics {
  nodeCount: number;
  edgeCount: number;
  chunkCount: number;
  /** m / (n * (n - 1)) for a directed graph */
  density: number;
}

/**
 * Serializable snapshot of a partition, used by the JSONL store
 */
export interface PartitionSnapshot {
  entities: Array<{ name: string; type: Entity['type']; createdAt: string; updatedAt: string }>;
  relationships: Array<{ from: string; to: string; type: Relationship['type']; createdAt: string }>;
  chunks: StoredChunk[];
}

export function relationshipKey(relationship: Relationship): string {
  return `${relationship.from}|${relationship.type}|${relationship.to}`;
}

export class PartitionGraph {
  private nodes: Map<string, PartitionNode> = new Map();
  private adjacencyList: Map<string, PartitionEdge[]> = new Map();
  private reverseAdjacencyList: Map<string, PartitionEdge[]> = new Map();
  private edgeKeys: Set<string> = new Set();
  private chunks: Map<string, StoredChunk> = new Map();

  /**
   * Insert or overwrite an entity by name. Returns true when the entity is new.
   */
  upsertEntity(entity: Entity): boolean {
    const now = new Date();
    const existing = this.nodes.get(entity.name);

    if (existing) {
      existing.type = entity.type;
      existing.updatedAt = now;
      return false;
    }

    this.nodes.set(entity.name, { name: entity.name, type: entity.type, createdAt: now, updatedAt: now });
    this.adjacencyList.set(entity.name, []);
    this.reverseAdjacencyList.set(entity.name, []);
    return true;
  }

  /**
   * Add an edge when both endpoints exist and the triple is not present yet.
   *
   * Returns 'written' for a new or already-present edge and 'missing_endpoint'
   * when either side is unknown; self-loops are rejected.
   */
  upsertRelationship(relationship: Relationship): 'written' | 'missing_endpoint' | 'self_loop' {
    if (relationship.from === relationship.to) {
      return 'self_loop';
    }
    if (!this.nodes.has(relationship.from) || !this.nodes.has(relationship.to)) {
      return 'missing_endpoint';
    }

    const key = relationshipKey(relationship);
    if (this.edgeKeys.has(key)) {
      return 'written';
    }

    const edge: PartitionEdge = {
      from: relationship.from,
      to: relationship.to,
      type: relationship.type,
      createdAt: new Date()
    };

    this.adjacencyList.get(relationship.from)?.push(edge);
    this.reverseAdjacencyList.get(relationship.to)?.push(edge);
    this.edgeKeys.add(key);
    return 'written';
  }

  getEntity(name: string): PartitionNode | undefined {
    return this.nodes.get(name);
  }

  getOutgoingEdges(name: string): PartitionEdge[] {
    return [...(this.adjacencyList.get(name) ?? [])];
  }

  getIncomingEdges(name: string): PartitionEdge[] {
    return [...(this.reverseAdjacencyList.get(name) ?? [])];
  }

  /**
   * One outgoing hop from the named entity.
   * Entities come back source first, then targets in edge order, deduplicated.
   */
  getNeighborhood(name: string): GraphContext {
    const source = this.nodes.get(name);
    if (!source) {
      return { entities: [], relationships: [] };
    }

    const entities: Entity[] = [{ name: source.name, type: source.type }];
    const seen = new Set<string>([source.name]);
    const relationships: Relationship[] = [];

    for (const edge of this.adjacencyList.get(name) ?? []) {
      relationships.push({ from: edge.from, to: edge.to, type: edge.type });

      const target = this.nodes.get(edge.to);
      if (target && !seen.has(target.name)) {
        seen.add(target.name);
        entities.push({ name: target.name, type: target.type });
      }
    }

    return { entities, relationships };
  }

  upsertChunk(chunk: StoredChunk): void {
    this.chunks.set(chunk.id, { ...chunk });
  }

  getAllChunks(): StoredChunk[] {
    return Array.from(this.chunks.values(), chunk => ({ ...chunk }));
  }

  getAllNodes(): PartitionNode[] {
    return Array.from(this.nodes.values());
  }

  getAllEdges(): PartitionEdge[] {
    const allEdges: PartitionEdge[] = [];
    for (const edges of this.adjacencyList.values()) {
      allEdges.push(...edges);
    }
    return allEdges;
  }

  getMetrics(): PartitionMetrics {
    const nodeCount = this.nodes.size;
    const edgeCount = this.edgeKeys.size;
    const possibleEdges = nodeCount * (nodeCount - 1);

    return {
      nodeCount,
      edgeCount,
      chunkCount: this.chunks.size,
      density: possibleEdges > 0 ? edgeCount / possibleEdges : 0
    };
  }

  toSnapshot(): PartitionSnapshot {
    return {
      entities: this.getAllNodes().map(node => ({
        name: node.name,
        type: node.type,
        createdAt: node.createdAt.toISOString(),
        updatedAt: node.updatedAt.toISOString()
      })),
      relationships: this.getAllEdges().map(edge => ({
        from: edge.from,
        to: edge.to,
        type: edge.type,
        createdAt: edge.createdAt.toISOString()
      })),
      chunks: this.getAllChunks()
    };
  }

  static fromSnapshot(snapshot: PartitionSnapshot): PartitionGraph {
    const graph = new PartitionGraph();

    for (const entity of snapshot.entities) {
      graph.upsertEntity({ name: entity.name, type: entity.type });
      const node = graph.nodes.get(entity.name);
      if (node) {
        node.createdAt = new Date(entity.createdAt);
        node.updatedAt = new Date(entity.updatedAt);
      }
    }
    for (const relationship of snapshot.relationships) {
      if (graph.upsertRelationship(relationship) !== 'written') continue;
      const key = relationshipKey(relationship);
      const edge = graph.adjacencyList.get(relationship.from)?.find(candidate => relationshipKey(candidate) === key);
      if (edge) {
        edge.createdAt = new Date(relationship.createdAt);
      }
    }
    for (const chunk of snapshot.chunks) {
      graph.upsertChunk(chunk);
    }

    return graph;
  }

  /**
   * Ensures adjacency lists are properly synchronized
   */
  validateConsistency(): string[] {
    const errors: string[] = [];

    for (const [sourceName, edges] of this.adjacencyList.entries()) {
      if (!this.nodes.has(sourceName)) {
        errors.push(`Adjacency list contains non-existent source node: ${sourceName}`);
      }
      for (const edge of edges) {
        if (!this.nodes.has(edge.to)) {
          errors.push(`Edge ${relationshipKey(edge)} references non-existent target node: ${edge.to}`);
        }
        if (edge.from !== sourceName) {
          errors.push(`Edge ${relationshipKey(edge)} has mismatched source node`);
        }
      }
    }

    for (const [targetName, edges] of this.reverseAdjacencyList.entries()) {
      for (const edge of edges) {
        if (edge.to !== targetName) {
          errors.push(`Edge ${relationshipKey(edge)} has mismatched target node`);
        }
      }
    }

    return errors;
  }

  clear(): void {
    this.nodes.clear();
    this.adjacencyList.clear();
    this.reverseAdjacencyList.clear();
    this.edgeKeys.clear();
    this.chunks.clear();
  }
}
