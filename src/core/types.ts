/**
 * Core type definitions for the coursegraph study knowledge system
 *
 * This module defines the fundamental data structures shared by the
 * ingestion pipeline, the retrieval pipeline and the graph stores.
 * Entities and relationships live in a per-user partition; every other
 * structure here is request-scoped and discarded once a response is built.
 */

/**
 * Entity types the extractor is allowed to produce
 */
export const ENTITY_TYPES = [
  'concept',
  'framework',
  'definition',
  'learning_objective',
  'organization',
  'example',
  'process',
  'step'
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Relationship types the extractor is allowed to produce
 */
export const RELATIONSHIP_TYPES = [
  'defines',
  'has_component',
  'has_step',
  'part_of',
  'example_of',
  'used_in',
  'supports',
  'objective_of',
  'cause_of'
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/**
 * A typed, named node in a user's knowledge graph.
 * Upserted by name: re-extracting the same name overwrites the type.
 */
export interface Entity {
  name: string;
  type: EntityType;
}

/**
 * A typed directed edge between two entities, unique on (from, type, to)
 */
export interface Relationship {
  from: string;
  to: string;
  type: RelationshipType;
}

/**
 * A bounded, heading-scoped segment of ingested document text
 */
export interface Chunk {
  text: string;
  /** Heading active when the chunk was produced ('' before any heading) */
  sourceHeading: string;
  sequenceIndex: number;
}

/**
 * Chunk persisted for vector retrieval
 */
export interface StoredChunk {
  id: string;
  text: string;
  embedding?: number[];
  /** Model that produced `embedding`; vectors from different models are never compared */
  embeddingModel?: string;
}

/**
 * One-hop neighborhood around a concept, rebuilt per query
 */
export interface GraphContext {
  entities: Entity[];
  relationships: Relationship[];
}

export interface VectorResult {
  chunk: StoredChunk;
  similarity: number;
}

/**
 * Named prompt sections assembled from graph and vector context
 */
export interface StructuredContext {
  concepts: string[];
  relationships: string[];
  documents: string[];
}

/**
 * Result of extracting one chunk
 */
export interface ExtractionResult {
  entities: Entity[];
  relationships: Relationship[];
}

/**
 * Totals reported by the ingestion pipeline
 */
export interface ProcessingResult {
  processedChunks: number;
  totalEntities: number;
  totalRelationships: number;
  success: boolean;
}

export interface QueryContextMetrics {
  documentsFound: number;
  graphEntities: number;
  graphRelationships: number;
}

export interface QueryResult {
  answer: string;
  success: boolean;
  /** Concept the question was resolved to */
  concept: string;
  context: QueryContextMetrics;
}

/**
 * Graph data shaped for visualization clients
 */
export interface GraphNodeView {
  id: string;
  label: string;
  type: string;
}

export interface GraphEdgeView {
  from: string;
  to: string;
  label: string;
}

export interface GraphData {
  nodes: GraphNodeView[];
  edges: GraphEdgeView[];
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(type => type === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPES.some(type => type === value);
}
