/**
 * Storage module for per-user knowledge graph partitions
 */

export type { GraphStore } from './types.js';
export { InMemoryGraphStore } from './memory-store.js';
export { JsonlGraphStore, type JsonlGraphStoreConfig } from './jsonl-store.js';
export {
  Neo4jGraphStore,
  Neo4jCypherRunner,
  type CypherRunner,
  type CypherParams,
  type CypherRow,
  type Neo4jConnectionConfig
} from './neo4j-store.js';
export { createGraphStore } from './factory.js';
