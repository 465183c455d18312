/**
 * Storage factory
 *
 * Builds the graph store named by configuration. Neo4j stores have their
 * schema created before they are handed out.
 */

import type { AppConfig } from '../config.js';
import type { GraphStore } from './types.js';
import { InMemoryGraphStore } from './memory-store.js';
import { JsonlGraphStore } from './jsonl-store.js';
import { Neo4jGraphStore, Neo4jCypherRunner } from './neo4j-store.js';

export async function createGraphStore(config: AppConfig['store']): Promise<GraphStore> {
  switch (config.kind) {
    case 'memory':
      return new InMemoryGraphStore();
    case 'jsonl':
      return new JsonlGraphStore({ directory: config.dataDir });
    case 'neo4j': {
      const store = new Neo4jGraphStore(new Neo4jCypherRunner(config.neo4j));
      try {
        await store.initialize();
      } catch (error) {
        await store.close();
        throw error;
      }
      return store;
    }
  }
}
