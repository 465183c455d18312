/**
 * Neo4j-backed graph store
 *
 * All tenants share one database. Every node carries a `tenantId` property
 * and every query filters on it through the `$tenantId` parameter; the id is
 * never spliced into query text.
 *
 * Layout:
 *   (:User {id})
 *   (:Entity {tenantId, name, type, createdAt, updatedAt})
 *   (:Entity)-[:RELATES {type, createdAt}]->(:Entity)
 *   (:Chunk {tenantId, id, text, embedding, embeddingModel, createdAt})
 */

import neo4j, { type Driver } from 'neo4j-driver';
import { z } from 'zod';
import { ENTITY_TYPES, RELATIONSHIP_TYPES } from '../core/types.js';
import type {
  Entity,
  Relationship,
  StoredChunk,
  GraphContext,
  GraphData
} from '../core/types.js';
import type { GraphStore } from './types.js';
import { StoreError, toError } from '../utils/error-handler.js';

export type CypherParams = Record<string, unknown>;
export type CypherRow = Record<string, unknown>;

/**
 * Minimal query surface the store needs; the driver-backed runner is the
 * production implementation, tests supply their own.
 */
export interface CypherRunner {
  read(query: string, params?: CypherParams): Promise<CypherRow[]>;
  write(query: string, params?: CypherParams): Promise<CypherRow[]>;
  close(): Promise<void>;
}

export interface Neo4jConnectionConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
}

/**
 * Runs each query in its own managed transaction and session
 */
export class Neo4jCypherRunner implements CypherRunner {
  private driver: Driver;
  private database?: string;

  constructor(config: Neo4jConnectionConfig, driver?: Driver) {
    this.driver = driver ?? neo4j.driver(
      config.uri,
      neo4j.auth.basic(config.username, config.password),
      { disableLosslessIntegers: true }
    );
    this.database = config.database;
  }

  async read(query: string, params: CypherParams = {}): Promise<CypherRow[]> {
    const session = this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.READ });
    try {
      const result = await session.executeRead(tx => tx.run(query, params));
      return result.records.map(record => record.toObject());
    } finally {
      await session.close();
    }
  }

  async write(query: string, params: CypherParams = {}): Promise<CypherRow[]> {
    const session = this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.WRITE });
    try {
      const result = await session.executeWrite(tx => tx.run(query, params));
      return result.records.map(record => record.toObject());
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

const SCHEMA_STATEMENTS = [
  'CREATE CONSTRAINT user_id IF NOT EXISTS FOR (u:User) REQUIRE u.id IS UNIQUE',
  'CREATE INDEX entity_tenant_name IF NOT EXISTS FOR (n:Entity) ON (n.tenantId, n.name)',
  'CREATE INDEX chunk_tenant_id IF NOT EXISTS FOR (c:Chunk) ON (c.tenantId, c.id)'
];

const QUERIES = {
  ensurePartition: `
    MERGE (u:User {id: $tenantId})
    ON CREATE SET u.createdAt = datetime()`,

  upsertEntities: `
    UNWIND $entities AS entity
    MERGE (n:Entity {tenantId: $tenantId, name: entity.name})
    ON CREATE SET n.createdAt = datetime()
    SET n.type = entity.type, n.updatedAt = datetime()`,

  upsertRelationships: `
    UNWIND $relationships AS rel
    MATCH (a:Entity {tenantId: $tenantId, name: rel.from})
    MATCH (b:Entity {tenantId: $tenantId, name: rel.to})
    WHERE a <> b
    MERGE (a)-[r:RELATES {type: rel.type}]->(b)
    ON CREATE SET r.createdAt = datetime()
    RETURN count(r) AS written`,

  neighborhood: `
    MATCH (c:Entity {tenantId: $tenantId, name: $name})
    OPTIONAL MATCH (c)-[r:RELATES]->(n:Entity {tenantId: $tenantId})
    RETURN c.name AS name, c.type AS type,
           r.type AS relationshipType, n.name AS targetName, n.type AS targetType
    ORDER BY r.createdAt, n.name`,

  upsertChunk: `
    MERGE (c:Chunk {tenantId: $tenantId, id: $id})
    ON CREATE SET c.createdAt = datetime()
    SET c.text = $text, c.embedding = $embedding, c.embeddingModel = $embeddingModel`,

  listChunks: `
    MATCH (c:Chunk {tenantId: $tenantId})
    RETURN c.id AS id, c.text AS text, c.embedding AS embedding, c.embeddingModel AS embeddingModel
    ORDER BY c.createdAt, c.id`,

  exportNodes: `
    MATCH (n:Entity {tenantId: $tenantId})
    RETURN n.name AS name, n.type AS type
    ORDER BY n.createdAt, n.name`,

  exportEdges: `
    MATCH (a:Entity {tenantId: $tenantId})-[r:RELATES]->(b:Entity {tenantId: $tenantId})
    RETURN a.name AS from, b.name AS to, r.type AS type
    ORDER BY r.createdAt, a.name, b.name`,

  deletePartition: `
    MATCH (n)
    WHERE (n:Entity OR n:Chunk) AND n.tenantId = $tenantId
    DETACH DELETE n`,

  deleteUser: `
    MATCH (u:User {id: $tenantId})
    DETACH DELETE u`
} as const;

const neighborhoodRowSchema = z.object({
  name: z.string(),
  type: z.enum(ENTITY_TYPES),
  relationshipType: z.enum(RELATIONSHIP_TYPES).nullable(),
  targetName: z.string().nullable(),
  targetType: z.enum(ENTITY_TYPES).nullable()
});

const chunkRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  embedding: z.array(z.number()).nullable().optional(),
  embeddingModel: z.string().nullable().optional()
});

const nodeRowSchema = z.object({ name: z.string(), type: z.string() });
const edgeRowSchema = z.object({ from: z.string(), to: z.string(), type: z.string() });
const countRowSchema = z.object({ written: z.number() });

export class Neo4jGraphStore implements GraphStore {
  private runner: CypherRunner;
  private initialized = false;

  constructor(runner: CypherRunner) {
    this.runner = runner;
  }

  /**
   * Create constraints and indexes; safe to call repeatedly
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    for (const statement of SCHEMA_STATEMENTS) {
      await this.execute('initialize', () => this.runner.write(statement));
    }
    this.initialized = true;
  }

  async ensurePartition(userId: string): Promise<void> {
    await this.execute('ensurePartition', () => this.runner.write(QUERIES.ensurePartition, { tenantId: userId }));
  }

  async upsertEntities(entities: Entity[], userId: string): Promise<void> {
    if (entities.length === 0) return;
    await this.execute('upsertEntities', () => this.runner.write(QUERIES.upsertEntities, {
      tenantId: userId,
      entities: entities.map(entity => ({ name: entity.name, type: entity.type }))
    }));
  }

  async upsertRelationships(relationships: Relationship[], userId: string): Promise<number> {
    if (relationships.length === 0) return 0;
    const rows = await this.execute('upsertRelationships', () => this.runner.write(QUERIES.upsertRelationships, {
      tenantId: userId,
      relationships: relationships.map(rel => ({ from: rel.from, to: rel.to, type: rel.type }))
    }));

    const row = countRowSchema.safeParse(rows[0]);
    return row.success ? row.data.written : 0;
  }

  async getNeighborhood(entityName: string, userId: string): Promise<GraphContext> {
    const rows = await this.execute('getNeighborhood', () =>
      this.runner.read(QUERIES.neighborhood, { tenantId: userId, name: entityName })
    );

    const entities: Entity[] = [];
    const relationships: Relationship[] = [];
    const seen = new Set<string>();

    for (const raw of rows) {
      const row = this.parseRow(neighborhoodRowSchema, raw, 'getNeighborhood');

      if (!seen.has(row.name)) {
        seen.add(row.name);
        entities.push({ name: row.name, type: row.type });
      }
      if (row.relationshipType && row.targetName && row.targetType) {
        relationships.push({ from: row.name, to: row.targetName, type: row.relationshipType });
        if (!seen.has(row.targetName)) {
          seen.add(row.targetName);
          entities.push({ name: row.targetName, type: row.targetType });
        }
      }
    }

    return { entities, relationships };
  }

  async listChunks(userId: string): Promise<StoredChunk[]> {
    const rows = await this.execute('listChunks', () => this.runner.read(QUERIES.listChunks, { tenantId: userId }));

    return rows.map(raw => {
      const row = this.parseRow(chunkRowSchema, raw, 'listChunks');
      const chunk: StoredChunk = { id: row.id, text: row.text };
      if (row.embedding) chunk.embedding = row.embedding;
      if (row.embeddingModel) chunk.embeddingModel = row.embeddingModel;
      return chunk;
    });
  }

  async upsertChunk(chunk: StoredChunk, userId: string): Promise<void> {
    await this.execute('upsertChunk', () => this.runner.write(QUERIES.upsertChunk, {
      tenantId: userId,
      id: chunk.id,
      text: chunk.text,
      embedding: chunk.embedding ?? null,
      embeddingModel: chunk.embeddingModel ?? null
    }));
  }

  async exportGraph(userId: string): Promise<GraphData> {
    const nodeRows = await this.execute('exportGraph', () => this.runner.read(QUERIES.exportNodes, { tenantId: userId }));
    const edgeRows = await this.execute('exportGraph', () => this.runner.read(QUERIES.exportEdges, { tenantId: userId }));

    return {
      nodes: nodeRows.map(raw => {
        const row = this.parseRow(nodeRowSchema, raw, 'exportGraph');
        return { id: row.name, label: row.name, type: row.type };
      }),
      edges: edgeRows.map(raw => {
        const row = this.parseRow(edgeRowSchema, raw, 'exportGraph');
        return { from: row.from, to: row.to, label: row.type };
      })
    };
  }

  async deletePartition(userId: string): Promise<void> {
    await this.execute('deletePartition', () => this.runner.write(QUERIES.deletePartition, { tenantId: userId }));
    await this.execute('deletePartition', () => this.runner.write(QUERIES.deleteUser, { tenantId: userId }));
  }

  async close(): Promise<void> {
    await this.runner.close();
  }

  private async execute(operation: string, run: () => Promise<CypherRow[]>): Promise<CypherRow[]> {
    try {
      return await run();
    } catch (error) {
      throw new StoreError(`Neo4j ${operation} failed: ${toError(error).message}`, operation, { cause: error });
    }
  }

  private parseRow<T>(schema: z.ZodType<T>, raw: unknown, operation: string): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(`Unexpected row shape from ${operation}: ${parsed.error.message}`, operation);
    }
    return parsed.data;
  }
}
