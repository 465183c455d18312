/**
 * Neo4j store tests against a recording query runner
 */

import { Neo4jGraphStore, type CypherRunner, type CypherParams, type CypherRow } from '../../storage/neo4j-store.js';
import { StoreError } from '../../utils/error-handler.js';

interface RecordedQuery {
  mode: 'read' | 'write';
  query: string;
  params: CypherParams;
}

class RecordingRunner implements CypherRunner {
  readonly queries: RecordedQuery[] = [];
  closed = false;
  private replies: CypherRow[][] = [];
  private failure?: Error;

  reply(...rows: CypherRow[][]): void {
    this.replies.push(...rows);
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  async read(query: string, params: CypherParams = {}): Promise<CypherRow[]> {
    return this.run('read', query, params);
  }

  async write(query: string, params: CypherParams = {}): Promise<CypherRow[]> {
    return this.run('write', query, params);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private run(mode: 'read' | 'write', query: string, params: CypherParams): CypherRow[] {
    this.queries.push({ mode, query, params });
    if (this.failure) throw this.failure;
    return this.replies.shift() ?? [];
  }
}

describe('Neo4jGraphStore', () => {
  const tenant = "alice' OR 1=1 //";
  let runner: RecordingRunner;
  let store: Neo4jGraphStore;

  beforeEach(() => {
    runner = new RecordingRunner();
    store = new Neo4jGraphStore(runner);
  });

  test('should create the schema once', async () => {
    await store.initialize();
    await store.initialize();

    expect(runner.queries).toHaveLength(3);
    expect(runner.queries.every(q => q.mode === 'write')).toBe(true);
    expect(runner.queries[0].query).toContain('CREATE CONSTRAINT user_id IF NOT EXISTS');
  });

  test('should pass the tenant id only as a parameter', async () => {
    await store.ensurePartition(tenant);
    await store.upsertEntities([{ name: 'Product', type: 'concept' }], tenant);
    await store.upsertChunk({ id: 'c1', text: 'Product text' }, tenant);
    await store.getNeighborhood('Product', tenant);
    await store.listChunks(tenant);
    await store.exportGraph(tenant);
    await store.deletePartition(tenant);

    expect(runner.queries).toHaveLength(9);
    for (const recorded of runner.queries) {
      expect(recorded.params.tenantId).toBe(tenant);
      expect(recorded.query).toContain('$tenantId');
      expect(recorded.query).not.toContain('alice');
    }
  });

  test('should send entities and chunks as parameter lists', async () => {
    await store.upsertEntities([{ name: 'Product', type: 'concept' }], 'alice');
    await store.upsertChunk({ id: 'c1', text: 'Product text' }, 'alice');

    expect(runner.queries[0].params).toEqual({ tenantId: 'alice', entities: [{ name: 'Product', type: 'concept' }] });
    expect(runner.queries[1].params).toEqual({
      tenantId: 'alice',
      id: 'c1',
      text: 'Product text',
      embedding: null,
      embeddingModel: null
    });
  });

  test('should skip empty writes', async () => {
    await store.upsertEntities([], 'alice');

    expect(await store.upsertRelationships([], 'alice')).toBe(0);
    expect(runner.queries).toHaveLength(0);
  });

  test('should return the written relationship count', async () => {
    runner.reply([{ written: 2 }]);

    const written = await store.upsertRelationships([
      { from: 'Marketing Mix', to: 'Product', type: 'has_component' },
      { from: 'Marketing Mix', to: 'Price', type: 'has_component' }
    ], 'alice');

    expect(written).toBe(2);
  });

  test('should assemble the neighborhood from rows', async () => {
    runner.reply([
      { name: 'Marketing Mix', type: 'framework', relationshipType: 'has_component', targetName: 'Product', targetType: 'concept' },
      { name: 'Marketing Mix', type: 'framework', relationshipType: 'supports', targetName: 'Product', targetType: 'concept' }
    ]);

    expect(await store.getNeighborhood('Marketing Mix', 'alice')).toEqual({
      entities: [
        { name: 'Marketing Mix', type: 'framework' },
        { name: 'Product', type: 'concept' }
      ],
      relationships: [
        { from: 'Marketing Mix', to: 'Product', type: 'has_component' },
        { from: 'Marketing Mix', to: 'Product', type: 'supports' }
      ]
    });
  });

  test('should return the entity alone when it has no outgoing edges', async () => {
    runner.reply([{ name: 'Product', type: 'concept', relationshipType: null, targetName: null, targetType: null }]);

    expect(await store.getNeighborhood('Product', 'alice')).toEqual({
      entities: [{ name: 'Product', type: 'concept' }],
      relationships: []
    });
  });

  test('should map chunk rows and drop null embeddings', async () => {
    runner.reply([
      { id: 'c1', text: 'one', embedding: [1, 0], embeddingModel: 'm' },
      { id: 'c2', text: 'two', embedding: null, embeddingModel: null }
    ]);

    expect(await store.listChunks('alice')).toEqual([
      { id: 'c1', text: 'one', embedding: [1, 0], embeddingModel: 'm' },
      { id: 'c2', text: 'two' }
    ]);
  });

  test('should export nodes and edges', async () => {
    runner.reply(
      [{ name: 'Price', type: 'concept' }, { name: 'Perceived Value', type: 'definition' }],
      [{ from: 'Price', to: 'Perceived Value', type: 'defines' }]
    );

    expect(await store.exportGraph('alice')).toEqual({
      nodes: [
        { id: 'Price', label: 'Price', type: 'concept' },
        { id: 'Perceived Value', label: 'Perceived Value', type: 'definition' }
      ],
      edges: [{ from: 'Price', to: 'Perceived Value', label: 'defines' }]
    });
  });

  test('should wrap driver failures in StoreError', async () => {
    runner.failWith(new Error('connection refused'));

    const failure = store.listChunks('alice');
    await expect(failure).rejects.toBeInstanceOf(StoreError);
    await expect(store.listChunks('alice')).rejects.toThrow('Neo4j listChunks failed: connection refused');
  });

  test('should reject rows of an unexpected shape', async () => {
    runner.reply([{ id: 7 }]);

    await expect(store.listChunks('alice')).rejects.toThrow(/^Unexpected row shape from listChunks/);
  });

  test('should close the runner', async () => {
    await store.close();
    expect(runner.closed).toBe(true);
  });
});
