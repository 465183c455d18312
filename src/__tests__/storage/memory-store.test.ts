/**
 * In-memory store tests: tenant isolation and visualization export
 */

import { InMemoryGraphStore } from '../../storage/memory-store.js';

describe('InMemoryGraphStore', () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    await store.upsertEntities([
      { name: 'Marketing Mix', type: 'framework' },
      { name: 'Product', type: 'concept' }
    ], 'alice');
    await store.upsertRelationships([{ from: 'Marketing Mix', to: 'Product', type: 'has_component' }], 'alice');
  });

  afterEach(async () => {
    await store.close();
  });

  test('should keep partitions isolated between users', async () => {
    await store.upsertEntities([{ name: 'Marketing Mix', type: 'concept' }], 'bob');

    expect((await store.getNeighborhood('Marketing Mix', 'alice')).relationships).toHaveLength(1);
    expect(await store.getNeighborhood('Marketing Mix', 'bob')).toEqual({
      entities: [{ name: 'Marketing Mix', type: 'concept' }],
      relationships: []
    });
    expect(await store.getNeighborhood('Product', 'carol')).toEqual({ entities: [], relationships: [] });
  });

  test('should count only relationships whose endpoints exist', async () => {
    const written = await store.upsertRelationships([
      { from: 'Marketing Mix', to: 'Product', type: 'has_component' },
      { from: 'Marketing Mix', to: 'Price', type: 'has_component' },
      { from: 'Product', to: 'Product', type: 'part_of' }
    ], 'alice');

    expect(written).toBe(1);
    expect(store.getMetrics('alice')?.edgeCount).toBe(1);
  });

  test('should export nodes and edges for visualization', async () => {
    expect(await store.exportGraph('alice')).toEqual({
      nodes: [
        { id: 'Marketing Mix', label: 'Marketing Mix', type: 'framework' },
        { id: 'Product', label: 'Product', type: 'concept' }
      ],
      edges: [{ from: 'Marketing Mix', to: 'Product', label: 'has_component' }]
    });
    expect(await store.exportGraph('nobody')).toEqual({ nodes: [], edges: [] });
  });

  test('should drop everything on deletePartition', async () => {
    await store.upsertChunk({ id: 'c1', text: 'Marketing mix' }, 'alice');
    await store.deletePartition('alice');

    expect(await store.listChunks('alice')).toEqual([]);
    expect(await store.exportGraph('alice')).toEqual({ nodes: [], edges: [] });
    expect(store.getMetrics('alice')).toBeUndefined();
  });
});
