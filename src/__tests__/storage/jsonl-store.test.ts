/**
 * JSONL store tests against a temporary directory
 */

import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { JsonlGraphStore } from '../../storage/jsonl-store.js';

describe('JsonlGraphStore', () => {
  let directory: string;
  let store: JsonlGraphStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'coursegraph-jsonl-'));
    store = new JsonlGraphStore({ directory });
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('should name partition files by a digest of the user id', () => {
    const path = store.partitionPath('alice@example.edu');

    expect(basename(path)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.jsonl$/);
    expect(path).not.toContain('alice');
    expect(store.partitionPath('alice@example.edu')).toBe(path);
    expect(store.partitionPath('bob')).not.toBe(path);
  });

  test('should write the partition file on ensurePartition', async () => {
    await store.ensurePartition('alice');

    const content = await fs.readFile(store.partitionPath('alice'), 'utf-8');
    expect(content).toBe('{"type":"partition","data":{"userId":"alice"}}\n');
  });

  test('should reload a partition in a new store instance', async () => {
    await store.upsertEntities([
      { name: 'Price', type: 'concept' },
      { name: 'Perceived Value', type: 'definition' }
    ], 'alice');
    await store.upsertRelationships([{ from: 'Price', to: 'Perceived Value', type: 'defines' }], 'alice');
    await store.upsertChunk({ id: 'c1', text: 'PRICE\nPrice reflects value.', embedding: [0, 2], embeddingModel: 'm' }, 'alice');

    const reopened = new JsonlGraphStore({ directory });
    try {
      expect(await reopened.getNeighborhood('Price', 'alice')).toEqual({
        entities: [
          { name: 'Price', type: 'concept' },
          { name: 'Perceived Value', type: 'definition' }
        ],
        relationships: [{ from: 'Price', to: 'Perceived Value', type: 'defines' }]
      });
      expect(await reopened.listChunks('alice')).toEqual([
        { id: 'c1', text: 'PRICE\nPrice reflects value.', embedding: [0, 2], embeddingModel: 'm' }
      ]);
    } finally {
      await reopened.close();
    }
  });

  test('should skip invalid lines when loading', async () => {
    await store.ensurePartition('alice');
    const path = store.partitionPath('alice');
    await fs.appendFile(path, [
      'not json',
      JSON.stringify({ type: 'entity', data: { name: 'Product', type: 'gadget', createdAt: 'x', updatedAt: 'x' } }),
      JSON.stringify({ type: 'entity', data: { name: 'Place', type: 'concept', createdAt: '2024-01-01T00:00:00.000Z', updatedAt: '2024-01-01T00:00:00.000Z' } })
    ].join('\n') + '\n', 'utf-8');

    const reopened = new JsonlGraphStore({ directory });
    try {
      expect(await reopened.exportGraph('alice')).toEqual({
        nodes: [{ id: 'Place', label: 'Place', type: 'concept' }],
        edges: []
      });
    } finally {
      await reopened.close();
    }
  });

  test('should remove the file on deletePartition', async () => {
    await store.upsertEntities([{ name: 'Product', type: 'concept' }], 'alice');
    await store.upsertEntities([{ name: 'Product', type: 'concept' }], 'bob');

    await store.deletePartition('alice');

    await expect(fs.access(store.partitionPath('alice'))).rejects.toThrow();
    expect(await store.exportGraph('alice')).toEqual({ nodes: [], edges: [] });
    expect((await store.exportGraph('bob')).nodes).toHaveLength(1);
  });

  test('should read a missing partition file as an empty partition', async () => {
    expect(await store.listChunks('nobody')).toEqual([]);
    expect(await store.getNeighborhood('Price', 'nobody')).toEqual({ entities: [], relationships: [] });
    await expect(fs.access(store.partitionPath('nobody'))).rejects.toThrow();
  });

  test('should share one load between concurrent calls for a user', async () => {
    await store.upsertEntities([{ name: 'Price', type: 'concept' }], 'alice');

    const reopened = new JsonlGraphStore({ directory });
    try {
      await Promise.all([
        reopened.upsertEntities([{ name: 'Product', type: 'concept' }], 'alice'),
        reopened.getNeighborhood('Price', 'alice')
      ]);
      await reopened.upsertEntities([{ name: 'Place', type: 'concept' }], 'alice');

      expect((await reopened.exportGraph('alice')).nodes.map(node => node.id)).toEqual(['Price', 'Product', 'Place']);
    } finally {
      await reopened.close();
    }

    const fresh = new JsonlGraphStore({ directory });
    try {
      expect((await fresh.exportGraph('alice')).nodes.map(node => node.id)).toEqual(['Price', 'Product', 'Place']);
    } finally {
      await fresh.close();
    }
  });
});
