/**
 * HTTP API tests through Hono's in-process request helper
 */

import { createApp } from '../../server/api.js';
import { assembleRuntime, type Runtime } from '../../bootstrap.js';
import { InMemoryGraphStore } from '../../storage/memory-store.js';
import { PlainTextExtractionService } from '../../services/text-extraction.js';
import { FakeCompletionService, FakeEmbeddingService, TestHelpers } from '../setup.js';

function uploadForm(content: string, filename: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([content], { type: 'text/plain' }), filename);
  return form;
}

describe('HTTP API', () => {
  let store: InMemoryGraphStore;
  let runtime: Runtime;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    store = new InMemoryGraphStore();
    runtime = assembleRuntime(
      {
        store,
        completion: new FakeCompletionService(TestHelpers.scriptedCompletion({
          extraction: TestHelpers.marketingExtraction,
          concept: 'Price',
          answer: '1. Definition: price reflects value.'
        })),
        embeddings: new FakeEmbeddingService(),
        textExtraction: new PlainTextExtractionService()
      },
      { ingestion: { maxChars: 6000, retryBaseDelayMs: 0 }, retrieval: { topK: 5 } }
    );
    app = createApp(runtime.agent, { maxUploadBytes: 1024 });
  });

  afterEach(async () => {
    await runtime.close();
  });

  test('GET /api/health reports the service', async () => {
    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'coursegraph' });
  });

  test('POST documents ingests an uploaded file', async () => {
    const res = await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm(TestHelpers.getStudyText(), 'marketing.md')
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      fileType: 'text',
      processingResult: { processedChunks: 2, totalEntities: 4, totalRelationships: 2, success: true }
    });
  });

  test('POST documents without a file is a bad request', async () => {
    const form = new FormData();
    form.append('note', 'no file here');

    const res = await app.request('/api/users/alice/documents', { method: 'POST', body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'A single file is required in the "file" field' });
  });

  test('POST documents rejects files over the size limit', async () => {
    const res = await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm('x'.repeat(1025), 'big.txt')
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ success: false, error: 'File exceeds 1024 bytes' });
  });

  test('POST documents rejects an oversized declared length before parsing the body', async () => {
    const upload = jest.spyOn(runtime.agent, 'upload');
    const res = await app.request('/api/users/alice/documents', {
      method: 'POST',
      headers: {
        'Content-Type': 'multipart/form-data; boundary=coursegraph',
        'Content-Length': String(1024 + 16 * 1024 + 1)
      },
      body: '--coursegraph--'
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ success: false, error: 'Upload exceeds 1024 bytes' });
    expect(upload).not.toHaveBeenCalled();
  });

  test('POST documents returns 422 when nothing can be extracted', async () => {
    const res = await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm('%PDF-1.7', 'lecture.pdf')
    });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ success: false, error: 'Text extraction failed' });
  });

  test('POST questions answers from the user graph', async () => {
    await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm(TestHelpers.getStudyText(), 'marketing.md')
    });

    const res = await app.request('/api/users/alice/questions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ question: 'What is price?' })
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      queryResult: {
        answer: '1. Definition: price reflects value.',
        success: true,
        concept: 'Price',
        context: { documentsFound: 1, graphEntities: 2, graphRelationships: 1 }
      }
    });
  });

  test('POST questions validates the body', async () => {
    const res = await app.request('/api/users/alice/questions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ question: '   ' })
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'question is required' });
  });

  test('rejects an overlong user id', async () => {
    const res = await app.request(`/api/users/${'u'.repeat(129)}/graph`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'userId is too long' });
  });

  test('GET graph and export return the partition', async () => {
    await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm(TestHelpers.getStudyText(), 'marketing.md')
    });

    const graph = await app.request('/api/users/alice/graph');
    expect(graph.status).toBe(200);
    expect(await graph.json()).toMatchObject({ success: true, graphData: { edges: [
      { from: 'Product', to: 'Customer Need', label: 'supports' },
      { from: 'Price', to: 'Perceived Value', label: 'defines' }
    ] } });

    const exported = await app.request('/api/users/alice/graph/export');
    expect(exported.status).toBe(200);
    expect(await exported.json()).toMatchObject({
      userId: 'alice',
      success: true,
      statistics: { nodes: 4, edges: 2, nodeTypes: { concept: 3, definition: 1 } }
    });
  });

  test('DELETE graph resets the partition', async () => {
    await app.request('/api/users/alice/documents', {
      method: 'POST',
      body: uploadForm(TestHelpers.getStudyText(), 'marketing.md')
    });

    const res = await app.request('/api/users/alice/graph', { method: 'DELETE' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true });
    expect(await store.exportGraph('alice')).toEqual({ nodes: [], edges: [] });
  });

  test('DELETE graph reports store failures as 500', async () => {
    jest.spyOn(store, 'deletePartition').mockRejectedValue(new Error('disk full'));

    const res = await app.request('/api/users/alice/graph', { method: 'DELETE' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'disk full' });
  });

  test('unknown routes return 404', async () => {
    const res = await app.request('/api/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Route not found: GET /api/nope' });
  });

  test('allows configured CORS origins', async () => {
    const res = await app.request('/api/health', { headers: { Origin: 'http://localhost:5173' } });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
  });
});
