/**
 * HTTP server entry point
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from '../config.js';
import { createRuntime } from '../bootstrap.js';
import { createApp } from './api.js';

async function main(): Promise<void> {
  const config = loadConfig();

  console.log(`🎓 Starting coursegraph server...`);
  console.log(`🤖 Completion: ${config.completion.provider} / ${config.completion.model}`);
  console.log(`🧮 Embeddings: ${config.embedding.model}`);
  console.log(`🗄️  Graph store: ${config.store.kind}`);

  const runtime = await createRuntime(config);
  const app = createApp(runtime.agent);

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host
  }, info => {
    console.log(`✅ Server is running on http://${info.address}:${info.port}`);
    console.log(`🔗 API endpoints:`);
    console.log(`   GET    /api/health`);
    console.log(`   POST   /api/users/:userId/documents`);
    console.log(`   POST   /api/users/:userId/questions`);
    console.log(`   GET    /api/users/:userId/graph`);
    console.log(`   GET    /api/users/:userId/graph/export`);
    console.log(`   DELETE /api/users/:userId/graph`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n🛑 ${signal} received, shutting down...`);

    server.close();
    runtime.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Failed to close graph store:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
