/**
 * Hono HTTP API for the study agent
 *
 * Every route is scoped to a user id taken from the path. Failures come back
 * as `{ success: false, error }` with 400 for a malformed request, 413 for an
 * oversized upload, 422 when a pipeline ran and failed, and 500 for anything
 * unexpected.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { zValidator } from '@hono/zod-validator';
import type { ZodError } from 'zod';
import type { StudyAgent } from '../agent/study-agent.js';
import { ErrorHandler, ErrorCategory, ErrorSeverity, toError } from '../utils/error-handler.js';
import { userParamSchema, questionBodySchema, type ErrorResponse, type HealthResponse } from './types.js';

export interface ApiOptions {
  corsOrigins: string[];
  /** Largest accepted upload in bytes */
  maxUploadBytes: number;
}

/** Room for multipart boundaries and part headers around the file */
const MULTIPART_OVERHEAD_BYTES = 16 * 1024;

function describeZodError(error: ZodError): string {
  return error.issues.map(issue => issue.message).join('; ');
}

function badRequest(message: string): ErrorResponse {
  return { success: false, error: message };
}

export function createApp(agent: StudyAgent, options: Partial<ApiOptions> = {}) {
  const config: ApiOptions = {
    corsOrigins: options.corsOrigins ?? ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'],
    maxUploadBytes: options.maxUploadBytes ?? 25 * 1024 * 1024
  };

  const app = new Hono();

  app.use('/*', cors({
    origin: config.corsOrigins,
    allowHeaders: ['Content-Type', 'Authorization'],
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS']
  }));

  const userParam = zValidator('param', userParamSchema, (result, c) => {
    if (!result.success) {
      return c.json(badRequest(describeZodError(result.error)), 400);
    }
  });

  /**
   * GET /api/health
   */
  app.get('/api/health', c => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'coursegraph'
    };
    return c.json(body);
  });

  /**
   * POST /api/users/:userId/documents
   * Multipart upload, field `file`
   */
  app.post('/api/users/:userId/documents', userParam, async c => {
    const { userId } = c.req.valid('param');

    const declaredLength = Number(c.req.header('content-length'));
    if (Number.isFinite(declaredLength) && declaredLength > config.maxUploadBytes + MULTIPART_OVERHEAD_BYTES) {
      return c.json(badRequest(`Upload exceeds ${config.maxUploadBytes} bytes`), 413);
    }

    const parsed = await c.req.parseBody().then(
      body => ({ ok: true as const, body }),
      (error: unknown) => ({ ok: false as const, message: toError(error).message })
    );
    if (!parsed.ok) {
      return c.json(badRequest(`Invalid multipart body: ${parsed.message}`), 400);
    }

    const file = parsed.body['file'];
    if (!file || typeof file === 'string' || Array.isArray(file)) {
      return c.json(badRequest('A single file is required in the "file" field'), 400);
    }
    if (file.size > config.maxUploadBytes) {
      return c.json(badRequest(`File exceeds ${config.maxUploadBytes} bytes`), 413);
    }

    const fileData = new Uint8Array(await file.arrayBuffer());
    const result = await agent.upload(userId, fileData, file.name, c.req.raw.signal);

    return result.success ? c.json(result) : c.json(result, 422);
  });

  /**
   * POST /api/users/:userId/questions
   */
  app.post(
    '/api/users/:userId/questions',
    userParam,
    zValidator('json', questionBodySchema, (result, c) => {
      if (!result.success) {
        return c.json(badRequest(describeZodError(result.error)), 400);
      }
    }),
    async c => {
      const { userId } = c.req.valid('param');
      const { question } = c.req.valid('json');

      const result = await agent.ask(userId, question, c.req.raw.signal);
      return result.success ? c.json(result) : c.json(result, 422);
    }
  );

  /**
   * GET /api/users/:userId/graph
   */
  app.get('/api/users/:userId/graph', userParam, async c => {
    const { userId } = c.req.valid('param');

    const result = await agent.visualize(userId, c.req.raw.signal);
    return result.success ? c.json(result) : c.json(result, 422);
  });

  /**
   * GET /api/users/:userId/graph/export
   */
  app.get('/api/users/:userId/graph/export', userParam, async c => {
    const { userId } = c.req.valid('param');

    const result = await agent.exportGraph(userId, c.req.raw.signal);
    return result.success ? c.json(result) : c.json(result, 422);
  });

  /**
   * DELETE /api/users/:userId/graph
   */
  app.delete('/api/users/:userId/graph', userParam, async c => {
    const { userId } = c.req.valid('param');

    const result = await agent.reset(userId);
    return result.success ? c.json(result) : c.json(result, 500);
  });

  app.notFound(c => c.json(badRequest(`Route not found: ${c.req.method} ${c.req.path}`), 404));

  app.onError((error, c) => {
    ErrorHandler.handle(
      ErrorCategory.PROCESSING,
      ErrorSeverity.HIGH,
      `Unhandled error on ${c.req.method} ${c.req.path}`,
      error
    );
    return c.json(badRequest(error.message || 'Internal server error'), 500);
  });

  return app;
}
