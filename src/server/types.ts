/**
 * Request and response shapes for the HTTP API
 */

import { z } from 'zod';

export const userParamSchema = z.object({
  userId: z.string().trim().min(1, 'userId is required').max(128, 'userId is too long')
});

export const questionBodySchema = z.object({
  question: z.string().trim().min(1, 'question is required').max(2000, 'question is too long')
});

export interface ErrorResponse {
  success: false;
  error: string;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  service: string;
}
