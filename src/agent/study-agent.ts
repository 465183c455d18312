/**
 * Public study agent operations
 *
 * Thin, stateless facade over the workflow controller. Each call builds a
 * fresh workflow state and reduces the final state to a response shape.
 */

import type { ProcessingResult, QueryResult, GraphData } from '../core/types.js';
import type { GraphStore } from '../storage/types.js';
import { WorkflowController, type WorkflowState } from './workflow.js';
import { buildGraphExport, type GraphExport } from './graph-export.js';
import { ErrorHandler, ErrorCategory, ErrorSeverity, toError } from '../utils/error-handler.js';

export interface FailureResponse {
  success: false;
  error: string;
}

export type UploadResponse =
  | { success: true; fileType: string; processingResult: ProcessingResult }
  | FailureResponse;

export type AskResponse =
  | { success: true; queryResult: QueryResult }
  | FailureResponse;

export type VisualizeResponse =
  | { success: true; graphData: GraphData }
  | FailureResponse;

export type ExportResponse =
  | GraphExport
  | { userId: string; success: false; error: string };

export type ResetResponse = { success: true } | FailureResponse;

export class StudyAgent {
  private workflow: WorkflowController;
  private store: GraphStore;

  constructor(workflow: WorkflowController, store: GraphStore) {
    this.workflow = workflow;
    this.store = store;
  }

  async upload(userId: string, fileData: Uint8Array, filename: string, signal?: AbortSignal): Promise<UploadResponse> {
    const state = await this.workflow.run({ action: 'upload', userId, fileData, filename, success: false }, signal);

    if (state.success && state.processingResult) {
      return { success: true, fileType: state.fileType ?? 'unknown', processingResult: state.processingResult };
    }
    return this.failure(state, 'Upload failed');
  }

  async ask(userId: string, question: string, signal?: AbortSignal): Promise<AskResponse> {
    const state = await this.workflow.run({ action: 'query', userId, question, success: false }, signal);

    if (state.success && state.queryResult) {
      return { success: true, queryResult: state.queryResult };
    }
    return this.failure(state, 'Query failed');
  }

  async visualize(userId: string, signal?: AbortSignal): Promise<VisualizeResponse> {
    const state = await this.workflow.run({ action: 'visualize', userId, success: false }, signal);

    if (state.success && state.graphData) {
      return { success: true, graphData: state.graphData };
    }
    return this.failure(state, 'Visualization failed');
  }

  async exportGraph(userId: string, signal?: AbortSignal): Promise<ExportResponse> {
    const result = await this.visualize(userId, signal);

    if (!result.success) {
      return { userId, success: false, error: result.error };
    }
    return buildGraphExport(userId, result.graphData);
  }

  /**
   * Delete every entity, relationship and chunk the user owns
   */
  async reset(userId: string): Promise<ResetResponse> {
    try {
      await this.store.deletePartition(userId);
      console.log(`🧹 Reset knowledge graph for ${userId}`);
      return { success: true };
    } catch (error) {
      const failure = toError(error);
      ErrorHandler.handle(ErrorCategory.STORAGE, ErrorSeverity.HIGH, 'Failed to reset partition', failure, { userId });
      return { success: false, error: failure.message };
    }
  }

  private failure(state: WorkflowState, fallback: string): FailureResponse {
    return { success: false, error: state.error ?? fallback };
  }
}
