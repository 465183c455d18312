/**
 * Core exports for coursegraph
 *
 * Everything needed to embed the ingestion and retrieval pipelines in another
 * service, plus the composition root and HTTP app factory.
 */

// Core types and partition graph
export * from './core/types.js';
export { PartitionGraph, relationshipKey } from './core/graph.js';
export type { PartitionEdge, PartitionNode, PartitionMetrics, PartitionSnapshot } from './core/graph.js';

// Chunking
export { semanticChunk, semanticChunks, isHeading, breakAtSentenceBoundary, DEFAULT_MAX_CHARS } from './chunking/semantic-chunker.js';

// Extraction and ingestion
export * from './extraction/index.js';

// Retrieval
export * from './retrieval/index.js';

// Workflow and public operations
export { WorkflowController, WorkflowStep, nextStep, createHandlers } from './agent/workflow.js';
export type { WorkflowState, WorkflowAction, WorkflowDeps, StepHandler, HandlerTable } from './agent/workflow.js';
export { StudyAgent } from './agent/study-agent.js';
export type {
  UploadResponse,
  AskResponse,
  VisualizeResponse,
  ExportResponse,
  ResetResponse,
  FailureResponse
} from './agent/study-agent.js';
export { buildGraphExport, countNodeTypes, type GraphExport, type GraphStatistics } from './agent/graph-export.js';

// Storage
export * from './storage/index.js';

// Model clients and text extraction
export * from './services/index.js';

// Configuration and wiring
export { loadConfig, type AppConfig, type LLMProvider, type GraphStoreKind } from './config.js';
export { createRuntime, assembleRuntime, type Runtime, type RuntimeDeps } from './bootstrap.js';
export { createApp, type ApiOptions } from './server/api.js';

// Utilities
export * from './utils/index.js';
