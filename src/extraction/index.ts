/**
 * Extraction module exports
 */

export { sanitizeEntities, sanitizeRelationships, sanitizeExtraction } from './sanitizer.js';
export {
  KnowledgeExtractor,
  buildExtractionPrompt,
  extractJsonObject,
  type KnowledgeExtractorConfig
} from './llm-extractor.js';
export { IngestionPipeline, chunkId, type IngestionConfig } from './ingestion-pipeline.js';
