export { OpenAICompletionService, type CompletionService, type CompletionServiceConfig, type ChatCompletionsClient } from './completion-service.js';
export { OpenAIEmbeddingService, type EmbeddingService, type EmbeddingServiceConfig, type EmbeddingsClient } from './embedding-service.js';
export {
  PlainTextExtractionService,
  cleanExtractedText,
  detectFileType,
  type TextExtractionService,
  type TextExtractionResult
} from './text-extraction.js';
