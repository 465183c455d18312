/**
 * Utility functions and classes for coursegraph
 */

export { VectorUtils, type Vector, type SimilarityResult, type EmbeddingCache } from './vector-utils.js';
export {
  ErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  TextExtractionError,
  StoreError,
  ConfigurationError,
  toError,
  type ErrorInfo,
  type RetryOptions
} from './error-handler.js';
