/**
 * Retrieval module exports
 */

export { GraphContextResolver } from './graph-context-resolver.js';
export { VectorRetriever, RELEVANCE_THRESHOLD, DEFAULT_TOP_K } from './vector-retriever.js';
export { structureContext, MAX_DOCUMENT_CHARS } from './context-structurer.js';
export { AnswerSynthesizer, buildAnswerPrompt, formatContext } from './answer-synthesizer.js';
export { ConceptExtractor, buildConceptPrompt, normalizeConcept } from './concept-extractor.js';
export { QueryPipeline, TOPIC_NOT_FOUND_ANSWER, type QueryPipelineDeps } from './query-pipeline.js';
