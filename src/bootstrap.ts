/**
 * Composition root
 *
 * Builds the model clients, the graph store and both pipelines once, and
 * hands them to the study agent. Nothing here is a module-level singleton;
 * callers own the returned runtime and close it when done.
 */

import type { AppConfig } from './config.js';
import type { GraphStore } from './storage/types.js';
import { createGraphStore } from './storage/factory.js';
import {
  OpenAICompletionService,
  OpenAIEmbeddingService,
  PlainTextExtractionService,
  type CompletionService,
  type EmbeddingService,
  type TextExtractionService
} from './services/index.js';
import { KnowledgeExtractor } from './extraction/llm-extractor.js';
import { IngestionPipeline } from './extraction/ingestion-pipeline.js';
import { ConceptExtractor } from './retrieval/concept-extractor.js';
import { GraphContextResolver } from './retrieval/graph-context-resolver.js';
import { VectorRetriever } from './retrieval/vector-retriever.js';
import { AnswerSynthesizer } from './retrieval/answer-synthesizer.js';
import { QueryPipeline } from './retrieval/query-pipeline.js';
import { WorkflowController, createHandlers } from './agent/workflow.js';
import { StudyAgent } from './agent/study-agent.js';

export interface RuntimeDeps {
  store: GraphStore;
  completion: CompletionService;
  embeddings: EmbeddingService;
  textExtraction: TextExtractionService;
}

export interface Runtime extends RuntimeDeps {
  agent: StudyAgent;
  close(): Promise<void>;
}

/**
 * Wire the agent from already-built collaborators
 */
export function assembleRuntime(deps: RuntimeDeps, config: Pick<AppConfig, 'ingestion' | 'retrieval'>): Runtime {
  const ingestion = new IngestionPipeline(
    deps.store,
    new KnowledgeExtractor(deps.completion),
    deps.embeddings,
    { maxChars: config.ingestion.maxChars, retryBaseDelayMs: config.ingestion.retryBaseDelayMs }
  );

  const queryPipeline = new QueryPipeline({
    conceptExtractor: new ConceptExtractor(deps.completion),
    resolver: new GraphContextResolver(deps.store),
    retriever: new VectorRetriever(deps.store, deps.embeddings, config.retrieval.topK),
    synthesizer: new AnswerSynthesizer(deps.completion)
  });

  const workflow = new WorkflowController(createHandlers({
    store: deps.store,
    textExtraction: deps.textExtraction,
    ingestion,
    queryPipeline
  }));

  return {
    ...deps,
    agent: new StudyAgent(workflow, deps.store),
    close: () => deps.store.close()
  };
}

/**
 * Build the production runtime from configuration
 */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const store = await createGraphStore(config.store);

  return assembleRuntime({
    store,
    completion: new OpenAICompletionService(config.completion),
    embeddings: new OpenAIEmbeddingService(config.embedding),
    textExtraction: new PlainTextExtractionService()
  }, config);
}
