/**
 * Hybrid query pipeline: graph neighborhood plus vector similarity
 *
 * The graph decides whether a topic is covered. When the extracted concept
 * has no entity in the user's partition the pipeline answers with a fixed
 * "not found" message and makes no embedding or answer calls.
 */

import type { QueryResult } from '../core/types.js';
import { ConceptExtractor } from './concept-extractor.js';
import { GraphContextResolver } from './graph-context-resolver.js';
import { VectorRetriever } from './vector-retriever.js';
import { structureContext } from './context-structurer.js';
import { AnswerSynthesizer } from './answer-synthesizer.js';

export const TOPIC_NOT_FOUND_ANSWER = 'This topic was not found in your uploaded materials.';

export interface QueryPipelineDeps {
  conceptExtractor: ConceptExtractor;
  resolver: GraphContextResolver;
  retriever: VectorRetriever;
  synthesizer: AnswerSynthesizer;
}

export class QueryPipeline {
  private deps: QueryPipelineDeps;

  constructor(deps: QueryPipelineDeps) {
    this.deps = deps;
  }

  async answer(question: string, userId: string, signal?: AbortSignal): Promise<QueryResult> {
    const concept = await this.deps.conceptExtractor.extract(question, signal);
    console.log(`🔍 Resolved question to concept "${concept}"`);

    const graphContext = await this.deps.resolver.resolve(concept, userId);

    if (graphContext.entities.length === 0) {
      console.log(`📭 No graph entities for "${concept}"`);
      return {
        answer: TOPIC_NOT_FOUND_ANSWER,
        success: false,
        concept,
        context: { documentsFound: 0, graphEntities: 0, graphRelationships: 0 }
      };
    }

    // Retrieval is keyed on the concept, not the raw question
    const vectorResults = await this.deps.retriever.search(concept, userId, undefined, signal);
    const structured = structureContext(graphContext, vectorResults);
    const answer = await this.deps.synthesizer.synthesize(question, structured, signal);

    return {
      answer,
      success: true,
      concept,
      context: {
        documentsFound: vectorResults.length,
        graphEntities: graphContext.entities.length,
        graphRelationships: graphContext.relationships.length
      }
    };
  }
}
