/**
 * Merge graph context and vector results into named prompt sections
 */

import type { GraphContext, VectorResult, StructuredContext } from '../core/types.js';

/** Longest document excerpt passed to the answer prompt */
export const MAX_DOCUMENT_CHARS = 500;

export function structureContext(graphContext: GraphContext, vectorResults: VectorResult[]): StructuredContext {
  return {
    concepts: graphContext.entities.map(entity => entity.name),
    relationships: graphContext.relationships.map(rel => `${rel.from} ${rel.type} ${rel.to}`),
    documents: vectorResults.map(result => result.chunk.text.slice(0, MAX_DOCUMENT_CHARS))
  };
}
