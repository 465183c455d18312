/**
 * Graph context resolution: one outgoing hop around a concept
 */

import type { GraphContext } from '../core/types.js';
import type { GraphStore } from '../storage/types.js';

export class GraphContextResolver {
  private store: GraphStore;

  constructor(store: GraphStore) {
    this.store = store;
  }

  /**
   * Named entity, its direct targets and the edges to them.
   * An unknown or blank concept resolves to an empty context, not an error.
   */
  async resolve(concept: string, userId: string): Promise<GraphContext> {
    const name = concept.trim();
    if (!name) {
      return { entities: [], relationships: [] };
    }

    return this.store.getNeighborhood(name, userId);
  }
}
