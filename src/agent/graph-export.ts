/**
 * Graph export with summary statistics
 */

import type { GraphData, GraphNodeView } from '../core/types.js';

export interface GraphStatistics {
  nodes: number;
  edges: number;
  /** Node count per entity type */
  nodeTypes: Record<string, number>;
}

export interface GraphExport {
  userId: string;
  exportTimestamp: string;
  statistics: GraphStatistics;
  data: GraphData;
  success: true;
}

export function countNodeTypes(nodes: GraphNodeView[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const node of nodes) {
    const type = node.type || 'unknown';
    counts[type] = (counts[type] ?? 0) + 1;
  }
  return counts;
}

export function buildGraphExport(userId: string, data: GraphData, exportedAt: Date = new Date()): GraphExport {
  return {
    userId,
    exportTimestamp: exportedAt.toISOString(),
    statistics: {
      nodes: data.nodes.length,
      edges: data.edges.length,
      nodeTypes: countNodeTypes(data.nodes)
    },
    data,
    success: true
  };
}
