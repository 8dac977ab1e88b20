/**
 * Graph assembler - hydrates a raw traversal into the response shape.
 */

import type {
  LineageGraphEdge,
  LineageGraphNode,
  LineageGraphResponse,
  LineageQuery,
} from '../../shared/types.js';
import type { GraphStore, StoredEdge } from './graph-store.js';
import type { TraversalResult } from './traversal.js';

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function toGraphEdge(edge: StoredEdge): LineageGraphEdge {
  return {
    id: edge.id,
    source_id: edge.source_id,
    target_id: edge.target_id,
    edge_type: edge.edge_type,
    metadata: edge.metadata,
    valid_from: edge.valid_from,
    valid_to: edge.valid_to,
  };
}

export async function assembleGraph(
  store: GraphStore,
  query: LineageQuery,
  raw: TraversalResult,
): Promise<LineageGraphResponse> {
  // Every edge endpoint is already in `depths`; the seed is too.
  const touched = [...raw.depths.keys()];
  const records = await store.nodesById(touched, query.include_deleted);

  const nodes: LineageGraphNode[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.id)) continue;
    if (record.deleted_at !== null && !query.include_deleted) continue;
    const depth = raw.depths.get(record.id);
    if (depth === undefined) continue;
    seen.add(record.id);
    nodes.push({
      id: record.id,
      type: record.type,
      name: record.name,
      qualified_name: record.qualified_name,
      classification: record.classification,
      attributes: record.attributes,
      depth,
    });
  }

  nodes.sort(
    (a, b) => a.depth - b.depth || compareText(a.name, b.name) || compareText(a.id, b.id),
  );

  // Edges stay visible even when an endpoint was filtered out above.
  const edges = [...raw.edges.values()].map(toGraphEdge);

  return {
    query,
    nodes,
    edges,
    node_count: nodes.length,
    edge_count: edges.length,
  };
}
