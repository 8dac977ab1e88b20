import type { TraversalResult } from './traversal.js';

/**
 * Union of an upstream and a downstream walk from the same seed.
 * Nodes reached by both keep the upstream depth; edges are deduplicated by id.
 */
export function mergeTraversals(
  upstream: TraversalResult,
  downstream: TraversalResult,
): TraversalResult {
  const depths = new Map(upstream.depths);
  for (const [id, depth] of downstream.depths) {
    if (!depths.has(id)) depths.set(id, depth);
  }

  const edges = new Map(upstream.edges);
  for (const [id, edge] of downstream.edges) {
    if (!edges.has(id)) edges.set(id, edge);
  }

  return { depths, edges };
}
