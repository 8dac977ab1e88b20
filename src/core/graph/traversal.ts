/**
 * Bounded breadth-first expansion in a single direction.
 */

import type { EdgeType, TraversalDirection } from '../../shared/types.js';
import type { GraphStore, StoredEdge } from './graph-store.js';
import { isActive } from './temporal.js';

export interface ExpandOptions {
  maxDepth: number;
  /** Epoch ms */
  asOf: number;
  /** null = every edge type */
  edgeTypes: ReadonlySet<EdgeType> | null;
  /** Called before each depth level is fetched; throw to stop the walk */
  checkpoint?: (depth: number) => void;
}

/** Raw traversal output before node hydration */
export interface TraversalResult {
  /** node id -> depth at which it was first reached; insertion order is discovery order */
  depths: Map<string, number>;
  /** edge id -> edge; insertion order is discovery order */
  edges: Map<string, StoredEdge>;
}

export async function expand(
  store: GraphStore,
  seedId: string,
  direction: TraversalDirection,
  options: ExpandOptions,
): Promise<TraversalResult> {
  const depths = new Map<string, number>([[seedId, 0]]);
  const edges = new Map<string, StoredEdge>();
  let frontier: string[] = [seedId];

  for (let depth = 1; depth <= options.maxDepth && frontier.length > 0; depth++) {
    options.checkpoint?.(depth);

    const incident = await store.edgesIncident(frontier, direction);
    const next: string[] = [];

    for (const edge of incident) {
      if (!isActive(edge, options.asOf)) continue;
      if (options.edgeTypes !== null && !options.edgeTypes.has(edge.edge_type)) continue;

      if (!edges.has(edge.id)) edges.set(edge.id, edge);

      const farEnd = direction === 'upstream' ? edge.source_id : edge.target_id;
      if (!depths.has(farEnd)) {
        depths.set(farEnd, depth);
        next.push(farEnd);
      }
    }

    frontier = next;
  }

  return { depths, edges };
}
