/**
 * Shared test helpers for the traversal core: an in-memory GraphStore.
 */

import type { TraversalDirection } from '../../shared/types.js';
import type { GraphStore, StoredEdge, StoredNode } from './graph-store.js';

export const T0 = '2024-01-01T00:00:00.000Z';

export function day(n: number): string {
  return new Date(Date.UTC(2024, 0, n)).toISOString();
}

export function makeNode(
  id: string,
  overrides: Partial<StoredNode> = {},
): StoredNode {
  return {
    id,
    type: 'source_table',
    name: id,
    qualified_name: null,
    description: null,
    documentation_url: null,
    system: null,
    platform: null,
    location: null,
    classification: null,
    tags: {},
    attributes: {},
    created_at: T0,
    updated_at: T0,
    deleted_at: null,
    ...overrides,
  };
}

export function makeEdge(
  id: string,
  source_id: string,
  target_id: string,
  overrides: Partial<StoredEdge> = {},
): StoredEdge {
  return {
    id,
    source_id,
    target_id,
    edge_type: 'transform',
    metadata: {},
    valid_from: T0,
    valid_to: null,
    ...overrides,
  };
}

export class InMemoryGraphStore implements GraphStore {
  readonly nodes = new Map<string, StoredNode>();
  readonly edges: StoredEdge[] = [];
  /** Every edgesIncident call, for asserting batching */
  readonly incidentCalls: Array<{ nodeIds: string[]; direction: TraversalDirection }> = [];
  failWith: Error | null = null;

  constructor(nodes: StoredNode[] = [], edges: StoredEdge[] = []) {
    for (const node of nodes) this.nodes.set(node.id, node);
    this.edges.push(...edges);
  }

  /** Add a node for each id, named after the id */
  static chain(...ids: string[]): InMemoryGraphStore {
    const store = new InMemoryGraphStore(ids.map((id) => makeNode(id)));
    for (let i = 0; i + 1 < ids.length; i++) {
      const source = ids[i];
      const target = ids[i + 1];
      if (source !== undefined && target !== undefined) {
        store.edges.push(makeEdge(`${source}->${target}`, source, target));
      }
    }
    return store;
  }

  async edgesIncident(
    nodeIds: readonly string[],
    direction: TraversalDirection,
  ): Promise<StoredEdge[]> {
    this.incidentCalls.push({ nodeIds: [...nodeIds], direction });
    if (this.failWith) throw this.failWith;
    const ids = new Set(nodeIds);
    return this.edges.filter((e) =>
      ids.has(direction === 'upstream' ? e.target_id : e.source_id),
    );
  }

  async nodesById(nodeIds: readonly string[], includeDeleted: boolean): Promise<StoredNode[]> {
    if (this.failWith) throw this.failWith;
    const result: StoredNode[] = [];
    for (const id of nodeIds) {
      const node = this.nodes.get(id);
      if (node && (includeDeleted || node.deleted_at === null)) result.push(node);
    }
    return result;
  }

  async resolveNode(idOrQualifiedName: string, includeDeleted: boolean): Promise<StoredNode | null> {
    if (this.failWith) throw this.failWith;
    const byId = this.nodes.get(idOrQualifiedName);
    const node = byId
      ?? [...this.nodes.values()].find((n) => n.qualified_name === idOrQualifiedName);
    if (!node) return null;
    if (node.deleted_at !== null && !includeDeleted) return null;
    return node;
  }
}
