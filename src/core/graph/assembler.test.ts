import { describe, it, expect } from 'vitest';
import { assembleGraph } from './assembler.js';
import type { TraversalResult } from './traversal.js';
import type { LineageQuery } from '../../shared/types.js';
import { InMemoryGraphStore, makeEdge, makeNode, day } from './__test-helpers.js';

function query(overrides: Partial<LineageQuery> = {}): LineageQuery {
  return {
    seed_id: 'seed',
    direction: 'downstream',
    depth: 3,
    as_of: day(10),
    edge_types: null,
    include_deleted: false,
    ...overrides,
  };
}

describe('assembleGraph', () => {
  const store = new InMemoryGraphStore([
    makeNode('seed', { name: 'orders', attributes: { owner: 'placeholder-team', rows: 10 } }),
    makeNode('n2', { name: 'beta', type: 'view' }),
    makeNode('n1', { name: 'alpha', classification: 'pii' }),
    makeNode('n3', { name: 'alpha' }),
    makeNode('gone', { name: 'aardvark', deleted_at: day(2) }),
  ]);

  const raw: TraversalResult = {
    depths: new Map([
      ['seed', 0],
      ['n2', 1],
      ['gone', 1],
      ['n3', 2],
      ['n1', 2],
    ]),
    edges: new Map([
      ['e1', makeEdge('e1', 'seed', 'n2', { edge_type: 'feeds', metadata: { k: 'v' } })],
      ['e2', makeEdge('e2', 'seed', 'gone', { valid_to: day(20) })],
      ['e3', makeEdge('e3', 'n2', 'n3')],
      ['e4', makeEdge('e4', 'n2', 'n1')],
    ]),
  };

  it('orders nodes by depth, then name, then id', async () => {
    const response = await assembleGraph(store, query(), raw);
    expect(response.nodes.map((n) => n.id)).toEqual(['seed', 'n2', 'n1', 'n3']);
    expect(response.nodes.map((n) => n.depth)).toEqual([0, 1, 2, 2]);
  });

  it('drops soft-deleted nodes but keeps their edges', async () => {
    const response = await assembleGraph(store, query(), raw);

    expect(response.nodes.some((n) => n.id === 'gone')).toBe(false);
    expect(response.edges.map((e) => e.id)).toEqual(['e1', 'e2', 'e3', 'e4']);
    expect(response.node_count).toBe(4);
    expect(response.edge_count).toBe(4);
  });

  it('includes soft-deleted nodes when asked', async () => {
    const response = await assembleGraph(store, query({ include_deleted: true }), raw);
    expect(response.nodes.map((n) => n.id)).toEqual(['seed', 'gone', 'n2', 'n1', 'n3']);
  });

  it('projects node and edge fields', async () => {
    const response = await assembleGraph(store, query(), raw);

    expect(response.nodes[0]).toEqual({
      id: 'seed',
      type: 'source_table',
      name: 'orders',
      qualified_name: null,
      classification: null,
      attributes: { owner: 'placeholder-team', rows: 10 },
      depth: 0,
    });
    expect(response.edges[0]).toEqual({
      id: 'e1',
      source_id: 'seed',
      target_id: 'n2',
      edge_type: 'feeds',
      metadata: { k: 'v' },
      valid_from: '2024-01-01T00:00:00.000Z',
      valid_to: null,
    });
    expect(response.edges[1]?.valid_to).toBe(day(20));
  });

  it('echoes the query', async () => {
    const q = query({ edge_types: ['feeds'] });
    const response = await assembleGraph(store, q, raw);
    expect(response.query).toBe(q);
  });

  it('skips ids the store no longer knows', async () => {
    const response = await assembleGraph(store, query(), {
      depths: new Map([['seed', 0], ['missing', 1]]),
      edges: new Map([['dangling', makeEdge('dangling', 'seed', 'missing')]]),
    });
    expect(response.nodes.map((n) => n.id)).toEqual(['seed']);
    expect(response.edge_count).toBe(1);
  });
});
