import { describe, it, expect, vi } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { createGetGraphHandler } from './lineage-get-graph.js';
import { LINEAGE_ERROR } from '../errors.js';
import { createMockEngine, readJson, sampleGraph } from './__test-helpers.js';
import {
  InvalidArgumentError,
  NodeNotFoundError,
  StoreUnavailableError,
  TraversalAbortedError,
} from '../../../shared/errors.js';

describe('lineage_get_graph', () => {
  it('passes the query through to the engine', async () => {
    const engine = createMockEngine({ traverse: vi.fn().mockResolvedValue(sampleGraph()) });
    const handler = createGetGraphHandler(engine);

    await handler({
      node: 'postgres://shop.public.orders',
      direction: 'upstream',
      depth: 2,
      as_of: '2024-02-01T00:00:00Z',
      edge_types: ['transform', 'read'],
      include_deleted: true,
    });

    expect(engine.traverse).toHaveBeenCalledWith(
      {
        seed: 'postgres://shop.public.orders',
        direction: 'upstream',
        depth: 2,
        as_of: '2024-02-01T00:00:00Z',
        edge_types: ['transform', 'read'],
        include_deleted: true,
      },
      { signal: undefined },
    );
  });

  it('leaves unset fields to the engine defaults', async () => {
    const engine = createMockEngine({ traverse: vi.fn().mockResolvedValue(sampleGraph()) });
    await createGetGraphHandler(engine)({ node: 'orders', include_deleted: false });

    expect(engine.traverse).toHaveBeenCalledWith(
      {
        seed: 'orders',
        direction: undefined,
        depth: undefined,
        as_of: undefined,
        edge_types: undefined,
        include_deleted: false,
      },
      { signal: undefined },
    );
  });

  it('forwards the request abort signal', async () => {
    const engine = createMockEngine({ traverse: vi.fn().mockResolvedValue(sampleGraph()) });
    const controller = new AbortController();

    await createGetGraphHandler(engine)(
      { node: 'orders', include_deleted: false },
      { signal: controller.signal },
    );

    expect(engine.traverse).toHaveBeenCalledWith(expect.anything(), { signal: controller.signal });
  });

  it('returns the graph as JSON with query_time_ms', async () => {
    const engine = createMockEngine({ traverse: vi.fn().mockResolvedValue(sampleGraph()) });
    const result = await createGetGraphHandler(engine)({ node: 'orders', include_deleted: false });

    const parsed = readJson(result);
    expect(parsed).toMatchObject({
      query: { seed_id: 'node-orders', direction: 'downstream', depth: 3 },
      node_count: 2,
      edge_count: 1,
      nodes: [
        { id: 'node-orders', depth: 0 },
        { id: 'node-orders-clean', depth: 1 },
      ],
      edges: [{ id: 'edge-1', source_id: 'node-orders', target_id: 'node-orders-clean' }],
    });
    expect(parsed).toHaveProperty('query_time_ms');
  });

  it('maps an unknown seed to NOT_FOUND', async () => {
    const engine = createMockEngine({
      traverse: vi.fn().mockRejectedValue(new NodeNotFoundError('missing')),
    });
    const promise = createGetGraphHandler(engine)({ node: 'missing', include_deleted: false });

    await expect(promise).rejects.toBeInstanceOf(McpError);
    await expect(promise).rejects.toMatchObject({ code: LINEAGE_ERROR.NOT_FOUND });
  });

  it('maps a rejected query to INVALID_ARGUMENT', async () => {
    const engine = createMockEngine({
      traverse: vi.fn().mockRejectedValue(new InvalidArgumentError('depth must be <= 10')),
    });
    const promise = createGetGraphHandler(engine)({
      node: 'orders',
      depth: 50,
      include_deleted: false,
    });

    await expect(promise).rejects.toMatchObject({ code: LINEAGE_ERROR.INVALID_ARGUMENT });
  });

  it('maps an aborted traversal to ABORTED', async () => {
    const engine = createMockEngine({
      traverse: vi.fn().mockRejectedValue(new TraversalAbortedError('deadline', 3)),
    });
    const promise = createGetGraphHandler(engine)({ node: 'orders', include_deleted: false });

    await expect(promise).rejects.toMatchObject({ code: LINEAGE_ERROR.ABORTED });
  });

  it('maps a store failure to STORE_UNAVAILABLE', async () => {
    const engine = createMockEngine({
      traverse: vi
        .fn()
        .mockRejectedValue(new StoreUnavailableError('resolveNode', new Error('disk I/O error'))),
    });
    const promise = createGetGraphHandler(engine)({ node: 'orders', include_deleted: false });

    await expect(promise).rejects.toMatchObject({ code: LINEAGE_ERROR.STORE_UNAVAILABLE });
  });
});
