import { describe, it, expect, vi } from 'vitest';
import { createListNodesHandler } from './lineage-list-nodes.js';
import { createMockEngine, readJson, sampleNode } from './__test-helpers.js';
import { DatabaseError } from '../../../shared/errors.js';
import { LINEAGE_ERROR } from '../errors.js';

describe('lineage_list_nodes', () => {
  it('lists nodes with the given filters', async () => {
    const engine = createMockEngine({
      listNodes: vi.fn().mockReturnValue({ nodes: [sampleNode()], limit: 10, offset: 5 }),
    });

    const result = await createListNodesHandler(engine)({
      type: 'source_table',
      limit: 10,
      offset: 5,
      include_deleted: false,
    });

    expect(engine.listNodes).toHaveBeenCalledWith({
      type: 'source_table',
      limit: 10,
      offset: 5,
      include_deleted: false,
    });
    expect(readJson(result)).toMatchObject({
      nodes: [{ id: 'node-orders', type: 'source_table' }],
      limit: 10,
      offset: 5,
    });
  });

  it('maps a database failure to STORE_UNAVAILABLE', async () => {
    const engine = createMockEngine({
      listNodes: vi.fn(() => {
        throw new DatabaseError('database is locked');
      }),
    });

    const promise = createListNodesHandler(engine)({ limit: 100, offset: 0, include_deleted: false });
    await expect(promise).rejects.toMatchObject({ code: LINEAGE_ERROR.STORE_UNAVAILABLE });
    await expect(promise).rejects.toThrow('Lineage store unavailable: database is locked');
  });
});
