/**
 * Shared test helpers for MCP tool tests
 */

import { vi } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolEngine } from './shared.js';
import type {
  LineageEdge,
  LineageGraphResponse,
  LineageNode,
} from '../../../shared/types.js';

/**
 * Create a mock engine with every tool-facing method as vi.fn()
 */
export function createMockEngine(overrides: Partial<ToolEngine> = {}): ToolEngine {
  return {
    traverse: vi.fn(),
    getNode: vi.fn(),
    listEdges: vi.fn(),
    listNodes: vi.fn(),
    getColumnLineage: vi.fn(),
    ...overrides,
  };
}

/** Parse the JSON text payload of a tool result */
export function readJson(result: CallToolResult): unknown {
  const first = result.content[0];
  if (result.content.length !== 1 || first?.type !== 'text') {
    throw new Error('Expected a single text content block');
  }
  return JSON.parse(first.text);
}

export function sampleNode(overrides: Partial<LineageNode> = {}): LineageNode {
  return {
    id: 'node-orders',
    type: 'source_table',
    name: 'orders',
    qualified_name: 'postgres://shop.public.orders',
    description: null,
    documentation_url: null,
    system: 'postgres',
    platform: null,
    location: null,
    classification: 'internal',
    tags: {},
    attributes: {},
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    deleted_at: null,
    ...overrides,
  };
}

export function sampleEdge(overrides: Partial<LineageEdge> = {}): LineageEdge {
  return {
    id: 'edge-1',
    source_id: 'node-orders',
    target_id: 'node-orders-clean',
    edge_type: 'transform',
    metadata: {},
    valid_from: '2024-01-01T00:00:00.000Z',
    valid_to: null,
    created_at: '2024-01-01T00:00:00.000Z',
    created_by: null,
    ...overrides,
  };
}

export function sampleGraph(): LineageGraphResponse {
  return {
    query: {
      seed_id: 'node-orders',
      direction: 'downstream',
      depth: 3,
      as_of: '2024-02-01T00:00:00.000Z',
      edge_types: null,
      include_deleted: false,
    },
    nodes: [
      {
        id: 'node-orders',
        type: 'source_table',
        name: 'orders',
        qualified_name: 'postgres://shop.public.orders',
        classification: 'internal',
        attributes: {},
        depth: 0,
      },
      {
        id: 'node-orders-clean',
        type: 'stage_table',
        name: 'orders_clean',
        qualified_name: null,
        classification: null,
        attributes: {},
        depth: 1,
      },
    ],
    edges: [
      {
        id: 'edge-1',
        source_id: 'node-orders',
        target_id: 'node-orders-clean',
        edge_type: 'transform',
        metadata: {},
        valid_from: '2024-01-01T00:00:00.000Z',
        valid_to: null,
      },
    ],
    node_count: 2,
    edge_count: 1,
  };
}
