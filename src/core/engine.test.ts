import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { LineageEngine, createLineageEngine } from './engine.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  ConflictError,
  EdgeNotFoundError,
  EngineNotInitializedError,
  InvalidArgumentError,
  NodeNotFoundError,
  RunNotFoundError,
} from '../shared/errors.js';

describe('LineageEngine', () => {
  let tmpDir: string;
  let clock: Date;
  let engine: LineageEngine;

  const at = (iso: string): void => {
    clock = new Date(iso);
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lineage-engine-'));
    at('2024-06-01T00:00:00.000Z');
    engine = new LineageEngine(tmpDir, { now: () => clock });
  });

  afterEach(() => {
    engine.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('lifecycle', () => {
    it('rejects calls before initialize', () => {
      expect(engine.initialized).toBe(false);
      expect(() => engine.getStatus()).toThrow(EngineNotInitializedError);
    });

    it('creates the store once and reopens it afterwards', () => {
      const first = engine.initialize();
      expect(first.created).toBe(true);
      expect(first.db_path).toBe(path.join(tmpDir, '.lineage', 'lineage.db'));
      expect(fs.existsSync(first.db_path)).toBe(true);
      expect(engine.getConfig()).toEqual(DEFAULT_CONFIG);

      engine.createNode({ type: 'view', name: 'kept' });
      const second = engine.initialize();
      expect(second.created).toBe(false);
      expect(engine.listNodes().nodes.map((n) => n.name)).toEqual(['kept']);
    });

    it('starts over with force', () => {
      engine.initialize();
      engine.createNode({ type: 'view', name: 'dropped' });

      expect(engine.initialize({ force: true }).created).toBe(true);
      expect(engine.listNodes().nodes).toEqual([]);
    });

    it('loads an existing project through createLineageEngine', () => {
      engine.initialize();
      engine.createNode({ type: 'view', name: 'persisted' });
      engine.close();

      const reopened = createLineageEngine(tmpDir);
      try {
        expect(reopened.initialized).toBe(true);
        expect(reopened.listNodes().nodes.map((n) => n.name)).toEqual(['persisted']);
      } finally {
        reopened.close();
      }
    });

    it('leaves an uninitialized directory alone', () => {
      const fresh = createLineageEngine(tmpDir);
      expect(fresh.initialized).toBe(false);
      expect(fresh.configExists()).toBe(false);
    });
  });

  describe('with an initialized store', () => {
    beforeEach(() => {
      engine.initialize();
    });

    describe('nodes', () => {
      it('creates and reads a node', () => {
        const node = engine.createNode({
          type: 'source_table',
          name: 'orders',
          qualified_name: 'warehouse://raw.orders',
          classification: 'pii',
          tags: { tier: 'bronze' },
          attributes: { rows: 10 },
        });

        expect(node.created_at).toBe('2024-06-01T00:00:00.000Z');
        expect(engine.getNode(node.id)).toEqual(node);
        expect(engine.getNode('warehouse://raw.orders').id).toBe(node.id);
      });

      it('rejects invalid input', () => {
        expect(() => engine.createNode({ type: 'view', name: '' })).toThrow(InvalidArgumentError);
      });

      it('rejects a qualified name already in use', () => {
        engine.createNode({ type: 'view', name: 'a', qualified_name: 'q' });
        expect(() => engine.createNode({ type: 'view', name: 'b', qualified_name: 'q' })).toThrow(
          ConflictError,
        );
      });

      it('updates a node', () => {
        const node = engine.createNode({ type: 'view', name: 'a', description: 'old' });
        at('2024-06-02T00:00:00.000Z');

        const updated = engine.updateNode(node.id, { name: 'b', description: null, tags: { x: 1 } });

        expect(updated.name).toBe('b');
        expect(updated.description).toBeNull();
        expect(updated.tags).toEqual({ x: 1 });
        expect(updated.updated_at).toBe('2024-06-02T00:00:00.000Z');
      });

      it('soft deletes a node and frees its qualified name', () => {
        const node = engine.createNode({ type: 'view', name: 'a', qualified_name: 'q' });
        const deleted = engine.deleteNode('q');

        expect(deleted.deleted_at).toBe('2024-06-01T00:00:00.000Z');
        expect(() => engine.getNode(node.id)).toThrow(NodeNotFoundError);
        expect(engine.getNode(node.id, { includeDeleted: true }).deleted_at).not.toBeNull();
        expect(() => engine.deleteNode(node.id)).toThrow(NodeNotFoundError);

        engine.createNode({ type: 'view', name: 'a2', qualified_name: 'q' });
      });

      it('lists nodes by type with paging', () => {
        engine.createNode({ type: 'view', name: 'v1' });
        at('2024-06-02T00:00:00.000Z');
        engine.createNode({ type: 'dashboard', name: 'd1' });
        at('2024-06-03T00:00:00.000Z');
        engine.createNode({ type: 'view', name: 'v2' });

        expect(engine.listNodes({ type: 'view' }).nodes.map((n) => n.name)).toEqual(['v2', 'v1']);
        expect(engine.listNodes({ limit: 1, offset: 1 })).toMatchObject({ limit: 1, offset: 1 });
        expect(engine.listNodes({ limit: 1, offset: 1 }).nodes.map((n) => n.name)).toEqual(['d1']);
        expect(() => engine.listNodes({ limit: 0 })).toThrow(InvalidArgumentError);
      });
    });

    describe('edges', () => {
      let a: string;
      let b: string;

      beforeEach(() => {
        a = engine.createNode({ type: 'source_table', name: 'a', qualified_name: 'q://a' }).id;
        b = engine.createNode({ type: 'view', name: 'b' }).id;
      });

      it('creates an edge between nodes named by id or qualified name', () => {
        const { edge, superseded } = engine.createEdge({
          source: 'q://a',
          target: b,
          edge_type: 'read',
          metadata: { mode: 'full' },
          created_by: 'test',
        });

        expect(superseded).toBeNull();
        expect(edge).toMatchObject({
          source_id: a,
          target_id: b,
          edge_type: 'read',
          metadata: { mode: 'full' },
          valid_from: '2024-06-01T00:00:00.000Z',
          valid_to: null,
          created_by: 'test',
        });
        expect(engine.getEdge(edge.id)).toEqual(edge);
      });

      it('rejects unknown endpoints and edge types', () => {
        expect(() => engine.createEdge({ source: a, target: 'missing', edge_type: 'read' })).toThrow(
          NodeNotFoundError,
        );
        expect(() => engine.createEdge({ source: a, target: b, edge_type: 'teleports' })).toThrow(
          InvalidArgumentError,
        );
      });

      it('allows one active edge per (source, target, type)', () => {
        engine.createEdge({ source: a, target: b, edge_type: 'read' });

        expect(() => engine.createEdge({ source: a, target: b, edge_type: 'read' })).toThrow(ConflictError);
        engine.createEdge({ source: a, target: b, edge_type: 'write' });
      });

      it('supersedes the active edge at the new valid_from', () => {
        const first = engine.createEdge({ source: a, target: b, edge_type: 'read' }).edge;

        const { edge, superseded } = engine.createEdge(
          { source: a, target: b, edge_type: 'read', valid_from: '2024-06-05T00:00:00Z' },
          { supersede: true },
        );

        expect(superseded?.id).toBe(first.id);
        expect(superseded?.valid_to).toBe('2024-06-05T00:00:00.000Z');
        expect(edge.valid_from).toBe('2024-06-05T00:00:00.000Z');
        expect(engine.listEdges(a).map((e) => [e.id, e.valid_to])).toEqual([
          [first.id, '2024-06-05T00:00:00.000Z'],
          [edge.id, null],
        ]);
      });

      it('refuses to supersede with a valid_from that is not later', () => {
        engine.createEdge({ source: a, target: b, edge_type: 'read' });
        expect(() =>
          engine.createEdge({ source: a, target: b, edge_type: 'read' }, { supersede: true }),
        ).toThrow(InvalidArgumentError);
      });

      it('closes an edge once', () => {
        const { edge } = engine.createEdge({ source: a, target: b, edge_type: 'read' });

        expect(() => engine.closeEdge(edge.id, '2024-05-01T00:00:00Z')).toThrow(InvalidArgumentError);

        at('2024-06-10T00:00:00.000Z');
        expect(engine.closeEdge(edge.id).valid_to).toBe('2024-06-10T00:00:00.000Z');
        expect(() => engine.closeEdge(edge.id)).toThrow(ConflictError);
        expect(() => engine.closeEdge('missing')).toThrow(EdgeNotFoundError);

        engine.createEdge({ source: a, target: b, edge_type: 'read' });
      });

      it('rejects a backdated version inside a closed interval', async () => {
        const v1 = engine.createEdge({ source: a, target: b, edge_type: 'read' }).edge;
        at('2024-06-10T00:00:00.000Z');
        engine.closeEdge(v1.id, '2024-06-05T00:00:00Z');

        expect(() =>
          engine.createEdge({ source: a, target: b, edge_type: 'read', valid_from: '2024-06-03T00:00:00Z' }),
        ).toThrow(ConflictError);

        const v2 = engine.createEdge({
          source: a,
          target: b,
          edge_type: 'read',
          valid_from: '2024-06-05T00:00:00Z',
        }).edge;
        expect(v2.valid_from).toBe('2024-06-05T00:00:00.000Z');

        const graph = await engine.getDownstream(a, { as_of: '2024-06-04T00:00:00Z' });
        expect(graph.edges.map((e) => e.id)).toEqual([v1.id]);
      });

      it('treats an edge closed in the future as still holding its key', async () => {
        const first = engine.createEdge({ source: a, target: b, edge_type: 'read' }).edge;
        engine.closeEdge(first.id, '2030-01-01T00:00:00Z');

        expect(() => engine.createEdge({ source: a, target: b, edge_type: 'read' })).toThrow(
          'is valid until 2030-01-01T00:00:00.000Z',
        );

        const graph = await engine.getDownstream(a, { as_of: '2025-01-01T00:00:00Z' });
        expect(graph.edge_count).toBe(1);
      });

      it('lists edges of soft-deleted nodes', () => {
        engine.createEdge({ source: a, target: b, edge_type: 'read' });
        engine.deleteNode(b);
        expect(engine.listEdges(b)).toHaveLength(1);
      });

      it('records column lineage on an edge', () => {
        const { edge } = engine.createEdge({ source: a, target: b, edge_type: 'transform' });

        engine.addColumnLineage(edge.id, { source_column: 'amt', target_column: 'total', confidence: 0.5 });
        engine.addColumnLineage(edge.id, { source_column: 'id', target_column: 'id' });

        const output = engine.getColumnLineage(edge.id);
        expect(output.edge.id).toBe(edge.id);
        expect(output.columns.map((c) => [c.source_column, c.target_column, c.confidence])).toEqual([
          ['id', 'id', null],
          ['amt', 'total', 0.5],
        ]);

        expect(() =>
          engine.addColumnLineage(edge.id, { source_column: 'id', target_column: 'id' }),
        ).toThrow(ConflictError);
        expect(() =>
          engine.addColumnLineage('missing', { source_column: 'x', target_column: 'y' }),
        ).toThrow(EdgeNotFoundError);
        expect(() =>
          engine.addColumnLineage(edge.id, { source_column: 'x', target_column: 'y', confidence: 2 }),
        ).toThrow(InvalidArgumentError);
      });
    });

    describe('runs', () => {
      it('moves a run from created to success and stamps completed_at', () => {
        const pipeline = engine.createNode({ type: 'pipeline', name: 'load', qualified_name: 'p://load' });
        const run = engine.createRun({ run_id: 'run-1', pipeline_name: 'load', node: 'p://load' });

        expect(run).toMatchObject({
          node_id: pipeline.id,
          status: 'created',
          started_at: '2024-06-01T00:00:00.000Z',
          completed_at: null,
        });

        engine.updateRun('run-1', { status: 'running' });
        at('2024-06-01T00:30:00.000Z');
        const done = engine.updateRun('run-1', { status: 'success', metrics: { rows: 5 } });

        expect(done.status).toBe('success');
        expect(done.completed_at).toBe('2024-06-01T00:30:00.000Z');
        expect(done.metrics).toEqual({ rows: 5 });
        expect(engine.listRuns(pipeline.id).map((r) => r.run_id)).toEqual(['run-1']);
      });

      it('rejects moves out of a terminal status', () => {
        engine.createRun({ run_id: 'run-1', pipeline_name: 'load', status: 'running' });
        engine.updateRun('run-1', { status: 'failed', error_message: 'boom' });

        expect(() => engine.updateRun('run-1', { status: 'running' })).toThrow(ConflictError);
        expect(engine.updateRun('run-1', { metrics: { retries: 1 } }).metrics).toEqual({ retries: 1 });
        expect(engine.getRun('run-1').error_message).toBe('boom');
      });

      it('rejects duplicate and unknown run ids', () => {
        engine.createRun({ run_id: 'run-1', pipeline_name: 'load' });

        expect(() => engine.createRun({ run_id: 'run-1', pipeline_name: 'load' })).toThrow(ConflictError);
        expect(() => engine.getRun('run-2')).toThrow(RunNotFoundError);
        expect(() => engine.updateRun('run-2', { status: 'running' })).toThrow(RunNotFoundError);
      });
    });

    describe('traversal', () => {
      it('walks the stored graph in both directions and in time', async () => {
        const a = engine.createNode({ type: 'source_table', name: 'a' }).id;
        const b = engine.createNode({ type: 'view', name: 'b' }).id;
        const c = engine.createNode({ type: 'dashboard', name: 'c' }).id;
        engine.createEdge({ source: a, target: b, edge_type: 'transform' });
        const bc = engine.createEdge({ source: b, target: c, edge_type: 'feeds' }).edge;

        const down = await engine.getDownstream(a);
        expect(down.nodes.map((n) => [n.name, n.depth])).toEqual([
          ['a', 0],
          ['b', 1],
          ['c', 2],
        ]);

        const up = await engine.getUpstream(c, { depth: 1 });
        expect(up.nodes.map((n) => n.name)).toEqual(['c', 'b']);

        const both = await engine.getBidirectional(b);
        expect(both.node_count).toBe(3);
        expect(both.query.direction).toBe('both');

        at('2024-06-10T00:00:00.000Z');
        engine.closeEdge(bc.id);
        expect((await engine.getDownstream(a)).node_count).toBe(2);
        const past = await engine.getDownstream(a, { as_of: '2024-06-05T00:00:00.000Z' });
        expect(past.node_count).toBe(3);
      });

      it('reports unknown seeds', async () => {
        await expect(engine.traverse({ seed: 'missing' })).rejects.toBeInstanceOf(NodeNotFoundError);
      });
    });

    it('reports status counts', () => {
      const a = engine.createNode({ type: 'view', name: 'a' }).id;
      const b = engine.createNode({ type: 'view', name: 'b' }).id;
      const { edge } = engine.createEdge({ source: a, target: b, edge_type: 'derive' });
      engine.addColumnLineage(edge.id, { source_column: 'x', target_column: 'y' });
      engine.createRun({ run_id: 'run-1', pipeline_name: 'p' });
      engine.deleteNode(b);

      expect(engine.getStatus()).toMatchObject({
        initialized: true,
        total_nodes: 2,
        deleted_nodes: 1,
        total_edges: 1,
        active_edges: 1,
        column_mappings: 1,
        total_runs: 1,
      });
    });

    describe('seedExample', () => {
      it('loads the example lineage', async () => {
        const result = engine.seedExample();

        expect(result).toEqual({
          nodes_created: 7,
          edges_created: 7,
          column_mappings_created: 3,
          runs_created: 1,
        });

        const graph = await engine.getDownstream('mysql://wms.raw.shipments');
        expect(graph.nodes.map((n) => [n.name, n.depth])).toEqual([
          ['shipments_raw', 0],
          ['shipments_nightly_load', 1],
          ['shipments_enriched', 2],
          ['Fulfilment Overview', 3],
        ]);

        const run = engine.getRun('shipments_nightly_load-example-0001');
        expect(run.status).toBe('success');
        expect(run.started_at).toBe('2024-05-31T18:00:00.000Z');
        expect(run.completed_at).toBe('2024-05-31T18:12:00.000Z');
      });

      it('is all or nothing', () => {
        engine.seedExample();
        expect(() => engine.seedExample()).toThrow(ConflictError);
        expect(engine.getStatus().total_nodes).toBe(7);
      });

      it('rejects an unreadable fixture', () => {
        expect(() => engine.seedExample(path.join(tmpDir, 'missing.json'))).toThrow(InvalidArgumentError);
      });

      it('rejects a fixture with an unknown node key', () => {
        const fixture = path.join(tmpDir, 'bad.json');
        fs.writeFileSync(
          fixture,
          JSON.stringify({
            nodes: [{ key: 'a', type: 'view', name: 'a' }],
            edges: [{ source: 'a', target: 'b', edge_type: 'read', days_ago: 1 }],
          }),
        );

        expect(() => engine.seedExample(fixture)).toThrow('Seed edge references unknown node key: b');
        expect(engine.getStatus().total_nodes).toBe(0);
      });
    });
  });
});
