import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { StatementCache } from '../statement-cache.js';
import { createNodeRepository } from './node-repository.js';
import { createEdgeRepository, type EdgeRepository } from './edge-repository.js';
import { edgeRow, nodeRow, openMemoryDb } from './__test-helpers.js';

describe('EdgeRepository', () => {
  let db: Database.Database;
  let cache: StatementCache;
  let repo: EdgeRepository;

  beforeEach(() => {
    ({ db, cache } = openMemoryDb());
    const nodes = createNodeRepository(cache);
    for (const id of ['a', 'b', 'c', 'd']) nodes.insert(nodeRow(id));
    repo = createEdgeRepository(cache);
  });

  afterEach(() => {
    cache.clear();
    db.close();
  });

  it('should insert and find an edge by id', () => {
    repo.insert(edgeRow('e1', 'a', 'b', { metadata: '{"job":"load"}', created_by: 'scheduler' }));

    const row = repo.findById('e1');
    expect(row?.source_id).toBe('a');
    expect(row?.target_id).toBe('b');
    expect(row?.metadata).toBe('{"job":"load"}');
    expect(row?.created_by).toBe('scheduler');
  });

  it('should find the active edge for a (source, target, type)', () => {
    repo.insert(edgeRow('old', 'a', 'b', { valid_to: '2024-01-05T00:00:00.000Z' }));
    repo.insert(edgeRow('cur', 'a', 'b', { valid_from: '2024-01-05T00:00:00.000Z' }));

    expect(repo.findActive('a', 'b', 'transform')?.id).toBe('cur');
    expect(repo.findActive('a', 'b', 'read')).toBeNull();
  });

  it('should find the latest end among closed versions', () => {
    expect(repo.findLatestEnd('a', 'b', 'transform')).toBeNull();

    repo.insert(edgeRow('v1', 'a', 'b', { valid_to: '2024-01-05T00:00:00.000Z' }));
    repo.insert(
      edgeRow('v2', 'a', 'b', {
        valid_from: '2024-01-05T00:00:00.000Z',
        valid_to: '2024-01-09T00:00:00.000Z',
      }),
    );
    repo.insert(edgeRow('v3', 'a', 'b', { valid_from: '2024-01-09T00:00:00.000Z' }));
    repo.insert(edgeRow('other', 'a', 'b', { edge_type: 'read', valid_to: '2024-03-01T00:00:00.000Z' }));

    expect(repo.findLatestEnd('a', 'b', 'transform')).toBe('2024-01-09T00:00:00.000Z');
    expect(repo.findLatestEnd('a', 'b', 'read')).toBe('2024-03-01T00:00:00.000Z');
    expect(repo.findLatestEnd('b', 'a', 'transform')).toBeNull();
  });

  it('should batch lookups by source and by target', () => {
    repo.insert(edgeRow('ab', 'a', 'b'));
    repo.insert(edgeRow('ac', 'a', 'c', { valid_from: '2024-01-02T00:00:00.000Z' }));
    repo.insert(edgeRow('bd', 'b', 'd'));
    repo.insert(edgeRow('cd', 'c', 'd'));

    expect(repo.findBySourceIds(['a', 'b']).map((r) => r.id)).toEqual(['ab', 'bd', 'ac']);
    expect(repo.findByTargetIds(['d']).map((r) => r.id)).toEqual(['bd', 'cd']);
    expect(repo.findBySourceIds([])).toEqual([]);
    expect(repo.findByTargetIds([])).toEqual([]);
  });

  it('should find every edge touching a node', () => {
    repo.insert(edgeRow('ab', 'a', 'b'));
    repo.insert(edgeRow('bc', 'b', 'c'));
    repo.insert(edgeRow('cd', 'c', 'd'));

    expect(repo.findByNodeId('b').map((r) => r.id)).toEqual(['ab', 'bc']);
  });

  it('should close an open edge once', () => {
    repo.insert(edgeRow('e1', 'a', 'b'));

    expect(repo.close('e1', '2024-02-01T00:00:00.000Z')).toBe(true);
    expect(repo.findById('e1')?.valid_to).toBe('2024-02-01T00:00:00.000Z');
    expect(repo.close('e1', '2024-03-01T00:00:00.000Z')).toBe(false);
    expect(repo.findActive('a', 'b', 'transform')).toBeNull();
  });

  it('should count total and active edges', () => {
    repo.insert(edgeRow('e1', 'a', 'b'));
    repo.insert(edgeRow('e2', 'b', 'c'));
    repo.close('e2', '2024-02-01T00:00:00.000Z');

    expect(repo.count()).toEqual({ total: 2, active: 1 });
  });
});
