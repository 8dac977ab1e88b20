import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { createCli } from './index.js';
import { generateMcpConfig } from './onboarding.js';
import { parseInteger, parseJsonObject, parseNumber } from './utils/parse-options.js';

function idOf(record: unknown): string {
  if (typeof record === 'object' && record !== null && 'id' in record && typeof record.id === 'string') {
    return record.id;
  }
  throw new Error('Expected a record with an id');
}

describe('argument parsers', () => {
  it('parses integers and rejects fractions', () => {
    expect(parseInteger('12')).toBe(12);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
  });

  it('parses numbers and rejects blanks', () => {
    expect(parseNumber('0.75')).toBe(0.75);
    expect(() => parseNumber(' ')).toThrow('Not a number.');
  });

  it('parses JSON objects only', () => {
    expect(parseJsonObject('{"owner":"placeholder-team"}')).toEqual({ owner: 'placeholder-team' });
    expect(() => parseJsonObject('[1, 2]')).toThrow('Expected a JSON object.');
    expect(() => parseJsonObject('{oops')).toThrow('Not valid JSON.');
  });
});

describe('generateMcpConfig', () => {
  it('points the client at lineage serve for the project', () => {
    expect(generateMcpConfig('/srv/warehouse')).toEqual({
      mcpServers: {
        lineage: { command: 'lineage', args: ['serve', '--cwd', path.resolve('/srv/warehouse')] },
      },
    });
  });
});

describe('lineage CLI', () => {
  let tmpDir: string;
  let stdout: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lineage-cli-'));
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<unknown> {
    stdout.mockClear();
    await createCli().parseAsync(['--json', '--quiet', '--cwd', tmpDir, ...args], { from: 'user' });
    const written = stdout.mock.calls.map((call) => String(call[0])).join('');
    return JSON.parse(written);
  }

  it('registers every command', () => {
    expect(createCli().commands.map((c) => c.name())).toEqual([
      'init',
      'seed',
      'node',
      'edge',
      'column',
      'run',
      'graph',
      'status',
      'serve',
      'version',
    ]);
  });

  it('initializes, records and queries lineage', async () => {
    expect(await run('init')).toMatchObject({ created: true, seeded: null });

    const source = await run(
      'node', 'add', '--type', 'source_table', '--name', 'orders',
      '--qualified-name', 'postgres://shop.public.orders',
    );
    const target = await run('node', 'add', '--type', 'view', '--name', 'orders_daily');
    expect(source).toMatchObject({ name: 'orders', type: 'source_table' });

    await run('edge', 'add', 'postgres://shop.public.orders', idOf(target), '--type', 'derive');

    const graph = await run(
      'graph', 'postgres://shop.public.orders', '--direction', 'downstream', '--depth', '2',
    );
    expect(graph).toMatchObject({
      query: { direction: 'downstream', depth: 2 },
      node_count: 2,
      edge_count: 1,
      nodes: [
        { name: 'orders', depth: 0 },
        { name: 'orders_daily', depth: 1 },
      ],
    });

    const governance = await run(
      'graph', 'postgres://shop.public.orders', '--direction', 'downstream',
      '--category', 'governance',
    );
    expect(governance).toMatchObject({
      query: { edge_types: ['owns', 'stewards', 'has_policy', 'governed_by'] },
      node_count: 1,
      edge_count: 0,
    });

    const dataFlow = await run(
      'graph', 'postgres://shop.public.orders', '--direction', 'downstream',
      '--category', 'data_flow', '--edge-type', 'derive',
    );
    expect(dataFlow).toMatchObject({
      query: { edge_types: ['derive', 'read', 'write', 'transform', 'copy'] },
      edge_count: 1,
    });

    expect(await run('status')).toMatchObject({ total_nodes: 2, total_edges: 1, active_edges: 1 });
  });

  it('seeds the example lineage on init', async () => {
    expect(await run('init', '--seed')).toMatchObject({
      created: true,
      seeded: { nodes_created: 7, edges_created: 7 },
    });

    const graph = await run('graph', 'mysql://wms.raw.shipments', '--direction', 'downstream');
    expect(graph).toMatchObject({ node_count: 4 });
  });
});
