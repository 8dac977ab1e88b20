/**
 * Example lineage seed
 * Loads a JSON fixture of nodes, edges, column mappings and runs. Edges and
 * runs are dated relative to the moment of seeding.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type {
  ColumnLineage,
  LineageEdge,
  LineageNode,
  LineageRun,
  SeedResult,
} from '../../shared/types.js';
import {
  columnLineageSchema,
  createNodeSchema,
  edgeTypeSchema,
  jsonObjectSchema,
  runStatusSchema,
  type ColumnLineageInput,
  type CreateEdgeInput,
  type CreateNodeInput,
  type CreateRunInput,
  type UpdateRunInput,
} from '../../shared/schemas.js';
import { InvalidArgumentError, toError } from '../../shared/errors.js';

export const DEFAULT_FIXTURE_PATH = fileURLToPath(
  new URL('../../../fixtures/example-lineage.json', import.meta.url),
);

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

const seedFixtureSchema = z.object({
  nodes: z.array(createNodeSchema.extend({ key: z.string().min(1) })),
  edges: z
    .array(
      z.object({
        source: z.string().min(1),
        target: z.string().min(1),
        edge_type: edgeTypeSchema,
        metadata: jsonObjectSchema.optional(),
        days_ago: z.number().min(0),
        columns: z.array(columnLineageSchema).optional(),
      }),
    )
    .default([]),
  runs: z
    .array(
      z.object({
        node: z.string().min(1).optional(),
        run_id: z.string().min(1),
        pipeline_name: z.string().min(1),
        status: runStatusSchema,
        hours_ago: z.number().min(0),
        duration_minutes: z.number().min(0).optional(),
        git_sha: z.string().optional(),
        git_branch: z.string().optional(),
        environment: z.string().optional(),
        parameters: jsonObjectSchema.optional(),
        triggered_by: z.string().optional(),
        executor: z.string().optional(),
        metrics: jsonObjectSchema.optional(),
        error_message: z.string().optional(),
      }),
    )
    .default([]),
});

export type SeedFixture = z.output<typeof seedFixtureSchema>;

/** The engine operations a seed needs */
export interface SeedWriter {
  createNode(input: CreateNodeInput): LineageNode;
  createEdge(input: CreateEdgeInput): { edge: LineageEdge };
  addColumnLineage(edgeId: string, input: ColumnLineageInput): ColumnLineage;
  createRun(input: CreateRunInput): LineageRun;
  updateRun(runId: string, patch: UpdateRunInput): LineageRun;
}

export function parseSeedFixture(raw: unknown, source: string): SeedFixture {
  const parsed = seedFixtureSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new InvalidArgumentError(
      `Invalid seed fixture ${source}${where ? ` at ${where}` : ''}: ${issue?.message ?? 'validation failed'}`,
    );
  }
  return parsed.data;
}

export function loadSeedFixture(filePath: string = DEFAULT_FIXTURE_PATH): SeedFixture {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new InvalidArgumentError(
      `Cannot read seed fixture ${filePath}: ${toError(err).message}`,
    );
  }
  return parseSeedFixture(raw, filePath);
}

export function applySeed(writer: SeedWriter, fixture: SeedFixture, now: Date): SeedResult {
  const nodeIds = new Map<string, string>();
  const lookup = (key: string, where: string): string => {
    const id = nodeIds.get(key);
    if (id === undefined) {
      throw new InvalidArgumentError(`Seed ${where} references unknown node key: ${key}`);
    }
    return id;
  };

  for (const { key, ...node } of fixture.nodes) {
    if (nodeIds.has(key)) {
      throw new InvalidArgumentError(`Duplicate seed node key: ${key}`);
    }
    nodeIds.set(key, writer.createNode(node).id);
  }

  let edgesCreated = 0;
  let columnsCreated = 0;
  for (const entry of fixture.edges) {
    const { edge } = writer.createEdge({
      source: lookup(entry.source, 'edge'),
      target: lookup(entry.target, 'edge'),
      edge_type: entry.edge_type,
      metadata: entry.metadata,
      valid_from: new Date(now.getTime() - entry.days_ago * DAY_MS).toISOString(),
      created_by: 'seed',
    });
    edgesCreated++;

    for (const column of entry.columns ?? []) {
      writer.addColumnLineage(edge.id, column);
      columnsCreated++;
    }
  }

  for (const entry of fixture.runs) {
    const startedAt = now.getTime() - entry.hours_ago * HOUR_MS;
    const terminal = entry.status === 'success' || entry.status === 'failed';

    writer.createRun({
      run_id: entry.run_id,
      pipeline_name: entry.pipeline_name,
      node: entry.node !== undefined ? lookup(entry.node, 'run') : undefined,
      status: entry.status === 'created' ? 'created' : 'running',
      started_at: new Date(startedAt).toISOString(),
      git_sha: entry.git_sha,
      git_branch: entry.git_branch,
      environment: entry.environment,
      parameters: entry.parameters,
      triggered_by: entry.triggered_by,
      executor: entry.executor,
    });

    if (terminal) {
      writer.updateRun(entry.run_id, {
        status: entry.status,
        completed_at: new Date(startedAt + (entry.duration_minutes ?? 0) * MINUTE_MS).toISOString(),
        metrics: entry.metrics,
        error_message: entry.error_message,
      });
    }
  }

  return {
    nodes_created: nodeIds.size,
    edges_created: edgesCreated,
    column_mappings_created: columnsCreated,
    runs_created: fixture.runs.length,
  };
}
