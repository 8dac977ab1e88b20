/**
 * LineageEngine - Core Layer facade
 *
 * Interface Layer (CLI / MCP) accesses all functionality through this facade only.
 * Owns configuration, the database and the traversal engine.
 */

import * as fs from 'node:fs';
import { v7 as uuidv7 } from 'uuid';

import type { LineageConfig } from '../config/types.js';
import {
  loadConfig,
  saveConfig,
  configExists as configExistsOnDisk,
  cleanConfig as cleanConfigOnDisk,
  resolveDbPath,
  resolveLineageDir,
} from '../config/config.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type {
  ColumnLineage,
  ColumnLineageOutput,
  CreateEdgeResult,
  InitResult,
  LineageEdge,
  LineageGraphResponse,
  LineageNode,
  LineageQueryInput,
  LineageRun,
  ListNodesInput,
  ListNodesOutput,
  RunStatus,
  SeedResult,
  StatusOutput,
} from '../shared/types.js';
import {
  ConflictError,
  EdgeNotFoundError,
  EngineNotInitializedError,
  InvalidArgumentError,
  NodeNotFoundError,
  RunNotFoundError,
} from '../shared/errors.js';
import {
  columnLineageSchema,
  createEdgeSchema,
  createNodeSchema,
  createRunSchema,
  listNodesSchema,
  parseInput,
  timestampSchema,
  updateNodeSchema,
  updateRunSchema,
  type ColumnLineageInput,
  type CreateEdgeInput,
  type CreateNodeInput,
  type CreateRunInput,
  type UpdateNodeInput,
  type UpdateRunInput,
} from '../shared/schemas.js';
import { DatabaseManager } from '../data/database-manager.js';
import type {
  ColumnLineageRow,
  EdgeInsert,
  NodeInsert,
  NodeRow,
  NodeUpdate,
  RunRow,
  RunUpdate,
} from '../data/types.js';
import {
  rowToColumnLineage,
  rowToEdge,
  rowToNode,
  rowToRun,
  stringifyJsonObject,
  toRunStatus,
} from '../data/mappers.js';
import { TraversalEngine, type TraverseOptions } from './graph/traversal-engine.js';
import { applySeed, loadSeedFixture } from './seed/example-seed.js';
import {
  configureLogger,
  createLogger,
  closeLogger,
  type Logger,
  type LogLevel,
} from '../shared/logger.js';

/** Status moves a run may make; success and failed are terminal */
const RUN_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  created: ['running', 'success', 'failed'],
  running: ['success', 'failed'],
  success: [],
  failed: [],
};

export interface LineageEngineOptions {
  /** Clock for timestamps and as-of defaults */
  now?: () => Date;
  /** Overrides log.level from the config file */
  logLevel?: LogLevel;
}

export interface InitializeOptions {
  /** Drop an existing .lineage directory and start over */
  force?: boolean;
}

export interface CreateEdgeOptions {
  /** Close the currently active edge with the same key instead of failing */
  supersede?: boolean;
}

export type DirectionalQuery = Omit<LineageQueryInput, 'seed' | 'direction'>;

interface EngineState {
  config: LineageConfig;
  db: DatabaseManager;
  traversal: TraversalEngine;
}

export class LineageEngine {
  private state: EngineState | null = null;
  private readonly cwd: string;
  private readonly now: () => Date;
  private readonly logLevel: LogLevel | undefined;
  private readonly logger: Logger;

  constructor(cwd: string, options: LineageEngineOptions = {}) {
    this.cwd = cwd;
    this.now = options.now ?? (() => new Date());
    this.logLevel = options.logLevel;
    this.logger = createLogger('LineageEngine');
  }

  // --- Lifecycle ---

  initialize(options: InitializeOptions = {}): InitResult {
    const exists = configExistsOnDisk(this.cwd);
    const result = {
      lineage_dir: resolveLineageDir(this.cwd),
      db_path: resolveDbPath(this.cwd),
    };

    if (exists && !options.force) {
      this.loadExisting();
      return { ...result, created: false };
    }

    if (exists) {
      this.close();
      cleanConfigOnDisk(this.cwd);
    }

    this.logger.info(`Initializing lineage store in ${this.cwd}`);
    saveConfig(this.cwd, DEFAULT_CONFIG);
    this.open(DEFAULT_CONFIG);
    return { ...result, created: true };
  }

  /**
   * Load an existing project (for use by createLineageEngine).
   */
  loadExisting(): void {
    this.open(loadConfig(this.cwd));
  }

  configExists(): boolean {
    return configExistsOnDisk(this.cwd);
  }

  get initialized(): boolean {
    return this.state !== null;
  }

  getConfig(): LineageConfig {
    return this.requireState().config;
  }

  close(): void {
    if (this.state) {
      this.state.db.close();
      this.state = null;
    }
    closeLogger();
  }

  // --- Nodes ---

  createNode(input: CreateNodeInput): LineageNode {
    const { db } = this.requireState();
    const data = parseInput(createNodeSchema, input, 'node');
    const timestamp = this.timestamp();

    const row: NodeInsert = {
      id: uuidv7(),
      type: data.type,
      name: data.name,
      qualified_name: data.qualified_name ?? null,
      description: data.description ?? null,
      documentation_url: data.documentation_url ?? null,
      system: data.system ?? null,
      platform: data.platform ?? null,
      location: data.location ?? null,
      classification: data.classification ?? null,
      tags: stringifyJsonObject(data.tags),
      attributes: stringifyJsonObject(data.attributes),
      created_at: timestamp,
      updated_at: timestamp,
    };

    db.transaction('create node', () => {
      if (row.qualified_name !== null && db.nodes.findByQualifiedName(row.qualified_name)) {
        throw new ConflictError(`Qualified name already in use: ${row.qualified_name}`);
      }
      db.nodes.insert(row);
    });

    return rowToNode({ ...row, deleted_at: null });
  }

  getNode(identifier: string, options: { includeDeleted?: boolean } = {}): LineageNode {
    const { db } = this.requireState();
    return rowToNode(this.resolveNodeRow(db, identifier, options.includeDeleted ?? false));
  }

  updateNode(identifier: string, patch: UpdateNodeInput): LineageNode {
    const { db } = this.requireState();
    const data = parseInput(updateNodeSchema, patch, 'node update');

    const update: NodeUpdate = {
      name: data.name,
      description: data.description,
      documentation_url: data.documentation_url,
      classification: data.classification,
      tags: data.tags !== undefined ? stringifyJsonObject(data.tags) : undefined,
      attributes: data.attributes !== undefined ? stringifyJsonObject(data.attributes) : undefined,
    };

    return db.transaction('update node', () => {
      const row = this.resolveNodeRow(db, identifier, false);
      db.nodes.update(row.id, update, this.timestamp());
      return rowToNode(this.resolveNodeRow(db, row.id, false));
    });
  }

  /** Soft delete; edges and runs referencing the node are kept */
  deleteNode(identifier: string): LineageNode {
    const { db } = this.requireState();
    return db.transaction('delete node', () => {
      const row = this.resolveNodeRow(db, identifier, false);
      const deletedAt = this.timestamp();
      db.nodes.softDelete(row.id, deletedAt);
      return rowToNode({ ...row, deleted_at: deletedAt, updated_at: deletedAt });
    });
  }

  listNodes(input: ListNodesInput = {}): ListNodesOutput {
    const { db } = this.requireState();
    const data = parseInput(listNodesSchema, input, 'node listing');
    const limit = data.limit ?? 100;
    const offset = data.offset ?? 0;

    const rows = db.nodes.findByType(data.type ?? null, {
      limit,
      offset,
      includeDeleted: data.include_deleted ?? false,
    });
    return { nodes: rows.map(rowToNode), limit, offset };
  }

  // --- Edges ---

  /**
   * Create an edge. At most one edge per (source, target, edge_type) may be
   * valid at any instant; the checks and the insert share one IMMEDIATE
   * transaction.
   */
  createEdge(input: CreateEdgeInput, options: CreateEdgeOptions = {}): CreateEdgeResult {
    const { db } = this.requireState();
    const data = parseInput(createEdgeSchema, input, 'edge');
    const validFrom = data.valid_from !== undefined
      ? new Date(data.valid_from).toISOString()
      : this.timestamp();

    return db.transaction('create edge', () => {
      const source = this.resolveNodeRow(db, data.source, false);
      const target = this.resolveNodeRow(db, data.target, false);

      // Versions of one key never overlap: a new version starts no earlier
      // than the latest end of a closed one, future ends included.
      const latestEnd = db.edges.findLatestEnd(source.id, target.id, data.edge_type);
      if (latestEnd !== null && Date.parse(validFrom) < Date.parse(latestEnd)) {
        throw new ConflictError(
          `A ${data.edge_type} edge from ${source.name} to ${target.name} is valid until ${latestEnd}; ` +
            `valid_from ${validFrom} would overlap it`,
        );
      }

      let superseded: LineageEdge | null = null;
      const active = db.edges.findActive(source.id, target.id, data.edge_type);
      if (active) {
        if (!options.supersede) {
          throw new ConflictError(
            `An active ${data.edge_type} edge from ${source.name} to ${target.name} already exists (${active.id})`,
          );
        }
        if (Date.parse(validFrom) <= Date.parse(active.valid_from)) {
          throw new InvalidArgumentError(
            `valid_from ${validFrom} must be later than the superseded edge's valid_from ${active.valid_from}`,
          );
        }
        db.edges.close(active.id, validFrom);
        superseded = rowToEdge({ ...active, valid_to: validFrom });
      }

      const row: EdgeInsert = {
        id: uuidv7(),
        source_id: source.id,
        target_id: target.id,
        edge_type: data.edge_type,
        metadata: stringifyJsonObject(data.metadata),
        valid_from: validFrom,
        valid_to: null,
        created_at: this.timestamp(),
        created_by: data.created_by ?? null,
      };
      db.edges.insert(row);

      this.logger.debug(
        `Edge ${row.id}: ${source.id} -[${row.edge_type}]-> ${target.id} from ${validFrom}` +
          (superseded ? ` (supersedes ${superseded.id})` : ''),
      );
      return { edge: rowToEdge(row), superseded };
    });
  }

  getEdge(id: string): LineageEdge {
    const { db } = this.requireState();
    const row = db.edges.findById(id);
    if (!row) {
      throw new EdgeNotFoundError(id);
    }
    return rowToEdge(row);
  }

  /** Set valid_to on an active edge; defaults to now */
  closeEdge(id: string, validTo?: string): LineageEdge {
    const { db } = this.requireState();
    const closeAt = validTo !== undefined
      ? new Date(parseInput(timestampSchema, validTo, 'valid_to')).toISOString()
      : this.timestamp();

    return db.transaction('close edge', () => {
      const row = db.edges.findById(id);
      if (!row) {
        throw new EdgeNotFoundError(id);
      }
      if (row.valid_to !== null) {
        throw new ConflictError(`Edge ${id} is already closed (valid_to ${row.valid_to})`);
      }
      if (Date.parse(closeAt) <= Date.parse(row.valid_from)) {
        throw new InvalidArgumentError(
          `valid_to ${closeAt} must be later than the edge's valid_from ${row.valid_from}`,
        );
      }
      db.edges.close(id, closeAt);
      return rowToEdge({ ...row, valid_to: closeAt });
    });
  }

  /** Every version of every edge touching the node, oldest first */
  listEdges(identifier: string): LineageEdge[] {
    const { db } = this.requireState();
    const node = this.resolveNodeRow(db, identifier, true);
    return db.edges.findByNodeId(node.id).map(rowToEdge);
  }

  // --- Column lineage ---

  addColumnLineage(edgeId: string, input: ColumnLineageInput): ColumnLineage {
    const { db } = this.requireState();
    const data = parseInput(columnLineageSchema, input, 'column mapping');

    const row: ColumnLineageRow = {
      id: uuidv7(),
      edge_id: edgeId,
      source_column: data.source_column,
      target_column: data.target_column,
      transformation: data.transformation ?? null,
      transformation_type: data.transformation_type ?? null,
      confidence: data.confidence ?? null,
      metadata: stringifyJsonObject(data.metadata),
      created_at: this.timestamp(),
    };

    db.transaction('add column lineage', () => {
      if (!db.edges.findById(edgeId)) {
        throw new EdgeNotFoundError(edgeId);
      }
      if (db.columns.find(edgeId, row.source_column, row.target_column)) {
        throw new ConflictError(
          `Column mapping ${row.source_column} -> ${row.target_column} already exists on edge ${edgeId}`,
        );
      }
      db.columns.insert(row);
    });

    return rowToColumnLineage(row);
  }

  getColumnLineage(edgeId: string): ColumnLineageOutput {
    const { db } = this.requireState();
    const edge = db.edges.findById(edgeId);
    if (!edge) {
      throw new EdgeNotFoundError(edgeId);
    }
    return {
      edge: rowToEdge(edge),
      columns: db.columns.findByEdgeId(edgeId).map(rowToColumnLineage),
    };
  }

  // --- Runs ---

  createRun(input: CreateRunInput): LineageRun {
    const { db, config } = this.requireState();
    const data = parseInput(createRunSchema, input, 'run');
    const timestamp = this.timestamp();

    return db.transaction('create run', () => {
      const node = data.node !== undefined ? this.resolveNodeRow(db, data.node, false) : null;
      if (db.runs.findByRunId(data.run_id)) {
        throw new ConflictError(`Run id already exists: ${data.run_id}`);
      }

      const row: RunRow = {
        id: uuidv7(),
        node_id: node?.id ?? null,
        run_id: data.run_id,
        pipeline_name: data.pipeline_name,
        status: data.status ?? config.runs.default_status,
        started_at: data.started_at !== undefined
          ? new Date(data.started_at).toISOString()
          : timestamp,
        completed_at: null,
        git_sha: data.git_sha ?? null,
        git_branch: data.git_branch ?? null,
        environment: data.environment ?? null,
        parameters: stringifyJsonObject(data.parameters),
        triggered_by: data.triggered_by ?? null,
        executor: data.executor ?? null,
        metrics: '{}',
        error_message: null,
        created_at: timestamp,
      };
      db.runs.insert(row);
      return rowToRun(row);
    });
  }

  getRun(runId: string): LineageRun {
    const { db } = this.requireState();
    const row = db.runs.findByRunId(runId);
    if (!row) {
      throw new RunNotFoundError(runId);
    }
    return rowToRun(row);
  }

  /**
   * Update a run. Status follows created -> running -> success | failed;
   * reaching a terminal status stamps completed_at unless one is given.
   */
  updateRun(runId: string, patch: UpdateRunInput): LineageRun {
    const { db } = this.requireState();
    const data = parseInput(updateRunSchema, patch, 'run update');

    return db.transaction('update run', () => {
      const row = db.runs.findByRunId(runId);
      if (!row) {
        throw new RunNotFoundError(runId);
      }

      const current = toRunStatus(row.status);
      const update: RunUpdate = {
        metrics: data.metrics !== undefined ? stringifyJsonObject(data.metrics) : undefined,
        error_message: data.error_message,
        completed_at: data.completed_at !== undefined
          ? new Date(data.completed_at).toISOString()
          : undefined,
      };

      if (data.status !== undefined && data.status !== current) {
        if (!RUN_TRANSITIONS[current].includes(data.status)) {
          throw new ConflictError(`Run ${runId} cannot move from ${current} to ${data.status}`);
        }
        update.status = data.status;
        if (RUN_TRANSITIONS[data.status].length === 0 && update.completed_at === undefined) {
          update.completed_at = this.timestamp();
        }
      }

      db.runs.update(runId, update);
      const updated = db.runs.findByRunId(runId);
      if (!updated) {
        throw new RunNotFoundError(runId);
      }
      return rowToRun(updated);
    });
  }

  listRuns(identifier: string): LineageRun[] {
    const { db } = this.requireState();
    const node = this.resolveNodeRow(db, identifier, true);
    return db.runs.findByNodeId(node.id).map(rowToRun);
  }

  // --- Traversal ---

  async traverse(query: LineageQueryInput, options: TraverseOptions = {}): Promise<LineageGraphResponse> {
    return this.requireState().traversal.traverse(query, options);
  }

  async getUpstream(
    seed: string,
    query: DirectionalQuery = {},
    options: TraverseOptions = {},
  ): Promise<LineageGraphResponse> {
    return this.traverse({ ...query, seed, direction: 'upstream' }, options);
  }

  async getDownstream(
    seed: string,
    query: DirectionalQuery = {},
    options: TraverseOptions = {},
  ): Promise<LineageGraphResponse> {
    return this.traverse({ ...query, seed, direction: 'downstream' }, options);
  }

  async getBidirectional(
    seed: string,
    query: DirectionalQuery = {},
    options: TraverseOptions = {},
  ): Promise<LineageGraphResponse> {
    return this.traverse({ ...query, seed, direction: 'both' }, options);
  }

  // --- Status / seed ---

  getStatus(): StatusOutput {
    const { db } = this.requireState();
    const nodes = db.nodes.count();
    const edges = db.edges.count();

    const dbPath = resolveDbPath(this.cwd);
    const dbSizeBytes = fs.existsSync(dbPath) ? fs.statSync(dbPath).size : 0;

    return {
      initialized: true,
      total_nodes: nodes.total,
      deleted_nodes: nodes.deleted,
      total_edges: edges.total,
      active_edges: edges.active,
      column_mappings: db.columns.count(),
      total_runs: db.runs.count(),
      db_size_bytes: dbSizeBytes,
    };
  }

  /** Load the example fixture in one transaction; all or nothing */
  seedExample(fixturePath?: string): SeedResult {
    const { db } = this.requireState();
    const fixture = loadSeedFixture(fixturePath);
    const result = db.transaction('seed example lineage', () =>
      applySeed(this, fixture, this.now()),
    );
    this.logger.info(
      `Seeded ${result.nodes_created} nodes, ${result.edges_created} edges, ` +
        `${result.column_mappings_created} column mappings, ${result.runs_created} runs`,
    );
    return result;
  }

  // --- Internal helpers ---

  private open(config: LineageConfig): void {
    this.close();
    configureLogger({ level: this.logLevel ?? config.log.level, file: config.log.file });

    const db = new DatabaseManager({ dbPath: resolveDbPath(this.cwd) });
    db.initialize();

    this.state = {
      config,
      db,
      traversal: new TraversalEngine(db.graphStore, {
        limits: config.traversal,
        now: this.now,
      }),
    };
  }

  /** Id first, then qualified name (mirrors GraphStore.resolveNode) */
  private resolveNodeRow(db: DatabaseManager, identifier: string, includeDeleted: boolean): NodeRow {
    const row = db.nodes.findById(identifier, includeDeleted)
      ?? db.nodes.findByQualifiedName(identifier, includeDeleted);
    if (!row) {
      throw new NodeNotFoundError(identifier);
    }
    return row;
  }

  private requireState(): EngineState {
    if (!this.state) {
      throw new EngineNotInitializedError();
    }
    return this.state;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

export function createLineageEngine(cwd: string, options: LineageEngineOptions = {}): LineageEngine {
  const engine = new LineageEngine(cwd, options);
  if (configExistsOnDisk(cwd)) {
    engine.loadExisting();
  }
  return engine;
}
