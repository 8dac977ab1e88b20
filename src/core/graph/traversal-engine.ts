/**
 * TraversalEngine - temporal lineage traversal over a GraphStore.
 *
 * Validates the query before touching the store, resolves the seed, walks
 * upstream and/or downstream, then hydrates the result. Cancellation is
 * checked once per depth level.
 */

import type { LineageConfig } from '../../config/types.js';
import {
  InvalidArgumentError,
  LineageError,
  NodeNotFoundError,
  StoreUnavailableError,
  TraversalAbortedError,
  toError,
} from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import type {
  EdgeType,
  LineageGraphResponse,
  LineageQuery,
  LineageQueryInput,
  QueryDirection,
  TraversalDirection,
} from '../../shared/types.js';
import { QUERY_DIRECTIONS } from '../../shared/types.js';
import { isEdgeType } from '../../shared/categories.js';
import type { GraphStore } from './graph-store.js';
import { parseAsOf } from './temporal.js';
import { expand, type TraversalResult } from './traversal.js';
import { mergeTraversals } from './bidirectional.js';
import { assembleGraph } from './assembler.js';

export type TraversalLimits = LineageConfig['traversal'];

export interface TraversalEngineOptions {
  limits: TraversalLimits;
  /** Clock used when a query has no as_of */
  now?: () => Date;
}

export interface TraverseOptions {
  signal?: AbortSignal;
}

interface NormalizedQuery {
  seed: string;
  direction: QueryDirection;
  depth: number;
  asOf: Date;
  edgeTypes: EdgeType[] | null;
  includeDeleted: boolean;
}

function isDirection(value: string): value is QueryDirection {
  return QUERY_DIRECTIONS.some((d) => d === value);
}

/** Wrap every store failure that is not already a LineageError */
function guardStore(store: GraphStore): GraphStore {
  async function guarded<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof LineageError) throw err;
      throw new StoreUnavailableError(operation, toError(err));
    }
  }

  return {
    edgesIncident: (nodeIds, direction) =>
      guarded('edgesIncident', () => store.edgesIncident(nodeIds, direction)),
    nodesById: (nodeIds, includeDeleted) =>
      guarded('nodesById', () => store.nodesById(nodeIds, includeDeleted)),
    resolveNode: (idOrQualifiedName, includeDeleted) =>
      guarded('resolveNode', () => store.resolveNode(idOrQualifiedName, includeDeleted)),
  };
}

export class TraversalEngine {
  private readonly store: GraphStore;
  private readonly limits: TraversalLimits;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(store: GraphStore, options: TraversalEngineOptions) {
    this.store = guardStore(store);
    this.limits = options.limits;
    this.now = options.now ?? (() => new Date());
    this.logger = createLogger('Traversal');
  }

  async traverse(
    input: LineageQueryInput,
    options: TraverseOptions = {},
  ): Promise<LineageGraphResponse> {
    const normalized = this.normalize(input);
    const started = Date.now();

    const seed = await this.store.resolveNode(normalized.seed, normalized.includeDeleted);
    if (!seed || (seed.deleted_at !== null && !normalized.includeDeleted)) {
      throw new NodeNotFoundError(normalized.seed);
    }

    const query: LineageQuery = {
      seed_id: seed.id,
      direction: normalized.direction,
      depth: normalized.depth,
      as_of: normalized.asOf.toISOString(),
      edge_types: normalized.edgeTypes,
      include_deleted: normalized.includeDeleted,
    };

    const deadline = this.limits.timeout_ms > 0 ? started + this.limits.timeout_ms : null;
    const checkpoint = (depth: number): void => {
      if (options.signal?.aborted) {
        throw new TraversalAbortedError('signal', depth);
      }
      if (deadline !== null && Date.now() > deadline) {
        throw new TraversalAbortedError('deadline', depth);
      }
    };

    const walk = (direction: TraversalDirection): Promise<TraversalResult> =>
      expand(this.store, seed.id, direction, {
        maxDepth: normalized.depth,
        asOf: normalized.asOf.getTime(),
        edgeTypes: normalized.edgeTypes ? new Set(normalized.edgeTypes) : null,
        checkpoint,
      });

    let raw: TraversalResult;
    if (normalized.direction === 'both') {
      const [upstream, downstream] = await Promise.all([walk('upstream'), walk('downstream')]);
      raw = mergeTraversals(upstream, downstream);
    } else {
      raw = await walk(normalized.direction);
    }

    const response = await assembleGraph(this.store, query, raw);

    const elapsed = Date.now() - started;
    this.logger.debug(
      `${query.direction} from ${query.seed_id} depth=${query.depth} as_of=${query.as_of}: ` +
        `${response.node_count} nodes, ${response.edge_count} edges in ${elapsed}ms`,
    );
    if (elapsed > this.limits.slow_query_ms) {
      this.logger.warn(`Slow traversal from ${query.seed_id} (${elapsed}ms)`);
    }

    return response;
  }

  private normalize(input: LineageQueryInput): NormalizedQuery {
    const seed = typeof input.seed === 'string' ? input.seed.trim() : '';
    if (seed === '') {
      throw new InvalidArgumentError('A seed node id or qualified name is required');
    }

    const direction = input.direction ?? this.limits.default_direction;
    if (!isDirection(direction)) {
      throw new InvalidArgumentError(
        `Invalid direction: ${String(direction)}. Expected one of ${QUERY_DIRECTIONS.join(', ')}`,
      );
    }

    const depth = input.depth ?? this.limits.default_depth;
    if (!Number.isInteger(depth) || depth < 1 || depth > this.limits.max_depth) {
      throw new InvalidArgumentError(
        `Invalid depth: ${depth}. Expected an integer between 1 and ${this.limits.max_depth}`,
      );
    }

    const asOf = parseAsOf(input.as_of, this.now);

    let edgeTypes: EdgeType[] | null = null;
    if (input.edge_types && input.edge_types.length > 0) {
      const unknown = input.edge_types.filter((t) => !isEdgeType(t));
      if (unknown.length > 0) {
        throw new InvalidArgumentError(`Unknown edge type(s): ${unknown.join(', ')}`);
      }
      edgeTypes = [...new Set(input.edge_types)];
    }

    return {
      seed,
      direction,
      depth,
      asOf,
      edgeTypes,
      includeDeleted: input.include_deleted ?? false,
    };
  }
}
