import Database from 'better-sqlite3';
import { ConflictError, DatabaseError, LineageError, toError } from '../shared/errors.js';
import type { GraphStore } from '../core/graph/graph-store.js';
import { StatementCache } from './statement-cache.js';
import { runMigrations } from './migrations/index.js';
import {
  createNodeRepository,
  type NodeRepository,
} from './repositories/node-repository.js';
import {
  createEdgeRepository,
  type EdgeRepository,
} from './repositories/edge-repository.js';
import {
  createColumnLineageRepository,
  type ColumnLineageRepository,
} from './repositories/column-lineage-repository.js';
import {
  createRunRepository,
  type RunRepository,
} from './repositories/run-repository.js';
import { createGraphStoreService } from './services/graph-store-service.js';

export interface DatabaseManagerOptions {
  dbPath: string;
  readonly?: boolean;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private statementCache: StatementCache | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;

  // Repositories (lazy-initialized)
  private _nodeRepo: NodeRepository | null = null;
  private _edgeRepo: EdgeRepository | null = null;
  private _columnRepo: ColumnLineageRepository | null = null;
  private _runRepo: RunRepository | null = null;
  private _graphStore: GraphStore | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
  }

  /**
   * Open the connection, apply pragmas and run pending migrations.
   */
  initialize(): void {
    try {
      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
      });

      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('cache_size = -64000');
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');

      if (!this.readonlyMode) {
        runMigrations(this.db);
      }

      this.statementCache = new StatementCache(this.db);
    } catch (err) {
      throw new DatabaseError(
        `Failed to initialize database at ${this.dbPath}`,
        toError(err),
      );
    }
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  getStatementCache(): StatementCache {
    if (!this.statementCache) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.statementCache;
  }

  // --- Repository accessors ---

  get nodes(): NodeRepository {
    if (!this._nodeRepo) {
      this._nodeRepo = createNodeRepository(this.getStatementCache());
    }
    return this._nodeRepo;
  }

  get edges(): EdgeRepository {
    if (!this._edgeRepo) {
      this._edgeRepo = createEdgeRepository(this.getStatementCache());
    }
    return this._edgeRepo;
  }

  get columns(): ColumnLineageRepository {
    if (!this._columnRepo) {
      this._columnRepo = createColumnLineageRepository(this.getStatementCache());
    }
    return this._columnRepo;
  }

  get runs(): RunRepository {
    if (!this._runRepo) {
      this._runRepo = createRunRepository(this.getStatementCache());
    }
    return this._runRepo;
  }

  get graphStore(): GraphStore {
    if (!this._graphStore) {
      this._graphStore = createGraphStoreService(this.getStatementCache());
    }
    return this._graphStore;
  }

  /**
   * Run `fn` in one IMMEDIATE transaction. Constraint violations surface as
   * ConflictError, other SQLite failures as DatabaseError.
   */
  transaction<T>(operation: string, fn: () => T): T {
    const cache = this.getStatementCache();
    try {
      return cache.immediate(fn);
    } catch (err) {
      if (err instanceof LineageError) throw err;
      if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
        throw new ConflictError(`Cannot ${operation}: ${err.message}`, err);
      }
      throw new DatabaseError(`Failed to ${operation}`, toError(err));
    }
  }

  /**
   * Checkpoint the WAL and close the connection. Safe to call twice.
   */
  close(): void {
    if (!this.db) return;

    try {
      this._nodeRepo = null;
      this._edgeRepo = null;
      this._columnRepo = null;
      this._runRepo = null;
      this._graphStore = null;

      if (this.statementCache) {
        this.statementCache.clear();
        this.statementCache = null;
      }

      if (!this.readonlyMode) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new DatabaseError('Failed to close database', toError(err));
    }
  }
}
