import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';

/**
 * Prepared statement cache keyed by a stable name.
 * Repositories look statements up by key so each SQL string is compiled once
 * per connection.
 */
export class StatementCache {
  private readonly cache = new Map<string, Statement>();

  constructor(private readonly db: Database.Database) {}

  get(key: string, sql: string): Statement {
    let stmt = this.cache.get(key);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.cache.set(key, stmt);
    }
    return stmt;
  }

  /**
   * Run `fn` inside a single IMMEDIATE transaction so that a read followed by
   * a write cannot interleave with another writer on the same database.
   */
  immediate<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  /** Drop every cached statement. Call before closing the connection. */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
