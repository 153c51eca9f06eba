/**
 * Local Database Adapter
 *
 * Wraps better-sqlite3 with a Promise-based async interface.
 * Since better-sqlite3 is synchronous, operations resolve immediately
 * while keeping the adapter contract async.
 */

import type Database from "better-sqlite3";
import type { DatabaseAdapter, QueryResult, SqlParam } from "../adapter";

export class LocalAdapter implements DatabaseAdapter {
  constructor(private db: Database.Database) {}

  async get<T>(sql: string, params?: SqlParam[]): Promise<T | null> {
    const result = this.db.prepare<SqlParam[], T>(sql).get(...(params || []));
    return result ?? null;
  }

  async all<T>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.db.prepare<SqlParam[], T>(sql).all(...(params || []));
  }

  async run(sql: string, params?: SqlParam[]): Promise<QueryResult> {
    const result = this.db.prepare<SqlParam[]>(sql).run(...(params || []));
    return {
      lastInsertRowid: result.lastInsertRowid,
      changes: result.changes,
    };
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec("BEGIN");
    try {
      const result = await fn();
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  close(): void {
    this.db.close();
  }

  raw(): Database.Database {
    return this.db;
  }
}
