/**
 * Database Adapter Interface
 *
 * Unified async interface over the SQL store so query code does not depend
 * on the driver. Row types are supplied by the caller.
 */

export type SqlParam = string | number | bigint | Buffer | null;

export interface QueryResult {
  lastInsertRowid: bigint | number;
  changes: number;
}

export interface DatabaseAdapter {
  /**
   * Get a single row from a query
   */
  get<T>(sql: string, params?: SqlParam[]): Promise<T | null>;

  /**
   * Get all rows from a query
   */
  all<T>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /**
   * Execute a single statement (INSERT, UPDATE, DELETE)
   * Returns last insert ID and affected row count
   */
  run(sql: string, params?: SqlParam[]): Promise<QueryResult>;

  /**
   * Run `fn` inside a transaction; commit when it resolves, roll back when
   * it rejects. Callers must not interleave other work on the same adapter.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Close the database connection
   */
  close(): void;
}
