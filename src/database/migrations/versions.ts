/**
 * Schema versions, applied in order by the runner
 */
import type Database from "better-sqlite3";
import type { Migration } from "./types";

function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`)
    .get(table);
  return row !== undefined;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: "initial_schema",
    description: "Servers with their stat and user-test series",
    up: `
      CREATE TABLE IF NOT EXISTS _migration_history (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        duration_ms INTEGER,
        applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS servers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        ip TEXT,
        country_code TEXT NOT NULL,
        country_name TEXT NOT NULL,
        log_type TEXT,
        operator_name TEXT,
        operator_message TEXT,
        config_blob TEXT
      );

      CREATE TABLE IF NOT EXISTS server_stats (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        server_id INTEGER NOT NULL REFERENCES servers(id) ON DELETE CASCADE,
        saved_at TEXT NOT NULL,
        score INTEGER,
        ping_ms INTEGER,
        speed_bps INTEGER,
        num_sessions INTEGER,
        uptime_ms INTEGER,
        total_users INTEGER,
        total_traffic_bytes INTEGER,
        UNIQUE (server_id, saved_at)
      );

      CREATE TABLE IF NOT EXISTS user_tests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        server_id INTEGER NOT NULL REFERENCES servers(id) ON DELETE CASCADE,
        saved_at TEXT NOT NULL,
        ping_ms INTEGER,
        speed_bps INTEGER,
        UNIQUE (server_id, saved_at)
      );
    `,
    validate: (db) => ["servers", "server_stats", "user_tests"].every((table) => tableExists(db, table)),
  },
  {
    version: 2,
    name: "server_country_index",
    description: "Index servers by country for listing",
    up: `CREATE INDEX IF NOT EXISTS idx_servers_country ON servers(country_code);`,
  },
];
