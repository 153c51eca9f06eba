/**
 * Database connection management
 *
 * Opens the ledger database, applies pragmas and pending migrations.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "../lib/logger";
import { ContextError, errorMessage, unwrap } from "../utils/errors";
import { LocalAdapter } from "./adapters/local";
import { applyReliabilityPragmas, checkIntegrity, runMigrations } from "./migrations";

const log = createLogger("database");

export const MEMORY_DB = ":memory:";

/**
 * Open (creating if needed) a database at `path` with the schema migrated
 * to the latest version.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(path);
  } catch (error) {
    throw new ContextError(`Could not open database: ${errorMessage(error)}`, "DB_CONNECTION_ERROR", { path });
  }

  try {
    applyReliabilityPragmas(db);
    const state = unwrap(runMigrations(db, path));
    if (state.applied.length > 0) {
      log.info("Database schema migrated", { path, version: state.current_version });
    }
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

export interface OpenLedgerOptions {
  /** Refuse a database that fails the integrity check (default true) */
  verify?: boolean;
}

export function openLedger(path: string, options: OpenLedgerOptions = {}): LocalAdapter {
  const db = openDatabase(path);
  if (options.verify ?? true) {
    const integrity = checkIntegrity(db);
    if (!integrity.valid) {
      db.close();
      throw new ContextError("Database failed its integrity check; run `relay-ledger check`", "DB_CONNECTION_ERROR", {
        path,
        issues: integrity.issues,
      });
    }
  }
  return new LocalAdapter(db);
}

/**
 * Replace whatever is at `path` with a fresh, empty database.
 */
export function createEmptyDatabase(path: string): void {
  for (const file of [path, `${path}-wal`, `${path}-shm`]) {
    if (existsSync(file)) rmSync(file);
  }
  openDatabase(path).close();
  log.info("Created empty database", { path });
}
