/**
 * Database Pragmas: Connection-level reliability settings
 */
import type Database from "better-sqlite3";

export function applyReliabilityPragmas(db: Database.Database): void {
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  if (!db.memory) {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
}
