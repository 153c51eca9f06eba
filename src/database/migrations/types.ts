/**
 * Migration System Types
 */
import type Database from "better-sqlite3";

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
  validate?: (db: Database.Database) => boolean;
}

export interface MigrationResult {
  version: number;
  name: string;
  status: "applied" | "skipped" | "failed";
  duration_ms: number;
}

export interface MigrationState {
  current_version: number;
  latest_version: number;
  pending_count: number;
  applied: MigrationResult[];
}

export interface TableCheck {
  name: string;
  exists: boolean;
  missingColumns: string[];
  unexpectedColumns: string[];
}

export interface IntegrityCheck {
  valid: boolean;
  version: number;
  issues: string[];
  tables: TableCheck[];
}
