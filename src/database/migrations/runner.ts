/**
 * Migration Runner: Version management and atomic migration application
 */
import type Database from "better-sqlite3";
import { createLogger } from "../../lib/logger";
import { ContextError, err, errorMessage, ok, type Result } from "../../utils/errors";
import type { Migration, MigrationResult, MigrationState } from "./types";
import { MIGRATIONS } from "./versions";

const log = createLogger("migrations");

export function getSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

export function getLatestVersion(): number {
  return MIGRATIONS.length > 0 ? MIGRATIONS[MIGRATIONS.length - 1].version : 0;
}

function getPendingMigrations(db: Database.Database): Migration[] {
  const currentVersion = getSchemaVersion(db);
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

function applyMigration(db: Database.Database, migration: Migration, dbPath: string): Result<MigrationResult> {
  const startTime = Date.now();

  log.debug("Applying migration", { dbPath, version: migration.version, name: migration.name });

  try {
    db.exec("BEGIN IMMEDIATE");

    try {
      db.exec(migration.up);

      if (migration.validate && !migration.validate(db)) {
        throw new Error(`Migration validation failed for ${migration.name}`);
      }

      setSchemaVersion(db, migration.version);

      db.prepare(`INSERT OR REPLACE INTO _migration_history (version, name, duration_ms) VALUES (?, ?, ?)`).run(
        migration.version,
        migration.name,
        Date.now() - startTime
      );

      db.exec("COMMIT");
    } catch (error) {
      db.exec("ROLLBACK");
      throw error;
    }
  } catch (error) {
    const message = errorMessage(error);
    log.error("Migration failed", { dbPath, version: migration.version, name: migration.name, error: message });

    return err(
      new ContextError(`Migration ${migration.version} (${migration.name}) failed: ${message}`, "DB_QUERY_ERROR", {
        version: migration.version,
        name: migration.name,
      })
    );
  }

  const duration = Date.now() - startTime;
  log.info("Migration applied", { dbPath, version: migration.version, name: migration.name, duration_ms: duration });

  return ok({
    version: migration.version,
    name: migration.name,
    status: "applied",
    duration_ms: duration,
  });
}

export function runMigrations(db: Database.Database, dbPath: string = "unknown"): Result<MigrationState> {
  const currentVersion = getSchemaVersion(db);
  const pending = getPendingMigrations(db);
  const results: MigrationResult[] = [];

  if (pending.length === 0) {
    return ok({
      current_version: currentVersion,
      latest_version: getLatestVersion(),
      pending_count: 0,
      applied: [],
    });
  }

  pending.sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    const result = applyMigration(db, migration, dbPath);

    if (!result.ok) {
      return err(result.error);
    }

    results.push(result.value);
  }

  return ok({
    current_version: getSchemaVersion(db),
    latest_version: getLatestVersion(),
    pending_count: 0,
    applied: results,
  });
}
