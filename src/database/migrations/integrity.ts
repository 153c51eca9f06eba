/**
 * Database Integrity Checking
 */
import type Database from "better-sqlite3";
import { errorMessage } from "../../utils/errors";
import { getLatestVersion, getSchemaVersion } from "./runner";
import type { IntegrityCheck, TableCheck } from "./types";

const EXPECTED_COLUMNS: Record<string, string[]> = {
  servers: [
    "id",
    "name",
    "ip",
    "country_code",
    "country_name",
    "log_type",
    "operator_name",
    "operator_message",
    "config_blob",
  ],
  server_stats: [
    "id",
    "server_id",
    "saved_at",
    "score",
    "ping_ms",
    "speed_bps",
    "num_sessions",
    "uptime_ms",
    "total_users",
    "total_traffic_bytes",
  ],
  user_tests: ["id", "server_id", "saved_at", "ping_ms", "speed_bps"],
};

function checkTable(db: Database.Database, table: string, expected: string[]): TableCheck {
  const columns = db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${table}')`)
    .all()
    .map((row) => row.name);
  const actual = new Set(columns);
  return {
    name: table,
    exists: columns.length > 0,
    missingColumns: expected.filter((column) => !actual.has(column)),
    unexpectedColumns: columns.filter((column) => !expected.includes(column)),
  };
}

export function checkIntegrity(db: Database.Database): IntegrityCheck {
  const version = getSchemaVersion(db);
  const issues: string[] = [];
  const tables: TableCheck[] = [];

  try {
    const result: unknown = db.pragma("integrity_check", { simple: true });
    if (result !== "ok") {
      issues.push(`SQLite integrity check failed: ${String(result)}`);
    }
  } catch (error) {
    issues.push(`Failed to run integrity check: ${errorMessage(error)}`);
  }

  for (const [table, expected] of Object.entries(EXPECTED_COLUMNS)) {
    const check = checkTable(db, table, expected);
    tables.push(check);
    if (!check.exists) {
      issues.push(`Missing required table: ${table}`);
      continue;
    }
    if (check.missingColumns.length > 0) {
      issues.push(`Table ${table} is missing columns: ${check.missingColumns.join(", ")}`);
    }
    if (check.unexpectedColumns.length > 0) {
      issues.push(`Table ${table} has unexpected columns: ${check.unexpectedColumns.join(", ")}`);
    }
  }

  const foreignKeys: unknown = db.pragma("foreign_keys", { simple: true });
  if (foreignKeys !== 1) {
    issues.push("Foreign keys are not enabled");
  }

  if (version < getLatestVersion()) {
    issues.push(`Schema version ${version} is behind latest ${getLatestVersion()}`);
  }

  return {
    valid: issues.length === 0,
    version,
    issues,
    tables,
  };
}
