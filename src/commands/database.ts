/**
 * Database commands
 * Handles: init, check
 */

import { existsSync } from "node:fs";
import type Database from "better-sqlite3";
import { createEmptyDatabase, MEMORY_DB, openDatabase } from "../database/connection";
import { checkIntegrity, getLatestVersion, type IntegrityCheck } from "../database/migrations";
import { invalidArgumentError } from "../utils/errors";
import { outputSuccess } from "../utils/format";
import { parseInitArgs } from "../utils/validation";

/**
 * Create the ledger database. An existing file is kept unless --force.
 */
export function initDatabase(dbPath: string, args: string[]): void {
  const input = parseInitArgs(args);

  if (dbPath === MEMORY_DB) {
    throw invalidArgumentError("init needs a database file path, not :memory:");
  }

  if (existsSync(dbPath) && !input.force) {
    openDatabase(dbPath).close();
    console.error(`✅ Database already exists at ${dbPath} (schema up to date)`);
    outputSuccess({ dbPath, created: false });
    return;
  }

  createEmptyDatabase(dbPath);
  console.error(`✅ Created empty database at ${dbPath}`);
  outputSuccess({ dbPath, created: true });
}

/**
 * Print the integrity report. Returns false when issues were found.
 */
export function checkDatabase(db: Database.Database): boolean {
  const integrity: IntegrityCheck = checkIntegrity(db);
  console.error(`\n🔍 Database Integrity Check\n`);
  console.error(`Version: ${integrity.version}/${getLatestVersion()}`);
  console.error(`Status: ${integrity.valid ? "✅ Valid" : "❌ Issues Found"}\n`);

  if (integrity.issues.length > 0) {
    console.error("Issues:");
    for (const issue of integrity.issues) {
      console.error(`  ⚠️  ${issue}`);
    }
    console.error("");
  }

  outputSuccess({ ...integrity });
  return integrity.valid;
}
