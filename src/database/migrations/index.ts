/**
 * Database Migration System: Barrel Export
 */
export type { Migration, MigrationResult, MigrationState, IntegrityCheck, TableCheck } from "./types";
export { getSchemaVersion, getLatestVersion, runMigrations } from "./runner";
export { checkIntegrity } from "./integrity";
export { applyReliabilityPragmas } from "./pragmas";
