/**
 * Sync command
 * Reads or fetches a snapshot, reconciles it with storage and saves the diff
 */

import { existsSync, readFileSync } from "node:fs";
import type { LedgerConfig } from "../config";
import type { PersistenceGateway } from "../database/gateway";
import { fetchSnapshot } from "../feed/fetch";
import { ReconciliationManager, type SaveReport, type SyncReport } from "../sync/manager";
import { fileNotFoundError } from "../utils/errors";
import { formatSyncReport, outputSuccess } from "../utils/format";
import { parseSyncArgs, type SyncInput } from "../utils/validation";

export interface SyncResult {
  sync: SyncReport;
  saved: SaveReport | null;
}

export async function loadSnapshotText(input: SyncInput, config: LedgerConfig): Promise<string> {
  if (input.file) {
    if (!existsSync(input.file)) {
      throw fileNotFoundError(input.file);
    }
    return readFileSync(input.file, "utf-8");
  }
  const url = input.url ?? config.feedUrl;
  console.error(`⬇️  Fetching snapshot from ${url}`);
  return fetchSnapshot(url, { timeoutMs: config.fetchTimeoutMs });
}

/**
 * Reload from storage, fold in the snapshot, then save unless it is a dry run
 */
export async function runSync(
  gateway: PersistenceGateway,
  text: string,
  options: { dryRun: boolean; manager?: ReconciliationManager }
): Promise<SyncResult> {
  const manager = options.manager ?? new ReconciliationManager();
  await manager.resetFromGateway(gateway);

  const sync = manager.syncFromSnapshot(text);
  const saved = options.dryRun ? null : await manager.saveChanges(gateway);
  return { sync, saved };
}

export async function handleSyncCommand(
  gateway: PersistenceGateway,
  config: LedgerConfig,
  args: string[]
): Promise<void> {
  const input = parseSyncArgs(args);
  const text = await loadSnapshotText(input, config);
  const result = await runSync(gateway, text, { dryRun: input.dryRun });

  formatSyncReport(result.sync, result.saved);
  outputSuccess({ ...result });
}
