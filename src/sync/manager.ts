/**
 * Reconciliation Manager
 *
 * Holds the authoritative in-memory set of servers, folds snapshots into it
 * and tracks which names must be upserted or deleted on the next save.
 * Not safe for interleaved calls: callers serialise access to one instance.
 */

import type { PersistenceGateway } from "../database/gateway";
import { parseSnapshot } from "../feed/parser";
import { createLogger, type Logger } from "../lib/logger";
import { indexColumns, Server, type UserTest } from "../model";
import {
  type ErrorCode,
  errorMessage,
  invalidArgumentError,
  isContextError,
  schemaMismatchError,
} from "../utils/errors";

export type ManagerState = "empty" | "loaded" | "dirty";

export interface ManagerOptions {
  logger?: Logger;
  /** Timestamp source for stats built from snapshot rows */
  clock?: () => Date;
}

export interface SkippedRow {
  name: string;
  code: ErrorCode;
  message: string;
}

export interface SyncReport {
  savedAt: string;
  rows: number;
  added: string[];
  updated: string[];
  restored: string[];
  removed: string[];
  unchanged: number;
  skipped: SkippedRow[];
}

export interface SaveReport {
  upserted: number;
  deleted: number;
}

export interface PendingChanges {
  upserts: string[];
  deletes: string[];
}

export class ReconciliationManager {
  private readonly servers = new Map<string, Server>();
  private readonly pendingUpsert = new Set<string>();
  private readonly pendingDelete = new Set<string>();
  /** Servers removed since the last save, kept so a reappearing name keeps its ids */
  private readonly tombstones = new Map<string, Server>();
  private loaded = false;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(options: ManagerOptions = {}) {
    this.log = options.logger ?? createLogger("sync");
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): ManagerState {
    if (this.pendingUpsert.size > 0 || this.pendingDelete.size > 0) return "dirty";
    return this.loaded ? "loaded" : "empty";
  }

  get size(): number {
    return this.servers.size;
  }

  getServer(name: string): Server | undefined {
    return this.servers.get(name);
  }

  listServers(): Server[] {
    return [...this.servers.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  pendingChanges(): PendingChanges {
    return {
      upserts: [...this.pendingUpsert].sort(),
      deletes: [...this.pendingDelete].sort(),
    };
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  /**
   * Replaces all in-memory state with a full read from the gateway.
   * A failed read leaves the current state as it was.
   */
  async resetFromGateway(gateway: PersistenceGateway): Promise<number> {
    const servers = await gateway.readAll();

    this.servers.clear();
    this.pendingUpsert.clear();
    this.pendingDelete.clear();
    this.tombstones.clear();

    for (const server of servers) {
      this.servers.set(server.name, server);
    }
    this.loaded = true;

    this.log.info("Loaded servers from storage", { count: servers.length });
    return servers.length;
  }

  // ==========================================================================
  // Snapshot Sync
  // ==========================================================================

  /**
   * Folds one snapshot into the in-memory set.
   *
   * A malformed snapshot or a wrong column set throws before anything is
   * touched. Per-server merge failures are logged and that server is
   * skipped; the rest of the rows still apply.
   */
  syncFromSnapshot(text: string, savedAt: Date = this.clock()): SyncReport {
    const table = parseSnapshot(text);
    this.checkColumns(table.header);

    const columns = indexColumns(table.header);
    const previousNames = new Set(this.servers.keys());
    const freshNames = new Set<string>();
    const report: SyncReport = {
      savedAt: savedAt.toISOString(),
      rows: table.rows.length,
      added: [],
      updated: [],
      restored: [],
      removed: [],
      unchanged: 0,
      skipped: [],
    };

    table.rows.forEach((row, idx) => {
      let incoming: Server;
      try {
        incoming = Server.fromRow(columns, row, savedAt);
      } catch (error) {
        this.recordSkip(report, `row ${idx + 1}`, error);
        return;
      }

      const name = incoming.name;
      freshNames.add(name);

      const existing = this.servers.get(name);
      if (!existing) {
        const tombstone = this.tombstones.get(name);
        if (tombstone) {
          this.restore(tombstone, incoming, report);
        } else {
          this.servers.set(name, incoming);
          this.pendingUpsert.add(name);
          report.added.push(name);
        }
        return;
      }

      try {
        if (existing.mergeFrom(incoming, this.log)) {
          this.pendingUpsert.add(name);
          report.updated.push(name);
        } else {
          report.unchanged++;
        }
      } catch (error) {
        this.recordSkip(report, name, error);
      }
    });

    for (const name of previousNames) {
      if (!freshNames.has(name) && this.markForDeletion(name)) {
        report.removed.push(name);
      }
    }

    this.log.info("Snapshot synced", {
      rows: report.rows,
      added: report.added.length,
      updated: report.updated.length,
      restored: report.restored.length,
      removed: report.removed.length,
      skipped: report.skipped.length,
    });
    return report;
  }

  /**
   * Drops a server from memory and queues its deletion.
   * Returns false when the name is not held.
   */
  markForDeletion(name: string): boolean {
    const server = this.servers.get(name);
    if (!server) {
      this.log.warn("Attempted to delete unknown server", { server: name });
      return false;
    }

    this.servers.delete(name);
    this.tombstones.set(name, server);
    this.pendingUpsert.delete(name);
    this.pendingDelete.add(name);
    this.log.info("Server marked for deletion", { server: name });
    return true;
  }

  /**
   * Adds a user-run probe result to a held server.
   *
   * @throws INVALID_ARGUMENT for an unknown server
   * @throws CONFLICTING_TEST when a different result exists at the same time
   */
  recordUserTest(name: string, test: UserTest): boolean {
    const server = this.servers.get(name);
    if (!server) {
      throw invalidArgumentError(`Unknown server '${name}'`, { server: name });
    }
    const added = server.addTest(test);
    if (added) {
      this.pendingUpsert.add(name);
    }
    return added;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Pushes pending upserts and deletes through the gateway. Gateway errors
   * propagate and leave the pending sets intact, so calling again retries.
   */
  async saveChanges(gateway: PersistenceGateway): Promise<SaveReport> {
    let upserted = 0;
    for (const name of this.pendingUpsert) {
      const server = this.servers.get(name);
      if (!server) continue;
      await gateway.upsert(server);
      upserted++;
    }

    let deleted = 0;
    for (const name of this.pendingDelete) {
      await gateway.deleteByName(name);
      deleted++;
    }

    this.pendingUpsert.clear();
    this.pendingDelete.clear();
    this.tombstones.clear();
    this.loaded = true;

    this.log.info("Changes saved", { upserted, deleted });
    return { upserted, deleted };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private checkColumns(header: readonly string[]): void {
    const required = Server.requiredColumns();
    const present = new Set(header);
    const missing = [...required].filter((heading) => !present.has(heading));
    const unexpected = [...present].filter((heading) => !required.has(heading));
    if (missing.length > 0 || unexpected.length > 0) {
      throw schemaMismatchError(missing, unexpected);
    }
  }

  /**
   * A name that vanished and came back before the deletion was saved. The
   * old aggregate (ids included) is put back and the delete is cancelled;
   * the fresh row is merged into it when it can be.
   */
  private restore(tombstone: Server, incoming: Server, report: SyncReport): void {
    const name = tombstone.name;
    try {
      tombstone.mergeFrom(incoming, this.log);
    } catch (error) {
      this.logMergeFailure(name, error);
    }

    this.tombstones.delete(name);
    this.pendingDelete.delete(name);
    this.servers.set(name, tombstone);
    this.pendingUpsert.add(name);
    report.restored.push(name);
  }

  private recordSkip(report: SyncReport, name: string, error: unknown): void {
    this.logMergeFailure(name, error);
    if (isContextError(error, "REDUNDANT_STAT")) {
      report.unchanged++;
      return;
    }
    report.skipped.push({
      name,
      code: isContextError(error) ? error.code : "UNKNOWN_ERROR",
      message: errorMessage(error),
    });
  }

  private logMergeFailure(name: string, error: unknown): void {
    if (isContextError(error, "REDUNDANT_STAT")) {
      this.log.debug("Skipping server: stat unchanged from its neighbour", { server: name });
      return;
    }
    this.log.warn(`Could not update server '${name}'`, {
      server: name,
      code: isContextError(error) ? error.code : "UNKNOWN_ERROR",
      error: errorMessage(error),
    });
  }
}
