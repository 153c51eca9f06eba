#!/usr/bin/env node
/**
 * relay-ledger
 * Main CLI entry point
 */

import { checkDatabase, initDatabase } from "./commands/database";
import { exportProfiles } from "./commands/export";
import { serverList, serverProbe, serverShow } from "./commands/servers";
import { handleSyncCommand } from "./commands/sync";
import { getConfig } from "./config";
import type { LocalAdapter } from "./database/adapters/local";
import { openLedger } from "./database/connection";
import { SqliteServerGateway } from "./database/queries/servers";
import { HELP_TEXT } from "./help";
import { ContextError, errorMessage, exitWithError, exitWithUsage } from "./utils/errors";

// ============================================================================
// Main CLI Router
// ============================================================================

async function withLedger<T>(
  dbPath: string,
  fn: (ledger: LocalAdapter) => Promise<T>,
  options: { verify?: boolean } = {}
): Promise<T> {
  const ledger = openLedger(dbPath, options);
  try {
    return await fn(ledger);
  } finally {
    ledger.close();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const subArgs = args.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    console.log(HELP_TEXT);
    return;
  }

  const config = getConfig();

  switch (command) {
    case "init":
      initDatabase(config.dbPath, subArgs);
      return;

    case "check": {
      const valid = await withLedger(config.dbPath, async (ledger) => checkDatabase(ledger.raw()), {
        verify: false,
      });
      if (!valid) process.exit(1);
      return;
    }

    case "sync":
      await withLedger(config.dbPath, (ledger) =>
        handleSyncCommand(new SqliteServerGateway(ledger), config, subArgs)
      );
      return;

    case "list":
      await withLedger(config.dbPath, (ledger) => serverList(new SqliteServerGateway(ledger)));
      return;

    case "show":
      await withLedger(config.dbPath, (ledger) => serverShow(new SqliteServerGateway(ledger), subArgs));
      return;

    case "probe":
      await withLedger(config.dbPath, (ledger) => serverProbe(new SqliteServerGateway(ledger), subArgs));
      return;

    case "export":
      await withLedger(config.dbPath, (ledger) => exportProfiles(new SqliteServerGateway(ledger), subArgs));
      return;

    default:
      exitWithUsage(`Unknown command: ${command}\n\n${HELP_TEXT}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ContextError) {
    console.log(JSON.stringify(error.toJSON()));
    exitWithError(`[${error.code}] ${error.message}`);
  }
  exitWithError(errorMessage(error));
});
