/**
 * Centralized Path Resolution
 *
 * RELAY_LEDGER_HOME overrides the data directory; otherwise ~/.relay-ledger.
 */
import { homedir } from "node:os";
import { join } from "node:path";

let cachedHome: string | null = null;

export function getLedgerHome(): string {
  if (!cachedHome) {
    cachedHome = process.env.RELAY_LEDGER_HOME || join(homedir(), ".relay-ledger");
  }
  return cachedHome;
}

export function getDefaultDbPath(): string {
  return join(getLedgerHome(), "ledger.db");
}
