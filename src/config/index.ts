/**
 * Configuration Loader
 *
 * Loads and validates relay-ledger configuration from environment variables.
 * Uses Zod for runtime validation to ensure config is valid on startup.
 */

import { z } from "zod";
import { getDefaultDbPath } from "../paths";

export const DEFAULT_FEED_URL = "https://www.vpngate.net/api/iphone/";

// Configuration schema
const ConfigSchema = z.object({
  dbPath: z.string().min(1),
  feedUrl: z.string().url().default(DEFAULT_FEED_URL),
  fetchTimeoutMs: z.number().int().positive().default(10000),
});

export type LedgerConfig = z.infer<typeof ConfigSchema>;

/**
 * Load configuration from environment variables
 *
 * Environment variables:
 * - RELAY_LEDGER_DB: SQLite database path (default: <home>/ledger.db)
 * - RELAY_LEDGER_FEED_URL: Snapshot feed URL
 * - RELAY_LEDGER_FETCH_TIMEOUT: Fetch timeout in ms (default: 10000)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const raw = {
    dbPath: env.RELAY_LEDGER_DB || getDefaultDbPath(),
    feedUrl: env.RELAY_LEDGER_FEED_URL || undefined,
    fetchTimeoutMs: env.RELAY_LEDGER_FETCH_TIMEOUT
      ? Number(env.RELAY_LEDGER_FETCH_TIMEOUT)
      : undefined,
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid relay-ledger configuration: ${result.error.message}`);
  }

  return result.data;
}

// Cached config instance (loaded once at startup)
let cachedConfig: LedgerConfig | null = null;

export function getConfig(): LedgerConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
