/**
 * Server commands
 * Handles: list, show, probe
 */

import type { PersistenceGateway } from "../database/gateway";
import { UserTest } from "../model";
import { ReconciliationManager } from "../sync/manager";
import { invalidArgumentError } from "../utils/errors";
import { formatServerDetail, formatServerList, outputJson, outputSuccess, summarizeServer } from "../utils/format";
import { parseProbeArgs, parseShowArgs } from "../utils/validation";

export async function serverList(gateway: PersistenceGateway): Promise<void> {
  const servers = await gateway.readAll();
  formatServerList(servers);
  outputJson(servers.map(summarizeServer));
}

export async function serverShow(gateway: PersistenceGateway, args: string[]): Promise<void> {
  const { name } = parseShowArgs(args);
  const server = await gateway.readByName(name);
  if (!server) {
    throw invalidArgumentError(`Server '${name}' not found`, { server: name });
  }

  formatServerDetail(server);
  outputSuccess({
    server: summarizeServer(server),
    stats: server.stats.values().map((stat) => ({ savedAt: stat.savedAt.toISOString(), ...stat.metrics() })),
    tests: server.tests.values().map((test) => ({
      savedAt: test.savedAt.toISOString(),
      pingMs: test.pingMs,
      speedBps: test.speedBps,
    })),
  });
}

/**
 * Record a user-run connectivity result for a stored server, timestamped now
 */
export async function serverProbe(
  gateway: PersistenceGateway,
  args: string[],
  now: Date = new Date()
): Promise<boolean> {
  const input = parseProbeArgs(args);
  const manager = new ReconciliationManager();
  await manager.resetFromGateway(gateway);

  const added = manager.recordUserTest(input.name, new UserTest(input.ping, input.speed, now));
  const saved = await manager.saveChanges(gateway);

  console.error(added ? `✅ Recorded probe for '${input.name}'` : `ℹ️  Probe for '${input.name}' already recorded`);
  outputSuccess({ name: input.name, added, upserted: saved.upserted });
  return added;
}
