/**
 * In-memory persistence gateway for manager tests
 * Stores copies, assigns ids like the SQLite gateway, and can be told to fail
 */

import type { PersistenceGateway } from "../../src/database/gateway";
import { PeriodicStat, Server, UserTest } from "../../src/model";

function copyServer(server: Server): Server {
  return new Server(
    server.config.clone(),
    server.stats.values().map((stat) => new PeriodicStat(stat.metrics(), stat.savedAt, stat.id)),
    server.tests.values().map((test) => new UserTest(test.pingMs, test.speedBps, test.savedAt, test.id))
  );
}

export class MemoryGateway implements PersistenceGateway {
  private readonly rows = new Map<string, Server>();
  private nextServerId = 1;
  private nextStatId = 1;
  private nextTestId = 1;

  readonly failUpsertFor = new Set<string>();
  readonly failDeleteFor = new Set<string>();
  readonly calls: string[] = [];

  async readAll(): Promise<Server[]> {
    this.calls.push("readAll");
    return [...this.rows.values()].map(copyServer);
  }

  async readByName(name: string): Promise<Server | null> {
    const stored = this.rows.get(name);
    return stored ? copyServer(stored) : null;
  }

  async upsert(server: Server): Promise<void> {
    this.calls.push(`upsert:${server.name}`);
    if (this.failUpsertFor.has(server.name)) {
      throw new Error(`upsert failed for ${server.name}`);
    }

    if (server.config.id === null) server.config.id = this.nextServerId++;
    for (const stat of server.stats) {
      if (stat.id === null) stat.id = this.nextStatId++;
    }
    for (const test of server.tests) {
      if (test.id === null) test.id = this.nextTestId++;
    }
    this.rows.set(server.name, copyServer(server));
  }

  async deleteByName(name: string): Promise<void> {
    this.calls.push(`delete:${name}`);
    if (this.failDeleteFor.has(name)) {
      throw new Error(`delete failed for ${name}`);
    }
    this.rows.delete(name);
  }

  names(): string[] {
    return [...this.rows.keys()].sort();
  }
}
