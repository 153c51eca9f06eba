/**
 * Server queries
 * SQLite implementation of the persistence gateway
 */

import { PeriodicStat, Server, ServerConfig, UserTest } from "../../model";
import type { DatabaseAdapter } from "../adapter";
import type { PersistenceGateway } from "../gateway";
import { dbError } from "../../utils/errors";

// ============================================================================
// Row Types
// ============================================================================

interface ServerRow {
  id: number;
  name: string;
  ip: string | null;
  country_code: string;
  country_name: string;
  log_type: string | null;
  operator_name: string | null;
  operator_message: string | null;
  config_blob: string | null;
}

interface StatRow {
  id: number;
  server_id: number;
  saved_at: string;
  score: number | null;
  ping_ms: number | null;
  speed_bps: number | null;
  num_sessions: number | null;
  uptime_ms: number | null;
  total_users: number | null;
  total_traffic_bytes: number | null;
}

interface TestRow {
  id: number;
  server_id: number;
  saved_at: string;
  ping_ms: number | null;
  speed_bps: number | null;
}

// ============================================================================
// Row Mapping
// ============================================================================

function toConfig(row: ServerRow): ServerConfig {
  return new ServerConfig({
    id: row.id,
    name: row.name,
    ip: row.ip,
    countryCode: row.country_code,
    countryName: row.country_name,
    logType: row.log_type ?? "",
    operatorName: row.operator_name ?? "",
    operatorMessage: row.operator_message ?? "",
    configBlob: row.config_blob ?? "",
  });
}

function toStat(row: StatRow): PeriodicStat {
  return new PeriodicStat(
    {
      score: row.score ?? 0,
      pingMs: row.ping_ms ?? 0,
      speedBps: row.speed_bps ?? 0,
      numSessions: row.num_sessions ?? 0,
      uptimeMs: row.uptime_ms ?? 0,
      totalUsers: row.total_users ?? 0,
      totalTrafficBytes: row.total_traffic_bytes ?? 0,
    },
    new Date(row.saved_at),
    row.id
  );
}

function toTest(row: TestRow): UserTest {
  return new UserTest(row.ping_ms ?? 0, row.speed_bps ?? 0, new Date(row.saved_at), row.id);
}

// ============================================================================
// SQL
// ============================================================================

const INSERT_SERVER = `
  INSERT INTO servers (name, ip, country_code, country_name, log_type, operator_name, operator_message, config_blob)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)
`;

const UPDATE_SERVER = `
  UPDATE servers
  SET ip = ?, country_code = ?, country_name = ?, log_type = ?, operator_name = ?, operator_message = ?, config_blob = ?
  WHERE id = ?
`;

const INSERT_STAT = `
  INSERT INTO server_stats (
    server_id, saved_at, score, ping_ms, speed_bps, num_sessions, uptime_ms, total_users, total_traffic_bytes
  )
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

const INSERT_TEST = `
  INSERT INTO user_tests (server_id, saved_at, ping_ms, speed_bps)
  VALUES (?, ?, ?, ?)
`;

// ============================================================================
// Gateway
// ============================================================================

interface AssignedIds {
  serverId: number;
  stats: Array<[PeriodicStat, number]>;
  tests: Array<[UserTest, number]>;
}

export class SqliteServerGateway implements PersistenceGateway {
  constructor(private readonly db: DatabaseAdapter) {}

  async readAll(): Promise<Server[]> {
    const serverRows = await this.db.all<ServerRow>(`SELECT * FROM servers ORDER BY name`);
    const statRows = await this.db.all<StatRow>(`SELECT * FROM server_stats ORDER BY saved_at`);
    const testRows = await this.db.all<TestRow>(`SELECT * FROM user_tests ORDER BY saved_at`);

    const byId = new Map<number, Server>();
    for (const row of serverRows) {
      byId.set(row.id, new Server(toConfig(row)));
    }
    for (const row of statRows) {
      byId.get(row.server_id)?.stats.set(toStat(row));
    }
    for (const row of testRows) {
      byId.get(row.server_id)?.tests.set(toTest(row));
    }
    return [...byId.values()];
  }

  async readByName(name: string): Promise<Server | null> {
    const row = await this.db.get<ServerRow>(`SELECT * FROM servers WHERE name = ?`, [name]);
    if (!row) return null;

    const statRows = await this.db.all<StatRow>(`SELECT * FROM server_stats WHERE server_id = ? ORDER BY saved_at`, [
      row.id,
    ]);
    const testRows = await this.db.all<TestRow>(`SELECT * FROM user_tests WHERE server_id = ? ORDER BY saved_at`, [
      row.id,
    ]);
    return new Server(toConfig(row), statRows.map(toStat), testRows.map(toTest));
  }

  /**
   * Ids are written onto the aggregate only after the transaction commits,
   * so a failed upsert leaves the in-memory objects id-less as before.
   */
  async upsert(server: Server): Promise<void> {
    const assigned = await this.db.transaction(() => this.write(server));

    server.config.id = assigned.serverId;
    for (const [stat, id] of assigned.stats) stat.id = id;
    for (const [test, id] of assigned.tests) test.id = id;
  }

  async deleteByName(name: string): Promise<void> {
    await this.db.run(`DELETE FROM servers WHERE name = ?`, [name]);
  }

  private async write(server: Server): Promise<AssignedIds> {
    const config = server.config;
    let serverId: number;

    if (config.id === null) {
      const result = await this.db.run(INSERT_SERVER, [
        config.name,
        config.ip,
        config.countryCode,
        config.countryName,
        config.logType,
        config.operatorName,
        config.operatorMessage,
        config.configBlob,
      ]);
      serverId = Number(result.lastInsertRowid);
    } else {
      const result = await this.db.run(UPDATE_SERVER, [
        config.ip,
        config.countryCode,
        config.countryName,
        config.logType,
        config.operatorName,
        config.operatorMessage,
        config.configBlob,
        config.id,
      ]);
      if (result.changes === 0) {
        throw dbError(`No stored server with id ${config.id}`, { name: config.name, id: config.id });
      }
      serverId = config.id;
    }

    const stats: AssignedIds["stats"] = [];
    for (const stat of server.stats) {
      if (stat.id !== null) continue;
      const result = await this.db.run(INSERT_STAT, [
        serverId,
        stat.savedAt.toISOString(),
        stat.score,
        stat.pingMs,
        stat.speedBps,
        stat.numSessions,
        stat.uptimeMs,
        stat.totalUsers,
        stat.totalTrafficBytes,
      ]);
      stats.push([stat, Number(result.lastInsertRowid)]);
    }

    const tests: AssignedIds["tests"] = [];
    for (const test of server.tests) {
      if (test.id !== null) continue;
      const result = await this.db.run(INSERT_TEST, [
        serverId,
        test.savedAt.toISOString(),
        test.pingMs,
        test.speedBps,
      ]);
      tests.push([test, Number(result.lastInsertRowid)]);
    }

    return { serverId, stats, tests };
  }
}
