/**
 * Record model tests
 * ServerConfig, PeriodicStat, UserTest and the Server aggregate
 */

import { describe, expect, test } from "vitest";
import {
  coerceCount,
  indexColumns,
  normalizeIp,
  PeriodicStat,
  readCell,
  Server,
  ServerConfig,
  UserTest,
  type StatMetrics,
} from "../../src/model";
import { isContextError, type ErrorCode } from "../../src/utils/errors";
import { at, captureLogger, FEED_HEADINGS, rowCells } from "../helpers/fixtures";

const columns = indexColumns(FEED_HEADINGS);
const T1 = at("2026-03-01T00:00:00.000Z");
const T2 = at("2026-03-01T01:00:00.000Z");
const T3 = at("2026-03-01T02:00:00.000Z");

function metrics(overrides: Partial<StatMetrics> = {}): StatMetrics {
  return {
    score: 1000,
    pingMs: 20,
    speedBps: 50000000,
    numSessions: 5,
    uptimeMs: 3600000,
    totalUsers: 100,
    totalTrafficBytes: 123456789,
    ...overrides,
  };
}

function config(name: string, overrides: Partial<ConstructorParameters<typeof ServerConfig>[0]> = {}): ServerConfig {
  return new ServerConfig({
    name,
    ip: "198.51.100.10",
    countryCode: "JP",
    countryName: "Japan",
    logType: "2weeks",
    operatorName: "test-operator",
    operatorMessage: "",
    configBlob: "dGVzdA==",
    ...overrides,
  });
}

function errorCode(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (isContextError(error)) return error.code;
    throw error;
  }
  return undefined;
}

// ============================================================================
// Columns and coercion
// ============================================================================

describe("columns", () => {
  test("indexColumns keeps the first position of a repeated heading", () => {
    expect(indexColumns(["A", "B", "A"]).get("A")).toBe(0);
  });

  test("readCell returns empty text past the end of the row", () => {
    expect(readCell(indexColumns(["A", "B"]), ["x"], "B")).toBe("");
  });

  test("readCell reports an unknown heading as a schema mismatch", () => {
    expect(errorCode(() => readCell(indexColumns(["A"]), ["x"], "Z"))).toBe("SCHEMA_MISMATCH");
  });
});

describe("coerceCount", () => {
  test("parses digit-only text", () => {
    expect(coerceCount("42")).toBe(42);
    expect(coerceCount("0")).toBe(0);
  });

  test("falls back to zero for anything else", () => {
    expect(coerceCount("")).toBe(0);
    expect(coerceCount("-5")).toBe(0);
    expect(coerceCount("1.5")).toBe(0);
    expect(coerceCount("abc")).toBe(0);
  });

  test("maps counts beyond the exact integer range to zero", () => {
    expect(coerceCount("9007199254740991")).toBe(9007199254740991);
    expect(coerceCount("18446744073709551615")).toBe(0);
  });
});

describe("normalizeIp", () => {
  test("accepts IPv4 and IPv6 addresses", () => {
    expect(normalizeIp(" 203.0.113.7 ")).toBe("203.0.113.7");
    expect(normalizeIp("2001:db8::1")).toBe("2001:db8::1");
  });

  test("canonicalises IPv6 spellings", () => {
    expect(normalizeIp("0:0:0:0:0:0:0:1")).toBe("::1");
    expect(normalizeIp("2001:DB8:0:0:0:0:0:1")).toBe("2001:db8::1");
  });

  test("maps unparseable or missing values to null", () => {
    expect(normalizeIp("not-an-ip")).toBeNull();
    expect(normalizeIp("")).toBeNull();
    expect(normalizeIp(null)).toBeNull();
    expect(normalizeIp(undefined)).toBeNull();
  });
});

// ============================================================================
// ServerConfig
// ============================================================================

describe("ServerConfig", () => {
  test("fromRow maps feed columns onto fields", () => {
    const parsed = ServerConfig.fromRow(columns, rowCells({ name: "relay-a", message: "hi", ip: "bogus" }));
    expect(parsed.toFields()).toEqual({
      name: "relay-a",
      ip: null,
      countryCode: "JP",
      countryName: "Japan",
      logType: "2weeks",
      operatorName: "test-operator",
      operatorMessage: "hi",
      configBlob: "dGVzdA==",
      id: null,
    });
  });

  test("fromRow rejects an empty host name", () => {
    expect(errorCode(() => ServerConfig.fromRow(columns, rowCells({ name: "" })))).toBe("VALIDATION_ERROR");
  });

  test("mergeFrom reports no change for identical configs", () => {
    expect(config("a").mergeFrom(config("a"))).toBe(false);
  });

  test("mergeFrom copies differing attributes", () => {
    const current = config("a");
    expect(current.mergeFrom(config("a", { ip: "203.0.113.9", countryName: "Nippon" }))).toBe(true);
    expect(current.ip).toBe("203.0.113.9");
    expect(current.countryName).toBe("Nippon");
  });

  test("mergeFrom treats two spellings of one address as equal", () => {
    const current = config("a", { ip: "::1" });
    expect(current.mergeFrom(config("a", { ip: "0:0:0:0:0:0:0:1" }))).toBe(false);
    expect(current.ip).toBe("::1");
  });

  test("mergeFrom adopts an incoming id when none is held", () => {
    const current = config("a");
    expect(current.mergeFrom(config("a", { id: 7 }))).toBe(true);
    expect(current.id).toBe(7);
  });

  test("mergeFrom keeps the held id when the incoming one is absent", () => {
    const current = config("a", { id: 7 });
    expect(current.mergeFrom(config("a"))).toBe(false);
    expect(current.id).toBe(7);
  });

  test("mergeFrom refuses a different name", () => {
    const current = config("a");
    expect(errorCode(() => current.mergeFrom(config("b", { countryCode: "US" })))).toBe("NAME_MISMATCH");
    expect(current.countryCode).toBe("JP");
  });

  test("mergeFrom refuses conflicting ids without touching fields", () => {
    const current = config("a", { id: 1 });
    expect(errorCode(() => current.mergeFrom(config("a", { id: 2, countryCode: "US" })))).toBe("CONFLICTING_ID");
    expect(current.toFields()).toEqual(config("a", { id: 1 }).toFields());
  });
});

// ============================================================================
// PeriodicStat / UserTest
// ============================================================================

describe("PeriodicStat", () => {
  test("fromRow coerces metrics and stamps savedAt", () => {
    const stat = PeriodicStat.fromRow(columns, rowCells({ name: "a", score: "12", ping: "-", speed: "" }), T1);
    expect(stat.metrics()).toEqual(metrics({ score: 12, pingMs: 0, speedBps: 0 }));
    expect(stat.savedAt).toEqual(T1);
    expect(stat.id).toBeNull();
  });

  test("sameMetrics ignores savedAt and id", () => {
    const a = new PeriodicStat(metrics(), T1, 1);
    expect(a.sameMetrics(new PeriodicStat(metrics(), T2))).toBe(true);
    expect(a.sameMetrics(new PeriodicStat(metrics({ totalUsers: 101 }), T1))).toBe(false);
  });
});

describe("UserTest", () => {
  test("sameResult compares ping and speed only", () => {
    const a = new UserTest(10, 500, T1, 3);
    expect(a.sameResult(new UserTest(10, 500, T2))).toBe(true);
    expect(a.sameResult(new UserTest(11, 500, T1))).toBe(false);
  });
});

// ============================================================================
// Server aggregate
// ============================================================================

describe("Server", () => {
  test("requiredColumns lists every feed heading", () => {
    expect([...Server.requiredColumns()].sort()).toEqual([...FEED_HEADINGS].sort());
  });

  test("fromRow builds a config and one stat", () => {
    const server = Server.fromRow(columns, rowCells({ name: "relay-a" }), T1);
    expect(server.name).toBe("relay-a");
    expect(server.stats.size).toBe(1);
    expect(server.lastStat()?.savedAt).toEqual(T1);
    expect(server.tests.size).toBe(0);
  });

  describe("addStat", () => {
    test("inserts a new stat", () => {
      const server = new Server(config("a"));
      expect(server.addStat(new PeriodicStat(metrics(), T1))).toBe(true);
      expect(server.stats.size).toBe(1);
    });

    test("an equal stat at the same time is a no-op", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics(), T1)]);
      expect(server.addStat(new PeriodicStat(metrics(), T1))).toBe(false);
    });

    test("a different stat at the same time conflicts", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics(), T1)]);
      expect(errorCode(() => server.addStat(new PeriodicStat(metrics({ score: 1 }), T1)))).toBe(
        "CONFLICTING_STAT"
      );
    });

    test("a stat equal to its predecessor is redundant", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics({ score: 5 }), T1)]);
      expect(errorCode(() => server.addStat(new PeriodicStat(metrics({ score: 5 }), T2)))).toBe("REDUNDANT_STAT");
      expect(server.stats.size).toBe(1);
    });

    test("a stat equal to its successor is redundant", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics({ score: 5 }), T3)]);
      expect(errorCode(() => server.addStat(new PeriodicStat(metrics({ score: 5 }), T1)))).toBe("REDUNDANT_STAT");
    });

    test("a changed value between neighbours is accepted", () => {
      const server = new Server(config("a"), [
        new PeriodicStat(metrics({ score: 5 }), T1),
        new PeriodicStat(metrics({ score: 7 }), T3),
      ]);
      expect(server.addStat(new PeriodicStat(metrics({ score: 6 }), T2))).toBe(true);
      expect(server.stats.values().map((s) => s.score)).toEqual([5, 6, 7]);
    });
  });

  describe("addTest", () => {
    test("keeps every distinct probe and ignores repeats", () => {
      const server = new Server(config("a"));
      expect(server.addTest(new UserTest(10, 100, T1))).toBe(true);
      expect(server.addTest(new UserTest(10, 100, T2))).toBe(true);
      expect(server.addTest(new UserTest(10, 100, T2))).toBe(false);
      expect(server.tests.size).toBe(2);
      expect(server.lastTest()?.savedAt).toEqual(T2);
    });

    test("a different probe at the same time conflicts", () => {
      const server = new Server(config("a"), [], [new UserTest(10, 100, T1)]);
      expect(errorCode(() => server.addTest(new UserTest(11, 100, T1)))).toBe("CONFLICTING_TEST");
    });
  });

  describe("mergeFrom", () => {
    test("two snapshots reporting the same metrics reject the second as redundant", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics({ score: 5 }), T1)]);
      const later = new Server(config("a"), [new PeriodicStat(metrics({ score: 5 }), T2)]);
      expect(errorCode(() => server.mergeFrom(later))).toBe("REDUNDANT_STAT");
    });

    test("a redundant stat rolls back config changes made in the same merge", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics(), T1)]);
      const incoming = new Server(config("a", { countryName: "Changed" }), [new PeriodicStat(metrics(), T2)]);
      expect(errorCode(() => server.mergeFrom(incoming))).toBe("REDUNDANT_STAT");
      expect(server.config.countryName).toBe("Japan");
      expect(server.stats.size).toBe(1);
    });

    test("conflicting ids leave the aggregate unchanged", () => {
      const server = new Server(config("a", { id: 1 }), [new PeriodicStat(metrics(), T1)]);
      const incoming = new Server(config("a", { id: 2 }), [new PeriodicStat(metrics({ score: 9 }), T2)]);
      expect(errorCode(() => server.mergeFrom(incoming))).toBe("CONFLICTING_ID");
      expect(server.stats.size).toBe(1);
      expect(server.config.id).toBe(1);
    });

    test("a name mismatch leaves the aggregate unchanged", () => {
      const server = new Server(config("a"));
      expect(errorCode(() => server.mergeFrom(new Server(config("b"))))).toBe("NAME_MISMATCH");
      expect(server.name).toBe("a");
    });

    test("a stat added before a later conflicting stat is rolled back", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics({ score: 1 }), T3)]);
      const incoming = new Server(config("a"), [
        new PeriodicStat(metrics({ score: 2 }), T1),
        new PeriodicStat(metrics({ score: 3 }), T3),
      ]);
      expect(errorCode(() => server.mergeFrom(incoming))).toBe("CONFLICTING_STAT");
      expect(server.stats.values().map((s) => s.score)).toEqual([1]);
    });

    test("merges new stats and tests and reports a change", () => {
      const server = new Server(config("a"), [new PeriodicStat(metrics({ score: 1 }), T1)]);
      const incoming = new Server(
        config("a"),
        [new PeriodicStat(metrics({ score: 2 }), T2)],
        [new UserTest(10, 100, T2)]
      );
      expect(server.mergeFrom(incoming)).toBe(true);
      expect(server.stats.size).toBe(2);
      expect(server.tests.size).toBe(1);
    });

    test("an identical aggregate merges without change", () => {
      const build = () => new Server(config("a"), [new PeriodicStat(metrics(), T1)], [new UserTest(1, 2, T1)]);
      expect(build().mergeFrom(build())).toBe(false);
    });

    test("a conflicting test is skipped with a warning and the rest applies", () => {
      const { logger, entries } = captureLogger();
      const server = new Server(config("a"), [], [new UserTest(10, 100, T1)]);
      const incoming = new Server(config("a"), [], [new UserTest(99, 100, T1), new UserTest(20, 200, T2)]);

      expect(server.mergeFrom(incoming, logger)).toBe(true);
      expect(server.tests.values().map((t) => t.pingMs)).toEqual([10, 20]);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: "warn",
        message: "Skipping conflicting user test",
        server: "a",
        savedAt: T1.toISOString(),
      });
    });
  });

  test("clone copies the config but shares the series", () => {
    const server = new Server(config("a", { id: 4 }), [new PeriodicStat(metrics(), T1)]);
    const copy = server.clone();
    copy.config.countryCode = "US";
    expect(server.config.countryCode).toBe("JP");
    expect(copy.stats.size).toBe(1);
    expect(copy.config.id).toBe(4);
  });
});
