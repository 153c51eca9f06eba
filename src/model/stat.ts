/**
 * PeriodicStat: one self-reported performance sample
 */

import { type ColumnIndex, readCell } from "./columns";

export const STAT_METRICS = [
  "score",
  "pingMs",
  "speedBps",
  "numSessions",
  "uptimeMs",
  "totalUsers",
  "totalTrafficBytes",
] as const;

export type StatMetric = (typeof STAT_METRICS)[number];

export type StatMetrics = Record<StatMetric, number>;

/** Feed heading → stat metric */
export const STAT_COLUMNS = {
  Score: "score",
  Ping: "pingMs",
  Speed: "speedBps",
  NumVpnSessions: "numSessions",
  Uptime: "uptimeMs",
  TotalUsers: "totalUsers",
  TotalTraffic: "totalTrafficBytes",
} as const satisfies Record<string, StatMetric>;

/**
 * Digits-only text becomes an integer; anything else (signs, decimals,
 * blanks) is 0, and so is a count too large to hold exactly.
 */
export function coerceCount(value: string): number {
  if (!/^\d+$/.test(value)) return 0;
  const count = Number(value);
  return Number.isSafeInteger(count) ? count : 0;
}

export class PeriodicStat implements StatMetrics {
  readonly score: number;
  readonly pingMs: number;
  readonly speedBps: number;
  readonly numSessions: number;
  readonly uptimeMs: number;
  readonly totalUsers: number;
  readonly totalTrafficBytes: number;
  readonly savedAt: Date;
  id: number | null;

  constructor(metrics: StatMetrics, savedAt: Date, id: number | null = null) {
    this.score = metrics.score;
    this.pingMs = metrics.pingMs;
    this.speedBps = metrics.speedBps;
    this.numSessions = metrics.numSessions;
    this.uptimeMs = metrics.uptimeMs;
    this.totalUsers = metrics.totalUsers;
    this.totalTrafficBytes = metrics.totalTrafficBytes;
    this.savedAt = savedAt;
    this.id = id;
  }

  static fromRow(columns: ColumnIndex, row: readonly string[], savedAt: Date): PeriodicStat {
    const metric = (heading: keyof typeof STAT_COLUMNS) => coerceCount(readCell(columns, row, heading));
    return new PeriodicStat(
      {
        score: metric("Score"),
        pingMs: metric("Ping"),
        speedBps: metric("Speed"),
        numSessions: metric("NumVpnSessions"),
        uptimeMs: metric("Uptime"),
        totalUsers: metric("TotalUsers"),
        totalTrafficBytes: metric("TotalTraffic"),
      },
      savedAt
    );
  }

  /** Equal on every metric; `savedAt` and `id` are ignored */
  sameMetrics(other: StatMetrics): boolean {
    return STAT_METRICS.every((metric) => this[metric] === other[metric]);
  }

  metrics(): StatMetrics {
    return {
      score: this.score,
      pingMs: this.pingMs,
      speedBps: this.speedBps,
      numSessions: this.numSessions,
      uptimeMs: this.uptimeMs,
      totalUsers: this.totalUsers,
      totalTrafficBytes: this.totalTrafficBytes,
    };
  }
}
