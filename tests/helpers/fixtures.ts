/**
 * Snapshot fixtures
 * Builds feed-shaped CSV text with sensible defaults per row
 */

import { createLogger, type LogEntry, type Logger } from "../../src/lib/logger";

export const FEED_HEADINGS = [
  "HostName",
  "IP",
  "Score",
  "Ping",
  "Speed",
  "CountryLong",
  "CountryShort",
  "NumVpnSessions",
  "Uptime",
  "TotalUsers",
  "TotalTraffic",
  "LogType",
  "Operator",
  "Message",
  "OpenVPN_ConfigData_Base64",
];

export interface RowValues {
  name: string;
  ip?: string;
  score?: number | string;
  ping?: number | string;
  speed?: number | string;
  countryLong?: string;
  countryShort?: string;
  sessions?: number | string;
  uptime?: number | string;
  users?: number | string;
  traffic?: number | string;
  logType?: string;
  operator?: string;
  message?: string;
  blob?: string;
}

function csvCell(text: string): string {
  return /[",]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** One row's cells in FEED_HEADINGS order */
export function rowCells(values: RowValues): string[] {
  return [
    values.name,
    values.ip ?? "198.51.100.10",
    values.score ?? 1000,
    values.ping ?? 20,
    values.speed ?? 50000000,
    values.countryLong ?? "Japan",
    values.countryShort ?? "JP",
    values.sessions ?? 5,
    values.uptime ?? 3600000,
    values.users ?? 100,
    values.traffic ?? 123456789,
    values.logType ?? "2weeks",
    values.operator ?? "test-operator",
    values.message ?? "",
    values.blob ?? "dGVzdA==",
  ].map(String);
}

export function snapshotRow(values: RowValues): string {
  return rowCells(values).map(csvCell).join(",");
}

/** Feed-style text: `*` banner, `#` header, rows, trailing `*` */
export function buildSnapshot(rows: RowValues[], headings: string[] = FEED_HEADINGS): string {
  return ["*vpn_servers", `#${headings.join(",")}`, ...rows.map(snapshotRow), "*", ""].join("\r\n");
}

export function at(iso: string): Date {
  return new Date(iso);
}

export interface CapturedLogger {
  logger: Logger;
  entries: LogEntry[];
}

export function captureLogger(): CapturedLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger("test", { level: "debug", sink: (entry) => entries.push(entry) });
  return { logger, entries };
}
