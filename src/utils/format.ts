/**
 * Output formatting utilities
 * Human-readable text goes to stderr, machine-readable JSON to stdout
 */

import type { Server } from "../model";
import type { SaveReport, SyncReport } from "../sync/manager";

// ============================================================================
// Value Formatting
// ============================================================================

export function getTimeAgo(date: Date | undefined, now: Date = new Date()): string {
  if (!date) return "never";

  const diffMs = now.getTime() - date.getTime();
  const diffMins = Math.floor(diffMs / 60000);
  const diffHours = Math.floor(diffMs / 3600000);
  const diffDays = Math.floor(diffMs / 86400000);

  if (diffMins < 1) return "just now";
  if (diffMins < 60) return `${diffMins}m ago`;
  if (diffHours < 24) return `${diffHours}h ago`;
  if (diffDays < 7) return `${diffDays}d ago`;
  return `${Math.floor(diffDays / 7)}w ago`;
}

const SPEED_UNITS = ["bps", "Kbps", "Mbps", "Gbps"];

export function formatSpeed(bps: number): string {
  let value = bps;
  let unit = 0;
  while (value >= 1000 && unit < SPEED_UNITS.length - 1) {
    value /= 1000;
    unit++;
  }
  return unit === 0 ? `${value} ${SPEED_UNITS[unit]}` : `${value.toFixed(1)} ${SPEED_UNITS[unit]}`;
}

// ============================================================================
// JSON Output
// ============================================================================

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data));
}

export function outputSuccess(data: Record<string, unknown> = {}): void {
  console.log(JSON.stringify({ success: true, ...data }));
}

// ============================================================================
// Table Formatting
// ============================================================================

export function formatTable(headers: string[], rows: string[][]): string {
  const colWidths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] || "").length));
    return Math.max(h.length, maxRowWidth);
  });

  const separator = colWidths.map((w) => "─".repeat(w + 2)).join("┼");
  const headerRow = headers.map((h, i) => ` ${h.padEnd(colWidths[i])} `).join("│");

  const dataRows = rows.map((row) => row.map((cell, i) => ` ${(cell || "").padEnd(colWidths[i])} `).join("│"));

  return [
    "┌" + separator.replace(/┼/g, "┬") + "┐",
    "│" + headerRow + "│",
    "├" + separator + "┤",
    ...dataRows.map((r) => "│" + r + "│"),
    "└" + separator.replace(/┼/g, "┴") + "┘",
  ].join("\n");
}

// ============================================================================
// Server Formatting
// ============================================================================

export interface ServerSummary {
  id: number | null;
  name: string;
  ip: string | null;
  country: string;
  score: number | null;
  pingMs: number | null;
  speedBps: number | null;
  stats: number;
  tests: number;
  lastStatAt: string | null;
}

export function summarizeServer(server: Server): ServerSummary {
  const last = server.lastStat();
  return {
    id: server.config.id,
    name: server.name,
    ip: server.config.ip,
    country: server.config.countryCode,
    score: last?.score ?? null,
    pingMs: last?.pingMs ?? null,
    speedBps: last?.speedBps ?? null,
    stats: server.stats.size,
    tests: server.tests.size,
    lastStatAt: last?.savedAt.toISOString() ?? null,
  };
}

export function formatServerList(servers: Server[]): void {
  if (servers.length === 0) {
    console.error("No servers stored. Fetch a snapshot with: relay-ledger sync");
    return;
  }

  const rows = servers.map((server) => {
    const summary = summarizeServer(server);
    return [
      summary.name,
      summary.country,
      summary.ip ?? "-",
      summary.score === null ? "-" : String(summary.score),
      summary.pingMs === null ? "-" : `${summary.pingMs} ms`,
      summary.speedBps === null ? "-" : formatSpeed(summary.speedBps),
      String(summary.stats),
      getTimeAgo(server.lastStat()?.savedAt),
    ];
  });

  console.error(`\n📡 ${servers.length} relay server(s)\n`);
  console.error(formatTable(["Name", "CC", "IP", "Score", "Ping", "Speed", "Samples", "Seen"], rows));
  console.error("");
}

export function formatServerDetail(server: Server): void {
  const config = server.config;
  console.error(`\n📡 ${config.name}${config.id === null ? "" : ` (#${config.id})`}`);
  console.error(`   IP: ${config.ip ?? "unknown"} | Country: ${config.countryName} (${config.countryCode})`);
  console.error(`   Operator: ${config.operatorName || "-"} | Log: ${config.logType || "-"}`);
  if (config.operatorMessage) console.error(`   Message: ${config.operatorMessage}`);

  if (server.stats.size > 0) {
    console.error("\n   Stats:");
    console.error(
      formatTable(
        ["Saved", "Score", "Ping", "Speed", "Sessions", "Users"],
        server.stats.values().map((stat) => [
          stat.savedAt.toISOString(),
          String(stat.score),
          `${stat.pingMs} ms`,
          formatSpeed(stat.speedBps),
          String(stat.numSessions),
          String(stat.totalUsers),
        ])
      )
    );
  }

  if (server.tests.size > 0) {
    console.error("\n   User tests:");
    console.error(
      formatTable(
        ["Saved", "Ping", "Speed"],
        server.tests
          .values()
          .map((test) => [test.savedAt.toISOString(), `${test.pingMs} ms`, formatSpeed(test.speedBps)])
      )
    );
  }
  console.error("");
}

export function formatSyncReport(report: SyncReport, saved: SaveReport | null): void {
  console.error(`\n🔄 Snapshot of ${report.rows} row(s) at ${report.savedAt}`);
  console.error(
    `   +${report.added.length} added, ~${report.updated.length} updated, ` +
      `-${report.removed.length} removed, ${report.unchanged} unchanged`
  );
  if (report.restored.length > 0) {
    console.error(`   ↩️  Restored: ${report.restored.join(", ")}`);
  }
  for (const skip of report.skipped) {
    console.error(`   ⚠️  ${skip.name}: ${skip.message}`);
  }
  console.error(
    saved
      ? `✅ Saved: ${saved.upserted} upserted, ${saved.deleted} deleted\n`
      : "ℹ️  Dry run: nothing written\n"
  );
}
