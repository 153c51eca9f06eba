/**
 * Record model barrel export
 */

export { indexColumns, readCell, type ColumnIndex } from "./columns";
export { CONFIG_COLUMNS, ServerConfig, normalizeIp, type ServerConfigFields } from "./config";
export { PeriodicStat, STAT_COLUMNS, STAT_METRICS, coerceCount, type StatMetric, type StatMetrics } from "./stat";
export { Server } from "./server";
export { Timeline, type Neighbours, type Timestamped } from "./timeline";
export { UserTest } from "./user-test";
