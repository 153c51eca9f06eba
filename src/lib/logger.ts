/**
 * Structured JSON Logger
 *
 * Outputs newline-delimited JSON to stderr. Level is read from
 * RELAY_LEDGER_LOG_LEVEL (debug | info | warn | error, default info).
 */

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getConfiguredLevel(): LogLevel {
  const env = process.env.RELAY_LEDGER_LOG_LEVEL?.toLowerCase();
  if (env && isLogLevel(env)) return env;
  return "info";
}

function writeLog(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + "\n");
}

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Replaces the stderr writer; tests use it to collect entries */
  sink?: (entry: LogEntry) => void;
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? getConfiguredLevel()];
  const sink = options.sink ?? writeLog;

  function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < minLevel) return;

    sink({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...extra,
    });
  }

  return {
    debug: (message, extra) => emit("debug", message, extra),
    info: (message, extra) => emit("info", message, extra),
    warn: (message, extra) => emit("warn", message, extra),
    error: (message, extra) => emit("error", message, extra),
  };
}
