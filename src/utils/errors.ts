/**
 * Error handling utilities
 * Coded errors for the snapshot feed, record merges, storage and the CLI
 */

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "FORMAT_ERROR"
  | "SCHEMA_MISMATCH"
  | "NAME_MISMATCH"
  | "CONFLICTING_ID"
  | "CONFLICTING_STAT"
  | "REDUNDANT_STAT"
  | "CONFLICTING_TEST"
  | "DB_CONNECTION_ERROR"
  | "DB_QUERY_ERROR"
  | "FILE_NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "API_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export class ContextError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ContextError";
    Object.setPrototypeOf(this, ContextError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export function isContextError(error: unknown, code?: ErrorCode): error is ContextError {
  if (!(error instanceof ContextError)) return false;
  return code === undefined || error.code === code;
}

// ============================================================================
// Snapshot Errors
// ============================================================================

export function formatError(message: string, context?: Record<string, unknown>): ContextError {
  return new ContextError(message, "FORMAT_ERROR", context);
}

export function schemaMismatchError(missing: string[], unexpected: string[]): ContextError {
  return new ContextError(
    "Snapshot columns do not match the expected columns",
    "SCHEMA_MISMATCH",
    { missing, unexpected }
  );
}

// ============================================================================
// Merge Errors
// ============================================================================

export function nameMismatchError(expected: string, actual: string): ContextError {
  return new ContextError(`Expected name '${expected}', got '${actual}'`, "NAME_MISMATCH", {
    expected,
    actual,
  });
}

export function conflictingIdError(name: string, current: number, incoming: number): ContextError {
  return new ContextError(`Conflicting ids for '${name}': ${current} and ${incoming}`, "CONFLICTING_ID", {
    name,
    current,
    incoming,
  });
}

export function conflictingStatError(name: string, savedAt: Date): ContextError {
  return new ContextError(
    `Different stat already exists for '${name}' at ${savedAt.toISOString()}`,
    "CONFLICTING_STAT",
    { name, savedAt: savedAt.toISOString() }
  );
}

export function redundantStatError(name: string, savedAt: Date): ContextError {
  return new ContextError(
    `Stat for '${name}' at ${savedAt.toISOString()} is identical to its neighbour(s)`,
    "REDUNDANT_STAT",
    { name, savedAt: savedAt.toISOString() }
  );
}

export function conflictingTestError(name: string, savedAt: Date): ContextError {
  return new ContextError(
    `Different user test already exists for '${name}' at ${savedAt.toISOString()}`,
    "CONFLICTING_TEST",
    { name, savedAt: savedAt.toISOString() }
  );
}

// ============================================================================
// Storage / CLI Errors
// ============================================================================

export function dbError(message: string, context?: Record<string, unknown>): ContextError {
  return new ContextError(message, "DB_QUERY_ERROR", context);
}

export function fileNotFoundError(path: string): ContextError {
  return new ContextError(`File not found: ${path}`, "FILE_NOT_FOUND", { path });
}

export function invalidArgumentError(message: string, context?: Record<string, unknown>): ContextError {
  return new ContextError(message, "INVALID_ARGUMENT", context);
}

export function apiError(message: string, status?: number): ContextError {
  return new ContextError(message, "API_ERROR", { status });
}

export function validationError(message: string, field?: string): ContextError {
  return new ContextError(message, "VALIDATION_ERROR", { field });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Exit Handlers
// ============================================================================

export function exitWithError(message: string, code: number = 1): never {
  console.error(`❌ ${message}`);
  process.exit(code);
}

export function exitWithUsage(usage: string): never {
  console.error(usage);
  process.exit(1);
}

// ============================================================================
// Result Type Helpers
// ============================================================================

export type Result<T, E = ContextError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
