/**
 * Validation utilities using Zod
 * Type-safe parsing of CLI arguments
 */

import { z } from "zod";
import { parseArgs } from "node:util";
import { validationError } from "./errors";

// ============================================================================
// Reusable Schema Components
// ============================================================================

export const NonEmptyString = z.string().min(1);
export const OptionalString = z.string().optional();
export const NonNegativeInt = z.coerce.number().int().nonnegative();

// ============================================================================
// Command Schemas
// ============================================================================

export const InitInput = z.object({
  force: z.boolean().default(false),
});

export type InitInput = z.infer<typeof InitInput>;

export const SyncInput = z
  .object({
    file: OptionalString,
    url: z.string().url().optional(),
    dryRun: z.boolean().default(false),
  })
  .refine((input) => !(input.file && input.url), {
    message: "Use either --file or --url, not both",
    path: ["file"],
  });

export type SyncInput = z.infer<typeof SyncInput>;

export const ShowInput = z.object({
  name: NonEmptyString,
});

export type ShowInput = z.infer<typeof ShowInput>;

export const ProbeInput = z.object({
  name: NonEmptyString,
  ping: NonNegativeInt,
  speed: NonNegativeInt,
});

export type ProbeInput = z.infer<typeof ProbeInput>;

export const ExportInput = z
  .object({
    name: OptionalString,
    all: z.boolean().default(false),
    dir: NonEmptyString.default("."),
  })
  .refine((input) => Boolean(input.name) !== input.all, {
    message: "Give a server name or --all, not both",
    path: ["name"],
  });

export type ExportInput = z.infer<typeof ExportInput>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Parse with a schema, turning the first issue into a VALIDATION_ERROR
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw validationError(issue ? `${field ? `${field}: ` : ""}${issue.message}` : "Invalid input", field);
  }
  return result.data;
}

// ============================================================================
// Argument Parsers
// ============================================================================

export function parseInitArgs(args: string[]): InitInput {
  const { values } = parseArgs({
    args,
    options: {
      force: { type: "boolean", default: false },
    },
  });
  return validate(InitInput, values);
}

export function parseSyncArgs(args: string[]): SyncInput {
  const { values } = parseArgs({
    args,
    options: {
      file: { type: "string" },
      url: { type: "string" },
      "dry-run": { type: "boolean", default: false },
    },
  });
  return validate(SyncInput, {
    file: values.file,
    url: values.url,
    dryRun: values["dry-run"],
  });
}

export function parseShowArgs(args: string[]): ShowInput {
  const { positionals } = parseArgs({ args, allowPositionals: true });
  return validate(ShowInput, { name: positionals[0] });
}

export function parseProbeArgs(args: string[]): ProbeInput {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ping: { type: "string" },
      speed: { type: "string" },
    },
    allowPositionals: true,
  });
  return validate(ProbeInput, {
    name: positionals[0],
    ping: values.ping,
    speed: values.speed,
  });
}

export function parseExportArgs(args: string[]): ExportInput {
  const { values, positionals } = parseArgs({
    args,
    options: {
      all: { type: "boolean", default: false },
      dir: { type: "string" },
    },
    allowPositionals: true,
  });
  return validate(ExportInput, {
    name: positionals[0],
    all: values.all,
    dir: values.dir,
  });
}
