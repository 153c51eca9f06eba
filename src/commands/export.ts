/**
 * Export command
 * Writes each server's OpenVPN profile (the feed's base64 config blob) to <name>.ovpn
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { z } from "zod";
import type { PersistenceGateway } from "../database/gateway";
import { createLogger } from "../lib/logger";
import type { Server } from "../model";
import { invalidArgumentError } from "../utils/errors";
import { outputSuccess } from "../utils/format";
import { parseExportArgs } from "../utils/validation";

const log = createLogger("export");

const Base64Blob = z.string().min(1).base64();

export interface ExportedProfile {
  name: string;
  path: string;
  bytes: number;
}

export interface SkippedProfile {
  name: string;
  reason: string;
}

export interface ExportReport {
  written: ExportedProfile[];
  skipped: SkippedProfile[];
}

/** Decoded profile bytes, or the reason the server has none */
export function decodeProfile(server: Server): Buffer | string {
  if (basename(server.name) !== server.name || server.name.startsWith(".")) {
    return `name '${server.name}' cannot be used as a file name`;
  }
  const blob = Base64Blob.safeParse(server.config.configBlob);
  if (!blob.success) {
    return server.config.configBlob ? "config data is not valid base64" : "no config data";
  }
  return Buffer.from(blob.data, "base64");
}

/**
 * Write profiles for one named server or for every stored server.
 * Servers whose blob does not decode are reported and skipped.
 */
export async function exportProfiles(gateway: PersistenceGateway, args: string[]): Promise<ExportReport> {
  const input = parseExportArgs(args);

  let servers: Server[];
  if (input.name) {
    const server = await gateway.readByName(input.name);
    if (!server) {
      throw invalidArgumentError(`Server '${input.name}' not found`, { server: input.name });
    }
    servers = [server];
  } else {
    servers = await gateway.readAll();
  }

  mkdirSync(input.dir, { recursive: true });

  const report: ExportReport = { written: [], skipped: [] };
  for (const server of servers) {
    const profile = decodeProfile(server);
    if (typeof profile === "string") {
      log.warn("Skipping profile export", { server: server.name, reason: profile });
      report.skipped.push({ name: server.name, reason: profile });
      continue;
    }

    const path = join(input.dir, `${server.name}.ovpn`);
    writeFileSync(path, profile);
    report.written.push({ name: server.name, path, bytes: profile.length });
  }

  console.error(`✅ Exported ${report.written.length} profile(s) to ${input.dir}`);
  for (const skip of report.skipped) {
    console.error(`   ⚠️  ${skip.name}: ${skip.reason}`);
  }
  outputSuccess({ ...report });
  return report;
}
