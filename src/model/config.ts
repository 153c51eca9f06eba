/**
 * ServerConfig: identity and descriptive attributes of one relay server
 */

import { z } from "zod";
import { conflictingIdError, nameMismatchError, validationError } from "../utils/errors";
import { type ColumnIndex, readCell } from "./columns";

export interface ServerConfigFields {
  name: string;
  ip: string | null;
  countryCode: string;
  countryName: string;
  logType: string;
  operatorName: string;
  operatorMessage: string;
  configBlob: string;
  id: number | null;
}

/** Feed heading → config field */
export const CONFIG_COLUMNS = {
  HostName: "name",
  IP: "ip",
  CountryShort: "countryCode",
  CountryLong: "countryName",
  LogType: "logType",
  Operator: "operatorName",
  Message: "operatorMessage",
  OpenVPN_ConfigData_Base64: "configBlob",
} as const satisfies Record<string, keyof ServerConfigFields>;

const TEXT_FIELDS = [
  "countryCode",
  "countryName",
  "logType",
  "operatorName",
  "operatorMessage",
  "configBlob",
] as const;

const IpAddress = z.string().ip();

/**
 * Canonical text of an IPv4/IPv6 address, or null when it does not parse.
 * IPv6 is lowercased and zero runs compressed, so `0:0:0:0:0:0:0:1` is `::1`.
 */
export function normalizeIp(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const parsed = IpAddress.safeParse(value.trim().toLowerCase());
  if (!parsed.success) return null;
  if (!parsed.data.includes(":")) return parsed.data;
  return canonicalIpv6(parsed.data);
}

function canonicalIpv6(address: string): string | null {
  let host: string;
  try {
    host = new URL(`http://[${address}]/`).hostname;
  } catch {
    return null;
  }
  return host.slice(1, -1);
}

export class ServerConfig implements ServerConfigFields {
  readonly name: string;
  ip: string | null;
  countryCode: string;
  countryName: string;
  logType: string;
  operatorName: string;
  operatorMessage: string;
  configBlob: string;
  id: number | null;

  constructor(fields: Omit<ServerConfigFields, "ip" | "id"> & { ip?: string | null; id?: number | null }) {
    this.name = fields.name;
    this.ip = normalizeIp(fields.ip);
    this.countryCode = fields.countryCode;
    this.countryName = fields.countryName;
    this.logType = fields.logType;
    this.operatorName = fields.operatorName;
    this.operatorMessage = fields.operatorMessage;
    this.configBlob = fields.configBlob;
    this.id = fields.id ?? null;
  }

  static fromRow(columns: ColumnIndex, row: readonly string[]): ServerConfig {
    const cell = (heading: keyof typeof CONFIG_COLUMNS) => readCell(columns, row, heading);
    const name = cell("HostName");
    if (name.length === 0) {
      throw validationError("Row has an empty HostName", "HostName");
    }
    return new ServerConfig({
      name,
      ip: cell("IP"),
      countryCode: cell("CountryShort"),
      countryName: cell("CountryLong"),
      logType: cell("LogType"),
      operatorName: cell("Operator"),
      operatorMessage: cell("Message"),
      configBlob: cell("OpenVPN_ConfigData_Base64"),
    });
  }

  /**
   * Copies every differing attribute of `other` onto this config.
   * Both checks run before anything is written, so a throw leaves this
   * config untouched.
   */
  mergeFrom(other: ServerConfig): boolean {
    if (other.name !== this.name) {
      throw nameMismatchError(this.name, other.name);
    }
    if (other.id !== null && this.id !== null && other.id !== this.id) {
      throw conflictingIdError(this.name, this.id, other.id);
    }

    let changed = false;
    if (other.id !== null && this.id === null) {
      this.id = other.id;
      changed = true;
    }
    if (other.ip !== this.ip) {
      this.ip = other.ip;
      changed = true;
    }
    for (const field of TEXT_FIELDS) {
      if (other[field] !== this[field]) {
        this[field] = other[field];
        changed = true;
      }
    }
    return changed;
  }

  clone(): ServerConfig {
    return new ServerConfig(this.toFields());
  }

  toFields(): ServerConfigFields {
    return {
      name: this.name,
      ip: this.ip,
      countryCode: this.countryCode,
      countryName: this.countryName,
      logType: this.logType,
      operatorName: this.operatorName,
      operatorMessage: this.operatorMessage,
      configBlob: this.configBlob,
      id: this.id,
    };
  }
}
