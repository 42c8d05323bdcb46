/**
 * Report columns: a token-keyed accessor table over ClusterRecord, and
 * parsing of the user's field and engine selections.
 */

import { ConfigError } from "../config/errors.js";
import { ENGINES, type Engine } from "../constants.js";
import type { ClusterRecord } from "../inventory/types.js";

export const FIELD_TOKENS = [
  "region",
  "type",
  "name",
  "role",
  "node-type",
  "engine-version",
  "cluster-mode",
  "shards",
  "nodes",
  "multi-az",
  "auto-failover",
  "encryption-transit",
  "encryption-rest",
  "slow-logs",
  "engine-logs",
  "maintenance-window",
  "auto-upgrade",
  "backup",
] as const;

export type FieldToken = (typeof FIELD_TOKENS)[number];

export type ColumnAlignment = "left" | "right";

export interface FieldDefinition {
  /** Title-cased column header */
  header: string;
  align: ColumnAlignment;
  get(record: ClusterRecord): string | number;
}

/** "node-type" -> "Node Type" */
function toHeader(token: string): string {
  return token
    .split("-")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function text(get: (record: ClusterRecord) => string, token: FieldToken): FieldDefinition {
  return { header: toHeader(token), align: "left", get };
}

function numeric(get: (record: ClusterRecord) => number, token: FieldToken): FieldDefinition {
  return { header: toHeader(token), align: "right", get };
}

export const FIELD_DEFINITIONS: Readonly<Record<FieldToken, FieldDefinition>> = {
  region: text((r) => r.region, "region"),
  type: text((r) => r.engineType, "type"),
  name: text((r) => r.name, "name"),
  role: text((r) => r.role, "role"),
  "node-type": text((r) => r.nodeType, "node-type"),
  "engine-version": text((r) => r.engineVersion, "engine-version"),
  "cluster-mode": text((r) => r.clusterMode, "cluster-mode"),
  shards: numeric((r) => r.shardCount, "shards"),
  nodes: numeric((r) => r.nodeCount, "nodes"),
  "multi-az": text((r) => r.multiAz, "multi-az"),
  "auto-failover": text((r) => r.autoFailover, "auto-failover"),
  "encryption-transit": text((r) => r.encryptionTransit, "encryption-transit"),
  "encryption-rest": text((r) => r.encryptionRest, "encryption-rest"),
  "slow-logs": text((r) => r.slowLogs, "slow-logs"),
  "engine-logs": text((r) => r.engineLogs, "engine-logs"),
  "maintenance-window": text((r) => r.maintenanceWindow, "maintenance-window"),
  "auto-upgrade": text((r) => r.autoUpgrade, "auto-upgrade"),
  backup: text((r) => r.backup, "backup"),
};

export function isFieldToken(value: string): value is FieldToken {
  return FIELD_TOKENS.some((token) => token === value);
}

export function isEngine(value: string): value is Engine {
  return ENGINES.some((engine) => engine === value);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Parse a comma-separated field list, or "all" for every field in table order
 */
export function parseFieldList(value: string | readonly string[]): FieldToken[] {
  const requested = typeof value === "string" ? splitList(value) : value.map((v) => v.trim().toLowerCase());
  if (requested.length === 1 && requested[0] === "all") {
    return [...FIELD_TOKENS];
  }

  const invalid = requested.filter((field) => !isFieldToken(field));
  if (invalid.length > 0 || requested.length === 0) {
    throw new ConfigError(
      `Invalid field names: ${invalid.join(", ") || "(none given)"}. Valid fields: ${FIELD_TOKENS.join(", ")}`
    );
  }
  return requested.filter(isFieldToken);
}

/**
 * Parse a comma-separated engine list
 */
export function parseEngineList(value: string | readonly string[]): Engine[] {
  const requested = typeof value === "string" ? splitList(value) : value.map((v) => v.trim().toLowerCase());

  const invalid = requested.filter((engine) => !isEngine(engine));
  if (invalid.length > 0 || requested.length === 0) {
    throw new ConfigError(
      `Invalid engine types: ${invalid.join(", ") || "(none given)"}. Valid engines: ${ENGINES.join(", ")}`
    );
  }
  return requested.filter(isEngine);
}
