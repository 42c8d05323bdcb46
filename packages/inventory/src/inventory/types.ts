/**
 * Type definitions for the inventory pipeline
 */

import type { CacheClusterRecord, ReplicationGroupRecord } from "../aws/types.js";

/** Global Datastore role as reported by the API, upper-cased */
export type GlobalRole = "PRIMARY" | "SECONDARY" | (string & {});

export interface TopologyEntry {
  globalDatastoreId: string;
  role: GlobalRole;
}

/**
 * region -> replication group id -> Global Datastore membership.
 * Absence means the group is not part of a Global Datastore.
 */
export type TopologyMap = ReadonlyMap<string, ReadonlyMap<string, TopologyEntry>>;

export type ClusterRole = "Primary" | "Secondary" | "";

export type ClusterMode = "Enabled" | "Disabled" | "N/A";

/**
 * One inventory row. Every field is fully resolved at construction.
 */
export type ClusterRecord = Readonly<{
  /** Region the cluster was found in */
  region: string;
  engineType: string;
  name: string;
  role: ClusterRole;
  nodeType: string;
  engineVersion: string;
  clusterMode: ClusterMode;
  shardCount: number;
  nodeCount: number;
  multiAz: string;
  autoFailover: string;
  encryptionTransit: string;
  encryptionRest: string;
  slowLogs: string;
  engineLogs: string;
  maintenanceWindow: string;
  autoUpgrade: string;
  backup: string;
}>;

/** Resolved slow log parameter values; null when unknown */
export interface SlowLogParameters {
  slowerThan: number | null;
  maxLength: number | null;
}

/**
 * Values fetched for a replication group beyond its own record
 */
export interface ReplicationGroupEnrichment {
  engine: string;
  engineVersion: string;
  maintenanceWindow: string;
  slowLogs: string;
}

/** Input to the normalizer, one variant per source record kind */
export type ClusterSource =
  | {
      kind: "replication-group";
      group: ReplicationGroupRecord;
      enrichment: ReplicationGroupEnrichment;
    }
  | {
      kind: "cache-cluster";
      cluster: CacheClusterRecord;
    };

export type RegionStatus = "succeeded" | "failed";

/**
 * Per-region result summary
 */
export interface RegionOutcome {
  region: string;
  status: RegionStatus;
  clusterCount: number;
  error?: string;
}

export interface InventoryResult {
  /** Sorted by region; discovery order within a region */
  records: ClusterRecord[];
  /** Sorted by region */
  regions: RegionOutcome[];
}

export type ProgressEvent =
  | { type: "region-started"; region: string }
  | { type: "region-completed"; region: string; clusterCount: number }
  | { type: "region-failed"; region: string; error: string };

/** Progress sink; may be called from any region task */
export type ProgressListener = (event: ProgressEvent) => void;
