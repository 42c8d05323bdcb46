/**
 * Merge a raw replication group or cache cluster, plus topology and
 * enrichment context, into one ClusterRecord.
 */

import type { CacheClusterRecord, ReplicationGroupRecord } from "../aws/types.js";
import { isLogDeliveryActive } from "./enrich.js";
import {
  NOT_APPLICABLE,
  capitalize,
  formatBackup,
  formatClusterName,
  formatEnabledDisabled,
  formatMaintenanceWindow,
} from "./formatters.js";
import { lookupTopology } from "./topology.js";
import type {
  ClusterRecord,
  ClusterRole,
  ClusterSource,
  ReplicationGroupEnrichment,
  TopologyMap,
} from "./types.js";

/**
 * "enabled" (exact) -> true, any other value -> false, absent -> unknown
 */
function statusFlag(status: string | undefined): boolean | undefined {
  return status ? status === "enabled" : undefined;
}

function toClusterRole(role: string | undefined): ClusterRole {
  switch (role?.toUpperCase()) {
    case "PRIMARY":
      return "Primary";
    case "SECONDARY":
      return "Secondary";
    default:
      return "";
  }
}

function normalizeReplicationGroup(
  group: ReplicationGroupRecord,
  enrichment: ReplicationGroupEnrichment,
  topology: TopologyMap,
  region: string
): ClusterRecord {
  const groupId = group.ReplicationGroupId ?? "";
  const membership = lookupTopology(topology, region, groupId);
  const nodeGroups = group.NodeGroups ?? [];

  return {
    region,
    engineType: capitalize(enrichment.engine),
    name: formatClusterName(membership?.globalDatastoreId, groupId),
    role: toClusterRole(membership?.role),
    nodeType: group.CacheNodeType ?? "",
    engineVersion: enrichment.engineVersion,
    clusterMode: group.ClusterEnabled ? "Enabled" : "Disabled",
    shardCount: nodeGroups.length,
    nodeCount: nodeGroups.reduce((sum, ng) => sum + (ng.NodeGroupMembers?.length ?? 0), 0),
    multiAz: formatEnabledDisabled(statusFlag(group.MultiAZ)),
    autoFailover: formatEnabledDisabled(statusFlag(group.AutomaticFailover)),
    encryptionTransit: formatEnabledDisabled(group.TransitEncryptionEnabled),
    encryptionRest: formatEnabledDisabled(group.AtRestEncryptionEnabled),
    slowLogs: enrichment.slowLogs,
    engineLogs: isLogDeliveryActive(group.LogDeliveryConfigurations, "engine-log")
      ? "Enabled"
      : "Disabled",
    maintenanceWindow: formatMaintenanceWindow(enrichment.maintenanceWindow),
    autoUpgrade: formatEnabledDisabled(group.AutoMinorVersionUpgrade),
    backup: formatBackup(group.SnapshotWindow, group.SnapshotRetentionLimit),
  };
}

/**
 * Standalone clusters have no replication, encryption, log delivery or
 * backup support; those fields are N/A.
 */
function normalizeCacheCluster(cluster: CacheClusterRecord, region: string): ClusterRecord {
  return {
    region,
    engineType: capitalize(cluster.Engine ?? ""),
    name: cluster.CacheClusterId ?? "",
    role: "",
    nodeType: cluster.CacheNodeType ?? "",
    engineVersion: cluster.EngineVersion ?? "",
    clusterMode: NOT_APPLICABLE,
    shardCount: 0,
    nodeCount: cluster.NumCacheNodes ?? 0,
    multiAz: cluster.PreferredAvailabilityZone ? "Disabled" : NOT_APPLICABLE,
    autoFailover: NOT_APPLICABLE,
    encryptionTransit: NOT_APPLICABLE,
    encryptionRest: NOT_APPLICABLE,
    slowLogs: NOT_APPLICABLE,
    engineLogs: NOT_APPLICABLE,
    maintenanceWindow: formatMaintenanceWindow(cluster.PreferredMaintenanceWindow),
    autoUpgrade: formatEnabledDisabled(cluster.AutoMinorVersionUpgrade),
    backup: NOT_APPLICABLE,
  };
}

/**
 * Build the ClusterRecord for a source record found in `region`
 */
export function normalizeRecord(
  source: ClusterSource,
  topology: TopologyMap,
  region: string
): ClusterRecord {
  switch (source.kind) {
    case "replication-group":
      return normalizeReplicationGroup(source.group, source.enrichment, topology, region);
    case "cache-cluster":
      return normalizeCacheCluster(source.cluster, region);
  }
}
