/**
 * Layers 3b/4: replication group enrichment from member cluster detail and
 * parameter groups
 */

import { getErrorMessage, isAbortError } from "../aws/errors.js";
import type {
  CacheClusterRecord,
  CacheControlPlane,
  LogDeliveryRecord,
  ReplicationGroupRecord,
} from "../aws/types.js";
import { SLOW_LOG_DEFAULTS } from "../constants.js";
import { getLogger } from "../logger.js";
import { formatSlowLogs } from "./formatters.js";
import type { ParameterCache } from "./parameter-cache.js";
import type { ReplicationGroupEnrichment } from "./types.js";

const logger = getLogger("enrich");

/** Engine assumed for a replication group when no record names one */
const DEFAULT_REPLICATION_GROUP_ENGINE = "redis";

export type LogType = "slow-log" | "engine-log";

/**
 * True when a log delivery entry of the given type has a destination
 */
export function isLogDeliveryActive(
  configurations: readonly LogDeliveryRecord[] | undefined,
  logType: LogType
): boolean {
  return (configurations ?? []).some(
    (config) =>
      config.LogType === logType &&
      config.DestinationDetails !== undefined &&
      Object.keys(config.DestinationDetails).length > 0
  );
}

/**
 * Fetch the first member cluster's detail record.
 * A failed lookup is logged and treated as "no detail"; cancellation is not.
 */
export async function fetchMemberDetail(
  client: CacheControlPlane,
  group: ReplicationGroupRecord
): Promise<CacheClusterRecord | undefined> {
  const memberId = group.MemberClusters?.[0];
  if (!memberId) {
    return undefined;
  }

  try {
    return await client.describeCacheCluster(memberId);
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    logger.warn(
      { region: client.region, groupId: group.ReplicationGroupId, memberId, err: error },
      `Failed to describe member cluster ${memberId}: ${getErrorMessage(error)}`
    );
    return undefined;
  }
}

/**
 * Resolve the slow log summary for a replication group.
 * Parameters are only consulted when slow log delivery is active.
 */
export async function resolveSlowLogs(
  client: CacheControlPlane,
  group: ReplicationGroupRecord,
  detail: CacheClusterRecord | undefined,
  parameterCache: ParameterCache
): Promise<string> {
  const groupId = group.ReplicationGroupId;
  if (!isLogDeliveryActive(group.LogDeliveryConfigurations, "slow-log")) {
    logger.debug({ groupId }, "Slow logs disabled (no log delivery configuration)");
    return "Disabled";
  }

  const parameterGroupName =
    detail?.CacheParameterGroup?.CacheParameterGroupName ??
    group.CacheParameterGroup?.CacheParameterGroupName;

  if (!parameterGroupName) {
    logger.debug({ groupId }, "No parameter group found but delivery enabled, assuming defaults");
    return formatSlowLogs(SLOW_LOG_DEFAULTS.slowerThan, SLOW_LOG_DEFAULTS.maxLength);
  }

  const params = await parameterCache.resolve(parameterGroupName, {
    region: client.region,
    listParameters: (name) => client.listCacheParameters(name),
  });
  return formatSlowLogs(params.slowerThan, params.maxLength);
}

/**
 * Gather the engine, version, maintenance window and slow log summary of a
 * replication group. Detail-record values win over the group record's own.
 */
export async function enrichReplicationGroup(
  client: CacheControlPlane,
  group: ReplicationGroupRecord,
  parameterCache: ParameterCache
): Promise<ReplicationGroupEnrichment> {
  const detail = await fetchMemberDetail(client, group);
  const source = detail ? "member cluster" : "replication group";

  const engine = detail?.Engine ?? group.Engine ?? DEFAULT_REPLICATION_GROUP_ENGINE;
  const engineVersion = (detail ? detail.EngineVersion : group.EngineVersion) ?? "";
  const maintenanceWindow =
    (detail ? detail.PreferredMaintenanceWindow : group.PreferredMaintenanceWindow) ?? "";
  logger.debug(
    { groupId: group.ReplicationGroupId, engine, engineVersion, maintenanceWindow },
    `Engine details from ${source}`
  );

  const slowLogs = await resolveSlowLogs(client, group, detail, parameterCache);
  return { engine, engineVersion, maintenanceWindow, slowLogs };
}
