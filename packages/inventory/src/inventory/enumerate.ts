/**
 * Layers 2-3: replication group and standalone cache cluster enumeration
 */

import type { CacheClusterRecord, CacheControlPlane, ReplicationGroupRecord } from "../aws/types.js";
import { type Engine, REPLICATION_GROUP_ENGINES } from "../constants.js";
import { getLogger } from "../logger.js";
import { filterByName } from "../utils/wildcard.js";

const logger = getLogger("enumerate");

export interface EnumerateOptions {
  engines: readonly Engine[];
  /** Shell-style wildcard applied to the group or cluster id */
  nameFilter?: string;
}

function isRequestedEngine(engine: string | undefined, engines: readonly Engine[]): boolean {
  const normalized = engine?.toLowerCase() ?? "";
  return engines.some((requested) => requested === normalized);
}

/**
 * Layer 2: list replication groups of the requested Redis-family engines.
 * Groups whose record carries no engine are kept; their engine is settled
 * from the member cluster detail.
 */
export async function listReplicationGroups(
  client: CacheControlPlane,
  options: EnumerateOptions
): Promise<ReplicationGroupRecord[]> {
  const engines = options.engines.filter((engine) => REPLICATION_GROUP_ENGINES.includes(engine));
  logger.info({ region: client.region, engines }, "Layer 2: enumerating replication groups");
  if (engines.length === 0) {
    return [];
  }

  const groups = (await client.listReplicationGroups()).filter(
    (group) => group.Engine === undefined || isRequestedEngine(group.Engine, engines)
  );
  const matched = filterByName(groups, (group) => group.ReplicationGroupId ?? "", options.nameFilter);

  logger.info({ region: client.region }, `Found ${matched.length} replication groups`);
  return matched;
}

/**
 * Layer 3: list standalone cache clusters whose engine is exactly one of `engines`
 */
export async function listStandaloneClusters(
  client: CacheControlPlane,
  options: EnumerateOptions
): Promise<CacheClusterRecord[]> {
  logger.info({ region: client.region, engines: options.engines }, "Layer 3: enumerating cache clusters");
  if (options.engines.length === 0) {
    return [];
  }

  const clusters = (await client.listCacheClusters()).filter((cluster) =>
    isRequestedEngine(cluster.Engine, options.engines)
  );
  const matched = filterByName(clusters, (cluster) => cluster.CacheClusterId ?? "", options.nameFilter);

  logger.info({ region: client.region }, `Found ${matched.length} cache clusters`);
  return matched;
}
