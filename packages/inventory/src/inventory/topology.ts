/**
 * Layer 1: Global Datastore topology discovery
 */

import { getErrorMessage } from "../aws/errors.js";
import type { CacheControlPlane } from "../aws/types.js";
import { getLogger } from "../logger.js";
import type { TopologyEntry, TopologyMap } from "./types.js";

const logger = getLogger("topology");

/**
 * Map every Global Datastore member to its region, datastore and role.
 *
 * Topology is an enhancement: any failure is logged and an empty map is
 * returned so the per-region inventory still runs.
 */
export async function resolveTopology(client: CacheControlPlane): Promise<TopologyMap> {
  logger.info("Layer 1: discovering Global Datastores");
  const topology = new Map<string, Map<string, TopologyEntry>>();

  try {
    const datastores = await client.listGlobalReplicationGroups();

    for (const datastore of datastores) {
      const globalDatastoreId = datastore.GlobalReplicationGroupId ?? "";
      if (globalDatastoreId) {
        logger.debug({ globalDatastoreId }, "Found Global Datastore");
      }

      for (const member of datastore.Members ?? []) {
        const groupId = member.ReplicationGroupId;
        const region = member.ReplicationGroupRegion;
        const role = member.Role;
        if (!groupId || !region || !role) {
          continue;
        }

        let regionMembers = topology.get(region);
        if (!regionMembers) {
          regionMembers = new Map();
          topology.set(region, regionMembers);
        }
        regionMembers.set(groupId, { globalDatastoreId, role: role.toUpperCase() });
        logger.debug({ groupId, role, region }, "Found Global Datastore member");
      }
    }
  } catch (error) {
    logger.warn({ err: error }, `Failed to query Global Datastores: ${getErrorMessage(error)}`);
    return new Map();
  }

  const memberCount = [...topology.values()].reduce((sum, members) => sum + members.size, 0);
  logger.info(
    `Found ${memberCount} Global Datastore members across ${topology.size} regions`
  );
  return topology;
}

/**
 * Look up a replication group's membership in the region it was found in
 */
export function lookupTopology(
  topology: TopologyMap,
  region: string,
  groupId: string
): TopologyEntry | undefined {
  return topology.get(region)?.get(groupId);
}
