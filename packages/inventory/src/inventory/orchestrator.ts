/**
 * Region fan-out orchestration
 *
 * Resolves the Global Datastore topology once, queries the home region and
 * every linked region concurrently, isolates per-region failures, and
 * returns the merged records sorted by region.
 */

import { getErrorMessage } from "../aws/errors.js";
import type { CacheControlPlane, ClientFactory } from "../aws/types.js";
import { CACHE_CLUSTER_ENGINES, type Engine, REPLICATION_GROUP_ENGINES } from "../constants.js";
import { getLogger } from "../logger.js";
import { defaultConcurrency, parallelLimit } from "./concurrency.js";
import { enrichReplicationGroup } from "./enrich.js";
import { listReplicationGroups, listStandaloneClusters } from "./enumerate.js";
import { normalizeRecord } from "./normalize.js";
import { type ParameterCache, SlowLogParameterCache } from "./parameter-cache.js";
import { resolveTopology } from "./topology.js";
import type {
  ClusterRecord,
  InventoryResult,
  ProgressListener,
  RegionOutcome,
  TopologyMap,
} from "./types.js";

const logger = getLogger("orchestrator");

/**
 * Options for collecting an inventory
 */
export interface CollectInventoryOptions {
  /** Home region; always queried */
  region: string;
  engines: readonly Engine[];
  /** Shell-style wildcard on group/cluster ids */
  clusterFilter?: string;
  /** Builds one client per region task */
  clientFactory: ClientFactory;
  /** Shared by all region tasks; a fresh cache per run when omitted */
  parameterCache?: ParameterCache;
  /** Max regions queried at once (default: available parallelism) */
  concurrency?: number;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

/**
 * Everything one region task needs; the client is owned by the task
 */
interface RegionQuery {
  client: CacheControlPlane;
  engines: readonly Engine[];
  clusterFilter?: string;
  topology: TopologyMap;
  parameterCache: ParameterCache;
}

/**
 * Run enumerate -> enrich -> normalize for one region
 */
export async function queryRegion(query: RegionQuery): Promise<ClusterRecord[]> {
  const { client, engines, clusterFilter, topology, parameterCache } = query;
  const region = client.region;
  const records: ClusterRecord[] = [];

  const groupEngines = engines.filter((e) => REPLICATION_GROUP_ENGINES.includes(e));
  if (groupEngines.length > 0) {
    const groups = await listReplicationGroups(client, {
      engines: groupEngines,
      nameFilter: clusterFilter,
    });
    for (const group of groups) {
      const enrichment = await enrichReplicationGroup(client, group, parameterCache);
      // Groups listed without an engine are only settled here
      if (!groupEngines.some((engine) => engine === enrichment.engine.toLowerCase())) {
        logger.debug(
          { region, groupId: group.ReplicationGroupId, engine: enrichment.engine },
          "Skipping replication group of an unrequested engine"
        );
        continue;
      }
      records.push(normalizeRecord({ kind: "replication-group", group, enrichment }, topology, region));
    }
  }

  const clusterEngines = engines.filter((e) => CACHE_CLUSTER_ENGINES.includes(e));
  if (clusterEngines.length > 0) {
    const clusters = await listStandaloneClusters(client, {
      engines: clusterEngines,
      nameFilter: clusterFilter,
    });
    for (const cluster of clusters) {
      records.push(normalizeRecord({ kind: "cache-cluster", cluster }, topology, region));
    }
  }

  return records;
}

/**
 * Home region plus every region holding a Global Datastore member, sorted
 */
export function regionsToQuery(homeRegion: string, topology: TopologyMap): string[] {
  return [...new Set([homeRegion, ...topology.keys()])].sort();
}

function compareRegions(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Collect the inventory of the home region and all linked regions.
 *
 * Only a credentials failure on the home region is fatal. Any other
 * regional failure is logged, reported in `regions`, and excluded from
 * `records`.
 */
export async function collectInventory(options: CollectInventoryOptions): Promise<InventoryResult> {
  const { region: homeRegion, engines, clusterFilter, clientFactory, onProgress, signal } = options;
  const parameterCache = options.parameterCache ?? new SlowLogParameterCache();
  logger.info({ region: homeRegion, engines, clusterFilter }, "Starting ElastiCache inventory");

  const homeClient = clientFactory(homeRegion);
  await homeClient.verifyCredentials();
  const topology = await resolveTopology(homeClient);

  const regions = regionsToQuery(homeRegion, topology);
  logger.info({ regions }, `Regions to query: ${regions.join(", ")}`);

  const records: ClusterRecord[] = [];
  const outcomes: RegionOutcome[] = [];

  await parallelLimit(
    regions,
    async (region) => {
      onProgress?.({ type: "region-started", region });
      try {
        signal?.throwIfAborted();
        const client = clientFactory(region);
        const found = await queryRegion({ client, engines, clusterFilter, topology, parameterCache });

        records.push(...found);
        outcomes.push({ region, status: "succeeded", clusterCount: found.length });
        logger.info({ region }, `Query completed, found ${found.length} clusters`);
        onProgress?.({ type: "region-completed", region, clusterCount: found.length });
      } catch (error) {
        const message = getErrorMessage(error);
        outcomes.push({ region, status: "failed", clusterCount: 0, error: message });
        logger.warn({ region, err: error }, `${region} query failed: ${message}`);
        onProgress?.({ type: "region-failed", region, error: message });
      }
    },
    options.concurrency ?? defaultConcurrency()
  );

  // Stable: discovery order within a region is kept
  records.sort((a, b) => compareRegions(a.region, b.region));
  outcomes.sort((a, b) => compareRegions(a.region, b.region));

  logger.info(
    `Inventory completed: ${records.length} clusters found across ${regions.length} regions`
  );
  return { records, regions: outcomes };
}
