import { vi } from "vitest";

import type {
  CacheClusterRecord,
  CacheControlPlane,
  CacheParameterRecord,
  GlobalReplicationGroupRecord,
  ReplicationGroupRecord,
} from "../../src/aws/types.js";

export interface FakeRegionData {
  globalDatastores?: GlobalReplicationGroupRecord[];
  replicationGroups?: ReplicationGroupRecord[];
  cacheClusters?: CacheClusterRecord[];
  /** describeCacheCluster results by cluster id */
  clusterDetails?: Record<string, CacheClusterRecord>;
  /** listCacheParameters results by parameter group name */
  parameters?: Record<string, CacheParameterRecord[]>;
  /** Rejects the replication group and cache cluster listings */
  failWith?: Error;
}

/**
 * In-process CacheControlPlane over canned data; every method is a spy
 */
export function createFakeControlPlane(region: string, data: FakeRegionData = {}) {
  const fail = <T>(value: T): Promise<T> =>
    data.failWith ? Promise.reject(data.failWith) : Promise.resolve(value);

  return {
    region,
    verifyCredentials: vi.fn((): Promise<void> => Promise.resolve()),
    listGlobalReplicationGroups: vi.fn(
      (): Promise<GlobalReplicationGroupRecord[]> => Promise.resolve(data.globalDatastores ?? [])
    ),
    listReplicationGroups: vi.fn(
      (): Promise<ReplicationGroupRecord[]> => fail(data.replicationGroups ?? [])
    ),
    listCacheClusters: vi.fn((): Promise<CacheClusterRecord[]> => fail(data.cacheClusters ?? [])),
    describeCacheCluster: vi.fn(
      (id: string): Promise<CacheClusterRecord | undefined> =>
        Promise.resolve(data.clusterDetails?.[id])
    ),
    listCacheParameters: vi.fn(
      (name: string): Promise<CacheParameterRecord[]> => Promise.resolve(data.parameters?.[name] ?? [])
    ),
  } satisfies CacheControlPlane;
}

export type FakeControlPlane = ReturnType<typeof createFakeControlPlane>;
