/**
 * Region-bound ElastiCache client
 *
 * Supports:
 * - Global Datastores (with member enrollment)
 * - Replication groups
 * - Cache clusters (with node detail)
 * - Cache parameter groups
 */

import {
  DescribeCacheClustersCommand,
  DescribeCacheParametersCommand,
  DescribeGlobalReplicationGroupsCommand,
  DescribeReplicationGroupsCommand,
  type ElastiCacheClient,
} from "@aws-sdk/client-elasticache";
import type { AwsCredentialIdentityProvider } from "@smithy/types";

import { getLogger } from "../logger.js";
import { CredentialsError } from "./errors.js";
import { type CallContext, type RetryConfig, withAwsErrorHandling } from "./retry.js";
import type {
  CacheClusterRecord,
  CacheControlPlane,
  CacheParameterRecord,
  GlobalReplicationGroupRecord,
  ReplicationGroupRecord,
} from "./types.js";

const logger = getLogger("aws");

export interface RegionClientOptions {
  region: string;
  client: ElastiCacheClient;
  credentials: AwsCredentialIdentityProvider;
  retry?: RetryConfig;
  /** Checked before every page request */
  signal?: AbortSignal;
}

interface Page<T> {
  Marker?: string;
  items?: T[];
}

export class ElastiCacheRegionClient implements CacheControlPlane {
  readonly region: string;
  private readonly client: ElastiCacheClient;
  private readonly credentials: AwsCredentialIdentityProvider;
  private readonly retry?: RetryConfig;
  private readonly signal?: AbortSignal;

  constructor(options: RegionClientOptions) {
    this.region = options.region;
    this.client = options.client;
    this.credentials = options.credentials;
    this.retry = options.retry;
    this.signal = options.signal;
  }

  /**
   * Resolve the credential provider once, failing with CredentialsError
   */
  async verifyCredentials(): Promise<void> {
    try {
      await this.credentials();
    } catch (error) {
      throw new CredentialsError(error);
    }
  }

  /**
   * Layer 1: Global Datastores.
   * ShowMemberInfo must be set or the API returns empty member lists.
   */
  listGlobalReplicationGroups(): Promise<GlobalReplicationGroupRecord[]> {
    return this.collectPages("DescribeGlobalReplicationGroups", async (Marker) => {
      const page = await this.client.send(
        new DescribeGlobalReplicationGroupsCommand({ ShowMemberInfo: true, Marker })
      );
      return { Marker: page.Marker, items: page.GlobalReplicationGroups };
    });
  }

  /** Layer 2: replication groups */
  listReplicationGroups(): Promise<ReplicationGroupRecord[]> {
    return this.collectPages("DescribeReplicationGroups", async (Marker) => {
      const page = await this.client.send(new DescribeReplicationGroupsCommand({ Marker }));
      return { Marker: page.Marker, items: page.ReplicationGroups };
    });
  }

  /** Layer 3: cache clusters with node-level detail */
  listCacheClusters(): Promise<CacheClusterRecord[]> {
    return this.collectPages("DescribeCacheClusters", async (Marker) => {
      const page = await this.client.send(
        new DescribeCacheClustersCommand({ ShowCacheNodeInfo: true, Marker })
      );
      return { Marker: page.Marker, items: page.CacheClusters };
    });
  }

  /** Layer 3b: a single cluster's full detail record */
  async describeCacheCluster(cacheClusterId: string): Promise<CacheClusterRecord | undefined> {
    this.signal?.throwIfAborted();
    const response = await withAwsErrorHandling(
      () => this.client.send(new DescribeCacheClustersCommand({ CacheClusterId: cacheClusterId })),
      this.context("DescribeCacheClusters", { name: "CacheClusterId", value: cacheClusterId })
    );
    return response.CacheClusters?.[0];
  }

  /** Layer 4: parameters of a cache parameter group */
  listCacheParameters(parameterGroupName: string): Promise<CacheParameterRecord[]> {
    return this.collectPages(
      "DescribeCacheParameters",
      async (Marker) => {
        const page = await this.client.send(
          new DescribeCacheParametersCommand({
            CacheParameterGroupName: parameterGroupName,
            Marker,
          })
        );
        return { Marker: page.Marker, items: page.Parameters };
      },
      { name: "CacheParameterGroupName", value: parameterGroupName }
    );
  }

  private context(operation: string, parameter?: CallContext["parameter"]): CallContext {
    return { operation, region: this.region, parameter, retry: this.retry };
  }

  private async collectPages<T>(
    operation: string,
    fetchPage: (marker: string | undefined) => Promise<Page<T>>,
    parameter?: CallContext["parameter"]
  ): Promise<T[]> {
    const items: T[] = [];
    let marker: string | undefined;
    let pages = 0;

    do {
      this.signal?.throwIfAborted();
      const currentMarker = marker;
      const page = await withAwsErrorHandling(
        () => fetchPage(currentMarker),
        this.context(operation, parameter)
      );
      items.push(...(page.items ?? []));
      marker = page.Marker;
      pages++;
    } while (marker);

    logger.debug({ region: this.region, operation, pages, items: items.length }, "Paged to exhaustion");
    return items;
  }
}
