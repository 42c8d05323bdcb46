vi.mock("@aws-sdk/client-elasticache");

import {
  DescribeCacheClustersCommand,
  DescribeCacheParametersCommand,
  DescribeGlobalReplicationGroupsCommand,
  DescribeReplicationGroupsCommand,
  ElastiCacheClient,
} from "@aws-sdk/client-elasticache";
import { describe, it, expect, vi, beforeEach } from "vitest";

import { CredentialsError, InvalidParameterError } from "../../../src/aws/errors.js";
import { ElastiCacheRegionClient } from "../../../src/aws/region-client.js";

const mockSend = vi.fn();
vi.mocked(ElastiCacheClient).mockImplementation(
  () => ({ send: mockSend }) as unknown as ElastiCacheClient
);

const credentials = vi.fn().mockResolvedValue({
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
});

beforeEach(() => vi.clearAllMocks());

function createClient(signal?: AbortSignal): ElastiCacheRegionClient {
  return new ElastiCacheRegionClient({
    region: "us-east-1",
    client: new ElastiCacheClient({}),
    credentials,
    retry: { baseDelayMs: 0 },
    signal,
  });
}

describe("ElastiCacheRegionClient", () => {
  describe("verifyCredentials", () => {
    it("resolves when the provider returns credentials", async () => {
      credentials.mockResolvedValueOnce({ accessKeyId: "a", secretAccessKey: "b" });
      await expect(createClient().verifyCredentials()).resolves.toBeUndefined();
    });

    it("wraps provider failures in CredentialsError", async () => {
      credentials.mockRejectedValueOnce(new Error("Could not load credentials"));
      await expect(createClient().verifyCredentials()).rejects.toBeInstanceOf(CredentialsError);
    });
  });

  describe("listReplicationGroups", () => {
    it("follows Marker until the last page", async () => {
      mockSend
        .mockResolvedValueOnce({ ReplicationGroups: [{ ReplicationGroupId: "rg-1" }], Marker: "m1" })
        .mockResolvedValueOnce({ ReplicationGroups: [{ ReplicationGroupId: "rg-2" }], Marker: "m2" })
        .mockResolvedValueOnce({ ReplicationGroups: [{ ReplicationGroupId: "rg-3" }] });

      const groups = await createClient().listReplicationGroups();

      expect(groups.map((g) => g.ReplicationGroupId)).toEqual(["rg-1", "rg-2", "rg-3"]);
      expect(vi.mocked(DescribeReplicationGroupsCommand).mock.calls).toEqual([
        [{ Marker: undefined }],
        [{ Marker: "m1" }],
        [{ Marker: "m2" }],
      ]);
    });

    it("treats a page without items as empty", async () => {
      mockSend.mockResolvedValueOnce({});
      await expect(createClient().listReplicationGroups()).resolves.toEqual([]);
    });

    it("checks the abort signal before each page", async () => {
      const controller = new AbortController();
      mockSend.mockImplementationOnce(() => {
        controller.abort();
        return Promise.resolve({ ReplicationGroups: [{ ReplicationGroupId: "rg-1" }], Marker: "m1" });
      });

      const error: unknown = await createClient(controller.signal)
        .listReplicationGroups()
        .catch((e: unknown) => e);

      expect(error).toHaveProperty("name", "AbortError");
      expect(mockSend).toHaveBeenCalledTimes(1);
    });
  });

  describe("listGlobalReplicationGroups", () => {
    it("requests member info", async () => {
      mockSend.mockResolvedValueOnce({
        GlobalReplicationGroups: [{ GlobalReplicationGroupId: "gds-1", Members: [] }],
      });

      const result = await createClient().listGlobalReplicationGroups();

      expect(result).toHaveLength(1);
      expect(vi.mocked(DescribeGlobalReplicationGroupsCommand)).toHaveBeenCalledWith({
        ShowMemberInfo: true,
        Marker: undefined,
      });
    });
  });

  describe("listCacheClusters", () => {
    it("requests node info", async () => {
      mockSend.mockResolvedValueOnce({ CacheClusters: [{ CacheClusterId: "mc-1" }] });

      const result = await createClient().listCacheClusters();

      expect(result).toEqual([{ CacheClusterId: "mc-1" }]);
      expect(vi.mocked(DescribeCacheClustersCommand)).toHaveBeenCalledWith({
        ShowCacheNodeInfo: true,
        Marker: undefined,
      });
    });
  });

  describe("describeCacheCluster", () => {
    it("returns the first cluster", async () => {
      mockSend.mockResolvedValueOnce({ CacheClusters: [{ CacheClusterId: "rg-1-001", Engine: "redis" }] });

      const result = await createClient().describeCacheCluster("rg-1-001");

      expect(result).toEqual({ CacheClusterId: "rg-1-001", Engine: "redis" });
      expect(vi.mocked(DescribeCacheClustersCommand)).toHaveBeenCalledWith({ CacheClusterId: "rg-1-001" });
    });

    it("returns undefined when nothing comes back", async () => {
      mockSend.mockResolvedValueOnce({ CacheClusters: [] });
      await expect(createClient().describeCacheCluster("missing")).resolves.toBeUndefined();
    });

    it("reports the cluster id on invalid parameter errors", async () => {
      mockSend.mockRejectedValueOnce(
        Object.assign(new Error("bad"), { name: "InvalidParameterValue", $fault: "client" })
      );

      await expect(createClient().describeCacheCluster("Bad_Id")).rejects.toThrow(
        new InvalidParameterError("CacheClusterId", "Bad_Id")
      );
    });
  });

  describe("listCacheParameters", () => {
    it("pages parameters of the named group", async () => {
      mockSend
        .mockResolvedValueOnce({
          Parameters: [{ ParameterName: "slowlog-log-slower-than", ParameterValue: "5000" }],
          Marker: "next",
        })
        .mockResolvedValueOnce({
          Parameters: [{ ParameterName: "slowlog-max-len", ParameterValue: "256" }],
        });

      const params = await createClient().listCacheParameters("custom-redis7");

      expect(params.map((p) => p.ParameterName)).toEqual(["slowlog-log-slower-than", "slowlog-max-len"]);
      expect(vi.mocked(DescribeCacheParametersCommand).mock.calls).toEqual([
        [{ CacheParameterGroupName: "custom-redis7", Marker: undefined }],
        [{ CacheParameterGroupName: "custom-redis7", Marker: "next" }],
      ]);
    });

    it("retries throttled pages", async () => {
      mockSend
        .mockRejectedValueOnce(Object.assign(new Error("slow down"), { name: "Throttling", $fault: "client" }))
        .mockResolvedValueOnce({ Parameters: [] });

      await expect(createClient().listCacheParameters("default.redis7")).resolves.toEqual([]);
      expect(mockSend).toHaveBeenCalledTimes(2);
    });
  });
});
