import { describe, it, expect, vi } from "vitest";

import type { CacheParameterRecord } from "../../../src/aws/types.js";
import {
  extractSlowLogParameters,
  type ParameterLookup,
  SlowLogParameterCache,
} from "../../../src/inventory/parameter-cache.js";

function createLookup(region: string, parameters: CacheParameterRecord[]) {
  const listParameters = vi.fn((): Promise<CacheParameterRecord[]> => Promise.resolve(parameters));
  const lookup: ParameterLookup = { region, listParameters };
  return { lookup, listParameters };
}

describe("extractSlowLogParameters", () => {
  it("reads both slow log parameters", () => {
    expect(
      extractSlowLogParameters([
        { ParameterName: "slowlog-log-slower-than", ParameterValue: "5000" },
        { ParameterName: "slowlog-max-len", ParameterValue: "256" },
        { ParameterName: "maxmemory-policy", ParameterValue: "volatile-lru" },
      ])
    ).toEqual({ slowerThan: 5000, maxLength: 256 });
  });

  it("keeps zero as a real value", () => {
    expect(
      extractSlowLogParameters([{ ParameterName: "slowlog-log-slower-than", ParameterValue: "0" }])
    ).toEqual({ slowerThan: 0, maxLength: 128 });
  });

  it("keeps the baseline for missing, empty and unparseable values", () => {
    expect(
      extractSlowLogParameters([
        { ParameterName: "slowlog-log-slower-than", ParameterValue: "" },
        { ParameterName: "slowlog-max-len", ParameterValue: "lots" },
      ])
    ).toEqual({ slowerThan: 10000, maxLength: 128 });
  });

  it("overlays onto a given baseline", () => {
    expect(
      extractSlowLogParameters([{ ParameterName: "slowlog-max-len" }], { slowerThan: null, maxLength: null })
    ).toEqual({ slowerThan: null, maxLength: null });
  });
});

describe("SlowLogParameterCache", () => {
  it("queries once and serves later calls from the cache", async () => {
    const cache = new SlowLogParameterCache();
    const { lookup, listParameters } = createLookup("us-east-1", [
      { ParameterName: "slowlog-log-slower-than", ParameterValue: "2000" },
    ]);

    const first = await cache.resolve("custom-redis7", lookup);
    const second = await cache.resolve("custom-redis7", lookup);

    expect(first).toEqual({ slowerThan: 2000, maxLength: 128 });
    expect(second).toEqual(first);
    expect(listParameters).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it("shares one query between concurrent callers", async () => {
    const cache = new SlowLogParameterCache();
    const { lookup, listParameters } = createLookup("us-east-1", [
      { ParameterName: "slowlog-max-len", ParameterValue: "512" },
    ]);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => cache.resolve("custom-redis7", lookup))
    );

    expect(listParameters).toHaveBeenCalledTimes(1);
    expect(results).toEqual(Array(5).fill({ slowerThan: 10000, maxLength: 512 }));
  });

  it("serves a group resolved in one region to every other region", async () => {
    const cache = new SlowLogParameterCache();
    const east = createLookup("us-east-1", [{ ParameterName: "slowlog-max-len", ParameterValue: "64" }]);
    const west = createLookup("us-west-2", [{ ParameterName: "slowlog-max-len", ParameterValue: "1024" }]);

    await expect(cache.resolve("default.redis7", east.lookup)).resolves.toEqual({
      slowerThan: 10000,
      maxLength: 64,
    });
    await expect(cache.resolve("default.redis7", west.lookup)).resolves.toEqual({
      slowerThan: 10000,
      maxLength: 64,
    });
    expect(east.listParameters).toHaveBeenCalledTimes(1);
    expect(west.listParameters).not.toHaveBeenCalled();
    expect(cache.size).toBe(1);
  });

  it("propagates cancellation instead of falling back to defaults", async () => {
    const cache = new SlowLogParameterCache();
    const abort = Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    const lookup: ParameterLookup = {
      region: "us-east-1",
      listParameters: vi.fn<(name: string) => Promise<CacheParameterRecord[]>>().mockRejectedValue(abort),
    };

    await expect(cache.resolve("default.redis7", lookup)).rejects.toBe(abort);
    expect(cache.size).toBe(0);
  });

  it("returns defaults without caching when the query fails", async () => {
    const cache = new SlowLogParameterCache();
    const listParameters = vi
      .fn<(name: string) => Promise<CacheParameterRecord[]>>()
      .mockRejectedValueOnce(new Error("throttled"))
      .mockResolvedValueOnce([{ ParameterName: "slowlog-log-slower-than", ParameterValue: "1" }]);
    const lookup: ParameterLookup = { region: "us-east-1", listParameters };

    await expect(cache.resolve("custom", lookup)).resolves.toEqual({ slowerThan: 10000, maxLength: 128 });
    expect(cache.size).toBe(0);

    await expect(cache.resolve("custom", lookup)).resolves.toEqual({ slowerThan: 1, maxLength: 128 });
    expect(listParameters).toHaveBeenCalledTimes(2);
  });

  it("hands every caller its own copy", async () => {
    const cache = new SlowLogParameterCache();
    const { lookup } = createLookup("us-east-1", []);

    const first = await cache.resolve("default.redis7", lookup);
    first.slowerThan = 1;

    await expect(cache.resolve("default.redis7", lookup)).resolves.toEqual({ slowerThan: 10000, maxLength: 128 });
  });

  it("forgets everything on clear", async () => {
    const cache = new SlowLogParameterCache();
    const { lookup, listParameters } = createLookup("us-east-1", []);

    await cache.resolve("default.redis7", lookup);
    cache.clear();
    await cache.resolve("default.redis7", lookup);

    expect(cache.size).toBe(1);
    expect(listParameters).toHaveBeenCalledTimes(2);
  });
});
