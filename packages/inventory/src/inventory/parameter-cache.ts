/**
 * Layer 4: slow log parameter lookup with a run-wide cache
 */

import { getErrorMessage, isAbortError } from "../aws/errors.js";
import type { CacheParameterRecord } from "../aws/types.js";
import { SLOW_LOG_DEFAULTS, SLOW_LOG_PARAMETERS } from "../constants.js";
import { getLogger } from "../logger.js";
import type { SlowLogParameters } from "./types.js";

const logger = getLogger("parameter-cache");

/**
 * Where a cache miss is resolved: the parameter listing of one region
 */
export interface ParameterLookup {
  region: string;
  listParameters(parameterGroupName: string): Promise<CacheParameterRecord[]>;
}

export interface ParameterCache {
  resolve(parameterGroupName: string, lookup: ParameterLookup): Promise<SlowLogParameters>;
  clear(): void;
  readonly size: number;
}

/** Documented engine defaults, used as the baseline for every lookup */
export function defaultSlowLogParameters(): SlowLogParameters {
  return { slowerThan: SLOW_LOG_DEFAULTS.slowerThan, maxLength: SLOW_LOG_DEFAULTS.maxLength };
}

/**
 * Parse a parameter value as an integer.
 * "0" is a real value (slow log disabled) and is kept.
 */
function parseIntegerParameter(name: string, value: string): number | undefined {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    logger.debug({ parameter: name, value }, "Failed to parse parameter value");
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/**
 * Overlay the slow log parameters found in a listing onto the baseline
 */
export function extractSlowLogParameters(
  parameters: readonly CacheParameterRecord[],
  baseline: SlowLogParameters = defaultSlowLogParameters()
): SlowLogParameters {
  const result = { ...baseline };

  for (const { ParameterName: name, ParameterValue: value } of parameters) {
    if (value === undefined || value === "") {
      continue;
    }
    if (name === SLOW_LOG_PARAMETERS.slowerThan) {
      result.slowerThan = parseIntegerParameter(name, value) ?? result.slowerThan;
    } else if (name === SLOW_LOG_PARAMETERS.maxLength) {
      result.maxLength = parseIntegerParameter(name, value) ?? result.maxLength;
    }
  }

  return result;
}

/**
 * Run-wide parameter group cache.
 *
 * Parameter groups are configuration objects that do not change during a
 * run, so resolved values are kept for its whole duration. Concurrent
 * callers for the same uncached group share one in-flight query. Entries
 * are keyed by group name and shared by every region; a miss is resolved
 * through the first caller's lookup.
 */
export class SlowLogParameterCache implements ParameterCache {
  private readonly entries = new Map<string, SlowLogParameters>();
  private readonly inFlight = new Map<string, Promise<SlowLogParameters>>();

  get size(): number {
    return this.entries.size;
  }

  resolve(parameterGroupName: string, lookup: ParameterLookup): Promise<SlowLogParameters> {
    const cached = this.entries.get(parameterGroupName);
    if (cached) {
      logger.debug({ parameterGroupName, region: lookup.region }, "Using cached parameters");
      return Promise.resolve({ ...cached });
    }

    let pending = this.inFlight.get(parameterGroupName);
    if (!pending) {
      pending = this.query(parameterGroupName, lookup).finally(() => {
        this.inFlight.delete(parameterGroupName);
      });
      this.inFlight.set(parameterGroupName, pending);
    }
    return pending.then((params) => ({ ...params }));
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }

  private async query(
    parameterGroupName: string,
    lookup: ParameterLookup
  ): Promise<SlowLogParameters> {
    logger.debug({ parameterGroupName, region: lookup.region }, "Layer 4: querying parameter group");
    const baseline = defaultSlowLogParameters();

    let params: SlowLogParameters;
    try {
      params = extractSlowLogParameters(await lookup.listParameters(parameterGroupName), baseline);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.warn(
        { parameterGroupName, region: lookup.region, err: error },
        `Failed to query parameter group ${parameterGroupName}: ${getErrorMessage(error)}`
      );
      return baseline;
    }

    // Last writer wins: concurrent results for the same name are identical
    this.entries.set(parameterGroupName, params);
    logger.debug({ parameterGroupName, region: lookup.region, params }, "Cached parameters");
    return params;
  }
}
