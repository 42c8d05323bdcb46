/**
 * Region-bound ElastiCache client factory.
 *
 * Unlike a per-region client cache, every call builds a new client: region
 * tasks run concurrently and must never share a live client.
 */

import { ElastiCacheClient } from "@aws-sdk/client-elasticache";
import { fromIni, fromNodeProviderChain } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentityProvider } from "@smithy/types";

import { getLogger } from "../logger.js";
import { ElastiCacheRegionClient } from "./region-client.js";
import type { RetryConfig } from "./retry.js";
import type { ClientFactory } from "./types.js";

const logger = getLogger("aws");

export interface ClientFactoryOptions {
  /** Named profile from the shared AWS config files; the default chain when absent */
  profile?: string;
  retry?: RetryConfig;
  signal?: AbortSignal;
}

/**
 * Resolve the credential provider for a profile.
 * One provider is shared by every client of a run.
 */
export function createCredentialProvider(profile?: string): AwsCredentialIdentityProvider {
  return profile ? fromIni({ profile }) : fromNodeProviderChain();
}

/**
 * Creates a factory producing a fresh region-bound client per call.
 *
 * @example
 * ```ts
 * const createClient = createClientFactory({ profile: "prod" });
 * const west = createClient("us-west-2");
 * ```
 */
export function createClientFactory(options: ClientFactoryOptions = {}): ClientFactory {
  const credentials = createCredentialProvider(options.profile);

  return (region: string) => {
    logger.debug({ region, profile: options.profile ?? "(default chain)" }, "Creating ElastiCache client");
    // SDK retries are disabled; withAwsErrorHandling owns throttling backoff
    const client = new ElastiCacheClient({ region, credentials, maxAttempts: 1 });
    return new ElastiCacheRegionClient({
      region,
      client,
      credentials,
      retry: options.retry,
      signal: options.signal,
    });
  };
}
