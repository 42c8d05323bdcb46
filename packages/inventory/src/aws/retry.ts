/**
 * AWS error classification and throttling retry.
 *
 * Wraps every control-plane call: rate-limit errors are retried with
 * exponential backoff, everything else is mapped onto the error taxonomy.
 */

import { RETRY } from "../constants.js";
import { getLogger } from "../logger.js";
import {
  ApiError,
  ConnectionError,
  CredentialsError,
  InvalidParameterError,
  InventoryError,
  isAbortError,
  PermissionError,
} from "./errors.js";

const logger = getLogger("aws");

/**
 * Retry configuration options
 */
export interface RetryConfig {
  attempts?: number;
  baseDelayMs?: number;
}

/**
 * Describes the call being wrapped, for error messages and retry logs
 */
export interface CallContext {
  operation: string;
  region: string;
  /** Parameter reported by InvalidParameterError */
  parameter?: { name: string; value: string };
  retry?: RetryConfig;
}

const THROTTLING_CODES = new Set([
  "Throttling",
  "ThrottlingException",
  "RequestLimitExceeded",
  "TooManyRequestsException",
]);

const PERMISSION_CODES = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
]);

const INVALID_PARAMETER_CODES = new Set([
  "InvalidParameterValue",
  "InvalidParameterValueException",
  "InvalidParameterCombination",
]);

const CREDENTIALS_ERROR_NAMES = new Set(["CredentialsProviderError"]);

const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * Shape of an AWS SDK v3 service exception
 */
interface ServiceExceptionLike {
  name: string;
  message: string;
  $fault: string;
}

function isServiceException(err: unknown): err is ServiceExceptionLike {
  return err instanceof Error && "$fault" in err && typeof err.$fault === "string";
}

/**
 * Extract the AWS error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  return isServiceException(err) ? err.name : undefined;
}

export function isThrottlingError(err: unknown): boolean {
  const code = extractErrorCode(err);
  return code !== undefined && THROTTLING_CODES.has(code);
}

/**
 * Map a low-level failure onto the error taxonomy
 */
export function classifyAwsError(err: unknown, context: CallContext): Error {
  if (err instanceof InventoryError || isAbortError(err)) {
    return err;
  }

  if (err instanceof Error && CREDENTIALS_ERROR_NAMES.has(err.name)) {
    return new CredentialsError(err);
  }

  if (isServiceException(err)) {
    const code = err.name;
    if (PERMISSION_CODES.has(code)) {
      return new PermissionError(context.operation, err);
    }
    if (INVALID_PARAMETER_CODES.has(code)) {
      const parameter = context.parameter ?? { name: "unknown", value: "unknown" };
      return new InvalidParameterError(parameter.name, parameter.value, err);
    }
    return new ApiError(context.operation, code, err.message, err);
  }

  return new ConnectionError(context.region, err);
}

/**
 * Run a control-plane call with throttling retry and error classification.
 *
 * @example
 * ```ts
 * const page = await withAwsErrorHandling(
 *   () => client.send(new DescribeReplicationGroupsCommand({ Marker })),
 *   { operation: "DescribeReplicationGroups", region: "us-east-1" }
 * );
 * ```
 */
export async function withAwsErrorHandling<T>(
  fn: () => Promise<T>,
  context: CallContext
): Promise<T> {
  const attempts = Math.max(1, context.retry?.attempts ?? RETRY.attempts);
  const baseDelayMs = Math.max(0, context.retry?.baseDelayMs ?? RETRY.baseDelayMs);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (isThrottlingError(err) && attempt < attempts - 1) {
        const delayMs = baseDelayMs * 2 ** attempt;
        logger.warn(
          { operation: context.operation, region: context.region, delayMs },
          `API throttled, retrying in ${delayMs}ms (attempt ${attempt + 1}/${attempts})`
        );
        await sleep(delayMs);
        continue;
      }
      throw classifyAwsError(err, context);
    }
  }
}
