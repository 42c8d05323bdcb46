/**
 * Error taxonomy for ElastiCache control-plane failures.
 *
 * Every error carries a remediation hint and the low-level error as `cause`.
 */

/**
 * Base class for inventory errors raised around AWS calls
 */
export class InventoryError extends Error {
  readonly suggestion: string;

  constructor(message: string, suggestion: string, cause?: unknown) {
    super(message, { cause });
    this.name = "InventoryError";
    this.suggestion = suggestion;
  }

  override toString(): string {
    return `${this.message}\nSuggestion: ${this.suggestion}`;
  }
}

export class PermissionError extends InventoryError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      `Permission denied: the active AWS identity may not call ${operation}`,
      "Grant the identity elasticache:Describe* permissions",
      cause
    );
    this.name = "PermissionError";
    this.operation = operation;
  }
}

export class InvalidParameterError extends InventoryError {
  readonly parameter: string;
  readonly value: string;

  constructor(parameter: string, value: string, cause?: unknown) {
    super(
      `Invalid parameter: ${parameter} = '${value}'`,
      "Check that the parameter value is correct",
      cause
    );
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.value = value;
  }
}

export class ApiError extends InventoryError {
  readonly operation: string;
  readonly code: string;

  constructor(operation: string, code: string, message: string, cause?: unknown) {
    super(
      `AWS API error: ${operation} failed (${code}): ${message}`,
      "Check the AWS service health or retry later",
      cause
    );
    this.name = "ApiError";
    this.operation = operation;
    this.code = code;
  }
}

export class CredentialsError extends InventoryError {
  constructor(cause?: unknown) {
    super(
      "AWS credentials error: no valid credentials were found",
      "Configure a profile with `aws configure` or set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY",
      cause
    );
    this.name = "CredentialsError";
  }
}

export class ConnectionError extends InventoryError {
  readonly region: string;

  constructor(region: string, cause?: unknown) {
    super(
      `AWS connection error: unable to reach ElastiCache in ${region}`,
      "Check network connectivity and that the region name is correct",
      cause
    );
    this.name = "ConnectionError";
    this.region = region;
  }
}

/**
 * True for the error an aborted AbortSignal throws
 */
export function isAbortError(error: unknown): error is Error {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Get a human-readable error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}
