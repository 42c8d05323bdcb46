/**
 * Display formatters for composite inventory fields
 */

export const NOT_APPLICABLE = "N/A";

/**
 * "Enabled"/"Disabled", or "N/A" when the value is unknown
 */
export function formatEnabledDisabled(value: boolean | null | undefined): string {
  if (value === null || value === undefined) {
    return NOT_APPLICABLE;
  }
  return value ? "Enabled" : "Disabled";
}

/**
 * Slow log summary: "Enabled/{slowerThan}/{maxLength}", else "Disabled".
 * A threshold of zero or below, or any missing value, counts as disabled.
 */
export function formatSlowLogs(
  slowerThan: number | null | undefined,
  maxLength: number | null | undefined
): string {
  if (slowerThan === null || slowerThan === undefined) {
    return "Disabled";
  }
  if (maxLength === null || maxLength === undefined) {
    return "Disabled";
  }
  return slowerThan > 0 ? `Enabled/${slowerThan}/${maxLength}` : "Disabled";
}

/**
 * Backup summary from the snapshot window and retention period
 */
export function formatBackup(
  window: string | null | undefined,
  retentionDays: number | null | undefined
): string {
  if (retentionDays === null || retentionDays === undefined) {
    return NOT_APPLICABLE;
  }
  if (retentionDays <= 0) {
    return "Disabled";
  }
  if (window === null || window === undefined) {
    return `Enabled/${retentionDays} days (no window info)`;
  }
  return `${window} UTC/${retentionDays} days`;
}

/**
 * "{globalDatastoreId}/{clusterId}" for Global Datastore members, else the bare id
 */
export function formatClusterName(
  globalDatastoreId: string | null | undefined,
  clusterId: string
): string {
  return globalDatastoreId ? `${globalDatastoreId}/${clusterId}` : clusterId;
}

/**
 * "{window} UTC", or an empty string when no window is set
 */
export function formatMaintenanceWindow(window: string | null | undefined): string {
  return window ? `${window} UTC` : "";
}

/** "PRIMARY" -> "Primary", "redis" -> "Redis" */
export function capitalize(value: string): string {
  if (!value) {
    return "";
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}
