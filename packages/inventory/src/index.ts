// AWS access
export { createClientFactory, createCredentialProvider } from "./aws/client-factory.js";
export {
  ApiError,
  ConnectionError,
  CredentialsError,
  InvalidParameterError,
  InventoryError,
  PermissionError,
} from "./aws/errors.js";
export { ElastiCacheRegionClient } from "./aws/region-client.js";
export type { CacheControlPlane, ClientFactory } from "./aws/types.js";

// Inventory pipeline
export { collectInventory, queryRegion, regionsToQuery } from "./inventory/orchestrator.js";
export { type ParameterCache, SlowLogParameterCache } from "./inventory/parameter-cache.js";
export { resolveTopology } from "./inventory/topology.js";
export type {
  ClusterRecord,
  InventoryResult,
  ProgressEvent,
  RegionOutcome,
  TopologyMap,
} from "./inventory/types.js";

// Reports
export {
  FIELD_DEFINITIONS,
  FIELD_TOKENS,
  type FieldToken,
  formatReport,
  parseEngineList,
  parseFieldList,
  REPORT_FORMATS,
  type ReportFormat,
} from "./report/index.js";

// Configuration
export { ConfigError, loadConfig } from "./config/loader.js";
export { type Config, configSchema } from "./config/schema.js";

export { ENGINES, type Engine, ExitCode } from "./constants.js";
export { version } from "./version.js";
