/**
 * Record shapes read from the ElastiCache control plane.
 *
 * Only the fields the inventory consumes are listed; the SDK's
 * ReplicationGroup, CacheCluster and GlobalReplicationGroup outputs are
 * structurally assignable to these.
 */

export interface LogDeliveryRecord {
  LogType?: string;
  DestinationDetails?: object;
}

export interface ParameterGroupReference {
  CacheParameterGroupName?: string;
}

export interface ReplicationGroupRecord {
  ReplicationGroupId?: string;
  Engine?: string;
  EngineVersion?: string;
  CacheNodeType?: string;
  ClusterEnabled?: boolean;
  MemberClusters?: string[];
  NodeGroups?: { NodeGroupMembers?: unknown[] }[];
  MultiAZ?: string;
  AutomaticFailover?: string;
  TransitEncryptionEnabled?: boolean;
  AtRestEncryptionEnabled?: boolean;
  LogDeliveryConfigurations?: LogDeliveryRecord[];
  PreferredMaintenanceWindow?: string;
  AutoMinorVersionUpgrade?: boolean;
  SnapshotWindow?: string;
  SnapshotRetentionLimit?: number;
  CacheParameterGroup?: ParameterGroupReference;
}

export interface CacheClusterRecord {
  CacheClusterId?: string;
  Engine?: string;
  EngineVersion?: string;
  CacheNodeType?: string;
  NumCacheNodes?: number;
  PreferredAvailabilityZone?: string;
  PreferredMaintenanceWindow?: string;
  AutoMinorVersionUpgrade?: boolean;
  CacheParameterGroup?: ParameterGroupReference;
}

export interface GlobalReplicationGroupMemberRecord {
  ReplicationGroupId?: string;
  ReplicationGroupRegion?: string;
  Role?: string;
}

export interface GlobalReplicationGroupRecord {
  GlobalReplicationGroupId?: string;
  Members?: GlobalReplicationGroupMemberRecord[];
}

export interface CacheParameterRecord {
  ParameterName?: string;
  ParameterValue?: string;
}

/**
 * Region-bound view of the ElastiCache control plane.
 * Every list operation pages through to the last marker.
 */
export interface CacheControlPlane {
  readonly region: string;
  verifyCredentials(): Promise<void>;
  listGlobalReplicationGroups(): Promise<GlobalReplicationGroupRecord[]>;
  listReplicationGroups(): Promise<ReplicationGroupRecord[]>;
  listCacheClusters(): Promise<CacheClusterRecord[]>;
  describeCacheCluster(cacheClusterId: string): Promise<CacheClusterRecord | undefined>;
  listCacheParameters(parameterGroupName: string): Promise<CacheParameterRecord[]>;
}

/**
 * Creates a new control-plane client bound to a region
 */
export type ClientFactory = (region: string) => CacheControlPlane;
