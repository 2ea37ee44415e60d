// ---------------------------------------------------------------------------
// IManagedDbApi: Remote control-plane operations used by the reconciler
// ---------------------------------------------------------------------------

import type {
  AllowListData,
  AllowListSpecPayload,
  BackupData,
  BackupScheduleData,
  BackupSchedulePayload,
  BackupSpecPayload,
  ClusterData,
  ClusterSpecPayload,
  CmkData,
  CmkPayload,
  ConnectionPoolingAction,
  CreateClusterRequest,
  DbAuditExporterConfigData,
  DbAuditExporterSpecPayload,
  NodeConfiguration,
  NodeConfigurationQuery,
  ReadReplicaListData,
  ReadReplicaSpecPayload,
  RestoreData,
  TaskData,
  TaskQuery,
  TelemetryProviderData,
  TelemetryProviderSpecPayload,
  TrackData,
  VpcData,
  VpcSpecPayload,
} from "./protocol";

/** Per-call options. Aborting `signal` cancels the request in flight. */
export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Typed binding over the control-plane REST API, scoped to one account and
 * project. Every mutation returns as soon as the service accepts it; callers
 * poll for the settled state.
 *
 * Failures reject with `NotFoundError` (404), `ApiError` (other statuses,
 * carrying the classified kind) or `TransportError` (no status received).
 * A request whose `call.signal` aborts rejects with a fatal `TransportError`.
 */
export interface IManagedDbApi {
  // Clusters
  createCluster(request: CreateClusterRequest, call?: CallOptions): Promise<ClusterData>;
  getCluster(clusterId: string, call?: CallOptions): Promise<ClusterData>;
  editCluster(clusterId: string, spec: ClusterSpecPayload, call?: CallOptions): Promise<ClusterData>;
  deleteCluster(clusterId: string, call?: CallOptions): Promise<void>;
  pauseCluster(clusterId: string, call?: CallOptions): Promise<ClusterData>;
  resumeCluster(clusterId: string, call?: CallOptions): Promise<ClusterData>;
  updateConnectionPooling(
    clusterId: string,
    action: ConnectionPoolingAction,
    call?: CallOptions,
  ): Promise<void>;
  listClusterAllowLists(clusterId: string, call?: CallOptions): Promise<AllowListData[]>;
  editClusterAllowLists(clusterId: string, allowListIds: string[], call?: CallOptions): Promise<void>;
  getClusterCmk(clusterId: string, call?: CallOptions): Promise<CmkData>;
  editClusterCmk(clusterId: string, spec: CmkPayload, call?: CallOptions): Promise<void>;
  listBackupSchedules(clusterId: string, call?: CallOptions): Promise<BackupScheduleData[]>;
  editBackupSchedule(
    clusterId: string,
    scheduleId: string,
    spec: BackupSchedulePayload,
    call?: CallOptions,
  ): Promise<BackupScheduleData>;

  // Tasks and restores
  listTasks(query: TaskQuery, call?: CallOptions): Promise<TaskData[]>;
  createRestore(clusterId: string, backupId: string, call?: CallOptions): Promise<RestoreData>;
  getRestore(restoreId: string, call?: CallOptions): Promise<RestoreData>;

  // Lookups
  listTracks(call?: CallOptions): Promise<TrackData[]>;
  getNodeConfigurations(query: NodeConfigurationQuery, call?: CallOptions): Promise<NodeConfiguration[]>;

  // VPCs
  createVpc(spec: VpcSpecPayload, call?: CallOptions): Promise<VpcData>;
  getVpc(vpcId: string, call?: CallOptions): Promise<VpcData>;
  listVpcs(call?: CallOptions): Promise<VpcData[]>;
  deleteVpc(vpcId: string, call?: CallOptions): Promise<void>;

  // Allow lists
  createAllowList(spec: AllowListSpecPayload, call?: CallOptions): Promise<AllowListData>;
  getAllowList(allowListId: string, call?: CallOptions): Promise<AllowListData>;
  listAllowLists(call?: CallOptions): Promise<AllowListData[]>;
  deleteAllowList(allowListId: string, call?: CallOptions): Promise<void>;

  // Read replicas
  createReadReplicas(
    clusterId: string,
    specs: ReadReplicaSpecPayload[],
    call?: CallOptions,
  ): Promise<ReadReplicaListData>;
  getReadReplicas(clusterId: string, call?: CallOptions): Promise<ReadReplicaListData>;
  editReadReplicas(
    clusterId: string,
    specs: ReadReplicaSpecPayload[],
    call?: CallOptions,
  ): Promise<ReadReplicaListData>;
  deleteReadReplicas(clusterId: string, call?: CallOptions): Promise<void>;

  // Backups
  createBackup(spec: BackupSpecPayload, call?: CallOptions): Promise<BackupData>;
  getBackup(backupId: string, call?: CallOptions): Promise<BackupData>;
  deleteBackup(backupId: string, call?: CallOptions): Promise<void>;

  // Integrations
  createIntegration(spec: TelemetryProviderSpecPayload, call?: CallOptions): Promise<TelemetryProviderData>;
  getIntegration(configId: string, call?: CallOptions): Promise<TelemetryProviderData>;
  listIntegrations(call?: CallOptions): Promise<TelemetryProviderData[]>;
  deleteIntegration(configId: string, call?: CallOptions): Promise<void>;

  // Database audit logging
  createDbAuditConfig(
    clusterId: string,
    spec: DbAuditExporterSpecPayload,
    call?: CallOptions,
  ): Promise<DbAuditExporterConfigData>;
  listDbAuditConfigs(clusterId: string, call?: CallOptions): Promise<DbAuditExporterConfigData[]>;
  updateDbAuditConfig(
    clusterId: string,
    configId: string,
    spec: DbAuditExporterSpecPayload,
    call?: CallOptions,
  ): Promise<DbAuditExporterConfigData>;
  deleteDbAuditConfig(clusterId: string, configId: string, call?: CallOptions): Promise<void>;
}
