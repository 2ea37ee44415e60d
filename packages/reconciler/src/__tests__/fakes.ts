// ── In-process stand-ins for the remote API and the clock ─────────────

import type { ClusterSpec, ClusterState, Scope } from "@dbplane/core";
import type {
  AllowListData,
  BackupScheduleData,
  ClusterData,
  ClusterRegionInfo,
  IManagedDbApi,
  NodeConfiguration,
  TaskData,
  TaskState,
  TaskType,
  TrackData,
  VpcData,
} from "@dbplane/api-client";
import type { Clock } from "../poller/clock";

function unstubbed(name: string) {
  return jest.fn().mockRejectedValue(new Error(`${name} was not stubbed`));
}

/** Every method rejects until a test stubs it. */
export function createFakeApi(): jest.Mocked<IManagedDbApi> {
  return {
    createCluster: unstubbed("createCluster"),
    getCluster: unstubbed("getCluster"),
    editCluster: unstubbed("editCluster"),
    deleteCluster: unstubbed("deleteCluster"),
    pauseCluster: unstubbed("pauseCluster"),
    resumeCluster: unstubbed("resumeCluster"),
    updateConnectionPooling: unstubbed("updateConnectionPooling"),
    listClusterAllowLists: unstubbed("listClusterAllowLists"),
    editClusterAllowLists: unstubbed("editClusterAllowLists"),
    getClusterCmk: unstubbed("getClusterCmk"),
    editClusterCmk: unstubbed("editClusterCmk"),
    listBackupSchedules: unstubbed("listBackupSchedules"),
    editBackupSchedule: unstubbed("editBackupSchedule"),
    listTasks: unstubbed("listTasks"),
    createRestore: unstubbed("createRestore"),
    getRestore: unstubbed("getRestore"),
    listTracks: unstubbed("listTracks"),
    getNodeConfigurations: unstubbed("getNodeConfigurations"),
    createVpc: unstubbed("createVpc"),
    getVpc: unstubbed("getVpc"),
    listVpcs: unstubbed("listVpcs"),
    deleteVpc: unstubbed("deleteVpc"),
    createAllowList: unstubbed("createAllowList"),
    getAllowList: unstubbed("getAllowList"),
    listAllowLists: unstubbed("listAllowLists"),
    deleteAllowList: unstubbed("deleteAllowList"),
    createReadReplicas: unstubbed("createReadReplicas"),
    getReadReplicas: unstubbed("getReadReplicas"),
    editReadReplicas: unstubbed("editReadReplicas"),
    deleteReadReplicas: unstubbed("deleteReadReplicas"),
    createBackup: unstubbed("createBackup"),
    getBackup: unstubbed("getBackup"),
    deleteBackup: unstubbed("deleteBackup"),
    createIntegration: unstubbed("createIntegration"),
    getIntegration: unstubbed("getIntegration"),
    listIntegrations: unstubbed("listIntegrations"),
    deleteIntegration: unstubbed("deleteIntegration"),
    createDbAuditConfig: unstubbed("createDbAuditConfig"),
    listDbAuditConfigs: unstubbed("listDbAuditConfigs"),
    updateDbAuditConfig: unstubbed("updateDbAuditConfig"),
    deleteDbAuditConfig: unstubbed("deleteDbAuditConfig"),
  };
}

/** Sleeping advances time instantly. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────

export const scope: Scope = { accountId: "acct-test", projectId: "proj-test" };

export const tracks: TrackData[] = [
  { info: { id: "track-prod" }, spec: { name: "Production" } },
  { info: { id: "track-preview" }, spec: { name: "Preview" } },
];

export const nodeConfigurations: NodeConfiguration[] = [
  { num_cores: 2, memory_mb: 8192, include_disk_size_gb: 50 },
  { num_cores: 4, memory_mb: 16384, include_disk_size_gb: 100 },
];

export function vpcData(id: string, name: string, state = "ACTIVE"): VpcData {
  return {
    info: { id, state, external_vpc_id: `ext-${id}` },
    spec: { name, cloud: "AWS", region_specs: [{ region: "us-east-1", cidr: "10.1.0.0/16" }] },
  };
}

export function regionInfo(region: string, overrides: Partial<ClusterRegionInfo> = {}): ClusterRegionInfo {
  return {
    placement_info: { cloud_info: { code: "AWS", region }, num_nodes: 3, multi_zone: false },
    node_info: { num_cores: 4, memory_mb: 16384, disk_size_gb: 100 },
    accessibility_types: ["PUBLIC"],
    is_default: false,
    is_affinitized: false,
    ...overrides,
  };
}

export function clusterData(
  regions: ClusterRegionInfo[] = [regionInfo("us-east-1", { is_default: true })],
  state = "ACTIVE",
  id = "cluster-1",
): ClusterData {
  return {
    info: {
      id,
      state,
      software_version: "2.20.1.0",
      is_connection_pooling_enabled: false,
      metadata: { created_on: "2026-01-05T10:00:00Z", updated_on: "2026-01-06T10:00:00Z" },
      cluster_endpoints: [{ accessibility_type: "PUBLIC", host: "orders.example.net", region: "us-east-1" }],
    },
    spec: {
      name: "orders-db",
      cluster_info: {
        cluster_tier: "PAID",
        num_nodes: regions.reduce((total, region) => total + region.placement_info.num_nodes, 0),
        fault_tolerance: "ZONE",
        num_faults_to_tolerate: 1,
        is_production: true,
        cluster_type: "SYNCHRONOUS",
        version: 7,
        node_info: { num_cores: 4, memory_mb: 16384, disk_size_gb: 100 },
      },
      software_info: { track_id: "track-prod" },
      cluster_region_info: regions,
    },
  };
}

export function task(taskType: TaskType, state: TaskState, entityId = "cluster-1"): TaskData {
  return {
    info: { id: `task-${taskType.toLowerCase()}`, entity_id: entityId, entity_type: "CLUSTER", task_type: taskType, state },
  };
}

export function allowListData(id: string, name: string, clusterIds: string[] = []): AllowListData {
  return {
    info: { id, cluster_ids: clusterIds },
    spec: { name, description: `${name} sources`, allow_list: ["10.0.0.0/24"] },
  };
}

export function backupScheduleData(id = "schedule-1"): BackupScheduleData {
  return {
    info: { id },
    spec: {
      state: "ACTIVE",
      description: "Default backup schedule",
      retention_period_in_days: 8,
      time_interval_in_days: 1,
      incremental_interval_in_minutes: 0,
    },
  };
}

export function clusterSpec(overrides: Partial<ClusterSpec> = {}): ClusterSpec {
  return {
    clusterName: "orders-db",
    cloudType: "AWS",
    clusterType: "SYNCHRONOUS",
    clusterTier: "PAID",
    clusterRegionInfo: [{ region: "us-east-1", numNodes: 3, numCores: 4 }],
    credentials: { username: "admin", password: "test-secret" },
    ...overrides,
  };
}

/** The state a read of `clusterData()` produces for `clusterSpec()`. */
export function clusterState(overrides: Partial<ClusterState> = {}): ClusterState {
  return {
    ...scope,
    clusterId: "cluster-1",
    clusterName: "orders-db",
    cloudType: "AWS",
    clusterType: "SYNCHRONOUS",
    clusterTier: "PAID",
    faultTolerance: "ZONE",
    numFaultsToTolerate: 1,
    clusterRegionInfo: [
      {
        region: "us-east-1",
        numNodes: 3,
        numCores: 4,
        diskSizeGb: 100,
        diskIops: null,
        vpcId: null,
        vpcName: null,
        publicAccess: true,
        isPreferred: false,
        isDefault: true,
      },
    ],
    nodeConfig: { numCores: 4, diskSizeGb: 100, diskIops: null },
    databaseTrack: "Production",
    desiredState: "Active",
    desiredConnectionPoolingState: null,
    clusterAllowListIds: null,
    restoreBackupId: null,
    credentials: { username: "admin", password: "test-secret" },
    backupSchedules: null,
    cmkSpec: null,
    clusterVersion: 7,
    clusterInfo: {
      state: "ACTIVE",
      softwareVersion: "2.20.1.0",
      createdTime: "2026-01-05T10:00:00Z",
      updatedTime: "2026-01-06T10:00:00Z",
    },
    endpoints: [{ accessibilityType: "PUBLIC", host: "orders.example.net", region: "us-east-1" }],
    ...overrides,
  };
}
