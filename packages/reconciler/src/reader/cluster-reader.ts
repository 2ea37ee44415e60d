/**
 * Cluster State Reader
 *
 * Re-reads a settled cluster into `ClusterState`. Regions come back in the
 * caller's order; defaulted fields are filled from the service; values the
 * service never returns (credentials, restore id, key secrets) are carried
 * from what the caller asked for. Two reads with no mutation in between
 * produce deep-equal states.
 */

import {
  ALLOW_LIST_SYNC_INTERVAL_MS,
  BackupScheduleState,
  CloudType,
  ClusterTier,
  ClusterType,
  CmkProvider,
  FaultTolerance,
  NotFoundError,
  isSet,
  type BackupScheduleInfo,
  type ClusterState,
  type CmkSpec,
  type Credentials,
  type NodeConfigState,
  type RegionState,
} from "@dbplane/core";
import type { ClusterData, ClusterRegionInfo, CmkData, NodeInfo } from "@dbplane/api-client";
import { done, pending } from "../poller/outcome";
import type { ReadContext } from "./context";
import { expectValue } from "./read-purpose";
import { restoreRegionOrder, type RegionIndex } from "./region-order";

/** What the caller asked for that the service does not echo back. */
export interface ClusterCarryOver {
  credentials: Credentials;
  restoreBackupId: string | null;
  /** Secrets in the key spec come back masked */
  cmkSpec: CmkSpec | null;
  /** Requested allow lists in caller order; null when not managed */
  clusterAllowListIds: string[] | null;
  /** Schedules to read back; null when not managed, empty for an empty list */
  backupScheduleIds: string[] | null;
}

export interface ClusterReadInput {
  clusterId: string;
  regionIndex: RegionIndex;
  carryOver: ClusterCarryOver;
}

function nodeConfigFrom(info: NodeInfo | null | undefined): NodeConfigState | null {
  if (!isSet(info)) return null;
  return { numCores: info.num_cores, diskSizeGb: info.disk_size_gb, diskIops: info.disk_iops ?? null };
}

async function regionStateFrom(
  ctx: ReadContext,
  info: ClusterRegionInfo,
  fallback: NodeInfo | null | undefined,
): Promise<RegionState> {
  const node = info.node_info ?? fallback;
  const vpcId = info.placement_info.vpc_id ?? null;
  return {
    region: info.placement_info.cloud_info.region,
    numNodes: info.placement_info.num_nodes,
    numCores: node?.num_cores ?? 0,
    diskSizeGb: node?.disk_size_gb ?? 0,
    diskIops: node?.disk_iops ?? null,
    vpcId,
    vpcName: vpcId !== null ? await ctx.refs.vpcNameForId(vpcId) : null,
    publicAccess: info.accessibility_types.includes("PUBLIC"),
    isPreferred: info.is_affinitized,
    isDefault: info.is_default,
  };
}

async function readBackupSchedules(
  ctx: ReadContext,
  clusterId: string,
  scheduleIds: string[],
): Promise<BackupScheduleInfo[]> {
  if (scheduleIds.length === 0) return [];
  const schedules = await ctx.api.listBackupSchedules(clusterId);

  return scheduleIds.map((scheduleId) => {
    const schedule = schedules.find((candidate) => candidate.info.id === scheduleId);
    if (!schedule) {
      throw new NotFoundError(`Backup schedule ${scheduleId} not found on cluster ${clusterId}`, scheduleId);
    }
    const { spec } = schedule;
    const incremental = spec.incremental_interval_in_minutes;
    return {
      scheduleId,
      state: expectValue(BackupScheduleState, spec.state, "backup schedule state"),
      retentionPeriodInDays: spec.retention_period_in_days,
      backupDescription: spec.description ?? "",
      cronExpression: spec.cron_expression ?? null,
      timeIntervalInDays: spec.time_interval_in_days ?? null,
      // the service reports "no incremental backups" as 0
      incrementalIntervalInMins: isSet(incremental) && incremental > 0 ? incremental : null,
    };
  });
}

async function readCmk(ctx: ReadContext, clusterId: string, prior: CmkSpec | null): Promise<CmkSpec | null> {
  let data: CmkData;
  try {
    data = await ctx.api.getClusterCmk(clusterId);
  } catch (error) {
    if (error instanceof NotFoundError) return null;
    throw error;
  }
  const spec = data.spec;
  if (!isSet(spec)) return null;

  const providerType = expectValue(CmkProvider, spec.provider_type, "key provider");
  const aws = spec.aws_cmk_spec;
  const azure = spec.azure_cmk_spec;
  return {
    providerType,
    isEnabled: spec.is_enabled,
    awsCmkSpec:
      providerType === "AWS" && isSet(aws)
        ? {
            accessKey: aws.access_key,
            secretKey: prior?.awsCmkSpec?.secretKey ?? aws.secret_key,
            arnList: [...aws.arn_list],
          }
        : null,
    azureCmkSpec:
      providerType === "AZURE" && isSet(azure)
        ? {
            clientId: azure.client_id,
            clientSecret: prior?.azureCmkSpec?.clientSecret ?? azure.client_secret,
            tenantId: azure.tenant_id,
            keyVaultUri: azure.key_vault_uri,
            keyName: azure.key_name,
          }
        : null,
  };
}

/**
 * Allow-list assignment is applied asynchronously. Re-reads until every
 * requested id is attached; ids attached out-of-band follow in response
 * order.
 */
async function readAllowListIds(ctx: ReadContext, clusterId: string, requested: string[]): Promise<string[]> {
  return ctx.poller.waitFor({
    resourceId: clusterId,
    kind: "associate",
    description: `allow lists of ${clusterId}`,
    intervalMs: ALLOW_LIST_SYNC_INTERVAL_MS,
    check: async (_attempt, signal) => {
      const attached = (await ctx.api.listClusterAllowLists(clusterId, { signal })).map((allowList) => allowList.info.id);
      const attachedSet = new Set(attached);
      if (!requested.every((id) => attachedSet.has(id))) return pending("SYNCING");
      const requestedSet = new Set(requested);
      return done("IN_SYNC", [...requested, ...attached.filter((id) => !requestedSet.has(id))]);
    },
  });
}

export async function readClusterState(ctx: ReadContext, input: ClusterReadInput): Promise<ClusterState> {
  const { clusterId, regionIndex, carryOver } = input;
  const cluster: ClusterData = await ctx.api.getCluster(clusterId);
  const { info, spec } = cluster;
  const clusterInfo = spec.cluster_info;

  const ordered = restoreRegionOrder(
    spec.cluster_region_info,
    (region) => region.placement_info.cloud_info.region,
    regionIndex,
  );
  const regions: RegionState[] = [];
  for (const region of ordered) {
    regions.push(await regionStateFrom(ctx, region, clusterInfo.node_info));
  }

  const [firstRegion] = spec.cluster_region_info;
  if (!firstRegion) {
    throw new NotFoundError(`Cluster ${clusterId} reports no regions`, clusterId, "Cluster has no regions");
  }
  const trackId = spec.software_info.track_id;

  return {
    ...ctx.scope,
    clusterId,
    clusterName: spec.name,
    cloudType: expectValue(CloudType, firstRegion.placement_info.cloud_info.code, "cloud"),
    clusterType: expectValue(ClusterType, clusterInfo.cluster_type ?? "SYNCHRONOUS", "cluster type"),
    clusterTier: expectValue(ClusterTier, clusterInfo.cluster_tier, "cluster tier"),
    faultTolerance: expectValue(FaultTolerance, clusterInfo.fault_tolerance, "fault tolerance"),
    numFaultsToTolerate: clusterInfo.num_faults_to_tolerate ?? 0,
    clusterRegionInfo: regions,
    nodeConfig: nodeConfigFrom(clusterInfo.node_info),
    databaseTrack: isSet(trackId) ? await ctx.refs.trackNameForId(trackId) : "",
    desiredState: info.state.toLowerCase() === "paused" ? "Paused" : "Active",
    desiredConnectionPoolingState: ctx.flags.connectionPooling
      ? info.is_connection_pooling_enabled
        ? "Enabled"
        : "Disabled"
      : null,
    clusterAllowListIds: isSet(carryOver.clusterAllowListIds)
      ? await readAllowListIds(ctx, clusterId, carryOver.clusterAllowListIds)
      : null,
    restoreBackupId: carryOver.restoreBackupId,
    credentials: { ...carryOver.credentials },
    backupSchedules: isSet(carryOver.backupScheduleIds)
      ? await readBackupSchedules(ctx, clusterId, carryOver.backupScheduleIds)
      : null,
    cmkSpec: await readCmk(ctx, clusterId, carryOver.cmkSpec),
    clusterVersion: clusterInfo.version ?? 0,
    clusterInfo: {
      state: info.state,
      softwareVersion: info.software_version ?? null,
      createdTime: info.metadata?.created_on ?? null,
      updatedTime: info.metadata?.updated_on ?? null,
    },
    endpoints: info.cluster_endpoints.map((endpoint) => ({
      accessibilityType: endpoint.accessibility_type,
      host: endpoint.host,
      region: endpoint.region,
    })),
  };
}
