/**
 * Cluster Manager
 *
 * Drives a cluster through create, update and delete. Each mutation is
 * submitted, waited on and then the settled cluster is read back, in that
 * order.
 */

import {
  CLUSTER_POWER_TIMEOUT_MS,
  ConfigurationError,
  RESTORE_TIMEOUT_MS,
  hasText,
  isSet,
  type ClusterSpec,
  type ClusterState,
  type CmkSpec,
  type EngineConfig,
  type LogCallback,
  type Scope,
} from "@dbplane/core";
import type { CreateClusterRequest, IManagedDbApi } from "@dbplane/api-client";
import {
  clusterStateReached,
  editTaskCompletion,
  restoreSucceeded,
  taskCompletion,
} from "../poller/watchers";
import { readClusterState, type ClusterCarryOver } from "../reader/cluster-reader";
import type { ReadContext } from "../reader/context";
import { readFor } from "../reader/read-purpose";
import { buildRegionIndex, type RegionIndex } from "../reader/region-order";
import { translateBackupSchedule } from "../translator/backup-translator";
import {
  encodeCredentials,
  translateClusterSpec,
  translateCmkSpec,
} from "../translator/cluster-translator";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { checkClusterFeatureFlags, validateClusterRules } from "../translator/validators";
import type { IClusterManager, IOperationPoller, ReconcileOptions } from "./interfaces";

function sameCmk(a: CmkSpec | null | undefined, b: CmkSpec | null | undefined): boolean {
  const encode = (cmk: CmkSpec | null | undefined) => (isSet(cmk) ? JSON.stringify(translateCmkSpec(cmk)) : null);
  return encode(a) === encode(b);
}

function sameIds(a: readonly string[] | null, b: readonly string[]): boolean {
  return a !== null && a.length === b.length && a.every((id, index) => id === b[index]);
}

export class ClusterManager implements IClusterManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: ClusterSpec, options: ReconcileOptions = {}): Promise<ClusterState> {
    this.validate(spec, true);
    const refs = new CrossReferenceResolver(this.api);
    const { payload, regionIndex } = await translateClusterSpec(spec, refs);

    const request: CreateClusterRequest = {
      cluster_spec: payload,
      db_credentials: encodeCredentials(spec.credentials),
      ...(isSet(spec.cmkSpec) ? { security_cmk_spec: translateCmkSpec(spec.cmkSpec) } : {}),
    };

    this.log(`Creating cluster ${spec.clusterName}`, "stdout");
    const created = await this.api.createCluster(request);
    const clusterId = created.info.id;
    options.onCreated?.(clusterId);

    await this.poller.waitFor({
      resourceId: clusterId,
      kind: "create",
      description: `create cluster ${spec.clusterName}`,
      check: taskCompletion(this.api, { entityId: clusterId, entityType: "CLUSTER", taskType: "CREATE_CLUSTER" }),
      signal: options.signal,
    });
    await this.waitForState(clusterId, "Active", "create", options.signal);

    const backupScheduleIds = await this.applyBackupSchedule(clusterId, spec);

    const allowListIds = spec.clusterAllowListIds;
    if (isSet(allowListIds) && allowListIds.length > 0) {
      this.log(`Assigning ${allowListIds.length} allow list(s) to ${clusterId}`, "stdout");
      await this.api.editClusterAllowLists(clusterId, allowListIds);
    }
    if (hasText(spec.restoreBackupId)) {
      await this.restore(clusterId, spec.restoreBackupId, options.signal);
    }
    if (spec.desiredState === "Paused") {
      await this.setPower(clusterId, "Paused", options.signal);
    }
    if (this.config.featureFlags.connectionPooling && spec.desiredConnectionPoolingState === "Enabled") {
      await this.setConnectionPooling(clusterId, true, options.signal);
    }

    this.log(`Cluster ${spec.clusterName} is ready`, "stdout");
    return readClusterState(this.readContext(refs), {
      clusterId,
      regionIndex,
      carryOver: this.carryOverFromSpec(spec, backupScheduleIds),
    });
  }

  async refresh(prior: ClusterState): Promise<ClusterState> {
    return readClusterState(this.readContext(new CrossReferenceResolver(this.api)), {
      clusterId: prior.clusterId,
      regionIndex: this.regionIndexOf(prior),
      carryOver: {
        credentials: prior.credentials,
        restoreBackupId: prior.restoreBackupId,
        cmkSpec: prior.cmkSpec,
        clusterAllowListIds: prior.clusterAllowListIds,
        backupScheduleIds: prior.backupSchedules?.map((schedule) => schedule.scheduleId) ?? null,
      },
    });
  }

  async update(prior: ClusterState, spec: ClusterSpec, options: ReconcileOptions = {}): Promise<ClusterState> {
    this.validate(spec, false);
    const { clusterId } = prior;
    const { signal } = options;
    const pooling = this.config.featureFlags.connectionPooling;

    // Translation can still reject the spec, so it runs before anything is
    // submitted.
    const refs = new CrossReferenceResolver(this.api);
    const existing = await this.api.getCluster(clusterId);
    const { payload, regionIndex } = await translateClusterSpec(spec, refs, { existing });

    // A paused cluster cannot be edited, and pooling must be off before a
    // resize, so undo both before the edit and reapply after it.
    if (prior.desiredState === "Paused" && spec.desiredState !== "Paused") {
      await this.setPower(clusterId, "Active", signal);
    }
    if (pooling && prior.desiredConnectionPoolingState === "Enabled" && spec.desiredConnectionPoolingState !== "Enabled") {
      await this.setConnectionPooling(clusterId, false, signal);
    }

    this.log(`Updating cluster ${spec.clusterName} (${clusterId})`, "stdout");
    await this.api.editCluster(clusterId, payload);
    const spawned = await this.poller.waitFor({
      resourceId: clusterId,
      kind: "update",
      description: `edit cluster ${spec.clusterName}`,
      check: editTaskCompletion(this.api, clusterId),
      signal,
    });
    if (!spawned) {
      this.log(`  [edit cluster ${spec.clusterName}] no provisioning task was needed`, "stdout");
    }
    await this.waitForState(clusterId, "Active", "update", signal);

    const backupScheduleIds = await this.applyBackupSchedule(clusterId, spec);

    if (isSet(spec.cmkSpec) && !sameCmk(prior.cmkSpec, spec.cmkSpec)) {
      this.log(`Updating encryption key of ${clusterId}`, "stdout");
      await this.api.editClusterCmk(clusterId, translateCmkSpec(spec.cmkSpec));
      await this.waitForState(clusterId, "Active", "update", signal, CLUSTER_POWER_TIMEOUT_MS);
    }

    const allowListIds = spec.clusterAllowListIds;
    if (isSet(allowListIds) && !sameIds(prior.clusterAllowListIds, allowListIds)) {
      this.log(`Assigning ${allowListIds.length} allow list(s) to ${clusterId}`, "stdout");
      await this.api.editClusterAllowLists(clusterId, allowListIds);
    }
    if (hasText(spec.restoreBackupId) && spec.restoreBackupId !== prior.restoreBackupId) {
      await this.restore(clusterId, spec.restoreBackupId, signal);
    }
    if (spec.desiredState === "Paused" && prior.desiredState !== "Paused") {
      await this.setPower(clusterId, "Paused", signal);
    }
    if (pooling && spec.desiredConnectionPoolingState === "Enabled" && prior.desiredConnectionPoolingState !== "Enabled") {
      await this.setConnectionPooling(clusterId, true, signal);
    }

    return readClusterState(this.readContext(refs), {
      clusterId,
      regionIndex,
      carryOver: this.carryOverFromSpec(spec, backupScheduleIds),
    });
  }

  async delete(prior: ClusterState, options: ReconcileOptions = {}): Promise<boolean> {
    const { clusterId } = prior;
    const current = await readFor("delete-precheck", () => this.api.getCluster(clusterId));
    if (current === null) {
      this.log(`Cluster ${clusterId} is already gone`, "stdout");
      return false;
    }

    this.log(`Deleting cluster ${current.spec.name} (${clusterId})`, "stdout");
    await this.api.deleteCluster(clusterId);
    await this.poller.waitFor({
      resourceId: clusterId,
      kind: "delete",
      description: `delete cluster ${current.spec.name}`,
      check: taskCompletion(this.api, { entityId: clusterId, entityType: "CLUSTER", taskType: "DELETE_CLUSTER" }),
      signal: options.signal,
    });
    return true;
  }

  // ---- Steps --------------------------------------------------------------

  private validate(spec: ClusterSpec, creating: boolean): void {
    validateClusterRules(spec, creating);
    checkClusterFeatureFlags(spec, this.config.featureFlags);
  }

  private async waitForState(
    clusterId: string,
    target: "Active" | "Paused",
    kind: "create" | "update" | "pause" | "resume",
    signal: AbortSignal | undefined,
    timeoutMs?: number,
  ): Promise<void> {
    await this.poller.waitFor({
      resourceId: clusterId,
      kind,
      description: `cluster ${clusterId} ${target.toLowerCase()}`,
      check: clusterStateReached(this.api, clusterId, target),
      timeoutMs,
      signal,
    });
  }

  private async setPower(clusterId: string, target: "Active" | "Paused", signal: AbortSignal | undefined): Promise<void> {
    if (target === "Paused") {
      this.log(`Pausing cluster ${clusterId}`, "stdout");
      await this.api.pauseCluster(clusterId);
      await this.waitForState(clusterId, "Paused", "pause", signal, CLUSTER_POWER_TIMEOUT_MS);
    } else {
      this.log(`Resuming cluster ${clusterId}`, "stdout");
      await this.api.resumeCluster(clusterId);
      await this.waitForState(clusterId, "Active", "resume", signal, CLUSTER_POWER_TIMEOUT_MS);
    }
  }

  private async setConnectionPooling(clusterId: string, enabled: boolean, signal: AbortSignal | undefined): Promise<void> {
    this.log(`${enabled ? "Enabling" : "Disabling"} connection pooling on ${clusterId}`, "stdout");
    await this.api.updateConnectionPooling(clusterId, enabled ? "ENABLE" : "DISABLE");
    await this.waitForState(clusterId, "Active", "update", signal, CLUSTER_POWER_TIMEOUT_MS);
  }

  private async restore(clusterId: string, backupId: string, signal: AbortSignal | undefined): Promise<void> {
    this.log(`Restoring backup ${backupId} into ${clusterId}`, "stdout");
    const restore = await this.api.createRestore(clusterId, backupId);
    await this.poller.waitFor({
      resourceId: clusterId,
      kind: "restore",
      description: `restore ${backupId}`,
      check: restoreSucceeded(this.api, restore.info.id),
      timeoutMs: RESTORE_TIMEOUT_MS,
      signal,
    });
  }

  /**
   * The service creates a default schedule with every cluster; a requested
   * schedule edits that one. Returns the schedule ids to read back.
   */
  private async applyBackupSchedule(clusterId: string, spec: ClusterSpec): Promise<string[] | null> {
    const schedules = spec.backupSchedules;
    if (!isSet(schedules)) return null;
    const [desired] = schedules;
    if (!desired) return [];

    const [current] = await this.api.listBackupSchedules(clusterId);
    if (!current) {
      throw new ConfigurationError(
        "No backup schedule to edit",
        `Cluster ${clusterId} has no backup schedule.`,
        ["backupSchedules"],
      );
    }
    await this.api.editBackupSchedule(clusterId, current.info.id, translateBackupSchedule(desired, current));
    return [current.info.id];
  }

  private carryOverFromSpec(spec: ClusterSpec, backupScheduleIds: string[] | null): ClusterCarryOver {
    return {
      credentials: spec.credentials,
      restoreBackupId: spec.restoreBackupId ?? null,
      cmkSpec: spec.cmkSpec ?? null,
      clusterAllowListIds: spec.clusterAllowListIds ?? null,
      backupScheduleIds,
    };
  }

  private regionIndexOf(state: ClusterState): RegionIndex {
    return buildRegionIndex(state.clusterRegionInfo.map((region) => region.region));
  }

  private readContext(refs: CrossReferenceResolver): ReadContext {
    return {
      api: this.api,
      refs,
      poller: this.poller,
      flags: this.config.featureFlags,
      scope: this.scope,
    };
  }
}
