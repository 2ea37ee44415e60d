// ---------------------------------------------------------------------------
// Status checks handed to the Operation Poller, one per kind of wait
// ---------------------------------------------------------------------------

import { EDIT_TASK_NOT_FOUND_RETRIES, NotFoundError } from "@dbplane/core";
import type { ClusterData, IManagedDbApi, TaskQuery, TaskState } from "@dbplane/api-client";
import { done, failed, pending, type PollOutcome } from "./outcome";

export type TaskStatus = TaskState | "TASK_NOT_FOUND";

type Check<T> = (attempt: number, signal?: AbortSignal) => Promise<PollOutcome<T>>;

/** State of the most recent task matching `query`. */
export async function readTaskState(
  api: IManagedDbApi,
  query: TaskQuery,
  signal?: AbortSignal,
): Promise<TaskStatus> {
  const [latest] = await api.listTasks(query, { signal });
  return latest ? latest.info.state : "TASK_NOT_FOUND";
}

/** Completes when the latest matching task succeeds. */
export function taskCompletion(api: IManagedDbApi, query: TaskQuery): Check<void> {
  return async (_attempt, signal) => {
    const state = await readTaskState(api, query, signal);
    if (state === "SUCCEEDED") return done(state, undefined);
    if (state === "FAILED") {
      return failed(state, `The ${query.taskType} task for ${query.entityId} failed`);
    }
    return pending(state);
  };
}

/**
 * Watches the task spawned by a cluster edit. An edit that changes nothing
 * the service provisions spawns no task, so:
 *
 * - TASK_NOT_FOUND is tolerated `tolerance` times, after which the edit is
 *   taken to have needed no task;
 * - the first task observed must be IN_PROGRESS, otherwise it belongs to an
 *   earlier edit and no new task was spawned.
 *
 * Resolves to whether a new task ran.
 */
export function editTaskCompletion(
  api: IManagedDbApi,
  clusterId: string,
  tolerance = EDIT_TASK_NOT_FOUND_RETRIES,
): Check<boolean> {
  const query: TaskQuery = { entityId: clusterId, entityType: "CLUSTER", taskType: "EDIT_CLUSTER" };
  let misses = 0;
  let seenTask = false;

  return async (_attempt, signal) => {
    const state = await readTaskState(api, query, signal);
    if (state === "TASK_NOT_FOUND") {
      if (misses < tolerance) {
        misses += 1;
        return pending(state);
      }
      return done(state, false);
    }
    if (!seenTask) {
      seenTask = true;
      if (state !== "IN_PROGRESS") return done(state, false);
    }
    if (state === "SUCCEEDED") return done(state, true);
    if (state === "FAILED") return failed(state, `The cluster edit for ${clusterId} failed`);
    return pending(state);
  };
}

function isCreateFailure(state: string): boolean {
  return state.toUpperCase().replace(/\s+/g, "_") === "CREATE_FAILED";
}

/**
 * Completes when the cluster state equals `target` (case-insensitive).
 * While waiting for Active, a failed creation is terminal.
 */
export function clusterStateReached(
  api: IManagedDbApi,
  clusterId: string,
  target: "Active" | "Paused",
): Check<ClusterData> {
  return async (_attempt, signal) => {
    const cluster = await api.getCluster(clusterId, { signal });
    const state = cluster.info.state;
    if (state.toLowerCase() === target.toLowerCase()) return done(state, cluster);
    if (target === "Active" && isCreateFailure(state)) {
      return failed(state, `Cluster ${clusterId} could not be created`);
    }
    return pending(state);
  };
}

export function vpcActive(api: IManagedDbApi, vpcId: string): Check<void> {
  return async (_attempt, signal) => {
    const vpc = await api.getVpc(vpcId, { signal });
    if (vpc.info.state === "ACTIVE") return done(vpc.info.state, undefined);
    if (vpc.info.state === "FAILED") return failed(vpc.info.state, `VPC ${vpcId} could not be created`);
    return pending(vpc.info.state);
  };
}

export function restoreSucceeded(api: IManagedDbApi, restoreId: string): Check<void> {
  return async (_attempt, signal) => {
    const restore = await api.getRestore(restoreId, { signal });
    if (restore.info.state === "SUCCEEDED") return done(restore.info.state, undefined);
    if (restore.info.state === "FAILED") return failed(restore.info.state, `Restore ${restoreId} failed`);
    return pending(restore.info.state);
  };
}

export function backupSucceeded(api: IManagedDbApi, backupId: string): Check<void> {
  return async (_attempt, signal) => {
    const backup = await api.getBackup(backupId, { signal });
    if (backup.info.state === "SUCCEEDED") return done(backup.info.state, undefined);
    if (backup.info.state === "FAILED") return failed(backup.info.state, `Backup ${backupId} failed`);
    return pending(backup.info.state);
  };
}

/** Completes once `read` reports the resource missing. */
export function resourceGone(read: (signal?: AbortSignal) => Promise<unknown>): Check<void> {
  return async (_attempt, signal) => {
    try {
      await read(signal);
    } catch (error) {
      if (error instanceof NotFoundError) return done("DELETED", undefined);
      throw error;
    }
    return pending("DELETING");
  };
}
