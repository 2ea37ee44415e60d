/**
 * Cluster Manager Interface
 *
 * Lifecycle of a database cluster, including its backup schedule, allow-list
 * assignment, encryption key, power state and connection pooling.
 */

import type { ClusterSpec, ClusterState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

export interface IClusterManager {
  /**
   * Create a cluster and apply every post-create setting in order: backup
   * schedule, allow lists, restore, pause, connection pooling.
   */
  create(spec: ClusterSpec, options?: ReconcileOptions): Promise<ClusterState>;

  /**
   * Re-read a cluster. Throws `NotFoundError` when it no longer exists.
   */
  refresh(prior: ClusterState, options?: ReconcileOptions): Promise<ClusterState>;

  /**
   * Move the cluster from `prior` to `spec`.
   */
  update(prior: ClusterState, spec: ClusterSpec, options?: ReconcileOptions): Promise<ClusterState>;

  /**
   * Delete the cluster and wait for the deletion task.
   *
   * @returns false when the cluster was already gone
   */
  delete(prior: ClusterState, options?: ReconcileOptions): Promise<boolean>;
}
