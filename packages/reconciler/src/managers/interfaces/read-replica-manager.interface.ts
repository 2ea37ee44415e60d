import type { ReadReplicasSpec, ReadReplicasState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/**
 * The set of read replicas attached to one primary cluster, managed as a
 * whole.
 */
export interface IReadReplicaManager {
  create(spec: ReadReplicasSpec, options?: ReconcileOptions): Promise<ReadReplicasState>;
  refresh(prior: ReadReplicasState, options?: ReconcileOptions): Promise<ReadReplicasState>;
  update(prior: ReadReplicasState, spec: ReadReplicasSpec, options?: ReconcileOptions): Promise<ReadReplicasState>;
  delete(prior: ReadReplicasState, options?: ReconcileOptions): Promise<boolean>;
}
