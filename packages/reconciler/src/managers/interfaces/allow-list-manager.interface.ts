import type { AllowListSpec, AllowListState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/**
 * Network allow lists. Deleting one first detaches it from every cluster
 * that uses it.
 */
export interface IAllowListManager {
  create(spec: AllowListSpec, options?: ReconcileOptions): Promise<AllowListState>;
  refresh(prior: AllowListState, options?: ReconcileOptions): Promise<AllowListState>;
  /** Always rejects with `ConfigurationError` */
  update(prior: AllowListState, spec: AllowListSpec): Promise<AllowListState>;
  delete(prior: AllowListState, options?: ReconcileOptions): Promise<boolean>;
}
