import type { VpcSpec, VpcState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/**
 * Dedicated VPCs. The service cannot modify a VPC in place.
 */
export interface IVpcManager {
  create(spec: VpcSpec, options?: ReconcileOptions): Promise<VpcState>;
  refresh(prior: VpcState, options?: ReconcileOptions): Promise<VpcState>;
  /** Always rejects with `ConfigurationError` */
  update(prior: VpcState, spec: VpcSpec): Promise<VpcState>;
  delete(prior: VpcState, options?: ReconcileOptions): Promise<boolean>;
}
