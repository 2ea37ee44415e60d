import type { IntegrationSpec, IntegrationState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/** Telemetry integrations (metrics and log sinks). */
export interface IIntegrationManager {
  create(spec: IntegrationSpec, options?: ReconcileOptions): Promise<IntegrationState>;
  refresh(prior: IntegrationState, options?: ReconcileOptions): Promise<IntegrationState>;
  /** Always rejects with `ConfigurationError` */
  update(prior: IntegrationState, spec: IntegrationSpec): Promise<IntegrationState>;
  delete(prior: IntegrationState, options?: ReconcileOptions): Promise<boolean>;
}
