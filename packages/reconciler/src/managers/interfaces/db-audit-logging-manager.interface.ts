import type { DbAuditLoggingSpec, DbAuditLoggingState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/**
 * Database audit-log export for one cluster. Each mutation spawns a cluster
 * task that is waited on.
 */
export interface IDbAuditLoggingManager {
  create(spec: DbAuditLoggingSpec, options?: ReconcileOptions): Promise<DbAuditLoggingState>;
  refresh(prior: DbAuditLoggingState, options?: ReconcileOptions): Promise<DbAuditLoggingState>;
  update(prior: DbAuditLoggingState, spec: DbAuditLoggingSpec, options?: ReconcileOptions): Promise<DbAuditLoggingState>;
  delete(prior: DbAuditLoggingState, options?: ReconcileOptions): Promise<boolean>;
}
