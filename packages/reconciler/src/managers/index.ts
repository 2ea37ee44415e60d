export { ClusterManager } from "./cluster-manager";
export { VpcManager } from "./vpc-manager";
export { AllowListManager } from "./allow-list-manager";
export { ReadReplicaManager } from "./read-replica-manager";
export { BackupManager } from "./backup-manager";
export { IntegrationManager } from "./integration-manager";
export { DbAuditLoggingManager } from "./db-audit-logging-manager";

export type {
  IOperationPoller,
  ReconcileOptions,
  IClusterManager,
  IVpcManager,
  IAllowListManager,
  IReadReplicaManager,
  IBackupManager,
  IIntegrationManager,
  IDbAuditLoggingManager,
} from "./interfaces";
