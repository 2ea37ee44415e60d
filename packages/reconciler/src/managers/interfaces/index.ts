/**
 * Manager Interfaces
 *
 * Re-exports all manager interfaces for dependency injection and testing.
 */

export type { IOperationPoller } from "./operation-poller.interface";
export type { ReconcileOptions } from "./reconcile-options";
export type { IClusterManager } from "./cluster-manager.interface";
export type { IVpcManager } from "./vpc-manager.interface";
export type { IAllowListManager } from "./allow-list-manager.interface";
export type { IReadReplicaManager } from "./read-replica-manager.interface";
export type { IBackupManager } from "./backup-manager.interface";
export type { IIntegrationManager } from "./integration-manager.interface";
export type { IDbAuditLoggingManager } from "./db-audit-logging-manager.interface";
