/**
 * Reconciler Factory
 *
 * Creates and wires up all resource managers around one API binding and one
 * operation poller.
 */

import { noopLog, type EngineConfig, type LogCallback, type Scope } from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";

import {
  AllowListManager,
  BackupManager,
  ClusterManager,
  DbAuditLoggingManager,
  IntegrationManager,
  ReadReplicaManager,
  VpcManager,
} from "./managers";

import type {
  IAllowListManager,
  IBackupManager,
  IClusterManager,
  IDbAuditLoggingManager,
  IIntegrationManager,
  IOperationPoller,
  IReadReplicaManager,
  IVpcManager,
} from "./managers";

import { systemClock, type Clock } from "./poller/clock";
import { OperationPoller } from "./poller/operation-poller";
import type { ProgressListener } from "./poller/outcome";
import { RetryPolicy } from "./poller/retry-policy";

/**
 * Configuration for the reconciler factory.
 */
export interface ReconcilerFactoryConfig {
  /** Bound API client */
  api: IManagedDbApi;
  /** Account and project the api is bound to; stamped on every state */
  scope: Scope;
  engine: EngineConfig;
  /** Log callback function */
  log?: LogCallback;
  /** Time source for polling (default: system clock) */
  clock?: Clock;
  onProgress?: ProgressListener;
}

/**
 * Collection of all resource managers.
 */
export interface Reconcilers {
  /** Shared poller, exposed for callers that wait on their own checks */
  poller: IOperationPoller;
  clusters: IClusterManager;
  vpcs: IVpcManager;
  allowLists: IAllowListManager;
  readReplicas: IReadReplicaManager;
  backups: IBackupManager;
  integrations: IIntegrationManager;
  dbAuditLogging: IDbAuditLoggingManager;
}

export class ReconcilerFactory {
  static createManagers(config: ReconcilerFactoryConfig): Reconcilers {
    const { api, scope, engine } = config;
    const log = config.log ?? noopLog;

    const policy = new RetryPolicy(engine.pollIntervalMs, engine.operationTimeoutMs, config.clock ?? systemClock);
    const poller = new OperationPoller(policy, log, config.onProgress);

    return {
      poller,
      clusters: new ClusterManager(api, poller, engine, scope, log),
      vpcs: new VpcManager(api, poller, engine, scope, log),
      allowLists: new AllowListManager(api, poller, engine, scope, log),
      readReplicas: new ReadReplicaManager(api, poller, engine, scope, log),
      backups: new BackupManager(api, poller, engine, scope, log),
      integrations: new IntegrationManager(api, poller, engine, scope, log),
      dbAuditLogging: new DbAuditLoggingManager(api, poller, engine, scope, log),
    };
  }
}
