import {
  AUDIT_LOGGING_TIMEOUT_MS,
  type DbAuditLoggingSpec,
  type DbAuditLoggingState,
  type EngineConfig,
  type LogCallback,
  type Scope,
} from "@dbplane/core";
import type { IManagedDbApi, TaskType } from "@dbplane/api-client";
import { taskCompletion } from "../poller/watchers";
import type { OperationKind } from "../poller/outcome";
import type { ReadContext } from "../reader/context";
import { readDbAuditLoggingState } from "../reader/resource-reader";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { translateAuditLoggingSpec, validateAuditLoggingRules } from "../translator/integration-translator";
import type { IDbAuditLoggingManager, IOperationPoller, ReconcileOptions } from "./interfaces";

export class DbAuditLoggingManager implements IDbAuditLoggingManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: DbAuditLoggingSpec, options: ReconcileOptions = {}): Promise<DbAuditLoggingState> {
    validateAuditLoggingRules(spec);
    const refs = new CrossReferenceResolver(this.api);
    const payload = await translateAuditLoggingSpec(spec, refs);

    this.log(`Enabling database audit logging on ${spec.clusterId}`, "stdout");
    const created = await this.api.createDbAuditConfig(spec.clusterId, payload);
    options.onCreated?.(created.info.id);
    await this.waitForTask(spec.clusterId, "ENABLE_DATABASE_AUDIT_LOGGING", "create", options.signal);

    return readDbAuditLoggingState(this.readContext(refs), spec.clusterId);
  }

  async refresh(prior: DbAuditLoggingState): Promise<DbAuditLoggingState> {
    return readDbAuditLoggingState(this.readContext(new CrossReferenceResolver(this.api)), prior.clusterId);
  }

  async update(
    prior: DbAuditLoggingState,
    spec: DbAuditLoggingSpec,
    options: ReconcileOptions = {},
  ): Promise<DbAuditLoggingState> {
    validateAuditLoggingRules(spec);
    const refs = new CrossReferenceResolver(this.api);
    const payload = await translateAuditLoggingSpec(spec, refs);

    this.log(`Updating database audit logging on ${prior.clusterId}`, "stdout");
    await this.api.updateDbAuditConfig(prior.clusterId, prior.configId, payload);
    await this.waitForTask(prior.clusterId, "EDIT_DATABASE_AUDIT_LOGGING", "update", options.signal);

    return readDbAuditLoggingState(this.readContext(refs), prior.clusterId);
  }

  async delete(prior: DbAuditLoggingState, options: ReconcileOptions = {}): Promise<boolean> {
    const configs = await this.api.listDbAuditConfigs(prior.clusterId);
    if (!configs.some((config) => config.info.id === prior.configId)) return false;

    this.log(`Disabling database audit logging on ${prior.clusterId}`, "stdout");
    await this.api.deleteDbAuditConfig(prior.clusterId, prior.configId);
    await this.waitForTask(prior.clusterId, "DISABLE_DATABASE_AUDIT_LOGGING", "delete", options.signal);
    return true;
  }

  private async waitForTask(
    clusterId: string,
    taskType: TaskType,
    kind: OperationKind,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    await this.poller.waitFor({
      resourceId: clusterId,
      kind,
      description: `${taskType.toLowerCase().replace(/_/g, " ")} on ${clusterId}`,
      check: taskCompletion(this.api, { entityId: clusterId, entityType: "CLUSTER", taskType }),
      timeoutMs: AUDIT_LOGGING_TIMEOUT_MS,
      signal,
    });
  }

  private readContext(refs: CrossReferenceResolver): ReadContext {
    return {
      api: this.api,
      refs,
      poller: this.poller,
      flags: this.config.featureFlags,
      scope: this.scope,
    };
  }
}
