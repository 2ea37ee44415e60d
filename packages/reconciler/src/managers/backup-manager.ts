import {
  BACKUP_CREATE_TIMEOUT_MS,
  ConfigurationError,
  OperationTimeout,
  RESOURCE_DELETE_TIMEOUT_MS,
  type BackupSpec,
  type BackupState,
  type EngineConfig,
  type LogCallback,
  type Scope,
} from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import { backupSucceeded, resourceGone } from "../poller/watchers";
import type { ReadContext } from "../reader/context";
import { readFor } from "../reader/read-purpose";
import { readBackupState } from "../reader/resource-reader";
import { translateBackupSpec } from "../translator/backup-translator";
import { CrossReferenceResolver } from "../translator/cross-reference";
import type { IBackupManager, IOperationPoller, ReconcileOptions } from "./interfaces";

export class BackupManager implements IBackupManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: BackupSpec, options: ReconcileOptions = {}): Promise<BackupState> {
    this.log(`Taking backup of cluster ${spec.clusterId}`, "stdout");
    const created = await this.api.createBackup(translateBackupSpec(spec));
    const backupId = created.info.id;
    options.onCreated?.(backupId);

    try {
      await this.poller.waitFor({
        resourceId: backupId,
        kind: "create",
        description: `backup ${backupId}`,
        check: backupSucceeded(this.api, backupId),
        timeoutMs: BACKUP_CREATE_TIMEOUT_MS,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof OperationTimeout && !error.cancelled) {
        throw new OperationTimeout(
          "The operation timed out waiting for the backup to complete.",
          backupId,
          error.elapsedMs,
          false,
          "Unable to create backup",
        );
      }
      throw error;
    }

    return readBackupState(this.readContext(), backupId);
  }

  async refresh(prior: BackupState): Promise<BackupState> {
    return readBackupState(this.readContext(), prior.backupId);
  }

  async update(): Promise<BackupState> {
    throw new ConfigurationError(
      "Unable to update backup",
      "Updating backups is not currently supported. Delete and recreate the provider.",
    );
  }

  async delete(prior: BackupState, options: ReconcileOptions = {}): Promise<boolean> {
    const current = await readFor("delete-precheck", () => this.api.getBackup(prior.backupId));
    if (current === null) return false;

    this.log(`Deleting backup ${prior.backupId}`, "stdout");
    await this.api.deleteBackup(prior.backupId);
    await this.poller.waitFor({
      resourceId: prior.backupId,
      kind: "delete",
      description: `delete backup ${prior.backupId}`,
      check: resourceGone((signal) => this.api.getBackup(prior.backupId, { signal })),
      timeoutMs: RESOURCE_DELETE_TIMEOUT_MS,
      signal: options.signal,
    });
    return true;
  }

  private readContext(): ReadContext {
    return {
      api: this.api,
      refs: new CrossReferenceResolver(this.api),
      poller: this.poller,
      flags: this.config.featureFlags,
      scope: this.scope,
    };
  }
}
