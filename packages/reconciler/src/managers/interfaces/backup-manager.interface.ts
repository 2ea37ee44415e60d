import type { BackupSpec, BackupState } from "@dbplane/core";
import type { ReconcileOptions } from "./reconcile-options";

/** On-demand backups. Immutable once taken. */
export interface IBackupManager {
  create(spec: BackupSpec, options?: ReconcileOptions): Promise<BackupState>;
  refresh(prior: BackupState, options?: ReconcileOptions): Promise<BackupState>;
  /** Always rejects with `ConfigurationError` */
  update(prior: BackupState, spec: BackupSpec): Promise<BackupState>;
  delete(prior: BackupState, options?: ReconcileOptions): Promise<boolean>;
}
