// ---------------------------------------------------------------------------
// On-demand backups and the cluster backup schedule
// ---------------------------------------------------------------------------

import { hasText, isSet, type BackupScheduleSpec, type BackupSpec } from "@dbplane/core";
import type { BackupScheduleData, BackupSchedulePayload, BackupSpecPayload } from "@dbplane/api-client";

export function translateBackupSpec(spec: BackupSpec): BackupSpecPayload {
  return {
    cluster_id: spec.clusterId,
    retention_period_in_days: spec.retentionPeriodInDays,
    ...(hasText(spec.backupDescription) ? { description: spec.backupDescription } : {}),
  };
}

/**
 * Merges the requested schedule over the one the service created with the
 * cluster. Unset fields keep the current value; an empty description keeps
 * the service default. A cron expression replaces a time interval.
 */
export function translateBackupSchedule(
  schedule: BackupScheduleSpec,
  current: BackupScheduleData,
): BackupSchedulePayload {
  const cron = hasText(schedule.cronExpression) ? schedule.cronExpression : undefined;
  const interval = schedule.timeIntervalInDays ?? (cron === undefined ? current.spec.time_interval_in_days : undefined);
  const incremental = schedule.incrementalIntervalInMins;

  return {
    state: schedule.state ?? current.spec.state,
    retention_period_in_days: schedule.retentionPeriodInDays ?? current.spec.retention_period_in_days,
    description: hasText(schedule.backupDescription) ? schedule.backupDescription : current.spec.description,
    ...(cron !== undefined ? { cron_expression: cron } : {}),
    ...(isSet(interval) ? { time_interval_in_days: interval } : {}),
    ...(isSet(incremental) ? { incremental_interval_in_minutes: incremental } : {}),
  };
}
