/**
 * Timeout and polling constants for long-running control-plane operations.
 */

/** Interval between two polls of an operation's status */
export const OPERATION_POLL_INTERVAL_MS = 10_000;

/** Default deadline for a single operation (1 hour) */
export const OPERATION_TIMEOUT_MS = 3_600_000;

/** Pause, resume and connection pooling toggles (20 minutes) */
export const CLUSTER_POWER_TIMEOUT_MS = 1_200_000;

/** Backup restore into a cluster (20 minutes) */
export const RESTORE_TIMEOUT_MS = 1_200_000;

/** VPC provisioning (10 minutes) */
export const VPC_CREATE_TIMEOUT_MS = 600_000;

/** On-demand backup completion (10 minutes) */
export const BACKUP_CREATE_TIMEOUT_MS = 600_000;

/** Waiting for a deleted VPC or backup to disappear (5 minutes) */
export const RESOURCE_DELETE_TIMEOUT_MS = 300_000;

/** Enabling, editing or removing database audit logging (40 minutes) */
export const AUDIT_LOGGING_TIMEOUT_MS = 2_400_000;

/** Detaching an allow list from its clusters (40 minutes) */
export const ALLOW_LIST_DETACH_TIMEOUT_MS = 2_400_000;

/** Interval between re-reads while cluster allow lists converge */
export const ALLOW_LIST_SYNC_INTERVAL_MS = 1_000;

/** Per-request HTTP timeout */
export const HTTP_REQUEST_TIMEOUT_MS = 60_000;
