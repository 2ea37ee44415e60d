// Numeric rules the remote service enforces on node and disk configuration.

/** Smallest disk a PAID cluster node may have */
export const MIN_PAID_DISK_SIZE_GB = 50;

/** Disk IOPS bounds for AWS PAID clusters (inclusive) */
export const MIN_DISK_IOPS = 3_000;
export const MAX_DISK_IOPS = 16_000;

/** Custom IOPS must be a multiple of this step */
export const DISK_IOPS_STEP = 1_000;

/** The only IOPS value accepted outside the PAID tier */
export const DEFAULT_DISK_IOPS = 3_000;

/** Error bodies longer than this are truncated before surfacing */
export const MAX_ERROR_BODY_LENGTH = 10_000;

/** Times an edit waits for a task to appear before assuming none was spawned */
export const EDIT_TASK_NOT_FOUND_RETRIES = 6;
