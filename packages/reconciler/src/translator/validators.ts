/**
 * Spec Validators
 *
 * Rules the schema layer cannot express. All of them run before the first
 * network call and raise `ConfigurationError`.
 */

import {
  ConfigurationError,
  DEFAULT_DISK_IOPS,
  DISK_IOPS_STEP,
  MAX_DISK_IOPS,
  MIN_DISK_IOPS,
  MIN_PAID_DISK_SIZE_GB,
  hasText,
  isSet,
  type CloudType,
  type ClusterSpec,
  type ClusterTier,
  type Credentials,
  type FeatureFlags,
  type OptionalField,
} from "@dbplane/core";

// ---- Credentials ----------------------------------------------------------

const COMMON_CREDENTIAL_FIELDS = ["username", "password"] as const;
const SPLIT_CREDENTIAL_FIELDS = ["ysqlUsername", "ysqlPassword", "ycqlUsername", "ycqlPassword"] as const;

export const INVALID_CREDENTIALS_MESSAGE =
  "Please provide 'username' and 'password' (which would be used in common for both YSQL and YCQL) " +
  "OR all of 'ysql_username', 'ysql_password', 'ycql_username' and 'ycql_password' but not a mix of both.";

/**
 * Accepts the common pair alone, or all four YSQL/YCQL fields alone.
 * Anything else names the fields that were provided.
 */
export function validateCredentials(credentials: Credentials): void {
  const common = COMMON_CREDENTIAL_FIELDS.filter((field) => hasText(credentials[field]));
  const split = SPLIT_CREDENTIAL_FIELDS.filter((field) => hasText(credentials[field]));

  if (common.length === COMMON_CREDENTIAL_FIELDS.length && split.length === 0) return;
  if (split.length === SPLIT_CREDENTIAL_FIELDS.length && common.length === 0) return;

  throw new ConfigurationError("Invalid credentials", INVALID_CREDENTIALS_MESSAGE, [...common, ...split]);
}

// ---- Disk -----------------------------------------------------------------

export function isDiskSizeValid(tier: ClusterTier, diskSizeGb: number): boolean {
  return tier !== "PAID" || diskSizeGb >= MIN_PAID_DISK_SIZE_GB;
}

/** Reason a disk IOPS value is rejected, or null when it is accepted. */
export function diskIopsError(cloud: CloudType, tier: ClusterTier, diskIops: number): string | null {
  if (cloud !== "AWS") {
    return diskIops !== 0 ? "Custom Disk IOPS is only supported for AWS" : null;
  }
  if (tier !== "PAID") {
    return diskIops !== DEFAULT_DISK_IOPS ? "Custom Disk IOPS is only supported for PAID tier" : null;
  }
  if (diskIops % DISK_IOPS_STEP !== 0) {
    return `Disk IOPS must be a multiple of ${DISK_IOPS_STEP}`;
  }
  if (diskIops < MIN_DISK_IOPS || diskIops > MAX_DISK_IOPS) {
    return `Disk IOPS must be between ${MIN_DISK_IOPS} and ${MAX_DISK_IOPS} (inclusive)`;
  }
  return null;
}

export function isDiskIopsValid(cloud: CloudType, tier: ClusterTier, diskIops: number): boolean {
  return diskIopsError(cloud, tier, diskIops) === null;
}

function checkDiskSize(tier: ClusterTier, diskSizeGb: OptionalField<number>, field: string, region?: string): void {
  if (!isSet(diskSizeGb) || isDiskSizeValid(tier, diskSizeGb)) return;
  throw new ConfigurationError(
    region ? `Invalid disk size in ${region}` : "Invalid disk size",
    `The disk size for a paid cluster must be at least ${MIN_PAID_DISK_SIZE_GB} GB.`,
    [field],
  );
}

function checkDiskIops(
  cloud: CloudType,
  tier: ClusterTier,
  diskIops: OptionalField<number>,
  field: string,
  region?: string,
): void {
  if (!isSet(diskIops)) return;
  const reason = diskIopsError(cloud, tier, diskIops);
  if (reason === null) return;
  throw new ConfigurationError(region ? `Invalid disk IOPS in ${region}` : "Invalid disk IOPS", reason, [field]);
}

// ---- VPC references -------------------------------------------------------

export interface VpcReference {
  vpcId?: string | null;
  vpcName?: string | null;
}

/** Name and id together select two things; reject before resolving either. */
export function checkVpcReference(reference: VpcReference, field: string): void {
  if (hasText(reference.vpcId) && hasText(reference.vpcName)) {
    throw new ConfigurationError(
      "Specify VPC name or VPC ID",
      "To select a vpc, use either vpc_name or vpc_id. Don't provide both.",
      [`${field}.vpcId`, `${field}.vpcName`],
    );
  }
}

/** Read replicas need exactly one of the two. */
export function checkRequiredVpcReference(reference: VpcReference, field: string): void {
  checkVpcReference(reference, field);
  if (!hasText(reference.vpcId) && !hasText(reference.vpcName)) {
    throw new ConfigurationError(
      "Specify VPC name or VPC ID",
      "A read replica must be placed in a VPC. Provide either vpc_name or vpc_id.",
      [`${field}.vpcId`, `${field}.vpcName`],
    );
  }
}

// ---- Cluster --------------------------------------------------------------

/**
 * Everything about a cluster spec that can be rejected without a network
 * call: credentials, disk size, disk IOPS, VPC references, default region,
 * backup schedule and customer-managed key. A disabled key is only
 * rejected when the cluster is being created.
 */
export function validateClusterRules(spec: ClusterSpec, creating = true): void {
  validateCredentials(spec.credentials);

  const { cloudType, clusterTier } = spec;
  checkDiskSize(clusterTier, spec.nodeConfig?.diskSizeGb, "nodeConfig.diskSizeGb");
  checkDiskIops(cloudType, clusterTier, spec.nodeConfig?.diskIops, "nodeConfig.diskIops");

  let defaults = 0;
  spec.clusterRegionInfo.forEach((region, index) => {
    const field = `clusterRegionInfo[${index}]`;
    checkVpcReference(region, field);
    checkDiskSize(clusterTier, region.diskSizeGb, `${field}.diskSizeGb`, region.region);
    checkDiskIops(cloudType, clusterTier, region.diskIops, `${field}.diskIops`, region.region);

    if (!isSet(region.numCores) && !isSet(spec.nodeConfig?.numCores)) {
      throw new ConfigurationError(
        `Missing node size in ${region.region}`,
        "Specify num_cores for the region or a root node_config.",
        [`${field}.numCores`],
      );
    }
    if (region.isDefault === true) defaults += 1;
  });

  if (defaults > 1) {
    throw new ConfigurationError("Invalid default region", "Cluster must have exactly one default region.", [
      "clusterRegionInfo",
    ]);
  }

  validateBackupSchedules(spec);
  validateCmk(spec, creating);
}

/** Fields that only take effect behind a feature flag. */
export function checkClusterFeatureFlags(spec: ClusterSpec, flags: FeatureFlags): void {
  if (!flags.connectionPooling && isSet(spec.desiredConnectionPoolingState)) {
    throw new ConfigurationError(
      "Connection pooling is not enabled",
      "desiredConnectionPoolingState requires the connectionPooling feature flag.",
      ["desiredConnectionPoolingState"],
    );
  }
}

function validateBackupSchedules(spec: ClusterSpec): void {
  const schedules = spec.backupSchedules;
  if (!isSet(schedules)) return;
  if (schedules.length > 1) {
    throw new ConfigurationError(
      "Multiple backup schedules provided",
      "More than one schedules were passed. A cluster supports a single backup schedule.",
      ["backupSchedules"],
    );
  }
  const [schedule] = schedules;
  if (!schedule) return;
  if (isSet(schedule.state) !== isSet(schedule.retentionPeriodInDays)) {
    throw new ConfigurationError(
      "Incomplete backup schedule",
      "Pass both state and retention period in days",
      ["backupSchedules[0].state", "backupSchedules[0].retentionPeriodInDays"],
    );
  }
  if (hasText(schedule.cronExpression) && isSet(schedule.timeIntervalInDays)) {
    throw new ConfigurationError(
      "Invalid backup schedule",
      "Specify either cron_expression or time_interval_in_days. Don't provide both.",
      ["backupSchedules[0].cronExpression", "backupSchedules[0].timeIntervalInDays"],
    );
  }
}

function validateCmk(spec: ClusterSpec, creating: boolean): void {
  const cmk = spec.cmkSpec;
  if (!isSet(cmk)) return;
  if (cmk.providerType === "AWS" && !isSet(cmk.awsCmkSpec)) {
    throw new ConfigurationError("Invalid CMK spec", "provider type is AWS but AWS CMK spec is missing", [
      "cmkSpec.awsCmkSpec",
    ]);
  }
  if (cmk.providerType === "AZURE" && !isSet(cmk.azureCmkSpec)) {
    throw new ConfigurationError("Invalid CMK spec", "provider type is AZURE but AZURE CMK spec is missing", [
      "cmkSpec.azureCmkSpec",
    ]);
  }
  if (creating && !cmk.isEnabled) {
    throw new ConfigurationError(
      "Invalid CMK spec",
      "A cluster cannot be created with customer-managed encryption disabled.",
      ["cmkSpec.isEnabled"],
    );
  }
}
