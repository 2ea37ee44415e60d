import { z } from "zod";
import {
  CloudType,
  ClusterTier,
  ClusterType,
  ConnectionPoolingState,
  DesiredState,
  FaultTolerance,
  NodeConfigSpecSchema,
  NodeConfigStateSchema,
  ScopeSchema,
} from "./common";

// Credentials: one common pair, or a YSQL pair plus a YCQL pair
export const CredentialsSchema = z.object({
  username: z.string().nullish(),
  password: z.string().nullish(),
  ysqlUsername: z.string().nullish(),
  ysqlPassword: z.string().nullish(),
  ycqlUsername: z.string().nullish(),
  ycqlPassword: z.string().nullish(),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

// Per-region placement. vpcId and vpcName are mutually exclusive per element.
export const RegionSpecSchema = z.object({
  region: z.string().min(1),
  numNodes: z.number().int().positive(),
  numCores: z.number().int().positive().nullish(),
  diskSizeGb: z.number().int().positive().nullish(),
  diskIops: z.number().int().nonnegative().nullish(),
  vpcId: z.string().nullish(),
  vpcName: z.string().nullish(),
  publicAccess: z.boolean().nullish(),
  isPreferred: z.boolean().nullish(),
  isDefault: z.boolean().nullish(),
});

export type RegionSpec = z.infer<typeof RegionSpecSchema>;

export const RegionStateSchema = z.object({
  region: z.string(),
  numNodes: z.number().int(),
  numCores: z.number().int(),
  diskSizeGb: z.number().int(),
  diskIops: z.number().int().nullable(),
  vpcId: z.string().nullable(),
  vpcName: z.string().nullable(),
  publicAccess: z.boolean(),
  isPreferred: z.boolean(),
  isDefault: z.boolean(),
});

export type RegionState = z.infer<typeof RegionStateSchema>;

export const BackupScheduleState = z.enum(["ACTIVE", "PAUSED"]);
export type BackupScheduleState = z.infer<typeof BackupScheduleState>;

export const BackupScheduleSpecSchema = z.object({
  state: BackupScheduleState.nullish(),
  retentionPeriodInDays: z.number().int().nonnegative().nullish(),
  backupDescription: z.string().nullish(),
  cronExpression: z.string().nullish(),
  timeIntervalInDays: z.number().int().nonnegative().nullish(),
  incrementalIntervalInMins: z.number().int().nonnegative().nullish(),
});

export type BackupScheduleSpec = z.infer<typeof BackupScheduleSpecSchema>;

export const BackupScheduleStateSchema = z.object({
  scheduleId: z.string(),
  state: BackupScheduleState,
  retentionPeriodInDays: z.number().int(),
  backupDescription: z.string(),
  cronExpression: z.string().nullable(),
  timeIntervalInDays: z.number().int().nullable(),
  incrementalIntervalInMins: z.number().int().nullable(),
});

export type BackupScheduleInfo = z.infer<typeof BackupScheduleStateSchema>;

// Customer-managed encryption key. Exactly one provider block must match providerType.
export const AwsCmkSpecSchema = z.object({
  accessKey: z.string().min(1),
  secretKey: z.string().min(1),
  arnList: z.array(z.string().min(1)).min(1),
});

export const AzureCmkSpecSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  tenantId: z.string().min(1),
  keyVaultUri: z.string().min(1),
  keyName: z.string().min(1),
});

export const CmkProvider = z.enum(["AWS", "AZURE"]);
export type CmkProvider = z.infer<typeof CmkProvider>;

export const CmkSpecSchema = z.object({
  providerType: CmkProvider,
  isEnabled: z.boolean().default(true),
  awsCmkSpec: AwsCmkSpecSchema.nullish(),
  azureCmkSpec: AzureCmkSpecSchema.nullish(),
});

export type CmkSpec = z.infer<typeof CmkSpecSchema>;

export const ClusterSpecSchema = z.object({
  clusterName: z.string()
    .min(1)
    .max(63)
    .regex(/^[a-zA-Z0-9-]+$/, "Must contain only alphanumeric characters and hyphens"),
  cloudType: CloudType,
  clusterType: ClusterType,
  clusterTier: ClusterTier,
  faultTolerance: FaultTolerance.nullish(),
  numFaultsToTolerate: z.number().int().nonnegative().nullish(),
  clusterRegionInfo: z.array(RegionSpecSchema)
    .min(1, "At least one region is required")
    .refine(
      (regions) => new Set(regions.map((r) => r.region)).size === regions.length,
      { message: "Duplicate regions are not allowed" }
    ),
  nodeConfig: NodeConfigSpecSchema.nullish(),
  databaseTrack: z.string().nullish(),
  desiredState: DesiredState.nullish(),
  desiredConnectionPoolingState: ConnectionPoolingState.nullish(),
  clusterAllowListIds: z.array(z.string()).nullish(),
  restoreBackupId: z.string().nullish(),
  credentials: CredentialsSchema,
  backupSchedules: z.array(BackupScheduleSpecSchema).nullish(),
  cmkSpec: CmkSpecSchema.nullish(),
});

export type ClusterSpec = z.infer<typeof ClusterSpecSchema>;

export const ClusterEndpointSchema = z.object({
  accessibilityType: z.string(),
  host: z.string(),
  region: z.string(),
});

export type ClusterEndpoint = z.infer<typeof ClusterEndpointSchema>;

export const ClusterInfoSchema = z.object({
  state: z.string(),
  softwareVersion: z.string().nullable(),
  createdTime: z.string().nullable(),
  updatedTime: z.string().nullable(),
});

export type ClusterInfo = z.infer<typeof ClusterInfoSchema>;

// Canonical snapshot after settlement
export const ClusterStateSchema = ScopeSchema.extend({
  clusterId: z.string(),
  clusterName: z.string(),
  cloudType: CloudType,
  clusterType: ClusterType,
  clusterTier: ClusterTier,
  faultTolerance: FaultTolerance,
  numFaultsToTolerate: z.number().int(),
  clusterRegionInfo: z.array(RegionStateSchema),
  nodeConfig: NodeConfigStateSchema.nullable(),
  databaseTrack: z.string(),
  desiredState: DesiredState,
  desiredConnectionPoolingState: ConnectionPoolingState.nullable(),
  clusterAllowListIds: z.array(z.string()).nullable(),
  restoreBackupId: z.string().nullable(),
  credentials: CredentialsSchema,
  backupSchedules: z.array(BackupScheduleStateSchema).nullable(),
  cmkSpec: CmkSpecSchema.nullable(),
  clusterVersion: z.number().int(),
  clusterInfo: ClusterInfoSchema,
  endpoints: z.array(ClusterEndpointSchema),
});

export type ClusterState = z.infer<typeof ClusterStateSchema>;

export function validateClusterSpec(data: unknown): ClusterSpec {
  return ClusterSpecSchema.parse(data);
}
