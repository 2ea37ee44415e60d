// ---------------------------------------------------------------------------
// Control-plane wire protocol: request payloads and response schemas
// ---------------------------------------------------------------------------

import { z } from "zod";

/** Every successful response wraps its payload in `{ data }`. */
export const ResponseEnvelopeSchema = z.object({ data: z.unknown() });

// ---- Shared ---------------------------------------------------------------

export const CloudInfoSchema = z.object({
  code: z.string(),
  region: z.string(),
});

export const PlacementInfoSchema = z.object({
  cloud_info: CloudInfoSchema,
  num_nodes: z.number().int(),
  vpc_id: z.string().nullish(),
  num_replicas: z.number().int().nullish(),
  multi_zone: z.boolean().nullish(),
});

export type PlacementInfo = z.infer<typeof PlacementInfoSchema>;

export const NodeInfoSchema = z.object({
  num_cores: z.number().int(),
  memory_mb: z.number().int(),
  disk_size_gb: z.number().int(),
  disk_iops: z.number().int().nullish(),
});

export type NodeInfo = z.infer<typeof NodeInfoSchema>;

export const AccessibilityType = z.enum(["PUBLIC", "PRIVATE", "PRIVATE_SERVICE_ENDPOINT"]);
export type AccessibilityType = z.infer<typeof AccessibilityType>;

// ---- Clusters -------------------------------------------------------------

export const ClusterRegionInfoSchema = z.object({
  placement_info: PlacementInfoSchema,
  node_info: NodeInfoSchema.nullish(),
  accessibility_types: z.array(AccessibilityType).default([]),
  is_default: z.boolean().default(false),
  is_affinitized: z.boolean().default(false),
});

export type ClusterRegionInfo = z.infer<typeof ClusterRegionInfoSchema>;

export const ClusterInfoPayloadSchema = z.object({
  cluster_tier: z.string(),
  num_nodes: z.number().int(),
  fault_tolerance: z.string(),
  num_faults_to_tolerate: z.number().int().nullish(),
  is_production: z.boolean(),
  cluster_type: z.string().nullish(),
  version: z.number().int().nullish(),
  node_info: NodeInfoSchema.nullish(),
});

export const ClusterSpecPayloadSchema = z.object({
  name: z.string(),
  cluster_info: ClusterInfoPayloadSchema,
  software_info: z.object({ track_id: z.string().nullish() }),
  cluster_region_info: z.array(ClusterRegionInfoSchema),
});

export type ClusterSpecPayload = z.infer<typeof ClusterSpecPayloadSchema>;

export const ClusterDataSchema = z.object({
  info: z.object({
    id: z.string(),
    state: z.string(),
    software_version: z.string().nullish(),
    is_connection_pooling_enabled: z.boolean().default(false),
    metadata: z.object({
      created_on: z.string().nullish(),
      updated_on: z.string().nullish(),
    }).nullish(),
    cluster_endpoints: z.array(z.object({
      accessibility_type: z.string(),
      host: z.string(),
      region: z.string(),
    })).default([]),
  }),
  spec: ClusterSpecPayloadSchema,
});

export type ClusterData = z.infer<typeof ClusterDataSchema>;

export interface DbCredentialsPayload {
  ysql: { username: string; password: string };
  ycql: { username: string; password: string };
}

export const AwsCmkPayloadSchema = z.object({
  access_key: z.string(),
  secret_key: z.string(),
  arn_list: z.array(z.string()),
});

export const AzureCmkPayloadSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  tenant_id: z.string(),
  key_vault_uri: z.string(),
  key_name: z.string(),
});

export const CmkPayloadSchema = z.object({
  provider_type: z.string(),
  is_enabled: z.boolean(),
  aws_cmk_spec: AwsCmkPayloadSchema.nullish(),
  azure_cmk_spec: AzureCmkPayloadSchema.nullish(),
});

export type CmkPayload = z.infer<typeof CmkPayloadSchema>;

export const CmkDataSchema = z.object({
  spec: CmkPayloadSchema.nullish(),
});

export type CmkData = z.infer<typeof CmkDataSchema>;

export interface CreateClusterRequest {
  cluster_spec: ClusterSpecPayload;
  db_credentials: DbCredentialsPayload;
  security_cmk_spec?: CmkPayload;
}

export type ConnectionPoolingAction = "ENABLE" | "DISABLE";

// ---- Tasks ----------------------------------------------------------------

export const TaskState = z.enum(["IN_PROGRESS", "SUCCEEDED", "FAILED"]);
export type TaskState = z.infer<typeof TaskState>;

export const TaskDataSchema = z.object({
  info: z.object({
    id: z.string(),
    entity_id: z.string(),
    entity_type: z.string(),
    task_type: z.string(),
    state: TaskState,
  }),
});

export type TaskData = z.infer<typeof TaskDataSchema>;

export type TaskType =
  | "CREATE_CLUSTER"
  | "EDIT_CLUSTER"
  | "DELETE_CLUSTER"
  | "EDIT_ALLOW_LIST"
  | "ENABLE_DATABASE_AUDIT_LOGGING"
  | "EDIT_DATABASE_AUDIT_LOGGING"
  | "DISABLE_DATABASE_AUDIT_LOGGING";

export interface TaskQuery {
  entityId: string;
  entityType: "CLUSTER";
  taskType: TaskType;
}

// ---- Lookups --------------------------------------------------------------

export const TrackDataSchema = z.object({
  info: z.object({ id: z.string() }),
  spec: z.object({ name: z.string() }),
});

export type TrackData = z.infer<typeof TrackDataSchema>;

export const NodeConfigurationSchema = z.object({
  num_cores: z.number().int(),
  memory_mb: z.number().int(),
  include_disk_size_gb: z.number().int(),
});

export type NodeConfiguration = z.infer<typeof NodeConfigurationSchema>;

export const NodeConfigurationMapSchema = z.record(z.array(NodeConfigurationSchema));

export interface NodeConfigurationQuery {
  cloud: string;
  tier: string;
  region: string;
}

// ---- Backup schedules and restores ----------------------------------------

export const BackupSchedulePayloadSchema = z.object({
  state: z.string(),
  description: z.string().nullish(),
  retention_period_in_days: z.number().int(),
  cron_expression: z.string().nullish(),
  time_interval_in_days: z.number().int().nullish(),
  incremental_interval_in_minutes: z.number().int().nullish(),
});

export type BackupSchedulePayload = z.infer<typeof BackupSchedulePayloadSchema>;

export const BackupScheduleDataSchema = z.object({
  info: z.object({ id: z.string() }),
  spec: BackupSchedulePayloadSchema,
});

export type BackupScheduleData = z.infer<typeof BackupScheduleDataSchema>;

export const RestoreDataSchema = z.object({
  info: z.object({ id: z.string(), state: z.string() }),
});

export type RestoreData = z.infer<typeof RestoreDataSchema>;

// ---- VPCs -----------------------------------------------------------------

export const VpcSpecPayloadSchema = z.object({
  name: z.string(),
  cloud: z.string(),
  parent_cidr: z.string().nullish(),
  region_specs: z.array(z.object({
    region: z.string(),
    cidr: z.string().nullish(),
  })).nullish(),
});

export type VpcSpecPayload = z.infer<typeof VpcSpecPayloadSchema>;

export const VpcDataSchema = z.object({
  info: z.object({
    id: z.string(),
    state: z.string(),
    external_vpc_id: z.string().nullish(),
  }),
  spec: VpcSpecPayloadSchema,
});

export type VpcData = z.infer<typeof VpcDataSchema>;

// ---- Allow lists ----------------------------------------------------------

export const AllowListSpecPayloadSchema = z.object({
  name: z.string(),
  description: z.string(),
  allow_list: z.array(z.string()),
});

export type AllowListSpecPayload = z.infer<typeof AllowListSpecPayloadSchema>;

export const AllowListDataSchema = z.object({
  info: z.object({
    id: z.string(),
    cluster_ids: z.array(z.string()).default([]),
  }),
  spec: AllowListSpecPayloadSchema,
});

export type AllowListData = z.infer<typeof AllowListDataSchema>;

// ---- Read replicas --------------------------------------------------------

export const ReadReplicaSpecPayloadSchema = z.object({
  placement_info: PlacementInfoSchema,
  node_info: NodeInfoSchema.nullish(),
});

export type ReadReplicaSpecPayload = z.infer<typeof ReadReplicaSpecPayloadSchema>;

export const ReadReplicaListDataSchema = z.object({
  info: z.object({
    endpoints: z.array(z.object({
      region: z.string(),
      host: z.string(),
    })).nullish(),
  }),
  spec: z.array(ReadReplicaSpecPayloadSchema),
});

export type ReadReplicaListData = z.infer<typeof ReadReplicaListDataSchema>;

// ---- Backups --------------------------------------------------------------

export const BackupSpecPayloadSchema = z.object({
  cluster_id: z.string(),
  description: z.string().nullish(),
  retention_period_in_days: z.number().int(),
});

export type BackupSpecPayload = z.infer<typeof BackupSpecPayloadSchema>;

export const BackupDataSchema = z.object({
  info: z.object({
    id: z.string(),
    state: z.string(),
    create_time: z.string().nullish(),
  }),
  spec: BackupSpecPayloadSchema,
});

export type BackupData = z.infer<typeof BackupDataSchema>;

// ---- Integrations (telemetry providers) -----------------------------------

export const TelemetryProviderSpecPayloadSchema = z.object({
  name: z.string(),
  type: z.string(),
  datadog_spec: z.object({ site: z.string(), api_key: z.string() }).nullish(),
  prometheus_spec: z.object({ endpoint: z.string() }).nullish(),
  grafana_spec: z.object({
    access_policy_token: z.string(),
    zone: z.string(),
    instance_id: z.string(),
    org_slug: z.string(),
  }).nullish(),
  sumologic_spec: z.object({
    access_key: z.string(),
    access_id: z.string(),
    installation_token: z.string(),
  }).nullish(),
  googlecloud_spec: z.object({
    type: z.string(),
    project_id: z.string(),
    private_key: z.string(),
    private_key_id: z.string(),
    client_email: z.string(),
    client_id: z.string(),
    auth_uri: z.string(),
    token_uri: z.string(),
    auth_provider_x509_cert_url: z.string(),
    client_x509_cert_url: z.string(),
    universe_domain: z.string().nullish(),
  }).nullish(),
});

export type TelemetryProviderSpecPayload = z.infer<typeof TelemetryProviderSpecPayloadSchema>;

export const TelemetryProviderDataSchema = z.object({
  info: z.object({
    id: z.string(),
    is_valid: z.boolean().default(true),
  }),
  spec: TelemetryProviderSpecPayloadSchema,
});

export type TelemetryProviderData = z.infer<typeof TelemetryProviderDataSchema>;

// ---- Database audit logging -----------------------------------------------

export const DbAuditExporterSpecPayloadSchema = z.object({
  exporter_id: z.string(),
  ysql_config: z.object({
    log_settings: z.object({
      log_catalog: z.boolean(),
      log_client: z.boolean(),
      log_level: z.string(),
      log_parameter: z.boolean(),
      log_relation: z.boolean(),
      log_statement_once: z.boolean(),
    }),
    statement_classes: z.array(z.string()),
  }),
});

export type DbAuditExporterSpecPayload = z.infer<typeof DbAuditExporterSpecPayloadSchema>;

export const DbAuditExporterConfigDataSchema = z.object({
  info: z.object({
    id: z.string(),
    cluster_id: z.string(),
    state: z.string(),
  }),
  spec: DbAuditExporterSpecPayloadSchema,
});

export type DbAuditExporterConfigData = z.infer<typeof DbAuditExporterConfigDataSchema>;

// ---- Errors ---------------------------------------------------------------

export const ApiErrorBodySchema = z.object({
  error: z.object({
    detail: z.string().nullish(),
    status: z.number().int().nullish(),
  }),
});
