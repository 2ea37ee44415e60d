/**
 * Resource Kinds
 *
 * One definition per kind of resource a plan can declare: how its spec and
 * persisted state are parsed, which rules run without the network, and
 * which manager reconciles it, and which spec fields a refresh is compared
 * against to find drift. The runner only sees the type-erased
 * `ResourceHandler` built from each definition.
 */

import { z } from "zod";
import {
  AllowListSpecSchema,
  AllowListStateSchema,
  BackupSpecSchema,
  BackupStateSchema,
  ClusterSpecSchema,
  ClusterStateSchema,
  DbAuditLoggingSpecSchema,
  DbAuditLoggingStateSchema,
  IntegrationSpecSchema,
  IntegrationStateSchema,
  ReadReplicasSpecSchema,
  ReadReplicasStateSchema,
  VpcSpecSchema,
  VpcStateSchema,
  type BackupScheduleSpec,
  type ClusterSpec,
  type FeatureFlags,
  type NodeConfigSpec,
  type RegionSpec,
} from "@dbplane/core";
import {
  canonicalTrackName,
  checkClusterFeatureFlags,
  detectDrift,
  translateIntegrationSpec,
  validateAuditLoggingRules,
  validateClusterRules,
  validateReadReplicaRules,
  validateVpcRules,
  type ReconcileOptions,
  type Reconcilers,
} from "@dbplane/reconciler";
import { parseWith } from "./parse";

export const ResourceKind = z.enum([
  "vpc",
  "allow_list",
  "integration",
  "cluster",
  "read_replicas",
  "backup",
  "db_audit_logging",
]);
export type ResourceKind = z.infer<typeof ResourceKind>;

export type StateRecord = Record<string, unknown>;

export interface SettledResource {
  id: string;
  state: StateRecord;
}

/** A kind's lifecycle with spec and state still as parsed JSON. */
export interface ResourceHandler {
  readonly kind: ResourceKind;
  /** False when the service cannot change the resource after creation */
  readonly updatable: boolean;
  /** Paths of the spec fields `state` no longer matches */
  drift(spec: unknown, state: unknown): string[];
  create(spec: unknown, options?: ReconcileOptions): Promise<SettledResource>;
  refresh(state: unknown, options?: ReconcileOptions): Promise<SettledResource>;
  update(state: unknown, spec: unknown, options?: ReconcileOptions): Promise<SettledResource>;
  delete(state: unknown, options?: ReconcileOptions): Promise<boolean>;
}

export type ResourceHandlers = Record<ResourceKind, ResourceHandler>;

interface Lifecycle<Spec, State> {
  create(spec: Spec, options?: ReconcileOptions): Promise<State>;
  refresh(prior: State, options?: ReconcileOptions): Promise<State>;
  update(prior: State, spec: Spec, options?: ReconcileOptions): Promise<State>;
  delete(prior: State, options?: ReconcileOptions): Promise<boolean>;
}

interface Definition<Spec, State extends StateRecord> {
  label: string;
  specSchema: z.ZodType<Spec, z.ZodTypeDef, unknown>;
  stateSchema: z.ZodType<State, z.ZodTypeDef, unknown>;
  idOf(state: State): string;
  /** Checks beyond the schema that need no network */
  rules?(spec: Spec, flags: FeatureFlags): void;
  /**
   * The spec fields a refreshed state must still match, written the way
   * the reader reports them. Write-only fields are left out.
   */
  desired(spec: Spec): Record<string, unknown>;
  updatable: boolean;
  manager(reconcilers: Reconcilers): Lifecycle<Spec, State>;
}

export interface ResourceDefinition {
  readonly label: string;
  /** Throws `ConfigurationError` for a spec that would be rejected */
  validate(spec: unknown, flags: FeatureFlags): void;
  /** Paths of the spec fields a refreshed state no longer matches */
  drift(spec: unknown, state: unknown): string[];
  bind(reconcilers: Reconcilers): ResourceHandler;
}

function define<Spec, State extends StateRecord>(
  kind: ResourceKind,
  definition: Definition<Spec, State>,
): ResourceDefinition {
  const parseSpec = (raw: unknown) => parseWith(definition.specSchema, raw, `Invalid ${definition.label} spec`);
  const parseState = (raw: unknown) => parseWith(definition.stateSchema, raw, `Invalid ${definition.label} state`);
  const settled = (state: State): SettledResource => ({ id: definition.idOf(state), state });
  const drift = (spec: unknown, state: unknown) =>
    detectDrift(definition.desired(parseSpec(spec)), parseState(state));

  return {
    label: definition.label,
    validate(raw, flags) {
      definition.rules?.(parseSpec(raw), flags);
    },
    drift,
    bind(reconcilers) {
      const manager = definition.manager(reconcilers);
      return {
        kind,
        updatable: definition.updatable,
        drift,
        create: async (spec, options) => settled(await manager.create(parseSpec(spec), options)),
        refresh: async (state, options) => settled(await manager.refresh(parseState(state), options)),
        update: async (state, spec, options) =>
          settled(await manager.update(parseState(state), parseSpec(spec), options)),
        delete: (state, options) => manager.delete(parseState(state), options),
      };
    },
  };
}

// The service reports an unset IOPS figure or incremental interval as 0.
const unlessZero = (value: number | null | undefined) => (value === 0 ? null : value);

function desiredNodeConfig(node: NodeConfigSpec | null | undefined) {
  return node ? { ...node, diskIops: unlessZero(node.diskIops) } : node;
}

function desiredRegion(region: RegionSpec, single: boolean) {
  return {
    ...region,
    diskIops: unlessZero(region.diskIops),
    // a lone region is always the default one
    isDefault: single ? null : region.isDefault,
  };
}

function desiredSchedule(schedule: BackupScheduleSpec) {
  return { ...schedule, incrementalIntervalInMins: unlessZero(schedule.incrementalIntervalInMins) };
}

function desiredCluster(spec: ClusterSpec): Record<string, unknown> {
  const single = spec.clusterRegionInfo.length === 1;
  return {
    clusterName: spec.clusterName,
    cloudType: spec.cloudType,
    clusterType: spec.clusterType,
    clusterTier: spec.clusterTier,
    faultTolerance: spec.faultTolerance,
    numFaultsToTolerate: spec.numFaultsToTolerate,
    clusterRegionInfo: spec.clusterRegionInfo.map((region) => desiredRegion(region, single)),
    nodeConfig: desiredNodeConfig(spec.nodeConfig),
    databaseTrack: spec.databaseTrack ? canonicalTrackName(spec.databaseTrack) : null,
    desiredState: spec.desiredState,
    desiredConnectionPoolingState: spec.desiredConnectionPoolingState,
    clusterAllowListIds: spec.clusterAllowListIds,
    backupSchedules: spec.backupSchedules?.map(desiredSchedule),
  };
}

export const RESOURCE_DEFINITIONS: Record<ResourceKind, ResourceDefinition> = {
  vpc: define("vpc", {
    label: "VPC",
    specSchema: VpcSpecSchema,
    stateSchema: VpcStateSchema,
    idOf: (state) => state.vpcId,
    rules: (spec) => validateVpcRules(spec),
    desired: (spec) => spec,
    updatable: false,
    manager: (reconcilers) => reconcilers.vpcs,
  }),
  allow_list: define("allow_list", {
    label: "allow list",
    specSchema: AllowListSpecSchema,
    stateSchema: AllowListStateSchema,
    idOf: (state) => state.allowListId,
    desired: (spec) => spec,
    updatable: false,
    manager: (reconcilers) => reconcilers.allowLists,
  }),
  integration: define("integration", {
    label: "integration",
    specSchema: IntegrationSpecSchema,
    stateSchema: IntegrationStateSchema,
    idOf: (state) => state.configId,
    rules: (spec, flags) => {
      translateIntegrationSpec(spec, flags);
    },
    // provider credentials are never read back
    desired: (spec) => ({ configName: spec.configName, type: spec.type }),
    updatable: false,
    manager: (reconcilers) => reconcilers.integrations,
  }),
  cluster: define("cluster", {
    label: "cluster",
    specSchema: ClusterSpecSchema,
    stateSchema: ClusterStateSchema,
    idOf: (state) => state.clusterId,
    rules: (spec, flags) => {
      validateClusterRules(spec);
      checkClusterFeatureFlags(spec, flags);
    },
    desired: desiredCluster,
    updatable: true,
    manager: (reconcilers) => reconcilers.clusters,
  }),
  read_replicas: define("read_replicas", {
    label: "read replicas",
    specSchema: ReadReplicasSpecSchema,
    stateSchema: ReadReplicasStateSchema,
    idOf: (state) => state.primaryClusterId,
    rules: (spec) => validateReadReplicaRules(spec),
    desired: (spec) => ({
      primaryClusterId: spec.primaryClusterId,
      readReplicasInfo: spec.readReplicasInfo.map((replica) => ({
        ...replica,
        nodeConfig: desiredNodeConfig(replica.nodeConfig),
      })),
    }),
    updatable: true,
    manager: (reconcilers) => reconcilers.readReplicas,
  }),
  backup: define("backup", {
    label: "backup",
    specSchema: BackupSpecSchema,
    stateSchema: BackupStateSchema,
    idOf: (state) => state.backupId,
    desired: (spec) => spec,
    updatable: false,
    manager: (reconcilers) => reconcilers.backups,
  }),
  db_audit_logging: define("db_audit_logging", {
    label: "database audit logging",
    specSchema: DbAuditLoggingSpecSchema,
    stateSchema: DbAuditLoggingStateSchema,
    idOf: (state) => state.configId,
    rules: (spec) => validateAuditLoggingRules(spec),
    desired: (spec) => spec,
    updatable: true,
    manager: (reconcilers) => reconcilers.dbAuditLogging,
  }),
};

export function createResourceHandlers(reconcilers: Reconcilers): ResourceHandlers {
  return {
    vpc: RESOURCE_DEFINITIONS.vpc.bind(reconcilers),
    allow_list: RESOURCE_DEFINITIONS.allow_list.bind(reconcilers),
    integration: RESOURCE_DEFINITIONS.integration.bind(reconcilers),
    cluster: RESOURCE_DEFINITIONS.cluster.bind(reconcilers),
    read_replicas: RESOURCE_DEFINITIONS.read_replicas.bind(reconcilers),
    backup: RESOURCE_DEFINITIONS.backup.bind(reconcilers),
    db_audit_logging: RESOURCE_DEFINITIONS.db_audit_logging.bind(reconcilers),
  };
}
