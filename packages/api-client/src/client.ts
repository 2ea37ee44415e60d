// ---------------------------------------------------------------------------
// ManagedDbHttpClient: fetch-based binding for the control-plane REST API
// ---------------------------------------------------------------------------

import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { ApiError, HTTP_REQUEST_TIMEOUT_MS, TransportError } from "@dbplane/core";

import { InterceptorChain } from "./interceptors/chain";
import type {
  ApiInterceptor,
  HttpMethod,
  InboundResponse,
  OutboundRequest,
} from "./interceptors/interface";
import { classifyFailure, toClassifiedError } from "./error-classifier";
import type { CallOptions, IManagedDbApi } from "./interface";
import {
  AllowListDataSchema,
  BackupDataSchema,
  BackupScheduleDataSchema,
  ClusterDataSchema,
  CmkDataSchema,
  DbAuditExporterConfigDataSchema,
  NodeConfigurationMapSchema,
  ReadReplicaListDataSchema,
  RestoreDataSchema,
  TaskDataSchema,
  TelemetryProviderDataSchema,
  TrackDataSchema,
  VpcDataSchema,
  ResponseEnvelopeSchema,
} from "./protocol";
import type {
  AllowListData,
  AllowListSpecPayload,
  BackupData,
  BackupScheduleData,
  BackupSchedulePayload,
  BackupSpecPayload,
  ClusterData,
  ClusterSpecPayload,
  CmkData,
  CmkPayload,
  ConnectionPoolingAction,
  CreateClusterRequest,
  DbAuditExporterConfigData,
  DbAuditExporterSpecPayload,
  NodeConfiguration,
  NodeConfigurationQuery,
  ReadReplicaListData,
  ReadReplicaSpecPayload,
  RestoreData,
  TaskData,
  TaskQuery,
  TelemetryProviderData,
  TelemetryProviderSpecPayload,
  TrackData,
  VpcData,
  VpcSpecPayload,
} from "./protocol";

const API_PREFIX = "/api/public/v1";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ManagedDbClientOptions {
  /** Service origin, e.g. `https://cloud.example.com`. */
  baseUrl: string;
  apiToken: string;
  accountId: string;
  projectId: string;
  /** Per-request timeout. Default: 60s. */
  timeoutMs?: number;
  /** Replaces the global fetch (tests, proxies). */
  fetchFn?: FetchFn;
  interceptors?: ApiInterceptor[];
  userAgent?: string;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  /** Short summary used as the error title on failure. */
  title: string;
  /** Id of the addressed resource, attached to NotFoundError. */
  resourceId?: string;
  /** Caller cancellation, combined with the per-request timeout. */
  signal?: AbortSignal;
}

/** Path template whose interpolated ids are percent-encoded. */
function encodePath(strings: TemplateStringsArray, ...segments: string[]): string {
  return String.raw({ raw: strings }, ...segments.map((segment) => encodeURIComponent(segment)));
}

export class ManagedDbHttpClient implements IManagedDbApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly chain: InterceptorChain;

  constructor(private readonly options: ManagedDbClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? HTTP_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.chain = new InterceptorChain(options.interceptors);
  }

  /** Add an interceptor to the end of the chain. */
  use(interceptor: ApiInterceptor): void {
    this.chain.add(interceptor);
  }

  // ---- Clusters -----------------------------------------------------------

  createCluster(request: CreateClusterRequest, call?: CallOptions): Promise<ClusterData> {
    return this.request("POST", this.scoped("clusters"), ClusterDataSchema, {
      body: request,
      signal: call?.signal,
      title: "Could not create cluster",
    });
  }

  getCluster(clusterId: string, call?: CallOptions): Promise<ClusterData> {
    return this.request("GET", this.scoped(encodePath`clusters/${clusterId}`), ClusterDataSchema, {
      signal: call?.signal,
      title: "Could not read cluster",
      resourceId: clusterId,
    });
  }

  editCluster(clusterId: string, spec: ClusterSpecPayload, call?: CallOptions): Promise<ClusterData> {
    return this.request("PUT", this.scoped(encodePath`clusters/${clusterId}`), ClusterDataSchema, {
      body: spec,
      signal: call?.signal,
      title: "Could not edit cluster",
      resourceId: clusterId,
    });
  }

  deleteCluster(clusterId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`clusters/${clusterId}`), {
      signal: call?.signal,
      title: "Could not delete cluster",
      resourceId: clusterId,
    });
  }

  pauseCluster(clusterId: string, call?: CallOptions): Promise<ClusterData> {
    return this.request("POST", this.scoped(encodePath`clusters/${clusterId}/pause`), ClusterDataSchema, {
      signal: call?.signal,
      title: "Could not pause the cluster",
      resourceId: clusterId,
    });
  }

  resumeCluster(clusterId: string, call?: CallOptions): Promise<ClusterData> {
    return this.request("POST", this.scoped(encodePath`clusters/${clusterId}/resume`), ClusterDataSchema, {
      signal: call?.signal,
      title: "Could not resume the cluster",
      resourceId: clusterId,
    });
  }

  updateConnectionPooling(
    clusterId: string,
    action: ConnectionPoolingAction,
    call?: CallOptions,
  ): Promise<void> {
    const verb = action === "ENABLE" ? "enable" : "disable";
    return this.requestVoid("POST", this.scoped(encodePath`clusters/${clusterId}/connection-pooling`), {
      body: { action },
      signal: call?.signal,
      title: `Could not ${verb} connection pooling`,
      resourceId: clusterId,
    });
  }

  listClusterAllowLists(clusterId: string, call?: CallOptions): Promise<AllowListData[]> {
    return this.request(
      "GET",
      this.scoped(encodePath`clusters/${clusterId}/allow-lists`),
      z.array(AllowListDataSchema),
      { signal: call?.signal, title: "Could not read cluster allow lists", resourceId: clusterId },
    );
  }

  editClusterAllowLists(clusterId: string, allowListIds: string[], call?: CallOptions): Promise<void> {
    return this.requestVoid("PUT", this.scoped(encodePath`clusters/${clusterId}/allow-lists`), {
      body: allowListIds,
      signal: call?.signal,
      title: "Could not assign allow lists",
      resourceId: clusterId,
    });
  }

  getClusterCmk(clusterId: string, call?: CallOptions): Promise<CmkData> {
    return this.request("GET", this.scoped(encodePath`clusters/${clusterId}/cmk`), CmkDataSchema, {
      signal: call?.signal,
      title: "Could not read customer managed key",
      resourceId: clusterId,
    });
  }

  editClusterCmk(clusterId: string, spec: CmkPayload, call?: CallOptions): Promise<void> {
    return this.requestVoid("PUT", this.scoped(encodePath`clusters/${clusterId}/cmk`), {
      body: spec,
      signal: call?.signal,
      title: "Could not update customer managed key",
      resourceId: clusterId,
    });
  }

  listBackupSchedules(clusterId: string, call?: CallOptions): Promise<BackupScheduleData[]> {
    return this.request(
      "GET",
      this.scoped(encodePath`clusters/${clusterId}/backup-schedules`),
      z.array(BackupScheduleDataSchema),
      { signal: call?.signal, title: "Could not read backup schedules", resourceId: clusterId },
    );
  }

  editBackupSchedule(
    clusterId: string,
    scheduleId: string,
    spec: BackupSchedulePayload,
    call?: CallOptions,
  ): Promise<BackupScheduleData> {
    return this.request(
      "PUT",
      this.scoped(encodePath`clusters/${clusterId}/backup-schedules/${scheduleId}`),
      BackupScheduleDataSchema,
      {
        body: spec,
        signal: call?.signal,
        title: "Could not update backup schedule",
        resourceId: scheduleId,
      },
    );
  }

  // ---- Tasks and restores -------------------------------------------------

  listTasks(query: TaskQuery, call?: CallOptions): Promise<TaskData[]> {
    return this.request("GET", this.scoped("tasks"), z.array(TaskDataSchema), {
      query: {
        entity_id: query.entityId,
        entity_type: query.entityType,
        task_type: query.taskType,
        limit: "1",
      },
      signal: call?.signal,
      title: "Could not list tasks",
    });
  }

  createRestore(clusterId: string, backupId: string, call?: CallOptions): Promise<RestoreData> {
    return this.request("POST", this.scoped("restores"), RestoreDataSchema, {
      body: { cluster_id: clusterId, backup_id: backupId },
      signal: call?.signal,
      title: "Could not restore the cluster",
      resourceId: backupId,
    });
  }

  getRestore(restoreId: string, call?: CallOptions): Promise<RestoreData> {
    return this.request("GET", this.scoped(encodePath`restores/${restoreId}`), RestoreDataSchema, {
      signal: call?.signal,
      title: "Could not read restore",
      resourceId: restoreId,
    });
  }

  // ---- Lookups ------------------------------------------------------------

  listTracks(call?: CallOptions): Promise<TrackData[]> {
    const path = `${API_PREFIX}${encodePath`/accounts/${this.options.accountId}`}/software/tracks`;
    return this.request("GET", path, z.array(TrackDataSchema), {
      signal: call?.signal,
      title: "Could not list database tracks",
    });
  }

  async getNodeConfigurations(
    query: NodeConfigurationQuery,
    call?: CallOptions,
  ): Promise<NodeConfiguration[]> {
    const byRegion = await this.request(
      "GET",
      this.scoped("node-configurations"),
      NodeConfigurationMapSchema,
      {
        query: { cloud: query.cloud, tier: query.tier, region: query.region },
        signal: call?.signal,
        title: "Could not read node configurations",
      },
    );
    return byRegion[query.region] ?? [];
  }

  // ---- VPCs ---------------------------------------------------------------

  createVpc(spec: VpcSpecPayload, call?: CallOptions): Promise<VpcData> {
    return this.request("POST", this.scoped("vpcs"), VpcDataSchema, {
      body: spec,
      signal: call?.signal,
      title: "Could not create VPC",
    });
  }

  getVpc(vpcId: string, call?: CallOptions): Promise<VpcData> {
    return this.request("GET", this.scoped(encodePath`vpcs/${vpcId}`), VpcDataSchema, {
      signal: call?.signal,
      title: "Could not read VPC",
      resourceId: vpcId,
    });
  }

  listVpcs(call?: CallOptions): Promise<VpcData[]> {
    return this.request("GET", this.scoped("vpcs"), z.array(VpcDataSchema), {
      signal: call?.signal,
      title: "Could not list VPCs",
    });
  }

  deleteVpc(vpcId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`vpcs/${vpcId}`), {
      signal: call?.signal,
      title: "Could not delete VPC",
      resourceId: vpcId,
    });
  }

  // ---- Allow lists --------------------------------------------------------

  createAllowList(spec: AllowListSpecPayload, call?: CallOptions): Promise<AllowListData> {
    return this.request("POST", this.scoped("allow-lists"), AllowListDataSchema, {
      body: spec,
      signal: call?.signal,
      title: "Could not create allow list",
    });
  }

  listAllowLists(call?: CallOptions): Promise<AllowListData[]> {
    return this.request("GET", this.scoped("allow-lists"), z.array(AllowListDataSchema), {
      signal: call?.signal,
      title: "Could not list allow lists",
    });
  }

  getAllowList(allowListId: string, call?: CallOptions): Promise<AllowListData> {
    return this.request("GET", this.scoped(encodePath`allow-lists/${allowListId}`), AllowListDataSchema, {
      signal: call?.signal,
      title: "Could not read allow list",
      resourceId: allowListId,
    });
  }

  deleteAllowList(allowListId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`allow-lists/${allowListId}`), {
      signal: call?.signal,
      title: "Could not delete allow list",
      resourceId: allowListId,
    });
  }

  // ---- Read replicas ------------------------------------------------------

  createReadReplicas(
    clusterId: string,
    specs: ReadReplicaSpecPayload[],
    call?: CallOptions,
  ): Promise<ReadReplicaListData> {
    return this.request(
      "POST",
      this.scoped(encodePath`clusters/${clusterId}/read-replicas`),
      ReadReplicaListDataSchema,
      {
        body: specs,
        signal: call?.signal,
        title: "Could not create read replicas",
        resourceId: clusterId,
      },
    );
  }

  getReadReplicas(clusterId: string, call?: CallOptions): Promise<ReadReplicaListData> {
    return this.request(
      "GET",
      this.scoped(encodePath`clusters/${clusterId}/read-replicas`),
      ReadReplicaListDataSchema,
      { signal: call?.signal, title: "Could not read read replicas", resourceId: clusterId },
    );
  }

  editReadReplicas(
    clusterId: string,
    specs: ReadReplicaSpecPayload[],
    call?: CallOptions,
  ): Promise<ReadReplicaListData> {
    return this.request(
      "PUT",
      this.scoped(encodePath`clusters/${clusterId}/read-replicas`),
      ReadReplicaListDataSchema,
      {
        body: specs,
        signal: call?.signal,
        title: "Could not edit read replicas",
        resourceId: clusterId,
      },
    );
  }

  deleteReadReplicas(clusterId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`clusters/${clusterId}/read-replicas`), {
      signal: call?.signal,
      title: "Could not delete read replicas",
      resourceId: clusterId,
    });
  }

  // ---- Backups ------------------------------------------------------------

  createBackup(spec: BackupSpecPayload, call?: CallOptions): Promise<BackupData> {
    return this.request("POST", this.scoped("backups"), BackupDataSchema, {
      body: spec,
      signal: call?.signal,
      title: "Could not create backup",
    });
  }

  getBackup(backupId: string, call?: CallOptions): Promise<BackupData> {
    return this.request("GET", this.scoped(encodePath`backups/${backupId}`), BackupDataSchema, {
      signal: call?.signal,
      title: "Could not read backup",
      resourceId: backupId,
    });
  }

  deleteBackup(backupId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`backups/${backupId}`), {
      signal: call?.signal,
      title: "Could not delete backup",
      resourceId: backupId,
    });
  }

  // ---- Integrations -------------------------------------------------------

  createIntegration(spec: TelemetryProviderSpecPayload, call?: CallOptions): Promise<TelemetryProviderData> {
    return this.request("POST", this.scoped("telemetry-providers"), TelemetryProviderDataSchema, {
      body: spec,
      signal: call?.signal,
      title: "Could not create integration",
    });
  }

  getIntegration(configId: string, call?: CallOptions): Promise<TelemetryProviderData> {
    return this.request(
      "GET",
      this.scoped(encodePath`telemetry-providers/${configId}`),
      TelemetryProviderDataSchema,
      { signal: call?.signal, title: "Could not read integration", resourceId: configId },
    );
  }

  listIntegrations(call?: CallOptions): Promise<TelemetryProviderData[]> {
    return this.request("GET", this.scoped("telemetry-providers"), z.array(TelemetryProviderDataSchema), {
      signal: call?.signal,
      title: "Could not list integrations",
    });
  }

  deleteIntegration(configId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid("DELETE", this.scoped(encodePath`telemetry-providers/${configId}`), {
      signal: call?.signal,
      title: "Could not delete integration",
      resourceId: configId,
    });
  }

  // ---- Database audit logging ---------------------------------------------

  createDbAuditConfig(
    clusterId: string,
    spec: DbAuditExporterSpecPayload,
    call?: CallOptions,
  ): Promise<DbAuditExporterConfigData> {
    return this.request(
      "POST",
      this.scoped(encodePath`clusters/${clusterId}/db-audit-log-exporter-configs`),
      DbAuditExporterConfigDataSchema,
      {
        body: spec,
        signal: call?.signal,
        title: "Could not enable database audit logging",
        resourceId: clusterId,
      },
    );
  }

  listDbAuditConfigs(clusterId: string, call?: CallOptions): Promise<DbAuditExporterConfigData[]> {
    return this.request(
      "GET",
      this.scoped(encodePath`clusters/${clusterId}/db-audit-log-exporter-configs`),
      z.array(DbAuditExporterConfigDataSchema),
      {
        signal: call?.signal,
        title: "Could not read database audit logging",
        resourceId: clusterId,
      },
    );
  }

  updateDbAuditConfig(
    clusterId: string,
    configId: string,
    spec: DbAuditExporterSpecPayload,
    call?: CallOptions,
  ): Promise<DbAuditExporterConfigData> {
    return this.request(
      "PUT",
      this.scoped(encodePath`clusters/${clusterId}/db-audit-log-exporter-configs/${configId}`),
      DbAuditExporterConfigDataSchema,
      {
        body: spec,
        signal: call?.signal,
        title: "Could not update database audit logging",
        resourceId: configId,
      },
    );
  }

  deleteDbAuditConfig(clusterId: string, configId: string, call?: CallOptions): Promise<void> {
    return this.requestVoid(
      "DELETE",
      this.scoped(encodePath`clusters/${clusterId}/db-audit-log-exporter-configs/${configId}`),
      {
        signal: call?.signal,
        title: "Could not disable database audit logging",
        resourceId: configId,
      },
    );
  }

  // ---- Transport ----------------------------------------------------------

  private scoped(path: string): string {
    const { accountId, projectId } = this.options;
    return `${API_PREFIX}${encodePath`/accounts/${accountId}/projects/${projectId}`}/${path}`;
  }

  /** Sends a request and decodes the payload inside the `{ data }` envelope with `schema`. */
  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions,
  ): Promise<T> {
    const response = await this.send(method, path, options);
    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch {
      throw new ApiError(
        `Response to ${method} ${path} is not valid JSON`,
        response.status,
        "FATAL",
        options.title,
      );
    }
    const wrapped = ResponseEnvelopeSchema.safeParse(json);
    const parsed = schema.safeParse(wrapped.success ? wrapped.data.data : undefined);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `data.${issue.path.join(".")}: ${issue.message}` : "invalid shape";
      throw new ApiError(
        `Unexpected response to ${method} ${path} (${where})`,
        response.status,
        "FATAL",
        options.title,
      );
    }
    return parsed.data;
  }

  /** Sends a request whose response body is ignored. */
  private async requestVoid(method: HttpMethod, path: string, options: RequestOptions): Promise<void> {
    await this.send(method, path, options);
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<InboundResponse> {
    const outbound: OutboundRequest = await this.chain.processOutbound({
      id: uuidv4(),
      method,
      path,
      query: options.query,
      body: options.body,
    });

    const started = Date.now();
    let status: number;
    let text: string;
    try {
      const response = await this.fetchFn(this.buildUrl(outbound), {
        method: outbound.method,
        headers: this.headers(outbound.body !== undefined),
        body: outbound.body === undefined ? undefined : JSON.stringify(outbound.body),
        signal: options.signal
          ? AbortSignal.any([options.signal, AbortSignal.timeout(this.timeoutMs)])
          : AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      const failure = classifyFailure({ error: err });
      const error = new TransportError(failure.message, failure.kind === "RETRYABLE", options.title, {
        cause: err,
      });
      await this.chain.processError(error, { phase: "transport", request: outbound });
      throw error;
    }

    const inbound = await this.chain.processInbound({
      id: outbound.id,
      method: outbound.method,
      path: outbound.path,
      status,
      body: text,
      durationMs: Date.now() - started,
    });

    if (inbound.status < 200 || inbound.status >= 300) {
      const failure = classifyFailure({ status: inbound.status, body: inbound.body });
      const error = toClassifiedError(failure, options.title, options.resourceId);
      await this.chain.processError(error, { phase: "inbound", request: outbound, response: inbound });
      throw error;
    }

    return inbound;
  }

  private buildUrl(request: OutboundRequest): string {
    const url = new URL(`${this.baseUrl}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${this.options.apiToken}`,
    };
    if (hasBody) {
      headers["Content-Type"] = "application/json";
    }
    if (this.options.userAgent) {
      headers["User-Agent"] = this.options.userAgent;
    }
    return headers;
  }
}
