// ---------------------------------------------------------------------------
// Backup, integration and audit-log exporter state
// ---------------------------------------------------------------------------

import {
  AuditLogLevel,
  AuditStatementClass,
  IntegrationType,
  NotFoundError,
  YsqlAuditConfigSchema,
  type BackupState,
  type DbAuditLoggingState,
  type IntegrationSpec,
  type IntegrationState,
} from "@dbplane/core";
import type { ReadContext } from "./context";
import { expectValue } from "./read-purpose";

export async function readBackupState(ctx: ReadContext, backupId: string): Promise<BackupState> {
  const { info, spec } = await ctx.api.getBackup(backupId);
  return {
    ...ctx.scope,
    backupId: info.id,
    clusterId: spec.cluster_id,
    backupDescription: spec.description ?? null,
    retentionPeriodInDays: spec.retention_period_in_days,
    state: info.state,
    timestamp: info.create_time ?? null,
  };
}

/**
 * Reads an integration. Secrets come back masked, so each secret is taken
 * from `prior` (the caller's spec or last state) when it has the same block.
 */
export async function readIntegrationState(
  ctx: ReadContext,
  configId: string,
  prior: IntegrationSpec | IntegrationState | null,
): Promise<IntegrationState> {
  const { info, spec } = await ctx.api.getIntegration(configId);
  const datadog = spec.datadog_spec;
  const prometheus = spec.prometheus_spec;
  const grafana = spec.grafana_spec;
  const sumologic = spec.sumologic_spec;
  const google = spec.googlecloud_spec;

  return {
    ...ctx.scope,
    configId: info.id,
    configName: spec.name,
    type: expectValue(IntegrationType, spec.type, "integration type"),
    datadogSpec: datadog
      ? { site: datadog.site, apiKey: prior?.datadogSpec?.apiKey ?? datadog.api_key }
      : null,
    prometheusSpec: prometheus ? { endpoint: prometheus.endpoint } : null,
    grafanaSpec: grafana
      ? {
          accessPolicyToken: prior?.grafanaSpec?.accessPolicyToken ?? grafana.access_policy_token,
          zone: grafana.zone,
          instanceId: grafana.instance_id,
          orgSlug: grafana.org_slug,
        }
      : null,
    sumologicSpec: sumologic
      ? {
          accessKey: prior?.sumologicSpec?.accessKey ?? sumologic.access_key,
          accessId: prior?.sumologicSpec?.accessId ?? sumologic.access_id,
          installationToken: prior?.sumologicSpec?.installationToken ?? sumologic.installation_token,
        }
      : null,
    googleCloudSpec: google
      ? {
          type: google.type,
          projectId: google.project_id,
          privateKey: prior?.googleCloudSpec?.privateKey ?? google.private_key,
          privateKeyId: google.private_key_id,
          clientEmail: google.client_email,
          clientId: google.client_id,
          authUri: google.auth_uri,
          tokenUri: google.token_uri,
          authProviderX509CertUrl: google.auth_provider_x509_cert_url,
          clientX509CertUrl: google.client_x509_cert_url,
          universeDomain: google.universe_domain ?? null,
        }
      : null,
    isValid: info.is_valid,
  };
}

/** A cluster carries at most one exporter configuration. */
export async function readDbAuditLoggingState(ctx: ReadContext, clusterId: string): Promise<DbAuditLoggingState> {
  const [config] = await ctx.api.listDbAuditConfigs(clusterId);
  if (!config) {
    throw new NotFoundError(
      `Unable to find DB Audit Logging configuration for cluster with ID ${clusterId}`,
      clusterId,
    );
  }
  const { log_settings: settings, statement_classes: classes } = config.spec.ysql_config;

  return {
    ...ctx.scope,
    configId: config.info.id,
    clusterId: config.info.cluster_id,
    integrationId: config.spec.exporter_id,
    integrationName: await ctx.refs.integrationNameForId(config.spec.exporter_id),
    ysqlConfig: expectValue(
      YsqlAuditConfigSchema,
      {
        logSettings: {
          logCatalog: settings.log_catalog,
          logClient: settings.log_client,
          logLevel: expectValue(AuditLogLevel, settings.log_level, "audit log level"),
          logParameter: settings.log_parameter,
          logRelation: settings.log_relation,
          logStatementOnce: settings.log_statement_once,
        },
        statementClasses: classes.map((entry) => expectValue(AuditStatementClass, entry, "statement class")),
      },
      "audit log configuration",
    ),
    state: config.info.state,
  };
}
