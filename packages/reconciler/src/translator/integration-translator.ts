// ---------------------------------------------------------------------------
// Telemetry integrations and the database audit-log exporter
// ---------------------------------------------------------------------------

import {
  ConfigurationError,
  hasText,
  isSet,
  type DbAuditLoggingSpec,
  type FeatureFlags,
  type IntegrationSpec,
  type IntegrationType,
} from "@dbplane/core";
import type { DbAuditExporterSpecPayload, TelemetryProviderSpecPayload } from "@dbplane/api-client";
import type { CrossReferenceResolver } from "./cross-reference";

const SPEC_FIELDS: Record<IntegrationType, keyof IntegrationSpec> = {
  DATADOG: "datadogSpec",
  PROMETHEUS: "prometheusSpec",
  GRAFANA: "grafanaSpec",
  SUMOLOGIC: "sumologicSpec",
  GOOGLECLOUD: "googleCloudSpec",
};

function missingSpec(type: IntegrationType): ConfigurationError {
  const field = `${type.toLowerCase()}_spec`;
  return new ConfigurationError(
    `${field} is required for type ${type}`,
    `${field} is required when telemetry sink is ${type}. Please include this field in the resource`,
    [SPEC_FIELDS[type]],
  );
}

/** Builds the provider payload; only the block matching `type` is sent. */
export function translateIntegrationSpec(spec: IntegrationSpec, flags: FeatureFlags): TelemetryProviderSpecPayload {
  const base = { name: spec.configName, type: spec.type };

  switch (spec.type) {
    case "DATADOG": {
      const datadog = spec.datadogSpec;
      if (!isSet(datadog)) throw missingSpec(spec.type);
      return { ...base, datadog_spec: { site: datadog.site, api_key: datadog.apiKey } };
    }
    case "PROMETHEUS": {
      const prometheus = spec.prometheusSpec;
      if (!isSet(prometheus)) throw missingSpec(spec.type);
      return { ...base, prometheus_spec: { endpoint: prometheus.endpoint } };
    }
    case "GRAFANA": {
      const grafana = spec.grafanaSpec;
      if (!isSet(grafana)) throw missingSpec(spec.type);
      return {
        ...base,
        grafana_spec: {
          access_policy_token: grafana.accessPolicyToken,
          zone: grafana.zone,
          instance_id: grafana.instanceId,
          org_slug: grafana.orgSlug,
        },
      };
    }
    case "SUMOLOGIC": {
      const sumologic = spec.sumologicSpec;
      if (!isSet(sumologic)) throw missingSpec(spec.type);
      return {
        ...base,
        sumologic_spec: {
          access_key: sumologic.accessKey,
          access_id: sumologic.accessId,
          installation_token: sumologic.installationToken,
        },
      };
    }
    case "GOOGLECLOUD": {
      if (!flags.googleCloudIntegration) {
        throw new ConfigurationError(
          "Invalid integration type",
          "Integration of type GOOGLECLOUD is currently not supported",
          ["type"],
        );
      }
      const account = spec.googleCloudSpec;
      if (!isSet(account)) throw missingSpec(spec.type);
      return {
        ...base,
        googlecloud_spec: {
          type: account.type,
          project_id: account.projectId,
          private_key: account.privateKey,
          private_key_id: account.privateKeyId,
          client_email: account.clientEmail,
          client_id: account.clientId,
          auth_uri: account.authUri,
          token_uri: account.tokenUri,
          auth_provider_x509_cert_url: account.authProviderX509CertUrl,
          client_x509_cert_url: account.clientX509CertUrl,
          ...(hasText(account.universeDomain) ? { universe_domain: account.universeDomain } : {}),
        },
      };
    }
  }
}

export function validateAuditLoggingRules(spec: DbAuditLoggingSpec): void {
  const byId = hasText(spec.integrationId);
  const byName = hasText(spec.integrationName);
  if (byId === byName) {
    throw new ConfigurationError(
      "Specify integration name or integration ID",
      "To select the exporting integration, use either integration_name or integration_id.",
      ["integrationId", "integrationName"],
    );
  }
}

/** Resolves the exporting integration and builds the exporter payload. */
export async function translateAuditLoggingSpec(
  spec: DbAuditLoggingSpec,
  refs: CrossReferenceResolver,
): Promise<DbAuditExporterSpecPayload> {
  const exporterId = hasText(spec.integrationName)
    ? await refs.integrationIdForName(spec.integrationName)
    : spec.integrationId ?? "";
  const { logSettings, statementClasses } = spec.ysqlConfig;

  return {
    exporter_id: exporterId,
    ysql_config: {
      log_settings: {
        log_catalog: logSettings.logCatalog,
        log_client: logSettings.logClient,
        log_level: logSettings.logLevel,
        log_parameter: logSettings.logParameter,
        log_relation: logSettings.logRelation,
        log_statement_once: logSettings.logStatementOnce,
      },
      statement_classes: [...statementClasses],
    },
  };
}
