import { z } from "zod";
import { ScopeSchema } from "./common";

export const IntegrationType = z.enum(["DATADOG", "PROMETHEUS", "GRAFANA", "SUMOLOGIC", "GOOGLECLOUD"]);
export type IntegrationType = z.infer<typeof IntegrationType>;

export const DatadogSpecSchema = z.object({
  site: z.string().min(1),
  apiKey: z.string().min(1),
});

export const PrometheusSpecSchema = z.object({
  endpoint: z.string().url(),
});

export const GrafanaSpecSchema = z.object({
  accessPolicyToken: z.string().min(1),
  zone: z.string().min(1),
  instanceId: z.string().min(1),
  orgSlug: z.string().min(1),
});

export const SumologicSpecSchema = z.object({
  accessKey: z.string().min(1),
  accessId: z.string().min(1),
  installationToken: z.string().min(1),
});

export const GoogleCloudSpecSchema = z.object({
  type: z.string().min(1),
  projectId: z.string().min(1),
  privateKey: z.string().min(1),
  privateKeyId: z.string().min(1),
  clientEmail: z.string().min(1),
  clientId: z.string().min(1),
  authUri: z.string().min(1),
  tokenUri: z.string().min(1),
  authProviderX509CertUrl: z.string().min(1),
  clientX509CertUrl: z.string().min(1),
  universeDomain: z.string().nullish(),
});

export type DatadogSpec = z.infer<typeof DatadogSpecSchema>;
export type PrometheusSpec = z.infer<typeof PrometheusSpecSchema>;
export type GrafanaSpec = z.infer<typeof GrafanaSpecSchema>;
export type SumologicSpec = z.infer<typeof SumologicSpecSchema>;
export type GoogleCloudSpec = z.infer<typeof GoogleCloudSpecSchema>;

// Telemetry sink. The block matching `type` is required; the others are ignored.
export const IntegrationSpecSchema = z.object({
  configName: z.string().min(1),
  type: IntegrationType,
  datadogSpec: DatadogSpecSchema.nullish(),
  prometheusSpec: PrometheusSpecSchema.nullish(),
  grafanaSpec: GrafanaSpecSchema.nullish(),
  sumologicSpec: SumologicSpecSchema.nullish(),
  googleCloudSpec: GoogleCloudSpecSchema.nullish(),
});

export type IntegrationSpec = z.infer<typeof IntegrationSpecSchema>;

export const IntegrationStateSchema = ScopeSchema.extend({
  configId: z.string(),
  configName: z.string(),
  type: IntegrationType,
  datadogSpec: DatadogSpecSchema.nullable(),
  prometheusSpec: PrometheusSpecSchema.nullable(),
  grafanaSpec: GrafanaSpecSchema.nullable(),
  sumologicSpec: SumologicSpecSchema.nullable(),
  googleCloudSpec: GoogleCloudSpecSchema.nullable(),
  isValid: z.boolean(),
});

export type IntegrationState = z.infer<typeof IntegrationStateSchema>;

export function validateIntegrationSpec(data: unknown): IntegrationSpec {
  return IntegrationSpecSchema.parse(data);
}
