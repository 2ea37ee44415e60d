import { createEngineConfig, type DbAuditLoggingSpec, type IntegrationSpec } from "@dbplane/core";
import { translateBackupSchedule, translateBackupSpec } from "../translator/backup-translator";
import { CrossReferenceResolver } from "../translator/cross-reference";
import {
  translateAuditLoggingSpec,
  translateIntegrationSpec,
  validateAuditLoggingRules,
} from "../translator/integration-translator";
import { translateAllowListSpec, translateVpcSpec, validateVpcRules } from "../translator/network-translator";
import { translateReadReplicasSpec, validateReadReplicaRules } from "../translator/read-replica-translator";
import { backupScheduleData, createFakeApi, nodeConfigurations, vpcData } from "./fakes";

const flagsOff = createEngineConfig().featureFlags;
const flagsOn = createEngineConfig({ featureFlags: { googleCloudIntegration: true } }).featureFlags;

describe("VPC rules", () => {
  it("rejects a global CIDR together with region CIDRs", () => {
    expect(() =>
      validateVpcRules({
        name: "app-vpc",
        cloud: "GCP",
        globalCidr: "10.0.0.0/16",
        regionCidrInfo: [{ region: "us-east1", cidr: "10.1.0.0/16" }],
      }),
    ).toThrow("Specify either the global CIDR or the CIDR information for the regions. Don't provide both.");
  });

  it("allows a global CIDR on GCP only", () => {
    expect(() => validateVpcRules({ name: "app-vpc", cloud: "AWS", globalCidr: "10.0.0.0/16" })).toThrow(
      "Global CIDR only applies to GCP.",
    );
    expect(() => validateVpcRules({ name: "app-vpc", cloud: "GCP", globalCidr: "10.0.0.0/16" })).not.toThrow();
  });

  it("limits Azure to one region without a CIDR", () => {
    expect(() =>
      validateVpcRules({
        name: "app-vpc",
        cloud: "AZURE",
        regionCidrInfo: [{ region: "eastus" }, { region: "westus2" }],
      }),
    ).toThrow("Only one region supported per Azure VPC.");
    expect(() =>
      validateVpcRules({ name: "app-vpc", cloud: "AZURE", regionCidrInfo: [{ region: "eastus", cidr: "10.2.0.0/16" }] }),
    ).toThrow("CIDR are auto-assigned for AZURE. Please remove it");
  });

  it("rejects repeated regions", () => {
    expect(() =>
      validateVpcRules({
        name: "app-vpc",
        cloud: "AWS",
        regionCidrInfo: [
          { region: "us-east-1", cidr: "10.1.0.0/16" },
          { region: "us-east-1", cidr: "10.2.0.0/16" },
        ],
      }),
    ).toThrow("Ensure the regions are unique.");
  });

  it("sends a global CIDR as the parent CIDR", () => {
    expect(translateVpcSpec({ name: "app-vpc", cloud: "GCP", globalCidr: "10.0.0.0/16" })).toEqual({
      name: "app-vpc",
      cloud: "GCP",
      parent_cidr: "10.0.0.0/16",
    });
  });

  it("omits region CIDRs the service assigns", () => {
    expect(translateVpcSpec({ name: "app-vpc", cloud: "AZURE", regionCidrInfo: [{ region: "eastus" }] })).toEqual({
      name: "app-vpc",
      cloud: "AZURE",
      region_specs: [{ region: "eastus" }],
    });
  });
});

describe("allow lists", () => {
  it("maps the spec onto the wire names", () => {
    expect(
      translateAllowListSpec({
        allowListName: "office",
        allowListDescription: "office egress",
        cidrList: ["192.168.0.0/24"],
      }),
    ).toEqual({ name: "office", description: "office egress", allow_list: ["192.168.0.0/24"] });
  });
});

describe("read replicas", () => {
  const replica = {
    cloudType: "AWS" as const,
    region: "eu-west-1",
    numNodes: 1,
    numReplicas: 1,
    nodeConfig: { numCores: 2, diskSizeGb: 50 },
  };

  it("requires a VPC reference on every replica", () => {
    expect(() => validateReadReplicaRules({ primaryClusterId: "cluster-1", readReplicasInfo: [replica] })).toThrow(
      "A read replica must be placed in a VPC. Provide either vpc_name or vpc_id.",
    );
  });

  it("resolves the VPC and sizes replicas from the PAID catalogue", async () => {
    const api = createFakeApi();
    api.listVpcs.mockResolvedValue([vpcData("vpc-1", "app-vpc")]);
    api.getNodeConfigurations.mockResolvedValue(nodeConfigurations);

    const { payload, regionIndex } = await translateReadReplicasSpec(
      { primaryClusterId: "cluster-1", readReplicasInfo: [{ ...replica, vpcName: "app-vpc" }] },
      new CrossReferenceResolver(api),
    );

    expect(payload).toEqual([
      {
        placement_info: {
          cloud_info: { code: "AWS", region: "eu-west-1" },
          num_nodes: 1,
          num_replicas: 1,
          vpc_id: "vpc-1",
          multi_zone: true,
        },
        node_info: { num_cores: 2, memory_mb: 8192, disk_size_gb: 50 },
      },
    ]);
    expect(regionIndex.get("eu-west-1")).toBe(0);
    expect(api.getNodeConfigurations).toHaveBeenCalledWith({ cloud: "AWS", tier: "PAID", region: "eu-west-1" });
  });
});

describe("backups", () => {
  it("omits an empty description", () => {
    expect(translateBackupSpec({ clusterId: "cluster-1", backupDescription: "", retentionPeriodInDays: 7 })).toEqual({
      cluster_id: "cluster-1",
      retention_period_in_days: 7,
    });
  });

  it("lets a cron expression replace the current interval", () => {
    expect(
      translateBackupSchedule(
        { state: "ACTIVE", retentionPeriodInDays: 14, cronExpression: "0 3 * * *" },
        backupScheduleData(),
      ),
    ).toEqual({
      state: "ACTIVE",
      retention_period_in_days: 14,
      description: "Default backup schedule",
      cron_expression: "0 3 * * *",
    });
  });

  it("keeps current values for unset fields", () => {
    expect(translateBackupSchedule({ backupDescription: "", timeIntervalInDays: 2 }, backupScheduleData())).toEqual({
      state: "ACTIVE",
      retention_period_in_days: 8,
      description: "Default backup schedule",
      time_interval_in_days: 2,
    });
  });
});

describe("integrations", () => {
  it("sends only the block matching the type", () => {
    const spec: IntegrationSpec = {
      configName: "metrics",
      type: "DATADOG",
      datadogSpec: { site: "datadoghq.eu", apiKey: "test-api-key" },
      prometheusSpec: { endpoint: "https://prometheus.example.net" },
    };

    expect(translateIntegrationSpec(spec, flagsOff)).toEqual({
      name: "metrics",
      type: "DATADOG",
      datadog_spec: { site: "datadoghq.eu", api_key: "test-api-key" },
    });
  });

  it("requires the block for the chosen type", () => {
    expect(() => translateIntegrationSpec({ configName: "metrics", type: "GRAFANA" }, flagsOff)).toThrow(
      "grafana_spec is required when telemetry sink is GRAFANA. Please include this field in the resource",
    );
  });

  it("accepts GOOGLECLOUD only behind its flag", () => {
    const spec: IntegrationSpec = {
      configName: "gcp-logs",
      type: "GOOGLECLOUD",
      googleCloudSpec: {
        type: "service_account",
        projectId: "test-project",
        privateKey: "test-private-key",
        privateKeyId: "key-1",
        clientEmail: "exporter@test-project.example.net",
        clientId: "1234",
        authUri: "https://auth.example.net",
        tokenUri: "https://token.example.net",
        authProviderX509CertUrl: "https://certs.example.net",
        clientX509CertUrl: "https://certs.example.net/exporter",
      },
    };

    expect(() => translateIntegrationSpec(spec, flagsOff)).toThrow(
      "Integration of type GOOGLECLOUD is currently not supported",
    );
    expect(translateIntegrationSpec(spec, flagsOn).googlecloud_spec).toEqual({
      type: "service_account",
      project_id: "test-project",
      private_key: "test-private-key",
      private_key_id: "key-1",
      client_email: "exporter@test-project.example.net",
      client_id: "1234",
      auth_uri: "https://auth.example.net",
      token_uri: "https://token.example.net",
      auth_provider_x509_cert_url: "https://certs.example.net",
      client_x509_cert_url: "https://certs.example.net/exporter",
    });
  });
});

describe("database audit logging", () => {
  const base: DbAuditLoggingSpec = {
    clusterId: "cluster-1",
    ysqlConfig: {
      logSettings: {
        logCatalog: true,
        logClient: false,
        logLevel: "NOTICE",
        logParameter: false,
        logRelation: false,
        logStatementOnce: true,
      },
      statementClasses: ["DDL", "ROLE"],
    },
  };

  it("needs exactly one integration reference", () => {
    expect(() => validateAuditLoggingRules(base)).toThrow(
      "To select the exporting integration, use either integration_name or integration_id.",
    );
    expect(() =>
      validateAuditLoggingRules({ ...base, integrationId: "int-1", integrationName: "metrics" }),
    ).toThrow("To select the exporting integration, use either integration_name or integration_id.");
  });

  it("resolves the integration by name", async () => {
    const api = createFakeApi();
    api.listIntegrations.mockResolvedValue([
      { info: { id: "int-9", is_valid: true }, spec: { name: "logs", type: "DATADOG" } },
    ]);

    const payload = await translateAuditLoggingSpec(
      { ...base, integrationName: "logs" },
      new CrossReferenceResolver(api),
    );

    expect(payload).toEqual({
      exporter_id: "int-9",
      ysql_config: {
        log_settings: {
          log_catalog: true,
          log_client: false,
          log_level: "NOTICE",
          log_parameter: false,
          log_relation: false,
          log_statement_once: true,
        },
        statement_classes: ["DDL", "ROLE"],
      },
    });
  });
});
