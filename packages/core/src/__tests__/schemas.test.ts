import {
  ClusterSpecSchema,
  VpcSpecSchema,
  validateAllowListSpec,
  validateBackupSpec,
  validateDbAuditLoggingSpec,
} from "../index";

describe("resource schemas", () => {
  it("leaves optional cluster fields absent rather than defaulted", () => {
    const spec = ClusterSpecSchema.parse({
      clusterName: "orders-db",
      cloudType: "AWS",
      clusterType: "SYNCHRONOUS",
      clusterTier: "PAID",
      clusterRegionInfo: [{ region: "us-east-1", numNodes: 3 }],
      credentials: { username: "admin", password: "test-secret" },
      desiredState: null,
    });

    expect(spec.desiredState).toBeNull();
    expect(spec.databaseTrack).toBeUndefined();
  });

  it("rejects duplicate cluster regions", () => {
    const result = ClusterSpecSchema.safeParse({
      clusterName: "orders-db",
      cloudType: "AWS",
      clusterType: "GEO_PARTITIONED",
      clusterTier: "PAID",
      clusterRegionInfo: [
        { region: "us-east-1", numNodes: 3 },
        { region: "us-east-1", numNodes: 3 },
      ],
      credentials: { username: "admin", password: "test-secret" },
    });

    expect(result.success).toBe(false);
  });

  it("rejects cluster names the service does not accept", () => {
    expect(ClusterSpecSchema.shape.clusterName.safeParse("orders_db").success).toBe(false);
  });

  it("parses a VPC with region CIDRs", () => {
    expect(VpcSpecSchema.parse({ name: "app-vpc", cloud: "GCP", globalCidr: "10.0.0.0/16" })).toEqual({
      name: "app-vpc",
      cloud: "GCP",
      globalCidr: "10.0.0.0/16",
    });
  });

  it("defaults an allow-list description to empty", () => {
    expect(validateAllowListSpec({ allowListName: "office", cidrList: ["10.0.0.0/24"] }).allowListDescription).toBe("");
  });

  it("rejects malformed CIDR blocks", () => {
    expect(() => validateAllowListSpec({ allowListName: "office", cidrList: ["10.0.0.0"] })).toThrow(
      "Must be an IPv4 CIDR block",
    );
  });

  it("bounds backup retention", () => {
    expect(() => validateBackupSpec({ clusterId: "cluster-1", retentionPeriodInDays: 32 })).toThrow();
    expect(validateBackupSpec({ clusterId: "cluster-1", retentionPeriodInDays: 31 }).retentionPeriodInDays).toBe(31);
  });

  it("rejects repeated audit statement classes", () => {
    expect(() =>
      validateDbAuditLoggingSpec({
        clusterId: "cluster-1",
        integrationId: "int-1",
        ysqlConfig: {
          logSettings: {
            logCatalog: true,
            logClient: false,
            logLevel: "LOG",
            logParameter: false,
            logRelation: false,
            logStatementOnce: false,
          },
          statementClasses: ["READ", "READ"],
        },
      }),
    ).toThrow("Duplicate statement classes are not allowed");
  });
});
