import {
  ApiError,
  ConfigurationError,
  NotFoundError,
  OperationTimeout,
  createEngineConfig,
  type FeatureFlags,
} from "@dbplane/core";
import { ClusterManager } from "../managers/cluster-manager";
import { OperationPoller } from "../poller/operation-poller";
import { RetryPolicy } from "../poller/retry-policy";
import {
  FakeClock,
  allowListData,
  backupScheduleData,
  clusterData,
  clusterSpec,
  clusterState,
  createFakeApi,
  nodeConfigurations,
  regionInfo,
  scope,
  task,
  tracks,
} from "./fakes";

// ── Test helpers ───────────────────────────────────────────────────────

function createManager(flags: Partial<FeatureFlags> = {}) {
  const api = createFakeApi();
  const clock = new FakeClock();
  const log = jest.fn();
  const config = createEngineConfig({ featureFlags: flags });
  const poller = new OperationPoller(new RetryPolicy(config.pollIntervalMs, config.operationTimeoutMs, clock), log);

  api.listTracks.mockResolvedValue(tracks);
  api.getNodeConfigurations.mockResolvedValue(nodeConfigurations);
  api.getClusterCmk.mockRejectedValue(new NotFoundError("No key configured", "cluster-1"));

  const manager = new ClusterManager(api, poller, config, scope, log);
  return { manager, api, clock, log };
}

function callOrder(mock: { mock: { invocationCallOrder: number[] } }): number {
  const [order] = mock.mock.invocationCallOrder;
  if (order === undefined) throw new Error("mock was not called");
  return order;
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("ClusterManager", () => {
  describe("create", () => {
    it("rejects mixed credentials before any API call", async () => {
      const { manager, api } = createManager();
      const spec = clusterSpec({
        credentials: { username: "admin", password: "test-secret", ycqlPassword: "test-secret" },
      });

      await expect(manager.create(spec)).rejects.toBeInstanceOf(ConfigurationError);
      for (const method of Object.values(api)) {
        expect(method).not.toHaveBeenCalled();
      }
    });

    it("rejects connection pooling settings while the flag is off", async () => {
      const { manager, api } = createManager();

      await expect(manager.create(clusterSpec({ desiredConnectionPoolingState: "Enabled" }))).rejects.toThrow(
        "desiredConnectionPoolingState requires the connectionPooling feature flag.",
      );
      expect(api.createCluster).not.toHaveBeenCalled();
    });

    it("creates, waits, applies post-create settings in order and reads back", async () => {
      const { manager, api } = createManager();
      const onCreated = jest.fn();
      api.createCluster.mockResolvedValue(clusterData(undefined, "QUEUED"));
      api.listTasks.mockResolvedValue([task("CREATE_CLUSTER", "SUCCEEDED")]);
      api.getCluster.mockResolvedValueOnce(clusterData()).mockResolvedValue(clusterData(undefined, "PAUSED"));
      api.listBackupSchedules.mockResolvedValue([backupScheduleData()]);
      api.editBackupSchedule.mockResolvedValue(backupScheduleData());
      api.editClusterAllowLists.mockResolvedValue(undefined);
      api.listClusterAllowLists.mockResolvedValue([allowListData("al-1", "office")]);
      api.pauseCluster.mockResolvedValue(clusterData(undefined, "PAUSING"));

      const state = await manager.create(
        clusterSpec({
          backupSchedules: [{ state: "ACTIVE", retentionPeriodInDays: 14, cronExpression: "0 3 * * *" }],
          clusterAllowListIds: ["al-1"],
          desiredState: "Paused",
        }),
        { onCreated },
      );

      expect(api.createCluster).toHaveBeenCalledWith({
        cluster_spec: expect.objectContaining({ name: "orders-db" }),
        db_credentials: {
          ysql: { username: "YWRtaW4=", password: "dGVzdC1zZWNyZXQ=" },
          ycql: { username: "YWRtaW4=", password: "dGVzdC1zZWNyZXQ=" },
        },
      });
      expect(onCreated).toHaveBeenCalledWith("cluster-1");
      expect(api.listTasks).toHaveBeenCalledWith({
        entityId: "cluster-1",
        entityType: "CLUSTER",
        taskType: "CREATE_CLUSTER",
      }, { signal: undefined });
      expect(api.editBackupSchedule).toHaveBeenCalledWith("cluster-1", "schedule-1", {
        state: "ACTIVE",
        retention_period_in_days: 14,
        description: "Default backup schedule",
        cron_expression: "0 3 * * *",
      });
      expect(api.editClusterAllowLists).toHaveBeenCalledWith("cluster-1", ["al-1"]);

      expect(callOrder(api.createCluster)).toBeLessThan(callOrder(api.editBackupSchedule));
      expect(callOrder(api.editBackupSchedule)).toBeLessThan(callOrder(api.editClusterAllowLists));
      expect(callOrder(api.editClusterAllowLists)).toBeLessThan(callOrder(api.pauseCluster));

      expect(state).toMatchObject({
        clusterId: "cluster-1",
        desiredState: "Paused",
        clusterAllowListIds: ["al-1"],
        credentials: { username: "admin", password: "test-secret" },
      });
      expect(state.backupSchedules?.map((schedule) => schedule.scheduleId)).toEqual(["schedule-1"]);
    });

    it("sends the encryption key with the create request", async () => {
      const { manager, api } = createManager();
      api.createCluster.mockResolvedValue(clusterData(undefined, "QUEUED"));
      api.listTasks.mockResolvedValue([task("CREATE_CLUSTER", "SUCCEEDED")]);
      api.getCluster.mockResolvedValue(clusterData());

      await manager.create(
        clusterSpec({
          cmkSpec: {
            providerType: "AWS",
            isEnabled: true,
            awsCmkSpec: { accessKey: "test-access", secretKey: "test-secret", arnList: ["arn:test:key/1"] },
          },
        }),
      );

      expect(api.createCluster).toHaveBeenCalledWith(
        expect.objectContaining({
          security_cmk_spec: {
            provider_type: "AWS",
            is_enabled: true,
            aws_cmk_spec: { access_key: "test-access", secret_key: "test-secret", arn_list: ["arn:test:key/1"] },
          },
        }),
      );
    });

    it("restores a backup and enables connection pooling when asked", async () => {
      const { manager, api } = createManager({ connectionPooling: true });
      const pooled = clusterData();
      pooled.info.is_connection_pooling_enabled = true;
      api.createCluster.mockResolvedValue(clusterData(undefined, "QUEUED"));
      api.listTasks.mockResolvedValue([task("CREATE_CLUSTER", "SUCCEEDED")]);
      api.getCluster.mockResolvedValue(pooled);
      api.createRestore.mockResolvedValue({ info: { id: "restore-1", state: "IN_PROGRESS" } });
      api.getRestore.mockResolvedValue({ info: { id: "restore-1", state: "SUCCEEDED" } });
      api.updateConnectionPooling.mockResolvedValue(undefined);

      const state = await manager.create(
        clusterSpec({ restoreBackupId: "backup-9", desiredConnectionPoolingState: "Enabled" }),
      );

      expect(api.createRestore).toHaveBeenCalledWith("cluster-1", "backup-9");
      expect(api.getRestore).toHaveBeenCalledWith("restore-1", { signal: undefined });
      expect(api.updateConnectionPooling).toHaveBeenCalledWith("cluster-1", "ENABLE");
      expect(state.restoreBackupId).toBe("backup-9");
      expect(state.desiredConnectionPoolingState).toBe("Enabled");
    });

    it("reports the new id even when the create task fails", async () => {
      const { manager, api } = createManager();
      const onCreated = jest.fn();
      api.createCluster.mockResolvedValue(clusterData(undefined, "QUEUED"));
      api.listTasks.mockResolvedValue([task("CREATE_CLUSTER", "FAILED")]);

      await expect(manager.create(clusterSpec(), { onCreated })).rejects.toThrow(
        new ApiError("The CREATE_CLUSTER task for cluster-1 failed", undefined),
      );
      expect(onCreated).toHaveBeenCalledWith("cluster-1");
    });

    it("times out with OperationTimeout when the cluster never becomes active", async () => {
      const { manager, api, clock } = createManager();
      api.createCluster.mockResolvedValue(clusterData(undefined, "QUEUED"));
      api.listTasks.mockResolvedValue([task("CREATE_CLUSTER", "IN_PROGRESS")]);

      const error = await manager.create(clusterSpec()).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(OperationTimeout);
      expect(error).not.toBeInstanceOf(ApiError);
      expect(clock.now()).toBe(3_600_000);
    });
  });

  describe("refresh", () => {
    it("keeps the region order of the prior state", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockResolvedValue(
        clusterData([regionInfo("us-west-2"), regionInfo("us-east-1", { is_default: true })]),
      );
      const prior = clusterState();
      const [east] = prior.clusterRegionInfo;
      if (!east) throw new Error("fixture has a region");
      prior.clusterRegionInfo = [east, { ...east, region: "us-west-2", isDefault: false }];

      const state = await manager.refresh(prior);

      expect(state.clusterRegionInfo.map((region) => region.region)).toEqual(["us-east-1", "us-west-2"]);
    });

    it("matches the state create produced when nothing changed", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockResolvedValue(clusterData());

      await expect(manager.refresh(clusterState())).resolves.toEqual(clusterState());
    });
  });

  describe("update", () => {
    it("resumes a paused cluster, edits it and waits for the edit task", async () => {
      const { manager, api, clock } = createManager();
      api.resumeCluster.mockResolvedValue(clusterData(undefined, "RESUMING"));
      api.getCluster.mockResolvedValue(clusterData());
      api.editCluster.mockResolvedValue(clusterData(undefined, "UPDATING"));
      api.listTasks
        .mockResolvedValueOnce([task("EDIT_CLUSTER", "IN_PROGRESS")])
        .mockResolvedValueOnce([task("EDIT_CLUSTER", "SUCCEEDED")]);

      await manager.update(
        clusterState({ desiredState: "Paused" }),
        clusterSpec({ clusterRegionInfo: [{ region: "us-east-1", numNodes: 5, numCores: 4 }] }),
      );

      expect(callOrder(api.resumeCluster)).toBeLessThan(callOrder(api.editCluster));
      expect(api.editCluster).toHaveBeenCalledWith(
        "cluster-1",
        expect.objectContaining({
          cluster_info: expect.objectContaining({ num_nodes: 5, version: 7, fault_tolerance: "ZONE" }),
        }),
      );
      expect(api.listTasks).toHaveBeenCalledWith({
        entityId: "cluster-1",
        entityType: "CLUSTER",
        taskType: "EDIT_CLUSTER",
      }, { signal: undefined });
      expect(clock.sleeps).toEqual([10_000]);
      expect(api.pauseCluster).not.toHaveBeenCalled();
    });

    it("leaves a paused cluster alone when the new spec cannot be translated", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockResolvedValue(clusterData(undefined, "PAUSED"));

      await expect(
        manager.update(
          clusterState({ desiredState: "Paused" }),
          clusterSpec({ clusterRegionInfo: [{ region: "us-east-1", numNodes: 3, numCores: 4, publicAccess: false }] }),
        ),
      ).rejects.toThrow("Cluster is in a public VPC and public access is disabled. Please enable public access.");
      expect(api.resumeCluster).not.toHaveBeenCalled();
      expect(api.updateConnectionPooling).not.toHaveBeenCalled();
      expect(api.editCluster).not.toHaveBeenCalled();
    });

    it("pauses after the edit when the spec asks for it", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockResolvedValue(clusterData(undefined, "PAUSED"));
      api.getCluster.mockResolvedValueOnce(clusterData()).mockResolvedValueOnce(clusterData());
      api.editCluster.mockResolvedValue(clusterData());
      api.listTasks.mockResolvedValueOnce([task("EDIT_CLUSTER", "SUCCEEDED")]);
      api.pauseCluster.mockResolvedValue(clusterData(undefined, "PAUSING"));

      const state = await manager.update(clusterState(), clusterSpec({ desiredState: "Paused" }));

      expect(callOrder(api.editCluster)).toBeLessThan(callOrder(api.pauseCluster));
      expect(state.desiredState).toBe("Paused");
    });

    it("changes the encryption key only when it differs", async () => {
      const { manager, api } = createManager();
      const cmkSpec = {
        providerType: "AWS" as const,
        isEnabled: true,
        awsCmkSpec: { accessKey: "test-access", secretKey: "test-secret", arnList: ["arn:test:key/2"] },
      };
      api.getCluster.mockResolvedValue(clusterData());
      api.editCluster.mockResolvedValue(clusterData());
      api.listTasks.mockResolvedValue([task("EDIT_CLUSTER", "SUCCEEDED")]);
      api.editClusterCmk.mockResolvedValue(undefined);

      await manager.update(clusterState(), clusterSpec({ cmkSpec }));
      await manager.update(clusterState({ cmkSpec }), clusterSpec({ cmkSpec }));

      expect(api.editClusterCmk).toHaveBeenCalledTimes(1);
      expect(api.editClusterCmk).toHaveBeenCalledWith("cluster-1", {
        provider_type: "AWS",
        is_enabled: true,
        aws_cmk_spec: { access_key: "test-access", secret_key: "test-secret", arn_list: ["arn:test:key/2"] },
      });
    });
  });

  describe("delete", () => {
    it("returns false when the cluster is already gone", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockRejectedValue(new NotFoundError("Cluster cluster-1 not found", "cluster-1"));

      await expect(manager.delete(clusterState())).resolves.toBe(false);
      expect(api.deleteCluster).not.toHaveBeenCalled();
    });

    it("deletes and waits for the delete task", async () => {
      const { manager, api } = createManager();
      api.getCluster.mockResolvedValue(clusterData());
      api.deleteCluster.mockResolvedValue(undefined);
      api.listTasks.mockResolvedValue([task("DELETE_CLUSTER", "SUCCEEDED")]);

      await expect(manager.delete(clusterState())).resolves.toBe(true);
      expect(api.listTasks).toHaveBeenCalledWith({
        entityId: "cluster-1",
        entityType: "CLUSTER",
        taskType: "DELETE_CLUSTER",
      }, { signal: undefined });
    });
  });
});
