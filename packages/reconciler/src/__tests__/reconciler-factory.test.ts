import { createEngineConfig } from "@dbplane/core";
import { OperationPoller } from "../poller/operation-poller";
import { ReconcilerFactory } from "../reconciler-factory";
import { FakeClock, createFakeApi, scope, vpcData } from "./fakes";

describe("ReconcilerFactory", () => {
  it("wires every manager around one poller", () => {
    const reconcilers = ReconcilerFactory.createManagers({
      api: createFakeApi(),
      scope,
      engine: createEngineConfig(),
    });

    expect(reconcilers.poller).toBeInstanceOf(OperationPoller);
    expect(Object.keys(reconcilers).sort()).toEqual([
      "allowLists",
      "backups",
      "clusters",
      "dbAuditLogging",
      "integrations",
      "poller",
      "readReplicas",
      "vpcs",
    ]);
  });

  it("polls with the configured interval, clock and listeners", async () => {
    const api = createFakeApi();
    const clock = new FakeClock();
    const log = jest.fn();
    const onProgress = jest.fn();
    api.createVpc.mockResolvedValue(vpcData("vpc-1", "app-vpc", "QUEUED"));
    api.getVpc.mockResolvedValueOnce(vpcData("vpc-1", "app-vpc", "QUEUED")).mockResolvedValue(vpcData("vpc-1", "app-vpc"));

    const { vpcs } = ReconcilerFactory.createManagers({
      api,
      scope,
      engine: createEngineConfig({ pollIntervalMs: 5_000 }),
      log,
      clock,
      onProgress,
    });
    const state = await vpcs.create({ name: "app-vpc", cloud: "AWS" });

    expect(state.vpcId).toBe("vpc-1");
    expect(state.regionCidrInfo).toBeNull();
    expect(clock.sleeps).toEqual([5_000]);
    expect(log).toHaveBeenCalledWith("Creating VPC app-vpc", "stdout");
    expect(onProgress.mock.calls.map(([event]) => [event.phase, event.status, event.attempt, event.elapsedMs])).toEqual([
      ["SUBMITTED", null, 0, 0],
      ["POLLING", "QUEUED", 1, 0],
      ["SUCCEEDED", "ACTIVE", 2, 5_000],
    ]);
  });
});
