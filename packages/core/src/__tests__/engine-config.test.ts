import { createEngineConfig, featureFlagsFromEnv } from "../engine-config";

describe("createEngineConfig", () => {
  it("defaults to a 10s interval, a 1h deadline and every flag off", () => {
    expect(createEngineConfig()).toEqual({
      pollIntervalMs: 10_000,
      operationTimeoutMs: 3_600_000,
      featureFlags: { connectionPooling: false, googleCloudIntegration: false },
    });
  });

  it("keeps unspecified flags off", () => {
    const config = createEngineConfig({ featureFlags: { connectionPooling: true } });

    expect(config.featureFlags).toEqual({ connectionPooling: true, googleCloudIntegration: false });
  });

  it("rejects a non-positive interval", () => {
    expect(() => createEngineConfig({ pollIntervalMs: 0 })).toThrow();
  });
});

describe("featureFlagsFromEnv", () => {
  it("reads only the variables that are present", () => {
    expect(
      featureFlagsFromEnv({
        DBPLANE_FF_CONNECTION_POOLING: " True ",
        DBPLANE_FF_GOOGLECLOUD_INTEGRATION_ENABLED: undefined,
        CONNECTION_POOLING: "true",
      }),
    ).toEqual({ connectionPooling: true });
  });

  it("treats anything but true as off", () => {
    expect(featureFlagsFromEnv({ DBPLANE_FF_GOOGLECLOUD_INTEGRATION_ENABLED: "1" })).toEqual({
      googleCloudIntegration: false,
    });
  });

  it("accepts another prefix", () => {
    expect(featureFlagsFromEnv({ FF_CONNECTION_POOLING: "true" }, "FF_")).toEqual({ connectionPooling: true });
  });
});
