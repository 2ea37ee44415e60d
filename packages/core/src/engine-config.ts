/**
 * Engine Configuration
 *
 * Explicit configuration passed into the reconciliation engine at
 * construction time. Optional code paths are switched by `featureFlags`,
 * all of which default to off.
 */

import { z } from "zod";
import { OPERATION_POLL_INTERVAL_MS, OPERATION_TIMEOUT_MS } from "./constants";

export const FeatureFlagsSchema = z.object({
  /** Enables `desiredConnectionPoolingState` on clusters */
  connectionPooling: z.boolean().default(false),
  /** Allows integrations of type GOOGLECLOUD */
  googleCloudIntegration: z.boolean().default(false),
});

export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>;
export type FeatureFlagName = keyof FeatureFlags;

export const EngineConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(OPERATION_POLL_INTERVAL_MS),
  operationTimeoutMs: z.number().int().positive().default(OPERATION_TIMEOUT_MS),
  featureFlags: FeatureFlagsSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(input);
}

/** Environment variable suffix for each flag, e.g. `DBPLANE_FF_CONNECTION_POOLING`. */
export const FEATURE_FLAG_ENV_NAMES: Record<FeatureFlagName, string> = {
  connectionPooling: "CONNECTION_POOLING",
  googleCloudIntegration: "GOOGLECLOUD_INTEGRATION_ENABLED",
};

export const FEATURE_FLAG_ENV_PREFIX = "DBPLANE_FF_";

const FEATURE_FLAG_NAMES: FeatureFlagName[] = ["connectionPooling", "googleCloudIntegration"];

/**
 * Reads feature flags from an environment map. A flag is on when its
 * variable equals "true" in any case; anything else leaves it off.
 */
export function featureFlagsFromEnv(
  env: Record<string, string | undefined>,
  prefix = FEATURE_FLAG_ENV_PREFIX,
): Partial<FeatureFlags> {
  const flags: Partial<FeatureFlags> = {};
  for (const flag of FEATURE_FLAG_NAMES) {
    const raw = env[`${prefix}${FEATURE_FLAG_ENV_NAMES[flag]}`];
    if (raw === undefined) continue;
    flags[flag] = raw.trim().toLowerCase() === "true";
  }
  return flags;
}
