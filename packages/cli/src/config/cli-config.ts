/**
 * CLI Configuration
 *
 * Settings come from `~/.dbplane/config.json`, overlaid with `DBPLANE_*`
 * environment variables, and are validated once at startup. Feature flags
 * follow the same path: file first, then `DBPLANE_FF_<FLAG>`.
 */

import fs from "fs-extra";
import os from "os";
import path from "path";
import { z } from "zod";
import {
  ConfigurationError,
  EngineConfigSchema,
  FeatureFlagsSchema,
  featureFlagsFromEnv,
  type FeatureFlags,
} from "@dbplane/core";
import { parseWith } from "../plan/parse";

export const CONFIG_DIR = path.join(os.homedir(), ".dbplane");
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

export const CliConfigSchema = z.object({
  apiUrl: z.string().url(),
  apiToken: z.string().min(1),
  accountId: z.string().min(1),
  projectId: z.string().min(1),
  /** Per-request HTTP timeout */
  requestTimeoutMs: z.number().int().positive().optional(),
  /** Log every request and response */
  verbose: z.boolean().default(false),
  engine: EngineConfigSchema.default({}),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/** Environment variable → top-level config key. */
const ENV_OVERRIDES: Record<string, keyof CliConfig> = {
  DBPLANE_API_URL: "apiUrl",
  DBPLANE_API_TOKEN: "apiToken",
  DBPLANE_ACCOUNT_ID: "accountId",
  DBPLANE_PROJECT_ID: "projectId",
};

export interface ConfigSource {
  /** Defaults to `~/.dbplane/config.json` */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

const RecordSchema = z.record(z.unknown());

function asRecord(value: unknown): Record<string, unknown> {
  const result = RecordSchema.safeParse(value);
  return result.success ? result.data : {};
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  if (!(await fs.pathExists(configPath))) return {};

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(
      "Unreadable configuration file",
      `${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseWith(RecordSchema, raw, `Invalid configuration file ${configPath}`);
}

/** File contents with every environment override applied, not yet validated. */
async function mergedConfig(source: ConfigSource): Promise<Record<string, unknown>> {
  const env = source.env ?? process.env;
  const merged = await readConfigFile(source.configPath ?? CONFIG_FILE);

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== "") merged[key] = value;
  }

  const engine = asRecord(merged.engine);
  merged.engine = {
    ...engine,
    featureFlags: { ...asRecord(engine.featureFlags), ...featureFlagsFromEnv(env) },
  };
  return merged;
}

export async function loadCliConfig(source: ConfigSource = {}): Promise<CliConfig> {
  return parseWith(CliConfigSchema, await mergedConfig(source), "Invalid configuration");
}

/**
 * Only the feature flags. `validate` needs these but no credentials, so
 * it must not fail on a missing token.
 */
export async function loadFeatureFlags(source: ConfigSource = {}): Promise<FeatureFlags> {
  const engine = asRecord((await mergedConfig(source)).engine);
  return parseWith(FeatureFlagsSchema, engine.featureFlags ?? {}, "Invalid feature flags");
}
