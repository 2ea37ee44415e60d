/**
 * Cross-Reference Resolver
 *
 * Turns names into ids (and back) through the service's listing endpoints.
 * One resolver lives for one reconciliation pass; lookups are cached for
 * that pass only, so a later pass sees renames and new resources.
 */

import { ConfigurationError, NotFoundError, type CloudType, type ClusterTier } from "@dbplane/core";
import type { IManagedDbApi, NodeConfiguration, TelemetryProviderData, TrackData } from "@dbplane/api-client";

/** The track the service calls "Production" is offered to callers as "Stable". */
const TRACK_ALIASES: Record<string, string> = { Stable: "Production" };

/** The service's name for a track the caller may have written by alias. */
export function canonicalTrackName(name: string): string {
  return TRACK_ALIASES[name] ?? name;
}

export interface NodeSize {
  memoryMb: number;
  /** Disk the instance type includes when none is requested */
  diskSizeGb: number;
}

export class CrossReferenceResolver {
  private readonly vpcIds = new Map<string, string>();
  private readonly vpcNames = new Map<string, string>();
  private readonly nodeConfigs = new Map<string, NodeConfiguration[]>();
  private readonly integrationNames = new Map<string, string>();
  private tracks: TrackData[] | undefined;
  private integrations: TelemetryProviderData[] | undefined;

  constructor(private readonly api: IManagedDbApi) {}

  async vpcIdForName(name: string): Promise<string> {
    const cached = this.vpcIds.get(name);
    if (cached !== undefined) return cached;

    const matches = (await this.api.listVpcs()).filter((vpc) => vpc.spec.name === name);
    const [match] = matches;
    if (!match) {
      throw new ConfigurationError("VPC not found", `VPC ${name} not found`, ["vpcName"]);
    }
    if (matches.length > 1) {
      throw new ConfigurationError("Ambiguous VPC name", `more than 1 VPC found with the name ${name}`, ["vpcName"]);
    }
    this.vpcIds.set(name, match.info.id);
    this.vpcNames.set(match.info.id, name);
    return match.info.id;
  }

  async vpcNameForId(vpcId: string): Promise<string> {
    const cached = this.vpcNames.get(vpcId);
    if (cached !== undefined) return cached;

    const vpc = await this.api.getVpc(vpcId);
    this.vpcNames.set(vpcId, vpc.spec.name);
    return vpc.spec.name;
  }

  async trackIdForName(name: string): Promise<string> {
    const alias = TRACK_ALIASES[name];
    const track = (await this.listTracks()).find(
      (candidate) => candidate.spec.name === name || candidate.spec.name === alias,
    );
    if (!track) {
      throw new ConfigurationError("Unknown database track", "The database version doesn't exist.", ["databaseTrack"]);
    }
    return track.info.id;
  }

  async trackNameForId(trackId: string): Promise<string> {
    const track = (await this.listTracks()).find((candidate) => candidate.info.id === trackId);
    if (!track) {
      throw new NotFoundError(`Track ${trackId} is not offered to this account`, trackId, "Unknown database track");
    }
    return track.spec.name;
  }

  async nodeSize(cloud: CloudType, tier: ClusterTier, region: string, numCores: number): Promise<NodeSize> {
    const key = `${cloud}/${tier}/${region}`;
    let configs = this.nodeConfigs.get(key);
    if (configs === undefined) {
      configs = await this.api.getNodeConfigurations({ cloud, tier, region });
      this.nodeConfigs.set(key, configs);
    }
    if (configs.length === 0) {
      throw new ConfigurationError(
        `No instance types in ${region}`,
        "No instances configured for the given region.",
        ["region"],
      );
    }
    const config = configs.find((candidate) => candidate.num_cores === numCores);
    if (!config) {
      throw new ConfigurationError(
        `Unsupported node size in ${region}`,
        "Node with the given number of CPU cores doesn't exist in the given region.",
        ["numCores"],
      );
    }
    return { memoryMb: config.memory_mb, diskSizeGb: config.include_disk_size_gb };
  }

  async integrationIdForName(name: string): Promise<string> {
    if (this.integrations === undefined) {
      this.integrations = await this.api.listIntegrations();
    }
    const match = this.integrations.find((integration) => integration.spec.name === name);
    if (!match) {
      throw new ConfigurationError("Integration not found", `Integration ${name} not found`, ["integrationName"]);
    }
    this.integrationNames.set(match.info.id, name);
    return match.info.id;
  }

  async integrationNameForId(configId: string): Promise<string> {
    const cached = this.integrationNames.get(configId);
    if (cached !== undefined) return cached;

    const integration = await this.api.getIntegration(configId);
    this.integrationNames.set(configId, integration.spec.name);
    return integration.spec.name;
  }

  private async listTracks(): Promise<TrackData[]> {
    if (this.tracks === undefined) {
      this.tracks = await this.api.listTracks();
    }
    return this.tracks;
  }
}
