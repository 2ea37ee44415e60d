/**
 * Cluster Translator
 *
 * Builds the create/edit payload for a cluster spec. Run
 * `validateClusterRules` first: this module only resolves references and
 * fills in server-side sizing.
 */

import {
  ConfigurationError,
  hasText,
  isSet,
  type ClusterSpec,
  type CmkSpec,
  type Credentials,
  type OptionalField,
} from "@dbplane/core";
import type {
  AccessibilityType,
  ClusterData,
  ClusterRegionInfo,
  ClusterSpecPayload,
  CmkPayload,
  DbCredentialsPayload,
} from "@dbplane/api-client";
import { buildRegionIndex, type RegionIndex } from "../reader/region-order";
import type { CrossReferenceResolver } from "./cross-reference";

export interface ClusterTranslation {
  payload: ClusterSpecPayload;
  regionIndex: RegionIndex;
}

export interface ClusterTranslateOptions {
  /** The cluster as the service holds it now; present for edits */
  existing?: ClusterData;
}

/** IOPS of zero or less means "instance default" and is left out of the payload. */
function positive(value: OptionalField<number>): number | undefined {
  return isSet(value) && value > 0 ? value : undefined;
}

function privateEndpointRegions(existing: ClusterData | undefined): Set<string> {
  const regions = new Set<string>();
  for (const info of existing?.spec.cluster_region_info ?? []) {
    if (info.accessibility_types.includes("PRIVATE_SERVICE_ENDPOINT")) {
      regions.add(info.placement_info.cloud_info.region);
    }
  }
  return regions;
}

export async function translateClusterSpec(
  spec: ClusterSpec,
  refs: CrossReferenceResolver,
  options: ClusterTranslateOptions = {},
): Promise<ClusterTranslation> {
  const { existing } = options;
  const trackId = hasText(spec.databaseTrack) ? await refs.trackIdForName(spec.databaseTrack) : undefined;
  const keepPrivateEndpoint = privateEndpointRegions(existing);

  const regions: ClusterRegionInfo[] = [];
  let totalNodes = 0;

  for (const [index, region] of spec.clusterRegionInfo.entries()) {
    const field = `clusterRegionInfo[${index}]`;
    totalNodes += region.numNodes;

    let vpcId: string | undefined;
    if (hasText(region.vpcName)) {
      vpcId = await refs.vpcIdForName(region.vpcName);
    } else if (hasText(region.vpcId)) {
      vpcId = region.vpcId;
    }

    const numCores = region.numCores ?? spec.nodeConfig?.numCores;
    if (!isSet(numCores)) {
      throw new ConfigurationError(
        `Missing node size in ${region.region}`,
        "Specify num_cores for the region or a root node_config.",
        [`${field}.numCores`],
      );
    }
    const size = await refs.nodeSize(spec.cloudType, spec.clusterTier, region.region, numCores);
    const diskSizeGb = region.diskSizeGb ?? spec.nodeConfig?.diskSizeGb ?? size.diskSizeGb;
    const diskIops = positive(region.diskIops) ?? positive(spec.nodeConfig?.diskIops);

    // A dedicated VPC is always reachable privately; without one the
    // cluster can only be public.
    const accessibility: AccessibilityType[] = [];
    if (vpcId !== undefined) {
      accessibility.push("PRIVATE");
      if (region.publicAccess === true) accessibility.push("PUBLIC");
    } else {
      if (region.publicAccess === false) {
        throw new ConfigurationError(
          "Public access required",
          "Cluster is in a public VPC and public access is disabled. Please enable public access.",
          [`${field}.publicAccess`],
        );
      }
      accessibility.push("PUBLIC");
    }
    if (keepPrivateEndpoint.has(region.region)) accessibility.push("PRIVATE_SERVICE_ENDPOINT");

    regions.push({
      placement_info: {
        cloud_info: { code: spec.cloudType, region: region.region },
        num_nodes: region.numNodes,
        ...(vpcId !== undefined ? { vpc_id: vpcId } : {}),
        ...(spec.clusterType === "SYNCHRONOUS" ? { multi_zone: false } : {}),
      },
      node_info: {
        num_cores: numCores,
        memory_mb: size.memoryMb,
        disk_size_gb: diskSizeGb,
        ...(diskIops !== undefined ? { disk_iops: diskIops } : {}),
      },
      accessibility_types: accessibility,
      is_default: region.isDefault === true,
      is_affinitized: region.isPreferred === true,
    });
  }

  const [onlyRegion] = regions;
  if (regions.length === 1 && onlyRegion) onlyRegion.is_default = true;

  const current = existing?.spec.cluster_info;
  const faultTolerance = spec.faultTolerance ?? current?.fault_tolerance ?? "NONE";
  const numFaultsToTolerate = spec.numFaultsToTolerate ?? current?.num_faults_to_tolerate;
  const version = current?.version;

  const payload: ClusterSpecPayload = {
    name: spec.clusterName,
    cluster_info: {
      cluster_tier: spec.clusterTier,
      num_nodes: totalNodes,
      fault_tolerance: faultTolerance,
      is_production: spec.clusterTier !== "FREE",
      cluster_type: spec.clusterType,
      ...(isSet(numFaultsToTolerate) ? { num_faults_to_tolerate: numFaultsToTolerate } : {}),
      ...(isSet(version) ? { version } : {}),
    },
    software_info: trackId !== undefined ? { track_id: trackId } : {},
    cluster_region_info: regions,
  };

  return {
    payload,
    regionIndex: buildRegionIndex(spec.clusterRegionInfo.map((region) => region.region)),
  };
}

function b64(value: OptionalField<string>): string {
  return Buffer.from(value ?? "", "utf8").toString("base64");
}

/** Base64-encodes the credentials the create request carries. */
export function encodeCredentials(credentials: Credentials): DbCredentialsPayload {
  if (hasText(credentials.ysqlUsername)) {
    return {
      ysql: { username: b64(credentials.ysqlUsername), password: b64(credentials.ysqlPassword) },
      ycql: { username: b64(credentials.ycqlUsername), password: b64(credentials.ycqlPassword) },
    };
  }
  const common = { username: b64(credentials.username), password: b64(credentials.password) };
  return { ysql: { ...common }, ycql: { ...common } };
}

export function translateCmkSpec(cmk: CmkSpec): CmkPayload {
  const { awsCmkSpec, azureCmkSpec } = cmk;
  return {
    provider_type: cmk.providerType,
    is_enabled: cmk.isEnabled,
    ...(cmk.providerType === "AWS" && isSet(awsCmkSpec)
      ? {
          aws_cmk_spec: {
            access_key: awsCmkSpec.accessKey,
            secret_key: awsCmkSpec.secretKey,
            arn_list: [...awsCmkSpec.arnList],
          },
        }
      : {}),
    ...(cmk.providerType === "AZURE" && isSet(azureCmkSpec)
      ? {
          azure_cmk_spec: {
            client_id: azureCmkSpec.clientId,
            client_secret: azureCmkSpec.clientSecret,
            tenant_id: azureCmkSpec.tenantId,
            key_vault_uri: azureCmkSpec.keyVaultUri,
            key_name: azureCmkSpec.keyName,
          },
        }
      : {}),
  };
}
