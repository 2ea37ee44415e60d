// ---------------------------------------------------------------------------
// VPC and allow-list payloads
// ---------------------------------------------------------------------------

import { ConfigurationError, hasText, isSet, type AllowListSpec, type VpcSpec } from "@dbplane/core";
import type { AllowListSpecPayload, VpcSpecPayload } from "@dbplane/api-client";

export function validateVpcRules(spec: VpcSpec): void {
  const regions = spec.regionCidrInfo ?? [];

  if (hasText(spec.globalCidr) && regions.length > 0) {
    throw new ConfigurationError(
      "Global and region CIDR details provided",
      "Specify either the global CIDR or the CIDR information for the regions. Don't provide both.",
      ["globalCidr", "regionCidrInfo"],
    );
  }
  if (hasText(spec.globalCidr) && spec.cloud !== "GCP") {
    throw new ConfigurationError("Invalid global CIDR", "Global CIDR only applies to GCP.", ["globalCidr"]);
  }
  if (spec.cloud === "AZURE") {
    if (regions.length !== 1) {
      throw new ConfigurationError("Invalid VPC regions", "Only one region supported per Azure VPC.", [
        "regionCidrInfo",
      ]);
    }
    if (regions.some((region) => hasText(region.cidr))) {
      throw new ConfigurationError("Invalid VPC CIDR", "CIDR are auto-assigned for AZURE. Please remove it", [
        "regionCidrInfo",
      ]);
    }
  }
  if (new Set(regions.map((region) => region.region)).size !== regions.length) {
    throw new ConfigurationError("Duplicate VPC regions", "Ensure the regions are unique.", ["regionCidrInfo"]);
  }
}

export function translateVpcSpec(spec: VpcSpec): VpcSpecPayload {
  return {
    name: spec.name,
    cloud: spec.cloud,
    ...(hasText(spec.globalCidr) ? { parent_cidr: spec.globalCidr } : {}),
    ...(isSet(spec.regionCidrInfo) && spec.regionCidrInfo.length > 0
      ? {
          region_specs: spec.regionCidrInfo.map((region) => ({
            region: region.region,
            ...(hasText(region.cidr) ? { cidr: region.cidr } : {}),
          })),
        }
      : {}),
  };
}

export function translateAllowListSpec(spec: AllowListSpec): AllowListSpecPayload {
  return {
    name: spec.allowListName,
    description: spec.allowListDescription,
    allow_list: [...spec.cidrList],
  };
}
