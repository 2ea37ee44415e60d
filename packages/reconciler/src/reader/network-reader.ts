// ---------------------------------------------------------------------------
// VPC and allow-list state
// ---------------------------------------------------------------------------

import {
  CloudType,
  type AllowListState,
  type VpcRegionSpec,
  type VpcRegionState,
  type VpcState,
} from "@dbplane/core";
import type { ReadContext } from "./context";
import { expectValue } from "./read-purpose";

export interface VpcReadInput {
  vpcId: string;
  /** Regions as the caller listed them; null when a global CIDR was used */
  requestedRegions: VpcRegionSpec[] | null;
}

/**
 * Keeps the caller's order when the service holds exactly the caller's
 * regions; otherwise sorts by region.
 */
function orderRegionCidrs(fetched: VpcRegionState[], requested: VpcRegionSpec[]): VpcRegionState[] {
  const byRegion = new Map(fetched.map((entry) => [entry.region, entry]));
  const sameSet =
    requested.length === fetched.length && requested.every((entry) => byRegion.has(entry.region));
  if (sameSet) {
    return requested.flatMap((entry) => {
      const match = byRegion.get(entry.region);
      return match ? [match] : [];
    });
  }
  return [...fetched].sort((a, b) => a.region.localeCompare(b.region));
}

export async function readVpcState(ctx: ReadContext, input: VpcReadInput): Promise<VpcState> {
  const { info, spec } = await ctx.api.getVpc(input.vpcId);
  const fetched = (spec.region_specs ?? []).map((entry) => ({ region: entry.region, cidr: entry.cidr ?? "" }));

  return {
    ...ctx.scope,
    vpcId: info.id,
    name: spec.name,
    cloud: expectValue(CloudType, spec.cloud, "cloud"),
    globalCidr: spec.parent_cidr ?? null,
    regionCidrInfo: input.requestedRegions === null ? null : orderRegionCidrs(fetched, input.requestedRegions),
    externalVpcId: info.external_vpc_id ?? null,
  };
}

export async function readAllowListState(ctx: ReadContext, allowListId: string): Promise<AllowListState> {
  const { info, spec } = await ctx.api.getAllowList(allowListId);
  return {
    ...ctx.scope,
    allowListId: info.id,
    allowListName: spec.name,
    allowListDescription: spec.description,
    cidrList: [...spec.allow_list],
    clusterIds: [...info.cluster_ids],
  };
}
