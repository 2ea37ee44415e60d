import { CloudType, NotFoundError, type ReadReplicaState, type ReadReplicasState } from "@dbplane/core";
import type { ReadContext } from "./context";
import { expectValue } from "./read-purpose";
import { restoreRegionOrder, type RegionIndex } from "./region-order";

export interface ReadReplicasReadInput {
  primaryClusterId: string;
  regionIndex: RegionIndex;
}

/** A primary with no replicas reads as not found. */
export async function readReadReplicasState(
  ctx: ReadContext,
  input: ReadReplicasReadInput,
): Promise<ReadReplicasState> {
  const { primaryClusterId, regionIndex } = input;
  const data = await ctx.api.getReadReplicas(primaryClusterId);
  if (data.spec.length === 0) {
    throw new NotFoundError(`Cluster ${primaryClusterId} has no read replicas`, primaryClusterId);
  }
  const endpoints = data.info.endpoints ?? [];

  const ordered = restoreRegionOrder(data.spec, (replica) => replica.placement_info.cloud_info.region, regionIndex);
  const replicas: ReadReplicaState[] = [];
  for (const replica of ordered) {
    const placement = replica.placement_info;
    const region = placement.cloud_info.region;
    const vpcId = placement.vpc_id ?? "";
    replicas.push({
      cloudType: expectValue(CloudType, placement.cloud_info.code, "cloud"),
      region,
      numNodes: placement.num_nodes,
      numReplicas: placement.num_replicas ?? placement.num_nodes,
      vpcId,
      vpcName: vpcId !== "" ? await ctx.refs.vpcNameForId(vpcId) : "",
      nodeConfig: {
        numCores: replica.node_info?.num_cores ?? 0,
        diskSizeGb: replica.node_info?.disk_size_gb ?? 0,
        diskIops: replica.node_info?.disk_iops ?? null,
      },
      multiZone: placement.multi_zone ?? true,
      endpoint: endpoints.find((endpoint) => endpoint.region === region)?.host ?? null,
    });
  }

  return { ...ctx.scope, primaryClusterId, readReplicasInfo: replicas };
}
