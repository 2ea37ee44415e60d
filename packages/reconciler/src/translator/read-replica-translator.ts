import { hasText, isSet, type ReadReplicasSpec } from "@dbplane/core";
import type { ReadReplicaSpecPayload } from "@dbplane/api-client";
import { buildRegionIndex, type RegionIndex } from "../reader/region-order";
import type { CrossReferenceResolver } from "./cross-reference";
import { checkRequiredVpcReference } from "./validators";

// Replicas are sized from the PAID catalogue whatever the primary's tier
const READ_REPLICA_TIER = "PAID";

export interface ReadReplicasTranslation {
  payload: ReadReplicaSpecPayload[];
  regionIndex: RegionIndex;
}

export function validateReadReplicaRules(spec: ReadReplicasSpec): void {
  spec.readReplicasInfo.forEach((replica, index) => {
    checkRequiredVpcReference(replica, `readReplicasInfo[${index}]`);
  });
}

export async function translateReadReplicasSpec(
  spec: ReadReplicasSpec,
  refs: CrossReferenceResolver,
): Promise<ReadReplicasTranslation> {
  const payload: ReadReplicaSpecPayload[] = [];

  for (const replica of spec.readReplicasInfo) {
    const vpcId = hasText(replica.vpcName) ? await refs.vpcIdForName(replica.vpcName) : replica.vpcId;
    const { numCores, diskSizeGb, diskIops } = replica.nodeConfig;
    const size = await refs.nodeSize(replica.cloudType, READ_REPLICA_TIER, replica.region, numCores);

    payload.push({
      placement_info: {
        cloud_info: { code: replica.cloudType, region: replica.region },
        num_nodes: replica.numNodes,
        num_replicas: replica.numReplicas,
        vpc_id: vpcId,
        multi_zone: replica.multiZone ?? true,
      },
      node_info: {
        num_cores: numCores,
        memory_mb: size.memoryMb,
        disk_size_gb: diskSizeGb,
        ...(isSet(diskIops) ? { disk_iops: diskIops } : {}),
      },
    });
  }

  return {
    payload,
    regionIndex: buildRegionIndex(spec.readReplicasInfo.map((replica) => replica.region)),
  };
}
