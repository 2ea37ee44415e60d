import { z } from "zod";
import { CloudType, NodeConfigSpecSchema, NodeConfigStateSchema, ScopeSchema } from "./common";

// Each replica must reference its VPC by exactly one of vpcId / vpcName
export const ReadReplicaSpecSchema = z.object({
  cloudType: CloudType,
  region: z.string().min(1),
  numNodes: z.number().int().positive(),
  numReplicas: z.number().int().positive(),
  vpcId: z.string().nullish(),
  vpcName: z.string().nullish(),
  nodeConfig: NodeConfigSpecSchema.extend({
    diskSizeGb: z.number().int().positive(),
  }),
  multiZone: z.boolean().nullish(),
});

export type ReadReplicaSpec = z.infer<typeof ReadReplicaSpecSchema>;

export const ReadReplicasSpecSchema = z.object({
  primaryClusterId: z.string().min(1),
  readReplicasInfo: z.array(ReadReplicaSpecSchema).min(1, "You must specify at least one read replica"),
});

export type ReadReplicasSpec = z.infer<typeof ReadReplicasSpecSchema>;

export const ReadReplicaStateSchema = z.object({
  cloudType: CloudType,
  region: z.string(),
  numNodes: z.number().int(),
  numReplicas: z.number().int(),
  vpcId: z.string(),
  vpcName: z.string(),
  nodeConfig: NodeConfigStateSchema,
  multiZone: z.boolean(),
  endpoint: z.string().nullable(),
});

export type ReadReplicaState = z.infer<typeof ReadReplicaStateSchema>;

export const ReadReplicasStateSchema = ScopeSchema.extend({
  primaryClusterId: z.string(),
  readReplicasInfo: z.array(ReadReplicaStateSchema),
});

export type ReadReplicasState = z.infer<typeof ReadReplicasStateSchema>;

export function validateReadReplicasSpec(data: unknown): ReadReplicasSpec {
  return ReadReplicasSpecSchema.parse(data);
}
