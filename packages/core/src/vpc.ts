import { z } from "zod";
import { CloudType, ScopeSchema } from "./common";

export const VpcRegionSpecSchema = z.object({
  region: z.string().min(1),
  cidr: z.string().nullish(),
});

export type VpcRegionSpec = z.infer<typeof VpcRegionSpecSchema>;

// Global CIDR (GCP only) and per-region CIDRs are mutually exclusive
export const VpcSpecSchema = z.object({
  name: z.string().min(1),
  cloud: CloudType,
  globalCidr: z.string().nullish(),
  regionCidrInfo: z.array(VpcRegionSpecSchema).nullish(),
});

export type VpcSpec = z.infer<typeof VpcSpecSchema>;

export const VpcRegionStateSchema = z.object({
  region: z.string(),
  cidr: z.string(),
});

export type VpcRegionState = z.infer<typeof VpcRegionStateSchema>;

export const VpcStateSchema = ScopeSchema.extend({
  vpcId: z.string(),
  name: z.string(),
  cloud: CloudType,
  globalCidr: z.string().nullable(),
  regionCidrInfo: z.array(VpcRegionStateSchema).nullable(),
  externalVpcId: z.string().nullable(),
});

export type VpcState = z.infer<typeof VpcStateSchema>;

export function validateVpcSpec(data: unknown): VpcSpec {
  return VpcSpecSchema.parse(data);
}
