import { z } from "zod";
import { ScopeSchema } from "./common";

const CIDR_PATTERN = /^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/;

export const AllowListSpecSchema = z.object({
  allowListName: z.string().min(1),
  allowListDescription: z.string().default(""),
  cidrList: z.array(z.string().regex(CIDR_PATTERN, "Must be an IPv4 CIDR block")).min(1),
});

export type AllowListSpec = z.infer<typeof AllowListSpecSchema>;

export const AllowListStateSchema = ScopeSchema.extend({
  allowListId: z.string(),
  allowListName: z.string(),
  allowListDescription: z.string(),
  cidrList: z.array(z.string()),
  clusterIds: z.array(z.string()),
});

export type AllowListState = z.infer<typeof AllowListStateSchema>;

export function validateAllowListSpec(data: unknown): AllowListSpec {
  return AllowListSpecSchema.parse(data);
}
