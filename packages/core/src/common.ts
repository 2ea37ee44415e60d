import { z } from "zod";

// Shared enums used across resource specs
export const CloudType = z.enum(["AWS", "GCP", "AZURE"]);
export type CloudType = z.infer<typeof CloudType>;

export const ClusterTier = z.enum(["FREE", "PAID"]);
export type ClusterTier = z.infer<typeof ClusterTier>;

export const ClusterType = z.enum(["SYNCHRONOUS", "GEO_PARTITIONED"]);
export type ClusterType = z.infer<typeof ClusterType>;

export const FaultTolerance = z.enum(["NONE", "NODE", "ZONE", "REGION"]);
export type FaultTolerance = z.infer<typeof FaultTolerance>;

export const DesiredState = z.enum(["Active", "Paused"]);
export type DesiredState = z.infer<typeof DesiredState>;

export const ConnectionPoolingState = z.enum(["Enabled", "Disabled"]);
export type ConnectionPoolingState = z.infer<typeof ConnectionPoolingState>;

// Node sizing shared by clusters and read replicas
export const NodeConfigSpecSchema = z.object({
  numCores: z.number().int().positive(),
  diskSizeGb: z.number().int().positive().nullish(),
  diskIops: z.number().int().nonnegative().nullish(),
});

export type NodeConfigSpec = z.infer<typeof NodeConfigSpecSchema>;

export const NodeConfigStateSchema = z.object({
  numCores: z.number().int(),
  diskSizeGb: z.number().int(),
  diskIops: z.number().int().nullable(),
});

export type NodeConfigState = z.infer<typeof NodeConfigStateSchema>;

/** Identifiers every persisted resource state carries. */
export const ScopeSchema = z.object({
  accountId: z.string().min(1),
  projectId: z.string().min(1),
});

export type Scope = z.infer<typeof ScopeSchema>;
