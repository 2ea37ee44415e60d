import { z } from "zod";
import { ScopeSchema } from "./common";

export const BackupSpecSchema = z.object({
  clusterId: z.string().min(1),
  backupDescription: z.string().nullish(),
  retentionPeriodInDays: z.number().int().min(1).max(31),
});

export type BackupSpec = z.infer<typeof BackupSpecSchema>;

export const BackupStateSchema = ScopeSchema.extend({
  backupId: z.string(),
  clusterId: z.string(),
  backupDescription: z.string().nullable(),
  retentionPeriodInDays: z.number().int(),
  state: z.string(),
  timestamp: z.string().nullable(),
});

export type BackupState = z.infer<typeof BackupStateSchema>;

export function validateBackupSpec(data: unknown): BackupSpec {
  return BackupSpecSchema.parse(data);
}
