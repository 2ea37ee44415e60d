import { z } from "zod";
import { ScopeSchema } from "./common";

export const AuditLogLevel = z.enum([
  "DEBUG1",
  "DEBUG2",
  "DEBUG3",
  "DEBUG4",
  "DEBUG5",
  "INFO",
  "NOTICE",
  "WARNING",
  "LOG",
]);
export type AuditLogLevel = z.infer<typeof AuditLogLevel>;

export const AuditStatementClass = z.enum(["READ", "WRITE", "FUNCTION", "ROLE", "DDL", "MISC"]);
export type AuditStatementClass = z.infer<typeof AuditStatementClass>;

export const AuditLogSettingsSchema = z.object({
  logCatalog: z.boolean(),
  logClient: z.boolean(),
  logLevel: AuditLogLevel,
  logParameter: z.boolean(),
  logRelation: z.boolean(),
  logStatementOnce: z.boolean(),
});

export type AuditLogSettings = z.infer<typeof AuditLogSettingsSchema>;

export const YsqlAuditConfigSchema = z.object({
  logSettings: AuditLogSettingsSchema,
  statementClasses: z.array(AuditStatementClass)
    .min(1)
    .refine(
      (classes) => new Set(classes).size === classes.length,
      { message: "Duplicate statement classes are not allowed" }
    ),
});

export type YsqlAuditConfig = z.infer<typeof YsqlAuditConfigSchema>;

// The exporting integration is referenced by id or by name, never both
export const DbAuditLoggingSpecSchema = z.object({
  clusterId: z.string().min(1),
  integrationId: z.string().nullish(),
  integrationName: z.string().nullish(),
  ysqlConfig: YsqlAuditConfigSchema,
});

export type DbAuditLoggingSpec = z.infer<typeof DbAuditLoggingSpecSchema>;

export const DbAuditLoggingStateSchema = ScopeSchema.extend({
  configId: z.string(),
  clusterId: z.string(),
  integrationId: z.string(),
  integrationName: z.string().nullable(),
  ysqlConfig: YsqlAuditConfigSchema,
  state: z.string(),
});

export type DbAuditLoggingState = z.infer<typeof DbAuditLoggingStateSchema>;

export function validateDbAuditLoggingSpec(data: unknown): DbAuditLoggingSpec {
  return DbAuditLoggingSpecSchema.parse(data);
}
