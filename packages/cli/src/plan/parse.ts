import { ConfigurationError } from "@dbplane/core";
import type { z } from "zod";

/** Parses `raw` or raises a `ConfigurationError` listing every failing path. */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, title: string): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const { issues } = result.error;
  const message = issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  throw new ConfigurationError(
    title,
    message,
    issues.map((issue) => issue.path.join(".")),
  );
}
