import { ApiError, NotFoundError } from "@dbplane/core";
import type { z } from "zod";

/**
 * Why a resource is being read. A refresh needs the resource to exist; a
 * delete pre-check treats "already gone" as an answer.
 */
export type ReadPurpose = "refresh" | "delete-precheck";

export function readFor<T>(purpose: "refresh", read: () => Promise<T>): Promise<T>;
export function readFor<T>(purpose: "delete-precheck", read: () => Promise<T>): Promise<T | null>;
export function readFor<T>(purpose: ReadPurpose, read: () => Promise<T>): Promise<T | null>;
export async function readFor<T>(purpose: ReadPurpose, read: () => Promise<T>): Promise<T | null> {
  try {
    return await read();
  } catch (error) {
    if (purpose === "delete-precheck" && error instanceof NotFoundError) return null;
    throw error;
  }
}

/** Parses a value the service returned into the model's enum or shape. */
export function expectValue<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ApiError(
      `Unexpected ${what} in response: ${JSON.stringify(value)}`,
      undefined,
      "FATAL",
      "Unexpected response",
    );
  }
  return parsed.data;
}
