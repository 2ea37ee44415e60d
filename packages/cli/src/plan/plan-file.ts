// ---------------------------------------------------------------------------
// Plan and state files
// ---------------------------------------------------------------------------

import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "@dbplane/core";
import { parseWith } from "./parse";
import { ResourceKind } from "./resource-kinds";

export const PlanResourceSchema = z.object({
  /** Stable name of the resource within the plan */
  key: z.string().min(1),
  kind: ResourceKind,
  spec: z.unknown(),
});

export type PlanResource = z.infer<typeof PlanResourceSchema>;

/** Resources are applied in the order listed and destroyed in reverse. */
export const PlanSchema = z.object({
  resources: z.array(PlanResourceSchema).superRefine((resources, ctx) => {
    const seen = new Set<string>();
    resources.forEach((resource, index) => {
      if (seen.has(resource.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "key"],
          message: `Duplicate resource key "${resource.key}"`,
        });
      }
      seen.add(resource.key);
    });
  }),
});

export type Plan = z.infer<typeof PlanSchema>;

export const STATE_FILE_VERSION = 1;

export const StateEntrySchema = z.object({
  key: z.string(),
  kind: ResourceKind,
  id: z.string(),
  /** The spec last applied, as written in the plan */
  spec: z.unknown(),
  /** Null when the resource was created but never settled */
  state: z.record(z.unknown()).nullable(),
  updatedAt: z.string(),
});

export type StateEntry = z.infer<typeof StateEntrySchema>;

export const StateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  resources: z.array(StateEntrySchema),
});

export type StateFile = z.infer<typeof StateFileSchema>;

export function emptyStateFile(): StateFile {
  return { version: STATE_FILE_VERSION, resources: [] };
}

export async function loadPlan(planPath: string): Promise<Plan> {
  if (!(await fs.pathExists(planPath))) {
    throw new ConfigurationError("Plan file not found", `No plan file at ${planPath}`);
  }
  const raw: unknown = await fs.readJson(planPath);
  return parseWith(PlanSchema, raw, `Invalid plan file ${planPath}`);
}

export interface IStateStore {
  load(): Promise<StateFile>;
  save(state: StateFile): Promise<void>;
}

/** State persisted as JSON; writes go to a sibling file and are moved over. */
export class JsonStateStore implements IStateStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StateFile> {
    if (!(await fs.pathExists(this.filePath))) return emptyStateFile();
    const raw: unknown = await fs.readJson(this.filePath);
    return parseWith(StateFileSchema, raw, `Invalid state file ${this.filePath}`);
  }

  async save(state: StateFile): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    const pending = `${this.filePath}.tmp`;
    await fs.writeJson(pending, state, { spaces: 2 });
    await fs.move(pending, this.filePath, { overwrite: true });
  }
}
