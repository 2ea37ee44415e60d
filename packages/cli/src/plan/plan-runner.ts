/**
 * Plan Runner
 *
 * Applies a plan against the recorded state, one resource at a time, and
 * persists the state file after every resource so a failure part-way
 * through keeps what already happened.
 *
 * A resource whose spec did not change is still re-read and compared with
 * that spec. Drift on a kind the service can edit is corrected with an
 * update; on any other kind it is reported and left alone.
 *
 * Every pass on a resource holds a `KeyedMutex` lease for `kind:key`. The
 * engine does not serialize passes itself.
 */

import { ConfigurationError, NotFoundError, describeError, noopLog, type LogCallback } from "@dbplane/core";
import { KeyedMutex } from "@dbplane/reconciler";
import type { Plan, PlanResource, IStateStore, StateEntry, StateFile } from "./plan-file";
import type { ResourceHandlers, ResourceKind, SettledResource } from "./resource-kinds";

export type ResourceAction =
  | "created"
  | "updated"
  | "unchanged"
  | "drifted"
  | "refreshed"
  | "deleted"
  | "gone"
  | "skipped"
  | "failed";

export interface ResourceOutcome {
  key: string;
  kind: ResourceKind;
  action: ResourceAction;
  id: string | null;
  /** Spec fields the service no longer matched */
  drift?: string[];
  error?: unknown;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunSummary {
  outcomes: ResourceOutcome[];
  /** False once any resource failed; later resources are not attempted */
  ok: boolean;
}

/** JSON with object keys sorted, so key order in the plan file is not a change. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) => {
    if (nested === null || typeof nested !== "object" || Array.isArray(nested)) return nested;
    return Object.fromEntries(Object.entries(nested).sort(([a], [b]) => a.localeCompare(b)));
  });
}

export function lockKey(kind: ResourceKind, key: string): string {
  return `${kind}:${key}`;
}

export class PlanRunner {
  constructor(
    private readonly handlers: ResourceHandlers,
    private readonly store: IStateStore,
    private readonly log: LogCallback = noopLog,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Creates, updates or re-reads every planned resource in order, then
   * deletes recorded resources the plan no longer lists, newest first.
   */
  async apply(plan: Plan, options: RunOptions = {}): Promise<RunSummary> {
    const state = await this.store.load();
    const outcomes: ResourceOutcome[] = [];

    for (const resource of plan.resources) {
      const outcome = await this.mutex.withLock(lockKey(resource.kind, resource.key), () =>
        this.applyResource(state, resource, options),
      );
      outcomes.push(outcome);
      if (outcome.action === "failed") return { outcomes, ok: false };
    }

    const planned = new Set(plan.resources.map((resource) => resource.key));
    const orphans = state.resources.filter((entry) => !planned.has(entry.key)).reverse();
    for (const entry of orphans) {
      this.log(`${entry.kind} ${entry.key} is no longer in the plan`, "stdout");
      const outcome = await this.destroyEntry(state, entry, options);
      outcomes.push(outcome);
      if (outcome.action === "failed") return { outcomes, ok: false };
    }

    return { outcomes, ok: true };
  }

  /** Re-reads every settled resource; resources that are gone leave the state. */
  async refresh(options: RunOptions = {}): Promise<RunSummary> {
    const state = await this.store.load();
    const outcomes: ResourceOutcome[] = [];

    for (const entry of [...state.resources]) {
      const outcome = await this.mutex.withLock(lockKey(entry.kind, entry.key), () =>
        this.refreshEntry(state, entry, options),
      );
      outcomes.push(outcome);
      if (outcome.action === "failed") return { outcomes, ok: false };
    }
    return { outcomes, ok: true };
  }

  /** Deletes every recorded resource, newest first. */
  async destroy(options: RunOptions = {}): Promise<RunSummary> {
    const state = await this.store.load();
    const outcomes: ResourceOutcome[] = [];

    for (const entry of [...state.resources].reverse()) {
      const outcome = await this.destroyEntry(state, entry, options);
      outcomes.push(outcome);
      if (outcome.action === "failed") return { outcomes, ok: false };
    }
    return { outcomes, ok: true };
  }

  // ---- Single resources ---------------------------------------------------

  private async applyResource(state: StateFile, resource: PlanResource, options: RunOptions): Promise<ResourceOutcome> {
    const { key, kind } = resource;
    const handler = this.handlers[kind];
    let entry = findEntry(state, key);

    try {
      if (entry && entry.kind !== kind) {
        throw new ConfigurationError(
          "Resource kind changed",
          `${key} is recorded as ${entry.kind}. Destroy it before declaring it as ${kind}.`,
          ["kind"],
        );
      }
      if (entry && entry.state === null) {
        throw new ConfigurationError(
          `${key} did not finish creating`,
          `${kind} ${entry.id} was created but never settled. Delete it, remove it from the state file and apply again.`,
        );
      }

      if (entry && entry.state !== null && canonicalJson(entry.spec) === canonicalJson(resource.spec)) {
        let current: SettledResource | null = null;
        try {
          current = await handler.refresh(entry.state, options);
        } catch (error) {
          if (!(error instanceof NotFoundError)) throw error;
          this.log(`${kind} ${key} no longer exists and will be created again`, "stderr");
          removeEntry(state, key);
          await this.store.save(state);
          entry = undefined;
        }
        if (current) return await this.correctDrift(state, resource, current, options);
      }

      if (entry && entry.state !== null) {
        this.log(`Updating ${kind} ${key}`, "stdout");
        const updated = await handler.update(entry.state, resource.spec, options);
        await this.record(state, resource, updated);
        return { key, kind, action: "updated", id: updated.id };
      }

      return await this.createResource(state, resource, options);
    } catch (error) {
      this.log(`${kind} ${key}: ${describeError(error)}`, "stderr");
      return { key, kind, action: "failed", id: entry?.id ?? findEntry(state, key)?.id ?? null, error };
    }
  }

  private async correctDrift(
    state: StateFile,
    resource: PlanResource,
    current: SettledResource,
    options: RunOptions,
  ): Promise<ResourceOutcome> {
    const { key, kind } = resource;
    const handler = this.handlers[kind];
    const drift = handler.drift(resource.spec, current.state);
    if (drift.length === 0) {
      await this.record(state, resource, current);
      return { key, kind, action: "unchanged", id: current.id };
    }

    this.log(`${kind} ${key} drifted: ${drift.join(", ")}`, "stderr");
    if (!handler.updatable) {
      this.log(`${kind} ${key} cannot be changed in place; recreate it to restore the plan`, "stderr");
      await this.record(state, resource, current);
      return { key, kind, action: "drifted", id: current.id, drift };
    }

    this.log(`Updating ${kind} ${key}`, "stdout");
    const updated = await handler.update(current.state, resource.spec, options);
    await this.record(state, resource, updated);
    return { key, kind, action: "drifted", id: updated.id, drift };
  }

  private async createResource(state: StateFile, resource: PlanResource, options: RunOptions): Promise<ResourceOutcome> {
    const { key, kind } = resource;
    const accepted: { id: string | null } = { id: null };

    this.log(`Creating ${kind} ${key}`, "stdout");
    try {
      const created = await this.handlers[kind].create(resource.spec, {
        signal: options.signal,
        onCreated: (id) => {
          accepted.id = id;
        },
      });
      await this.record(state, resource, created);
      return { key, kind, action: "created", id: created.id };
    } catch (error) {
      if (accepted.id !== null) {
        // keep the id so the resource can be found and cleaned up
        upsertEntry(state, {
          key,
          kind,
          id: accepted.id,
          spec: resource.spec,
          state: null,
          updatedAt: this.now().toISOString(),
        });
        await this.store.save(state);
      }
      throw error;
    }
  }

  private async refreshEntry(state: StateFile, entry: StateEntry, options: RunOptions): Promise<ResourceOutcome> {
    const { key, kind } = entry;
    if (entry.state === null) {
      this.log(`${kind} ${key} (${entry.id}) never settled; skipping`, "stderr");
      return { key, kind, action: "skipped", id: entry.id };
    }

    try {
      const handler = this.handlers[kind];
      const current = await handler.refresh(entry.state, options);
      await this.record(state, { key, kind, spec: entry.spec }, current);
      const drift = handler.drift(entry.spec, current.state);
      if (drift.length > 0) {
        this.log(`${kind} ${key} drifted: ${drift.join(", ")}`, "stderr");
        return { key, kind, action: "drifted", id: current.id, drift };
      }
      return { key, kind, action: "refreshed", id: current.id };
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log(`${kind} ${key} no longer exists; removed from state`, "stderr");
        removeEntry(state, key);
        await this.store.save(state);
        return { key, kind, action: "gone", id: entry.id };
      }
      this.log(`${kind} ${key}: ${describeError(error)}`, "stderr");
      return { key, kind, action: "failed", id: entry.id, error };
    }
  }

  private async destroyEntry(state: StateFile, entry: StateEntry, options: RunOptions): Promise<ResourceOutcome> {
    const { key, kind } = entry;
    return this.mutex.withLock(lockKey(kind, key), async (): Promise<ResourceOutcome> => {
      if (entry.state === null) {
        this.log(`${kind} ${key} (${entry.id}) never settled; delete it by hand`, "stderr");
        return { key, kind, action: "skipped", id: entry.id };
      }

      try {
        this.log(`Deleting ${kind} ${key}`, "stdout");
        const deleted = await this.handlers[kind].delete(entry.state, options);
        removeEntry(state, key);
        await this.store.save(state);
        return { key, kind, action: deleted ? "deleted" : "gone", id: entry.id };
      } catch (error) {
        this.log(`${kind} ${key}: ${describeError(error)}`, "stderr");
        return { key, kind, action: "failed", id: entry.id, error };
      }
    });
  }

  private async record(state: StateFile, resource: PlanResource, settled: SettledResource): Promise<void> {
    upsertEntry(state, {
      key: resource.key,
      kind: resource.kind,
      id: settled.id,
      spec: resource.spec,
      state: settled.state,
      updatedAt: this.now().toISOString(),
    });
    await this.store.save(state);
  }
}

function findEntry(state: StateFile, key: string): StateEntry | undefined {
  return state.resources.find((entry) => entry.key === key);
}

function removeEntry(state: StateFile, key: string): void {
  state.resources = state.resources.filter((entry) => entry.key !== key);
}

/** Replaces in place so the entry keeps its position; new entries go last. */
function upsertEntry(state: StateFile, entry: StateEntry): void {
  const index = state.resources.findIndex((existing) => existing.key === entry.key);
  if (index === -1) {
    state.resources.push(entry);
  } else {
    state.resources[index] = entry;
  }
}
