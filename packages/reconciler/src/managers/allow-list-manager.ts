import {
  ALLOW_LIST_DETACH_TIMEOUT_MS,
  ConfigurationError,
  type AllowListSpec,
  type AllowListState,
  type EngineConfig,
  type LogCallback,
  type Scope,
} from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import { taskCompletion } from "../poller/watchers";
import type { ReadContext } from "../reader/context";
import { readAllowListState } from "../reader/network-reader";
import { readFor } from "../reader/read-purpose";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { translateAllowListSpec } from "../translator/network-translator";
import type { IAllowListManager, IOperationPoller, ReconcileOptions } from "./interfaces";

export class AllowListManager implements IAllowListManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: AllowListSpec, options: ReconcileOptions = {}): Promise<AllowListState> {
    const existing = await this.api.listAllowLists();
    if (existing.some((allowList) => allowList.spec.name === spec.allowListName)) {
      throw new ConfigurationError(
        "Unable to create allow list",
        `NetworkAllowList ${spec.allowListName} already exists`,
        ["allowListName"],
      );
    }

    this.log(`Creating allow list ${spec.allowListName}`, "stdout");
    const created = await this.api.createAllowList(translateAllowListSpec(spec));
    options.onCreated?.(created.info.id);
    return readAllowListState(this.readContext(), created.info.id);
  }

  async refresh(prior: AllowListState): Promise<AllowListState> {
    return readAllowListState(this.readContext(), prior.allowListId);
  }

  async update(): Promise<AllowListState> {
    throw new ConfigurationError(
      "Unable to update allow list",
      "Updating allow lists is not currently supported. Delete and recreate the provider.",
    );
  }

  /**
   * An attached allow list cannot be deleted, so it is first removed from
   * every cluster that still exists.
   */
  async delete(prior: AllowListState, options: ReconcileOptions = {}): Promise<boolean> {
    const current = await readFor("delete-precheck", () => this.api.getAllowList(prior.allowListId));
    if (current === null) return false;

    for (const clusterId of current.info.cluster_ids) {
      await this.detach(prior.allowListId, clusterId, options.signal);
    }

    this.log(`Deleting allow list ${current.spec.name} (${prior.allowListId})`, "stdout");
    await this.api.deleteAllowList(prior.allowListId);
    return true;
  }

  private async detach(allowListId: string, clusterId: string, signal: AbortSignal | undefined): Promise<void> {
    const cluster = await readFor("delete-precheck", () => this.api.getCluster(clusterId));
    if (cluster === null || cluster.info.state.toUpperCase() === "DELETING") {
      this.log(`  Skipping cluster ${clusterId}: no longer active`, "stdout");
      return;
    }

    const remaining = (await this.api.listClusterAllowLists(clusterId))
      .map((allowList) => allowList.info.id)
      .filter((id) => id !== allowListId);

    this.log(`  Detaching allow list ${allowListId} from cluster ${clusterId}`, "stdout");
    await this.api.editClusterAllowLists(clusterId, remaining);
    await this.poller.waitFor({
      resourceId: clusterId,
      kind: "associate",
      description: `detach allow list from ${clusterId}`,
      check: taskCompletion(this.api, { entityId: clusterId, entityType: "CLUSTER", taskType: "EDIT_ALLOW_LIST" }),
      timeoutMs: ALLOW_LIST_DETACH_TIMEOUT_MS,
      signal,
    });
  }

  private readContext(): ReadContext {
    return {
      api: this.api,
      refs: new CrossReferenceResolver(this.api),
      poller: this.poller,
      flags: this.config.featureFlags,
      scope: this.scope,
    };
  }
}
