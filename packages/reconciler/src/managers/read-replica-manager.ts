/**
 * Read Replica Manager
 *
 * Replicas are provisioned as a set against a primary cluster. The primary
 * must be Active before any change and is Active again once the change
 * settles.
 */

import type {
  EngineConfig,
  LogCallback,
  ReadReplicasSpec,
  ReadReplicasState,
  Scope,
} from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import { clusterStateReached } from "../poller/watchers";
import type { ReadContext } from "../reader/context";
import { readFor } from "../reader/read-purpose";
import { readReadReplicasState } from "../reader/read-replica-reader";
import { buildRegionIndex, type RegionIndex } from "../reader/region-order";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { translateReadReplicasSpec, validateReadReplicaRules } from "../translator/read-replica-translator";
import type { IOperationPoller, IReadReplicaManager, ReconcileOptions } from "./interfaces";

export class ReadReplicaManager implements IReadReplicaManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: ReadReplicasSpec, options: ReconcileOptions = {}): Promise<ReadReplicasState> {
    validateReadReplicaRules(spec);
    const refs = new CrossReferenceResolver(this.api);
    const { payload, regionIndex } = await translateReadReplicasSpec(spec, refs);
    const { primaryClusterId } = spec;

    await this.waitForPrimary(primaryClusterId, "create", options.signal);
    this.log(`Creating ${payload.length} read replica(s) for ${primaryClusterId}`, "stdout");
    await this.api.createReadReplicas(primaryClusterId, payload);
    options.onCreated?.(primaryClusterId);
    await this.waitForPrimary(primaryClusterId, "create", options.signal);

    return readReadReplicasState(this.readContext(refs), { primaryClusterId, regionIndex });
  }

  async refresh(prior: ReadReplicasState): Promise<ReadReplicasState> {
    return readReadReplicasState(this.readContext(new CrossReferenceResolver(this.api)), {
      primaryClusterId: prior.primaryClusterId,
      regionIndex: this.regionIndexOf(prior),
    });
  }

  async update(
    prior: ReadReplicasState,
    spec: ReadReplicasSpec,
    options: ReconcileOptions = {},
  ): Promise<ReadReplicasState> {
    validateReadReplicaRules(spec);
    const refs = new CrossReferenceResolver(this.api);
    const { payload, regionIndex } = await translateReadReplicasSpec(spec, refs);
    const { primaryClusterId } = prior;

    await this.waitForPrimary(primaryClusterId, "update", options.signal);
    this.log(`Updating read replicas of ${primaryClusterId}`, "stdout");
    await this.api.editReadReplicas(primaryClusterId, payload);
    await this.waitForPrimary(primaryClusterId, "update", options.signal);

    return readReadReplicasState(this.readContext(refs), { primaryClusterId, regionIndex });
  }

  async delete(prior: ReadReplicasState, options: ReconcileOptions = {}): Promise<boolean> {
    const { primaryClusterId } = prior;
    const current = await readFor("delete-precheck", () => this.api.getReadReplicas(primaryClusterId));
    if (current === null || current.spec.length === 0) return false;

    await this.waitForPrimary(primaryClusterId, "delete", options.signal);
    this.log(`Deleting read replicas of ${primaryClusterId}`, "stdout");
    await this.api.deleteReadReplicas(primaryClusterId);
    await this.waitForPrimary(primaryClusterId, "delete", options.signal);
    return true;
  }

  private async waitForPrimary(
    clusterId: string,
    kind: "create" | "update" | "delete",
    signal: AbortSignal | undefined,
  ): Promise<void> {
    await this.poller.waitFor({
      resourceId: clusterId,
      kind,
      description: `primary cluster ${clusterId} active`,
      check: clusterStateReached(this.api, clusterId, "Active"),
      signal,
    });
  }

  private regionIndexOf(state: ReadReplicasState): RegionIndex {
    return buildRegionIndex(state.readReplicasInfo.map((replica) => replica.region));
  }

  private readContext(refs: CrossReferenceResolver): ReadContext {
    return {
      api: this.api,
      refs,
      poller: this.poller,
      flags: this.config.featureFlags,
      scope: this.scope,
    };
  }
}
