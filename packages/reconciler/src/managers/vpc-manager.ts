import {
  ConfigurationError,
  RESOURCE_DELETE_TIMEOUT_MS,
  VPC_CREATE_TIMEOUT_MS,
  type EngineConfig,
  type LogCallback,
  type Scope,
  type VpcSpec,
  type VpcState,
} from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import { resourceGone, vpcActive } from "../poller/watchers";
import type { ReadContext } from "../reader/context";
import { readVpcState } from "../reader/network-reader";
import { readFor } from "../reader/read-purpose";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { translateVpcSpec, validateVpcRules } from "../translator/network-translator";
import type { IOperationPoller, IVpcManager, ReconcileOptions } from "./interfaces";

export class VpcManager implements IVpcManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: VpcSpec, options: ReconcileOptions = {}): Promise<VpcState> {
    validateVpcRules(spec);

    this.log(`Creating VPC ${spec.name}`, "stdout");
    const created = await this.api.createVpc(translateVpcSpec(spec));
    const vpcId = created.info.id;
    options.onCreated?.(vpcId);

    await this.poller.waitFor({
      resourceId: vpcId,
      kind: "create",
      description: `create VPC ${spec.name}`,
      check: vpcActive(this.api, vpcId),
      timeoutMs: VPC_CREATE_TIMEOUT_MS,
      signal: options.signal,
    });

    return readVpcState(this.readContext(), {
      vpcId,
      requestedRegions: spec.regionCidrInfo && spec.regionCidrInfo.length > 0 ? spec.regionCidrInfo : null,
    });
  }

  async refresh(prior: VpcState): Promise<VpcState> {
    return readVpcState(this.readContext(), { vpcId: prior.vpcId, requestedRegions: prior.regionCidrInfo });
  }

  async update(): Promise<VpcState> {
    throw new ConfigurationError(
      "Unable to update VPC",
      "Updating VPCs is not currently supported. Delete and recreate the provider.",
    );
  }

  async delete(prior: VpcState, options: ReconcileOptions = {}): Promise<boolean> {
    const current = await readFor("delete-precheck", () => this.api.getVpc(prior.vpcId));
    if (current === null) return false;

    this.log(`Deleting VPC ${current.spec.name} (${prior.vpcId})`, "stdout");
    await this.api.deleteVpc(prior.vpcId);
    await this.poller.waitFor({
      resourceId: prior.vpcId,
      kind: "delete",
      description: `delete VPC ${current.spec.name}`,
      check: resourceGone((signal) => this.api.getVpc(prior.vpcId, { signal })),
      timeoutMs: RESOURCE_DELETE_TIMEOUT_MS,
      signal: options.signal,
    });
    return true;
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
