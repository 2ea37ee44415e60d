import {
  ConfigurationError,
  type EngineConfig,
  type IntegrationSpec,
  type IntegrationState,
  type LogCallback,
  type Scope,
} from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import type { ReadContext } from "../reader/context";
import { readFor } from "../reader/read-purpose";
import { readIntegrationState } from "../reader/resource-reader";
import { CrossReferenceResolver } from "../translator/cross-reference";
import { translateIntegrationSpec } from "../translator/integration-translator";
import type { IIntegrationManager, IOperationPoller, ReconcileOptions } from "./interfaces";

/** Integrations are created synchronously; nothing is polled. */
export class IntegrationManager implements IIntegrationManager {
  constructor(
    private readonly api: IManagedDbApi,
    private readonly poller: IOperationPoller,
    private readonly config: EngineConfig,
    private readonly scope: Scope,
    private readonly log: LogCallback,
  ) {}

  async create(spec: IntegrationSpec, options: ReconcileOptions = {}): Promise<IntegrationState> {
    const payload = translateIntegrationSpec(spec, this.config.featureFlags);

    this.log(`Creating ${spec.type} integration ${spec.configName}`, "stdout");
    const created = await this.api.createIntegration(payload);
    options.onCreated?.(created.info.id);
    return readIntegrationState(this.readContext(), created.info.id, spec);
  }

  async refresh(prior: IntegrationState): Promise<IntegrationState> {
    return readIntegrationState(this.readContext(), prior.configId, prior);
  }

  async update(): Promise<IntegrationState> {
    throw new ConfigurationError(
      "Unable to update integration",
      "This resource does not support updates. Delete and recreate the provider.",
    );
  }

  async delete(prior: IntegrationState): Promise<boolean> {
    const current = await readFor("delete-precheck", () => this.api.getIntegration(prior.configId));
    if (current === null) return false;

    this.log(`Deleting integration ${current.spec.name} (${prior.configId})`, "stdout");
    await this.api.deleteIntegration(prior.configId);
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
