import type { FeatureFlags, Scope } from "@dbplane/core";
import type { IManagedDbApi } from "@dbplane/api-client";
import type { IOperationPoller } from "../managers/interfaces";
import type { CrossReferenceResolver } from "../translator/cross-reference";

/** Collaborators a state reader needs for one reconciliation pass. */
export interface ReadContext {
  api: IManagedDbApi;
  refs: CrossReferenceResolver;
  poller: IOperationPoller;
  flags: FeatureFlags;
  scope: Scope;
}
