/**
 * Command Context
 *
 * Wires configuration, the API client, the engine and the plan runner for
 * the commands that talk to the service.
 */

import {
  ErrorTransformerInterceptor,
  LoggerInterceptor,
  ManagedDbHttpClient,
  type ApiInterceptor,
} from "@dbplane/api-client";
import { ReconcilerFactory, type OperationProgress } from "@dbplane/reconciler";
import { loadCliConfig, type CliConfig } from "../config/cli-config";
import type { IOutputService } from "../output/output.interface";
import { JsonStateStore } from "../plan/plan-file";
import { PlanRunner } from "../plan/plan-runner";
import { createResourceHandlers } from "../plan/resource-kinds";

export const DEFAULT_STATE_FILE = "dbplane.state.json";

export interface CommandOptions {
  state?: string;
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  config: CliConfig;
  runner: PlanRunner;
}

function describeProgress(event: OperationProgress): string {
  const seconds = Math.round(event.elapsedMs / 1000);
  return event.status ? `${event.description}: ${event.status} (${seconds}s)` : event.description;
}

export async function createCommandContext(options: CommandOptions, output: IOutputService): Promise<CommandContext> {
  const config = await loadCliConfig({ configPath: options.config });
  const verbose = options.verbose === true || config.verbose;

  const interceptors: ApiInterceptor[] = [new ErrorTransformerInterceptor()];
  if (verbose) {
    interceptors.push(new LoggerInterceptor({ verbose: true, logFn: output.log }));
  }

  const api = new ManagedDbHttpClient({
    baseUrl: config.apiUrl,
    apiToken: config.apiToken,
    accountId: config.accountId,
    projectId: config.projectId,
    timeoutMs: config.requestTimeoutMs,
    interceptors,
  });

  const reconcilers = ReconcilerFactory.createManagers({
    api,
    scope: { accountId: config.accountId, projectId: config.projectId },
    engine: config.engine,
    log: output.log,
    onProgress: (event) => output.updateSpinner(describeProgress(event)),
  });

  const runner = new PlanRunner(
    createResourceHandlers(reconcilers),
    new JsonStateStore(options.state ?? DEFAULT_STATE_FILE),
    output.log,
  );
  return { config, runner };
}

/**
 * An AbortSignal that fires on Ctrl-C, so waits end with a cancelled
 * timeout and the state file is still written.
 */
export function interruptSignal(): { signal: AbortSignal; dispose(): void } {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onInterrupt);
    },
  };
}
