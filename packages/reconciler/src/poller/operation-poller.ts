/**
 * Operation Poller
 *
 * Waits on accepted control-plane mutations until they reach a terminal
 * state. Each operation moves SUBMITTED -> POLLING -> one of SUCCEEDED,
 * FAILED or TIMED_OUT.
 *
 * Retryable read failures are swallowed and polled again. Fatal failures
 * abort immediately. The signal is handed to every check and also ends a
 * check still in flight. Running out of time, or an abort signal, ends in
 * `OperationTimeout` so callers can tell "gave up waiting" apart from
 * "the service said no".
 */

import {
  ApiError,
  OperationTimeout,
  describeError,
  isRetryableError,
  noopLog,
  type LogCallback,
} from "@dbplane/core";
import type { IOperationPoller } from "../managers/interfaces";
import { RetryPolicy } from "./retry-policy";
import type { Operation, OperationPhase, PollOutcome, ProgressListener } from "./outcome";

const ABORTED = Symbol("aborted");

/** Settles with `work`, or with `ABORTED` as soon as `signal` fires. */
function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T | typeof ABORTED> {
  if (!signal) return work;
  if (signal.aborted) return Promise.resolve(ABORTED);
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export class OperationPoller implements IOperationPoller {
  constructor(
    private readonly policy: RetryPolicy = new RetryPolicy(),
    private readonly log: LogCallback = noopLog,
    private readonly onProgress?: ProgressListener,
  ) {}

  async waitFor<T>(operation: Operation<T>): Promise<T> {
    const policy = this.policyFor(operation);
    const { description, signal } = operation;
    const startedAt = policy.clock.now();
    let attempt = 0;
    let lastStatus = "";

    this.emit(operation, "SUBMITTED", null, attempt, 0);

    for (;;) {
      if (signal?.aborted) {
        throw this.cancelled(operation, policy, startedAt, attempt, lastStatus);
      }

      attempt += 1;
      let result: PollOutcome<T> | typeof ABORTED | undefined;
      try {
        result = await untilAborted(operation.check(attempt, signal), signal);
      } catch (error) {
        if (signal?.aborted) {
          result = ABORTED;
        } else if (!isRetryableError(error)) {
          this.log(`  [${description}] FAILED: ${describeError(error)}`, "stderr");
          this.emit(operation, "FAILED", lastStatus || null, attempt, policy.elapsedSince(startedAt));
          throw error;
        } else {
          this.log(`  [${description}] RETRY: ${describeError(error)}`, "stdout");
          lastStatus = "";
        }
      }
      if (result === ABORTED) {
        throw this.cancelled(operation, policy, startedAt, attempt, lastStatus);
      }
      const outcome = result;

      if (outcome) {
        const elapsedMs = policy.elapsedSince(startedAt);
        if (outcome.status !== lastStatus) {
          this.log(
            `  [${description}] ${outcome.status} - ${Math.round(elapsedMs / 1000)}s elapsed`,
            "stdout",
          );
          lastStatus = outcome.status;
        }

        if (outcome.state === "done") {
          this.emit(operation, "SUCCEEDED", outcome.status, attempt, elapsedMs);
          return outcome.value;
        }
        if (outcome.state === "failed") {
          this.log(`  [${description}] FAILED: ${outcome.message}`, "stderr");
          this.emit(operation, "FAILED", outcome.status, attempt, elapsedMs);
          throw new ApiError(outcome.message, undefined, "FATAL", `Could not complete ${description}`);
        }
        this.emit(operation, "POLLING", outcome.status, attempt, elapsedMs);
      }

      if (policy.isExpired(startedAt)) {
        const elapsedMs = policy.elapsedSince(startedAt);
        this.log(`  [${description}] TIMEOUT after ${policy.maxDurationMs / 1000}s`, "stderr");
        this.emit(operation, "TIMED_OUT", lastStatus || null, attempt, elapsedMs);
        throw new OperationTimeout(
          `Timed out after ${policy.maxDurationMs / 1000}s waiting for ${description}`,
          operation.resourceId,
          elapsedMs,
        );
      }

      await policy.clock.sleep(policy.nextDelay(startedAt), signal);
    }
  }

  private cancelled<T>(
    operation: Operation<T>,
    policy: RetryPolicy,
    startedAt: number,
    attempt: number,
    lastStatus: string,
  ): OperationTimeout {
    const elapsedMs = policy.elapsedSince(startedAt);
    this.log(`  [${operation.description}] CANCELLED after ${Math.round(elapsedMs / 1000)}s`, "stderr");
    this.emit(operation, "TIMED_OUT", lastStatus || null, attempt, elapsedMs);
    return new OperationTimeout(
      `Stopped waiting for ${operation.description}: the operation was cancelled`,
      operation.resourceId,
      elapsedMs,
      true,
    );
  }

  private policyFor<T>(operation: Operation<T>): RetryPolicy {
    let policy = this.policy;
    if (operation.timeoutMs !== undefined) policy = policy.withMaxDuration(operation.timeoutMs);
    if (operation.intervalMs !== undefined) policy = policy.withInterval(operation.intervalMs);
    return policy;
  }

  private emit<T>(
    operation: Operation<T>,
    phase: OperationPhase,
    status: string | null,
    attempt: number,
    elapsedMs: number,
  ): void {
    this.onProgress?.({
      resourceId: operation.resourceId,
      kind: operation.kind,
      description: operation.description,
      phase,
      status,
      attempt,
      elapsedMs,
    });
  }
}
